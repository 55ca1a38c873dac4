/**
 * Production container on Supabase and OpenAI.
 * Throws at cold start when required environment variables are missing.
 */

import { createContainer, type Container } from './container.js';
import { loadConfig } from './config.js';
import { getSupabaseClient } from './db.js';
import { SupabaseGapRepository } from './repositories/SupabaseGapRepository.js';
import {
  AxiomLogProvider,
  ConsoleLogProvider,
  OpenAIEmbeddingProvider,
  SupabaseResearchQueue,
  SupabaseRetrievalClient,
  type ILogProvider,
} from './providers/index.js';
import { HandlerRegistry } from './handlers/HandlerRegistry.js';
import { OpenAISpecialistHandler } from './handlers/OpenAISpecialistHandler.js';
import { SPECIALIST_PROMPTS } from './handlers/prompts.js';
import { FALLBACK_HANDLER_KEY } from './handlers/SpecialistHandler.js';

let cached: Container | null = null;

export function getProductionContainer(): Container {
  if (cached) return cached;

  const hasSupabase = process.env.SUPABASE_URL && process.env.SUPABASE_SERVICE_ROLE_KEY;
  const openaiKey = process.env.OPENAI_API_KEY;

  if (!hasSupabase || !openaiKey) {
    throw new Error(
      'Missing required environment variables: SUPABASE_URL, SUPABASE_SERVICE_ROLE_KEY, OPENAI_API_KEY'
    );
  }

  const config = loadConfig();
  const db = getSupabaseClient();

  const model = process.env.OPENAI_CHAT_MODEL;
  const specialist = (systemPrompt: string) =>
    new OpenAISpecialistHandler({ systemPrompt, apiKey: openaiKey, model });

  const handlers = new HandlerRegistry(specialist(SPECIALIST_PROMPTS.generic))
    .register(FALLBACK_HANDLER_KEY, specialist(SPECIALIST_PROMPTS.fallback))
    .register('siemens', specialist(SPECIALIST_PROMPTS.siemens))
    .register('rockwell', specialist(SPECIALIST_PROMPTS.rockwell))
    .register('drive', specialist(SPECIALIST_PROMPTS.drive));

  cached = createContainer({
    retrievalClient: new SupabaseRetrievalClient(
      db,
      new OpenAIEmbeddingProvider({ apiKey: openaiKey })
    ),
    gapRepo: new SupabaseGapRepository(db),
    researchQueue: new SupabaseResearchQueue(db),
    handlers,
    logProvider: createLogProvider(),
    adminKeys: parseKeys(process.env.ROUTER_ADMIN_KEYS),
    config,
  });

  return cached;
}

// Axiom logging when configured, console otherwise.
function createLogProvider(): ILogProvider {
  const apiToken = process.env.AXIOM_API_KEY;
  const dataset = process.env.AXIOM_DATASET;

  return apiToken && dataset
    ? new AxiomLogProvider({ apiToken, dataset })
    : new ConsoleLogProvider({ outputToConsole: true, minLevel: 'info' });
}

function parseKeys(raw: string | undefined): string[] {
  return (raw ?? '')
    .split(',')
    .map((k) => k.trim())
    .filter(Boolean);
}
