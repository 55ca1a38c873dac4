/**
 * OpenAI-backed specialist handler.
 * Grounds a chat completion in the request's matched knowledge items.
 */

import OpenAI from 'openai';
import type { HandleOptions, SpecialistHandler } from './SpecialistHandler.js';
import type { Coverage, HandlerResult, MatchedItem, RouterRequest } from '../types/models.js';

const DEFAULT_MODEL = 'gpt-4o-mini';
const MAX_CONTEXT_ITEMS = 5;
const MAX_EXCERPT_CHARS = 800;

export interface OpenAISpecialistHandlerOptions {
  systemPrompt: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  apiKey?: string;
  client?: OpenAI;
}

export class OpenAISpecialistHandler implements SpecialistHandler {
  private readonly client: OpenAI;
  private readonly systemPrompt: string;
  private readonly model: string;
  private readonly temperature: number;
  private readonly maxTokens: number;

  constructor(options: OpenAISpecialistHandlerOptions) {
    this.client =
      options.client ??
      new OpenAI({ apiKey: options.apiKey ?? process.env.OPENAI_API_KEY });
    this.systemPrompt = options.systemPrompt;
    this.model = options.model ?? DEFAULT_MODEL;
    this.temperature = options.temperature ?? 0.2;
    this.maxTokens = options.maxTokens ?? 1000;
  }

  async handle(
    request: RouterRequest,
    coverage: Coverage,
    options?: HandleOptions
  ): Promise<HandlerResult> {
    const items = coverage.matchedItems.slice(0, MAX_CONTEXT_ITEMS);

    const completion = await this.client.chat.completions.create(
      {
        model: this.model,
        temperature: this.temperature,
        max_tokens: this.maxTokens,
        messages: [
          { role: 'system', content: this.systemPrompt },
          { role: 'user', content: buildUserPrompt(request, items) },
        ],
      },
      { signal: options?.signal }
    );

    const text = completion.choices[0]?.message.content?.trim();
    if (!text) {
      throw new Error('OpenAI returned an empty completion');
    }

    return {
      text,
      citations: citationsFor(items),
      confidence: coverage.confidence,
    };
  }
}

export function buildUserPrompt(request: RouterRequest, items: MatchedItem[]): string {
  const parts = [`Question: ${request.text}`];

  for (const attachment of request.attachments) {
    parts.push(`Attached ${attachment.kind} text: ${attachment.text}`);
  }

  if (items.length === 0) {
    parts.push('No relevant knowledge base articles found.');
  } else {
    parts.push('Relevant knowledge base articles:');
    items.forEach((item, i) => {
      const header = `[${i + 1}] ${item.title ?? item.itemId}`;
      const source = item.sourceRef ? `Source: ${item.sourceRef}` : null;
      const excerpt = item.excerpt ? item.excerpt.slice(0, MAX_EXCERPT_CHARS) : null;
      parts.push([header, source, excerpt].filter(Boolean).join('\n'));
    });
  }

  return parts.join('\n\n');
}

/** Distinct source references of the items given to the model, in rank order. */
export function citationsFor(items: MatchedItem[]): string[] {
  const refs = items.map((item) => item.sourceRef ?? item.title).filter(
    (ref): ref is string => Boolean(ref)
  );
  return [...new Set(refs)];
}
