/**
 * Dependency wiring.
 * Constructs all services with their dependencies.
 * Production passes Supabase/OpenAI implementations; tests pass in-memory mocks.
 */

import type { IGapRepository } from './repositories/IGapRepository.js';
import type { IRetrievalClient } from './providers/IRetrievalClient.js';
import type { IResearchQueue } from './providers/IResearchQueue.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import type { HandlerRegistry } from './handlers/HandlerRegistry.js';
import type { Middleware } from './middleware/pipeline.js';
import type { Catalog } from './text/catalog.js';
import { DEFAULT_CONFIG, validateConfig, type RouterConfig } from './config.js';
import { loadCatalog } from './text/catalog.js';
import { EntityExtractor } from './text/entities.js';
import { ConfidenceScorer } from './services/ConfidenceScorer.js';
import { CoverageEvaluator } from './services/CoverageEvaluator.js';
import { RouteDecisionEngine } from './services/RouteDecisionEngine.js';
import { GapDetector } from './services/GapDetector.js';
import { GapStore } from './services/GapStore.js';
import { ResearchTrigger } from './services/ResearchTrigger.js';
import { HandlerDispatcher } from './services/HandlerDispatcher.js';
import { QueryRouter } from './services/QueryRouter.js';
import { createAuthMiddleware } from './middleware/authenticate.js';
import { createLoggingMiddleware } from './middleware/logging.js';
import { errorHandler } from './middleware/error-handler.js';
import { bodyLimit } from './middleware/body-limit.js';

export interface Container {
  config: RouterConfig;
  queryRouter: QueryRouter;
  gapStore: GapStore;
  handlers: HandlerRegistry;
  logProvider: ILogProvider;
  authenticate: Middleware;
  bodyLimit: Middleware;
  logging: Middleware;
  errorHandler: Middleware;
}

export function createContainer(deps: {
  retrievalClient: IRetrievalClient;
  gapRepo: IGapRepository;
  researchQueue: IResearchQueue;
  handlers: HandlerRegistry;
  logProvider: ILogProvider;
  adminKeys?: readonly string[];
  config?: RouterConfig;
  catalog?: Catalog;
}): Container {
  const config = deps.config ?? DEFAULT_CONFIG;
  validateConfig(config);

  const extractor = new EntityExtractor(deps.catalog ?? loadCatalog());
  const scorer = new ConfidenceScorer(config.scoring);
  const evaluator = new CoverageEvaluator(
    deps.retrievalClient,
    scorer,
    extractor,
    { thresholds: config.thresholds, retrieval: config.retrieval },
    deps.logProvider
  );
  const gapStore = new GapStore(deps.gapRepo, config.gaps, deps.logProvider);
  const queryRouter = new QueryRouter({
    evaluator,
    engine: new RouteDecisionEngine(),
    dispatcher: new HandlerDispatcher(deps.handlers, config.handlers, deps.logProvider),
    detector: new GapDetector(extractor, gapStore, config.gaps),
    gapStore,
    trigger: new ResearchTrigger(deps.researchQueue, deps.logProvider),
    logProvider: deps.logProvider,
  });

  return {
    config,
    queryRouter,
    gapStore,
    handlers: deps.handlers,
    logProvider: deps.logProvider,
    authenticate: createAuthMiddleware(deps.adminKeys ?? []),
    bodyLimit: bodyLimit(64 * 1024), // 64KB max request body
    logging: createLoggingMiddleware(deps.logProvider),
    errorHandler: errorHandler(deps.logProvider),
  };
}
