export type { IEmbeddingProvider, EmbeddingOptions } from './IEmbeddingProvider.js';
export { OpenAIEmbeddingProvider } from './OpenAIEmbeddingProvider.js';
export type { IRetrievalClient, RetrievalOptions } from './IRetrievalClient.js';
export { SupabaseRetrievalClient } from './SupabaseRetrievalClient.js';
export type { IResearchQueue } from './IResearchQueue.js';
export { SupabaseResearchQueue } from './SupabaseResearchQueue.js';
export type {
  ILogProvider,
  LogEvent,
  LogLevel,
  RequestLogEvent,
  RouteLogEvent,
} from './ILogProvider.js';
export { ConsoleLogProvider } from './ConsoleLogProvider.js';
export { AxiomLogProvider } from './AxiomLogProvider.js';
