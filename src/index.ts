// Course Materials Assistant
// Composition root: wires backend, vector store, tools, sessions and the query service

// Load environment variables from .env file
import 'dotenv/config';

import { env, logConfiguration } from './env.js';
import { logger as rootLogger, type Logger } from './logger.js';
import { getGenerationBackend } from './providers/index.js';
import type { GenerationBackend } from './providers/types.js';
import { OpenAIEmbedder, type Embedder } from './services/embeddings.js';
import { ToolUseOrchestrator } from './services/orchestrator/index.js';
import type { OrchestratorOptions } from './services/orchestrator/types.js';
import { QueryService } from './services/query-service.js';
import { CourseVectorStore } from './services/retrieval/index.js';
import { SessionManager } from './services/session-manager.js';
import { createCourseToolRegistry } from './services/tools/index.js';

export interface CourseAssistantOptions {
  backend?: GenerationBackend;
  embedder?: Embedder;
  orchestrator?: OrchestratorOptions;
  maxResults?: number;
  maxHistory?: number;
  logger?: Logger;
}

export interface CourseAssistant {
  queryService: QueryService;
  store: CourseVectorStore;
  sessions: SessionManager;
  close(): void;
}

export function createCourseAssistant(options: CourseAssistantOptions = {}): CourseAssistant {
  const logger = options.logger ?? rootLogger;
  const backend = options.backend ?? getGenerationBackend();
  const embedder = options.embedder ?? new OpenAIEmbedder();

  const store = new CourseVectorStore(embedder, {
    maxResults: options.maxResults ?? env.MAX_RESULTS,
    logger,
  });
  const registry = createCourseToolRegistry(store, logger);
  const sessions = new SessionManager({ maxHistory: options.maxHistory ?? env.MAX_HISTORY });
  const orchestrator = new ToolUseOrchestrator(backend, options.orchestrator, logger);

  const queryService = new QueryService({
    generator: orchestrator,
    registry,
    sessions,
    store,
    logger,
  });

  logConfiguration(line => logger.info(line));
  logger.info({ tools: registry.getAll().map(t => t.name) }, 'Course assistant initialized');

  return {
    queryService,
    store,
    sessions,
    close: () => sessions.close(),
  };
}

export { env, logConfiguration } from './env.js';
export { logger } from './logger.js';
export { AppError, ErrorCode, getErrorMessage, isAppError } from './utils/errors.js';
export * from './providers/index.js';
export { OpenAIEmbedder, cosineSimilarity } from './services/embeddings.js';
export type { Embedder, OpenAIEmbedderOptions } from './services/embeddings.js';
export * from './services/orchestrator/index.js';
export * from './services/retrieval/index.js';
export * from './services/tools/index.js';
export { QueryService } from './services/query-service.js';
export type {
  AnswerGenerator,
  CourseAnalytics,
  QueryResult,
  QueryServiceDeps,
  SourceTrackingDispatcher,
} from './services/query-service.js';
export { SessionManager } from './services/session-manager.js';
export type { SessionManagerOptions, SessionMessage } from './services/session-manager.js';
