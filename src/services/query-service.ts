/**
 * Query Service
 * Answers one session query: history in, tool-backed answer and citations out
 */

import { logger as rootLogger, type Logger } from '../logger.js';
import type { ToolDefinition } from '../providers/types.js';
import type { CourseStore } from './retrieval/types.js';
import type { SessionManager } from './session-manager.js';
import type { ToolDispatcher } from './orchestrator/types.js';
import type { SourceCitation } from './tools/types.js';

export interface AnswerGenerator {
  generate(
    query: string,
    history?: string | null,
    toolDefs?: ToolDefinition[],
    dispatcher?: ToolDispatcher
  ): Promise<string>;
}

export interface SourceTrackingDispatcher extends ToolDispatcher {
  getToolDefinitions(): ToolDefinition[];
  getLastSources(): SourceCitation[];
  resetSources(): void;
}

export interface QueryServiceDeps {
  generator: AnswerGenerator;
  registry: SourceTrackingDispatcher;
  sessions: SessionManager;
  store: CourseStore;
  logger?: Logger;
}

export interface QueryResult {
  answer: string;
  sources: SourceCitation[];
  sessionId: string;
}

export interface CourseAnalytics {
  totalCourses: number;
  courseTitles: string[];
}

export class QueryService {
  private generator: AnswerGenerator;
  private registry: SourceTrackingDispatcher;
  private sessions: SessionManager;
  private store: CourseStore;
  private log: Logger;
  // The registry's tools hold per-query sources, so queries run one at a time.
  private pending: Promise<unknown> = Promise.resolve();

  constructor(deps: QueryServiceDeps) {
    this.generator = deps.generator;
    this.registry = deps.registry;
    this.sessions = deps.sessions;
    this.store = deps.store;
    this.log = (deps.logger ?? rootLogger).child({ component: 'query-service' });
  }

  query(query: string, sessionId?: string): Promise<QueryResult> {
    const run = this.pending.then(() => this.runQuery(query, sessionId));
    // Failures reach the caller through `run`; the chain only orders queries.
    this.pending = run.catch(() => undefined);
    return run;
  }

  async getCourseAnalytics(): Promise<CourseAnalytics> {
    const [totalCourses, courseTitles] = await Promise.all([
      this.store.getCourseCount(),
      this.store.getExistingCourseTitles(),
    ]);
    return { totalCourses, courseTitles };
  }

  private async runQuery(query: string, requestedSessionId?: string): Promise<QueryResult> {
    const sessionId = requestedSessionId ?? this.sessions.createSession();
    const prompt = `Answer this question about course materials: ${query}`;
    const history = this.sessions.getConversationHistory(sessionId);

    let answer: string;
    let sources: SourceCitation[];
    try {
      answer = await this.generator.generate(
        prompt,
        history,
        this.registry.getToolDefinitions(),
        this.registry
      );
      sources = this.registry.getLastSources();
    } finally {
      this.registry.resetSources();
    }

    this.sessions.addExchange(sessionId, query, answer);
    this.log.info({ sessionId, sources: sources.length }, 'Query answered');

    return { answer, sources, sessionId };
  }
}
