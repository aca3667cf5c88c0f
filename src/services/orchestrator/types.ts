// Orchestrator Types

export interface ToolDispatcher {
  execute(name: string, input: Record<string, unknown>): Promise<string>;
}

export interface OrchestratorOptions {
  model?: string;
  maxTokens?: number;
  temperature?: number;
  /** Tool-execution rounds allowed per query. */
  maxToolRounds?: number;
}
