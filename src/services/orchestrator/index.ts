// Orchestrator Module - Main exports

export { ToolUseOrchestrator, MAX_TOOL_ROUNDS, extractText } from './orchestrator.js';
export { SYSTEM_PROMPT, NO_RESPONSE_FALLBACK, buildSystemPrompt } from './prompts.js';
export type { OrchestratorOptions, ToolDispatcher } from './types.js';
