// Tool-use Orchestrator
// Drives a bounded exchange between the generation backend and the tool dispatcher

import { env } from '../../env.js';
import { logger as rootLogger, type Logger } from '../../logger.js';
import { getErrorMessage } from '../../utils/errors.js';
import type {
  BackendMessage,
  BackendResponse,
  GenerationBackend,
  ResponseBlock,
  ToolDefinition,
  ToolResultBlock,
} from '../../providers/types.js';
import { buildSystemPrompt, NO_RESPONSE_FALLBACK } from './prompts.js';
import type { OrchestratorOptions, ToolDispatcher } from './types.js';

export const MAX_TOOL_ROUNDS = 2;

interface ToolRoundOutcome {
  results: ToolResultBlock[];
  failed: boolean;
}

export function extractText(content: ResponseBlock[]): string | null {
  for (const block of content) {
    switch (block.type) {
      case 'text':
        return block.text;
      case 'tool_use':
        continue;
      default: {
        const unreachable: never = block;
        throw new Error(`Unhandled content block: ${JSON.stringify(unreachable)}`);
      }
    }
  }
  return null;
}

export class ToolUseOrchestrator {
  private model: string;
  private maxTokens: number;
  private temperature: number;
  private maxToolRounds: number;
  private log: Logger;

  constructor(
    private backend: GenerationBackend,
    options: OrchestratorOptions = {},
    logger: Logger = rootLogger
  ) {
    this.model = options.model ?? env.ANTHROPIC_MODEL;
    this.maxTokens = options.maxTokens ?? env.ANTHROPIC_MAX_TOKENS;
    this.temperature = options.temperature ?? env.ANTHROPIC_TEMPERATURE;
    this.maxToolRounds = options.maxToolRounds ?? MAX_TOOL_ROUNDS;
    this.log = logger.child({ component: 'orchestrator' });
  }

  /**
   * Answers `query`, letting the backend call tools for up to `maxToolRounds` rounds.
   *
   * Backend failures propagate. Tool failures are reported to the backend as
   * error results, after which exactly one more (tool-less) backend call is made.
   * The follow-up to the final allowed round never offers tools.
   */
  async generate(
    query: string,
    history?: string | null,
    toolDefs?: ToolDefinition[],
    dispatcher?: ToolDispatcher
  ): Promise<string> {
    const system = buildSystemPrompt(history);
    const messages: BackendMessage[] = [{ role: 'user', content: query }];
    const tools = toolDefs && toolDefs.length > 0 ? toolDefs : undefined;

    let response = await this.callBackend(system, messages, tools);

    for (let round = 0; round < this.maxToolRounds; round++) {
      if (response.stop_reason !== 'tool_use' || !dispatcher) {
        break;
      }

      const outcome = await this.executeToolRound(response, messages, dispatcher, round);
      const offerTools = !outcome.failed && round < this.maxToolRounds - 1;

      this.log.debug({ round, results: outcome.results.length, failed: outcome.failed, offerTools }, 'Tool round complete');

      response = await this.callBackend(system, messages, offerTools ? tools : undefined);

      if (outcome.failed) {
        break;
      }
    }

    const text = extractText(response.content);
    if (!text) {
      this.log.warn({ stopReason: response.stop_reason }, 'Final response had no text, returning fallback');
      return NO_RESPONSE_FALLBACK;
    }
    return text;
  }

  private async callBackend(
    system: string,
    messages: BackendMessage[],
    tools?: ToolDefinition[]
  ): Promise<BackendResponse> {
    return this.backend.createMessage({
      model: this.model,
      max_tokens: this.maxTokens,
      temperature: this.temperature,
      system,
      messages: [...messages],
      ...(tools ? { tools, tool_choice: { type: 'auto' as const } } : {}),
    });
  }

  // Appends the assistant turn and the combined tool results to `messages`.
  private async executeToolRound(
    response: BackendResponse,
    messages: BackendMessage[],
    dispatcher: ToolDispatcher,
    round: number
  ): Promise<ToolRoundOutcome> {
    messages.push({ role: 'assistant', content: response.content });

    const results: ToolResultBlock[] = [];
    let failed = false;

    for (const block of response.content) {
      if (block.type !== 'tool_use') continue;

      try {
        const content = await dispatcher.execute(block.name, block.input);
        results.push({ type: 'tool_result', tool_use_id: block.id, content });
      } catch (error) {
        this.log.warn({ err: error, tool: block.name, round }, 'Tool execution failed');
        results.push({
          type: 'tool_result',
          tool_use_id: block.id,
          content: `Error executing tool: ${getErrorMessage(error)}`,
          is_error: true,
        });
        failed = true;
        break;
      }
    }

    if (results.length > 0) {
      messages.push({ role: 'user', content: results });
    }

    return { results, failed };
  }
}
