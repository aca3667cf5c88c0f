// Anthropic Provider
// Messages API over fetch; responses are validated into the content-block union

import { z } from 'zod';
import { env } from '../env.js';
import { AppError } from '../utils/errors.js';
import type { BackendRequest, BackendResponse, GenerationBackend, ResponseBlock } from './types.js';

const ANTHROPIC_VERSION = '2023-06-01';

const TextBlockSchema = z.object({
  type: z.literal('text'),
  text: z.string(),
});

const ToolUseBlockSchema = z.object({
  type: z.literal('tool_use'),
  id: z.string(),
  name: z.string(),
  input: z.record(z.unknown()),
});

const ResponseBlockSchema = z.discriminatedUnion('type', [TextBlockSchema, ToolUseBlockSchema]);

const MessageResponseSchema = z.object({
  stop_reason: z.string().nullable(),
  // thinking, redacted_thinking etc. are accepted here and dropped below
  content: z.array(z.object({ type: z.string() }).passthrough()),
  usage: z
    .object({
      input_tokens: z.number().optional(),
      output_tokens: z.number().optional(),
    })
    .optional(),
});

export interface AnthropicBackendOptions {
  apiKey?: string;
  baseUrl?: string;
  fetchImpl?: typeof fetch;
}

export class AnthropicBackend implements GenerationBackend {
  name = 'anthropic';
  private apiKey: string;
  private baseUrl: string;
  private fetchImpl: typeof fetch;

  constructor(options: AnthropicBackendOptions = {}) {
    this.apiKey = options.apiKey ?? env.ANTHROPIC_API_KEY;
    if (!this.apiKey) {
      throw AppError.configuration('ANTHROPIC_API_KEY is not configured');
    }
    this.baseUrl = (options.baseUrl ?? env.ANTHROPIC_BASE_URL).replace(/\/+$/, '');
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async createMessage(request: BackendRequest): Promise<BackendResponse> {
    const response = await this.fetchImpl(`${this.baseUrl}/v1/messages`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'x-api-key': this.apiKey,
        'anthropic-version': ANTHROPIC_VERSION,
      },
      body: JSON.stringify(request),
    });

    if (!response.ok) {
      const error = await response.text();
      if (response.status === 401 || response.status === 403) {
        throw AppError.unauthorized(`Anthropic API error (${response.status}): ${error}`, response.status);
      }
      if (response.status === 429) {
        const retryAfter = parseInt(response.headers.get('retry-after') || '', 10);
        throw AppError.rateLimited(
          isNaN(retryAfter) ? undefined : retryAfter,
          `Anthropic API error (429): ${error}`
        );
      }
      throw AppError.backend(`Anthropic API error (${response.status}): ${error}`, response.status);
    }

    const payload: unknown = await response.json();
    return this.parseResponse(payload);
  }

  private parseResponse(payload: unknown): BackendResponse {
    const parsed = MessageResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw AppError.invalidResponse('Anthropic API returned an unexpected payload', parsed.error.issues);
    }

    const content: ResponseBlock[] = [];
    for (const raw of parsed.data.content) {
      if (raw.type !== 'text' && raw.type !== 'tool_use') continue;

      const block = ResponseBlockSchema.safeParse(raw);
      if (!block.success) {
        throw AppError.invalidResponse(`Malformed ${raw.type} block in Anthropic response`, block.error.issues);
      }
      content.push(block.data);
    }

    return {
      stop_reason: parsed.data.stop_reason,
      content,
      usage: {
        inputTokens: parsed.data.usage?.input_tokens || 0,
        outputTokens: parsed.data.usage?.output_tokens || 0,
      },
    };
  }
}
