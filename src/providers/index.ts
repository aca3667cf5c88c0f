// Generation backend registry
// Lazily creates the configured backend and caches it for the process

import type { GenerationBackend } from './types.js';
import { AnthropicBackend } from './anthropic.js';
import { isBackendConfigured } from '../env.js';
import { AppError } from '../utils/errors.js';

const backends: Map<string, GenerationBackend> = new Map();

export function getGenerationBackend(name = 'anthropic'): GenerationBackend {
  const cached = backends.get(name);
  if (cached) {
    return cached;
  }

  let backend: GenerationBackend;
  switch (name) {
    case 'anthropic':
      if (!isBackendConfigured()) {
        throw AppError.configuration('Generation backend "anthropic" is not configured');
      }
      backend = new AnthropicBackend();
      break;
    default:
      throw AppError.configuration(`Generation backend "${name}" is not available`);
  }

  backends.set(name, backend);
  return backend;
}

export { AnthropicBackend } from './anthropic.js';
export type {
  BackendMessage,
  BackendRequest,
  BackendResponse,
  ContentBlock,
  GenerationBackend,
  ResponseBlock,
  TextBlock,
  ToolDefinition,
  ToolResultBlock,
  ToolUseBlock,
} from './types.js';
