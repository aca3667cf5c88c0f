// Generation backend interface
// Anthropic Messages shape: content is an ordered list of typed blocks

export interface TextBlock {
  type: 'text';
  text: string;
}

export interface ToolUseBlock {
  type: 'tool_use';
  id: string;
  name: string;
  input: Record<string, unknown>;
}

export interface ToolResultBlock {
  type: 'tool_result';
  tool_use_id: string;
  content: string;
  is_error?: boolean;
}

/** Blocks a backend may return. */
export type ResponseBlock = TextBlock | ToolUseBlock;

/** Blocks that may appear in a request message. */
export type ContentBlock = ResponseBlock | ToolResultBlock;

export interface BackendMessage {
  role: 'user' | 'assistant';
  content: string | ContentBlock[];
}

export interface JsonSchemaProperty {
  type: 'string' | 'number' | 'integer' | 'boolean' | 'array' | 'object';
  description: string;
  enum?: string[];
}

export interface ToolDefinition {
  name: string;
  description: string;
  input_schema: {
    type: 'object';
    properties: Record<string, JsonSchemaProperty>;
    required: string[];
  };
}

export interface ToolChoice {
  type: 'auto' | 'any' | 'none';
}

export type StopReason = 'end_turn' | 'tool_use' | 'max_tokens' | 'stop_sequence' | (string & {});

export interface BackendRequest {
  model: string;
  system: string;
  messages: BackendMessage[];
  max_tokens: number;
  temperature?: number;
  tools?: ToolDefinition[];
  tool_choice?: ToolChoice;
}

export interface BackendUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface BackendResponse {
  stop_reason: StopReason | null;
  content: ResponseBlock[];
  usage?: BackendUsage;
}

export interface GenerationBackend {
  name: string;
  createMessage(request: BackendRequest): Promise<BackendResponse>;
}
