// Tool system types and interfaces
// Every capability the backend can call implements Tool

export interface ToolParameter {
  name: string;
  type: 'string' | 'number' | 'integer' | 'boolean' | 'array' | 'object';
  description: string;
  required: boolean;
  enum?: string[]; // For enum types
}

export interface SourceCitation {
  label: string;
  url: string | null;
}

/**
 * A named retrieval capability.
 *
 * `lastSources` holds the citations of the most recent `execute` call and is
 * only cleared through the registry. A tool instance must be used by one
 * query at a time.
 */
export interface Tool {
  readonly name: string;
  readonly description: string;
  readonly parameters: ToolParameter[];
  lastSources: SourceCitation[];
  execute(input: Record<string, unknown>): Promise<string>;
}
