// Tool Registry - dispatches backend tool requests by name
// Also aggregates and clears source citations across registered tools

import type { ToolDefinition, JsonSchemaProperty } from '../../providers/types.js';
import { logger as rootLogger, type Logger } from '../../logger.js';
import type { SourceCitation, Tool, ToolParameter } from './types.js';

export class ToolRegistry {
  private tools: Map<string, Tool> = new Map();
  // Tool whose execute call completed most recently since the last reset
  private lastExecuted: string | null = null;
  private log: Logger;

  constructor(logger: Logger = rootLogger) {
    this.log = logger.child({ component: 'tool-registry' });
  }

  register(tool: Tool): void {
    if (this.tools.has(tool.name)) {
      this.log.warn({ tool: tool.name }, 'Tool already registered, overwriting');
    }
    this.tools.set(tool.name, tool);
  }

  get(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  getAll(): Tool[] {
    return Array.from(this.tools.values());
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  getToolDefinitions(): ToolDefinition[] {
    return this.getAll().map(tool => ({
      name: tool.name,
      description: tool.description,
      input_schema: {
        type: 'object',
        properties: this.parametersToSchema(tool.parameters),
        required: tool.parameters.filter(p => p.required).map(p => p.name),
      },
    }));
  }

  /**
   * Unknown names resolve to a plain message; errors thrown by the tool propagate.
   */
  async execute(name: string, input: Record<string, unknown> = {}): Promise<string> {
    const tool = this.tools.get(name);
    if (!tool) {
      return `Tool '${name}' not found`;
    }
    const result = await tool.execute(input);
    this.lastExecuted = name;
    return result;
  }

  /**
   * Citations of the most recently completed execute call only.
   */
  getLastSources(): SourceCitation[] {
    if (this.lastExecuted === null) return [];
    const tool = this.tools.get(this.lastExecuted);
    return tool ? tool.lastSources.map(source => ({ ...source })) : [];
  }

  resetSources(): void {
    for (const tool of this.tools.values()) {
      tool.lastSources = [];
    }
    this.lastExecuted = null;
  }

  private parametersToSchema(params: ToolParameter[]): Record<string, JsonSchemaProperty> {
    const schema: Record<string, JsonSchemaProperty> = {};

    for (const param of params) {
      const paramSchema: JsonSchemaProperty = {
        type: param.type,
        description: param.description,
      };

      if (param.enum) {
        paramSchema.enum = param.enum;
      }

      schema[param.name] = paramSchema;
    }

    return schema;
  }
}
