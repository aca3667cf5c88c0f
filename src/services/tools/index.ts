// Tool System Initialization
// Builds a registry holding the course retrieval tools

import type { Logger } from '../../logger.js';
import type { CourseStore } from '../retrieval/types.js';
import { ToolRegistry } from './registry.js';
import { CourseSearchTool } from './course-search-tool.js';
import { CourseOutlineTool } from './course-outline-tool.js';

export { ToolRegistry } from './registry.js';
export { CourseSearchTool } from './course-search-tool.js';
export { CourseOutlineTool, formatCourseOutline } from './course-outline-tool.js';
export type { SourceCitation, Tool, ToolParameter } from './types.js';

/**
 * One registry per in-flight query owner: the tools keep per-call sources.
 */
export function createCourseToolRegistry(store: CourseStore, logger?: Logger): ToolRegistry {
  const registry = new ToolRegistry(logger);
  registry.register(new CourseSearchTool(store));
  registry.register(new CourseOutlineTool(store));
  return registry;
}
