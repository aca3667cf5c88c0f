// Course Search Tool
// Semantic search over course content with optional course and lesson filters

import { z } from 'zod';
import type { CourseStore, SearchResultSet } from '../retrieval/types.js';
import { isEmptySearchResults } from '../retrieval/search-results.js';
import { parseToolInput } from './input.js';
import type { SourceCitation, Tool, ToolParameter } from './types.js';

// null and '' filters mean "no filter"
const SearchInputSchema = z.object({
  query: z.string().refine(value => value.trim().length > 0, 'query is required'),
  course_name: z.string().nullish(),
  lesson_number: z.number().int().nonnegative().nullish(),
});

export class CourseSearchTool implements Tool {
  readonly name = 'search_course_content';
  readonly description =
    'Search course materials with smart course name matching and lesson filtering';
  readonly parameters: ToolParameter[] = [
    {
      name: 'query',
      type: 'string',
      description: 'What to search for in the course content',
      required: true,
    },
    {
      name: 'course_name',
      type: 'string',
      description: "Course title (partial matches work, e.g. 'MCP', 'Introduction')",
      required: false,
    },
    {
      name: 'lesson_number',
      type: 'integer',
      description: 'Specific lesson number to search within (e.g. 1, 2, 3)',
      required: false,
    },
  ];

  lastSources: SourceCitation[] = [];

  constructor(private store: CourseStore) {}

  async execute(input: Record<string, unknown>): Promise<string> {
    this.lastSources = [];
    const args = parseToolInput(this.name, SearchInputSchema, input);
    const courseName = args.course_name || undefined;
    const lessonNumber = args.lesson_number ?? undefined;

    const results = await this.store.search({ query: args.query, courseName, lessonNumber });

    if (results.error) {
      return results.error;
    }

    if (isEmptySearchResults(results)) {
      let filterInfo = '';
      if (courseName) {
        filterInfo += ` in course '${courseName}'`;
      }
      if (lessonNumber !== undefined) {
        filterInfo += ` in lesson ${lessonNumber}`;
      }
      return `No relevant content found${filterInfo}.`;
    }

    return this.formatResults(results);
  }

  /**
   * Renders each document under a `[Course - Lesson N]` header and records one
   * citation per document.
   */
  async formatResults(results: SearchResultSet): Promise<string> {
    const formatted: string[] = [];
    const sources: SourceCitation[] = [];

    for (let i = 0; i < results.documents.length; i++) {
      const meta = results.metadata[i];
      const courseTitle = meta.course_title;
      const lessonNumber = meta.lesson_number;

      let header = courseTitle ?? 'unknown';
      if (lessonNumber !== undefined && lessonNumber !== null) {
        header += ` - Lesson ${lessonNumber}`;
      }

      let url: string | null = null;
      if (courseTitle && lessonNumber !== undefined && lessonNumber !== null) {
        url = await this.store.getLessonLink(courseTitle, lessonNumber);
      }

      formatted.push(`[${header}]\n${results.documents[i]}`);
      sources.push({ label: header, url });
    }

    this.lastSources = sources;
    return formatted.join('\n\n');
  }
}
