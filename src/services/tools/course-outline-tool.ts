// Course Outline Tool
// Returns a course's title, link, instructor and lesson list

import { z } from 'zod';
import type { CourseOutline, CourseStore } from '../retrieval/types.js';
import { parseToolInput } from './input.js';
import type { SourceCitation, Tool, ToolParameter } from './types.js';

const OutlineInputSchema = z.object({
  course_name: z.string().refine(value => value.trim().length > 0, 'course_name is required'),
});

export function formatCourseOutline(outline: CourseOutline): string {
  const lines = [`Course: ${outline.title}`];
  if (outline.courseLink) {
    lines.push(`Link: ${outline.courseLink}`);
  }
  if (outline.instructor) {
    lines.push(`Instructor: ${outline.instructor}`);
  }
  lines.push('');

  if (outline.lessons.length === 0) {
    lines.push('No lessons listed');
  }
  for (const lesson of outline.lessons) {
    lines.push(`Lesson ${lesson.lessonNumber}: ${lesson.title}`);
  }

  lines.push('', `${outline.lessons.length} total lessons`);
  return lines.join('\n');
}

export class CourseOutlineTool implements Tool {
  readonly name = 'get_course_outline';
  readonly description =
    'Get the outline of a course: its title, link, instructor and the number and title of every lesson';
  readonly parameters: ToolParameter[] = [
    {
      name: 'course_name',
      type: 'string',
      description: "Course title (partial matches work, e.g. 'MCP', 'Introduction')",
      required: true,
    },
  ];

  lastSources: SourceCitation[] = [];

  constructor(private store: CourseStore) {}

  async execute(input: Record<string, unknown>): Promise<string> {
    this.lastSources = [];
    const args = parseToolInput(this.name, OutlineInputSchema, input);

    const courseTitle = await this.store.resolveCourseName(args.course_name);
    if (!courseTitle) {
      return `No course found matching '${args.course_name}'`;
    }

    const outline = await this.store.getCourseOutline(courseTitle);
    if (!outline) {
      return `No outline available for '${courseTitle}'`;
    }

    this.lastSources = [{ label: outline.title, url: outline.courseLink }];
    return formatCourseOutline(outline);
  }
}
