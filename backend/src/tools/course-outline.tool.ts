import { z } from 'zod';
import type { AiToolDefinition } from '../ai/ai.types.js';
import type { Course } from '../courses/course.types.js';
import type { VectorIndexService } from '../courses/vector-index.service.js';
import { describeInvalidInput } from './tool-input.js';
import type { CourseTool, SourceAttribution } from './tool.types.js';

export const COURSE_OUTLINE_TOOL_NAME = 'get_course_outline';

const outlineInputSchema = z.object({
  course_name: z
    .string()
    .trim()
    .min(1)
    .describe('Course title or a recognisable part of it'),
});

export class CourseOutlineTool implements CourseTool {
  readonly definition: AiToolDefinition = {
    name: COURSE_OUTLINE_TOOL_NAME,
    description:
      'Get the outline of a course: its title, link, instructor and the numbered list of lessons',
    parameters: outlineInputSchema,
  };

  private sources: SourceAttribution[] = [];

  constructor(private readonly vectorIndex: VectorIndexService) {}

  async execute(input: unknown): Promise<string> {
    this.resetSources();

    const parsed = outlineInputSchema.safeParse(input);
    if (!parsed.success) {
      return describeInvalidInput(COURSE_OUTLINE_TOOL_NAME, parsed.error);
    }
    const courseName = parsed.data.course_name;

    const title = await this.vectorIndex.resolveCourseTitle(courseName);
    const course = title ? await this.vectorIndex.getCourse(title) : null;
    if (!course) {
      return `No course found matching '${courseName}'`;
    }

    this.sources = [
      course.link
        ? { label: course.title, url: course.link }
        : { label: course.title },
    ];
    return formatOutline(course);
  }

  getSources(): SourceAttribution[] {
    return [...this.sources];
  }

  resetSources(): void {
    this.sources = [];
  }
}

export function formatOutline(course: Course): string {
  const lines = [`Course: ${course.title}`];
  if (course.link) {
    lines.push(`Course Link: ${course.link}`);
  }
  if (course.instructor) {
    lines.push(`Instructor: ${course.instructor}`);
  }
  lines.push(`Lessons (${course.lessons.length}):`);
  for (const lesson of course.lessons) {
    lines.push(`- Lesson ${lesson.number}: ${lesson.title}`);
  }
  return lines.join('\n');
}
