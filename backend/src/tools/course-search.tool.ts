import { z } from 'zod';
import type { AiToolDefinition } from '../ai/ai.types.js';
import type { Course, SearchResult } from '../courses/course.types.js';
import type { VectorIndexService } from '../courses/vector-index.service.js';
import { describeInvalidInput } from './tool-input.js';
import type { CourseTool, SourceAttribution } from './tool.types.js';

export const COURSE_SEARCH_TOOL_NAME = 'search_course_content';

const searchInputSchema = z.object({
  query: z
    .string()
    .trim()
    .min(1)
    .describe('What to search for in the course content'),
  course_name: z
    .string()
    .trim()
    .min(1)
    .optional()
    .describe("Course title (partial matches work, e.g. 'MCP', 'Introduction')"),
  lesson_number: z
    .number()
    .int()
    .nonnegative()
    .optional()
    .describe('Specific lesson number to search within (e.g. 1, 2, 3)'),
});

export interface CourseSearchToolOptions {
  /** Neighbouring chunks merged into each hit; 0 returns the hit alone. */
  contextWindow: number;
}

export class CourseSearchTool implements CourseTool {
  readonly definition: AiToolDefinition = {
    name: COURSE_SEARCH_TOOL_NAME,
    description:
      'Search course materials with smart course name matching and lesson filtering',
    parameters: searchInputSchema,
  };

  private sources: SourceAttribution[] = [];

  constructor(
    private readonly vectorIndex: VectorIndexService,
    private readonly options: CourseSearchToolOptions,
  ) {}

  async execute(input: unknown): Promise<string> {
    this.resetSources();

    const parsed = searchInputSchema.safeParse(input);
    if (!parsed.success) {
      return describeInvalidInput(COURSE_SEARCH_TOOL_NAME, parsed.error);
    }
    const { query, course_name: courseName, lesson_number: lessonNumber } =
      parsed.data;

    let courseTitle: string | undefined;
    if (courseName !== undefined) {
      const resolved = await this.vectorIndex.resolveCourseTitle(courseName);
      if (!resolved) {
        return `No course found matching '${courseName}'`;
      }
      courseTitle = resolved;
    }

    const results = await this.vectorIndex.query(query, {
      courseTitle,
      lessonNumber,
    });

    if (results.length === 0) {
      let message = 'No relevant content found';
      if (courseTitle !== undefined) {
        message += ` in course '${courseTitle}'`;
      }
      if (lessonNumber !== undefined) {
        message += ` in lesson ${lessonNumber}`;
      }
      return `${message}.`;
    }

    return this.formatResults(results);
  }

  getSources(): SourceAttribution[] {
    return [...this.sources];
  }

  resetSources(): void {
    this.sources = [];
  }

  private async formatResults(results: SearchResult[]): Promise<string> {
    const courses = new Map<string, Course | null>();
    const blocks: string[] = [];
    const sources: SourceAttribution[] = [];

    for (const result of results) {
      const label =
        result.lessonNumber === null
          ? result.courseTitle
          : `${result.courseTitle} - Lesson ${result.lessonNumber}`;
      const text = await this.vectorIndex.expandContext(
        result,
        this.options.contextWindow,
      );
      blocks.push(`[${label}]\n${text}`);

      if (!courses.has(result.courseTitle)) {
        courses.set(
          result.courseTitle,
          await this.vectorIndex.getCourse(result.courseTitle),
        );
      }
      const url = linkFor(courses.get(result.courseTitle), result.lessonNumber);
      sources.push(url ? { label, url } : { label });
    }

    this.sources = sources;
    return blocks.join('\n\n');
  }
}

function linkFor(
  course: Course | null | undefined,
  lessonNumber: number | null,
): string | undefined {
  if (!course) {
    return undefined;
  }
  if (lessonNumber === null) {
    return course.link;
  }
  return course.lessons.find((lesson) => lesson.number === lessonNumber)?.link;
}
