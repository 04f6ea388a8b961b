import { CourseDocumentError } from './course.errors.js';
import type {
  Course,
  CourseDocument,
  LessonDocument,
} from './course.types.js';

const COURSE_TITLE_PATTERN = /^course\s+title\s*:\s*(.*)$/i;
const COURSE_LINK_PATTERN = /^course\s+link\s*:\s*(.*)$/i;
const COURSE_INSTRUCTOR_PATTERN = /^course\s+instructor\s*:\s*(.*)$/i;
const LESSON_HEADER_PATTERN = /^lesson\s+(\d+)\s*:\s*(.*)$/i;
const LESSON_LINK_PATTERN = /^lesson\s+link\s*:\s*(.*)$/i;

interface LessonDraft {
  number: number;
  title: string;
  link?: string;
  lines: string[];
  awaitingLink: boolean;
}

/**
 * Parses a course file written in the header convention:
 *
 * ```
 * Course Title: <title>
 * Course Link: <url>
 * Course Instructor: <name>
 *
 * Lesson 1: <lesson title>
 * Lesson Link: <url>
 * <lesson body>
 * ```
 *
 * Headers are matched case-insensitively and are not kept in lesson bodies.
 * Text between the course headers and the first lesson is returned as
 * `preamble`.
 *
 * @param source file name or other label used in error messages
 * @throws CourseDocumentError when the title is missing, a lesson number
 * repeats or the document has no content at all
 */
export function parseCourseDocument(
  raw: string,
  source: string,
): CourseDocument {
  const lines = raw.replace(/^\uFEFF/, '').replace(/\r\n?/g, '\n').split('\n');

  let title: string | undefined;
  let link: string | undefined;
  let instructor: string | undefined;
  const preamble: string[] = [];
  const lessons: LessonDraft[] = [];
  const seenNumbers = new Set<number>();

  for (const line of lines) {
    const trimmed = line.trim();
    const current = lessons.at(-1);

    const lessonHeader = LESSON_HEADER_PATTERN.exec(trimmed);
    if (lessonHeader) {
      const number = Number.parseInt(lessonHeader[1], 10);
      if (seenNumbers.has(number)) {
        throw new CourseDocumentError(
          source,
          `lesson ${number} appears more than once`,
        );
      }
      seenNumbers.add(number);
      lessons.push({
        number,
        title: lessonHeader[2].trim() || `Lesson ${number}`,
        lines: [],
        awaitingLink: true,
      });
      continue;
    }

    if (current) {
      if (current.awaitingLink && trimmed.length > 0) {
        current.awaitingLink = false;
        const lessonLink = LESSON_LINK_PATTERN.exec(trimmed);
        if (lessonLink) {
          current.link = lessonLink[1].trim() || undefined;
          continue;
        }
      }
      current.lines.push(line);
      continue;
    }

    const courseTitle = COURSE_TITLE_PATTERN.exec(trimmed);
    if (courseTitle) {
      title = courseTitle[1].trim();
      continue;
    }
    const courseLink = COURSE_LINK_PATTERN.exec(trimmed);
    if (courseLink) {
      link = courseLink[1].trim() || undefined;
      continue;
    }
    const courseInstructor = COURSE_INSTRUCTOR_PATTERN.exec(trimmed);
    if (courseInstructor) {
      instructor = courseInstructor[1].trim() || undefined;
      continue;
    }
    preamble.push(line);
  }

  if (!title) {
    throw new CourseDocumentError(source, 'missing "Course Title:" header');
  }

  const preambleText = preamble.join('\n').trim();
  if (lessons.length === 0 && preambleText.length === 0) {
    throw new CourseDocumentError(source, 'document has no course content');
  }

  const lessonDocuments: LessonDocument[] = lessons.map((lesson) => ({
    number: lesson.number,
    title: lesson.title,
    ...(lesson.link ? { link: lesson.link } : {}),
    content: lesson.lines.join('\n').trim(),
  }));

  const course: Course = {
    title,
    ...(instructor ? { instructor } : {}),
    ...(link ? { link } : {}),
    lessons: lessonDocuments.map((lesson) => ({
      number: lesson.number,
      title: lesson.title,
      ...(lesson.link ? { link: lesson.link } : {}),
    })),
  };

  return { course, preamble: preambleText, lessons: lessonDocuments };
}
