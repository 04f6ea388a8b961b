import { z } from 'zod';
import type { SourceAttribution } from '../../tools/tool.types.js';

export const queryRequestSchema = z.object({
  query: z.string().trim().min(1, 'query must not be empty'),
  session_id: z.string().trim().min(1).optional(),
});

export type QueryRequestDto = z.infer<typeof queryRequestSchema>;

export interface QueryResponseDto {
  answer: string;
  sources: string[];
  citations: SourceAttribution[];
  session_id: string;
}

export interface CourseStatsResponseDto {
  total_courses: number;
  course_titles: string[];
}
