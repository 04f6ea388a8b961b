import {
  BadGatewayException,
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  Logger,
  Post,
} from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import { ChatService } from './chat.service.js';
import { GenerationError } from './chat.errors.js';
import {
  queryRequestSchema,
  type CourseStatsResponseDto,
  type QueryRequestDto,
  type QueryResponseDto,
} from './dto/query.dto.js';

@Controller({
  path: 'api',
})
export class ChatController {
  private readonly logger = new Logger(ChatController.name);

  constructor(private readonly chatService: ChatService) {}

  @Post('query')
  @HttpCode(200)
  async query(@Body() body: unknown): Promise<QueryResponseDto> {
    const requestId = randomUUID();

    const parsed = queryRequestSchema.safeParse(body);
    if (!parsed.success) {
      const message = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`)
        .join('; ');
      this.logger.warn(`Query request ${requestId} rejected: ${message}`);
      throw new BadRequestException({ code: 'INVALID_QUERY', message });
    }
    const payload: QueryRequestDto = parsed.data;

    try {
      const result = await this.chatService.answer(
        payload.query,
        payload.session_id,
      );
      return {
        answer: result.answer,
        sources: result.sources,
        citations: result.citations,
        session_id: result.sessionId,
      };
    } catch (error) {
      if (error instanceof GenerationError) {
        this.logger.error(
          `Query request ${requestId} failed [${error.code}]: ${error.message}`,
          error.cause?.stack,
        );
        throw new BadGatewayException({
          code: error.code,
          message: `${error.message} (request ID: ${requestId})`,
        });
      }
      throw error;
    }
  }

  @Get('courses')
  async courses(): Promise<CourseStatsResponseDto> {
    const stats = await this.chatService.getCourseStats();
    return {
      total_courses: stats.totalCourses,
      course_titles: stats.courseTitles,
    };
  }
}
