import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';
import { Test, TestingModule } from '@nestjs/testing';
import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import {
  createTempDir,
  INTRO_X_DOCUMENT,
  removeTempDir,
} from '../../test/support/course-fixtures.js';
import {
  FakeAiProvider,
  textResponse,
  toolCallResponse,
} from '../../test/support/fake-ai-provider.js';
import { AI_PROVIDER_TOKEN } from '../ai/ai.constants.js';
import { ProviderError } from '../ai/ai.errors.js';
import { AIService } from '../ai/ai.service.js';
import type { AiMessage } from '../ai/ai.types.js';
import { CourseChunker } from '../courses/course-chunker.js';
import { CourseIngestionService } from '../courses/course-ingestion.service.js';
import {
  RETRIEVAL_CONFIG,
  VECTOR_INDEX_REPOSITORY,
} from '../courses/courses.constants.js';
import { FileVectorIndexRepository } from '../courses/file-vector-index.repository.js';
import { VectorIndexService } from '../courses/vector-index.service.js';
import { ToolRegistryFactory } from '../tools/tool-registry.factory.js';
import { CHAT_CONFIG } from './chat.constants.js';
import { GenerationError } from './chat.errors.js';
import { ChatService } from './chat.service.js';
import { SessionService } from './session.service.js';
import { ToolOrchestratorService } from './tool-orchestrator.service.js';

const VOCABULARY = ['intro', 'x', 'advanced', 'patterns', 'basics'];

const SEARCH_CALL = {
  id: 'call-1',
  name: 'search_course_content',
  input: { query: 'what is X' },
};

describe('ChatService with ingested courses', () => {
  let workspace: string;
  let provider: FakeAiProvider;
  let service: ChatService;
  let sessions: SessionService;

  beforeEach(async () => {
    workspace = await createTempDir('chat-integration');
    const docs = path.join(workspace, 'docs');
    await mkdir(docs);
    await writeFile(path.join(docs, 'intro-x.txt'), INTRO_X_DOCUMENT);

    provider = new FakeAiProvider(VOCABULARY);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ChatService,
        SessionService,
        ToolOrchestratorService,
        ToolRegistryFactory,
        VectorIndexService,
        CourseChunker,
        CourseIngestionService,
        AIService,
        { provide: AI_PROVIDER_TOKEN, useValue: provider },
        {
          provide: VECTOR_INDEX_REPOSITORY,
          useValue: new FileVectorIndexRepository({
            directory: path.join(workspace, 'index'),
            collection: 'courses',
          }),
        },
        {
          provide: RETRIEVAL_CONFIG,
          useValue: {
            chunkSize: 800,
            chunkOverlap: 100,
            maxResults: 5,
            courseMatchMinScore: 0.8,
            contextWindow: 0,
          },
        },
        {
          provide: CHAT_CONFIG,
          useValue: { maxHistory: 2, maxToolRounds: 2 },
        },
      ],
    }).compile();

    service = module.get<ChatService>(ChatService);
    sessions = module.get<SessionService>(SessionService);

    const report = await module
      .get<CourseIngestionService>(CourseIngestionService)
      .ingestPath(docs);
    expect(report).toEqual({
      coursesAdded: 1,
      chunksAdded: 2,
      skipped: [],
      failed: [],
    });
  });

  afterEach(async () => {
    await removeTempDir(workspace);
  });

  it('answers from the search results of the ingested course', async () => {
    provider.scriptResponses(
      toolCallResponse(SEARCH_CALL),
      textResponse('Intro to X starts with X basics in lesson 0.'),
    );

    const result = await service.answer('What is X?');

    expect(result.answer).toContain('Intro to X');
    expect(result.sources).toEqual([
      'Intro to X - Lesson 0',
      'Intro to X - Lesson 1',
    ]);
    expect(result.citations).toEqual([
      {
        label: 'Intro to X - Lesson 0',
        url: 'https://courses.example.com/intro-x/0',
      },
      {
        label: 'Intro to X - Lesson 1',
        url: 'https://courses.example.com/intro-x/1',
      },
    ]);

    expect(provider.generateText).toHaveBeenCalledTimes(2);
    const messages: AiMessage[] =
      provider.generateText.mock.calls[1][0].messages;
    expect(messages.at(-1)).toEqual({
      role: 'tool',
      results: [
        {
          toolCallId: 'call-1',
          toolName: 'search_course_content',
          output: [
            '[Intro to X - Lesson 0]',
            'X basics explained for beginners.',
            '',
            '[Intro to X - Lesson 1]',
            'Advanced X patterns and retrieval tricks.',
          ].join('\n'),
        },
      ],
    });
    expect(sessions.getHistory(result.sessionId)).toEqual([
      {
        user: 'What is X?',
        assistant: 'Intro to X starts with X basics in lesson 0.',
      },
    ]);
  });

  it('fails the query when the search cannot embed it', async () => {
    const cause = new ProviderError(
      'PROVIDER_TIMEOUT',
      'fake',
      'fake embedding timed out after 30000ms',
    );
    provider.embedText.mockRejectedValueOnce(cause);
    provider.scriptResponses(
      toolCallResponse(SEARCH_CALL),
      textResponse('Sorry, search is down.'),
    );
    const sessionId = sessions.createSession();

    const error = await service
      .answer('What is X?', sessionId)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GenerationError);
    expect(error).toMatchObject({ code: 'GENERATION_FAILED', cause });
    expect(provider.generateText).toHaveBeenCalledTimes(1);
    expect(sessions.getHistory(sessionId)).toEqual([]);
  });
});
