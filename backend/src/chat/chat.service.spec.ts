import {
  afterEach,
  beforeEach,
  describe,
  expect,
  it,
  jest,
} from '@jest/globals';
import { Test, TestingModule } from '@nestjs/testing';

import { VectorIndexService } from '../courses/vector-index.service.js';
import { ToolRegistry } from '../tools/tool-registry.js';
import { ToolRegistryFactory } from '../tools/tool-registry.factory.js';
import { CHAT_CONFIG } from './chat.constants.js';
import { GenerationError } from './chat.errors.js';
import { ChatService } from './chat.service.js';
import { SessionService } from './session.service.js';
import { ToolOrchestratorService } from './tool-orchestrator.service.js';

type OrchestratorRunFn = ToolOrchestratorService['run'];
type RegistryFactoryCreateFn = ToolRegistryFactory['create'];
type ListCourseTitlesFn = VectorIndexService['listCourseTitles'];

describe('ChatService', () => {
  let service: ChatService;
  let sessions: SessionService;
  let orchestrator: {
    run: jest.MockedFunction<OrchestratorRunFn>;
  };
  let registryFactory: {
    create: jest.MockedFunction<RegistryFactoryCreateFn>;
  };
  let vectorIndex: {
    listCourseTitles: jest.MockedFunction<ListCourseTitlesFn>;
  };

  beforeEach(async () => {
    const orchestratorMock = {
      run: jest.fn<OrchestratorRunFn>(),
    };

    const registryFactoryMock = {
      create: jest
        .fn<RegistryFactoryCreateFn>()
        .mockImplementation(() => new ToolRegistry()),
    };

    const vectorIndexMock = {
      listCourseTitles: jest.fn<ListCourseTitlesFn>(),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ChatService,
        SessionService,
        {
          provide: CHAT_CONFIG,
          useValue: { maxHistory: 2, maxToolRounds: 2 },
        },
        {
          provide: ToolOrchestratorService,
          useValue: orchestratorMock,
        },
        {
          provide: ToolRegistryFactory,
          useValue: registryFactoryMock,
        },
        {
          provide: VectorIndexService,
          useValue: vectorIndexMock,
        },
      ],
    }).compile();

    service = module.get<ChatService>(ChatService);
    sessions = module.get<SessionService>(SessionService);
    orchestrator = module.get(ToolOrchestratorService);
    registryFactory = module.get(ToolRegistryFactory);
    vectorIndex = module.get(VectorIndexService);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('answer', () => {
    it('creates a session and returns labels alongside citations', async () => {
      orchestrator.run.mockResolvedValue({
        answer: 'Lesson 1 covers X.',
        sources: [
          {
            label: 'Intro to X - Lesson 1',
            url: 'https://courses.example.com/intro-x/1',
          },
          { label: 'Intro to X' },
        ],
      });

      const result = await service.answer('What does lesson 1 cover?');

      expect(result).toEqual({
        answer: 'Lesson 1 covers X.',
        sources: ['Intro to X - Lesson 1', 'Intro to X'],
        citations: [
          {
            label: 'Intro to X - Lesson 1',
            url: 'https://courses.example.com/intro-x/1',
          },
          { label: 'Intro to X' },
        ],
        sessionId: expect.any(String),
      });
      expect(orchestrator.run).toHaveBeenCalledWith(
        'What does lesson 1 cover?',
        [],
        expect.any(ToolRegistry),
      );
      expect(sessions.getHistory(result.sessionId)).toEqual([
        { user: 'What does lesson 1 cover?', assistant: 'Lesson 1 covers X.' },
      ]);
    });

    it('passes the session history to follow-up questions', async () => {
      orchestrator.run
        .mockResolvedValueOnce({ answer: 'First answer', sources: [] })
        .mockResolvedValueOnce({ answer: 'Second answer', sources: [] });

      const first = await service.answer('First question');
      const second = await service.answer('Second question', first.sessionId);

      expect(second.sessionId).toBe(first.sessionId);
      expect(orchestrator.run).toHaveBeenLastCalledWith(
        'Second question',
        [{ user: 'First question', assistant: 'First answer' }],
        expect.any(ToolRegistry),
      );
    });

    it('gives every query its own tool registry', async () => {
      orchestrator.run.mockResolvedValue({ answer: 'ok', sources: [] });

      await Promise.all([service.answer('one'), service.answer('two')]);

      expect(registryFactory.create).toHaveBeenCalledTimes(2);
      const [firstRegistry, secondRegistry] = orchestrator.run.mock.calls.map(
        (call) => call[2],
      );
      expect(firstRegistry).not.toBe(secondRegistry);
    });

    it('does not record an exchange that failed', async () => {
      const sessionId = sessions.createSession();
      orchestrator.run.mockRejectedValue(
        new GenerationError('Answer generation failed: offline'),
      );

      await expect(service.answer('Anyone there?', sessionId)).rejects.toThrow(
        GenerationError,
      );
      expect(sessions.getHistory(sessionId)).toEqual([]);
    });
  });

  describe('getCourseStats', () => {
    it('counts the indexed courses', async () => {
      vectorIndex.listCourseTitles.mockResolvedValue([
        'Gardening Basics',
        'Intro to X',
      ]);

      await expect(service.getCourseStats()).resolves.toEqual({
        totalCourses: 2,
        courseTitles: ['Gardening Basics', 'Intro to X'],
      });
    });
  });
});
