import { afterEach, beforeEach, describe, expect, it, jest } from '@jest/globals';
import {
  createTempDir,
  GARDENING_DOCUMENT,
  INTRO_X_DOCUMENT,
  removeTempDir,
} from '../../test/support/course-fixtures.js';
import { FakeAiProvider } from '../../test/support/fake-ai-provider.js';
import { AIService } from '../ai/ai.service.js';
import { ConfigurationError } from '../config/config.errors.js';
import { CourseChunker } from './course-chunker.js';
import { parseCourseDocument } from './course-document.parser.js';
import { SearchError } from './course.errors.js';
import type { SearchResult } from './course.types.js';
import { FileVectorIndexRepository } from './file-vector-index.repository.js';
import type { VectorIndexRepository } from './vector-index.repository.js';
import { VectorIndexService } from './vector-index.service.js';

const VOCABULARY = [
  'intro',
  'x',
  'y',
  'basics',
  'advanced',
  'patterns',
  'retrieval',
  'compost',
  'soil',
];

describe('VectorIndexService', () => {
  let directory: string;
  let provider: FakeAiProvider;
  let repository: FileVectorIndexRepository;
  let service: VectorIndexService;

  const index = async (raw: string, source: string, chunker?: CourseChunker) => {
    const document = parseCourseDocument(raw, source);
    const chunks = (
      chunker ?? new CourseChunker({ chunkSize: 800, chunkOverlap: 100 })
    ).chunkCourse(document);
    return service.upsert(document.course, chunks);
  };

  beforeEach(async () => {
    directory = await createTempDir('vector-index-service');
    provider = new FakeAiProvider(VOCABULARY);
    repository = new FileVectorIndexRepository({
      directory,
      collection: 'courses',
    });
    service = new VectorIndexService(new AIService(provider), repository, {
      maxResults: 5,
      courseMatchMinScore: 0.8,
    });
  });

  afterEach(async () => {
    await removeTempDir(directory);
  });

  it('refuses a non-positive MAX_RESULTS at construction', () => {
    expect(
      () =>
        new VectorIndexService(new AIService(provider), repository, {
          maxResults: 0,
          courseMatchMinScore: 0.8,
        }),
    ).toThrow(ConfigurationError);
  });

  it('embeds the course title together with its chunks', async () => {
    await expect(index(INTRO_X_DOCUMENT, 'intro-x.txt')).resolves.toBe(2);

    expect(provider.embedText).toHaveBeenCalledWith({
      inputs: [
        'Intro to X',
        'X basics explained for beginners.',
        'Advanced X patterns and retrieval tricks.',
      ],
    });
  });

  describe('query', () => {
    beforeEach(async () => {
      await index(INTRO_X_DOCUMENT, 'intro-x.txt');
      await index(GARDENING_DOCUMENT, 'gardening.txt');
      provider.embedText.mockClear();
    });

    it('ranks the lesson about the query first', async () => {
      const results = await service.query('advanced x patterns');

      expect(
        results.map((result) => [result.courseTitle, result.lessonNumber]),
      ).toEqual([
        ['Intro to X', 1],
        ['Intro to X', 0],
        ['Gardening Basics', 1],
      ]);
      expect(results[0].score).toBeCloseTo(3 / Math.sqrt(12));
      expect(results[0].distance).toBeCloseTo(1 - 3 / Math.sqrt(12));
      expect(results[0].chunkId).toBe('Intro to X::1');
    });

    it('honours an explicit limit and the course filter', async () => {
      await expect(
        service.query('advanced x patterns', { limit: 1 }),
      ).resolves.toHaveLength(1);

      const filtered = await service.query('advanced x patterns', {
        courseTitle: 'Gardening Basics',
      });
      expect(filtered.map((result) => result.text)).toEqual([
        'Compost feeds the soil.',
      ]);
    });

    it('rejects a zero limit before embedding the query', async () => {
      await expect(service.query('x', { limit: 0 })).rejects.toMatchObject({
        name: 'SearchError',
        code: 'INVALID_RESULT_LIMIT',
      });
      expect(provider.embedText).not.toHaveBeenCalled();
    });
  });

  it('wraps index failures in a SearchError', async () => {
    const failing: VectorIndexRepository = {
      upsertCourse: jest.fn<VectorIndexRepository['upsertCourse']>(),
      searchChunks: jest
        .fn<VectorIndexRepository['searchChunks']>()
        .mockRejectedValue(new Error('disk on fire')),
      searchCourses: jest.fn<VectorIndexRepository['searchCourses']>(),
      getCourse: jest.fn<VectorIndexRepository['getCourse']>(),
      listCourses: jest.fn<VectorIndexRepository['listCourses']>(),
      getChunkRange: jest.fn<VectorIndexRepository['getChunkRange']>(),
      clear: jest.fn<VectorIndexRepository['clear']>(),
    };
    const failingService = new VectorIndexService(
      new AIService(provider),
      failing,
      { maxResults: 5, courseMatchMinScore: 0.8 },
    );

    const error = await failingService.query('x').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SearchError);
    expect(error).toMatchObject({
      code: 'INDEX_QUERY_FAILED',
      message: 'Vector index query failed: disk on fire',
    });
  });

  describe('resolveCourseTitle', () => {
    beforeEach(async () => {
      await index(INTRO_X_DOCUMENT, 'intro-x.txt');
      await index(GARDENING_DOCUMENT, 'gardening.txt');
    });

    it('matches exact titles regardless of case', async () => {
      await expect(service.resolveCourseTitle('intro to x')).resolves.toBe(
        'Intro to X',
      );
    });

    it('matches a unique partial title', async () => {
      await expect(service.resolveCourseTitle('Gardening')).resolves.toBe(
        'Gardening Basics',
      );
    });

    it('falls back to the nearest title embedding', async () => {
      await expect(service.resolveCourseTitle('X intro')).resolves.toBe(
        'Intro to X',
      );
    });

    it('does not map a missing course onto a similar one', async () => {
      await expect(service.resolveCourseTitle('Intro to Y')).resolves.toBeNull();
    });
  });

  it('lists course titles alphabetically and clears them', async () => {
    await index(INTRO_X_DOCUMENT, 'intro-x.txt');
    await index(GARDENING_DOCUMENT, 'gardening.txt');

    await expect(service.listCourseTitles()).resolves.toEqual([
      'Gardening Basics',
      'Intro to X',
    ]);
    await expect(service.getCourse('Gardening Basics')).resolves.toEqual({
      title: 'Gardening Basics',
      instructor: 'Sam Placeholder',
      link: undefined,
      lessons: [{ number: 1, title: 'Soil' }],
    });

    await service.clear();
    await expect(service.listCourseTitles()).resolves.toEqual([]);
  });

  it('widens a hit with its neighbouring chunks', async () => {
    await index(
      'Course Title: Counting\nLesson 1: Numbers\none two three four five six seven eight nine ten',
      'counting.txt',
      new CourseChunker({ chunkSize: 20, chunkOverlap: 5 }),
    );
    const hit: SearchResult = {
      chunkId: 'Counting::1',
      text: 'four five six seven',
      courseTitle: 'Counting',
      lessonNumber: 1,
      chunkIndex: 1,
      score: 1,
      distance: 0,
    };

    await expect(service.expandContext(hit, 0)).resolves.toBe(
      'four five six seven',
    );
    await expect(service.expandContext(hit, 1)).resolves.toBe(
      'one two three four five six seven eight nine ten',
    );
  });
});
