import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

export const INTRO_X_DOCUMENT = [
  'Course Title: Intro to X',
  'Course Link: https://courses.example.com/intro-x',
  'Course Instructor: Ada Example',
  '',
  'Lesson 0: Welcome',
  'Lesson Link: https://courses.example.com/intro-x/0',
  'X basics explained for beginners.',
  '',
  'Lesson 1: Deeper X',
  'Lesson Link: https://courses.example.com/intro-x/1',
  'Advanced X patterns and retrieval tricks.',
].join('\n');

export const GARDENING_DOCUMENT = [
  'Course Title: Gardening Basics',
  'Course Instructor: Sam Placeholder',
  '',
  'Lesson 1: Soil',
  'Compost feeds the soil.',
].join('\n');

export async function createTempDir(prefix: string): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), `${prefix}-`));
}

export async function removeTempDir(directory: string): Promise<void> {
  await rm(directory, { recursive: true, force: true });
}
