import { fileURLToPath } from 'node:url';
import path from 'node:path';
import type { Passage, QuestionPayload } from '@doc-quiz/core';

export const fixturesDir = path.dirname(fileURLToPath(import.meta.url));
export const docsDir = path.join(fixturesDir, 'docs');
export const emptyDocsDir = path.join(fixturesDir, 'empty');
export const pdfDir = path.join(fixturesDir, 'pdf');
export const brokenPdfDir = path.join(fixturesDir, 'broken');

export const buildPayload = (overrides: Partial<QuestionPayload> = {}): QuestionPayload => ({
  question: 'What does chlorophyll absorb?',
  choices: [
    { key: 'A', value: 'Red and blue light' },
    { key: 'B', value: 'Green light only' },
    { key: 'C', value: 'Infrared radiation' },
    { key: 'D', value: 'Ultraviolet light only' }
  ],
  answer: 'A',
  explanation: 'Chlorophyll absorbs mostly red and blue light.',
  ...overrides
});

export const rawQuestion = (overrides: Partial<QuestionPayload> = {}): string =>
  JSON.stringify(buildPayload(overrides));

export async function* passages(...contents: string[]): AsyncGenerator<Passage> {
  for (const content of contents) {
    yield { content, source: 'fixture.md' };
  }
}
