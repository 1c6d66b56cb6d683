import { createHash } from 'node:crypto';
import type { EmbeddingProvider } from '@doc-quiz/core';

/**
 * Offline embedder: hashes lower-cased word tokens into a fixed number of
 * buckets and unit-normalizes the counts. Texts sharing vocabulary land close
 * together, which is enough for mock mode and tests.
 */
export class HashingEmbeddingProvider implements EmbeddingProvider {
  constructor(private readonly dimensions = 256) {}

  async embedDocuments(texts: string[]): Promise<number[][]> {
    return texts.map(text => this.vectorize(text));
  }

  async embedQuery(text: string): Promise<number[]> {
    return this.vectorize(text);
  }

  getModelName(): string {
    return `hashing-${this.dimensions}`;
  }

  private vectorize(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);

    for (const token of tokenize(text)) {
      const digest = createHash('sha256').update(token).digest();
      vector[digest.readUInt32BE(0) % this.dimensions] += 1;
    }

    const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
    return norm === 0 ? vector : vector.map(value => value / norm);
  }
}

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
}
