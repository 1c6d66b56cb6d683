import type { Chunk } from './CharacterTextSplitter';

export interface ScoredChunk {
  chunk: Chunk;
  score: number;
}

interface Entry {
  chunk: Chunk;
  vector: number[];
}

export class InMemoryVectorStore {
  private readonly entries: Entry[] = [];

  get size(): number {
    return this.entries.length;
  }

  add(chunks: Chunk[], vectors: number[][]): void {
    if (chunks.length !== vectors.length) {
      throw new Error(`Got ${vectors.length} vectors for ${chunks.length} chunks`);
    }

    chunks.forEach((chunk, index) => {
      this.entries.push({ chunk, vector: vectors[index] });
    });
  }

  /** Top `k` chunks by cosine similarity, best first. Ties keep insertion order. */
  similaritySearchWithScore(query: number[], k = 4): ScoredChunk[] {
    return this.entries
      .map(entry => ({ chunk: entry.chunk, score: cosineSimilarity(query, entry.vector) }))
      .sort((a, b) => b.score - a.score)
      .slice(0, Math.max(0, k));
  }
}

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector dimensions differ: ${a.length} vs ${b.length}`);
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}
