import { IngestionError } from '@doc-quiz/core';
import type { ContextRetriever, EmbeddingProvider, Passage } from '@doc-quiz/core';
import { CharacterTextSplitter } from './CharacterTextSplitter';
import type { SourceDocument } from './DocumentLoader';
import { InMemoryVectorStore } from './InMemoryVectorStore';
import type { ScoredChunk } from './InMemoryVectorStore';

export const DEFAULT_RETRIEVER_K = 4;

export class DocumentCollection {
  private constructor(
    private readonly store: InMemoryVectorStore,
    private readonly embedder: EmbeddingProvider
  ) {}

  /**
   * Chunks, embeds and indexes `documents`. Fails when there is nothing to
   * index, so a quiz is never generated against an empty collection.
   */
  static async create(
    documents: SourceDocument[],
    embedder: EmbeddingProvider,
    splitter: CharacterTextSplitter = new CharacterTextSplitter()
  ): Promise<DocumentCollection> {
    if (documents.length === 0) {
      throw new IngestionError('No documents found');
    }

    const chunks = splitter.splitDocuments(documents);
    if (chunks.length === 0) {
      throw new IngestionError('Documents produced no text chunks');
    }

    const vectors = await embedder.embedDocuments(chunks.map(chunk => chunk.content));
    const store = new InMemoryVectorStore();
    store.add(chunks, vectors);

    return new DocumentCollection(store, embedder);
  }

  get size(): number {
    return this.store.size;
  }

  async search(text: string, k = DEFAULT_RETRIEVER_K): Promise<ScoredChunk[]> {
    const vector = await this.embedder.embedQuery(text);
    return this.store.similaritySearchWithScore(vector, k);
  }

  /** Best single match for `text`, or null when the collection has none. */
  async query(text: string): Promise<ScoredChunk | null> {
    const [best] = await this.search(text, 1);
    return best ?? null;
  }

  asRetriever(options: { k?: number } = {}): ContextRetriever {
    const k = options.k ?? DEFAULT_RETRIEVER_K;

    return {
      retrieve: (topic: string) => this.streamPassages(topic, k)
    };
  }

  private async *streamPassages(topic: string, k: number): AsyncGenerator<Passage> {
    for (const match of await this.search(topic, k)) {
      yield { content: match.chunk.content, source: match.chunk.source, score: match.score };
    }
  }
}
