import { ConfigurationError } from '@doc-quiz/core';
import type { SourceDocument } from './DocumentLoader';

export interface TextSplitterOptions {
  separator?: string;
  chunkSize?: number;
  chunkOverlap?: number;
}

export interface Chunk {
  source: string;
  content: string;
}

/**
 * Splits on a single separator, then greedily merges the pieces back into
 * chunks of at most `chunkSize` characters. Consecutive chunks share up to
 * `chunkOverlap` characters of trailing pieces. A single piece longer than
 * `chunkSize` becomes its own oversized chunk.
 */
export class CharacterTextSplitter {
  readonly separator: string;
  readonly chunkSize: number;
  readonly chunkOverlap: number;

  constructor(options: TextSplitterOptions = {}) {
    this.separator = options.separator ?? '\n';
    this.chunkSize = options.chunkSize ?? 1000;
    this.chunkOverlap = options.chunkOverlap ?? 100;

    if (this.chunkSize <= 0) {
      throw new ConfigurationError('Chunk size must be positive.');
    }
    if (this.chunkOverlap < 0 || this.chunkOverlap > this.chunkSize) {
      throw new ConfigurationError(
        `Chunk overlap (${this.chunkOverlap}) must be between 0 and chunk size (${this.chunkSize}).`
      );
    }
  }

  splitText(text: string): string[] {
    const pieces = this.separator ? text.split(this.separator) : [...text];
    return this.mergePieces(pieces.filter(piece => piece !== ''));
  }

  splitDocuments(documents: SourceDocument[]): Chunk[] {
    return documents.flatMap(document =>
      this.splitText(document.content).map(content => ({ source: document.source, content }))
    );
  }

  private mergePieces(pieces: string[]): string[] {
    const separatorLength = this.separator.length;
    const chunks: string[] = [];
    let current: string[] = [];
    let total = 0;

    const joinedLength = (extra: number) =>
      total + extra + (current.length > 0 ? separatorLength : 0);

    for (const piece of pieces) {
      if (joinedLength(piece.length) > this.chunkSize && current.length > 0) {
        this.pushChunk(chunks, current);

        while (total > this.chunkOverlap || (joinedLength(piece.length) > this.chunkSize && total > 0)) {
          total -= current[0].length + (current.length > 1 ? separatorLength : 0);
          current = current.slice(1);
        }
      }

      current.push(piece);
      total += piece.length + (current.length > 1 ? separatorLength : 0);
    }

    this.pushChunk(chunks, current);
    return chunks;
  }

  private pushChunk(chunks: string[], pieces: string[]): void {
    const chunk = pieces.join(this.separator).trim();
    if (chunk) {
      chunks.push(chunk);
    }
  }
}
