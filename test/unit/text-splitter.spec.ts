import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '@doc-quiz/core';
import { CharacterTextSplitter } from '@doc-quiz/retrieval';

describe('CharacterTextSplitter', () => {
  it('merges pieces up to the chunk size and carries overlap', () => {
    const splitter = new CharacterTextSplitter({ chunkSize: 7, chunkOverlap: 3 });

    expect(splitter.splitText('aaa\nbbb\nccc\nddd')).toEqual(['aaa\nbbb', 'bbb\nccc', 'ccc\nddd']);
  });

  it('keeps a single chunk when everything fits', () => {
    const splitter = new CharacterTextSplitter();

    expect(splitter.splitText('line one\n\nline two\n')).toEqual(['line one\nline two']);
  });

  it('emits an oversized piece as its own chunk', () => {
    const splitter = new CharacterTextSplitter({ chunkSize: 5, chunkOverlap: 0 });

    expect(splitter.splitText('abcdefghij\nxy')).toEqual(['abcdefghij', 'xy']);
  });

  it('returns nothing for blank text', () => {
    expect(new CharacterTextSplitter().splitText(' \n \n')).toEqual([]);
  });

  it('tags chunks with their source document', () => {
    const splitter = new CharacterTextSplitter({ chunkSize: 3, chunkOverlap: 0 });

    expect(
      splitter.splitDocuments([
        { source: 'a.md', content: 'one\ntwo' },
        { source: 'b.md', content: 'six' }
      ])
    ).toEqual([
      { source: 'a.md', content: 'one' },
      { source: 'a.md', content: 'two' },
      { source: 'b.md', content: 'six' }
    ]);
  });

  it('rejects an overlap larger than the chunk size', () => {
    expect(() => new CharacterTextSplitter({ chunkSize: 10, chunkOverlap: 20 })).toThrow(
      ConfigurationError
    );
  });
});
