import { describe, expect, it } from 'vitest';
import { ConfigurationError, createGenerationRequest, DEFAULT_TOPIC } from '@doc-quiz/core';

describe('createGenerationRequest', () => {
  it('defaults to one general knowledge question', () => {
    expect(createGenerationRequest()).toEqual({ topic: DEFAULT_TOPIC, targetCount: 1 });
  });

  it('replaces a blank topic with the default', () => {
    expect(createGenerationRequest({ topic: '  \t', numQuestions: 3 }).topic).toBe('General Knowledge');
    expect(createGenerationRequest({ topic: null }).topic).toBe('General Knowledge');
  });

  it('keeps a provided topic as given', () => {
    expect(createGenerationRequest({ topic: 'Cell biology', numQuestions: 10 })).toEqual({
      topic: 'Cell biology',
      targetCount: 10
    });
  });

  it('rejects more than ten questions', () => {
    expect(() => createGenerationRequest({ numQuestions: 11 })).toThrow(ConfigurationError);
    expect(() => createGenerationRequest({ numQuestions: 11 })).toThrow(
      'Number of questions cannot exceed 10.'
    );
  });

  it('rejects zero and fractional counts', () => {
    expect(() => createGenerationRequest({ numQuestions: 0 })).toThrow(
      'Number of questions must be at least 1.'
    );
    expect(() => createGenerationRequest({ numQuestions: 2.5 })).toThrow(
      'Number of questions must be a whole number.'
    );
  });

  it('returns an immutable request', () => {
    expect(Object.isFrozen(createGenerationRequest({ topic: 'Cells' }))).toBe(true);
  });
});
