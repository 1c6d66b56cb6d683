import { describe, expect, it } from 'vitest';
import { isUnique, validateCandidate, type Question } from '@doc-quiz/core';

const question = (prompt: string, correctLabel = 'A'): Question => ({
  prompt,
  choices: [
    { label: 'A', text: 'Yes' },
    { label: 'B', text: 'No' }
  ],
  correctLabel,
  explanation: ''
});

describe('isUnique', () => {
  const bank = [question('What is ATP?'), question('Where is chlorophyll found?')];

  it('accepts a prompt that is not in the bank', () => {
    expect(isUnique(question('What do ribosomes do?'), bank)).toBe(true);
  });

  it('rejects an exact duplicate', () => {
    expect(isUnique(question('What is ATP?'), bank)).toBe(false);
  });

  it('compares case-sensitively and without trimming', () => {
    expect(isUnique(question('what is ATP?'), bank)).toBe(true);
    expect(isUnique(question('What is ATP? '), bank)).toBe(true);
  });

  it('rejects an empty prompt even against an empty bank', () => {
    expect(isUnique(question(''), [])).toBe(false);
  });

  it('leaves the bank untouched', () => {
    const snapshot = [...bank];
    isUnique(question('New'), bank);
    expect(bank).toEqual(snapshot);
  });
});

describe('validateCandidate', () => {
  it('flags an answer outside the choices as malformed', () => {
    expect(validateCandidate(question('Q', 'Z'), [])).toBe('malformed');
  });

  it('distinguishes duplicates from accepted candidates', () => {
    expect(validateCandidate(question('Q'), [question('Q')])).toBe('duplicate');
    expect(validateCandidate(question('Q'), [])).toBe('accepted');
  });
});
