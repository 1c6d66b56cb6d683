import { describe, expect, it } from 'vitest';
import {
  advanceIndex,
  checkAnswer,
  getQuestionAt,
  QuizNavigator,
  type Question
} from '@doc-quiz/core';

const question = (prompt: string): Question => ({
  prompt,
  choices: [
    { label: 'A', text: 'First' },
    { label: 'B', text: 'Second' }
  ],
  correctLabel: 'B',
  explanation: `Because of ${prompt}`
});

const bank = [question('One'), question('Two'), question('Three')];

describe('getQuestionAt', () => {
  it('returns the question at the index', () => {
    expect(getQuestionAt(bank, 1).prompt).toBe('Two');
  });

  it('throws outside the bank', () => {
    expect(() => getQuestionAt(bank, 3)).toThrow(RangeError);
    expect(() => getQuestionAt(bank, -1)).toThrow('Question index -1 is outside 0..2');
  });
});

describe('advanceIndex', () => {
  it('moves in the requested direction', () => {
    expect(advanceIndex(0, 1, 3)).toBe(1);
    expect(advanceIndex(2, -1, 3)).toBe(1);
  });

  it('clamps at both ends', () => {
    expect(advanceIndex(2, 1, 3)).toBe(2);
    expect(advanceIndex(0, -1, 3)).toBe(0);
  });

  it('stays at zero for an empty bank', () => {
    expect(advanceIndex(0, 1, 0)).toBe(0);
  });
});

describe('checkAnswer', () => {
  it('matches labels ignoring case and whitespace', () => {
    expect(checkAnswer(question('One'), ' b ')).toEqual({
      correct: true,
      correctLabel: 'B',
      explanation: 'Because of One'
    });
    expect(checkAnswer(question('One'), 'A').correct).toBe(false);
  });
});

describe('QuizNavigator', () => {
  it('walks the bank without leaving it', () => {
    const navigator = new QuizNavigator(bank);

    expect(navigator.current().prompt).toBe('One');
    expect(navigator.previous().prompt).toBe('One');
    expect(navigator.next().prompt).toBe('Two');
    expect(navigator.next().prompt).toBe('Three');
    expect(navigator.next().prompt).toBe('Three');
    expect(navigator.index).toBe(2);
    expect(navigator.size).toBe(3);
    expect(navigator.answer('B').correct).toBe(true);
  });
});
