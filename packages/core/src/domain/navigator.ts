import type { Question, QuestionBank } from './models';

export type Direction = -1 | 1;

export interface AnswerCheck {
  correct: boolean;
  correctLabel: string;
  explanation: string;
}

export function getQuestionAt(bank: QuestionBank, index: number): Question {
  if (!Number.isInteger(index) || index < 0 || index >= bank.length) {
    throw new RangeError(`Question index ${index} is outside 0..${bank.length - 1}`);
  }

  return bank[index];
}

export function advanceIndex(index: number, direction: Direction, bankSize: number): number {
  if (bankSize <= 0) {
    return 0;
  }

  return Math.min(Math.max(index + direction, 0), bankSize - 1);
}

export function checkAnswer(question: Question, label: string): AnswerCheck {
  return {
    correct: label.trim().toUpperCase() === question.correctLabel.trim().toUpperCase(),
    correctLabel: question.correctLabel,
    explanation: question.explanation
  };
}

/**
 * Read-only cursor over a finished bank. Holds its own index so the bank
 * itself is never mutated by the consumer.
 */
export class QuizNavigator {
  private position = 0;

  constructor(private readonly bank: QuestionBank) {}

  get index(): number {
    return this.position;
  }

  get size(): number {
    return this.bank.length;
  }

  current(): Question {
    return getQuestionAt(this.bank, this.position);
  }

  next(): Question {
    this.position = advanceIndex(this.position, 1, this.bank.length);
    return this.current();
  }

  previous(): Question {
    this.position = advanceIndex(this.position, -1, this.bank.length);
    return this.current();
  }

  answer(label: string): AnswerCheck {
    return checkAnswer(this.current(), label);
  }
}
