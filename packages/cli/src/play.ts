import { QuizNavigator } from '@doc-quiz/core';
import type { QuestionBank } from '@doc-quiz/core';
import { formatQuestion } from './render';

export interface PlaySummary {
  answered: number;
  correct: number;
}

const PROMPT = 'Answer with a choice label, n (next), p (previous) or q (quit).';

/**
 * Terminal quiz loop. Reads one command per line; each question counts once,
 * on its first answer.
 */
export async function playQuiz(
  bank: QuestionBank,
  lines: AsyncIterable<string>,
  write: (text: string) => void
): Promise<PlaySummary> {
  if (bank.length === 0) {
    write('No questions to play.');
    return { answered: 0, correct: 0 };
  }

  const navigator = new QuizNavigator(bank);
  const results = new Map<number, boolean>();
  const show = () => write(`${formatQuestion(navigator.current(), navigator.index)}\n${PROMPT}`);

  show();
  for await (const line of lines) {
    const command = line.trim();
    const lower = command.toLowerCase();

    if (lower === 'q') {
      break;
    }
    if (lower === 'n' || lower === 'p') {
      if (lower === 'n') {
        navigator.next();
      } else {
        navigator.previous();
      }
      show();
      continue;
    }

    const labels = navigator.current().choices.map(choice => choice.label.toUpperCase());
    if (!labels.includes(command.toUpperCase())) {
      write(PROMPT);
      continue;
    }

    const check = navigator.answer(command);
    if (!results.has(navigator.index)) {
      results.set(navigator.index, check.correct);
    }
    write(check.correct ? 'Correct!' : `Incorrect! The answer is ${check.correctLabel}.`);
    write(`Explanation: ${check.explanation}`);
  }

  const summary = {
    answered: results.size,
    correct: [...results.values()].filter(Boolean).length
  };
  write(`Score: ${summary.correct}/${bank.length}`);
  return summary;
}
