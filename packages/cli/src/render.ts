import type { AssemblyResult, Question, QuestionBank } from '@doc-quiz/core';
import { toQuestionPayload } from '@doc-quiz/core';

export function formatQuestion(question: Question, index: number): string {
  return [
    `${index + 1}. ${question.prompt}`,
    ...question.choices.map(choice => `   ${choice.label}) ${choice.text}`)
  ].join('\n');
}

export function formatQuiz(bank: QuestionBank): string {
  return bank
    .map((question, index) =>
      [
        formatQuestion(question, index),
        `   Answer: ${question.correctLabel}`,
        `   Explanation: ${question.explanation}`
      ].join('\n')
    )
    .join('\n\n');
}

export function formatShortfall(result: AssemblyResult): string | undefined {
  if (result.cancelled) {
    return `Generation was cancelled after ${result.bank.length} of ${result.requested} questions.`;
  }
  if (result.shortfall > 0) {
    return `Only ${result.bank.length} of ${result.requested} questions could be generated.`;
  }
  return undefined;
}

export function toJsonOutput(topic: string, result: AssemblyResult): string {
  return JSON.stringify(
    {
      topic,
      requested: result.requested,
      shortfall: result.shortfall,
      questions: result.bank.map(toQuestionPayload)
    },
    null,
    2
  );
}
