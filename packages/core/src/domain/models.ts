import { z } from 'zod';

export const MAX_QUESTIONS = 10;
export const CHOICE_COUNT = 4;
export const DEFAULT_TOPIC = 'General Knowledge';
export const DEFAULT_MAX_RETRIES_PER_SLOT = 10;

/** Wire shape of a single choice as the synthesizer emits it. */
export const ChoicePayloadSchema = z.object({
  key: z.string(),
  value: z.string()
});

export const QuestionPayloadSchema = z.object({
  question: z.string(),
  choices: z.array(ChoicePayloadSchema).length(CHOICE_COUNT),
  answer: z.string(),
  explanation: z.string()
});

export type QuestionPayload = z.infer<typeof QuestionPayloadSchema>;

export interface Choice {
  label: string;
  text: string;
}

export interface Question {
  prompt: string;
  choices: Choice[];
  correctLabel: string;
  explanation: string;
}

export type QuestionBank = readonly Question[];

export interface GenerationRequest {
  readonly topic: string;
  readonly targetCount: number;
}

export function isWellFormed(question: Question): boolean {
  if (!question.prompt || question.choices.length === 0) {
    return false;
  }

  return question.choices.some(choice => choice.label === question.correctLabel);
}

export function toQuestionPayload(question: Question): QuestionPayload {
  return {
    question: question.prompt,
    choices: question.choices.map(choice => ({ key: choice.label, value: choice.text })),
    answer: question.correctLabel,
    explanation: question.explanation
  };
}
