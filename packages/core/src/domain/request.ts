import { z } from 'zod';
import { ConfigurationError } from './errors';
import { DEFAULT_TOPIC, MAX_QUESTIONS } from './models';
import type { GenerationRequest } from './models';

export const GenerationRequestInputSchema = z.object({
  topic: z.string().nullish(),
  numQuestions: z
    .number()
    .int('Number of questions must be a whole number.')
    .min(1, 'Number of questions must be at least 1.')
    .max(MAX_QUESTIONS, `Number of questions cannot exceed ${MAX_QUESTIONS}.`)
    .default(1)
});

export type GenerationRequestInput = z.input<typeof GenerationRequestInputSchema>;

export function createGenerationRequest(input: GenerationRequestInput = {}): GenerationRequest {
  const parsed = GenerationRequestInputSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => issue.message);
    throw new ConfigurationError(issues[0] ?? 'Invalid generation request', issues);
  }

  const rawTopic = parsed.data.topic ?? '';
  const topic = rawTopic.trim() ? rawTopic : DEFAULT_TOPIC;

  return Object.freeze({ topic, targetCount: parsed.data.numQuestions });
}
