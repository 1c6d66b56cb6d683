import type { Passage } from '@doc-quiz/core';

export const MAX_CONTEXT_CHARS = 6000;

export function buildInstructions(topic: string): string {
  return [
    `You are a subject matter expert on the topic: ${topic}.`,
    'Write exactly one multiple-choice quiz question grounded in the supplied context.',
    'Put the question under "question".',
    'Provide four answers under "choices" as objects with "key" (A, B, C, D) and "value".',
    'Put the key of the single correct choice under "answer".',
    'Explain why that answer is correct under "explanation".',
    'Return JSON only that conforms to the provided schema.'
  ].join(' ');
}

/**
 * Joins passages into one context block, stopping before `maxChars` so a
 * large retrieval never blows the prompt.
 */
export async function collectContext(
  context: AsyncIterable<Passage>,
  maxChars = MAX_CONTEXT_CHARS
): Promise<string> {
  const parts: string[] = [];
  let length = 0;

  for await (const passage of context) {
    const content = passage.content.trim();
    if (!content) {
      continue;
    }
    if (length + content.length > maxChars && parts.length > 0) {
      break;
    }
    parts.push(content);
    length += content.length;
  }

  return parts.join('\n\n');
}
