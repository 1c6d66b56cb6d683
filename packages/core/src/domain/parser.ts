import { QuestionPayloadSchema } from './models';
import type { Question } from './models';

export type ParseError =
  | { kind: 'malformed'; message: string }
  | { kind: 'invalid_shape'; issues: string[] }
  | { kind: 'inconsistent'; message: string };

export type ParseResult = { ok: true; question: Question } | { ok: false; error: ParseError };

const FENCED_BLOCK = /^```(?:json)?\s*\n?([\s\S]*?)\n?```$/i;

export function parseQuestion(raw: string): ParseResult {
  let decoded: unknown;
  try {
    decoded = JSON.parse(unwrapFence(raw));
  } catch (error) {
    return {
      ok: false,
      error: {
        kind: 'malformed',
        message: error instanceof Error ? error.message : 'Invalid JSON'
      }
    };
  }

  if (typeof decoded !== 'object' || decoded === null || Array.isArray(decoded)) {
    return { ok: false, error: { kind: 'malformed', message: 'Expected a JSON object' } };
  }

  const parsed = QuestionPayloadSchema.safeParse(decoded);
  if (!parsed.success) {
    return {
      ok: false,
      error: {
        kind: 'invalid_shape',
        issues: parsed.error.issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      }
    };
  }

  const payload = parsed.data;
  const question: Question = {
    prompt: payload.question,
    choices: payload.choices.map(choice => ({ label: choice.key, text: choice.value })),
    correctLabel: payload.answer,
    explanation: payload.explanation
  };

  const inconsistency = findInconsistency(question);
  if (inconsistency) {
    return { ok: false, error: { kind: 'inconsistent', message: inconsistency } };
  }

  return { ok: true, question };
}

export function describeParseError(error: ParseError): string {
  switch (error.kind) {
    case 'malformed':
    case 'inconsistent':
      return error.message;
    case 'invalid_shape':
      return error.issues.join('; ');
  }
}

function unwrapFence(raw: string): string {
  const trimmed = raw.trim();
  const match = FENCED_BLOCK.exec(trimmed);
  return match ? match[1] : trimmed;
}

function findInconsistency(question: Question): string | undefined {
  if (!question.prompt.trim()) {
    return 'Question text is empty';
  }

  const labels = new Set<string>();
  for (const choice of question.choices) {
    if (labels.has(choice.label)) {
      return `Duplicate choice label ${choice.label}`;
    }
    labels.add(choice.label);
  }

  if (!labels.has(question.correctLabel)) {
    return `Answer ${question.correctLabel} does not match any choice`;
  }

  return undefined;
}
