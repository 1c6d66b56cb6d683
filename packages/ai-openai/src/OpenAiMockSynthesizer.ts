import { createHash } from 'node:crypto';
import type { Passage, QuestionPayload, SynthesisInput, Synthesizer } from '@doc-quiz/core';

const LABELS = ['A', 'B', 'C', 'D'] as const;

export interface OpenAiMockSynthesizerOptions {
  seed?: string;
}

export class OpenAiMockSynthesizer implements Synthesizer {
  private readonly seed: string;

  constructor(options: OpenAiMockSynthesizerOptions = {}) {
    this.seed = options.seed ?? 'doc-quiz';
  }

  async synthesize(input: SynthesisInput): Promise<string> {
    const passage = await firstPassage(input.context);
    const key = buildKey(input, this.seed);
    const hash = createHash('sha256').update(key).digest('hex');
    const answer = LABELS[parseInt(hash.slice(0, 2), 16) % LABELS.length];
    const excerpt = passage ? summarize(passage.content) : input.topic;

    const payload: QuestionPayload = {
      question: `[MOCK ${hash.slice(0, 8)}] Which statement about ${input.topic} matches the source?`,
      choices: LABELS.map(label => ({
        key: label,
        value: label === answer ? excerpt : `Mock distractor ${label}`
      })),
      answer,
      explanation: passage?.source
        ? `Mocked from ${passage.source}.`
        : 'Mocked due to budget cap or MOCK_OPENAI.'
    };

    return JSON.stringify(payload);
  }
}

function buildKey(input: SynthesisInput, seed: string): string {
  const slot = input.metadata?.slot;
  const attempt = input.metadata?.attempt;

  if (slot !== undefined && attempt !== undefined) {
    return `${input.topic}:${slot}:${attempt}:${seed}`;
  }

  return `${input.topic || 'general'}:${seed}`;
}

async function firstPassage(context: AsyncIterable<Passage>): Promise<Passage | undefined> {
  for await (const passage of context) {
    if (passage.content.trim()) {
      return passage;
    }
  }
  return undefined;
}

function summarize(content: string): string {
  const singleLine = content.replace(/\s+/g, ' ').trim();
  return singleLine.length > 80 ? `${singleLine.slice(0, 77)}...` : singleLine;
}
