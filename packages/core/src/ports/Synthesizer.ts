import type { Passage } from './ContextRetriever';

export interface SynthesisInput {
  topic: string;
  context: AsyncIterable<Passage>;
  metadata?: {
    slot?: number;
    attempt?: number;
  };
}

/**
 * Produces one candidate question as raw text. Implementations throw
 * GeneratorUnavailableError when the backing model cannot be used at all;
 * any other failure is treated as a single failed attempt.
 */
export interface Synthesizer {
  synthesize(input: SynthesisInput): Promise<string>;
}
