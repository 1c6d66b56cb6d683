import type { RateLimiter, SynthesisInput, Synthesizer } from '@doc-quiz/core';

/** Optional introspection a synthesizer may expose for logging. */
export interface SynthesisDiagnostics {
  getLastResponseId(): string | undefined;
  wasLastCallMock(): boolean;
}

export type DiagnosableSynthesizer = Synthesizer & Partial<SynthesisDiagnostics>;

export class CappedSynthesizer implements Synthesizer, SynthesisDiagnostics {
  private lastCallState: 'real' | 'mock_limit' | undefined;

  constructor(
    private readonly realSynthesizer: DiagnosableSynthesizer,
    private readonly mockSynthesizer: Synthesizer,
    private readonly limiter: RateLimiter,
    private readonly maxPerHour?: number
  ) {}

  async synthesize(input: SynthesisInput): Promise<string> {
    if (!this.maxPerHour || this.maxPerHour <= 0) {
      this.lastCallState = 'real';
      return this.realSynthesizer.synthesize(input);
    }

    const allowed = await this.limiter.tryConsume({
      budget: 'openai',
      windowSeconds: 3600,
      limit: this.maxPerHour
    });

    if (allowed) {
      this.lastCallState = 'real';
      return this.realSynthesizer.synthesize(input);
    }

    this.lastCallState = 'mock_limit';
    return this.mockSynthesizer.synthesize(input);
  }

  getLastResponseId(): string | undefined {
    if (this.lastCallState !== 'real') {
      return undefined;
    }
    return this.realSynthesizer.getLastResponseId?.();
  }

  wasLastCallMock(): boolean {
    return this.lastCallState === 'mock_limit';
  }
}
