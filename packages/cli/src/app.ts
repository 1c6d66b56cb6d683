import type { Logger } from '@aws-lambda-powertools/logger';
import {
  CappedSynthesizer,
  FixedWindowRateLimiter,
  OpenAiEmbeddingProvider,
  OpenAiMockSynthesizer,
  OpenAiSynthesizer,
  type DiagnosableSynthesizer
} from '@doc-quiz/ai-openai';
import type { EmbeddingProvider, SynthesisInput, Synthesizer } from '@doc-quiz/core';
import { CharacterTextSplitter, HashingEmbeddingProvider } from '@doc-quiz/retrieval';
import type { AppConfig } from './env';
import { serializeError } from './logger';

export interface AppContext {
  synthesizer: Synthesizer;
  embedder: EmbeddingProvider;
  splitter: CharacterTextSplitter;
}

export type Bootstrap = (config: AppConfig, logger: Logger) => AppContext;

export class InstrumentedSynthesizer implements Synthesizer {
  constructor(
    private readonly inner: DiagnosableSynthesizer,
    private readonly logger: Logger
  ) {}

  async synthesize(input: SynthesisInput): Promise<string> {
    this.logger.debug('Requesting candidate question', {
      topic: input.topic,
      slot: input.metadata?.slot,
      attempt: input.metadata?.attempt
    });

    try {
      const raw = await this.inner.synthesize(input);
      if (this.inner.wasLastCallMock?.()) {
        this.logger.warn('OpenAI budget cap reached; using mock question.');
      }
      const responseId = this.inner.getLastResponseId?.();
      if (responseId) {
        this.logger.debug('OpenAI question generated', { openaiResponseId: responseId });
      }
      return raw;
    } catch (error) {
      this.logger.debug('Synthesizer call failed', { error: serializeError(error) });
      throw error;
    }
  }
}

export const bootstrap: Bootstrap = (config, logger) => {
  const splitter = new CharacterTextSplitter(config.chunking);
  const mockSynthesizer = new OpenAiMockSynthesizer({ seed: config.openAiMockSeed });

  if (config.mockOpenAi) {
    logger.warn('MOCK_OPENAI enabled; OpenAI API calls are disabled.');
    return {
      synthesizer: new InstrumentedSynthesizer(mockSynthesizer, logger),
      embedder: new HashingEmbeddingProvider(),
      splitter
    };
  }

  const realSynthesizer = new OpenAiSynthesizer({
    apiKey: config.openAi.apiKey,
    defaultModel: config.openAi.model
  });
  const capped = new CappedSynthesizer(
    realSynthesizer,
    mockSynthesizer,
    new FixedWindowRateLimiter(),
    config.maxOpenAiCallsPerHour
  );

  return {
    synthesizer: new InstrumentedSynthesizer(capped, logger),
    embedder: new OpenAiEmbeddingProvider({
      apiKey: config.openAi.apiKey,
      model: config.openAi.embeddingModel
    }),
    splitter
  };
};
