export * from './CappedSynthesizer';
export * from './FixedWindowRateLimiter';
export * from './OpenAiEmbeddingProvider';
export * from './OpenAiMockSynthesizer';
export * from './OpenAiSynthesizer';
export * from './prompt';
export * from './schema';
