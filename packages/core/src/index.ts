export * from './domain/errors';
export * from './domain/models';
export * from './domain/navigator';
export * from './domain/parser';
export * from './domain/request';
export * from './domain/uniqueness';
export * from './app/assemble';
export * from './app/QuizGenerator';
export * from './ports/ContextRetriever';
export * from './ports/EmbeddingProvider';
export * from './ports/RateLimiter';
export * from './ports/Synthesizer';
