import { ConfigurationError, DEFAULT_MAX_RETRIES_PER_SLOT } from '@doc-quiz/core';

export const LOG_LEVELS = ['DEBUG', 'INFO', 'WARN', 'ERROR'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface AppConfig {
  appName: string;
  logLevel: LogLevel;
  mockOpenAi: boolean;
  maxOpenAiCallsPerHour?: number;
  openAiMockSeed: string;
  maxRetriesPerSlot: number;
  retrieverK: number;
  chunking: {
    chunkSize: number;
    chunkOverlap: number;
  };
  openAi: {
    apiKey?: string;
    model: string;
    embeddingModel: string;
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const mockOpenAi = (env.MOCK_OPENAI ?? 'false').toLowerCase() === 'true';
  const apiKey = env.OPENAI_API_KEY || undefined;

  if (!mockOpenAi && !apiKey) {
    throw new ConfigurationError('OPENAI_API_KEY environment variable is required unless MOCK_OPENAI=true');
  }

  return {
    appName: env.APP_NAME ?? 'doc-quiz',
    logLevel: parseLogLevel(env.LOG_LEVEL),
    mockOpenAi,
    maxOpenAiCallsPerHour: parseOptionalInt('MAX_OPENAI_CALLS_PER_HOUR', env.MAX_OPENAI_CALLS_PER_HOUR),
    openAiMockSeed: env.OPENAI_MOCK_SEED ?? 'doc-quiz',
    maxRetriesPerSlot:
      parseOptionalInt('MAX_RETRIES_PER_SLOT', env.MAX_RETRIES_PER_SLOT) ?? DEFAULT_MAX_RETRIES_PER_SLOT,
    retrieverK: parseOptionalInt('RETRIEVER_K', env.RETRIEVER_K) ?? 4,
    chunking: {
      chunkSize: parseOptionalInt('CHUNK_SIZE', env.CHUNK_SIZE) ?? 1000,
      chunkOverlap: parseOptionalInt('CHUNK_OVERLAP', env.CHUNK_OVERLAP) ?? 100
    },
    openAi: {
      apiKey,
      model: env.OPENAI_MODEL ?? 'gpt-4o-mini',
      embeddingModel: env.OPENAI_EMBEDDING_MODEL ?? 'text-embedding-3-small'
    }
  };
}

function parseLogLevel(value: string | undefined): LogLevel {
  if (!value) {
    return 'WARN';
  }

  const upper = value.toUpperCase();
  const match = LOG_LEVELS.find(level => level === upper);
  if (!match) {
    throw new ConfigurationError(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}`);
  }
  return match;
}

function parseOptionalInt(name: string, value: string | undefined): number | undefined {
  if (!value) {
    return undefined;
  }

  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 0 || String(parsed) !== value.trim()) {
    throw new ConfigurationError(`${name} must be a non-negative integer, got "${value}"`);
  }
  return parsed;
}
