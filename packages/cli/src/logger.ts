import { Console } from 'node:console';
import { Logger } from '@aws-lambda-powertools/logger';
import type { AssemblyLogger } from '@doc-quiz/core';
import type { AppConfig } from './env';

/**
 * Structured logger for the CLI. Every record goes to `stream` (stderr by
 * default); stdout is reserved for the quiz itself.
 */
export function createLogger(
  config: Pick<AppConfig, 'appName' | 'logLevel'>,
  stream: NodeJS.WritableStream = process.stderr
): Logger {
  const logger = new Logger({ serviceName: config.appName, logLevel: config.logLevel });
  // Logger takes no output option and prints info and debug through its
  // Console's stdout, so rebind that Console to a single stream.
  Object.defineProperty(logger, 'console', {
    value: new Console({ stdout: stream, stderr: stream }),
    writable: true,
    configurable: true
  });
  return logger;
}

export function toAssemblyLogger(logger: Logger): AssemblyLogger {
  return {
    debug: (message, context) => (context ? logger.debug(message, context) : logger.debug(message)),
    warn: (message, context) => (context ? logger.warn(message, context) : logger.warn(message))
  };
}

export function serializeError(error: unknown): Record<string, unknown> {
  const base: Record<string, unknown> = { message: 'Unknown error' };
  if (error instanceof Error) {
    base.message = error.message;
    base.name = error.name;
    base.stack = error.stack;
    if ('cause' in error && error.cause) {
      base.cause = error.cause instanceof Error ? error.cause.message : error.cause;
    }
  }
  return base;
}
