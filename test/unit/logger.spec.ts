import { Writable } from 'node:stream';
import { describe, expect, it } from 'vitest';
import { createLogger, serializeError, toAssemblyLogger } from '@doc-quiz/cli';

const captureStream = () => {
  const lines: string[] = [];
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      lines.push(String(chunk));
      callback();
    }
  });
  return { lines, stream };
};

describe('createLogger', () => {
  it('writes records at every level to the given stream', () => {
    const { lines, stream } = captureStream();
    const logger = createLogger({ appName: 'doc-quiz-test', logLevel: 'INFO' }, stream);

    logger.info('Loaded documents', { count: 2 });
    logger.debug('Below the threshold');
    toAssemblyLogger(logger).warn('Slot exhausted without a unique question', { slot: 1 });

    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[0])).toMatchObject({
      level: 'INFO',
      message: 'Loaded documents',
      service: 'doc-quiz-test',
      count: 2
    });
    expect(JSON.parse(lines[1])).toMatchObject({
      level: 'WARN',
      message: 'Slot exhausted without a unique question',
      slot: 1
    });
  });
});

describe('serializeError', () => {
  it('keeps the message, name and cause', () => {
    const error = new Error('outer', { cause: new Error('inner') });

    expect(serializeError(error)).toMatchObject({ message: 'outer', name: 'Error', cause: 'inner' });
  });

  it('describes non-errors generically', () => {
    expect(serializeError('boom')).toEqual({ message: 'Unknown error' });
  });
});
