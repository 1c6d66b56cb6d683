import { createInterface } from 'node:readline';
import { ConfigurationError, QuizGenerator, createGenerationRequest } from '@doc-quiz/core';
import type { GenerationRequest } from '@doc-quiz/core';
import { DocumentCollection, loadDocuments } from '@doc-quiz/retrieval';
import { bootstrap as defaultBootstrap } from './app';
import type { Bootstrap } from './app';
import { USAGE, UsageError, parseArgs } from './args';
import type { CliArgs } from './args';
import { loadConfig } from './env';
import type { AppConfig } from './env';
import { createLogger, serializeError, toAssemblyLogger } from './logger';
import { playQuiz } from './play';
import { formatQuiz, formatShortfall, toJsonOutput } from './render';

export interface CliIo {
  env: NodeJS.ProcessEnv;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  lines: () => AsyncIterable<string>;
  signal?: AbortSignal;
  bootstrap?: Bootstrap;
}

export function processIo(): CliIo {
  return {
    env: process.env,
    stdout: text => process.stdout.write(`${text}\n`),
    stderr: text => process.stderr.write(`${text}\n`),
    lines: () => createInterface({ input: process.stdin, terminal: false })
  };
}

/** Runs the CLI and resolves to the process exit code. */
export async function main(argv: string[], io: CliIo = processIo()): Promise<number> {
  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      io.stderr(`${error.message}\n\n${USAGE}`);
      return 2;
    }
    throw error;
  }

  if (args.help) {
    io.stdout(USAGE);
    return 0;
  }

  let config: AppConfig;
  let request: GenerationRequest;
  try {
    config = loadConfig(io.env);
    request = createGenerationRequest({ topic: args.topic, numQuestions: args.numQuestions });
  } catch (error) {
    if (error instanceof ConfigurationError) {
      io.stderr(`Configuration error: ${error.message}`);
      return 1;
    }
    throw error;
  }

  const logger = createLogger(config);

  try {
    const app = (io.bootstrap ?? defaultBootstrap)(config, logger);

    const documents = await loadDocuments(args.paths);
    logger.info('Loaded documents', { count: documents.length });

    const collection = await DocumentCollection.create(documents, app.embedder, app.splitter);
    logger.info('Created document collection', {
      chunks: collection.size,
      embeddingModel: app.embedder.getModelName()
    });

    const generator = new QuizGenerator({
      topic: request.topic,
      numQuestions: request.targetCount,
      retriever: collection.asRetriever({ k: config.retrieverK }),
      synthesizer: app.synthesizer,
      maxRetriesPerSlot: config.maxRetriesPerSlot,
      logger: toAssemblyLogger(logger)
    });
    const result = await generator.generateQuiz({ signal: io.signal });
    logger.info('Quiz generated', {
      topic: request.topic,
      accepted: result.bank.length,
      requested: result.requested,
      calls: result.calls
    });

    const notice = formatShortfall(result);
    if (notice) {
      io.stderr(notice);
    }

    if (args.format === 'json') {
      io.stdout(toJsonOutput(request.topic, result));
    } else if (args.interactive) {
      await playQuiz(result.bank, io.lines(), io.stdout);
    } else if (result.bank.length > 0) {
      io.stdout(formatQuiz(result.bank));
    }

    return result.bank.length > 0 ? 0 : 1;
  } catch (error) {
    logger.error('Quiz generation failed', { error: serializeError(error) });
    io.stderr(`Error: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }
}
