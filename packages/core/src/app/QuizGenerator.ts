import { createGenerationRequest } from '../domain/request';
import type { GenerationRequest } from '../domain/models';
import type { ContextRetriever } from '../ports/ContextRetriever';
import type { Synthesizer } from '../ports/Synthesizer';
import { assemble } from './assemble';
import type { AssemblyLogger, AssemblyResult } from './assemble';

export interface QuizGeneratorOptions {
  topic?: string | null;
  numQuestions?: number;
  retriever: ContextRetriever;
  synthesizer: Synthesizer;
  maxRetriesPerSlot?: number;
  logger?: AssemblyLogger;
}

export class QuizGenerator {
  readonly request: GenerationRequest;
  private readonly retriever: ContextRetriever;
  private readonly synthesizer: Synthesizer;
  private readonly maxRetriesPerSlot?: number;
  private readonly logger?: AssemblyLogger;

  constructor(options: QuizGeneratorOptions) {
    this.request = createGenerationRequest({
      topic: options.topic,
      numQuestions: options.numQuestions
    });
    this.retriever = options.retriever;
    this.synthesizer = options.synthesizer;
    this.maxRetriesPerSlot = options.maxRetriesPerSlot;
    this.logger = options.logger;
  }

  generateQuiz(options: { signal?: AbortSignal } = {}): Promise<AssemblyResult> {
    const { topic } = this.request;

    return assemble(
      this.request,
      cycle =>
        this.synthesizer.synthesize({
          topic,
          context: this.retriever.retrieve(topic),
          metadata: cycle
        }),
      {
        maxRetriesPerSlot: this.maxRetriesPerSlot,
        signal: options.signal,
        logger: this.logger
      }
    );
  }
}
