import OpenAI from 'openai';
import type {
  Response,
  ResponseCreateParamsNonStreaming,
  ResponseFormatTextJSONSchemaConfig
} from 'openai/resources/responses/responses';
import { GeneratorUnavailableError } from '@doc-quiz/core';
import type { SynthesisInput, Synthesizer } from '@doc-quiz/core';
import { QuestionSchema } from './schema';
import { buildInstructions, collectContext } from './prompt';

export interface OpenAiSynthesizerConfig {
  client?: OpenAI;
  apiKey?: string;
  defaultModel?: string;
  temperature?: number;
  maxOutputTokens?: number;
}

export class OpenAiSynthesizer implements Synthesizer {
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly temperature: number;
  private readonly maxOutputTokens: number;
  private lastResponseId?: string;

  constructor(config: OpenAiSynthesizerConfig = {}) {
    const apiKey = config.client ? undefined : config.apiKey ?? process.env.OPENAI_API_KEY;

    if (!config.client && !apiKey) {
      throw new GeneratorUnavailableError('OPENAI_API_KEY is required to instantiate OpenAiSynthesizer');
    }

    this.client = config.client ?? new OpenAI({ apiKey });
    this.model = config.defaultModel ?? process.env.OPENAI_MODEL ?? 'gpt-4o-mini';
    // Above the usual default so repeated calls for the same topic diverge.
    this.temperature = config.temperature ?? 0.8;
    this.maxOutputTokens = config.maxOutputTokens ?? 500;
  }

  async synthesize(input: SynthesisInput): Promise<string> {
    const context = await collectContext(input.context);

    const payload: ResponseCreateParamsNonStreaming = {
      model: this.model,
      temperature: this.temperature,
      max_output_tokens: this.maxOutputTokens,
      input: [
        { role: 'system', content: buildInstructions(input.topic) },
        {
          role: 'user',
          content: `Context:\n${context || '(no matching passages)'}`
        }
      ],
      text: {
        format: {
          type: 'json_schema',
          name: QuestionSchema.name,
          schema: QuestionSchema.schema,
          strict: QuestionSchema.strict
        } satisfies ResponseFormatTextJSONSchemaConfig
      }
    };

    let response: Response;
    try {
      response = await this.client.responses.create(payload);
    } catch (error) {
      throw this.classifyError(error);
    }

    this.lastResponseId = response.id;
    return this.extractText(response);
  }

  getLastResponseId(): string | undefined {
    return this.lastResponseId;
  }

  private extractText(response: Response): string {
    if (response.output_text) {
      return response.output_text;
    }

    for (const item of response.output ?? []) {
      if (item.type !== 'message') {
        continue;
      }
      for (const piece of item.content) {
        if (piece.type === 'output_text' && piece.text) {
          return piece.text;
        }
      }
    }

    throw new Error('OpenAI response missing structured content');
  }

  private classifyError(error: unknown): unknown {
    if (
      error instanceof OpenAI.AuthenticationError ||
      error instanceof OpenAI.PermissionDeniedError ||
      error instanceof OpenAI.NotFoundError
    ) {
      return new GeneratorUnavailableError(`OpenAI rejected the request: ${error.message}`, {
        cause: error
      });
    }

    if (error instanceof OpenAI.APIConnectionError && !(error instanceof OpenAI.APIConnectionTimeoutError)) {
      return new GeneratorUnavailableError(`OpenAI could not be reached: ${error.message}`, {
        cause: error
      });
    }

    return error;
  }
}
