import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import nock from 'nock';
import OpenAI from 'openai';
import { GeneratorUnavailableError } from '@doc-quiz/core';
import { OpenAiSynthesizer } from '@doc-quiz/ai-openai';
import { passages, rawQuestion } from '../fixtures';

const apiBase = 'https://api.openai.com';

const buildSynthesizer = () =>
  new OpenAiSynthesizer({
    client: new OpenAI({ apiKey: 'test-key', maxRetries: 0 }),
    defaultModel: 'gpt-test'
  });

describe('OpenAiSynthesizer', () => {
  const originalKey = process.env.OPENAI_API_KEY;

  beforeEach(() => {
    nock.disableNetConnect();
  });

  afterEach(() => {
    nock.cleanAll();
    nock.enableNetConnect();
    if (originalKey === undefined) {
      delete process.env.OPENAI_API_KEY;
    } else {
      process.env.OPENAI_API_KEY = originalKey;
    }
  });

  it('calls the Responses API with the quiz schema and returns the raw text', async () => {
    const expected = rawQuestion();

    const scope = nock(apiBase)
      .post('/v1/responses', body => {
        expect(body).toMatchObject({
          model: 'gpt-test',
          temperature: 0.8,
          max_output_tokens: 500,
          text: {
            format: {
              type: 'json_schema',
              name: 'quiz_question',
              strict: true
            }
          }
        });
        expect(body.input[0].content).toContain('subject matter expert on the topic: Photosynthesis');
        expect(body.input[1].content).toBe(
          'Context:\nChlorophyll absorbs red light.\n\nWater is split.'
        );
        return true;
      })
      .reply(200, {
        id: 'resp_123',
        output: [
          {
            type: 'message',
            content: [
              {
                type: 'output_text',
                text: expected
              }
            ]
          }
        ]
      });

    const synthesizer = buildSynthesizer();
    const result = await synthesizer.synthesize({
      topic: 'Photosynthesis',
      context: passages('Chlorophyll absorbs red light.', 'Water is split.')
    });

    expect(result).toBe(expected);
    expect(synthesizer.getLastResponseId()).toBe('resp_123');
    expect(scope.isDone()).toBe(true);
  });

  it('treats rejected credentials as an unavailable generator', async () => {
    nock(apiBase)
      .post('/v1/responses')
      .reply(401, { error: { message: 'Incorrect API key provided', type: 'invalid_request_error' } });

    await expect(
      buildSynthesizer().synthesize({ topic: 'Cells', context: passages() })
    ).rejects.toBeInstanceOf(GeneratorUnavailableError);
  });

  it('leaves other API errors to the retry loop', async () => {
    nock(apiBase)
      .post('/v1/responses')
      .reply(400, { error: { message: 'Bad request', type: 'invalid_request_error' } });

    const error = await buildSynthesizer()
      .synthesize({ topic: 'Cells', context: passages() })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(OpenAI.BadRequestError);
    expect(error).not.toBeInstanceOf(GeneratorUnavailableError);
  });

  it('fails to initialize without an API key', () => {
    delete process.env.OPENAI_API_KEY;

    expect(() => new OpenAiSynthesizer()).toThrow(GeneratorUnavailableError);
  });
});
