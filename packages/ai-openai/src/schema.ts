export const QuestionSchema = {
  name: 'quiz_question',
  strict: true,
  type: 'json_schema' as const,
  schema: {
    type: 'object',
    additionalProperties: false,
    properties: {
      question: { type: 'string' },
      choices: {
        type: 'array',
        items: {
          type: 'object',
          additionalProperties: false,
          properties: {
            key: { type: 'string', enum: ['A', 'B', 'C', 'D'] },
            value: { type: 'string' }
          },
          required: ['key', 'value']
        }
      },
      answer: { type: 'string', enum: ['A', 'B', 'C', 'D'] },
      explanation: { type: 'string' }
    },
    required: ['question', 'choices', 'answer', 'explanation']
  }
} as const;
