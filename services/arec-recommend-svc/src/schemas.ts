import type { FastifySchema } from 'fastify';

const recommendInputProperties = {
  query: { type: 'string', maxLength: 20000 },
  max_results: { type: 'integer', minimum: 1 }
} as const;

const recommendationItemSchema = {
  type: 'object',
  required: ['id', 'name', 'score', 'similarity', 'match_reasons'],
  properties: {
    id: { type: 'string' },
    name: { type: 'string' },
    url: { type: ['string', 'null'] },
    description: { type: 'string' },
    duration: { type: ['string', 'null'] },
    duration_minutes: { type: ['integer', 'null'] },
    test_type: { type: 'array', items: { type: 'string' } },
    categories: { type: 'array', items: { type: 'string' } },
    remote_testing: { type: 'string' },
    adaptive_support: { type: 'string' },
    score: { type: 'number' },
    similarity: { type: 'number' },
    match_reasons: { type: 'array', items: { type: 'string' } }
  }
} as const;

const recommendResponseSchema = {
  200: {
    type: 'object',
    required: ['query', 'constraints', 'recommendations', 'total', 'timings'],
    properties: {
      query: { type: 'string' },
      constraints: {
        type: 'object',
        properties: {
          max_duration_minutes: { type: ['integer', 'null'] },
          requested_categories: { type: 'array', items: { type: 'string' } },
          max_results: { type: 'integer' },
          source: { type: 'string', enum: ['llm', 'rules', 'fallback'] }
        }
      },
      recommendations: { type: 'array', items: recommendationItemSchema },
      total: { type: 'integer' },
      timings: {
        type: 'object',
        properties: {
          totalMs: { type: 'number' },
          extractionMs: { type: 'number' },
          embeddingMs: { type: 'number' },
          retrievalMs: { type: 'number' },
          rankingMs: { type: 'number' }
        }
      }
    }
  }
} as const;

export const recommendQuerySchema: FastifySchema = {
  querystring: {
    type: 'object',
    required: ['query'],
    additionalProperties: false,
    properties: recommendInputProperties
  },
  response: recommendResponseSchema
};

export const recommendBodySchema: FastifySchema = {
  body: {
    type: 'object',
    required: ['query'],
    additionalProperties: false,
    properties: recommendInputProperties
  },
  response: recommendResponseSchema
};
