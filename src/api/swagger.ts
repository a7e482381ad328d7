import { ACADEMIC_LEVELS, GENDERS, PLATFORMS, RELATIONSHIP_STATUSES } from '../etl/categories.js';

const pagination = {
  limit: { type: 'integer', default: 100, minimum: 1, maximum: 1000 },
  offset: { type: 'integer', default: 0, minimum: 0 },
};

function studentListOperation(summary: string, required: string[], properties: Record<string, object>) {
  return {
    post: {
      tags: ['Students'],
      summary,
      requestBody: {
        required: true,
        content: {
          'application/json': {
            schema: { type: 'object', required, properties: { ...properties, ...pagination } },
          },
        },
      },
      responses: {
        200: {
          description: 'Successful response',
          content: {
            'application/json': { schema: { $ref: '#/components/schemas/StudentListResponse' } },
          },
        },
        400: { $ref: '#/components/responses/Failure' },
      },
    },
  };
}

export const swaggerSpec = {
  openapi: '3.0.0',
  info: {
    title: 'Student Social Media Survey API',
    version: '1.0.0',
    description: 'Imports the student social media survey into a star schema and queries it',
    license: {
      name: 'MIT',
    },
  },
  servers: [
    {
      url: `http://localhost:${process.env.PORT || 3001}`,
      description: 'Development server',
    },
  ],
  tags: [
    { name: 'Students', description: 'Survey import and queries' },
    { name: 'Prompt', description: 'Template prompts streamed from the chat model' },
  ],
  paths: {
    '/': {
      get: {
        summary: 'Liveness check',
        responses: { 200: { description: '`{ status, message }`' } },
      },
    },
    '/health': {
      get: {
        summary: 'Database health check',
        responses: { 200: { description: 'Healthy' }, 503: { description: 'Database unreachable' } },
      },
    },
    '/students/import': {
      post: {
        tags: ['Students'],
        summary: 'Import the survey CSV',
        description: 'Reuses existing dimension rows and appends every CSV row to the fact table',
        responses: {
          200: {
            description: 'Import summary',
            content: {
              'application/json': { schema: { $ref: '#/components/schemas/ImportSummary' } },
            },
          },
          400: { $ref: '#/components/responses/Failure' },
        },
      },
    },
    '/students/fetch_by_gender_and_level': studentListOperation(
      'Students of one gender and academic level',
      ['gender', 'academic_level'],
      {
        gender: { type: 'string', enum: GENDERS },
        academic_level: { type: 'string', enum: ACADEMIC_LEVELS },
      }
    ),
    '/students/fetch_daily_use_for_country': {
      post: {
        tags: ['Students'],
        summary: 'Average daily usage hours in a country',
        requestBody: {
          required: true,
          content: {
            'application/json': {
              schema: {
                type: 'object',
                required: ['country'],
                properties: { country: { type: 'string' } },
              },
            },
          },
        },
        responses: {
          200: {
            description: '`average` is null when no student matches',
            content: {
              'application/json': {
                schema: {
                  type: 'object',
                  properties: {
                    status: { type: 'string', enum: ['success'] },
                    country: { type: 'string' },
                    average: { type: 'number', nullable: true },
                  },
                },
              },
            },
          },
          400: { $ref: '#/components/responses/Failure' },
        },
      },
    },
    '/students/fetch_conflicts_over_threshold': studentListOperation(
      'Students with more conflicts than the threshold',
      ['threshold'],
      { threshold: { type: 'integer' } }
    ),
    '/students/fetch_students_by_affected_flag': studentListOperation(
      'Students by academic performance flag',
      ['is_affected'],
      { is_affected: { type: 'boolean' } }
    ),
    '/students/fetch_student_by_country_and_mental_health_threshold': studentListOperation(
      'Students of a country with an exact mental health score',
      ['country', 'mental_health_score'],
      {
        country: { type: 'string' },
        mental_health_score: { type: 'integer', minimum: 1, maximum: 10 },
      }
    ),
    '/prompt': {
      post: {
        tags: ['Prompt'],
        summary: 'Run a prompt through a template and stream the reply',
        requestBody: {
          required: true,
          content: {
            'application/json': {
              schema: {
                type: 'object',
                required: ['prompt', 'template_name'],
                properties: { prompt: { type: 'string' }, template_name: { type: 'string' } },
              },
            },
          },
        },
        responses: {
          200: { description: 'Model reply', content: { 'text/plain': { schema: { type: 'string' } } } },
          400: { $ref: '#/components/responses/Failure' },
        },
      },
    },
  },
  components: {
    schemas: {
      Student: {
        type: 'object',
        properties: {
          id: { type: 'integer' },
          relationship_status: { type: 'string', enum: RELATIONSHIP_STATUSES },
          age: { type: 'integer' },
          avg_daily_usage_hours: { type: 'integer' },
          affects_academic_performance: { type: 'boolean' },
          sleep_hours_per_night: { type: 'number' },
          mental_health_score: { type: 'integer' },
          conflicts_over_social_media: { type: 'integer' },
          addicted_score: { type: 'integer' },
          gender: { type: 'string', enum: GENDERS },
          academic_level: { type: 'string', enum: ACADEMIC_LEVELS },
          country_name: { type: 'string' },
          platform: { type: 'string', enum: PLATFORMS },
        },
      },
      StudentListResponse: {
        type: 'object',
        properties: {
          status: { type: 'string', enum: ['success'] },
          data: { type: 'array', items: { $ref: '#/components/schemas/Student' } },
          meta: {
            type: 'object',
            properties: {
              count: { type: 'integer' },
              limit: { type: 'integer' },
              offset: { type: 'integer' },
            },
          },
        },
      },
      ImportSummary: {
        type: 'object',
        properties: {
          status: { type: 'string', enum: ['success'] },
          message: { type: 'string' },
          rows_inserted: { type: 'integer' },
          dimensions: {
            type: 'object',
            properties: {
              gender: { type: 'integer' },
              academicLevel: { type: 'integer' },
              country: { type: 'integer' },
              platform: { type: 'integer' },
            },
          },
        },
      },
      Failure: {
        type: 'object',
        properties: {
          status: { type: 'string', enum: ['failure'] },
          error: {
            type: 'object',
            properties: {
              code: { type: 'string' },
              message: { type: 'string' },
              details: {},
            },
          },
        },
      },
    },
    responses: {
      Failure: {
        description: 'Validation, import or query failure',
        content: { 'application/json': { schema: { $ref: '#/components/schemas/Failure' } } },
      },
    },
  },
};
