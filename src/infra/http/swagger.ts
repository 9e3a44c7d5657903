import swaggerJsdoc from 'swagger-jsdoc';

const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'Postbox API',
      version: '1.0.0',
      description: 'Posts API with bearer-token authentication and owner-only mutations',
    },
    servers: [
      {
        url: 'http://localhost:3000',
        description: 'Development server',
      },
    ],
    components: {
      securitySchemes: {
        bearerAuth: {
          type: 'http',
          scheme: 'bearer',
          bearerFormat: 'JWT',
        },
      },
      schemas: {
        ErrorResponse: {
          type: 'object',
          required: ['code', 'message'],
          properties: {
            code: {
              type: 'string',
              description: 'Error kind',
              example: 'FORBIDDEN',
            },
            message: {
              type: 'string',
              description: 'Human-readable error message',
              example: 'You do not have permission to update this post',
            },
            details: {
              type: 'object',
              description: 'Additional error details (optional)',
              additionalProperties: true,
            },
          },
        },
        UserProfile: {
          type: 'object',
          properties: {
            id: { type: 'string', format: 'uuid' },
            name: { type: 'string' },
            email: { type: 'string', format: 'email' },
            createdAt: { type: 'string', format: 'date-time' },
            updatedAt: { type: 'string', format: 'date-time' },
          },
        },
        Post: {
          type: 'object',
          properties: {
            id: { type: 'string', format: 'uuid' },
            ownerId: { type: 'string', format: 'uuid' },
            title: { type: 'string' },
            body: { type: 'string' },
            author: { $ref: '#/components/schemas/UserProfile' },
            createdAt: { type: 'string', format: 'date-time' },
            updatedAt: { type: 'string', format: 'date-time' },
          },
        },
        AuthResponse: {
          type: 'object',
          properties: {
            message: { type: 'string' },
            data: {
              type: 'object',
              properties: {
                token: { type: 'string' },
                expiresAt: { type: 'string', format: 'date-time' },
                user: { $ref: '#/components/schemas/UserProfile' },
              },
            },
          },
        },
        PostListResponse: {
          type: 'object',
          properties: {
            message: { type: 'string' },
            data: { type: 'array', items: { $ref: '#/components/schemas/Post' } },
          },
        },
      },
    },
    tags: [
      { name: 'Auth', description: 'Registration, login and profile' },
      { name: 'Posts', description: 'Posts; mutations are owner-only' },
    ],
  },
  apis: ['./src/infra/http/routes/*.ts'],
};

export const swaggerSpec = swaggerJsdoc(options);
