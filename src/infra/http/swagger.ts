import swaggerJsdoc from 'swagger-jsdoc';

const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'User Auth Service API',
      version: '1.0.0',
      description: 'Registration, login and cached profile lookups',
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
              description: 'Error code identifier',
              example: 'INVALID_CREDENTIALS',
            },
            message: {
              type: 'string',
              description: 'Human-readable error message',
              example: 'Invalid email or password',
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
          required: ['id', 'username', 'email', 'role', 'createdAt'],
          properties: {
            id: { type: 'integer', example: 1 },
            username: { type: 'string', example: 'alice' },
            email: { type: 'string', format: 'email', example: 'alice@example.com' },
            role: { type: 'string', example: 'user' },
            createdAt: { type: 'string', format: 'date-time' },
          },
        },
      },
    },
    tags: [
      { name: 'Auth', description: 'Registration and login' },
      { name: 'Users', description: 'Profile lookups' },
    ],
  },
  apis: ['./src/infra/http/routes/*.ts'],
};

export const swaggerSpec = swaggerJsdoc(options);
