import swaggerJsdoc from 'swagger-jsdoc';
import { join } from 'path';

const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'User Service API',
      version: '1.0.0',
      description: 'REST API for managing user records',
    },
    servers: [
      {
        url: 'http://localhost:3000',
        description: 'Development server',
      },
    ],
    components: {
      schemas: {
        UserRequest: {
          type: 'object',
          required: ['username', 'email'],
          properties: {
            username: { type: 'string', maxLength: 100, example: 'johndoe' },
            email: { type: 'string', format: 'email', maxLength: 255, example: 'john@example.com' },
            firstName: { type: 'string', maxLength: 100, nullable: true, example: 'John' },
            lastName: { type: 'string', maxLength: 100, nullable: true, example: 'Doe' },
          },
        },
        UserResponse: {
          type: 'object',
          required: ['id', 'username', 'email', 'createdAt', 'updatedAt'],
          properties: {
            id: { type: 'integer', example: 1 },
            username: { type: 'string' },
            email: { type: 'string', format: 'email' },
            firstName: { type: 'string', nullable: true },
            lastName: { type: 'string', nullable: true },
            createdAt: { type: 'string', format: 'date-time' },
            updatedAt: { type: 'string', format: 'date-time' },
          },
        },
        ErrorResponse: {
          type: 'object',
          required: ['code', 'message'],
          properties: {
            code: {
              type: 'string',
              description: 'Error code identifier',
              example: 'DUPLICATE_RESOURCE',
            },
            message: {
              type: 'string',
              description: 'Human-readable error message',
              example: 'Username already exists: johndoe',
            },
            errors: {
              type: 'object',
              description: 'Field -> message, present on validation failures only',
              additionalProperties: { type: 'string' },
            },
            details: {
              type: 'object',
              description: 'Additional error details (optional)',
              additionalProperties: true,
            },
          },
        },
      },
    },
    tags: [{ name: 'Users', description: 'User management' }],
  },
  apis: [join(process.cwd(), 'src/infra/http/routes/*.ts')],
};

export const swaggerSpec = swaggerJsdoc(options);
