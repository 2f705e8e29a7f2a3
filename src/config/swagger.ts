import path from 'path';
import swaggerJsdoc from 'swagger-jsdoc';
import swaggerUi from 'swagger-ui-express';

const errorResponse = (description: string, detail: string) => ({
  description,
  content: {
    'application/json': {
      schema: {
        $ref: '#/components/schemas/Error',
      },
      example: {
        detail,
      },
    },
  },
});

// Swagger definition
const swaggerDefinition = {
  openapi: '3.0.0',
  info: {
    title: 'Mergington High School API',
    version: '1.0.0',
    description: 'API for viewing and signing up for extracurricular activities',
  },
  servers: [
    {
      url: '/',
      description: 'Development server',
    },
  ],
  components: {
    schemas: {
      Error: {
        type: 'object',
        properties: {
          detail: {
            type: 'string',
            description: 'Human-readable reason for the failure',
          },
        },
      },
    },
    responses: {
      BadRequestError: errorResponse(
        'The student is already signed up, or is not signed up for this activity',
        'Student is already signed up'
      ),
      NotFoundError: errorResponse('Activity not found', 'Activity not found'),
      ValidationError: errorResponse(
        'A required query parameter is missing',
        "Query parameter 'email' is required"
      ),
      ServerError: errorResponse('Internal server error', 'Internal Server Error'),
    },
  },
};

// Options for the swagger docs. Globs cover both the sources and the compiled output.
const options: swaggerJsdoc.Options = {
  swaggerDefinition,
  apis: [path.join(__dirname, '../routes/**/*.{ts,js}')],
};

// Initialize swagger-jsdoc
const swaggerSpec = swaggerJsdoc(options);

export { swaggerUi, swaggerSpec };
