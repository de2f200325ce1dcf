import { FastifyInstance, FastifyError } from 'fastify';
import { ZodError } from 'zod';
import { isDomainError } from './errors.js';

interface ErrorResponse {
  error: string;
  message: string;
  statusCode: number;
  details?: unknown;
}

/** Labels for Fastify's own 4xx errors (bad JSON, unknown content type, ...). */
const REQUEST_ERROR_TITLES: Record<number, string> = {
  400: 'Bad Request',
  404: 'Not Found',
  413: 'Payload Too Large',
  415: 'Unsupported Media Type',
};

function hasStatusCode(error: Error): error is FastifyError & { statusCode: number } {
  return 'statusCode' in error && typeof error.statusCode === 'number';
}

function toErrorResponse(error: FastifyError | Error): ErrorResponse | null {
  if (error instanceof ZodError) {
    return {
      error: 'Validation Error',
      message: 'Request validation failed',
      statusCode: 400,
      details: error.issues.map((issue) => ({
        path: issue.path.map(String).join('.'),
        message: issue.message,
      })),
    };
  }

  if (isDomainError(error)) {
    const response: ErrorResponse = {
      error: error.title,
      message: error.message,
      statusCode: error.statusCode,
    };
    const details = error.details();
    if (details !== undefined) {
      response.details = details;
    }
    return response;
  }

  if (hasStatusCode(error) && error.statusCode < 500) {
    return {
      error: REQUEST_ERROR_TITLES[error.statusCode] ?? 'Request Error',
      message: error.message,
      statusCode: error.statusCode,
    };
  }

  return null;
}

export function registerErrorHandler(fastify: FastifyInstance): void {
  fastify.setErrorHandler((error: FastifyError | Error, request, reply) => {
    const response = toErrorResponse(error);
    if (response) {
      return reply.status(response.statusCode).send(response);
    }

    request.log.error(error);

    return reply.status(500).send({
      error: 'Internal Server Error',
      message: 'An unexpected error occurred',
      statusCode: 500,
    } satisfies ErrorResponse);
  });
}
