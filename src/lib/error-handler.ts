import { FastifyInstance, FastifyError } from 'fastify';
import { ZodError } from 'zod';
import {
  NotFoundError,
  ValidationError,
  ConfigurationError,
  DuplicateIdError,
  AvailabilityError,
} from './errors.js';

interface ErrorResponse {
  error: string;
  message: string;
  statusCode: number;
  details?: unknown;
}

export function registerErrorHandler(fastify: FastifyInstance): void {
  fastify.setErrorHandler((error: FastifyError | Error, request, reply) => {
    const response: ErrorResponse = {
      error: 'Internal Server Error',
      message: 'An unexpected error occurred',
      statusCode: 500,
    };

    if (error instanceof ZodError) {
      response.error = 'Validation Error';
      response.message = 'Request validation failed';
      response.statusCode = 400;
      response.details = error.issues.map((issue) => ({
        path: issue.path.map(String).join('.'),
        message: issue.message,
      }));
      return reply.status(400).send(response);
    }

    if (error instanceof NotFoundError) {
      response.error = 'Not Found';
      response.message = error.message;
      response.statusCode = 404;
      return reply.status(404).send(response);
    }

    if (error instanceof ValidationError) {
      response.error = 'Validation Error';
      response.message = error.message;
      response.statusCode = 400;
      if (error.details) {
        response.details = error.details;
      }
      return reply.status(400).send(response);
    }

    // Before ConfigurationError: duplicates are a subclass
    if (error instanceof DuplicateIdError) {
      response.error = 'Conflict';
      response.message = error.message;
      response.statusCode = 409;
      response.details = error.details;
      return reply.status(409).send(response);
    }

    if (error instanceof ConfigurationError) {
      response.error = 'Configuration Error';
      response.message = error.message;
      response.statusCode = 422;
      if (error.details) {
        response.details = error.details;
      }
      return reply.status(422).send(response);
    }

    if (error instanceof AvailabilityError) {
      response.error = 'Conflict';
      response.message = error.message;
      response.statusCode = 409;
      response.details = {
        resourceId: error.resourceId,
        date: error.date,
        hours: error.hours,
      };
      return reply.status(409).send(response);
    }

    // Fastify errors (malformed JSON body, unknown route, ...)
    if ('statusCode' in error && typeof error.statusCode === 'number') {
      response.statusCode = error.statusCode;
      response.message = error.message;
      if (error.statusCode === 400) {
        response.error = 'Bad Request';
      } else if (error.statusCode === 404) {
        response.error = 'Not Found';
      } else if (error.statusCode === 415) {
        response.error = 'Unsupported Media Type';
      }
      return reply.status(error.statusCode).send(response);
    }

    request.log.error(error);

    return reply.status(500).send(response);
  });
}
