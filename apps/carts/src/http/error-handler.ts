import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';

import {
  createNotFoundError,
  createValidationError,
  HttpError,
  PROBLEM_TYPES,
  replyWithProblem,
} from './problem';

type HandledError = FastifyError | HttpError | ZodError;

// Schema failures raised inside handlers, e.g. by a resource repository.
function toValidationProblem(error: ZodError) {
  const flattened = error.flatten();
  return createValidationError(
    'The request payload or parameters failed validation.',
    { fieldErrors: flattened.fieldErrors, formErrors: flattened.formErrors },
    error,
  ).problem;
}

export function registerErrorHandlers(app: FastifyInstance) {
  app.setErrorHandler((error: HandledError, request: FastifyRequest, reply: FastifyReply) => {
    if (error instanceof HttpError) {
      request.log.warn({ err: error }, 'Handled application error');
      return replyWithProblem(reply, error.problem);
    }

    if (error instanceof ZodError) {
      request.log.warn({ err: error, route: request.routeOptions.url }, 'Payload failed schema validation');
      return replyWithProblem(reply, toValidationProblem(error));
    }

    if (error.validation) {
      request.log.warn({ err: error }, 'Request validation failed');
      return replyWithProblem(reply, {
        type: PROBLEM_TYPES.validationError,
        title: 'Validation Failed',
        status: 422,
        detail: 'The request payload or parameters failed validation.',
        errors: error.validation,
      });
    }

    if (error.statusCode && error.statusCode >= 400 && error.statusCode < 500) {
      request.log.warn({ err: error }, 'Client error');
      return replyWithProblem(reply, {
        title: error.name,
        status: error.statusCode,
        detail: error.message,
      });
    }

    request.log.error({ err: error }, 'Unhandled error');
    return replyWithProblem(reply, {
      type: PROBLEM_TYPES.internalError,
      title: 'Internal Server Error',
      status: 500,
      detail: 'An unexpected error occurred.',
    });
  });

  app.setNotFoundHandler((request, reply) => {
    replyWithProblem(reply, createNotFoundError(`Route ${request.method} ${request.url}`).problem);
  });
}
