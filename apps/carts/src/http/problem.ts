import type { FastifyReply } from 'fastify';

export type ProblemDetail = {
  type?: string;
  title: string;
  status: number;
  detail?: string;
  instance?: string;
  [key: string]: unknown;
};

export type HttpErrorOptions = {
  cause?: unknown;
};

export class HttpError extends Error {
  constructor(
    public readonly problem: ProblemDetail,
    options?: HttpErrorOptions,
  ) {
    super(problem.detail ?? problem.title, options);
    this.name = 'HttpError';
  }
}

export const PROBLEM_TYPES = {
  validationError: 'urn:problem:carts:validation_error',
  notFound: 'urn:problem:carts:not_found',
  internalError: 'urn:problem:carts:internal_error',
} as const;

export function replyWithProblem(reply: FastifyReply, problem: ProblemDetail) {
  void reply
    .code(problem.status)
    .type('application/problem+json')
    .send({ type: 'about:blank', ...problem });
}

export function createValidationError(
  detail: string,
  errors?: Record<string, unknown>,
  cause?: unknown,
): HttpError {
  return new HttpError(
    {
      type: PROBLEM_TYPES.validationError,
      title: 'Validation Failed',
      status: 422,
      detail,
      errors,
    },
    cause ? { cause } : undefined,
  );
}

export function createNotFoundError(
  resource: string,
  extras?: Record<string, unknown>,
  cause?: unknown,
): HttpError {
  return new HttpError(
    {
      type: PROBLEM_TYPES.notFound,
      title: 'Not Found',
      status: 404,
      detail: `${resource} was not found.`,
      ...extras,
    },
    cause ? { cause } : undefined,
  );
}
