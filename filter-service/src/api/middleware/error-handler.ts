import type { FastifyInstance } from 'fastify';
import { BindingNotFoundError, UnsupportedOperatorError } from 'policy-query-filter';

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((unknownError, _request, reply) => {
    // Ensure we always deal with an Error object
    const error = unknownError instanceof Error ? unknownError : new Error(String(unknownError));

    // The policy references input the caller did not bind → 422
    if (error instanceof BindingNotFoundError) {
      return reply.status(422).send({
        error: error.name,
        message: error.message,
        binding: error.binding,
      });
    }

    // Condition records carry an operator outside the clause table → 422
    if (error instanceof UnsupportedOperatorError) {
      return reply.status(422).send({
        error: error.name,
        message: error.message,
        operator: error.operator,
      });
    }

    // Fastify built-in errors (validation, body limit, bad JSON) have a numeric `statusCode`
    if ('statusCode' in error && typeof error.statusCode === 'number' && error.statusCode < 500) {
      return reply.status(error.statusCode).send({ error: error.name, message: error.message });
    }

    app.log.error(error);
    return reply.status(500).send({ error: 'InternalError', message: 'Internal server error' });
  });
}
