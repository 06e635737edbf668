import { type FastifyInstance } from 'fastify';
import fp from 'fastify-plugin';
import { ZodError } from 'zod';
import { AppError } from '../lib/errors.js';

// ---------------------------------------------------------------------------
// Maps thrown errors to the { error: { code, message } } envelope.
// ---------------------------------------------------------------------------

async function errorHandlerPlugin(app: FastifyInstance) {
  app.setErrorHandler((error, request, reply) => {
    if (error instanceof AppError) {
      if (error.statusCode >= 500) {
        request.log.error({ err: error, details: error.details }, error.message);
      }
      return reply.code(error.statusCode).send({
        error: { code: error.code, message: error.message },
      });
    }

    // Zod failures from the type-provider compiler arrive without `validation`.
    if (error.validation || error.code === 'FST_ERR_VALIDATION') {
      return reply.code(400).send({
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Validation failed',
          details: error.validation ?? (error instanceof ZodError ? error.issues : undefined),
        },
      });
    }

    if (error.statusCode && error.statusCode >= 400 && error.statusCode < 500) {
      return reply.code(error.statusCode).send({
        error: { code: error.code ?? 'ERROR', message: error.message },
      });
    }

    request.log.error(error);
    return reply.code(500).send({
      error: { code: 'INTERNAL_ERROR', message: 'Internal server error' },
    });
  });
}

export const errorHandlerPluginFp = fp(errorHandlerPlugin, {
  name: 'error-handler-plugin',
});
