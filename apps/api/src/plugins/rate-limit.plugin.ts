import { type FastifyInstance } from 'fastify';
import fp from 'fastify-plugin';
import rateLimit from '@fastify/rate-limit';

// ---------------------------------------------------------------------------
// Rate limit tiers (per client IP):
//   Default:        100 req/min
//   Intake:         600 req/min (automated producers)
//   Processor runs: 10 req/min
// ---------------------------------------------------------------------------

export interface RateLimitPluginOptions {
  /** Override default max for testing. */
  defaultMax?: number;
}

async function rateLimitPlugin(app: FastifyInstance, opts: RateLimitPluginOptions) {
  await app.register(rateLimit, {
    max: opts.defaultMax ?? 100,
    timeWindow: '1 minute',
    keyGenerator: (request) => request.ip,
    // Thrown by the plugin; the error handler renders it into the envelope.
    errorResponseBuilder: (_request, context) => ({
      statusCode: 429,
      code: 'RATE_LIMITED',
      message: `Rate limit exceeded. Retry after ${Math.ceil(context.ttl / 1000)} seconds.`,
    }),
  });
}

// ---------------------------------------------------------------------------
// Route-level rate limit config factories
// Use as: { config: { rateLimit: intakeRateLimit() } }
// ---------------------------------------------------------------------------

export function intakeRateLimit() {
  return {
    max: 600,
    timeWindow: '1 minute',
  };
}

export function processorRateLimit() {
  return {
    max: 10,
    timeWindow: '1 minute',
  };
}

export const rateLimitPluginFp = fp(rateLimitPlugin, {
  name: 'rate-limit-plugin',
});
