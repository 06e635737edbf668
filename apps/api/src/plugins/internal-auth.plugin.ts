import { type FastifyInstance, type FastifyRequest, type FastifyReply } from 'fastify';
import fp from 'fastify-plugin';
import { timingSafeEqual } from 'node:crypto';

// ---------------------------------------------------------------------------
// Type augmentation
// ---------------------------------------------------------------------------

declare module 'fastify' {
  interface FastifyInstance {
    verifyInternalKey: (request: FastifyRequest, reply: FastifyReply) => Promise<void>;
  }
}

export const INTERNAL_API_KEY_HEADER = 'x-internal-api-key';

// ---------------------------------------------------------------------------
// Helper: constant-time key comparison
// ---------------------------------------------------------------------------

export function isValidInternalKey(
  provided: string | string[] | undefined,
  expected: string | undefined,
): boolean {
  if (typeof provided !== 'string' || !expected) return false;

  const providedBuffer = Buffer.from(provided);
  const expectedBuffer = Buffer.from(expected);
  if (providedBuffer.length !== expectedBuffer.length) return false;

  return timingSafeEqual(providedBuffer, expectedBuffer);
}

// ---------------------------------------------------------------------------
// Plugin: verifyInternalKey preHandler
// ---------------------------------------------------------------------------

export interface InternalAuthPluginOptions {
  /** With no key configured every internal request is rejected. */
  apiKey: string | undefined;
}

async function internalAuthPlugin(app: FastifyInstance, opts: InternalAuthPluginOptions) {
  if (!opts.apiKey) {
    app.log.warn('INTERNAL_API_KEY is not set; internal routes will reject all requests');
  }

  app.decorate('verifyInternalKey', async function verifyInternalKey(
    request: FastifyRequest,
    reply: FastifyReply,
  ) {
    if (!isValidInternalKey(request.headers[INTERNAL_API_KEY_HEADER], opts.apiKey)) {
      reply.code(401).send({
        error: { code: 'UNAUTHORIZED', message: 'Authentication required' },
      });
    }
  });
}

export const internalAuthPluginFp = fp(internalAuthPlugin, {
  name: 'internal-auth-plugin',
});
