import Fastify from 'fastify';
import helmet from '@fastify/helmet';
import { randomUUID } from 'node:crypto';
import {
  serializerCompiler,
  validatorCompiler,
} from 'fastify-type-provider-zod';
import { rateLimitPluginFp } from './plugins/rate-limit.plugin.js';
import { errorHandlerPluginFp } from './plugins/error-handler.plugin.js';
import { internalAuthPluginFp } from './plugins/internal-auth.plugin.js';
import { internalNotificationRoutes } from './domains/notification/notification.routes.js';
import { type InternalNotificationHandlerDeps } from './domains/notification/notification.handlers.js';

export interface BuildAppOptions {
  deps: InternalNotificationHandlerDeps;
  apiKey: string | undefined;
  logLevel?: string;
  /** Set false to silence Fastify's request logging (tests). */
  logger?: boolean;
  rateLimitMax?: number;
}

export async function buildApp(opts: BuildAppOptions) {
  const app = Fastify({
    logger: opts.logger === false ? false : { level: opts.logLevel ?? 'info' },
    genReqId: () => randomUUID(),
  });

  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  // Register plugins
  await app.register(helmet);
  await app.register(rateLimitPluginFp, { defaultMax: opts.rateLimitMax });
  await app.register(errorHandlerPluginFp);
  await app.register(internalAuthPluginFp, { apiKey: opts.apiKey });

  // Health check
  app.get('/health', async () => ({ status: 'ok' }));

  await app.register(internalNotificationRoutes, { deps: opts.deps });

  return app;
}
