import { type FastifyInstance } from 'fastify';
import {
  intakeSchema,
  processorRunSchema,
  notificationListQuerySchema,
  notificationIdParamSchema,
  type IntakeBody,
  type ProcessorRunBody,
  type NotificationListQuery,
  type NotificationIdParam,
} from '@tidings/shared/schemas/notification.schema.js';
import {
  createInternalNotificationHandlers,
  type InternalNotificationHandlerDeps,
} from './notification.handlers.js';
import { intakeRateLimit, processorRateLimit } from '../../plugins/rate-limit.plugin.js';

// ---------------------------------------------------------------------------
// Internal Notification Routes (X-Internal-API-Key)
// ---------------------------------------------------------------------------

export async function internalNotificationRoutes(
  app: FastifyInstance,
  opts: { deps: InternalNotificationHandlerDeps },
) {
  const handlers = createInternalNotificationHandlers(opts.deps);

  // POST /api/v1/internal/notifications/intake — route one event
  app.post<{ Body: IntakeBody }>('/api/v1/internal/notifications/intake', {
    schema: { body: intakeSchema },
    preHandler: [app.verifyInternalKey],
    config: { rateLimit: intakeRateLimit() },
    handler: handlers.intakeHandler,
  });

  // POST /api/v1/internal/notifications/run-batch — external clock tick
  app.post<{ Body: ProcessorRunBody }>('/api/v1/internal/notifications/run-batch', {
    schema: { body: processorRunSchema },
    preHandler: [app.verifyInternalKey],
    config: { rateLimit: processorRateLimit() },
    handler: handlers.runBatchHandler,
  });

  // POST /api/v1/internal/notifications/run-weekly — external clock tick
  app.post<{ Body: ProcessorRunBody }>('/api/v1/internal/notifications/run-weekly', {
    schema: { body: processorRunSchema },
    preHandler: [app.verifyInternalKey],
    config: { rateLimit: processorRateLimit() },
    handler: handlers.runWeeklyHandler,
  });

  // GET /api/v1/internal/notifications — delivery history
  app.get<{ Querystring: NotificationListQuery }>('/api/v1/internal/notifications', {
    schema: { querystring: notificationListQuerySchema },
    preHandler: [app.verifyInternalKey],
    handler: handlers.listNotificationsHandler,
  });

  // GET /api/v1/internal/notifications/:id — single notification
  app.get<{ Params: NotificationIdParam }>('/api/v1/internal/notifications/:id', {
    schema: { params: notificationIdParamSchema },
    preHandler: [app.verifyInternalKey],
    handler: handlers.getNotificationHandler,
  });
}
