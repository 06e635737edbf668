import { type FastifyRequest, type FastifyReply } from 'fastify';
import {
  type IntakeBody,
  type ProcessorRunBody,
  type NotificationListQuery,
  type NotificationIdParam,
} from '@tidings/shared/schemas/notification.schema.js';
import {
  IntakeOutcome,
  NotificationPriority,
} from '@tidings/shared/constants/notification.constants.js';
import { type SelectNotification } from '@tidings/shared/schemas/db/notification.schema.js';
import { NotFoundError } from '../../lib/errors.js';
import { type NotificationRepository } from './notification.repository.js';
import { type NotificationRouter } from './notification.service.js';
import { runBatch, runWeekly, type DigestServiceDeps } from './digest.service.js';
import { withStorage } from './routing.store.js';
import { type RoutingClock } from './schedule.js';

// ---------------------------------------------------------------------------
// Handler Dependencies
// ---------------------------------------------------------------------------

export interface InternalNotificationHandlerDeps {
  router: Pick<NotificationRouter, 'intake'>;
  digestDeps: DigestServiceDeps;
  notificationRepo: NotificationRepository;
  clock: RoutingClock;
}

// ---------------------------------------------------------------------------
// Response mapping helper
// ---------------------------------------------------------------------------

export function mapNotificationResponse(n: SelectNotification) {
  return {
    notification_id: n.notificationId,
    priority: n.priority,
    channel: n.channel,
    message: n.message,
    context: n.context,
    scheduled_for: n.scheduledFor ? n.scheduledFor.toISOString() : null,
    sent_at: n.sentAt ? n.sentAt.toISOString() : null,
    created_at: n.createdAt.toISOString(),
  };
}

// ---------------------------------------------------------------------------
// Handler Factory
// ---------------------------------------------------------------------------

export function createInternalNotificationHandlers(deps: InternalNotificationHandlerDeps) {
  function invocationTime(body: ProcessorRunBody): Date {
    return body.now ? new Date(body.now) : deps.clock.now();
  }

  // -------------------------------------------------------------------------
  // POST /api/v1/internal/notifications/intake
  // -------------------------------------------------------------------------

  async function intakeHandler(
    request: FastifyRequest<{ Body: IntakeBody }>,
    reply: FastifyReply,
  ) {
    const { priority, message, event_kind, source_entity_id, context } = request.body;

    const result = await deps.router.intake({
      priority,
      message,
      eventKind: event_kind,
      sourceEntityId: source_entity_id ?? null,
      context,
    });

    if (result.outcome === IntakeOutcome.CREATED) {
      return reply.code(201).send({
        data: {
          outcome: result.outcome,
          notification: mapNotificationResponse(result.notification),
        },
      });
    }

    return reply.code(200).send({ data: { outcome: result.outcome } });
  }

  // -------------------------------------------------------------------------
  // POST /api/v1/internal/notifications/run-batch
  // -------------------------------------------------------------------------

  async function runBatchHandler(
    request: FastifyRequest<{ Body: ProcessorRunBody }>,
    reply: FastifyReply,
  ) {
    const sentCount = await runBatch(deps.digestDeps, invocationTime(request.body));
    return reply.code(200).send({ data: { sent_count: sentCount } });
  }

  // -------------------------------------------------------------------------
  // POST /api/v1/internal/notifications/run-weekly
  // -------------------------------------------------------------------------

  async function runWeeklyHandler(
    request: FastifyRequest<{ Body: ProcessorRunBody }>,
    reply: FastifyReply,
  ) {
    const sent = await runWeekly(deps.digestDeps, invocationTime(request.body));
    return reply.code(200).send({ data: { sent } });
  }

  // -------------------------------------------------------------------------
  // GET /api/v1/internal/notifications
  // -------------------------------------------------------------------------

  async function listNotificationsHandler(
    request: FastifyRequest<{ Querystring: NotificationListQuery }>,
    reply: FastifyReply,
  ) {
    const { priority, pending_only, limit, offset } = request.query;

    const [notifications, pendingBatched, pendingWeekly] = await withStorage(
      'listNotifications',
      () =>
        Promise.all([
          deps.notificationRepo.listNotifications({
            priority,
            pendingOnly: pending_only,
            limit,
            offset,
          }),
          deps.notificationRepo.countPending(NotificationPriority.BATCHED),
          deps.notificationRepo.countPending(NotificationPriority.WEEKLY),
        ]),
    );

    return reply.code(200).send({
      data: {
        notifications: notifications.map(mapNotificationResponse),
        total: notifications.length,
        pending: {
          batched: pendingBatched,
          weekly: pendingWeekly,
        },
      },
    });
  }

  // -------------------------------------------------------------------------
  // GET /api/v1/internal/notifications/:id
  // -------------------------------------------------------------------------

  async function getNotificationHandler(
    request: FastifyRequest<{ Params: NotificationIdParam }>,
    reply: FastifyReply,
  ) {
    const notification = await withStorage('findNotificationById', () =>
      deps.notificationRepo.findNotificationById(request.params.id),
    );
    if (!notification) {
      throw new NotFoundError('Notification');
    }

    return reply.code(200).send({ data: mapNotificationResponse(notification) });
  }

  return {
    intakeHandler,
    runBatchHandler,
    runWeeklyHandler,
    listNotificationsHandler,
    getNotificationHandler,
  };
}
