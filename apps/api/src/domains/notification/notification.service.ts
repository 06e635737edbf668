import {
  NotificationPriority,
  NotificationChannel,
  IntakeOutcome,
} from '@tidings/shared/constants/notification.constants.js';
import {
  type NotificationContext,
  type SelectNotification,
} from '@tidings/shared/schemas/db/notification.schema.js';
import { type AppLogger } from '../../lib/logger.js';
import { AuditStatus, type AuditLog } from '../../lib/audit-log.js';
import { createDedupLedger } from './dedup-ledger.js';
import { deliver, renderForChannel, type ChannelRegistry } from './channels.js';
import { type RoutingPolicy } from './routing.config.js';
import { type RoutingStore, withStorage } from './routing.store.js';
import {
  formatClockTime,
  nextBatchTime,
  nextWeeklyTime,
  type RoutingClock,
} from './schedule.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface IntakeRequest {
  priority: NotificationPriority;
  message: string;
  /** Open string space, e.g. "deadline_urgent". */
  eventKind: string;
  sourceEntityId?: string | null;
  context?: Record<string, unknown>;
}

export type PriorityIntakeRequest = Omit<IntakeRequest, 'priority'>;

export type IntakeResult =
  | { outcome: typeof IntakeOutcome.CREATED; notification: SelectNotification }
  | { outcome: typeof IntakeOutcome.SUPPRESSED }
  | { outcome: typeof IntakeOutcome.LOGGED };

export interface NotificationRouterDeps {
  store: RoutingStore;
  channels: ChannelRegistry;
  policy: RoutingPolicy;
  clock: RoutingClock;
  logger: AppLogger;
  auditLog: AuditLog;
}

// ---------------------------------------------------------------------------
// Router
// ---------------------------------------------------------------------------

export function createNotificationRouter(deps: NotificationRouterDeps) {
  function primaryChannel(priority: NotificationPriority): NotificationChannel {
    const [first] = deps.policy.channels[priority];
    return first ?? NotificationChannel.LOG_ONLY;
  }

  function scheduleFor(priority: NotificationPriority, now: Date): Date | null {
    if (priority === NotificationPriority.BATCHED) {
      const slot = nextBatchTime(now, deps.policy.batchTimes);
      if (slot.fallback) {
        deps.logger.warn(
          { batchTimes: deps.policy.batchTimes.map(formatClockTime) },
          'No usable batch times configured; scheduling for tomorrow 09:00',
        );
      }
      return slot.scheduledFor;
    }

    if (priority === NotificationPriority.WEEKLY) {
      const slot = nextWeeklyTime(now, deps.policy.weeklyDay, deps.policy.weeklyTime);
      if (slot.fallback) {
        deps.logger.warn(
          { weeklyDay: deps.policy.weeklyDay, weeklyTime: deps.policy.weeklyTime },
          'Weekly slot misconfigured; scheduling for Sunday 20:00',
        );
      }
      return slot.scheduledFor;
    }

    return null;
  }

  /**
   * Fans the message out to every IMMEDIATE channel. The row was committed
   * already stamped sent; a failed channel is logged and not retried.
   */
  async function dispatchImmediate(notification: SelectNotification): Promise<void> {
    for (const channel of deps.policy.channels[NotificationPriority.IMMEDIATE]) {
      const adapter = deps.channels[channel];
      const payload = renderForChannel(channel, notification.message);
      const result = await deliver(adapter, payload);
      if (!result.success) {
        deps.logger.error(
          {
            notificationId: notification.notificationId,
            channel,
            recipient: adapter?.recipient ?? null,
            payload,
            error: result.error,
          },
          'Immediate delivery failed',
        );
      }
    }
  }

  async function dispatchSilent(request: IntakeRequest): Promise<void> {
    for (const channel of deps.policy.channels[NotificationPriority.SILENT]) {
      const result = await deliver(deps.channels[channel], request.message);
      if (!result.success) {
        deps.logger.warn(
          { channel, eventKind: request.eventKind, error: result.error },
          'Silent notification not logged to channel',
        );
      }
    }
  }

  function auditStatusFor(result: IntakeResult): AuditStatus {
    switch (result.outcome) {
      case IntakeOutcome.SUPPRESSED:
        return AuditStatus.SUPPRESSED;
      case IntakeOutcome.LOGGED:
        return AuditStatus.LOGGED;
      case IntakeOutcome.CREATED:
        return result.notification.sentAt ? AuditStatus.SENT : AuditStatus.QUEUED;
    }
  }

  async function intake(request: IntakeRequest): Promise<IntakeResult> {
    const now = deps.clock.now();
    const sourceEntityId = request.sourceEntityId ?? null;

    const result = await withStorage('intake', () =>
      deps.store.transaction(async (repos): Promise<IntakeResult> => {
        const ledger = createDedupLedger({
          repo: repos.dedup,
          policy: deps.policy,
          clock: { now: () => now },
        });

        const claimed = await ledger.claim(request.priority, request.eventKind, sourceEntityId);
        if (!claimed) {
          return { outcome: IntakeOutcome.SUPPRESSED };
        }

        if (request.priority === NotificationPriority.SILENT) {
          return { outcome: IntakeOutcome.LOGGED };
        }

        const context: NotificationContext = {
          event_kind: request.eventKind,
          source_entity_id: sourceEntityId,
          metadata: request.context ?? {},
        };

        const notification = await repos.notifications.createNotification({
          priority: request.priority,
          channel: primaryChannel(request.priority),
          message: request.message,
          context,
          scheduledFor: scheduleFor(request.priority, now),
          // IMMEDIATE rows commit already sent; fan-out follows the commit.
          sentAt: request.priority === NotificationPriority.IMMEDIATE ? now : null,
          createdAt: now,
        });

        return { outcome: IntakeOutcome.CREATED, notification };
      }),
    );

    if (result.outcome === IntakeOutcome.SUPPRESSED) {
      deps.logger.debug(
        { priority: request.priority, eventKind: request.eventKind, sourceEntityId },
        'Notification suppressed by dedup window',
      );
    } else if (result.outcome === IntakeOutcome.LOGGED) {
      await dispatchSilent(request);
    } else if (result.notification.priority === NotificationPriority.IMMEDIATE) {
      await dispatchImmediate(result.notification);
    }

    deps.auditLog.record(
      {
        priority: request.priority,
        eventKind: request.eventKind,
        message: request.message,
        status: auditStatusFor(result),
      },
      now,
    );

    return result;
  }

  return {
    intake,

    intakeImmediate(request: PriorityIntakeRequest): Promise<IntakeResult> {
      return intake({ ...request, priority: NotificationPriority.IMMEDIATE });
    },

    intakeBatched(request: PriorityIntakeRequest): Promise<IntakeResult> {
      return intake({ ...request, priority: NotificationPriority.BATCHED });
    },

    intakeWeekly(request: PriorityIntakeRequest): Promise<IntakeResult> {
      return intake({ ...request, priority: NotificationPriority.WEEKLY });
    },

    intakeSilent(request: PriorityIntakeRequest): Promise<IntakeResult> {
      return intake({ ...request, priority: NotificationPriority.SILENT });
    },
  };
}

export type NotificationRouter = ReturnType<typeof createNotificationRouter>;
