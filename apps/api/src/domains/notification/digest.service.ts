import {
  NotificationPriority,
  EventKind,
  DIGEST_HEADER,
  DIGEST_FALLBACK_GROUP,
  FALLBACK_BATCH_HOUR,
} from '@tidings/shared/constants/notification.constants.js';
import { type SelectNotification } from '@tidings/shared/schemas/db/notification.schema.js';
import { type AppLogger } from '../../lib/logger.js';
import { AuditStatus, type AuditLog } from '../../lib/audit-log.js';
import { deliver, type ChannelRegistry } from './channels.js';
import { type NotificationRepository } from './notification.repository.js';
import { type RoutingPolicy } from './routing.config.js';
import { withStorage } from './routing.store.js';
import { type RunLock } from './run-lock.js';
import {
  dailyCronExpression,
  formatClockTime,
  resolveWeeklySlot,
  weeklyCronExpression,
  type RoutingClock,
} from './schedule.js';

// ---------------------------------------------------------------------------
// Dependencies
// ---------------------------------------------------------------------------

export interface DigestServiceDeps {
  notificationRepo: NotificationRepository;
  channels: ChannelRegistry;
  policy: RoutingPolicy;
  clock: RoutingClock;
  logger: AppLogger;
  auditLog: AuditLog;
  runLock: RunLock;
}

// ---------------------------------------------------------------------------
// Digest rendering
// ---------------------------------------------------------------------------

/** `wip_warning` -> `Wip Warning` */
export function formatGroupHeading(eventKind: string): string {
  return eventKind
    .replace(/_/g, ' ')
    .split(' ')
    .map((word) =>
      word.length > 0 ? word[0].toUpperCase() + word.slice(1).toLowerCase() : word,
    )
    .join(' ');
}

/**
 * Groups by event kind in first-seen order; items keep their input order
 * within a group. Input is expected oldest first.
 */
export function renderDigest(
  items: ReadonlyArray<Pick<SelectNotification, 'message' | 'context'>>,
): string {
  const groups = new Map<string, string[]>();
  for (const item of items) {
    const key = item.context.event_kind || DIGEST_FALLBACK_GROUP;
    const messages = groups.get(key) ?? [];
    messages.push(item.message);
    groups.set(key, messages);
  }

  const lines = [DIGEST_HEADER, ''];
  for (const [eventKind, messages] of groups) {
    lines.push(`[${formatGroupHeading(eventKind)}]`);
    for (const message of messages) {
      lines.push(`  - ${message}`);
    }
    lines.push('');
  }
  return lines.join('\n');
}

// ---------------------------------------------------------------------------
// Processors
// ---------------------------------------------------------------------------

function primaryAdapter(deps: DigestServiceDeps, priority: NotificationPriority) {
  const [channel] = deps.policy.channels[priority];
  return { channel: channel ?? null, adapter: channel ? deps.channels[channel] : undefined };
}

/**
 * Sends one digest of every BATCHED row due by `now` and marks them sent.
 * Returns the number marked; 0 when nothing was due or delivery failed.
 */
export async function runBatch(deps: DigestServiceDeps, now: Date): Promise<number> {
  return deps.runLock.run(NotificationPriority.BATCHED, async () => {
    const pending = await withStorage('runBatch', () =>
      deps.notificationRepo.findPending(NotificationPriority.BATCHED, now),
    );
    if (pending.length === 0) {
      deps.logger.debug({ now: now.toISOString() }, 'No batched notifications due');
      return 0;
    }

    const digest = renderDigest(pending);
    const { channel, adapter } = primaryAdapter(deps, NotificationPriority.BATCHED);
    const result = await deliver(adapter, digest);
    if (!result.success) {
      deps.logger.error(
        { channel, pending: pending.length, error: result.error },
        'Batch digest delivery failed; items remain pending',
      );
      return 0;
    }

    const marked = await withStorage('runBatch', () =>
      deps.notificationRepo.markSent(
        pending.map((n) => n.notificationId),
        now,
      ),
    );

    deps.auditLog.record(
      {
        priority: NotificationPriority.BATCHED,
        eventKind: EventKind.BATCH_DIGEST,
        message: digest,
        status: AuditStatus.SENT,
      },
      now,
    );
    deps.logger.info({ channel, count: marked }, 'Batch digest sent');
    return marked;
  });
}

/**
 * Sends the most recently created WEEKLY row due by `now`, verbatim, and
 * marks every due WEEKLY row sent. Returns true when a report went out.
 */
export async function runWeekly(deps: DigestServiceDeps, now: Date): Promise<boolean> {
  return deps.runLock.run(NotificationPriority.WEEKLY, async () => {
    const pending = await withStorage('runWeekly', () =>
      deps.notificationRepo.findPending(NotificationPriority.WEEKLY, now),
    );
    if (pending.length === 0) {
      deps.logger.debug({ now: now.toISOString() }, 'No weekly report due');
      return false;
    }

    const latest = pending[pending.length - 1];
    const { channel, adapter } = primaryAdapter(deps, NotificationPriority.WEEKLY);
    const result = await deliver(adapter, latest.message);
    if (!result.success) {
      deps.logger.error(
        { channel, notificationId: latest.notificationId, error: result.error },
        'Weekly report delivery failed; items remain pending',
      );
      return false;
    }

    const marked = await withStorage('runWeekly', () =>
      deps.notificationRepo.markSent(
        pending.map((n) => n.notificationId),
        now,
      ),
    );

    deps.auditLog.record(
      {
        priority: NotificationPriority.WEEKLY,
        eventKind: latest.context.event_kind,
        message: latest.message,
        status: AuditStatus.SENT,
      },
      now,
    );
    deps.logger.info(
      { channel, notificationId: latest.notificationId, superseded: marked - 1 },
      'Weekly report sent',
    );
    return true;
  });
}

// ---------------------------------------------------------------------------
// Scheduled Jobs
// ---------------------------------------------------------------------------

export interface RoutingJob {
  name: string;
  cronExpression: string;
  handler: () => Promise<void>;
}

/**
 * Job descriptors for an external scheduler: one per batch slot plus the
 * weekly slot. Cron expressions are in the process time zone.
 */
export function registerRoutingJobs(deps: DigestServiceDeps): RoutingJob[] {
  const { logger } = deps;
  const batchSlots =
    deps.policy.batchTimes.length > 0
      ? deps.policy.batchTimes
      : [{ hours: FALLBACK_BATCH_HOUR, minutes: 0 }];
  const weekly = resolveWeeklySlot(deps.policy.weeklyDay, deps.policy.weeklyTime);

  const jobs: RoutingJob[] = batchSlots.map((slot) => ({
    name: `batch-digest-${formatClockTime(slot).replace(':', '')}`,
    cronExpression: dailyCronExpression(slot),
    handler: async () => {
      logger.info({ slot: formatClockTime(slot) }, 'Starting batch digest run');
      try {
        const count = await runBatch(deps, deps.clock.now());
        logger.info({ count }, 'Batch digest run completed');
      } catch (err: unknown) {
        logger.error(
          { error: err instanceof Error ? err.message : String(err) },
          'Batch digest run failed',
        );
      }
    },
  }));

  jobs.push({
    name: 'weekly-digest',
    cronExpression: weeklyCronExpression(weekly.day, weekly.time),
    handler: async () => {
      logger.info('Starting weekly digest run');
      try {
        const sent = await runWeekly(deps, deps.clock.now());
        logger.info({ sent }, 'Weekly digest run completed');
      } catch (err: unknown) {
        logger.error(
          { error: err instanceof Error ? err.message : String(err) },
          'Weekly digest run failed',
        );
      }
    },
  });

  return jobs;
}
