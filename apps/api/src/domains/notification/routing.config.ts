import {
  NotificationPriority,
  DEFAULT_PRIORITY_CHANNELS,
  DEFAULT_COOLDOWN_MS,
  DEFAULT_BATCH_TIMES,
  DEFAULT_WEEKLY_DAY,
  DEFAULT_WEEKLY_TIME,
  type NotificationChannel,
} from '@tidings/shared/constants/notification.constants.js';
import { type Env } from '../../lib/env.js';
import { parseBatchTimes, parseClockTime, type ClockTime } from './schedule.js';

// ---------------------------------------------------------------------------
// Routing Policy
// ---------------------------------------------------------------------------

export interface RoutingPolicy {
  /** Ordered channel list per priority; the first entry is the primary one. */
  channels: Readonly<Record<NotificationPriority, readonly NotificationChannel[]>>;
  cooldownMs: Readonly<Record<NotificationPriority, number>>;
  /** Overrides keyed by event kind; unknown kinds use the priority default. */
  eventKindCooldownMs: Readonly<Record<string, number>>;
  batchTimes: readonly ClockTime[];
  weeklyDay: number;
  /** Null when the configured value did not parse. */
  weeklyTime: ClockTime | null;
}

export const DEFAULT_ROUTING_POLICY: RoutingPolicy = {
  channels: DEFAULT_PRIORITY_CHANNELS,
  cooldownMs: DEFAULT_COOLDOWN_MS,
  eventKindCooldownMs: {},
  batchTimes: parseBatchTimes(DEFAULT_BATCH_TIMES),
  weeklyDay: DEFAULT_WEEKLY_DAY,
  weeklyTime: parseClockTime(DEFAULT_WEEKLY_TIME),
};

const HOUR_MS = 60 * 60 * 1000;

/**
 * Parses `kind=hours` pairs separated by commas, e.g.
 * `blocker_resolved=2,task_status=12`. Malformed pairs are skipped.
 */
export function parseCooldownOverrides(input: string): Record<string, number> {
  const overrides: Record<string, number> = Object.create(null);
  for (const pair of input.split(',')) {
    const [kind, hours] = pair.split('=').map((s) => s.trim());
    if (!kind || !hours) continue;
    const value = Number(hours);
    if (Number.isFinite(value) && value > 0) {
      overrides[kind] = value * HOUR_MS;
    }
  }
  return overrides;
}

export function buildRoutingPolicy(env: Env): RoutingPolicy {
  return {
    channels: DEFAULT_PRIORITY_CHANNELS,
    cooldownMs: {
      [NotificationPriority.IMMEDIATE]: env.COOLDOWN_IMMEDIATE_HOURS * HOUR_MS,
      [NotificationPriority.BATCHED]: env.COOLDOWN_BATCHED_HOURS * HOUR_MS,
      [NotificationPriority.WEEKLY]: env.COOLDOWN_WEEKLY_HOURS * HOUR_MS,
      [NotificationPriority.SILENT]: env.COOLDOWN_SILENT_HOURS * HOUR_MS,
    },
    eventKindCooldownMs: parseCooldownOverrides(env.COOLDOWN_OVERRIDES),
    batchTimes: parseBatchTimes(env.BATCH_TIMES),
    weeklyDay: env.WEEKLY_DAY,
    weeklyTime: parseClockTime(env.WEEKLY_TIME),
  };
}

export function resolveCooldownMs(
  policy: RoutingPolicy,
  priority: NotificationPriority,
  eventKind: string,
): number {
  // Own keys only: event kinds such as `constructor` must not hit Object.prototype.
  if (Object.hasOwn(policy.eventKindCooldownMs, eventKind)) {
    return policy.eventKindCooldownMs[eventKind];
  }
  return policy.cooldownMs[priority];
}
