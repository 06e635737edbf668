// ============================================================================
// Notification Routing — Constants
// ============================================================================

// --- Notification Priority ---

export const NotificationPriority = {
  IMMEDIATE: 'IMMEDIATE',
  BATCHED: 'BATCHED',
  WEEKLY: 'WEEKLY',
  SILENT: 'SILENT',
} as const;

export type NotificationPriority =
  (typeof NotificationPriority)[keyof typeof NotificationPriority];

export const NOTIFICATION_PRIORITIES = [
  NotificationPriority.IMMEDIATE,
  NotificationPriority.BATCHED,
  NotificationPriority.WEEKLY,
  NotificationPriority.SILENT,
] as const;

// --- Notification Channel ---

export const NotificationChannel = {
  PRIMARY_CHAT: 'PRIMARY_CHAT',
  SHORT_MESSAGE: 'SHORT_MESSAGE',
  LOG_ONLY: 'LOG_ONLY',
} as const;

export type NotificationChannel =
  (typeof NotificationChannel)[keyof typeof NotificationChannel];

// --- Intake Outcome ---

export const IntakeOutcome = {
  CREATED: 'CREATED',
  SUPPRESSED: 'SUPPRESSED',
  LOGGED: 'LOGGED',
} as const;

export type IntakeOutcome = (typeof IntakeOutcome)[keyof typeof IntakeOutcome];

// --- Default Channel Fan-out (per priority) ---
// IMMEDIATE goes to both chat and short message; the rest reach one channel.

export const DEFAULT_PRIORITY_CHANNELS: Readonly<
  Record<NotificationPriority, readonly NotificationChannel[]>
> = Object.freeze({
  [NotificationPriority.IMMEDIATE]: Object.freeze([
    NotificationChannel.PRIMARY_CHAT,
    NotificationChannel.SHORT_MESSAGE,
  ]),
  [NotificationPriority.BATCHED]: Object.freeze([NotificationChannel.PRIMARY_CHAT]),
  [NotificationPriority.WEEKLY]: Object.freeze([NotificationChannel.PRIMARY_CHAT]),
  [NotificationPriority.SILENT]: Object.freeze([NotificationChannel.LOG_ONLY]),
});

// --- Dedup Cooldown Windows ---

const HOUR_MS = 60 * 60 * 1000;

export const DEFAULT_COOLDOWN_MS: Readonly<Record<NotificationPriority, number>> =
  Object.freeze({
    [NotificationPriority.IMMEDIATE]: 4 * HOUR_MS,
    [NotificationPriority.BATCHED]: 8 * HOUR_MS,
    [NotificationPriority.WEEKLY]: 7 * 24 * HOUR_MS,
    [NotificationPriority.SILENT]: 1 * HOUR_MS,
  });

// --- Schedule Defaults (process-local wall clock) ---

export const DEFAULT_BATCH_TIMES: readonly string[] = Object.freeze([
  '09:00',
  '13:00',
  '17:00',
]);

/** 0 = Sunday, matching Date#getDay(). */
export const DEFAULT_WEEKLY_DAY = 0;
export const DEFAULT_WEEKLY_TIME = '20:00';

/** Used when the batch-time list is empty or entirely malformed. */
export const FALLBACK_BATCH_HOUR = 9;

// --- Rendering ---

export const URGENT_PREFIX = '[URGENT] ';
export const SHORT_MESSAGE_MAX_LENGTH = 160;
export const DIGEST_HEADER = '=== Daily Update ===';
export const DIGEST_FALLBACK_GROUP = 'other';
export const AUDIT_MESSAGE_MAX_LENGTH = 200;

// --- Well-known Event Kinds ---
// Open string space: detectors may emit kinds not listed here.

export const EventKind = {
  BLOCKER_RESOLVED: 'blocker_resolved',
  BLOCKER_ESCALATION: 'blocker_escalation',
  DEADLINE_URGENT: 'deadline_urgent',
  TASK_STATUS: 'task_status',
  WIP_WARNING: 'wip_warning',
  NEW_BLOCKER: 'new_blocker',
  WEEKLY_REPORT: 'weekly_report',
  BATCH_DIGEST: 'batch_digest',
} as const;

// --- Detector Heuristics ---

export const URGENT_DEADLINE_HOURS = 24;
export const DEADLINE_ITEMS_IN_MESSAGE = 3;

export const RESOLUTION_KEYWORDS: readonly string[] = Object.freeze([
  'attached',
  'here is',
  'completed',
  'finished',
  'done',
  'ready',
  'sent',
  'enclosed',
  'please find',
]);

export const ESCALATION_KEYWORDS: readonly string[] = Object.freeze([
  'need more',
  'additional',
  'question',
  'clarify',
  'missing',
  'waiting',
  'require',
  'please provide',
]);
