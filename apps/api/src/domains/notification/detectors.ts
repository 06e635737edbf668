import {
  EventKind,
  URGENT_DEADLINE_HOURS,
  DEADLINE_ITEMS_IN_MESSAGE,
  RESOLUTION_KEYWORDS,
  ESCALATION_KEYWORDS,
  IntakeOutcome,
} from '@tidings/shared/constants/notification.constants.js';
import { type SelectNotification } from '@tidings/shared/schemas/db/notification.schema.js';
import { type IntakeResult, type NotificationRouter } from './notification.service.js';

// ============================================================================
// Trigger detectors
//
// Stateless helpers that turn supplied domain state into router intakes.
// They decide what to say; the router decides when and whether to send.
// ============================================================================

export type RouterIntake = Pick<
  NotificationRouter,
  'intakeImmediate' | 'intakeBatched' | 'intakeWeekly'
>;

export interface FullKitItem {
  description: string;
  satisfied: boolean;
}

export interface DeadlineTask {
  id: string;
  title: string;
  status: string;
  dueAt: Date | string | null;
  fullKit: readonly FullKitItem[];
}

export interface Blocker {
  id: string;
  description: string;
  waitingOn?: string | null;
  watchPattern?: string | null;
  resolved?: boolean;
}

export interface InboundMessage {
  from: string;
  subject: string;
  body: string;
}

const HOUR_MS = 60 * 60 * 1000;

function created(results: IntakeResult[]): SelectNotification[] {
  const notifications: SelectNotification[] = [];
  for (const result of results) {
    if (result.outcome === IntakeOutcome.CREATED) {
      notifications.push(result.notification);
    }
  }
  return notifications;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Whole hours from `now` to `due`, floored at 0. Unparseable input gives 0. */
export function hoursUntil(due: Date | string, now: Date): number {
  const dueMs = (due instanceof Date ? due : new Date(due)).getTime();
  if (Number.isNaN(dueMs)) return 0;
  return Math.max(0, Math.trunc((dueMs - now.getTime()) / HOUR_MS));
}

/**
 * An inbound message matches when its sender contains the blocker's
 * `waitingOn`, or its subject or body contains the watch pattern.
 * Case-insensitive.
 */
export function matchesBlocker(blocker: Blocker, inbound: InboundMessage): boolean {
  const waitingOn = blocker.waitingOn?.toLowerCase() ?? '';
  const pattern = blocker.watchPattern?.toLowerCase() ?? '';
  if (!waitingOn && !pattern) return false;

  if (waitingOn && inbound.from.toLowerCase().includes(waitingOn)) {
    return true;
  }

  if (pattern) {
    return (
      inbound.subject.toLowerCase().includes(pattern) ||
      inbound.body.toLowerCase().includes(pattern)
    );
  }

  return false;
}

/** Resolution keywords must outscore escalation keywords. */
export function isResolution(inbound: Pick<InboundMessage, 'subject' | 'body'>): boolean {
  const text = `${inbound.subject} ${inbound.body}`.toLowerCase();
  const score = (keywords: readonly string[]) =>
    keywords.filter((keyword) => text.includes(keyword)).length;

  return score(RESOLUTION_KEYWORDS) > score(ESCALATION_KEYWORDS);
}

// ---------------------------------------------------------------------------
// Immediate triggers
// ---------------------------------------------------------------------------

/**
 * Tasks due within 24h that are not completed and still have unsatisfied
 * full-kit items. Overdue tasks are included and report 0h.
 */
export async function checkUrgentDeadlines(
  router: RouterIntake,
  tasks: readonly DeadlineTask[],
  now: Date,
): Promise<SelectNotification[]> {
  const horizon = now.getTime() + URGENT_DEADLINE_HOURS * HOUR_MS;
  const results: IntakeResult[] = [];

  for (const task of tasks) {
    if (task.status === 'completed' || task.dueAt === null) continue;
    const dueMs = new Date(task.dueAt).getTime();
    if (Number.isNaN(dueMs) || dueMs > horizon) continue;

    const incomplete = task.fullKit.filter((item) => !item.satisfied);
    if (incomplete.length === 0) continue;

    const hoursLeft = hoursUntil(task.dueAt, now);
    const items = incomplete
      .slice(0, DEADLINE_ITEMS_IN_MESSAGE)
      .map((item) => item.description)
      .join(', ');

    results.push(
      await router.intakeImmediate({
        message: `'${task.title}' due in ${hoursLeft}h, waiting on: ${items}`,
        eventKind: EventKind.DEADLINE_URGENT,
        sourceEntityId: task.id,
        context: { hours_left: hoursLeft, incomplete_items: incomplete.length },
      }),
    );
  }

  return created(results);
}

export interface BlockerCheckResult {
  notifications: SelectNotification[];
  /** Blockers the inbound message resolved; the caller marks them resolved. */
  resolvedBlockerIds: string[];
}

export async function checkBlockerUpdates(
  router: RouterIntake,
  blockers: readonly Blocker[],
  inbound: InboundMessage,
): Promise<BlockerCheckResult> {
  const results: IntakeResult[] = [];
  const resolvedBlockerIds: string[] = [];

  for (const blocker of blockers) {
    if (blocker.resolved || !matchesBlocker(blocker, inbound)) continue;

    const resolution = isResolution(inbound);
    if (resolution) {
      resolvedBlockerIds.push(blocker.id);
    }

    results.push(
      await router.intakeImmediate({
        message: resolution
          ? `UNBLOCKED: ${blocker.description} - Email from ${inbound.from}`
          : `BLOCKER UPDATE: ${blocker.description} - ${inbound.from} sent update`,
        eventKind: resolution ? EventKind.BLOCKER_RESOLVED : EventKind.BLOCKER_ESCALATION,
        sourceEntityId: blocker.id,
        context: { email_from: inbound.from, email_subject: inbound.subject },
      }),
    );
  }

  return { notifications: created(results), resolvedBlockerIds };
}

// ---------------------------------------------------------------------------
// Batched triggers
// ---------------------------------------------------------------------------

export function notifyTaskStatusChange(
  router: RouterIntake,
  task: { id: string; title: string },
  oldStatus: string,
  newStatus: string,
): Promise<IntakeResult> {
  return router.intakeBatched({
    message: `Task '${task.title}': ${oldStatus} -> ${newStatus}`,
    eventKind: EventKind.TASK_STATUS,
    sourceEntityId: task.id,
    context: { old_status: oldStatus, new_status: newStatus },
  });
}

/** Quiet until one slot remains. Null source: one warning per cooldown. */
export async function notifyWipWarning(
  router: RouterIntake,
  current: number,
  limit: number,
): Promise<IntakeResult | null> {
  if (current < limit - 1) return null;

  const state = current >= limit ? 'AT LIMIT' : 'one slot remaining';
  return router.intakeBatched({
    message: `WIP at ${current}/${limit} - ${state}`,
    eventKind: EventKind.WIP_WARNING,
    sourceEntityId: null,
    context: { current, limit },
  });
}

export function notifyNewBlocker(
  router: RouterIntake,
  blocker: Pick<Blocker, 'id' | 'description' | 'waitingOn'>,
): Promise<IntakeResult> {
  const waitingOn = blocker.waitingOn ?? null;
  return router.intakeBatched({
    message: waitingOn
      ? `New blocker: ${blocker.description} (waiting on ${waitingOn})`
      : `New blocker: ${blocker.description}`,
    eventKind: EventKind.NEW_BLOCKER,
    sourceEntityId: blocker.id,
    context: { description: blocker.description, waiting_on: waitingOn },
  });
}

// ---------------------------------------------------------------------------
// Weekly trigger
// ---------------------------------------------------------------------------

export function queueWeeklyReport(
  router: RouterIntake,
  reportText: string,
  opts: { sourceEntityId?: string | null; metadata?: Record<string, unknown> } = {},
): Promise<IntakeResult> {
  return router.intakeWeekly({
    message: reportText,
    eventKind: EventKind.WEEKLY_REPORT,
    sourceEntityId: opts.sourceEntityId ?? null,
    context: opts.metadata ?? {},
  });
}
