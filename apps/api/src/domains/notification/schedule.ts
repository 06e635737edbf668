import {
  DEFAULT_WEEKLY_DAY,
  DEFAULT_WEEKLY_TIME,
  FALLBACK_BATCH_HOUR,
} from '@tidings/shared/constants/notification.constants.js';

// ---------------------------------------------------------------------------
// Wall-clock schedule arithmetic. All times are in the process time zone.
// ---------------------------------------------------------------------------

export interface RoutingClock {
  now(): Date;
}

export const systemClock: RoutingClock = { now: () => new Date() };

export interface ClockTime {
  hours: number;
  minutes: number;
}

export interface ScheduledSlot {
  scheduledFor: Date;
  /** True when configuration was unusable and the default slot was taken. */
  fallback: boolean;
}

const CLOCK_TIME_PATTERN = /^(\d{1,2}):(\d{2})$/;

/** Parses `H:MM` / `HH:MM`. Returns null for anything outside 00:00–23:59. */
export function parseClockTime(value: string): ClockTime | null {
  const match = CLOCK_TIME_PATTERN.exec(value.trim());
  if (!match) return null;

  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (hours > 23 || minutes > 59) return null;

  return { hours, minutes };
}

export function formatClockTime(time: ClockTime): string {
  return `${String(time.hours).padStart(2, '0')}:${String(time.minutes).padStart(2, '0')}`;
}

/**
 * Accepts a comma-separated string or a list. Malformed entries are dropped;
 * the result is sorted and free of duplicates.
 */
export function parseBatchTimes(input: string | readonly string[]): ClockTime[] {
  const raw = typeof input === 'string' ? input.split(',') : input;
  const byMinute = new Map<number, ClockTime>();

  for (const entry of raw) {
    const parsed = parseClockTime(entry);
    if (parsed) {
      byMinute.set(parsed.hours * 60 + parsed.minutes, parsed);
    }
  }

  return [...byMinute.entries()]
    .sort(([a], [b]) => a - b)
    .map(([, time]) => time);
}

function atTime(base: Date, dayOffset: number, time: ClockTime): Date {
  return new Date(
    base.getFullYear(),
    base.getMonth(),
    base.getDate() + dayOffset,
    time.hours,
    time.minutes,
    0,
    0,
  );
}

/**
 * Smallest configured slot strictly after `now`, wrapping to the first slot
 * of the next day. An empty list yields tomorrow 09:00.
 */
export function nextBatchTime(
  now: Date,
  batchTimes: readonly ClockTime[],
): ScheduledSlot {
  if (batchTimes.length === 0) {
    return {
      scheduledFor: atTime(now, 1, { hours: FALLBACK_BATCH_HOUR, minutes: 0 }),
      fallback: true,
    };
  }

  const sorted = [...batchTimes].sort(
    (a, b) => a.hours * 60 + a.minutes - (b.hours * 60 + b.minutes),
  );

  for (const time of sorted) {
    const candidate = atTime(now, 0, time);
    if (candidate.getTime() > now.getTime()) {
      return { scheduledFor: candidate, fallback: false };
    }
  }

  return { scheduledFor: atTime(now, 1, sorted[0]), fallback: false };
}

const DEFAULT_WEEKLY_SLOT: ClockTime = parseClockTime(DEFAULT_WEEKLY_TIME) ?? {
  hours: 20,
  minutes: 0,
};

function isWeekday(day: number): boolean {
  return Number.isInteger(day) && day >= 0 && day <= 6;
}

/** The configured weekly slot, or Sunday 20:00 when day or time is unusable. */
export function resolveWeeklySlot(
  day: number,
  time: ClockTime | null,
): { day: number; time: ClockTime; fallback: boolean } {
  if (!isWeekday(day) || time === null) {
    return { day: DEFAULT_WEEKLY_DAY, time: DEFAULT_WEEKLY_SLOT, fallback: true };
  }
  return { day, time, fallback: false };
}

/** Next occurrence of the weekly slot strictly after `now`. */
export function nextWeeklyTime(
  now: Date,
  day: number,
  time: ClockTime | null,
): ScheduledSlot {
  const slot = resolveWeeklySlot(day, time);

  const daysAhead = (slot.day - now.getDay() + 7) % 7;
  let candidate = atTime(now, daysAhead, slot.time);
  if (candidate.getTime() <= now.getTime()) {
    candidate = atTime(now, daysAhead + 7, slot.time);
  }

  return { scheduledFor: candidate, fallback: slot.fallback };
}

// ---------------------------------------------------------------------------
// Cron expressions for an external scheduler (minute hour dom month dow)
// ---------------------------------------------------------------------------

export function dailyCronExpression(time: ClockTime): string {
  return `${time.minutes} ${time.hours} * * *`;
}

export function weeklyCronExpression(day: number, time: ClockTime): string {
  return `${time.minutes} ${time.hours} * * ${day}`;
}
