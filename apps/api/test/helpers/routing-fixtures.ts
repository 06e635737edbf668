import { vi } from 'vitest';
import {
  NotificationChannel,
} from '@tidings/shared/constants/notification.constants.js';
import { type AuditEntry, type AuditLog } from '../../src/lib/audit-log.js';
import {
  type ChannelAdapter,
  type ChannelRegistry,
  type SendResult,
} from '../../src/domains/notification/channels.js';
import { type RoutingClock } from '../../src/domains/notification/schedule.js';

// ---------------------------------------------------------------------------
// Clock
// ---------------------------------------------------------------------------

export interface FakeClock extends RoutingClock {
  set(at: Date): void;
  advance(ms: number): void;
}

export function createFakeClock(start: Date): FakeClock {
  let current = start.getTime();
  return {
    now: () => new Date(current),
    set(at: Date) {
      current = at.getTime();
    },
    advance(ms: number) {
      current += ms;
    },
  };
}

export const HOUR_MS = 60 * 60 * 1000;

// ---------------------------------------------------------------------------
// Channel adapters
// ---------------------------------------------------------------------------

export interface RecordingAdapter extends ChannelAdapter {
  sent: string[];
  /** Every send fails with `error` until cleared with null. */
  failWith(error: string | null): void;
  /** Every send throws `error` until cleared with null. */
  throwWith(error: Error | null): void;
}

export function createRecordingAdapter(channel: NotificationChannel): RecordingAdapter {
  const sent: string[] = [];
  let failure: string | null = null;
  let thrown: Error | null = null;

  return {
    channel,
    recipient: `test:${channel.toLowerCase()}`,
    sent,
    failWith(error: string | null) {
      failure = error;
    },
    throwWith(error: Error | null) {
      thrown = error;
    },
    async send(text: string): Promise<SendResult> {
      if (thrown) throw thrown;
      if (failure) return { success: false, error: failure };
      sent.push(text);
      return { success: true };
    },
  };
}

export interface RecordingChannels {
  chat: RecordingAdapter;
  sms: RecordingAdapter;
  log: RecordingAdapter;
  registry: ChannelRegistry;
}

export function createRecordingChannels(): RecordingChannels {
  const chat = createRecordingAdapter(NotificationChannel.PRIMARY_CHAT);
  const sms = createRecordingAdapter(NotificationChannel.SHORT_MESSAGE);
  const log = createRecordingAdapter(NotificationChannel.LOG_ONLY);
  return {
    chat,
    sms,
    log,
    registry: {
      [NotificationChannel.PRIMARY_CHAT]: chat,
      [NotificationChannel.SHORT_MESSAGE]: sms,
      [NotificationChannel.LOG_ONLY]: log,
    },
  };
}

// ---------------------------------------------------------------------------
// Audit log and logger
// ---------------------------------------------------------------------------

export interface RecordingAuditLog extends AuditLog {
  entries: Array<AuditEntry & { at: Date }>;
}

export function createRecordingAuditLog(): RecordingAuditLog {
  const entries: Array<AuditEntry & { at: Date }> = [];
  return {
    entries,
    record(entry: AuditEntry, at: Date) {
      entries.push({ ...entry, at });
    },
  };
}

export function createMockLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}
