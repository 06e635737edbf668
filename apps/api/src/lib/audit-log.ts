import { pino, type DestinationStream } from 'pino';
import {
  AUDIT_MESSAGE_MAX_LENGTH,
  type NotificationPriority,
} from '@tidings/shared/constants/notification.constants.js';

// ---------------------------------------------------------------------------
// Audit log: append-only JSON lines, one per intake and per digest send.
// Never read back by the service.
// ---------------------------------------------------------------------------

export const AuditStatus = {
  QUEUED: 'queued',
  SENT: 'sent',
  SUPPRESSED: 'suppressed',
  LOGGED: 'logged',
} as const;

export type AuditStatus = (typeof AuditStatus)[keyof typeof AuditStatus];

export interface AuditEntry {
  priority: NotificationPriority;
  eventKind: string;
  message: string;
  status: AuditStatus;
}

export interface AuditLog {
  record(entry: AuditEntry, at: Date): void;
}

export function createAuditLog(destination: string | DestinationStream): AuditLog {
  const stream =
    typeof destination === 'string'
      ? pino.destination({ dest: destination, mkdir: true, sync: true })
      : destination;

  // Bare lines: no level, pid, hostname or pino timestamp.
  const writer = pino(
    {
      base: null,
      timestamp: false,
      formatters: { level: () => ({}) },
    },
    stream,
  );

  return {
    record(entry: AuditEntry, at: Date): void {
      writer.info({
        timestamp: at.toISOString(),
        priority: entry.priority,
        event_kind: entry.eventKind,
        message: entry.message.slice(0, AUDIT_MESSAGE_MAX_LENGTH),
        status: entry.status,
      });
    },
  };
}
