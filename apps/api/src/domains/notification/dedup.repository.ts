import { eq, and, isNull, lte } from 'drizzle-orm';
import {
  dedupLedger,
  type SelectDedupEntry,
} from '@tidings/shared/schemas/db/notification.schema.js';
import { type Database } from '../../lib/db.js';

export function createDedupRepository(db: Database) {
  return {
    async findEntry(
      eventKind: string,
      sourceEntityId: string | null,
    ): Promise<SelectDedupEntry | undefined> {
      const rows = await db
        .select()
        .from(dedupLedger)
        .where(
          and(
            eq(dedupLedger.eventKind, eventKind),
            sourceEntityId === null
              ? isNull(dedupLedger.sourceEntityId)
              : eq(dedupLedger.sourceEntityId, sourceEntityId),
          ),
        )
        .limit(1);
      return rows[0];
    },

    async upsertEntry(
      eventKind: string,
      sourceEntityId: string | null,
      lastSentAt: Date,
    ): Promise<void> {
      await db
        .insert(dedupLedger)
        .values({ eventKind, sourceEntityId, lastSentAt })
        .onConflictDoUpdate({
          target: [dedupLedger.eventKind, dedupLedger.sourceEntityId],
          set: { lastSentAt },
        });
    },

    /**
     * Inserts the key, or moves `lastSentAt` forward only when the stored
     * value is at or before `cutoff`. A returned row means the key was taken.
     */
    async claimEntry(
      eventKind: string,
      sourceEntityId: string | null,
      lastSentAt: Date,
      cutoff: Date,
    ): Promise<boolean> {
      const rows = await db
        .insert(dedupLedger)
        .values({ eventKind, sourceEntityId, lastSentAt })
        .onConflictDoUpdate({
          target: [dedupLedger.eventKind, dedupLedger.sourceEntityId],
          set: { lastSentAt },
          setWhere: lte(dedupLedger.lastSentAt, cutoff),
        })
        .returning({ eventKind: dedupLedger.eventKind });
      return rows.length > 0;
    },
  };
}

export type DedupRepository = ReturnType<typeof createDedupRepository>;
