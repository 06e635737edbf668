import { type NotificationPriority } from '@tidings/shared/constants/notification.constants.js';
import { type DedupRepository } from './dedup.repository.js';
import { resolveCooldownMs, type RoutingPolicy } from './routing.config.js';
import { type RoutingClock } from './schedule.js';

// ---------------------------------------------------------------------------
// Dedup Ledger
//
// Keyed by (event kind, source entity id). A null source is its own key: it
// matches other null-source entries of the same kind and nothing else.
// ---------------------------------------------------------------------------

export interface DedupLedgerDeps {
  repo: DedupRepository;
  policy: RoutingPolicy;
  clock: RoutingClock;
}

export function createDedupLedger(deps: DedupLedgerDeps) {
  function cutoffFor(
    priority: NotificationPriority,
    eventKind: string,
    now: Date,
  ): Date {
    return new Date(
      now.getTime() - resolveCooldownMs(deps.policy, priority, eventKind),
    );
  }

  return {
    /** True iff the key was last recorded strictly inside the cooldown window. */
    async isDuplicate(
      priority: NotificationPriority,
      eventKind: string,
      sourceEntityId: string | null,
    ): Promise<boolean> {
      const entry = await deps.repo.findEntry(eventKind, sourceEntityId);
      if (!entry) return false;
      const cutoff = cutoffFor(priority, eventKind, deps.clock.now());
      return entry.lastSentAt.getTime() > cutoff.getTime();
    },

    async record(eventKind: string, sourceEntityId: string | null): Promise<void> {
      await deps.repo.upsertEntry(eventKind, sourceEntityId, deps.clock.now());
    },

    /**
     * isDuplicate + record as one conditional upsert. Returns true when the
     * caller may go ahead; of two concurrent claims on a key only one wins.
     */
    async claim(
      priority: NotificationPriority,
      eventKind: string,
      sourceEntityId: string | null,
    ): Promise<boolean> {
      const now = deps.clock.now();
      return deps.repo.claimEntry(
        eventKind,
        sourceEntityId,
        now,
        cutoffFor(priority, eventKind, now),
      );
    },
  };
}

export type DedupLedger = ReturnType<typeof createDedupLedger>;
