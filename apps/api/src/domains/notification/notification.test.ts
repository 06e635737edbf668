import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createNotificationRepository } from './notification.repository.js';
import { createDedupRepository } from './dedup.repository.js';
import { createRoutingStore, withStorage } from './routing.store.js';
import { StorageUnavailableError, NotFoundError } from '../../lib/errors.js';
import { type InsertNotification } from '@tidings/shared/schemas/db/notification.schema.js';

// ---------------------------------------------------------------------------
// Helpers: in-memory tables
// ---------------------------------------------------------------------------

let notificationStore: Record<string, any>[];
let dedupStore: Record<string, any>[];
let idSeq: number;

function getStoreForTable(table: any): Record<string, any>[] {
  if (table?.__table === 'dedup_ledger') return dedupStore;
  return notificationStore;
}

// ---------------------------------------------------------------------------
// Mock Drizzle DB
// ---------------------------------------------------------------------------

function makeMockDb() {
  function chainable(ctx: {
    op: string;
    table?: any;
    values?: any;
    setClauses?: any;
    fields?: any;
    whereClauses: Array<(row: any) => boolean>;
    limitN?: number;
    offsetN?: number;
    orderByFn?: (a: any, b: any) => number;
    onConflictUpdate?: any;
  }) {
    const chain: any = {
      _ctx: ctx,
      values(v: any) { ctx.values = v; return chain; },
      set(s: any) { ctx.setClauses = s; return chain; },
      from(table: any) { ctx.table = table; return chain; },
      where(clause: any) {
        if (clause && typeof clause === 'object' && clause.__predicate) {
          ctx.whereClauses.push(clause.__predicate);
        }
        return chain;
      },
      limit(n: number) { ctx.limitN = n; return chain; },
      offset(n: number) { ctx.offsetN = n; return chain; },
      orderBy(orderSpec: any) {
        if (orderSpec && orderSpec.__orderByFn) {
          ctx.orderByFn = orderSpec.__orderByFn;
        }
        return chain;
      },
      onConflictDoUpdate(config: any) {
        ctx.onConflictUpdate = config;
        return chain;
      },
      returning() { return chain; },
      then(resolve: any, reject?: any) {
        try {
          resolve(executeOp(ctx));
        } catch (e) {
          if (reject) reject(e); else throw e;
        }
      },
    };
    return chain;
  }

  function insertRow(table: any, values: any): any {
    if (table.__table === 'dedup_ledger') {
      return { ...values };
    }
    idSeq += 1;
    return {
      notificationId: values.notificationId ?? `00000000-0000-4000-8000-${String(idSeq).padStart(12, '0')}`,
      priority: values.priority,
      channel: values.channel,
      message: values.message,
      context: values.context,
      scheduledFor: values.scheduledFor ?? null,
      sentAt: values.sentAt ?? null,
      createdAt: values.createdAt ?? new Date(),
    };
  }

  function executeOp(ctx: any): any[] {
    const store = getStoreForTable(ctx.table);
    switch (ctx.op) {
      case 'select': {
        let rows = store.filter((row) => ctx.whereClauses.every((p: any) => p(row)));
        if (ctx.fields?.value?.__count) return [{ value: rows.length }];
        if (ctx.orderByFn) rows = [...rows].sort(ctx.orderByFn);
        if (ctx.offsetN) rows = rows.slice(ctx.offsetN);
        if (ctx.limitN !== undefined) rows = rows.slice(0, ctx.limitN);
        return rows.map((r) => ({ ...r }));
      }
      case 'insert': {
        const row = insertRow(ctx.table, ctx.values);
        if (ctx.onConflictUpdate) {
          const target: any[] = ctx.onConflictUpdate.target;
          const existing = store.find((r) => target.every((col) => r[col.name] === row[col.name]));
          if (existing) {
            const setWhere = ctx.onConflictUpdate.setWhere;
            if (setWhere && !setWhere.__predicate(existing)) return [];
            Object.assign(existing, ctx.onConflictUpdate.set);
            return [{ ...existing }];
          }
        }
        store.push(row);
        return [{ ...row }];
      }
      case 'update': {
        const matched = store.filter((row) => ctx.whereClauses.every((p: any) => p(row)));
        for (const row of matched) Object.assign(row, ctx.setClauses);
        return matched.map((r) => ({ ...r }));
      }
      default:
        return [];
    }
  }

  const mockDb: any = {
    insert(table: any) { return chainable({ op: 'insert', table, whereClauses: [] }); },
    select(fields?: any) { return chainable({ op: 'select', fields, whereClauses: [] }); },
    update(table: any) { return chainable({ op: 'update', table, whereClauses: [] }); },
    transaction: vi.fn(async (fn: (tx: any) => Promise<unknown>) => fn(mockDb)),
  };
  return mockDb;
}

// ---------------------------------------------------------------------------
// Mock drizzle-orm operators
// ---------------------------------------------------------------------------

vi.mock('drizzle-orm', () => {
  const toComparable = (v: any) => (v instanceof Date ? v.getTime() : v);
  return {
    eq: (column: any, value: any) => ({
      __predicate: (row: any) => row[column?.name] === value,
    }),
    and: (...conditions: any[]) => {
      const preds = conditions.filter(Boolean);
      return {
        __predicate: (row: any) => preds.every((p: any) => (p?.__predicate ? p.__predicate(row) : true)),
      };
    },
    isNull: (column: any) => ({
      __predicate: (row: any) => row[column?.name] === null || row[column?.name] === undefined,
    }),
    inArray: (column: any, values: any[]) => ({
      __predicate: (row: any) => values.includes(row[column?.name]),
    }),
    lte: (column: any, value: any) => ({
      __predicate: (row: any) => {
        const rowVal = row[column?.name];
        if (rowVal === null || rowVal === undefined) return false;
        return toComparable(rowVal) <= toComparable(value);
      },
    }),
    asc: (column: any) => ({
      __orderByFn: (a: any, b: any) => toComparable(a[column?.name]) - toComparable(b[column?.name]),
    }),
    desc: (column: any) => ({
      __orderByFn: (a: any, b: any) => toComparable(b[column?.name]) - toComparable(a[column?.name]),
    }),
    sql: () => ({}),
    count: () => ({ __count: true }),
  };
});

vi.mock('@tidings/shared/schemas/db/notification.schema.js', () => {
  const mkCol = (name: string) => ({ name });
  return {
    notifications: {
      __table: 'notifications',
      notificationId: mkCol('notificationId'),
      priority: mkCol('priority'),
      channel: mkCol('channel'),
      message: mkCol('message'),
      context: mkCol('context'),
      scheduledFor: mkCol('scheduledFor'),
      sentAt: mkCol('sentAt'),
      createdAt: mkCol('createdAt'),
    },
    dedupLedger: {
      __table: 'dedup_ledger',
      eventKind: mkCol('eventKind'),
      sourceEntityId: mkCol('sourceEntityId'),
      lastSentAt: mkCol('lastSentAt'),
    },
  };
});

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const T0 = new Date('2026-03-10T10:00:00.000Z');
const MINUTE_MS = 60 * 1000;

function at(minutes: number): Date {
  return new Date(T0.getTime() + minutes * MINUTE_MS);
}

function notificationInput(overrides: Partial<InsertNotification> = {}): InsertNotification {
  return {
    priority: 'BATCHED',
    channel: 'PRIMARY_CHAT',
    message: 'Task moved',
    context: { event_kind: 'task_status', source_entity_id: 't-1', metadata: {} },
    scheduledFor: at(180),
    createdAt: T0,
    ...overrides,
  };
}

beforeEach(() => {
  notificationStore = [];
  dedupStore = [];
  idSeq = 0;
});

// ============================================================================
// Notification repository
// ============================================================================

describe('NotificationRepository', () => {
  it('createNotification returns the stored row', async () => {
    const repo = createNotificationRepository(makeMockDb());

    const row = await repo.createNotification(notificationInput());

    expect(row.notificationId).toBe('00000000-0000-4000-8000-000000000001');
    expect(row.sentAt).toBeNull();
    expect(notificationStore).toHaveLength(1);
  });

  it('findNotificationById returns undefined for an unknown id', async () => {
    const repo = createNotificationRepository(makeMockDb());
    await repo.createNotification(notificationInput());

    expect(await repo.findNotificationById('00000000-0000-4000-8000-000000000099')).toBeUndefined();
    expect((await repo.findNotificationById('00000000-0000-4000-8000-000000000001'))?.message).toBe('Task moved');
  });

  it('findPending filters by priority, pending state and due time, oldest first', async () => {
    const repo = createNotificationRepository(makeMockDb());
    await repo.createNotification(notificationInput({ message: 'later', createdAt: at(2) }));
    await repo.createNotification(notificationInput({ message: 'earlier', createdAt: at(1) }));
    await repo.createNotification(notificationInput({ message: 'not due', scheduledFor: at(600) }));
    await repo.createNotification(notificationInput({ message: 'weekly', priority: 'WEEKLY' }));
    await repo.createNotification(notificationInput({ message: 'sent', sentAt: at(5) }));

    const due = await repo.findPending('BATCHED', at(180));
    expect(due.map((n) => n.message)).toEqual(['earlier', 'later']);

    const all = await repo.findPending('BATCHED');
    expect(all).toHaveLength(3);
  });

  it('markSent only touches rows that are still pending', async () => {
    const repo = createNotificationRepository(makeMockDb());
    const a = await repo.createNotification(notificationInput());
    const b = await repo.createNotification(notificationInput({ sentAt: at(1) }));

    const count = await repo.markSent([a.notificationId, b.notificationId], at(200));

    expect(count).toBe(1);
    expect(notificationStore[0].sentAt).toEqual(at(200));
    expect(notificationStore[1].sentAt).toEqual(at(1));
  });

  it('countPending counts unsent rows of one priority', async () => {
    const repo = createNotificationRepository(makeMockDb());
    await repo.createNotification(notificationInput());
    await repo.createNotification(notificationInput({ sentAt: at(1) }));
    await repo.createNotification(notificationInput({ priority: 'WEEKLY' }));

    expect(await repo.countPending('BATCHED')).toBe(1);
    expect(await repo.countPending('IMMEDIATE')).toBe(0);
  });

  it('markSent with no ids is a no-op', async () => {
    const repo = createNotificationRepository(makeMockDb());
    expect(await repo.markSent([], at(1))).toBe(0);
  });

  it('listNotifications pages newest first with optional filters', async () => {
    const repo = createNotificationRepository(makeMockDb());
    await repo.createNotification(notificationInput({ message: 'one', createdAt: at(1) }));
    await repo.createNotification(notificationInput({ message: 'two', createdAt: at(2), sentAt: at(3) }));
    await repo.createNotification(notificationInput({ message: 'three', createdAt: at(3), priority: 'WEEKLY' }));

    const page = await repo.listNotifications({ limit: 2, offset: 0 });
    expect(page.map((n) => n.message)).toEqual(['three', 'two']);

    const pending = await repo.listNotifications({ pendingOnly: true, priority: 'BATCHED', limit: 10, offset: 0 });
    expect(pending.map((n) => n.message)).toEqual(['one']);
  });
});

// ============================================================================
// Dedup repository
// ============================================================================

describe('DedupRepository', () => {
  it('claimEntry inserts a new key', async () => {
    const repo = createDedupRepository(makeMockDb());

    expect(await repo.claimEntry('task_status', 't-1', T0, at(-480))).toBe(true);
    expect(dedupStore).toEqual([{ eventKind: 'task_status', sourceEntityId: 't-1', lastSentAt: T0 }]);
  });

  it('claimEntry refuses while the stored time is after the cutoff', async () => {
    const repo = createDedupRepository(makeMockDb());
    await repo.claimEntry('task_status', 't-1', T0, at(-480));

    expect(await repo.claimEntry('task_status', 't-1', at(60), at(-420))).toBe(false);
    expect(dedupStore[0].lastSentAt).toEqual(T0);
  });

  it('claimEntry moves the timestamp once the cutoff passes it', async () => {
    const repo = createDedupRepository(makeMockDb());
    await repo.claimEntry('task_status', 't-1', T0, at(-480));

    expect(await repo.claimEntry('task_status', 't-1', at(480), T0)).toBe(true);
    expect(dedupStore).toHaveLength(1);
    expect(dedupStore[0].lastSentAt).toEqual(at(480));
  });

  it('claimEntry upserts on the dedup key, guarded by the cutoff', async () => {
    const db = makeMockDb();
    const insertSpy = vi.spyOn(db, 'insert');
    const repo = createDedupRepository(db);
    await repo.claimEntry('task_status', 't-1', T0, at(-480));

    const config = insertSpy.mock.results[0].value._ctx.onConflictUpdate;
    expect(config.target.map((col: any) => col.name)).toEqual(['eventKind', 'sourceEntityId']);
    expect(config.set).toEqual({ lastSentAt: T0 });
    expect(config.setWhere.__predicate({ lastSentAt: at(-480) })).toBe(true);
    expect(config.setWhere.__predicate({ lastSentAt: at(-479) })).toBe(false);
  });

  it('claimEntry returns no row for a conflicting claim inside the window', async () => {
    const repo = createDedupRepository(makeMockDb());
    await repo.claimEntry('task_status', 't-1', T0, at(-480));

    const [first, second] = await Promise.all([
      repo.claimEntry('task_status', 't-1', at(10), at(-470)),
      repo.claimEntry('task_status', 't-1', at(10), at(-470)),
    ]);

    expect([first, second]).toEqual([false, false]);
    expect(dedupStore).toEqual([{ eventKind: 'task_status', sourceEntityId: 't-1', lastSentAt: T0 }]);
  });

  it('treats null sources as one key per kind', async () => {
    const repo = createDedupRepository(makeMockDb());
    await repo.claimEntry('wip_warning', null, T0, at(-480));

    expect(await repo.claimEntry('wip_warning', null, at(1), at(-479))).toBe(false);
    expect(await repo.claimEntry('wip_warning', 'w-1', at(1), at(-479))).toBe(true);
  });

  it('findEntry and upsertEntry round-trip a null source', async () => {
    const repo = createDedupRepository(makeMockDb());
    await repo.upsertEntry('wip_warning', null, T0);
    await repo.upsertEntry('wip_warning', null, at(30));

    expect(await repo.findEntry('wip_warning', null)).toEqual({
      eventKind: 'wip_warning',
      sourceEntityId: null,
      lastSentAt: at(30),
    });
    expect(await repo.findEntry('wip_warning', 'other')).toBeUndefined();
  });
});

// ============================================================================
// Routing store
// ============================================================================

describe('createRoutingStore', () => {
  it('binds repositories to the transaction handle', async () => {
    const db = makeMockDb();
    const store = createRoutingStore(db);

    const claimed = await store.transaction(async (repos) => {
      await repos.notifications.createNotification(notificationInput());
      return repos.dedup.claimEntry('task_status', 't-1', T0, at(-480));
    });

    expect(claimed).toBe(true);
    expect(db.transaction).toHaveBeenCalledTimes(1);
    expect(notificationStore).toHaveLength(1);
  });
});

describe('withStorage', () => {
  it('wraps driver errors', async () => {
    await expect(
      withStorage('intake', async () => {
        throw new Error('ECONNREFUSED');
      }),
    ).rejects.toMatchObject({
      statusCode: 503,
      code: 'STORAGE_UNAVAILABLE',
      details: { cause: 'ECONNREFUSED' },
    });
  });

  it('passes application errors through', async () => {
    const notFound = new NotFoundError('Notification');
    await expect(withStorage('intake', async () => { throw notFound; })).rejects.toBe(notFound);
  });

  it('returns the result otherwise', async () => {
    await expect(withStorage('intake', async () => 7)).resolves.toBe(7);
    expect(new StorageUnavailableError('x', 'y').message).toBe('Notification storage unavailable during x');
  });
});
