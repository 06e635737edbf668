import { eq, and, isNull, lte, desc, asc, inArray, count, type SQL } from 'drizzle-orm';
import {
  notifications,
  type InsertNotification,
  type SelectNotification,
} from '@tidings/shared/schemas/db/notification.schema.js';
import { type NotificationPriority } from '@tidings/shared/constants/notification.constants.js';
import { type Database } from '../../lib/db.js';

export interface ListNotificationsOpts {
  priority?: NotificationPriority;
  pendingOnly?: boolean;
  limit: number;
  offset: number;
}

export function createNotificationRepository(db: Database) {
  return {
    async createNotification(
      data: InsertNotification,
    ): Promise<SelectNotification> {
      const rows = await db
        .insert(notifications)
        .values(data)
        .returning();
      return rows[0];
    },

    async findNotificationById(
      notificationId: string,
    ): Promise<SelectNotification | undefined> {
      const rows = await db
        .select()
        .from(notifications)
        .where(eq(notifications.notificationId, notificationId))
        .limit(1);
      return rows[0];
    },

    /**
     * Unsent rows of one priority, oldest first. With `dueBy`, only rows
     * whose scheduled time has been reached.
     */
    async findPending(
      priority: NotificationPriority,
      dueBy?: Date,
    ): Promise<SelectNotification[]> {
      const conditions: SQL[] = [
        eq(notifications.priority, priority),
        isNull(notifications.sentAt),
      ];
      if (dueBy) {
        conditions.push(lte(notifications.scheduledFor, dueBy));
      }

      return db
        .select()
        .from(notifications)
        .where(and(...conditions))
        .orderBy(asc(notifications.createdAt));
    },

    /**
     * Stamps `sentAt` on every listed row still pending, in one statement.
     * Rows already sent are left untouched. Returns the number updated.
     */
    async markSent(notificationIds: string[], sentAt: Date): Promise<number> {
      if (notificationIds.length === 0) return 0;
      const rows = await db
        .update(notifications)
        .set({ sentAt })
        .where(
          and(
            inArray(notifications.notificationId, notificationIds),
            isNull(notifications.sentAt),
          ),
        )
        .returning();
      return rows.length;
    },

    async listNotifications(
      opts: ListNotificationsOpts,
    ): Promise<SelectNotification[]> {
      const conditions: SQL[] = [];
      if (opts.priority) {
        conditions.push(eq(notifications.priority, opts.priority));
      }
      if (opts.pendingOnly) {
        conditions.push(isNull(notifications.sentAt));
      }

      return db
        .select()
        .from(notifications)
        .where(conditions.length > 0 ? and(...conditions) : undefined)
        .orderBy(desc(notifications.createdAt))
        .limit(opts.limit)
        .offset(opts.offset);
    },

    async countPending(priority: NotificationPriority): Promise<number> {
      const [row] = await db
        .select({ value: count() })
        .from(notifications)
        .where(
          and(
            eq(notifications.priority, priority),
            isNull(notifications.sentAt),
          ),
        );
      return row?.value ?? 0;
    },
  };
}

export type NotificationRepository = ReturnType<typeof createNotificationRepository>;
