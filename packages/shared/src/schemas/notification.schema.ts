// ============================================================================
// Notification Routing — Zod Validation Schemas
// ============================================================================

import { z } from 'zod';
import { NOTIFICATION_PRIORITIES } from '../constants/notification.constants.js';

// ============================================================================
// Intake
// ============================================================================

export const intakeSchema = z.object({
  priority: z.enum(NOTIFICATION_PRIORITIES),
  message: z.string().min(1).max(4000),
  event_kind: z.string().min(1).max(100),
  source_entity_id: z.string().min(1).max(200).nullable().optional(),
  context: z.record(z.string(), z.unknown()).optional(),
});

export type IntakeBody = z.infer<typeof intakeSchema>;

// ============================================================================
// Processor Runs
// ============================================================================

// `now` lets the external clock pin the invocation time; defaults to server time.
export const processorRunSchema = z
  .object({
    now: z.string().datetime({ offset: true }).optional(),
  })
  .default({});

export type ProcessorRunBody = z.infer<typeof processorRunSchema>;

// ============================================================================
// Notification History
// ============================================================================

export const notificationListQuerySchema = z.object({
  priority: z.enum(NOTIFICATION_PRIORITIES).optional(),
  pending_only: z
    .enum(['true', 'false'])
    .transform((v) => v === 'true')
    .optional()
    .default('false'),
  limit: z.coerce.number().int().min(1).max(100).default(20),
  offset: z.coerce.number().int().min(0).default(0),
});

export type NotificationListQuery = z.infer<typeof notificationListQuerySchema>;

export const notificationIdParamSchema = z.object({
  id: z.string().uuid(),
});

export type NotificationIdParam = z.infer<typeof notificationIdParamSchema>;

