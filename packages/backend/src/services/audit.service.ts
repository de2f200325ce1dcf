import { and, count, desc, eq, gte, lte, type SQL } from 'drizzle-orm';
import { db, type Executor } from '../lib/db.js';
import { auditEvents, type AuditEvent } from '../db/schema.js';
import type { PaginatedResponse } from '../types/index.js';
import type { AuditFiltersInput } from '../schemas/audit.schema.js';

// ============================================================================
// Audit Service
// ============================================================================

export type AuditEntityType = 'Person' | 'Unit' | 'JobTitle' | 'Assignment' | 'Company';

export type AuditAction =
  | 'CREATE'
  | 'UPDATE'
  | 'DELETE'
  | 'NEW_VERSION'
  | 'TERMINATE';

export interface AuditLogInput {
  entityType: AuditEntityType;
  entityId: number;
  action: AuditAction;
  payload: Record<string, unknown>;
  ipAddress?: string | null;
}

/**
 * Record an audit event. Pass the transaction the mutation runs in so
 * the event commits or rolls back together with it.
 */
export async function logAuditEvent(executor: Executor, input: AuditLogInput): Promise<AuditEvent> {
  const [event] = await executor
    .insert(auditEvents)
    .values({
      entityType: input.entityType,
      entityId: input.entityId,
      action: input.action,
      payload: input.payload,
      ipAddress: input.ipAddress ?? null,
    })
    .returning();
  return event;
}

export async function queryAuditEvents(
  filters: AuditFiltersInput
): Promise<PaginatedResponse<AuditEvent>> {
  const { entityType, entityId, action, startDate, endDate, page, limit } = filters;

  const conditions: SQL[] = [];
  if (entityType) conditions.push(eq(auditEvents.entityType, entityType));
  if (entityId !== undefined) conditions.push(eq(auditEvents.entityId, entityId));
  if (action) conditions.push(eq(auditEvents.action, action));
  if (startDate) conditions.push(gte(auditEvents.datetimeCreated, startDate));
  if (endDate) conditions.push(lte(auditEvents.datetimeCreated, `${endDate} 23:59:59`));

  const where = conditions.length > 0 ? and(...conditions) : undefined;
  const offset = (page - 1) * limit;

  const events = await db
    .select()
    .from(auditEvents)
    .where(where)
    .orderBy(desc(auditEvents.id))
    .limit(limit)
    .offset(offset);

  const [{ total }] = await db.select({ total: count() }).from(auditEvents).where(where);

  return {
    data: events,
    pagination: {
      page,
      limit,
      total,
      totalPages: Math.ceil(total / limit),
    },
  };
}
