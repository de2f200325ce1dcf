import { and, asc, count, countDistinct, eq, ilike, sql, type SQL } from 'drizzle-orm';
import { db, first, writeTransaction, type Executor } from '../lib/db.js';
import { InvalidStateError, NotFoundError, ValidationError } from '../lib/errors.js';
import { assignments, units, type Unit } from '../db/schema.js';
import { UnitHierarchy } from '../engine/hierarchy/index.js';
import { logAuditEvent } from './audit.service.js';
import { assignmentService } from './assignment.service.js';
import type {
  CreateUnitInput,
  UnitFiltersInput,
  UpdateUnitInput,
} from '../schemas/units.schema.js';
import type { MutationContext, SpanOfControl, UnitDetail } from '../types/index.js';

// ============================================================================
// Hierarchy
// ============================================================================

/** Snapshot of the whole unit forest, siblings ordered by name. */
export async function loadHierarchy(executor: Executor = db): Promise<UnitHierarchy<Unit>> {
  const rows = await executor.select().from(units).orderBy(asc(units.name), asc(units.id));
  return new UnitHierarchy(rows);
}

async function countCurrentPersons(executor: Executor, unitId: number): Promise<number> {
  const row = first(
    await executor
      .select({ total: countDistinct(assignments.personId) })
      .from(assignments)
      .where(and(eq(assignments.unitId, unitId), eq(assignments.status, 'CURRENT'))),
  );
  return row?.total ?? 0;
}

export async function spanOfControlFor(
  hierarchy: UnitHierarchy<Unit>,
  unitId: number,
  executor: Executor = db,
): Promise<SpanOfControl> {
  const directUnits = hierarchy.childrenOf(unitId).length;
  const directPersons = await countCurrentPersons(executor, unitId);
  return { unitId, directUnits, directPersons, total: directUnits + directPersons };
}

// ============================================================================
// Queries
// ============================================================================

export async function listUnits(filters: Partial<UnitFiltersInput> = {}): Promise<Unit[]> {
  const conditions: SQL[] = [];
  if (filters.unitType) conditions.push(eq(units.unitType, filters.unitType));
  if (filters.parentUnitId !== undefined) conditions.push(eq(units.parentUnitId, filters.parentUnitId));
  if (filters.search) conditions.push(ilike(units.name, `%${filters.search}%`));

  return db
    .select()
    .from(units)
    .where(conditions.length > 0 ? and(...conditions) : undefined)
    .orderBy(asc(units.name), asc(units.id));
}

export async function getUnitById(id: number): Promise<Unit> {
  const unit = first(await db.select().from(units).where(eq(units.id, id)));
  if (!unit) {
    throw new NotFoundError('Unit', id);
  }
  return unit;
}

export async function getUnitDetail(id: number): Promise<UnitDetail> {
  const hierarchy = await loadHierarchy();
  const unit = hierarchy.get(id);

  return {
    unit,
    breadcrumb: hierarchy
      .ancestors(id)
      .map((ancestor) => ({ id: ancestor.id, name: ancestor.name, unitType: ancestor.unitType })),
    children: hierarchy.childrenOf(id),
    currentAssignments: await assignmentService.listCurrentByUnit(id),
    spanOfControl: await spanOfControlFor(hierarchy, id),
  };
}

export async function getAncestors(id: number): Promise<Unit[]> {
  return (await loadHierarchy()).ancestors(id);
}

export async function getDescendants(id: number): Promise<Unit[]> {
  return (await loadHierarchy()).descendants(id);
}

// ============================================================================
// Mutations
// ============================================================================

async function assertParentExists(tx: Executor, parentUnitId: number): Promise<void> {
  const parent = first(await tx.select({ id: units.id }).from(units).where(eq(units.id, parentUnitId)));
  if (!parent) {
    throw new NotFoundError('Parent unit', parentUnitId);
  }
}

/** Insert a unit inside an open transaction. */
export async function insertUnit(
  tx: Executor,
  input: CreateUnitInput,
  context: MutationContext = {},
): Promise<Unit> {
  if (input.parentUnitId != null) {
    await assertParentExists(tx, input.parentUnitId);
  }

  const [unit] = await tx
    .insert(units)
    .values({
      name: input.name,
      shortName: input.shortName ?? null,
      unitType: input.unitType,
      parentUnitId: input.parentUnitId ?? null,
      emoji: input.emoji ?? null,
      image: input.image ?? null,
    })
    .returning();

  await logAuditEvent(tx, {
    entityType: 'Unit',
    entityId: unit.id,
    action: 'CREATE',
    payload: { name: unit.name, unitType: unit.unitType, parentUnitId: unit.parentUnitId },
    ipAddress: context.ipAddress,
  });

  return unit;
}

export async function createUnit(input: CreateUnitInput, context: MutationContext = {}): Promise<Unit> {
  return writeTransaction((tx) => insertUnit(tx, input, context));
}

/** Update a unit inside an open transaction, refusing moves that would close a cycle. */
export async function updateUnitWithin(
  tx: Executor,
  id: number,
  input: UpdateUnitInput,
  context: MutationContext = {},
): Promise<Unit> {
  const hierarchy = await loadHierarchy(tx);
  const existing = hierarchy.get(id);

  if (input.parentUnitId != null) {
    await assertParentExists(tx, input.parentUnitId);
    if (hierarchy.wouldCreateCycle(id, input.parentUnitId)) {
      throw new ValidationError(
        'Cannot move a unit under itself or one of its own descendants (would create a cycle)',
        { field: 'parentUnitId', unitId: id, parentUnitId: input.parentUnitId },
      );
    }
  }

  const updated = first(
    await tx
      .update(units)
      .set({ ...input, datetimeUpdated: sql`CURRENT_TIMESTAMP` })
      .where(eq(units.id, id))
      .returning(),
  );
  if (!updated) {
    throw new NotFoundError('Unit', id);
  }

  await logAuditEvent(tx, {
    entityType: 'Unit',
    entityId: id,
    action: 'UPDATE',
    payload: { changes: input, previousParentUnitId: existing.parentUnitId },
    ipAddress: context.ipAddress,
  });

  return updated;
}

export async function updateUnit(
  id: number,
  input: UpdateUnitInput,
  context: MutationContext = {},
): Promise<Unit> {
  return writeTransaction((tx) => updateUnitWithin(tx, id, input, context));
}

export async function deleteUnit(id: number, context: MutationContext = {}): Promise<void> {
  await writeTransaction(async (tx) => {
    const unit = first(await tx.select().from(units).where(eq(units.id, id)));
    if (!unit) {
      throw new NotFoundError('Unit', id);
    }

    const [children] = await tx.select({ total: count() }).from(units).where(eq(units.parentUnitId, id));
    if (children.total > 0) {
      throw new InvalidStateError(
        `Cannot delete unit "${unit.name}": it has ${children.total} child unit(s)`,
        'HAS_CHILDREN',
        'delete',
      );
    }

    const [versions] = await tx
      .select({ total: count() })
      .from(assignments)
      .where(eq(assignments.unitId, id));
    if (versions.total > 0) {
      throw new InvalidStateError(
        `Cannot delete unit "${unit.name}": it is referenced by ${versions.total} assignment version(s)`,
        'HAS_ASSIGNMENTS',
        'delete',
      );
    }

    await tx.delete(units).where(eq(units.id, id));

    await logAuditEvent(tx, {
      entityType: 'Unit',
      entityId: id,
      action: 'DELETE',
      payload: { name: unit.name },
      ipAddress: context.ipAddress,
    });
  });
}
