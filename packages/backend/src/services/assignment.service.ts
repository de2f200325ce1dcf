import {
  and,
  asc,
  count,
  countDistinct,
  desc,
  eq,
  getTableColumns,
  isNotNull,
  ilike,
  max,
  ne,
  or,
  sql,
  type SQL,
} from 'drizzle-orm';
import { db, first, isUniqueViolation, writeTransaction, type Executor } from '../lib/db.js';
import {
  ConflictError,
  InvalidStateError,
  isDomainError,
  NotFoundError,
  ValidationError,
} from '../lib/errors.js';
import { daysBetween, today } from '../lib/dates.js';
import { personDisplayName } from '../lib/names.js';
import { fractionToPercent, percentToFraction } from '../lib/percentage.js';
import { toCsv } from '../lib/csv.js';
import {
  ASSIGNMENT_STATUSES,
  assignments,
  jobTitles,
  persons,
  units,
  type AssignmentRow,
  type AssignmentStatus,
} from '../db/schema.js';
import { logAuditEvent } from './audit.service.js';
import { computeWorkloadPoints, WORKLOAD_THRESHOLDS } from './workload.service.js';
import type {
  AssignmentFiltersInput,
  BulkPercentageInput,
  BulkTerminateInput,
  BulkTransferInput,
  CreateAssignmentInput,
  LineageQueryInput,
  UpdateAssignmentInput,
} from '../schemas/assignments.schema.js';
import type {
  AssignmentDto,
  AssignmentFormOptions,
  AssignmentStatistics,
  AssignmentView,
  BulkOperationResult,
  LineageKey,
  MutationContext,
  PaginatedResponse,
} from '../types/index.js';

const detailColumns = {
  ...getTableColumns(assignments),
  personFirstName: persons.firstName,
  personLastName: persons.lastName,
  unitName: units.name,
  jobTitleName: jobTitles.name,
};

type DetailRow = AssignmentRow & {
  personFirstName: string;
  personLastName: string;
  unitName: string;
  jobTitleName: string;
};

export function toAssignmentDto(row: AssignmentRow): AssignmentDto {
  return { ...row, percentage: fractionToPercent(row.percentage) };
}

function toAssignmentView(row: DetailRow): AssignmentView {
  const { personFirstName, personLastName, unitName, jobTitleName, ...assignment } = row;
  return {
    ...toAssignmentDto(assignment),
    personName: personDisplayName({ firstName: personFirstName, lastName: personLastName }),
    unitName,
    jobTitleName,
  };
}

function lineageWhere(key: LineageKey): SQL | undefined {
  return and(
    eq(assignments.personId, key.personId),
    eq(assignments.unitId, key.unitId),
    eq(assignments.jobTitleId, key.jobTitleId),
  );
}

function lineageOf(row: LineageKey): LineageKey {
  return { personId: row.personId, unitId: row.unitId, jobTitleId: row.jobTitleId };
}

/**
 * Translate storage-level uniqueness violations into a ConflictError.
 * Reaching one means another writer changed the lineage in between.
 */
export async function guardConstraints<T>(fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (isUniqueViolation(error)) {
      throw new ConflictError(
        'Assignment lineage was modified concurrently; reload and try again',
      );
    }
    throw error;
  }
}

interface SuccessorChanges {
  percentage?: number;
  isAdInterim?: boolean;
  isUnitBoss?: boolean;
  validFrom?: string;
  validTo?: string | null;
  notes?: string | null;
  flags?: string | null;
}

/**
 * Owns the version chain of assignments. Every mutation runs in a single
 * queued write transaction and leaves at most one CURRENT version per
 * (person, unit, job title) lineage.
 */
export class AssignmentService {
  // ==========================================================================
  // Guards
  // ==========================================================================

  private async assertReferences(tx: Executor, key: LineageKey): Promise<void> {
    const person = first(
      await tx.select({ id: persons.id }).from(persons).where(eq(persons.id, key.personId)),
    );
    if (!person) {
      throw new NotFoundError('Person', key.personId);
    }
    const unit = first(await tx.select({ id: units.id }).from(units).where(eq(units.id, key.unitId)));
    if (!unit) {
      throw new NotFoundError('Unit', key.unitId);
    }
    const jobTitle = first(
      await tx.select({ id: jobTitles.id }).from(jobTitles).where(eq(jobTitles.id, key.jobTitleId)),
    );
    if (!jobTitle) {
      throw new NotFoundError('JobTitle', key.jobTitleId);
    }
  }

  /** Read one version through `executor`, or fail with NotFoundError. */
  async findVersion(executor: Executor, id: number): Promise<AssignmentRow> {
    const row = first(await executor.select().from(assignments).where(eq(assignments.id, id)));
    if (!row) {
      throw new NotFoundError('Assignment', id);
    }
    return row;
  }

  private assertCurrent(row: AssignmentRow, action: string): void {
    if (row.status !== 'CURRENT') {
      throw new InvalidStateError(
        `Cannot ${action} version ${row.version}: only the CURRENT version of an assignment can be changed`,
        row.status,
        action,
      );
    }
  }

  private assertDateRange(validFrom: string, validTo: string | null | undefined): void {
    if (validTo && validTo < validFrom) {
      throw new ValidationError('End date cannot be before start date', {
        field: 'validTo',
        validFrom,
        validTo,
      });
    }
  }

  private async findCurrent(executor: Executor, key: LineageKey): Promise<AssignmentRow | undefined> {
    return first(
      await executor
        .select()
        .from(assignments)
        .where(and(lineageWhere(key), eq(assignments.status, 'CURRENT'))),
    );
  }

  /** max(version) + 1 over the lineage, or 1 for a new one. */
  async nextVersion(executor: Executor, key: LineageKey): Promise<number> {
    const [row] = await executor
      .select({ maxVersion: max(assignments.version) })
      .from(assignments)
      .where(lineageWhere(key));
    return (row.maxVersion ?? 0) + 1;
  }

  // ==========================================================================
  // Transaction steps
  // ==========================================================================

  /** Create inside an open transaction; see `create`. */
  async createWithin(
    tx: Executor,
    input: CreateAssignmentInput,
    context: MutationContext = {},
  ): Promise<AssignmentRow> {
    const key = lineageOf(input);
    const fraction = percentToFraction(input.percentage);
    const validFrom = input.validFrom ?? today();
    this.assertDateRange(validFrom, input.validTo);
    await this.assertReferences(tx, key);

    const current = await this.findCurrent(tx, key);
    if (current) {
      if (!input.allowNewVersion) {
        throw new InvalidStateError(
          'This person already holds a CURRENT assignment with this job title in this unit; edit it instead',
          current.status,
          'create',
        );
      }
      return this.supersedeIn(tx, current, { ...input, validFrom }, context);
    }

    const version = await this.nextVersion(tx, key);
    const [created] = await tx
      .insert(assignments)
      .values({
        ...key,
        version,
        percentage: fraction,
        isAdInterim: input.isAdInterim ?? false,
        isUnitBoss: input.isUnitBoss ?? false,
        validFrom,
        validTo: input.validTo ?? null,
        notes: input.notes ?? null,
        flags: input.flags ?? null,
        status: 'CURRENT',
      })
      .returning();

    await logAuditEvent(tx, {
      entityType: 'Assignment',
      entityId: created.id,
      action: 'CREATE',
      payload: { ...key, version, percentage: input.percentage, validFrom },
      ipAddress: context.ipAddress,
    });

    return created;
  }

  /**
   * Close `predecessor` (CURRENT -> HISTORICAL, valid_to = successor start)
   * and insert version + 1 carrying the unchanged fields. An inherited end
   * date that the new start has already passed is dropped.
   */
  private async supersedeIn(
    tx: Executor,
    predecessor: AssignmentRow,
    changes: SuccessorChanges,
    context: MutationContext,
  ): Promise<AssignmentRow> {
    const key = lineageOf(predecessor);
    const validFrom = changes.validFrom ?? today();
    if (validFrom < predecessor.validFrom) {
      throw new ValidationError('A new version cannot start before the version it replaces', {
        field: 'validFrom',
        validFrom,
        previousValidFrom: predecessor.validFrom,
      });
    }
    const inheritedValidTo =
      predecessor.validTo !== null && predecessor.validTo < validFrom ? null : predecessor.validTo;
    const validTo = changes.validTo !== undefined ? changes.validTo : inheritedValidTo;
    this.assertDateRange(validFrom, validTo);
    const percentage =
      changes.percentage !== undefined ? percentToFraction(changes.percentage) : predecessor.percentage;

    const closed = first(
      await tx
        .update(assignments)
        .set({ status: 'HISTORICAL', validTo: validFrom, datetimeUpdated: sql`CURRENT_TIMESTAMP` })
        .where(and(eq(assignments.id, predecessor.id), eq(assignments.status, 'CURRENT')))
        .returning({ id: assignments.id }),
    );
    if (!closed) {
      throw new ConflictError('Assignment was changed by another request; reload and try again');
    }

    const version = await this.nextVersion(tx, key);
    const [successor] = await tx
      .insert(assignments)
      .values({
        ...key,
        version,
        percentage,
        isAdInterim: changes.isAdInterim ?? predecessor.isAdInterim,
        isUnitBoss: changes.isUnitBoss ?? predecessor.isUnitBoss,
        validFrom,
        validTo,
        notes: changes.notes !== undefined ? changes.notes : predecessor.notes,
        flags: changes.flags !== undefined ? changes.flags : predecessor.flags,
        status: 'CURRENT',
      })
      .returning();

    await logAuditEvent(tx, {
      entityType: 'Assignment',
      entityId: successor.id,
      action: 'NEW_VERSION',
      payload: {
        ...key,
        previousId: predecessor.id,
        previousVersion: predecessor.version,
        version,
        percentage: fractionToPercent(percentage),
        validFrom,
      },
      ipAddress: context.ipAddress,
    });

    return successor;
  }

  /** Supersede the CURRENT version `id` inside an open transaction; see `update`. */
  async updateWithin(
    tx: Executor,
    id: number,
    changes: UpdateAssignmentInput,
    context: MutationContext = {},
  ): Promise<AssignmentRow> {
    const target = await this.findVersion(tx, id);
    this.assertCurrent(target, 'update');
    return this.supersedeIn(tx, target, changes, context);
  }

  /**
   * Terminate inside an open transaction. Without a date the version ends
   * today, or on its start date when it has not started yet.
   */
  async terminateWithin(
    tx: Executor,
    id: number,
    terminationDate?: string,
    context: MutationContext = {},
  ): Promise<AssignmentRow> {
    const target = await this.findVersion(tx, id);
    this.assertCurrent(target, 'terminate');

    const now = today();
    const validTo = terminationDate ?? (target.validFrom > now ? target.validFrom : now);
    if (validTo < target.validFrom) {
      throw new ValidationError('Termination date cannot be before the start date', {
        field: 'terminationDate',
        terminationDate: validTo,
        validFrom: target.validFrom,
      });
    }

    const terminated = first(
      await tx
        .update(assignments)
        .set({ status: 'TERMINATED', validTo, datetimeUpdated: sql`CURRENT_TIMESTAMP` })
        .where(and(eq(assignments.id, id), eq(assignments.status, 'CURRENT')))
        .returning(),
    );
    if (!terminated) {
      throw new ConflictError('Assignment was changed by another request; reload and try again');
    }

    await logAuditEvent(tx, {
      entityType: 'Assignment',
      entityId: id,
      action: 'TERMINATE',
      payload: { ...lineageOf(target), version: target.version, validTo },
      ipAddress: context.ipAddress,
    });

    return terminated;
  }

  // ==========================================================================
  // Version chain operations
  // ==========================================================================

  /**
   * Start a lineage, or continue a terminated one at max(version) + 1.
   * With `allowNewVersion` an existing CURRENT version is superseded
   * instead of rejected.
   */
  async create(input: CreateAssignmentInput, context: MutationContext = {}): Promise<AssignmentDto> {
    const row = await guardConstraints(() =>
      writeTransaction((tx) => this.createWithin(tx, input, context)),
    );
    return toAssignmentDto(row);
  }

  async update(
    id: number,
    changes: UpdateAssignmentInput,
    context: MutationContext = {},
  ): Promise<AssignmentDto> {
    const row = await guardConstraints(() =>
      writeTransaction((tx) => this.updateWithin(tx, id, changes, context)),
    );
    return toAssignmentDto(row);
  }

  async terminate(
    id: number,
    terminationDate?: string,
    context: MutationContext = {},
  ): Promise<AssignmentDto> {
    const row = await guardConstraints(() =>
      writeTransaction((tx) => this.terminateWithin(tx, id, terminationDate, context)),
    );
    return toAssignmentDto(row);
  }

  /** Remove every version of the lineage `id` belongs to. */
  async deleteLineage(id: number, context: MutationContext = {}): Promise<{ deleted: number }> {
    return writeTransaction(async (tx) => {
      const target = await this.findVersion(tx, id);
      const key = lineageOf(target);
      const removed = await tx
        .delete(assignments)
        .where(lineageWhere(key))
        .returning({ id: assignments.id });

      await logAuditEvent(tx, {
        entityType: 'Assignment',
        entityId: id,
        action: 'DELETE',
        payload: { ...key, versions: removed.map((r) => r.id) },
        ipAddress: context.ipAddress,
      });

      return { deleted: removed.length };
    });
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  private detailQuery(where: SQL | undefined) {
    return db
      .select(detailColumns)
      .from(assignments)
      .innerJoin(persons, eq(assignments.personId, persons.id))
      .innerJoin(units, eq(assignments.unitId, units.id))
      .innerJoin(jobTitles, eq(assignments.jobTitleId, jobTitles.id))
      .where(where);
  }

  async getById(id: number): Promise<AssignmentView> {
    const row = first(await this.detailQuery(eq(assignments.id, id)));
    if (!row) {
      throw new NotFoundError('Assignment', id);
    }
    return toAssignmentView(row);
  }

  private buildFilters(filters: Partial<AssignmentFiltersInput>): SQL | undefined {
    const conditions: SQL[] = [];

    if (filters.personId !== undefined) conditions.push(eq(assignments.personId, filters.personId));
    if (filters.unitId !== undefined) conditions.push(eq(assignments.unitId, filters.unitId));
    if (filters.jobTitleId !== undefined) conditions.push(eq(assignments.jobTitleId, filters.jobTitleId));

    if (filters.currentOnly) {
      conditions.push(eq(assignments.status, 'CURRENT'));
    } else if (filters.status) {
      conditions.push(eq(assignments.status, filters.status));
    }

    if (filters.search) {
      const pattern = `%${filters.search}%`;
      const search = or(
        ilike(persons.firstName, pattern),
        ilike(persons.lastName, pattern),
        ilike(units.name, pattern),
        ilike(jobTitles.name, pattern),
      );
      if (search) conditions.push(search);
    }

    return conditions.length > 0 ? and(...conditions) : undefined;
  }

  async list(filters: AssignmentFiltersInput): Promise<PaginatedResponse<AssignmentView>> {
    const where = this.buildFilters(filters);
    const { page, limit } = filters;

    const rows = await this.detailQuery(where)
      .orderBy(
        asc(persons.lastName),
        asc(persons.firstName),
        asc(units.name),
        asc(jobTitles.name),
        desc(assignments.version),
      )
      .limit(limit)
      .offset((page - 1) * limit);

    const [{ total }] = await db
      .select({ total: count() })
      .from(assignments)
      .innerJoin(persons, eq(assignments.personId, persons.id))
      .innerJoin(units, eq(assignments.unitId, units.id))
      .innerJoin(jobTitles, eq(assignments.jobTitleId, jobTitles.id))
      .where(where);

    return {
      data: rows.map(toAssignmentView),
      pagination: {
        page,
        limit,
        total,
        totalPages: Math.ceil(total / limit),
      },
    };
  }

  /** Versions of one lineage in version order, or every version when no key is given. */
  async getHistory(query: LineageQueryInput = {}): Promise<AssignmentView[]> {
    const { personId, unitId, jobTitleId } = query;
    const where =
      personId !== undefined && unitId !== undefined && jobTitleId !== undefined
        ? lineageWhere({ personId, unitId, jobTitleId })
        : undefined;

    const rows = await this.detailQuery(where).orderBy(
      asc(assignments.personId),
      asc(assignments.unitId),
      asc(assignments.jobTitleId),
      asc(assignments.version),
    );
    return rows.map(toAssignmentView);
  }

  /** All versions of the lineage the given version belongs to. */
  async getLineage(id: number): Promise<AssignmentView[]> {
    const target = await this.findVersion(db, id);
    return this.getHistory(lineageOf(target));
  }

  async listCurrentByPerson(personId: number): Promise<AssignmentView[]> {
    const rows = await this.detailQuery(
      and(eq(assignments.personId, personId), eq(assignments.status, 'CURRENT')),
    ).orderBy(asc(units.name), asc(jobTitles.name));
    return rows.map(toAssignmentView);
  }

  async listCurrentByUnit(unitId: number): Promise<AssignmentView[]> {
    const rows = await this.detailQuery(
      and(eq(assignments.unitId, unitId), eq(assignments.status, 'CURRENT')),
    ).orderBy(desc(assignments.isUnitBoss), asc(persons.lastName), asc(persons.firstName));
    return rows.map(toAssignmentView);
  }

  async listAllCurrent(): Promise<AssignmentView[]> {
    const rows = await this.detailQuery(eq(assignments.status, 'CURRENT')).orderBy(
      asc(assignments.unitId),
      desc(assignments.isUnitBoss),
      asc(persons.lastName),
      asc(persons.firstName),
      asc(assignments.id),
    );
    return rows.map(toAssignmentView);
  }

  async listByPerson(personId: number): Promise<AssignmentView[]> {
    const rows = await this.detailQuery(eq(assignments.personId, personId)).orderBy(
      asc(assignments.validFrom),
      asc(assignments.id),
    );
    return rows.map(toAssignmentView);
  }

  async getStatistics(): Promise<AssignmentStatistics> {
    const byStatus: Record<AssignmentStatus, number> = { CURRENT: 0, HISTORICAL: 0, TERMINATED: 0 };
    const statusRows = await db
      .select({ status: assignments.status, total: count() })
      .from(assignments)
      .groupBy(assignments.status);
    for (const row of statusRows) {
      byStatus[row.status] = row.total;
    }

    const current = eq(assignments.status, 'CURRENT');
    const [currentRow] = await db
      .select({
        adInterim: sql<number>`count(*) filter (where ${assignments.isAdInterim})`.mapWith(Number),
        unitBosses: sql<number>`count(*) filter (where ${assignments.isUnitBoss})`.mapWith(Number),
        persons: countDistinct(assignments.personId),
        units: countDistinct(assignments.unitId),
      })
      .from(assignments)
      .where(current);

    const closed = await db
      .select({ validFrom: assignments.validFrom, validTo: assignments.validTo })
      .from(assignments)
      .where(isNotNull(assignments.validTo));
    const durations = closed.flatMap((row) =>
      row.validTo !== null ? [daysBetween(row.validFrom, row.validTo)] : [],
    );

    return {
      totalVersions: ASSIGNMENT_STATUSES.reduce((sum, status) => sum + byStatus[status], 0),
      byStatus,
      adInterim: currentRow.adInterim,
      unitBosses: currentRow.unitBosses,
      personsWithAssignments: currentRow.persons,
      unitsWithAssignments: currentRow.units,
      averageDurationDays:
        durations.length > 0
          ? Math.round((durations.reduce((a, b) => a + b, 0) / durations.length) * 10) / 10
          : null,
    };
  }

  /**
   * Advisory checks for a prospective assignment. Warnings never block
   * the create; they are returned alongside the result.
   */
  async checkRules(input: LineageKey & { percentage: number }): Promise<string[]> {
    const warnings: string[] = [];

    const [{ total: otherRoleCount }] = await db
      .select({ total: count() })
      .from(assignments)
      .where(
        and(
          eq(assignments.personId, input.personId),
          eq(assignments.unitId, input.unitId),
          ne(assignments.jobTitleId, input.jobTitleId),
          eq(assignments.status, 'CURRENT'),
        ),
      );
    if (otherRoleCount > 0) {
      warnings.push(`Person already holds ${otherRoleCount} other role(s) in this unit`);
    }

    const replaced = await this.findCurrent(db, input);
    const resulting =
      (await computeWorkloadPoints(db, input.personId)) -
      (replaced ? fractionToPercent(replaced.percentage) : 0) +
      input.percentage;
    if (resulting > WORKLOAD_THRESHOLDS.overloaded) {
      warnings.push(`Resulting workload of ${resulting}% would be overloaded`);
    }

    return warnings;
  }

  async getFormOptions(assignmentId?: number): Promise<AssignmentFormOptions> {
    const personRows = await db
      .select({ id: persons.id, firstName: persons.firstName, lastName: persons.lastName })
      .from(persons)
      .orderBy(asc(persons.lastName), asc(persons.firstName));
    const unitRows = await db
      .select({ id: units.id, name: units.name, unitType: units.unitType })
      .from(units)
      .orderBy(asc(units.name));
    const jobTitleRows = await db
      .select({ id: jobTitles.id, name: jobTitles.name })
      .from(jobTitles)
      .orderBy(asc(jobTitles.name));

    const options: AssignmentFormOptions = {
      persons: personRows.map((p) => ({ id: p.id, label: personDisplayName(p) })),
      units: unitRows.map((u) => ({ id: u.id, label: u.name, unitType: u.unitType })),
      jobTitles: jobTitleRows.map((j) => ({ id: j.id, label: j.name })),
    };

    if (assignmentId !== undefined) {
      const current = await this.getById(assignmentId);
      if (current.status !== 'CURRENT') {
        throw new InvalidStateError(
          `Version ${current.version} is ${current.status} and cannot be edited`,
          current.status,
          'edit',
        );
      }
      options.current = current;
    }

    return options;
  }

  async exportCsv(filters: Partial<AssignmentFiltersInput> = {}): Promise<string> {
    const rows = (
      await this.detailQuery(this.buildFilters(filters)).orderBy(
        asc(persons.lastName),
        asc(persons.firstName),
        asc(units.name),
        asc(assignments.version),
      )
    ).map(toAssignmentView);

    const headers = [
      'id',
      'personName',
      'unitName',
      'jobTitleName',
      'version',
      'status',
      'percentage',
      'isAdInterim',
      'isUnitBoss',
      'validFrom',
      'validTo',
      'flags',
      'notes',
    ] as const;

    return toCsv(
      headers,
      rows.map((row) => ({
        id: row.id,
        personName: row.personName,
        unitName: row.unitName,
        jobTitleName: row.jobTitleName,
        version: row.version,
        status: row.status,
        percentage: row.percentage,
        isAdInterim: row.isAdInterim,
        isUnitBoss: row.isUnitBoss,
        validFrom: row.validFrom,
        validTo: row.validTo,
        flags: row.flags,
        notes: row.notes,
      })),
    );
  }

  // ==========================================================================
  // Bulk operations
  // ==========================================================================

  /**
   * Apply `operation` to every id in its own transaction. Domain failures
   * are collected per id; anything else aborts the batch.
   */
  private async runBulk(
    ids: readonly number[],
    operation: (id: number) => Promise<unknown>,
  ): Promise<BulkOperationResult> {
    const result: BulkOperationResult = { succeeded: [], failed: [] };
    for (const id of ids) {
      try {
        await operation(id);
        result.succeeded.push(id);
      } catch (error) {
        if (!isDomainError(error)) {
          throw error;
        }
        result.failed.push({ id, error: error.message });
      }
    }
    return result;
  }

  async bulkTerminate(input: BulkTerminateInput, context: MutationContext = {}): Promise<BulkOperationResult> {
    return this.runBulk(input.assignmentIds, (id) => this.terminate(id, input.terminationDate, context));
  }

  async bulkUpdatePercentage(
    input: BulkPercentageInput,
    context: MutationContext = {},
  ): Promise<BulkOperationResult> {
    return this.runBulk(input.assignmentIds, (id) =>
      this.update(id, { percentage: input.percentage, validFrom: input.validFrom }, context),
    );
  }

  /**
   * Move assignments to another unit: the CURRENT version is terminated on
   * the transfer date and a lineage in the target unit starts that day.
   */
  async bulkTransfer(input: BulkTransferInput, context: MutationContext = {}): Promise<BulkOperationResult> {
    const transferDate = input.transferDate ?? today();

    return this.runBulk(input.assignmentIds, async (id) =>
      guardConstraints(() =>
        writeTransaction(async (tx) => {
          const source = await this.findVersion(tx, id);
          if (source.unitId === input.targetUnitId) {
            throw new ValidationError('Assignment already belongs to the target unit', {
              field: 'targetUnitId',
              targetUnitId: input.targetUnitId,
            });
          }
          const terminated = await this.terminateWithin(tx, id, transferDate, context);
          return this.createWithin(
            tx,
            {
              personId: terminated.personId,
              unitId: input.targetUnitId,
              jobTitleId: terminated.jobTitleId,
              percentage: fractionToPercent(terminated.percentage),
              isAdInterim: terminated.isAdInterim,
              isUnitBoss: false,
              validFrom: transferDate,
              notes: terminated.notes,
              flags: terminated.flags,
            },
            context,
          );
        }),
      ),
    );
  }
}

export const assignmentService = new AssignmentService();
