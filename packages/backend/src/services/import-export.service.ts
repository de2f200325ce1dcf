import { and, asc, count, eq, isNull } from 'drizzle-orm';
import { db, first, isUniqueViolation, writeTransaction, type Executor } from '../lib/db.js';
import { ConflictError, isDomainError, ValidationError } from '../lib/errors.js';
import { toCsv } from '../lib/csv.js';
import { fractionToPercent } from '../lib/percentage.js';
import { assignments, companies, jobTitles, persons, units } from '../db/schema.js';
import { UnitHierarchy } from '../engine/hierarchy/index.js';
import { assignmentService } from './assignment.service.js';
import {
  companyRegistrationConflict,
  insertCompany,
  isCompanyActive,
  updateCompanyWithin,
} from './company.service.js';
import { insertJobTitle, updateJobTitleWithin } from './job-title.service.js';
import { insertPerson, registrationConflict, updatePersonWithin } from './person.service.js';
import { insertUnit, updateUnitWithin } from './unit.service.js';
import type {
  ConflictStrategy,
  ExportEntity,
  ImportAssignment,
  ImportBundle,
  ImportOptions,
  ImportUnit,
} from '../schemas/import-export.schema.js';
import type { ExportBundle, ImportCounts, ImportEntity, ImportResult, MutationContext } from '../types/index.js';

interface ImportIssue {
  path: string;
  message: string;
}

interface LineageGroup {
  personId: number;
  unitId: number;
  jobTitleId: number;
  rows: Array<{ index: number; record: ImportAssignment }>;
}

// Thrown to roll a dry run back once the whole import has been applied.
class DryRunRollback extends Error {
  constructor(readonly result: ImportResult) {
    super('Dry run rolled back');
  }
}

// ============================================================================
// Validation
// ============================================================================

function duplicateIds(records: ReadonlyArray<{ id: number }>, entity: ImportEntity): ImportIssue[] {
  const seen = new Set<number>();
  const issues: ImportIssue[] = [];
  records.forEach((record, index) => {
    if (seen.has(record.id)) {
      issues.push({ path: `${entity}[${index}].id`, message: `Duplicate id ${record.id}` });
    }
    seen.add(record.id);
  });
  return issues;
}

function duplicateValues(
  values: ReadonlyArray<string | null | undefined>,
  entity: ImportEntity,
  field: string,
): ImportIssue[] {
  const seen = new Set<string>();
  const issues: ImportIssue[] = [];
  values.forEach((value, index) => {
    if (!value) return;
    if (seen.has(value)) {
      issues.push({ path: `${entity}[${index}].${field}`, message: `Duplicate ${field} '${value}'` });
    }
    seen.add(value);
  });
  return issues;
}

/** Units ordered so that every parent precedes its children. Rejects dangling parents and cycles. */
function unitsTopDown(records: readonly ImportUnit[]): ImportUnit[] {
  const hierarchy = new UnitHierarchy(
    records.map((record) => ({ ...record, parentUnitId: record.parentUnitId ?? null })),
  );
  return hierarchy.roots().flatMap((root) => [root, ...hierarchy.descendants(root.id)]);
}

/** Assignment records grouped by lineage, each group in version (or start date) order. */
function groupLineages(records: readonly ImportAssignment[]): LineageGroup[] {
  const groups = new Map<string, LineageGroup>();
  records.forEach((record, index) => {
    const key = `${record.personId}:${record.unitId}:${record.jobTitleId}`;
    let group = groups.get(key);
    if (!group) {
      group = { personId: record.personId, unitId: record.unitId, jobTitleId: record.jobTitleId, rows: [] };
      groups.set(key, group);
    }
    group.rows.push({ index, record });
  });

  for (const group of groups.values()) {
    group.rows.sort(
      (a, b) =>
        (a.record.version ?? 0) - (b.record.version ?? 0) ||
        a.record.validFrom.localeCompare(b.record.validFrom) ||
        a.index - b.index,
    );
  }
  return [...groups.values()];
}

function lineageIssues(groups: readonly LineageGroup[]): ImportIssue[] {
  const issues: ImportIssue[] = [];
  for (const group of groups) {
    const versions = new Set<number>();
    for (const { index, record } of group.rows) {
      if (record.version !== undefined) {
        if (versions.has(record.version)) {
          issues.push({ path: `assignments[${index}].version`, message: `Duplicate version ${record.version}` });
        }
        versions.add(record.version);
      }
    }

    const last = group.rows[group.rows.length - 1];
    if (last.record.status === 'HISTORICAL') {
      issues.push({
        path: `assignments[${last.index}].status`,
        message: 'The latest version of a lineage must be CURRENT or TERMINATED',
      });
    }
    if (last.record.status === 'TERMINATED' && !last.record.validTo) {
      issues.push({
        path: `assignments[${last.index}].validTo`,
        message: 'A TERMINATED version needs its end date',
      });
    }
  }
  return issues;
}

function validateBundle(bundle: ImportBundle): { orderedUnits: ImportUnit[]; lineages: LineageGroup[] } {
  const orderedUnits = unitsTopDown(bundle.units);
  const unitIds = new Set(bundle.units.map((u) => u.id));
  const personIds = new Set(bundle.persons.map((p) => p.id));
  const jobTitleIds = new Set(bundle.jobTitles.map((j) => j.id));

  const issues: ImportIssue[] = [
    ...duplicateIds(bundle.persons, 'persons'),
    ...duplicateIds(bundle.jobTitles, 'jobTitles'),
    ...duplicateIds(bundle.companies, 'companies'),
    ...duplicateValues(bundle.persons.map((p) => p.registrationNo), 'persons', 'registrationNo'),
    ...duplicateValues(bundle.companies.map((c) => c.registrationNo), 'companies', 'registrationNo'),
  ];

  bundle.assignments.forEach((record, index) => {
    if (!personIds.has(record.personId)) {
      issues.push({ path: `assignments[${index}].personId`, message: `Unknown person ${record.personId}` });
    }
    if (!unitIds.has(record.unitId)) {
      issues.push({ path: `assignments[${index}].unitId`, message: `Unknown unit ${record.unitId}` });
    }
    if (!jobTitleIds.has(record.jobTitleId)) {
      issues.push({ path: `assignments[${index}].jobTitleId`, message: `Unknown job title ${record.jobTitleId}` });
    }
  });

  bundle.companies.forEach((record, index) => {
    for (const field of ['mainContactId', 'financialContactId'] as const) {
      const contactId = record[field];
      if (contactId != null && !personIds.has(contactId)) {
        issues.push({ path: `companies[${index}].${field}`, message: `Unknown person ${contactId}` });
      }
    }
  });

  const lineages = groupLineages(bundle.assignments);
  issues.push(...lineageIssues(lineages));

  if (issues.length > 0) {
    throw new ValidationError(`Import bundle has ${issues.length} invalid record(s)`, { issues });
  }
  return { orderedUnits, lineages };
}

// ============================================================================
// Import
// ============================================================================

function emptyCounts(): Record<ImportEntity, ImportCounts> {
  return {
    units: { created: 0, updated: 0, skipped: 0 },
    persons: { created: 0, updated: 0, skipped: 0 },
    jobTitles: { created: 0, updated: 0, skipped: 0 },
    assignments: { created: 0, updated: 0, skipped: 0 },
    companies: { created: 0, updated: 0, skipped: 0 },
  };
}

/** Resolve a bundle key already written in this import. Validation guarantees it is there. */
function mapped(ids: Map<number, number>, entity: string, key: number): number {
  const id = ids.get(key);
  if (id === undefined) {
    throw new ValidationError(`Import references ${entity} ${key} before it was written`);
  }
  return id;
}

class ImportRun {
  readonly counts = emptyCounts();
  readonly unitIds = new Map<number, number>();
  readonly personIds = new Map<number, number>();
  readonly jobTitleIds = new Map<number, number>();
  readonly companyIds = new Map<number, number>();

  constructor(
    private readonly tx: Executor,
    private readonly strategy: ConflictStrategy,
    private readonly context: MutationContext,
  ) {}

  async importUnits(ordered: readonly ImportUnit[]): Promise<void> {
    for (const record of ordered) {
      const parentUnitId =
        record.parentUnitId != null ? mapped(this.unitIds, 'unit', record.parentUnitId) : null;
      const fields = {
        name: record.name,
        shortName: record.shortName ?? null,
        unitType: record.unitType,
        emoji: record.emoji ?? null,
        image: record.image ?? null,
      };

      const existing = first(
        await this.tx
          .select({ id: units.id })
          .from(units)
          .where(
            and(
              eq(units.name, record.name),
              parentUnitId === null ? isNull(units.parentUnitId) : eq(units.parentUnitId, parentUnitId),
            ),
          ),
      );

      if (!existing) {
        const unit = await insertUnit(this.tx, { ...fields, parentUnitId }, this.context);
        this.unitIds.set(record.id, unit.id);
        this.counts.units.created++;
        continue;
      }

      this.unitIds.set(record.id, existing.id);
      if (this.strategy === 'fail') {
        throw new ConflictError(`Unit "${record.name}" already exists under the same parent`);
      }
      if (this.strategy === 'update') {
        await updateUnitWithin(this.tx, existing.id, fields, this.context);
        this.counts.units.updated++;
      } else {
        this.counts.units.skipped++;
      }
    }
  }

  async importPersons(records: ImportBundle['persons']): Promise<void> {
    for (const { id: key, ...fields } of records) {
      const existing = fields.registrationNo
        ? first(
            await this.tx
              .select({ id: persons.id })
              .from(persons)
              .where(eq(persons.registrationNo, fields.registrationNo)),
          )
        : undefined;

      if (!existing) {
        const person = await insertPerson(this.tx, fields, this.context);
        this.personIds.set(key, person.id);
        this.counts.persons.created++;
        continue;
      }

      this.personIds.set(key, existing.id);
      if (this.strategy === 'fail') {
        throw registrationConflict(fields.registrationNo);
      }
      if (this.strategy === 'update') {
        await updatePersonWithin(this.tx, existing.id, fields, this.context);
        this.counts.persons.updated++;
      } else {
        this.counts.persons.skipped++;
      }
    }
  }

  async importJobTitles(records: ImportBundle['jobTitles']): Promise<void> {
    for (const { id: key, ...fields } of records) {
      const existing = first(
        await this.tx.select({ id: jobTitles.id }).from(jobTitles).where(eq(jobTitles.name, fields.name)),
      );

      if (!existing) {
        const jobTitle = await insertJobTitle(this.tx, fields, this.context);
        this.jobTitleIds.set(key, jobTitle.id);
        this.counts.jobTitles.created++;
        continue;
      }

      this.jobTitleIds.set(key, existing.id);
      if (this.strategy === 'fail') {
        throw new ConflictError(`Job title "${fields.name}" already exists`);
      }
      if (this.strategy === 'update') {
        await updateJobTitleWithin(this.tx, existing.id, { shortName: fields.shortName ?? null }, this.context);
        this.counts.jobTitles.updated++;
      } else {
        this.counts.jobTitles.skipped++;
      }
    }
  }

  /**
   * Replay each lineage through the version chain: the first record starts
   * (or continues) the lineage, every later one supersedes the CURRENT
   * version, and a TERMINATED last record ends it.
   */
  async importAssignments(groups: readonly LineageGroup[]): Promise<void> {
    for (const group of groups) {
      const key = {
        personId: mapped(this.personIds, 'person', group.personId),
        unitId: mapped(this.unitIds, 'unit', group.unitId),
        jobTitleId: mapped(this.jobTitleIds, 'job title', group.jobTitleId),
      };
      const lineage = and(
        eq(assignments.personId, key.personId),
        eq(assignments.unitId, key.unitId),
        eq(assignments.jobTitleId, key.jobTitleId),
      );

      const [{ total: stored }] = await this.tx.select({ total: count() }).from(assignments).where(lineage);
      if (stored > 0) {
        if (this.strategy === 'fail') {
          const { personId, unitId, jobTitleId } = group;
          throw new ConflictError(
            `Assignment lineage (person ${personId}, unit ${unitId}, job title ${jobTitleId}) already exists`,
          );
        }
        if (this.strategy === 'skip') {
          this.counts.assignments.skipped += group.rows.length;
          continue;
        }
      }
      const outcome = stored > 0 ? 'updated' : 'created';

      for (const [position, { index, record }] of group.rows.entries()) {
        const isLast = position === group.rows.length - 1;
        const changes = {
          percentage: record.percentage,
          isAdInterim: record.isAdInterim,
          isUnitBoss: record.isUnitBoss,
          validFrom: record.validFrom,
          // Earlier versions get their end date from the successor
          validTo: isLast && record.status === 'CURRENT' ? (record.validTo ?? null) : null,
          notes: record.notes ?? null,
          flags: record.flags ?? null,
        };

        try {
          const current = first(
            await this.tx
              .select({ id: assignments.id })
              .from(assignments)
              .where(and(lineage, eq(assignments.status, 'CURRENT'))),
          );
          const row = current
            ? await assignmentService.updateWithin(this.tx, current.id, changes, this.context)
            : await assignmentService.createWithin(this.tx, { ...key, ...changes }, this.context);

          if (isLast && record.status === 'TERMINATED') {
            await assignmentService.terminateWithin(this.tx, row.id, record.validTo ?? undefined, this.context);
          }
        } catch (error) {
          if (isDomainError(error) && !(error instanceof ConflictError)) {
            throw new ValidationError(`assignments[${index}]: ${error.message}`, {
              path: `assignments[${index}]`,
            });
          }
          throw error;
        }
        this.counts.assignments[outcome]++;
      }
    }
  }

  async importCompanies(records: ImportBundle['companies']): Promise<void> {
    for (const { id: key, ...fields } of records) {
      const contacts = {
        mainContactId:
          fields.mainContactId != null ? mapped(this.personIds, 'person', fields.mainContactId) : null,
        financialContactId:
          fields.financialContactId != null ? mapped(this.personIds, 'person', fields.financialContactId) : null,
      };
      const existing = fields.registrationNo
        ? first(
            await this.tx
              .select({ id: companies.id })
              .from(companies)
              .where(eq(companies.registrationNo, fields.registrationNo)),
          )
        : undefined;

      if (!existing) {
        const company = await insertCompany(this.tx, { ...fields, ...contacts }, this.context);
        this.companyIds.set(key, company.id);
        this.counts.companies.created++;
        continue;
      }

      this.companyIds.set(key, existing.id);
      if (this.strategy === 'fail') {
        throw companyRegistrationConflict(fields.registrationNo);
      }
      if (this.strategy === 'update') {
        await updateCompanyWithin(this.tx, existing.id, { ...fields, ...contacts }, this.context);
        this.counts.companies.updated++;
      } else {
        this.counts.companies.skipped++;
      }
    }
  }
}

function toIdMap(ids: Map<number, number>): Record<number, number> {
  return Object.fromEntries(ids);
}

/**
 * Write a bundle in dependency order inside one transaction. Either every
 * record is applied or none is; a dry run applies everything and then
 * rolls back, so it reports the same counts and errors a real run would.
 */
export async function importBundle(
  bundle: ImportBundle,
  options: ImportOptions,
  context: MutationContext = {},
): Promise<ImportResult> {
  const { orderedUnits, lineages } = validateBundle(bundle);

  try {
    return await writeTransaction(async (tx) => {
      const run = new ImportRun(tx, options.conflictStrategy, context);
      // Every reference points at a group written before it
      await run.importUnits(orderedUnits);
      await run.importPersons(bundle.persons);
      await run.importJobTitles(bundle.jobTitles);
      await run.importAssignments(lineages);
      await run.importCompanies(bundle.companies);

      const result: ImportResult = {
        dryRun: options.dryRun,
        conflictStrategy: options.conflictStrategy,
        counts: run.counts,
        idMap: {
          units: toIdMap(run.unitIds),
          persons: toIdMap(run.personIds),
          jobTitles: toIdMap(run.jobTitleIds),
          companies: toIdMap(run.companyIds),
        },
      };
      if (options.dryRun) {
        throw new DryRunRollback(result);
      }
      return result;
    });
  } catch (error) {
    if (error instanceof DryRunRollback) {
      return error.result;
    }
    if (isUniqueViolation(error)) {
      throw new ConflictError('Import collides with records stored meanwhile; reload and try again');
    }
    throw error;
  }
}

// ============================================================================
// Export
// ============================================================================

/** Every stored record in the bundle format `importBundle` reads, keyed by database id. */
export async function exportBundle(): Promise<ExportBundle> {
  const unitRows = await db.select().from(units).orderBy(asc(units.id));
  const jobTitleRows = await db.select().from(jobTitles).orderBy(asc(jobTitles.id));
  const personRows = await db.select().from(persons).orderBy(asc(persons.id));
  const assignmentRows = await db
    .select()
    .from(assignments)
    .orderBy(
      asc(assignments.personId),
      asc(assignments.unitId),
      asc(assignments.jobTitleId),
      asc(assignments.version),
    );
  const companyRows = await db.select().from(companies).orderBy(asc(companies.id));

  return {
    exportedAt: new Date().toISOString(),
    units: unitRows.map((u) => ({
      id: u.id,
      name: u.name,
      shortName: u.shortName,
      unitType: u.unitType,
      parentUnitId: u.parentUnitId,
      emoji: u.emoji,
      image: u.image,
    })),
    jobTitles: jobTitleRows.map((j) => ({ id: j.id, name: j.name, shortName: j.shortName })),
    persons: personRows.map((p) => ({
      id: p.id,
      firstName: p.firstName,
      lastName: p.lastName,
      shortName: p.shortName,
      registrationNo: p.registrationNo,
      email: p.email,
      profileImage: p.profileImage,
    })),
    assignments: assignmentRows.map((a) => ({
      personId: a.personId,
      unitId: a.unitId,
      jobTitleId: a.jobTitleId,
      version: a.version,
      percentage: fractionToPercent(a.percentage),
      isAdInterim: a.isAdInterim,
      isUnitBoss: a.isUnitBoss,
      validFrom: a.validFrom,
      validTo: a.validTo,
      status: a.status,
      notes: a.notes,
      flags: a.flags,
    })),
    companies: companyRows.map(({ datetimeCreated: _created, datetimeUpdated: _updated, ...company }) => company),
  };
}

/** One entity type as CSV. */
export async function exportCsv(entity: ExportEntity): Promise<string> {
  switch (entity) {
    case 'units': {
      const rows = await db.select().from(units).orderBy(asc(units.id));
      return toCsv(['id', 'name', 'shortName', 'unitType', 'parentUnitId', 'emoji'] as const, rows);
    }
    case 'job-titles': {
      const rows = await db.select().from(jobTitles).orderBy(asc(jobTitles.id));
      return toCsv(['id', 'name', 'shortName'] as const, rows);
    }
    case 'persons': {
      const rows = await db
        .select()
        .from(persons)
        .orderBy(asc(persons.lastName), asc(persons.firstName), asc(persons.id));
      return toCsv(['id', 'firstName', 'lastName', 'shortName', 'registrationNo', 'email'] as const, rows);
    }
    case 'companies': {
      const rows = await db.select().from(companies).orderBy(asc(companies.name), asc(companies.id));
      return toCsv(
        [
          'id',
          'name',
          'shortName',
          'registrationNo',
          'city',
          'country',
          'email',
          'validFrom',
          'validTo',
          'isActive',
        ] as const,
        rows.map((company) => ({ ...company, isActive: isCompanyActive(company) })),
      );
    }
    case 'assignments':
      return assignmentService.exportCsv();
  }
}
