import { and, eq } from 'drizzle-orm';
import { db, first, type Executor } from '../lib/db.js';
import { NotFoundError } from '../lib/errors.js';
import { personDisplayName } from '../lib/names.js';
import { fractionToPercent } from '../lib/percentage.js';
import { assignments, persons } from '../db/schema.js';
import type {
  PersonWorkload,
  WorkloadColor,
  WorkloadHistoryPoint,
  WorkloadReport,
  WorkloadStatus,
  WorkloadSummary,
} from '../types/index.js';

// ============================================================================
// Classification
// ============================================================================

/** Lower bounds (in percent points) of the normal and high bands; above `overloaded` is overloaded. */
export const WORKLOAD_THRESHOLDS = {
  normal: 50,
  high: 100,
  overloaded: 120,
} as const;

export const WORKLOAD_COLORS: Record<WorkloadStatus, WorkloadColor> = {
  low: 'info',
  normal: 'success',
  high: 'warning',
  overloaded: 'danger',
};

export const WORKLOAD_STATUSES: readonly WorkloadStatus[] = ['low', 'normal', 'high', 'overloaded'];

export function classifyWorkload(totalPercentage: number): WorkloadStatus {
  if (totalPercentage < WORKLOAD_THRESHOLDS.normal) return 'low';
  if (totalPercentage < WORKLOAD_THRESHOLDS.high) return 'normal';
  if (totalPercentage <= WORKLOAD_THRESHOLDS.overloaded) return 'high';
  return 'overloaded';
}

const MAX_AD_INTERIM_ROLES = 2;
const MAX_UNITS = 3;

export interface WorkloadItem {
  /** Stored fraction, 0 < p <= 1 */
  percentage: number;
  isAdInterim: boolean;
  unitId: number;
}

/**
 * Aggregate CURRENT assignments into a workload summary.
 * Each assignment contributes its whole percent points, so the total never
 * drifts through floating point addition.
 */
export function summarizeWorkload(items: readonly WorkloadItem[]): WorkloadSummary {
  const totalPercentage = items.reduce((sum, item) => sum + fractionToPercent(item.percentage), 0);
  const status = classifyWorkload(totalPercentage);
  const adInterimCount = items.filter((item) => item.isAdInterim).length;
  const unitCount = new Set(items.map((item) => item.unitId)).size;

  const recommendations: string[] = [];
  switch (status) {
    case 'overloaded':
      recommendations.push(
        `Workload of ${totalPercentage}% exceeds ${WORKLOAD_THRESHOLDS.overloaded}%; reduce or redistribute assignments`,
      );
      break;
    case 'high':
      recommendations.push(`Workload of ${totalPercentage}% is at or above full time; monitor closely`);
      break;
    case 'low':
      recommendations.push(`Workload of ${totalPercentage}% leaves capacity for further assignments`);
      break;
    case 'normal':
      break;
  }
  if (adInterimCount > MAX_AD_INTERIM_ROLES) {
    recommendations.push(`Holds ${adInterimCount} ad interim roles; consider permanent appointments`);
  }
  if (unitCount > MAX_UNITS) {
    recommendations.push(`Assigned across ${unitCount} units; consider consolidating`);
  }

  return {
    totalPercentage,
    status,
    color: WORKLOAD_COLORS[status],
    assignmentCount: items.length,
    adInterimCount,
    unitCount,
    recommendations,
  };
}

// ============================================================================
// Queries
// ============================================================================

function currentItemsForPerson(executor: Executor, personId: number): Promise<WorkloadItem[]> {
  return executor
    .select({
      percentage: assignments.percentage,
      isAdInterim: assignments.isAdInterim,
      unitId: assignments.unitId,
    })
    .from(assignments)
    .where(and(eq(assignments.personId, personId), eq(assignments.status, 'CURRENT')));
}

export async function summarizePersonWorkload(
  personId: number,
  executor: Executor = db,
): Promise<WorkloadSummary> {
  return summarizeWorkload(await currentItemsForPerson(executor, personId));
}

/** Total CURRENT percent points of a person, read through `executor`. */
export async function computeWorkloadPoints(executor: Executor, personId: number): Promise<number> {
  const summary = await summarizePersonWorkload(personId, executor);
  return summary.totalPercentage;
}

async function findPersonOrThrow(personId: number) {
  const person = first(await db.select().from(persons).where(eq(persons.id, personId)));
  if (!person) {
    throw new NotFoundError('Person', personId);
  }
  return person;
}

export async function getPersonWorkload(personId: number): Promise<PersonWorkload> {
  const person = await findPersonOrThrow(personId);

  return {
    personId,
    personName: personDisplayName(person),
    ...(await summarizePersonWorkload(personId)),
  };
}

export const WORKLOAD_HISTORY_LIMIT = 12;

/**
 * Workload of a person at every date on which one of their assignment
 * versions starts or ends, newest first. A version counts on the dates in
 * [validFrom, validTo), so a successor replaces its predecessor on the
 * day it starts instead of adding to it.
 */
export async function getWorkloadHistory(
  personId: number,
  limit: number = WORKLOAD_HISTORY_LIMIT,
): Promise<WorkloadHistoryPoint[]> {
  await findPersonOrThrow(personId);

  const versions = await db
    .select({
      percentage: assignments.percentage,
      isAdInterim: assignments.isAdInterim,
      unitId: assignments.unitId,
      validFrom: assignments.validFrom,
      validTo: assignments.validTo,
    })
    .from(assignments)
    .where(eq(assignments.personId, personId));

  const dates = new Set<string>();
  for (const version of versions) {
    dates.add(version.validFrom);
    if (version.validTo) dates.add(version.validTo);
  }

  return [...dates]
    .sort((a, b) => b.localeCompare(a))
    .slice(0, limit)
    .map((date) => {
      const active = versions.filter(
        (version) => version.validFrom <= date && (version.validTo === null || version.validTo > date),
      );
      const summary = summarizeWorkload(active);
      return {
        date,
        totalPercentage: summary.totalPercentage,
        status: summary.status,
        assignmentCount: summary.assignmentCount,
      };
    });
}

/**
 * Group every person holding at least one CURRENT assignment into the
 * four workload bands, each band sorted by descending workload.
 */
export async function getWorkloadReport(): Promise<WorkloadReport> {
  const rows = await db
    .select({
      personId: assignments.personId,
      firstName: persons.firstName,
      lastName: persons.lastName,
      percentage: assignments.percentage,
      isAdInterim: assignments.isAdInterim,
      unitId: assignments.unitId,
    })
    .from(assignments)
    .innerJoin(persons, eq(assignments.personId, persons.id))
    .where(eq(assignments.status, 'CURRENT'));

  const byPerson = new Map<number, { personName: string; items: WorkloadItem[] }>();
  for (const row of rows) {
    let entry = byPerson.get(row.personId);
    if (!entry) {
      entry = { personName: personDisplayName(row), items: [] };
      byPerson.set(row.personId, entry);
    }
    entry.items.push(row);
  }

  const bands: Record<WorkloadStatus, PersonWorkload[]> = {
    low: [],
    normal: [],
    high: [],
    overloaded: [],
  };
  let sum = 0;

  for (const [personId, { personName, items }] of byPerson) {
    const workload: PersonWorkload = { personId, personName, ...summarizeWorkload(items) };
    bands[workload.status].push(workload);
    sum += workload.totalPercentage;
  }

  for (const status of WORKLOAD_STATUSES) {
    bands[status].sort((a, b) => b.totalPercentage - a.totalPercentage || a.personId - b.personId);
  }

  const totalPersons = byPerson.size;

  return {
    totalPersons,
    averageWorkload: totalPersons > 0 ? Math.round((sum / totalPersons) * 10) / 10 : 0,
    counts: {
      low: bands.low.length,
      normal: bands.normal.length,
      high: bands.high.length,
      overloaded: bands.overloaded.length,
    },
    bands,
  };
}
