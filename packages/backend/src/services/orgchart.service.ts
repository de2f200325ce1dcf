import { count, countDistinct, eq } from 'drizzle-orm';
import { db } from '../lib/db.js';
import { assignments, persons, type Unit } from '../db/schema.js';
import { assignmentService } from './assignment.service.js';
import { loadHierarchy } from './unit.service.js';
import { classifyWorkload } from './workload.service.js';
import type { TreeQueryInput } from '../schemas/orgchart.schema.js';
import type {
  AssignmentView,
  MatrixRow,
  OrgChartNode,
  OrgChartPerson,
  OrgChartStatistics,
} from '../types/index.js';

export interface VacantUnit {
  id: number;
  name: string;
  unitType: Unit['unitType'];
  path: string;
}

export interface SpanReportEntry {
  unitId: number;
  unitName: string;
  depth: number;
  directUnits: number;
  directPersons: number;
  total: number;
}

function toOrgChartPerson(view: AssignmentView): OrgChartPerson {
  return {
    assignmentId: view.id,
    personId: view.personId,
    personName: view.personName,
    jobTitleName: view.jobTitleName,
    percentage: view.percentage,
    isAdInterim: view.isAdInterim,
    isUnitBoss: view.isUnitBoss,
  };
}

function groupByUnit(views: AssignmentView[]): Map<number, OrgChartPerson[]> {
  const byUnit = new Map<number, OrgChartPerson[]>();
  for (const view of views) {
    const list = byUnit.get(view.unitId) ?? [];
    list.push(toOrgChartPerson(view));
    byUnit.set(view.unitId, list);
  }
  return byUnit;
}

/** Distinct persons with a CURRENT assignment, keyed by unit. */
async function currentPersonCounts(): Promise<Map<number, number>> {
  const rows = await db
    .select({ unitId: assignments.unitId, total: countDistinct(assignments.personId) })
    .from(assignments)
    .where(eq(assignments.status, 'CURRENT'))
    .groupBy(assignments.unitId);
  return new Map<number, number>(rows.map((row) => [row.unitId, row.total]));
}

// ============================================================================
// Tree
// ============================================================================

/**
 * Nested unit forest, or the subtree under `rootUnitId`. With
 * `showPersons` each node lists its CURRENT assignments, unit bosses first.
 */
export async function getTree(query: TreeQueryInput): Promise<OrgChartNode[]> {
  const hierarchy = await loadHierarchy();
  const personsByUnit = query.showPersons
    ? groupByUnit(await assignmentService.listAllCurrent())
    : new Map<number, OrgChartPerson[]>();

  return hierarchy.toTree<OrgChartNode>(
    (unit, children, depth) => ({
      id: unit.id,
      name: unit.name,
      shortName: unit.shortName,
      unitType: unit.unitType,
      emoji: unit.emoji,
      parentUnitId: unit.parentUnitId,
      depth,
      persons: personsByUnit.get(unit.id) ?? [],
      children,
    }),
    query.rootUnitId,
  );
}

// ============================================================================
// Matrix
// ============================================================================

/** One row per person holding CURRENT assignments, ordered by name. */
export async function getMatrix(): Promise<MatrixRow[]> {
  const views = await assignmentService.listAllCurrent();
  const rows = new Map<number, MatrixRow>();

  for (const view of views) {
    let row = rows.get(view.personId);
    if (!row) {
      row = {
        personId: view.personId,
        personName: view.personName,
        assignments: [],
        totalPercentage: 0,
        status: 'low',
      };
      rows.set(view.personId, row);
    }
    row.assignments.push({
      assignmentId: view.id,
      unitId: view.unitId,
      unitName: view.unitName,
      jobTitleName: view.jobTitleName,
      percentage: view.percentage,
      isAdInterim: view.isAdInterim,
      isUnitBoss: view.isUnitBoss,
    });
    row.totalPercentage += view.percentage;
  }

  return [...rows.values()]
    .map((row) => ({ ...row, status: classifyWorkload(row.totalPercentage) }))
    .sort((a, b) => a.personName.localeCompare(b.personName) || a.personId - b.personId);
}

// ============================================================================
// Analysis
// ============================================================================

export async function getVacantUnits(): Promise<VacantUnit[]> {
  const hierarchy = await loadHierarchy();
  const staffed = await currentPersonCounts();

  return hierarchy
    .all()
    .filter((unit) => !staffed.has(unit.id))
    .map((unit) => ({
      id: unit.id,
      name: unit.name,
      unitType: unit.unitType,
      path: [...hierarchy.ancestors(unit.id), unit].map((u) => u.name).join(' / '),
    }));
}

export async function getSpanReport(): Promise<SpanReportEntry[]> {
  const hierarchy = await loadHierarchy();
  const staffed = await currentPersonCounts();

  return hierarchy
    .all()
    .map((unit) => {
      const directUnits = hierarchy.childrenOf(unit.id).length;
      const directPersons = staffed.get(unit.id) ?? 0;
      return {
        unitId: unit.id,
        unitName: unit.name,
        depth: hierarchy.depth(unit.id),
        directUnits,
        directPersons,
        total: directUnits + directPersons,
      };
    })
    .sort((a, b) => b.total - a.total || a.unitId - b.unitId);
}

export async function getStatistics(): Promise<OrgChartStatistics> {
  const hierarchy = await loadHierarchy();
  const staffed = await currentPersonCounts();

  const [personsRow] = await db.select({ total: count() }).from(persons);
  const [assignedRow] = await db
    .select({ total: countDistinct(assignments.personId) })
    .from(assignments)
    .where(eq(assignments.status, 'CURRENT'));

  const parents = hierarchy.all().filter((unit) => !hierarchy.isLeaf(unit.id));
  const childLinks = hierarchy.size - hierarchy.roots().length;

  return {
    totalUnits: hierarchy.size,
    totalPersons: personsRow.total,
    personsWithAssignments: assignedRow.total,
    maxDepth: hierarchy.maxDepth(),
    averageSpanOfControl:
      parents.length > 0 ? Math.round((childLinks / parents.length) * 10) / 10 : 0,
    vacantUnits: hierarchy.all().filter((unit) => !staffed.has(unit.id)).length,
  };
}
