import { describe, it, expect, beforeEach } from 'vitest';
import {
  getMatrix,
  getSpanReport,
  getStatistics,
  getTree,
  getVacantUnits,
} from '../services/orgchart.service.js';
import { assignmentService } from '../services/assignment.service.js';
import { fixtures, resetDatabase } from './setup.js';

describe('Org chart service', () => {
  // 1 Company
  // ├── 2 Engineering  (Grace 100% boss, Ada 60%)
  // │   └── 4 Platform (Grace 30%)
  // └── 3 Finance
  beforeEach(async () => {
    await resetDatabase();
    await fixtures.unit({ name: 'Company' });
    await fixtures.unit({ name: 'Engineering', parentUnitId: 1 });
    await fixtures.unit({ name: 'Finance', parentUnitId: 1 });
    await fixtures.unit({ name: 'Platform', unitType: 'Function', parentUnitId: 2 });
    await fixtures.person();
    await fixtures.person({ firstName: 'Grace', lastName: 'Hopper' });
    await fixtures.jobTitle();

    await assignmentService.create({ personId: 1, unitId: 2, jobTitleId: 1, percentage: 60 });
    await assignmentService.create({
      personId: 2,
      unitId: 2,
      jobTitleId: 1,
      percentage: 100,
      isUnitBoss: true,
    });
    await assignmentService.create({ personId: 2, unitId: 4, jobTitleId: 1, percentage: 30 });
  });

  it('should nest units with their CURRENT staff, bosses first', async () => {
    const [company] = await getTree({ showPersons: true });

    expect(company.depth).toBe(0);
    expect(company.children.map((n) => n.name)).toEqual(['Engineering', 'Finance']);
    const engineering = company.children[0];
    expect(engineering.persons.map((p) => [p.personName, p.isUnitBoss])).toEqual([
      ['Grace Hopper', true],
      ['Ada Lovelace', false],
    ]);
    expect(engineering.children[0]).toMatchObject({ name: 'Platform', depth: 2 });
    expect(engineering.children[0].persons.map((p) => p.percentage)).toEqual([30]);
  });

  it('should omit staff when showPersons is false', async () => {
    const [company] = await getTree({ showPersons: false });

    expect(company.children[0].persons).toEqual([]);
  });

  it('should return the subtree under a unit', async () => {
    const tree = await getTree({ rootUnitId: 2, showPersons: true });

    expect(tree.map((n) => [n.id, n.depth])).toEqual([[2, 1]]);
    expect(tree[0].children.map((n) => n.id)).toEqual([4]);
  });

  it('should build the person x assignment matrix', async () => {
    const matrix = await getMatrix();

    expect(matrix.map((row) => [row.personName, row.totalPercentage, row.status])).toEqual([
      ['Ada Lovelace', 60, 'normal'],
      ['Grace Hopper', 130, 'overloaded'],
    ]);
    expect(matrix[1].assignments.map((a) => a.unitName)).toEqual(['Engineering', 'Platform']);
  });

  it('should list vacant units with their path', async () => {
    const vacant = await getVacantUnits();

    expect(vacant.map((u) => u.path)).toEqual(['Company', 'Company / Finance']);
  });

  it('should rank units by span of control', async () => {
    const report = await getSpanReport();

    expect(report.map((r) => [r.unitName, r.directUnits, r.directPersons, r.total])).toEqual([
      ['Engineering', 1, 2, 3],
      ['Company', 2, 0, 2],
      ['Platform', 0, 1, 1],
      ['Finance', 0, 0, 0],
    ]);
  });

  it('should compute org chart statistics', async () => {
    const stats = await getStatistics();

    expect(stats).toEqual({
      totalUnits: 4,
      totalPersons: 2,
      personsWithAssignments: 2,
      maxDepth: 2,
      averageSpanOfControl: 1.5,
      vacantUnits: 2,
    });
  });
});
