import { describe, it, expect, beforeEach } from 'vitest';
import {
  classifyWorkload,
  getWorkloadReport,
  summarizeWorkload,
} from '../services/workload.service.js';
import { assignmentService } from '../services/assignment.service.js';
import { NotFoundError } from '../lib/errors.js';
import { getPersonWorkload, getWorkloadHistory } from '../services/workload.service.js';
import { fixtures, resetDatabase } from './setup.js';

describe('classifyWorkload', () => {
  it.each([
    [0, 'low'],
    [49, 'low'],
    [50, 'normal'],
    [99, 'normal'],
    [100, 'high'],
    [120, 'high'],
    [121, 'overloaded'],
  ])('should classify %i%% as %s', (total, expected) => {
    expect(classifyWorkload(total)).toBe(expected);
  });
});

describe('summarizeWorkload', () => {
  it('should sum whole percent points without float drift', () => {
    const summary = summarizeWorkload([
      { percentage: 0.1, isAdInterim: false, unitId: 1 },
      { percentage: 0.2, isAdInterim: false, unitId: 1 },
    ]);

    expect(summary.totalPercentage).toBe(30);
    expect(summary.status).toBe('low');
    expect(summary.unitCount).toBe(1);
    expect(summary.recommendations).toEqual(['Workload of 30% leaves capacity for further assignments']);
  });

  it('should flag overload, ad interim roles and spread across units', () => {
    const summary = summarizeWorkload([
      { percentage: 0.4, isAdInterim: true, unitId: 1 },
      { percentage: 0.3, isAdInterim: true, unitId: 2 },
      { percentage: 0.3, isAdInterim: true, unitId: 3 },
      { percentage: 0.3, isAdInterim: false, unitId: 4 },
    ]);

    expect(summary).toEqual({
      totalPercentage: 130,
      status: 'overloaded',
      color: 'danger',
      assignmentCount: 4,
      adInterimCount: 3,
      unitCount: 4,
      recommendations: [
        'Workload of 130% exceeds 120%; reduce or redistribute assignments',
        'Holds 3 ad interim roles; consider permanent appointments',
        'Assigned across 4 units; consider consolidating',
      ],
    });
  });

  it('should report zero for no assignments', () => {
    expect(summarizeWorkload([])).toMatchObject({ totalPercentage: 0, status: 'low', color: 'info' });
  });
});

describe('workload queries', () => {
  beforeEach(async () => {
    await resetDatabase();
    await fixtures.lineage();
  });

  it('should ignore HISTORICAL and TERMINATED versions', async () => {
    await fixtures.jobTitle('Lead');
    await assignmentService.create({ personId: 1, unitId: 1, jobTitleId: 1, percentage: 60, validFrom: '2024-01-01' });
    await assignmentService.update(1, { percentage: 70, validFrom: '2024-02-01' });
    await assignmentService.create({ personId: 1, unitId: 1, jobTitleId: 2, percentage: 40, validFrom: '2024-01-01' });
    await assignmentService.terminate(3, '2024-03-01');

    const workload = await getPersonWorkload(1);

    expect(workload).toMatchObject({
      personId: 1,
      personName: 'Ada Lovelace',
      totalPercentage: 70,
      status: 'normal',
      color: 'success',
      assignmentCount: 1,
      recommendations: [],
    });
  });

  it('should throw NotFoundError for an unknown person', async () => {
    await expect(getPersonWorkload(404)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('should group persons into bands with an average', async () => {
    await fixtures.person({ firstName: 'Grace', lastName: 'Hopper' });
    await fixtures.person({ firstName: 'Alan', lastName: 'Turing' });
    await assignmentService.create({ personId: 1, unitId: 1, jobTitleId: 1, percentage: 100 });
    await assignmentService.create({ personId: 2, unitId: 1, jobTitleId: 1, percentage: 30 });

    const report = await getWorkloadReport();

    expect(report.totalPersons).toBe(2);
    expect(report.averageWorkload).toBe(65);
    expect(report.counts).toEqual({ low: 1, normal: 0, high: 1, overloaded: 0 });
    expect(report.bands.high.map((w) => w.personName)).toEqual(['Ada Lovelace']);
    expect(report.bands.low.map((w) => w.personName)).toEqual(['Grace Hopper']);
  });
});

describe('getWorkloadHistory', () => {
  beforeEach(async () => {
    await resetDatabase();
  });

  async function twoLineages(): Promise<void> {
    await fixtures.lineage();
    await fixtures.unit({ name: 'Research' });
    await assignmentService.create({
      personId: 1,
      unitId: 1,
      jobTitleId: 1,
      percentage: 60,
      validFrom: '2024-01-01',
    });
    await assignmentService.update(1, { percentage: 80, validFrom: '2024-06-01' });
    await assignmentService.create({
      personId: 1,
      unitId: 2,
      jobTitleId: 1,
      percentage: 40,
      validFrom: '2024-03-01',
    });
    await assignmentService.terminate(3, '2024-09-01');
  }

  it('should report the workload at every change date, newest first', async () => {
    await twoLineages();

    const history = await getWorkloadHistory(1);

    expect(history).toEqual([
      { date: '2024-09-01', totalPercentage: 80, status: 'normal', assignmentCount: 1 },
      { date: '2024-06-01', totalPercentage: 120, status: 'high', assignmentCount: 2 },
      { date: '2024-03-01', totalPercentage: 100, status: 'high', assignmentCount: 2 },
      { date: '2024-01-01', totalPercentage: 60, status: 'normal', assignmentCount: 1 },
    ]);
  });

  it('should keep only the most recent points', async () => {
    await twoLineages();

    const history = await getWorkloadHistory(1, 2);

    expect(history.map((point) => point.date)).toEqual(['2024-09-01', '2024-06-01']);
  });

  it('should return no points for a person without assignments', async () => {
    await fixtures.person();

    expect(await getWorkloadHistory(1)).toEqual([]);
  });

  it('should throw NotFoundError for an unknown person', async () => {
    await expect(getWorkloadHistory(42)).rejects.toBeInstanceOf(NotFoundError);
  });
});
