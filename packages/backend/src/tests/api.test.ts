import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildTestApp, fixtures, parseJsonResponse, resetDatabase } from './setup.js';
import type {
  AssignmentDto,
  CompanyView,
  ExportBundle,
  ImportResult,
  OrgChartNode,
  PaginatedResponse,
  PersonDetail,
  PotentialDuplicate,
  WorkloadHistoryPoint,
} from '../types/index.js';
import type { AuditEvent } from '../db/schema.js';

interface ErrorBody {
  error: string;
  message: string;
  statusCode: number;
  details?: unknown;
}

describe('HTTP API', () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    app = await buildTestApp();
  });

  afterAll(async () => {
    await app.close();
  });

  beforeEach(async () => {
    await resetDatabase();
  });

  it('GET /health reports the database state', async () => {
    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(parseJsonResponse(response)).toEqual({
      status: 'ok',
      environment: 'testing',
      version: '1.0.0',
      database: 'ok',
    });
  });

  describe('persons', () => {
    it('POST /api/persons creates a person', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/persons',
        payload: { firstName: 'Ada', lastName: 'Lovelace' },
      });

      expect(response.statusCode).toBe(201);
      expect(parseJsonResponse(response)).toMatchObject({ id: 1, firstName: 'Ada' });
    });

    it('POST /api/persons returns field errors for an invalid body', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/persons',
        payload: { firstName: '', lastName: 'Lovelace' },
      });
      const body = parseJsonResponse<ErrorBody>(response);

      expect(response.statusCode).toBe(400);
      expect(body.error).toBe('Validation Error');
      expect(body.details).toEqual([{ path: 'firstName', message: 'First name is required' }]);
    });

    it('rejects a malformed JSON body', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/persons',
        headers: { 'content-type': 'application/json' },
        payload: '{"firstName":',
      });

      expect(response.statusCode).toBe(400);
      expect(parseJsonResponse<ErrorBody>(response).error).toBe('Bad Request');
    });
  });

  describe('assignments', () => {
    beforeEach(async () => {
      await fixtures.lineage();
    });

    const body = { personId: 1, unitId: 1, jobTitleId: 1, percentage: 60, validFrom: '2024-01-01' };

    it('runs create, edit and terminate through the version chain', async () => {
      const created = await app.inject({ method: 'POST', url: '/api/assignments', payload: body });
      expect(created.statusCode).toBe(201);
      expect(parseJsonResponse(created)).toMatchObject({
        assignment: { id: 1, version: 1, percentage: 60, status: 'CURRENT' },
        warnings: [],
      });

      const edited = await app.inject({
        method: 'PUT',
        url: '/api/assignments/1',
        payload: { percentage: 80, validFrom: '2024-02-01' },
      });
      expect(edited.statusCode).toBe(200);
      expect(parseJsonResponse<AssignmentDto>(edited)).toMatchObject({ id: 2, version: 2 });

      const stale = await app.inject({ method: 'POST', url: '/api/assignments/1/terminate' });
      expect(stale.statusCode).toBe(422);
      expect(parseJsonResponse<ErrorBody>(stale)).toMatchObject({
        error: 'Invalid State',
        statusCode: 422,
        details: { currentStatus: 'HISTORICAL', attemptedAction: 'terminate' },
      });

      const person = await app.inject({ method: 'GET', url: '/api/persons/1' });
      expect(parseJsonResponse<PersonDetail>(person).workload.totalPercentage).toBe(80);

      const terminated = await app.inject({
        method: 'POST',
        url: '/api/assignments/2/terminate',
        payload: { terminationDate: '2024-03-01' },
      });
      expect(parseJsonResponse<AssignmentDto>(terminated)).toMatchObject({
        status: 'TERMINATED',
        validTo: '2024-03-01',
      });

      const versions = await app.inject({ method: 'GET', url: '/api/assignments/2/versions' });
      expect(parseJsonResponse<AssignmentDto[]>(versions).map((v) => v.status)).toEqual([
        'HISTORICAL',
        'TERMINATED',
      ]);
    });

    it('rejects a percentage outside 1..100', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/assignments',
        payload: { ...body, percentage: 0 },
      });

      expect(response.statusCode).toBe(400);
      expect(parseJsonResponse(response)).toEqual({
        error: 'Validation Error',
        message: 'Percentage must be a whole number between 1 and 100',
        statusCode: 400,
        details: { field: 'percentage', value: 0 },
      });
    });

    it('refuses a duplicate CURRENT assignment', async () => {
      await app.inject({ method: 'POST', url: '/api/assignments', payload: body });

      const response = await app.inject({ method: 'POST', url: '/api/assignments', payload: body });

      expect(response.statusCode).toBe(422);
    });

    it('returns 404 for an unknown assignment and 400 for a bad id', async () => {
      const missing = await app.inject({ method: 'GET', url: '/api/assignments/99' });
      const invalid = await app.inject({ method: 'GET', url: '/api/assignments/abc' });

      expect(missing.statusCode).toBe(404);
      expect(parseJsonResponse<ErrorBody>(missing).message).toBe("Assignment with id '99' not found");
      expect(invalid.statusCode).toBe(400);
    });

    it('requires all three lineage ids for the history filter', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/assignments/history?personId=1' });

      expect(response.statusCode).toBe(400);
    });

    it('exports CSV', async () => {
      await app.inject({ method: 'POST', url: '/api/assignments', payload: body });

      const response = await app.inject({ method: 'GET', url: '/api/assignments/export' });

      expect(response.statusCode).toBe(200);
      expect(response.headers['content-type']).toBe('text/csv; charset=utf-8');
      expect(response.body.split('\n')).toHaveLength(2);
    });

    it('records audit events', async () => {
      await app.inject({ method: 'POST', url: '/api/assignments', payload: body });

      const response = await app.inject({
        method: 'GET',
        url: '/api/audit-events?entityType=Assignment',
      });
      const events = parseJsonResponse<PaginatedResponse<AuditEvent>>(response);

      expect(events.pagination.total).toBe(1);
      expect(events.data[0]).toMatchObject({ action: 'CREATE', entityId: 1 });
    });
  });

  it('GET /api/orgchart/tree returns the unit forest', async () => {
    await fixtures.unit({ name: 'Company' });
    await fixtures.unit({ name: 'Engineering', parentUnitId: 1 });

    const response = await app.inject({ method: 'GET', url: '/api/orgchart/tree?showPersons=false' });
    const tree = parseJsonResponse<OrgChartNode[]>(response);

    expect(tree.map((n) => n.name)).toEqual(['Company']);
    expect(tree[0].children.map((n) => n.name)).toEqual(['Engineering']);
  });

  describe('person insights', () => {
    it('GET /api/persons/duplicates pairs persons with the same name', async () => {
      await fixtures.person();
      await fixtures.person();

      const response = await app.inject({ method: 'GET', url: '/api/persons/duplicates' });
      const duplicates = parseJsonResponse<PotentialDuplicate[]>(response);

      expect(response.statusCode).toBe(200);
      expect(duplicates.map((d) => [d.person1.id, d.person2.id, d.matchType])).toEqual([
        [1, 2, 'exact_name_match'],
      ]);
    });

    it('GET /api/persons/:id/workload-history lists the workload per change date', async () => {
      await fixtures.lineage();
      await app.inject({
        method: 'POST',
        url: '/api/assignments',
        payload: { personId: 1, unitId: 1, jobTitleId: 1, percentage: 60, validFrom: '2024-01-01' },
      });

      const response = await app.inject({ method: 'GET', url: '/api/persons/1/workload-history' });
      const missing = await app.inject({ method: 'GET', url: '/api/persons/9/workload-history' });

      expect(response.statusCode).toBe(200);
      expect(parseJsonResponse<WorkloadHistoryPoint[]>(response)).toEqual([
        { date: '2024-01-01', totalPercentage: 60, status: 'normal', assignmentCount: 1 },
      ]);
      expect(missing.statusCode).toBe(404);
    });
  });

  describe('companies', () => {
    it('POST /api/companies creates a company', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/companies',
        payload: { name: 'Acme Srl', registrationNo: 'C-1', validFrom: '2020-01-01' },
      });

      expect(response.statusCode).toBe(201);
      expect(parseJsonResponse<CompanyView>(response)).toMatchObject({
        id: 1,
        country: 'Italy',
        isActive: true,
      });
    });

    it('POST /api/companies rejects an end date before the start date', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/companies',
        payload: { name: 'Acme Srl', validFrom: '2024-02-01', validTo: '2024-01-01' },
      });
      const body = parseJsonResponse<ErrorBody>(response);

      expect(response.statusCode).toBe(400);
      expect(body.details).toEqual([{ path: 'validTo', message: 'End date cannot be before start date' }]);
    });

    it('GET /api/companies filters active companies', async () => {
      await app.inject({ method: 'POST', url: '/api/companies', payload: { name: 'Acme Srl' } });
      await app.inject({
        method: 'POST',
        url: '/api/companies',
        payload: { name: 'Old Works', validTo: '2001-01-01' },
      });

      const response = await app.inject({ method: 'GET', url: '/api/companies?activeOnly=true' });
      const page = parseJsonResponse<PaginatedResponse<CompanyView>>(response);

      expect(page.data.map((c) => c.name)).toEqual(['Acme Srl']);
    });
  });

  describe('import and export', () => {
    const bundle = {
      units: [{ id: 10, name: 'Engineering', unitType: 'OrganizationalUnit' }],
      persons: [{ id: 7, firstName: 'Ada', lastName: 'Lovelace' }],
      jobTitles: [{ id: 3, name: 'Engineer' }],
      assignments: [{ personId: 7, unitId: 10, jobTitleId: 3, percentage: 60, validFrom: '2024-01-01' }],
    };

    it('POST /api/import writes the bundle', async () => {
      const response = await app.inject({ method: 'POST', url: '/api/import', payload: bundle });
      const result = parseJsonResponse<ImportResult>(response);

      expect(response.statusCode).toBe(200);
      expect(result.dryRun).toBe(false);
      expect(result.idMap.units).toEqual({ 10: 1 });
      expect(result.counts.assignments).toEqual({ created: 1, updated: 0, skipped: 0 });
    });

    it('POST /api/import?dryRun=true stores nothing', async () => {
      const response = await app.inject({ method: 'POST', url: '/api/import?dryRun=true', payload: bundle });
      const csv = await app.inject({ method: 'GET', url: '/api/export/units' });

      expect(parseJsonResponse<ImportResult>(response).dryRun).toBe(true);
      expect(csv.body).toBe('id,name,shortName,unitType,parentUnitId,emoji');
    });

    it('POST /api/import rejects an unknown conflict strategy', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/import?conflictStrategy=merge',
        payload: bundle,
      });

      expect(response.statusCode).toBe(400);
    });

    it('GET /api/export returns the bundle as an attachment', async () => {
      await app.inject({ method: 'POST', url: '/api/import', payload: bundle });

      const response = await app.inject({ method: 'GET', url: '/api/export' });
      const exported = parseJsonResponse<ExportBundle>(response);

      expect(response.headers['content-disposition']).toBe('attachment; filename="orgchart-export.json"');
      expect(exported.persons.map((p) => p.lastName)).toEqual(['Lovelace']);
      expect(exported.assignments.map((a) => [a.version, a.status, a.percentage])).toEqual([[1, 'CURRENT', 60]]);
    });

    it('GET /api/export/:entityType returns CSV and rejects unknown types', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/export/job-titles' });
      const unknown = await app.inject({ method: 'GET', url: '/api/export/widgets' });

      expect(response.headers['content-type']).toBe('text/csv; charset=utf-8');
      expect(response.body).toBe('id,name,shortName');
      expect(unknown.statusCode).toBe(400);
    });
  });
});
