import type { FastifyInstance } from 'fastify';
import { buildApp } from '../app.js';
import { getConfig, type AppConfig } from '../lib/config/app.js';
import { client } from '../lib/db.js';
import { createPerson } from '../services/person.service.js';
import { createUnit } from '../services/unit.service.js';
import { createJobTitle } from '../services/job-title.service.js';
import type { CreatePersonInput } from '../schemas/persons.schema.js';
import type { CreateUnitInput } from '../schemas/units.schema.js';
import type { Person, Unit, JobTitle } from '../db/schema.js';

export async function buildTestApp(overrides: Partial<AppConfig> = {}): Promise<FastifyInstance> {
  const app = await buildApp({ ...getConfig(), ...overrides });
  await app.ready();
  return app;
}

/** Empty every table and restart id sequences so each test sees ids from 1. */
export async function resetDatabase(): Promise<void> {
  await client.exec(`
    TRUNCATE audit_events, person_job_assignments, companies, persons, units, job_titles
    RESTART IDENTITY CASCADE;
  `);
}

// Helper to parse JSON response
export function parseJsonResponse<T>(response: { body: string }): T {
  return JSON.parse(response.body) as T;
}

// Fixture builders
export const fixtures = {
  person(overrides: Partial<CreatePersonInput> = {}): Promise<Person> {
    return createPerson({ firstName: 'Ada', lastName: 'Lovelace', ...overrides });
  },

  unit(overrides: Partial<CreateUnitInput> = {}): Promise<Unit> {
    return createUnit({ name: 'Engineering', unitType: 'OrganizationalUnit', ...overrides });
  },

  jobTitle(name = 'Engineer'): Promise<JobTitle> {
    return createJobTitle({ name });
  },

  /** One person, unit and job title: the parts of a single lineage. */
  async lineage(): Promise<{ person: Person; unit: Unit; jobTitle: JobTitle }> {
    const person = await fixtures.person();
    const unit = await fixtures.unit();
    const jobTitle = await fixtures.jobTitle();
    return { person, unit, jobTitle };
  },
};
