import 'dotenv/config';
import { count } from 'drizzle-orm';
import { db } from '../lib/db.js';
import { persons } from './schema.js';
import { createPerson } from '../services/person.service.js';
import { createUnit } from '../services/unit.service.js';
import { createJobTitle } from '../services/job-title.service.js';
import { assignmentService } from '../services/assignment.service.js';

async function main() {
  console.log('Seeding database...');

  const [existing] = await db.select({ total: count() }).from(persons);
  if (existing.total > 0) {
    console.log(`Persons already exist (${existing.total}), skipping...`);
    return;
  }

  // ============================================================================
  // UNITS
  // ============================================================================

  const board = await createUnit({ name: 'Board of Directors', shortName: 'BoD', unitType: 'OrganizationalUnit' });
  const operations = await createUnit({ name: 'Operations', unitType: 'OrganizationalUnit', parentUnitId: board.id });
  const engineering = await createUnit({ name: 'Engineering', unitType: 'OrganizationalUnit', parentUnitId: operations.id });
  const platform = await createUnit({ name: 'Platform', unitType: 'Function', parentUnitId: engineering.id });
  const finance = await createUnit({ name: 'Finance', unitType: 'OrganizationalUnit', parentUnitId: board.id });
  console.log('Created 5 units');

  // ============================================================================
  // JOB TITLES
  // ============================================================================

  const director = await createJobTitle({ name: 'Director' });
  const manager = await createJobTitle({ name: 'Manager' });
  const engineer = await createJobTitle({ name: 'Engineer' });
  const analyst = await createJobTitle({ name: 'Analyst' });
  console.log('Created 4 job titles');

  // ============================================================================
  // PERSONS AND ASSIGNMENTS
  // ============================================================================

  const ada = await createPerson({ firstName: 'Ada', lastName: 'Lovelace', registrationNo: 'R-001' });
  const grace = await createPerson({ firstName: 'Grace', lastName: 'Hopper', registrationNo: 'R-002' });
  const alan = await createPerson({ firstName: 'Alan', lastName: 'Turing', registrationNo: 'R-003' });
  const mary = await createPerson({ firstName: 'Mary', lastName: 'Jackson', registrationNo: 'R-004' });
  console.log('Created 4 persons');

  await assignmentService.create({ personId: ada.id, unitId: board.id, jobTitleId: director.id, percentage: 50, isUnitBoss: true, validFrom: '2024-01-01' });
  await assignmentService.create({ personId: ada.id, unitId: operations.id, jobTitleId: manager.id, percentage: 50, isUnitBoss: true, validFrom: '2024-01-01' });
  await assignmentService.create({ personId: grace.id, unitId: engineering.id, jobTitleId: manager.id, percentage: 100, isUnitBoss: true, validFrom: '2024-01-01' });
  const alanPlatform = await assignmentService.create({ personId: alan.id, unitId: platform.id, jobTitleId: engineer.id, percentage: 60, validFrom: '2024-01-01' });
  await assignmentService.update(alanPlatform.id, { percentage: 80, validFrom: '2024-06-01' });
  await assignmentService.create({ personId: mary.id, unitId: finance.id, jobTitleId: analyst.id, percentage: 100, isAdInterim: true, validFrom: '2024-03-01' });
  console.log('Created assignments');

  console.log('Seeding complete!');
}

main().catch((e: unknown) => {
  console.error(e);
  process.exit(1);
});
