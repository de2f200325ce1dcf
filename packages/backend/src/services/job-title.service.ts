import { asc, count, eq, ilike, sql } from 'drizzle-orm';
import { db, first, writeTransaction, type Executor } from '../lib/db.js';
import { InvalidStateError, NotFoundError } from '../lib/errors.js';
import { assignments, jobTitles, type JobTitle } from '../db/schema.js';
import { logAuditEvent } from './audit.service.js';
import { assignmentService } from './assignment.service.js';
import type {
  CreateJobTitleInput,
  JobTitleFiltersInput,
  UpdateJobTitleInput,
} from '../schemas/job-titles.schema.js';
import type { AssignmentView, MutationContext } from '../types/index.js';

export async function listJobTitles(filters: Partial<JobTitleFiltersInput> = {}): Promise<JobTitle[]> {
  return db
    .select()
    .from(jobTitles)
    .where(filters.search ? ilike(jobTitles.name, `%${filters.search}%`) : undefined)
    .orderBy(asc(jobTitles.name), asc(jobTitles.id));
}

export async function getJobTitleById(id: number): Promise<JobTitle> {
  const jobTitle = first(await db.select().from(jobTitles).where(eq(jobTitles.id, id)));
  if (!jobTitle) {
    throw new NotFoundError('JobTitle', id);
  }
  return jobTitle;
}

export async function getJobTitleDetail(
  id: number,
): Promise<{ jobTitle: JobTitle; currentAssignments: AssignmentView[] }> {
  const jobTitle = await getJobTitleById(id);
  const { data } = await assignmentService.list({
    jobTitleId: id,
    currentOnly: true,
    page: 1,
    limit: 200,
  });
  return { jobTitle, currentAssignments: data };
}

/** Insert a job title inside an open transaction. */
export async function insertJobTitle(
  tx: Executor,
  input: CreateJobTitleInput,
  context: MutationContext = {},
): Promise<JobTitle> {
  const [jobTitle] = await tx
    .insert(jobTitles)
    .values({ name: input.name, shortName: input.shortName ?? null })
    .returning();

  await logAuditEvent(tx, {
    entityType: 'JobTitle',
    entityId: jobTitle.id,
    action: 'CREATE',
    payload: { name: jobTitle.name },
    ipAddress: context.ipAddress,
  });

  return jobTitle;
}

export async function createJobTitle(
  input: CreateJobTitleInput,
  context: MutationContext = {},
): Promise<JobTitle> {
  return writeTransaction((tx) => insertJobTitle(tx, input, context));
}

/** Update a job title inside an open transaction. */
export async function updateJobTitleWithin(
  tx: Executor,
  id: number,
  input: UpdateJobTitleInput,
  context: MutationContext = {},
): Promise<JobTitle> {
  const jobTitle = first(
    await tx
      .update(jobTitles)
      .set({ ...input, datetimeUpdated: sql`CURRENT_TIMESTAMP` })
      .where(eq(jobTitles.id, id))
      .returning(),
  );
  if (!jobTitle) {
    throw new NotFoundError('JobTitle', id);
  }

  await logAuditEvent(tx, {
    entityType: 'JobTitle',
    entityId: id,
    action: 'UPDATE',
    payload: { changes: input },
    ipAddress: context.ipAddress,
  });

  return jobTitle;
}

export async function updateJobTitle(
  id: number,
  input: UpdateJobTitleInput,
  context: MutationContext = {},
): Promise<JobTitle> {
  return writeTransaction((tx) => updateJobTitleWithin(tx, id, input, context));
}

export async function deleteJobTitle(id: number, context: MutationContext = {}): Promise<void> {
  await writeTransaction(async (tx) => {
    const jobTitle = first(await tx.select().from(jobTitles).where(eq(jobTitles.id, id)));
    if (!jobTitle) {
      throw new NotFoundError('JobTitle', id);
    }

    const [{ total: referenceCount }] = await tx
      .select({ total: count() })
      .from(assignments)
      .where(eq(assignments.jobTitleId, id));
    if (referenceCount > 0) {
      throw new InvalidStateError(
        `Cannot delete job title "${jobTitle.name}": it is used by ${referenceCount} assignment version(s)`,
        'IN_USE',
        'delete',
      );
    }

    await tx.delete(jobTitles).where(eq(jobTitles.id, id));

    await logAuditEvent(tx, {
      entityType: 'JobTitle',
      entityId: id,
      action: 'DELETE',
      payload: { name: jobTitle.name },
      ipAddress: context.ipAddress,
    });
  });
}
