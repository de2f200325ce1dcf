import { and, asc, count, eq, ilike, or, sql, type SQL } from 'drizzle-orm';
import { db, first, isUniqueViolation, writeTransaction, type Executor } from '../lib/db.js';
import { ConflictError, InvalidStateError, NotFoundError } from '../lib/errors.js';
import { daysBetween } from '../lib/dates.js';
import { personDisplayName } from '../lib/names.js';
import { assignments, persons, type Person } from '../db/schema.js';
import { logAuditEvent } from './audit.service.js';
import { assignmentService } from './assignment.service.js';
import { summarizePersonWorkload } from './workload.service.js';
import type {
  CreatePersonInput,
  PersonFiltersInput,
  UpdatePersonInput,
} from '../schemas/persons.schema.js';
import type {
  DuplicateMatchType,
  MutationContext,
  PaginatedResponse,
  PersonDetail,
  PotentialDuplicate,
} from '../types/index.js';

export function registrationConflict(registrationNo: string | null | undefined): ConflictError {
  return new ConflictError(`A person with registration number '${registrationNo}' already exists`);
}

async function withRegistrationGuard<T>(
  registrationNo: string | null | undefined,
  fn: () => Promise<T>,
): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (isUniqueViolation(error)) {
      throw registrationConflict(registrationNo);
    }
    throw error;
  }
}

export async function listPersons(filters: PersonFiltersInput): Promise<PaginatedResponse<Person>> {
  const { page, limit, search } = filters;

  const conditions: SQL[] = [];
  if (search) {
    const pattern = `%${search}%`;
    const match = or(
      ilike(persons.firstName, pattern),
      ilike(persons.lastName, pattern),
      ilike(persons.shortName, pattern),
      ilike(persons.registrationNo, pattern),
      ilike(persons.email, pattern),
    );
    if (match) conditions.push(match);
  }
  const where = conditions.length > 0 ? and(...conditions) : undefined;

  const data = await db
    .select()
    .from(persons)
    .where(where)
    .orderBy(asc(persons.lastName), asc(persons.firstName), asc(persons.id))
    .limit(limit)
    .offset((page - 1) * limit);

  const [{ total }] = await db.select({ total: count() }).from(persons).where(where);

  return {
    data,
    pagination: {
      page,
      limit,
      total,
      totalPages: Math.ceil(total / limit),
    },
  };
}

export async function getPersonById(id: number): Promise<Person> {
  const person = first(await db.select().from(persons).where(eq(persons.id, id)));
  if (!person) {
    throw new NotFoundError('Person', id);
  }
  return person;
}

/**
 * Person page: CURRENT assignments, live workload, and every version the
 * person ever held ordered by start date.
 */
export async function getPersonDetail(id: number): Promise<PersonDetail> {
  const person = await getPersonById(id);
  const history = await assignmentService.listByPerson(id);

  return {
    person,
    currentAssignments: await assignmentService.listCurrentByPerson(id),
    workload: await summarizePersonWorkload(id),
    timeline: history.map((entry) => ({
      ...entry,
      durationDays: entry.validTo ? daysBetween(entry.validFrom, entry.validTo) : null,
    })),
  };
}

const DUPLICATE_CONFIDENCE: Record<DuplicateMatchType, number> = {
  email_match: 0.95,
  exact_name_match: 0.85,
  similar_name: 0.6,
};

const SIMILAR_NAME_MIN_LENGTH = 6;

function normalizedName(person: Person): string {
  return personDisplayName(person).trim().toLowerCase();
}

function duplicateMatch(a: Person, b: Person): DuplicateMatchType | null {
  const emailA = a.email?.trim().toLowerCase();
  if (emailA && emailA === b.email?.trim().toLowerCase()) return 'email_match';

  const nameA = normalizedName(a);
  const nameB = normalizedName(b);
  if (nameA === nameB) return 'exact_name_match';

  // Names differing only in their last character ("Rossi" / "Rosso")
  if (
    nameA.length >= SIMILAR_NAME_MIN_LENGTH &&
    nameB.length >= SIMILAR_NAME_MIN_LENGTH &&
    nameA.slice(0, -1) === nameB.slice(0, -1)
  ) {
    return 'similar_name';
  }
  return null;
}

/** Pairs of persons that look like the same individual, most certain first. */
export async function findPotentialDuplicates(): Promise<PotentialDuplicate[]> {
  const all = await db.select().from(persons).orderBy(asc(persons.id));
  const summary = (person: Person) => ({
    id: person.id,
    firstName: person.firstName,
    lastName: person.lastName,
    email: person.email,
  });

  const duplicates: PotentialDuplicate[] = [];
  for (let i = 0; i < all.length; i++) {
    for (let j = i + 1; j < all.length; j++) {
      const matchType = duplicateMatch(all[i], all[j]);
      if (matchType) {
        duplicates.push({
          person1: summary(all[i]),
          person2: summary(all[j]),
          matchType,
          confidence: DUPLICATE_CONFIDENCE[matchType],
        });
      }
    }
  }

  return duplicates.sort(
    (a, b) => b.confidence - a.confidence || a.person1.id - b.person1.id || a.person2.id - b.person2.id,
  );
}

/** Insert a person inside an open transaction. */
export async function insertPerson(
  tx: Executor,
  input: CreatePersonInput,
  context: MutationContext = {},
): Promise<Person> {
  const [person] = await tx
    .insert(persons)
    .values({
      firstName: input.firstName,
      lastName: input.lastName,
      shortName: input.shortName ?? null,
      registrationNo: input.registrationNo ?? null,
      email: input.email ?? null,
      profileImage: input.profileImage ?? null,
    })
    .returning();

  await logAuditEvent(tx, {
    entityType: 'Person',
    entityId: person.id,
    action: 'CREATE',
    payload: { name: personDisplayName(person), registrationNo: person.registrationNo },
    ipAddress: context.ipAddress,
  });

  return person;
}

export async function createPerson(input: CreatePersonInput, context: MutationContext = {}): Promise<Person> {
  return withRegistrationGuard(input.registrationNo, () =>
    writeTransaction((tx) => insertPerson(tx, input, context)),
  );
}

/** Update a person inside an open transaction. */
export async function updatePersonWithin(
  tx: Executor,
  id: number,
  input: UpdatePersonInput,
  context: MutationContext = {},
): Promise<Person> {
  const person = first(
    await tx
      .update(persons)
      .set({ ...input, datetimeUpdated: sql`CURRENT_TIMESTAMP` })
      .where(eq(persons.id, id))
      .returning(),
  );
  if (!person) {
    throw new NotFoundError('Person', id);
  }

  await logAuditEvent(tx, {
    entityType: 'Person',
    entityId: id,
    action: 'UPDATE',
    payload: { changes: input },
    ipAddress: context.ipAddress,
  });

  return person;
}

export async function updatePerson(
  id: number,
  input: UpdatePersonInput,
  context: MutationContext = {},
): Promise<Person> {
  return withRegistrationGuard(input.registrationNo, () =>
    writeTransaction((tx) => updatePersonWithin(tx, id, input, context)),
  );
}

/**
 * Delete a person together with their assignment history. Refused while
 * any assignment of theirs is still CURRENT.
 */
export async function deletePerson(id: number, context: MutationContext = {}): Promise<void> {
  await writeTransaction(async (tx) => {
    const person = first(await tx.select().from(persons).where(eq(persons.id, id)));
    if (!person) {
      throw new NotFoundError('Person', id);
    }

    const [{ total: currentCount }] = await tx
      .select({ total: count() })
      .from(assignments)
      .where(and(eq(assignments.personId, id), eq(assignments.status, 'CURRENT')));
    if (currentCount > 0) {
      throw new InvalidStateError(
        `Cannot delete ${personDisplayName(person)}: terminate their ${currentCount} current assignment(s) first`,
        'HAS_CURRENT_ASSIGNMENTS',
        'delete',
      );
    }

    await tx.delete(persons).where(eq(persons.id, id));

    await logAuditEvent(tx, {
      entityType: 'Person',
      entityId: id,
      action: 'DELETE',
      payload: { name: personDisplayName(person) },
      ipAddress: context.ipAddress,
    });
  });
}
