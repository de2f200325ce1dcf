import { and, asc, count, eq, gte, ilike, isNull, lte, or, sql, type SQL } from 'drizzle-orm';
import { db, first, isUniqueViolation, writeTransaction, type Executor } from '../lib/db.js';
import { ConflictError, NotFoundError, ValidationError } from '../lib/errors.js';
import { today } from '../lib/dates.js';
import { companies, persons, type Company } from '../db/schema.js';
import { logAuditEvent } from './audit.service.js';
import type {
  CompanyFiltersInput,
  CreateCompanyInput,
  UpdateCompanyInput,
} from '../schemas/companies.schema.js';
import type { CompanyView, MutationContext, PaginatedResponse } from '../types/index.js';

/** A company is active while today falls inside its (open-ended) validity range. */
export function isCompanyActive(company: Pick<Company, 'validFrom' | 'validTo'>, on: string = today()): boolean {
  return (
    (company.validFrom === null || company.validFrom <= on) &&
    (company.validTo === null || company.validTo >= on)
  );
}

function toCompanyView(company: Company): CompanyView {
  return { ...company, isActive: isCompanyActive(company) };
}

export function companyRegistrationConflict(registrationNo: string | null | undefined): ConflictError {
  return new ConflictError(`A company with registration number '${registrationNo}' already exists`);
}

async function withRegistrationGuard<T>(
  registrationNo: string | null | undefined,
  fn: () => Promise<T>,
): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (isUniqueViolation(error)) {
      throw companyRegistrationConflict(registrationNo);
    }
    throw error;
  }
}

async function assertContact(tx: Executor, personId: number | null | undefined): Promise<void> {
  if (personId == null) return;
  const person = first(await tx.select({ id: persons.id }).from(persons).where(eq(persons.id, personId)));
  if (!person) {
    throw new NotFoundError('Person', personId);
  }
}

export async function listCompanies(filters: CompanyFiltersInput): Promise<PaginatedResponse<CompanyView>> {
  const { page, limit, search, activeOnly } = filters;

  const conditions: SQL[] = [];
  if (search) {
    const pattern = `%${search}%`;
    const match = or(
      ilike(companies.name, pattern),
      ilike(companies.shortName, pattern),
      ilike(companies.city, pattern),
      ilike(companies.registrationNo, pattern),
    );
    if (match) conditions.push(match);
  }
  if (activeOnly) {
    const now = today();
    const started = or(isNull(companies.validFrom), lte(companies.validFrom, now));
    const notEnded = or(isNull(companies.validTo), gte(companies.validTo, now));
    if (started) conditions.push(started);
    if (notEnded) conditions.push(notEnded);
  }
  const where = conditions.length > 0 ? and(...conditions) : undefined;

  const rows = await db
    .select()
    .from(companies)
    .where(where)
    .orderBy(asc(companies.name), asc(companies.id))
    .limit(limit)
    .offset((page - 1) * limit);

  const [{ total }] = await db.select({ total: count() }).from(companies).where(where);

  return {
    data: rows.map(toCompanyView),
    pagination: {
      page,
      limit,
      total,
      totalPages: Math.ceil(total / limit),
    },
  };
}

export async function getCompanyById(id: number): Promise<CompanyView> {
  const company = first(await db.select().from(companies).where(eq(companies.id, id)));
  if (!company) {
    throw new NotFoundError('Company', id);
  }
  return toCompanyView(company);
}

/** Insert a company inside an open transaction. */
export async function insertCompany(
  tx: Executor,
  input: CreateCompanyInput,
  context: MutationContext = {},
): Promise<Company> {
  await assertContact(tx, input.mainContactId);
  await assertContact(tx, input.financialContactId);

  const [company] = await tx
    .insert(companies)
    .values({
      name: input.name,
      shortName: input.shortName ?? null,
      registrationNo: input.registrationNo ?? null,
      address: input.address ?? null,
      city: input.city ?? null,
      postalCode: input.postalCode ?? null,
      country: input.country,
      phone: input.phone ?? null,
      email: input.email ?? null,
      website: input.website ?? null,
      mainContactId: input.mainContactId ?? null,
      financialContactId: input.financialContactId ?? null,
      validFrom: input.validFrom ?? null,
      validTo: input.validTo ?? null,
      notes: input.notes ?? null,
    })
    .returning();

  await logAuditEvent(tx, {
    entityType: 'Company',
    entityId: company.id,
    action: 'CREATE',
    payload: { name: company.name, registrationNo: company.registrationNo },
    ipAddress: context.ipAddress,
  });

  return company;
}

export async function createCompany(
  input: CreateCompanyInput,
  context: MutationContext = {},
): Promise<CompanyView> {
  const company = await withRegistrationGuard(input.registrationNo, () =>
    writeTransaction((tx) => insertCompany(tx, input, context)),
  );
  return toCompanyView(company);
}

/** Update a company inside an open transaction, checking the merged validity range. */
export async function updateCompanyWithin(
  tx: Executor,
  id: number,
  input: UpdateCompanyInput,
  context: MutationContext = {},
): Promise<Company> {
  const existing = first(await tx.select().from(companies).where(eq(companies.id, id)));
  if (!existing) {
    throw new NotFoundError('Company', id);
  }

  const validFrom = input.validFrom !== undefined ? input.validFrom : existing.validFrom;
  const validTo = input.validTo !== undefined ? input.validTo : existing.validTo;
  if (validFrom && validTo && validTo < validFrom) {
    throw new ValidationError('End date cannot be before start date', {
      field: 'validTo',
      validFrom,
      validTo,
    });
  }
  await assertContact(tx, input.mainContactId);
  await assertContact(tx, input.financialContactId);

  const [company] = await tx
    .update(companies)
    .set({ ...input, datetimeUpdated: sql`CURRENT_TIMESTAMP` })
    .where(eq(companies.id, id))
    .returning();

  await logAuditEvent(tx, {
    entityType: 'Company',
    entityId: id,
    action: 'UPDATE',
    payload: { changes: input },
    ipAddress: context.ipAddress,
  });

  return company;
}

export async function updateCompany(
  id: number,
  input: UpdateCompanyInput,
  context: MutationContext = {},
): Promise<CompanyView> {
  const company = await withRegistrationGuard(input.registrationNo, () =>
    writeTransaction((tx) => updateCompanyWithin(tx, id, input, context)),
  );
  return toCompanyView(company);
}

export async function deleteCompany(id: number, context: MutationContext = {}): Promise<void> {
  await writeTransaction(async (tx) => {
    const company = first(
      await tx.delete(companies).where(eq(companies.id, id)).returning({ name: companies.name }),
    );
    if (!company) {
      throw new NotFoundError('Company', id);
    }

    await logAuditEvent(tx, {
      entityType: 'Company',
      entityId: id,
      action: 'DELETE',
      payload: { name: company.name },
      ipAddress: context.ipAddress,
    });
  });
}
