import { describe, it, expect, beforeEach } from 'vitest';
import { ConflictError, NotFoundError, ValidationError } from '../lib/errors.js';
import {
  createCompany,
  deleteCompany,
  getCompanyById,
  isCompanyActive,
  listCompanies,
  updateCompany,
} from '../services/company.service.js';
import { deletePerson } from '../services/person.service.js';
import { CreateCompanySchema } from '../schemas/companies.schema.js';
import { fixtures, resetDatabase } from './setup.js';

describe('isCompanyActive', () => {
  const cases: Array<[string | null, string | null, string, boolean]> = [
    [null, null, '2024-06-01', true],
    ['2024-01-01', '2024-12-31', '2024-12-31', true],
    ['2024-01-01', '2024-12-31', '2025-01-01', false],
    ['2024-07-01', null, '2024-06-30', false],
  ];

  it.each(cases)('should treat %s..%s as active on %s: %s', (validFrom, validTo, on, expected) => {
    expect(isCompanyActive({ validFrom, validTo }, on)).toBe(expected);
  });
});

describe('CreateCompanySchema', () => {
  it('should reject an end date before the start date', () => {
    const result = CreateCompanySchema.safeParse({
      name: 'Acme',
      validFrom: '2024-02-01',
      validTo: '2024-01-01',
    });

    expect(result.success).toBe(false);
    expect(result.error?.issues.map((issue) => [issue.path, issue.message])).toEqual([
      [['validTo'], 'End date cannot be before start date'],
    ]);
  });
});

describe('Company service', () => {
  beforeEach(async () => {
    await resetDatabase();
  });

  it('should create a company with a contact and the default country', async () => {
    await fixtures.person();

    const company = await createCompany({
      name: 'Acme',
      registrationNo: 'C-1',
      mainContactId: 1,
      validFrom: '2020-01-01',
    });

    expect(company).toMatchObject({
      id: 1,
      name: 'Acme',
      country: 'Italy',
      mainContactId: 1,
      financialContactId: null,
      validTo: null,
      isActive: true,
    });
  });

  it('should list active companies and search by name', async () => {
    await createCompany({ name: 'Acme', validFrom: '2020-01-01' });
    await createCompany({ name: 'Beta Works', validFrom: '2019-01-01', validTo: '2021-12-31' });

    const all = await listCompanies({ page: 1, limit: 50, activeOnly: false });
    const active = await listCompanies({ page: 1, limit: 50, activeOnly: true });
    const search = await listCompanies({ page: 1, limit: 50, activeOnly: false, search: 'beta' });

    expect(all.data.map((c) => [c.name, c.isActive])).toEqual([
      ['Acme', true],
      ['Beta Works', false],
    ]);
    expect(active.data.map((c) => c.name)).toEqual(['Acme']);
    expect(active.pagination).toEqual({ page: 1, limit: 50, total: 1, totalPages: 1 });
    expect(search.data.map((c) => c.id)).toEqual([2]);
  });

  it('should reject a duplicate registration number', async () => {
    await createCompany({ name: 'Acme', registrationNo: 'C-1' });

    await expect(createCompany({ name: 'Acme Bis', registrationNo: 'C-1' })).rejects.toThrow(
      new ConflictError("A company with registration number 'C-1' already exists"),
    );
  });

  it('should refuse an unknown contact person', async () => {
    await expect(createCompany({ name: 'Acme', financialContactId: 9 })).rejects.toBeInstanceOf(
      NotFoundError,
    );
  });

  it('should check the end date against the stored start date on update', async () => {
    await createCompany({ name: 'Acme', validFrom: '2024-03-01' });

    await expect(updateCompany(1, { validTo: '2024-02-01' })).rejects.toBeInstanceOf(ValidationError);

    const updated = await updateCompany(1, { validTo: '2024-12-31', city: 'Torino' });
    expect(updated).toMatchObject({ validFrom: '2024-03-01', validTo: '2024-12-31', city: 'Torino' });
  });

  it('should throw NotFoundError when updating an unknown company', async () => {
    await expect(updateCompany(5, { city: 'Milano' })).rejects.toBeInstanceOf(NotFoundError);
  });

  it('should clear the contact when the person is deleted', async () => {
    await fixtures.person();
    await createCompany({ name: 'Acme', mainContactId: 1, financialContactId: 1 });

    await deletePerson(1);

    expect(await getCompanyById(1)).toMatchObject({ mainContactId: null, financialContactId: null });
  });

  it('should delete a company', async () => {
    await createCompany({ name: 'Acme' });

    await deleteCompany(1);

    await expect(getCompanyById(1)).rejects.toBeInstanceOf(NotFoundError);
    await expect(deleteCompany(1)).rejects.toBeInstanceOf(NotFoundError);
  });
});
