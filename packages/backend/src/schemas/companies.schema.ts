import { z } from 'zod';
import { EntityIdSchema, IsoDateSchema, PaginationSchema, QueryBooleanSchema } from './common.schema.js';

// ============================================================================
// Company Schemas
// ============================================================================

const CompanyFieldsSchema = z.object({
  name: z.string().trim().min(1, 'Name is required').max(255),
  shortName: z.string().trim().max(100).optional().nullable(),
  registrationNo: z.string().trim().max(50).optional().nullable(),
  address: z.string().trim().max(255).optional().nullable(),
  city: z.string().trim().max(100).optional().nullable(),
  postalCode: z.string().trim().max(20).optional().nullable(),
  country: z.string().trim().min(1).max(100).optional(),
  phone: z.string().trim().max(50).optional().nullable(),
  email: z.email('Invalid email format').optional().nullable(),
  website: z.url('Invalid website URL').optional().nullable(),
  mainContactId: EntityIdSchema.optional().nullable(),
  financialContactId: EntityIdSchema.optional().nullable(),
  validFrom: IsoDateSchema.optional().nullable(),
  validTo: IsoDateSchema.optional().nullable(),
  notes: z.string().max(2000).optional().nullable(),
});

function datesInOrder(company: { validFrom?: string | null; validTo?: string | null }): boolean {
  return !company.validFrom || !company.validTo || company.validTo >= company.validFrom;
}

const DATE_ORDER = { message: 'End date cannot be before start date', path: ['validTo'] };

export const CreateCompanySchema = CompanyFieldsSchema.refine(datesInOrder, DATE_ORDER);

export type CreateCompanyInput = z.infer<typeof CreateCompanySchema>;

export const UpdateCompanySchema = CompanyFieldsSchema.partial().refine(datesInOrder, DATE_ORDER);

export type UpdateCompanyInput = z.infer<typeof UpdateCompanySchema>;

export const CompanyFiltersSchema = PaginationSchema.extend({
  search: z.string().trim().min(1).optional(),
  activeOnly: QueryBooleanSchema.optional().default(false),
});

export type CompanyFiltersInput = z.infer<typeof CompanyFiltersSchema>;
