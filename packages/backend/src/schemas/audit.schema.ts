import { z } from 'zod';
import { IsoDateSchema, PaginationSchema } from './common.schema.js';

export const AuditFiltersSchema = PaginationSchema.extend({
  entityType: z.enum(['Person', 'Unit', 'JobTitle', 'Assignment', 'Company']).optional(),
  entityId: z.coerce.number().int().positive().optional(),
  action: z.enum(['CREATE', 'UPDATE', 'DELETE', 'NEW_VERSION', 'TERMINATE']).optional(),
  startDate: IsoDateSchema.optional(),
  endDate: IsoDateSchema.optional(),
});

export type AuditFiltersInput = z.infer<typeof AuditFiltersSchema>;
