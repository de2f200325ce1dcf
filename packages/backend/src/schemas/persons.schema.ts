import { z } from 'zod';
import { PaginationSchema } from './common.schema.js';

// ============================================================================
// Person Schemas
// ============================================================================

export const CreatePersonSchema = z.object({
  firstName: z.string().trim().min(1, 'First name is required').max(255),
  lastName: z.string().trim().min(1, 'Last name is required').max(255),
  shortName: z.string().trim().max(100).optional().nullable(),
  registrationNo: z.string().trim().max(50).optional().nullable(),
  email: z.email('Invalid email format').optional().nullable(),
  profileImage: z.string().max(1024).optional().nullable(),
});

export type CreatePersonInput = z.infer<typeof CreatePersonSchema>;

export const UpdatePersonSchema = CreatePersonSchema.partial();

export type UpdatePersonInput = z.infer<typeof UpdatePersonSchema>;

export const PersonFiltersSchema = PaginationSchema.extend({
  search: z.string().trim().min(1).optional(),
});

export type PersonFiltersInput = z.infer<typeof PersonFiltersSchema>;
