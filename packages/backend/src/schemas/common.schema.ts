import { z } from 'zod';
import { isIsoDate } from '../lib/dates.js';

export const IdParamSchema = z.object({
  id: z.coerce.number().int().positive('Invalid id'),
});

export type IdParam = z.infer<typeof IdParamSchema>;

export const IsoDateSchema = z
  .string()
  .refine(isIsoDate, { message: 'Date must be a valid YYYY-MM-DD date' });

export const EntityIdSchema = z.number().int().positive();

/** Query-string boolean: only the literals "true" and "false" are accepted. */
export const QueryBooleanSchema = z
  .enum(['true', 'false'])
  .transform((value) => value === 'true');

export const PaginationSchema = z.object({
  page: z.coerce.number().int().positive().optional().default(1),
  limit: z.coerce.number().int().positive().max(200).optional().default(50),
});
