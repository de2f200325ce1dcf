import { z } from 'zod';
import { QueryBooleanSchema } from './common.schema.js';

export const TreeQuerySchema = z.object({
  rootUnitId: z.coerce.number().int().positive().optional(),
  showPersons: QueryBooleanSchema.optional().default(true),
});

export type TreeQueryInput = z.infer<typeof TreeQuerySchema>;
