import { z } from 'zod';
import { UNIT_TYPES } from '../db/schema.js';
import { EntityIdSchema } from './common.schema.js';

const UnitTypeEnum = z.enum(UNIT_TYPES);

// ============================================================================
// Unit Schemas
// ============================================================================

export const CreateUnitSchema = z.object({
  name: z.string().trim().min(1, 'Name is required').max(255),
  shortName: z.string().trim().max(100).optional().nullable(),
  unitType: UnitTypeEnum,
  parentUnitId: EntityIdSchema.optional().nullable(),
  emoji: z.string().max(16).optional().nullable(),
  image: z.string().max(1024).optional().nullable(),
});

export type CreateUnitInput = z.infer<typeof CreateUnitSchema>;

export const UpdateUnitSchema = CreateUnitSchema.partial();

export type UpdateUnitInput = z.infer<typeof UpdateUnitSchema>;

export const UnitFiltersSchema = z.object({
  unitType: UnitTypeEnum.optional(),
  parentUnitId: z.coerce.number().int().positive().optional(),
  search: z.string().trim().min(1).optional(),
});

export type UnitFiltersInput = z.infer<typeof UnitFiltersSchema>;
