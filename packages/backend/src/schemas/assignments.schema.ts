import { z } from 'zod';
import { ASSIGNMENT_STATUSES } from '../db/schema.js';
import {
  EntityIdSchema,
  IsoDateSchema,
  PaginationSchema,
  QueryBooleanSchema,
} from './common.schema.js';

// Range (1..100, whole numbers) is enforced by the version chain itself,
// so direct service callers get the same ValidationError as HTTP clients.
const PercentageSchema = z.number();

// ============================================================================
// Assignment Schemas
// ============================================================================

export const CreateAssignmentSchema = z.object({
  personId: EntityIdSchema,
  unitId: EntityIdSchema,
  jobTitleId: EntityIdSchema,
  percentage: PercentageSchema,
  isAdInterim: z.boolean().optional().default(false),
  isUnitBoss: z.boolean().optional().default(false),
  validFrom: IsoDateSchema.optional(),
  validTo: IsoDateSchema.optional().nullable(),
  notes: z.string().max(2000).optional().nullable(),
  flags: z.string().max(255).optional().nullable(),
  allowNewVersion: z.boolean().optional().default(false),
});

export type CreateAssignmentInput = z.input<typeof CreateAssignmentSchema>;

export const UpdateAssignmentSchema = z.object({
  percentage: PercentageSchema.optional(),
  isAdInterim: z.boolean().optional(),
  isUnitBoss: z.boolean().optional(),
  validFrom: IsoDateSchema.optional(),
  validTo: IsoDateSchema.optional().nullable(),
  notes: z.string().max(2000).optional().nullable(),
  flags: z.string().max(255).optional().nullable(),
});

export type UpdateAssignmentInput = z.infer<typeof UpdateAssignmentSchema>;

export const TerminateAssignmentSchema = z.object({
  terminationDate: IsoDateSchema.optional(),
});

export type TerminateAssignmentInput = z.infer<typeof TerminateAssignmentSchema>;

export const AssignmentFiltersSchema = PaginationSchema.extend({
  personId: z.coerce.number().int().positive().optional(),
  unitId: z.coerce.number().int().positive().optional(),
  jobTitleId: z.coerce.number().int().positive().optional(),
  status: z.enum(ASSIGNMENT_STATUSES).optional(),
  currentOnly: QueryBooleanSchema.optional().default(false),
  search: z.string().trim().min(1).optional(),
});

export type AssignmentFiltersInput = z.infer<typeof AssignmentFiltersSchema>;

export const LineageQuerySchema = z
  .object({
    personId: z.coerce.number().int().positive().optional(),
    unitId: z.coerce.number().int().positive().optional(),
    jobTitleId: z.coerce.number().int().positive().optional(),
  })
  .refine(
    (q) => {
      const given = [q.personId, q.unitId, q.jobTitleId].filter((v) => v !== undefined).length;
      return given === 0 || given === 3;
    },
    { message: 'personId, unitId and jobTitleId must be given together' },
  );

export type LineageQueryInput = z.infer<typeof LineageQuerySchema>;

// ============================================================================
// Bulk Operation Schemas
// ============================================================================

const AssignmentIdsSchema = z
  .array(EntityIdSchema)
  .min(1, 'At least one assignment must be selected')
  .max(500);

export const BulkTerminateSchema = z.object({
  assignmentIds: AssignmentIdsSchema,
  terminationDate: IsoDateSchema.optional(),
});

export type BulkTerminateInput = z.infer<typeof BulkTerminateSchema>;

export const BulkPercentageSchema = z.object({
  assignmentIds: AssignmentIdsSchema,
  percentage: PercentageSchema,
  validFrom: IsoDateSchema.optional(),
});

export type BulkPercentageInput = z.infer<typeof BulkPercentageSchema>;

export const BulkTransferSchema = z.object({
  assignmentIds: AssignmentIdsSchema,
  targetUnitId: EntityIdSchema,
  transferDate: IsoDateSchema.optional(),
});

export type BulkTransferInput = z.infer<typeof BulkTransferSchema>;
