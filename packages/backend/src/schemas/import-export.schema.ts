import { z } from 'zod';
import { ASSIGNMENT_STATUSES, UNIT_TYPES } from '../db/schema.js';
import { EntityIdSchema, IsoDateSchema, QueryBooleanSchema } from './common.schema.js';

// ============================================================================
// Import bundle
// ============================================================================

// `id` values are keys local to the bundle; references between records use them.

const ImportUnitSchema = z.object({
  id: EntityIdSchema,
  name: z.string().trim().min(1, 'Name is required').max(255),
  shortName: z.string().trim().max(100).optional().nullable(),
  unitType: z.enum(UNIT_TYPES),
  parentUnitId: EntityIdSchema.optional().nullable(),
  emoji: z.string().max(16).optional().nullable(),
  image: z.string().max(1024).optional().nullable(),
});

export type ImportUnit = z.infer<typeof ImportUnitSchema>;

const ImportJobTitleSchema = z.object({
  id: EntityIdSchema,
  name: z.string().trim().min(1, 'Name is required').max(255),
  shortName: z.string().trim().max(100).optional().nullable(),
});

export type ImportJobTitle = z.infer<typeof ImportJobTitleSchema>;

const ImportPersonSchema = z.object({
  id: EntityIdSchema,
  firstName: z.string().trim().min(1, 'First name is required').max(255),
  lastName: z.string().trim().min(1, 'Last name is required').max(255),
  shortName: z.string().trim().max(100).optional().nullable(),
  registrationNo: z.string().trim().max(50).optional().nullable(),
  email: z.email('Invalid email format').optional().nullable(),
  profileImage: z.string().max(1024).optional().nullable(),
});

export type ImportPerson = z.infer<typeof ImportPersonSchema>;

const ImportAssignmentSchema = z.object({
  personId: EntityIdSchema,
  unitId: EntityIdSchema,
  jobTitleId: EntityIdSchema,
  version: z.number().int().positive().optional(),
  percentage: z.number(),
  isAdInterim: z.boolean().optional().default(false),
  isUnitBoss: z.boolean().optional().default(false),
  validFrom: IsoDateSchema,
  validTo: IsoDateSchema.optional().nullable(),
  status: z.enum(ASSIGNMENT_STATUSES).optional().default('CURRENT'),
  notes: z.string().max(2000).optional().nullable(),
  flags: z.string().max(255).optional().nullable(),
});

export type ImportAssignment = z.infer<typeof ImportAssignmentSchema>;

const ImportCompanySchema = z.object({
  id: EntityIdSchema,
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

export type ImportCompany = z.infer<typeof ImportCompanySchema>;

export const ImportBundleSchema = z.object({
  units: z.array(ImportUnitSchema).optional().default([]),
  jobTitles: z.array(ImportJobTitleSchema).optional().default([]),
  persons: z.array(ImportPersonSchema).optional().default([]),
  assignments: z.array(ImportAssignmentSchema).optional().default([]),
  companies: z.array(ImportCompanySchema).optional().default([]),
});

export type ImportBundle = z.infer<typeof ImportBundleSchema>;

/** What to do with a record that matches one already stored. */
export const CONFLICT_STRATEGIES = ['skip', 'update', 'fail'] as const;
export type ConflictStrategy = (typeof CONFLICT_STRATEGIES)[number];

export const ImportOptionsSchema = z.object({
  conflictStrategy: z.enum(CONFLICT_STRATEGIES).optional().default('skip'),
  dryRun: QueryBooleanSchema.optional().default(false),
});

export type ImportOptions = z.infer<typeof ImportOptionsSchema>;

// ============================================================================
// Export
// ============================================================================

export const EXPORT_ENTITIES = ['units', 'job-titles', 'persons', 'assignments', 'companies'] as const;
export type ExportEntity = (typeof EXPORT_ENTITIES)[number];

export const ExportEntityParamSchema = z.object({
  entityType: z.enum(EXPORT_ENTITIES),
});
