import { sql } from 'drizzle-orm';
import {
  type AnyPgColumn,
  boolean,
  date,
  doublePrecision,
  index,
  integer,
  jsonb,
  pgTable,
  serial,
  text,
  timestamp,
  uniqueIndex,
} from 'drizzle-orm/pg-core';

// Column layout mirrors src/db/schema.sql, which is what actually creates the tables.

export const UNIT_TYPES = ['Function', 'OrganizationalUnit'] as const;
export type UnitType = (typeof UNIT_TYPES)[number];

export const ASSIGNMENT_STATUSES = ['CURRENT', 'HISTORICAL', 'TERMINATED'] as const;
export type AssignmentStatus = (typeof ASSIGNMENT_STATUSES)[number];

const timestamps = {
  datetimeCreated: timestamp('datetime_created', { withTimezone: true, mode: 'string' })
    .notNull()
    .defaultNow(),
  datetimeUpdated: timestamp('datetime_updated', { withTimezone: true, mode: 'string' })
    .notNull()
    .defaultNow(),
};

export const persons = pgTable(
  'persons',
  {
    id: serial('id').primaryKey(),
    firstName: text('first_name').notNull(),
    lastName: text('last_name').notNull(),
    shortName: text('short_name'),
    registrationNo: text('registration_no'),
    email: text('email'),
    profileImage: text('profile_image'),
    ...timestamps,
  },
  (table) => [
    uniqueIndex('persons_registration_no_unique').on(table.registrationNo),
    index('persons_name_idx').on(table.lastName, table.firstName),
  ],
);

export type Person = typeof persons.$inferSelect;
export type NewPerson = typeof persons.$inferInsert;

export const units = pgTable(
  'units',
  {
    id: serial('id').primaryKey(),
    name: text('name').notNull(),
    shortName: text('short_name'),
    unitType: text('unit_type', { enum: UNIT_TYPES }).notNull(),
    parentUnitId: integer('parent_unit_id').references((): AnyPgColumn => units.id),
    emoji: text('emoji'),
    image: text('image'),
    ...timestamps,
  },
  (table) => [index('units_parent_idx').on(table.parentUnitId)],
);

export type Unit = typeof units.$inferSelect;
export type NewUnit = typeof units.$inferInsert;

export const jobTitles = pgTable('job_titles', {
  id: serial('id').primaryKey(),
  name: text('name').notNull(),
  shortName: text('short_name'),
  ...timestamps,
});

export type JobTitle = typeof jobTitles.$inferSelect;
export type NewJobTitle = typeof jobTitles.$inferInsert;

/**
 * Versioned assignments. A lineage is (person, unit, job title); each
 * edit inserts the next version and at most one version per lineage is
 * CURRENT at any time.
 */
export const assignments = pgTable(
  'person_job_assignments',
  {
    id: serial('id').primaryKey(),
    personId: integer('person_id')
      .notNull()
      .references(() => persons.id, { onDelete: 'cascade' }),
    unitId: integer('unit_id')
      .notNull()
      .references(() => units.id),
    jobTitleId: integer('job_title_id')
      .notNull()
      .references(() => jobTitles.id),
    version: integer('version').notNull(),
    // Fraction of full time, 0 < p <= 1
    percentage: doublePrecision('percentage').notNull(),
    isAdInterim: boolean('is_ad_interim').notNull().default(false),
    isUnitBoss: boolean('is_unit_boss').notNull().default(false),
    validFrom: date('valid_from', { mode: 'string' }).notNull(),
    validTo: date('valid_to', { mode: 'string' }),
    notes: text('notes'),
    flags: text('flags'),
    status: text('status', { enum: ASSIGNMENT_STATUSES }).notNull(),
    ...timestamps,
  },
  (table) => [
    uniqueIndex('unique_assignment_version').on(
      table.personId,
      table.unitId,
      table.jobTitleId,
      table.version,
    ),
    uniqueIndex('unique_current_assignment')
      .on(table.personId, table.unitId, table.jobTitleId)
      .where(sql`status = 'CURRENT'`),
    index('assignments_person_idx').on(table.personId),
    index('assignments_unit_idx').on(table.unitId),
  ],
);

export type AssignmentRow = typeof assignments.$inferSelect;
export type NewAssignmentRow = typeof assignments.$inferInsert;

export const companies = pgTable(
  'companies',
  {
    id: serial('id').primaryKey(),
    name: text('name').notNull(),
    shortName: text('short_name'),
    registrationNo: text('registration_no'),
    address: text('address'),
    city: text('city'),
    postalCode: text('postal_code'),
    country: text('country').notNull().default('Italy'),
    phone: text('phone'),
    email: text('email'),
    website: text('website'),
    mainContactId: integer('main_contact_id').references(() => persons.id, { onDelete: 'set null' }),
    financialContactId: integer('financial_contact_id').references(() => persons.id, {
      onDelete: 'set null',
    }),
    validFrom: date('valid_from', { mode: 'string' }),
    validTo: date('valid_to', { mode: 'string' }),
    notes: text('notes'),
    ...timestamps,
  },
  (table) => [
    uniqueIndex('companies_registration_no_unique').on(table.registrationNo),
    index('companies_name_idx').on(table.name),
  ],
);

export type Company = typeof companies.$inferSelect;
export type NewCompany = typeof companies.$inferInsert;

export const auditEvents = pgTable(
  'audit_events',
  {
    id: serial('id').primaryKey(),
    entityType: text('entity_type').notNull(),
    entityId: integer('entity_id').notNull(),
    action: text('action').notNull(),
    payload: jsonb('payload').$type<Record<string, unknown>>().notNull(),
    ipAddress: text('ip_address'),
    datetimeCreated: timestamp('datetime_created', { withTimezone: true, mode: 'string' })
      .notNull()
      .defaultNow(),
  },
  (table) => [index('audit_events_entity_idx').on(table.entityType, table.entityId)],
);

export type AuditEvent = typeof auditEvents.$inferSelect;
