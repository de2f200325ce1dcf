import type {
  AssignmentRow,
  AssignmentStatus,
  Company,
  JobTitle,
  Person,
  Unit,
  UnitType,
} from '../db/schema.js';
import type { ConflictStrategy } from '../schemas/import-export.schema.js';

// Pagination
export interface PaginatedResponse<T> {
  data: T[];
  pagination: {
    page: number;
    limit: number;
    total: number;
    totalPages: number;
  };
}

// Workload types
export type WorkloadStatus = 'low' | 'normal' | 'high' | 'overloaded';

export type WorkloadColor = 'info' | 'success' | 'warning' | 'danger';

export interface WorkloadSummary {
  totalPercentage: number;
  status: WorkloadStatus;
  color: WorkloadColor;
  assignmentCount: number;
  adInterimCount: number;
  unitCount: number;
  recommendations: string[];
}

export interface PersonWorkload extends WorkloadSummary {
  personId: number;
  personName: string;
}

export interface WorkloadReport {
  totalPersons: number;
  averageWorkload: number;
  counts: Record<WorkloadStatus, number>;
  bands: Record<WorkloadStatus, PersonWorkload[]>;
}

export interface WorkloadHistoryPoint {
  date: string;
  totalPercentage: number;
  status: WorkloadStatus;
  assignmentCount: number;
}

// Assignment types

/** An assignment version as returned by the API: percentage in whole points. */
export interface AssignmentDto extends Omit<AssignmentRow, 'percentage'> {
  percentage: number;
}

export interface AssignmentView extends AssignmentDto {
  personName: string;
  unitName: string;
  jobTitleName: string;
}

export interface LineageKey {
  personId: number;
  unitId: number;
  jobTitleId: number;
}

export interface MutationContext {
  ipAddress?: string | null;
}

export interface AssignmentStatistics {
  totalVersions: number;
  byStatus: Record<AssignmentStatus, number>;
  adInterim: number;
  unitBosses: number;
  personsWithAssignments: number;
  unitsWithAssignments: number;
  averageDurationDays: number | null;
}

export interface BulkOperationResult {
  succeeded: number[];
  failed: Array<{ id: number; error: string }>;
}

export interface OptionItem {
  id: number;
  label: string;
}

export interface AssignmentFormOptions {
  persons: OptionItem[];
  units: Array<OptionItem & { unitType: UnitType }>;
  jobTitles: OptionItem[];
  current?: AssignmentView;
}

// Person types
export interface TimelineEntry extends AssignmentView {
  durationDays: number | null;
}

export interface PersonDetail {
  person: Person;
  currentAssignments: AssignmentView[];
  workload: WorkloadSummary;
  timeline: TimelineEntry[];
}

export interface CompanyView extends Company {
  isActive: boolean;
}

export type DuplicateMatchType = 'email_match' | 'exact_name_match' | 'similar_name';

export interface PotentialDuplicate {
  person1: Pick<Person, 'id' | 'firstName' | 'lastName' | 'email'>;
  person2: Pick<Person, 'id' | 'firstName' | 'lastName' | 'email'>;
  matchType: DuplicateMatchType;
  confidence: number;
}

// Unit and org chart types
export interface SpanOfControl {
  unitId: number;
  directUnits: number;
  directPersons: number;
  total: number;
}

export interface UnitDetail {
  unit: Unit;
  breadcrumb: Array<Pick<Unit, 'id' | 'name' | 'unitType'>>;
  children: Unit[];
  currentAssignments: AssignmentView[];
  spanOfControl: SpanOfControl;
}

export interface OrgChartPerson {
  assignmentId: number;
  personId: number;
  personName: string;
  jobTitleName: string;
  percentage: number;
  isAdInterim: boolean;
  isUnitBoss: boolean;
}

export interface OrgChartNode {
  id: number;
  name: string;
  shortName: string | null;
  unitType: UnitType;
  emoji: string | null;
  parentUnitId: number | null;
  depth: number;
  persons: OrgChartPerson[];
  children: OrgChartNode[];
}

export interface MatrixRow {
  personId: number;
  personName: string;
  assignments: Array<{
    assignmentId: number;
    unitId: number;
    unitName: string;
    jobTitleName: string;
    percentage: number;
    isAdInterim: boolean;
    isUnitBoss: boolean;
  }>;
  totalPercentage: number;
  status: WorkloadStatus;
}

export interface OrgChartStatistics {
  totalUnits: number;
  totalPersons: number;
  personsWithAssignments: number;
  maxDepth: number;
  averageSpanOfControl: number;
  vacantUnits: number;
}

// Import and export types
export type ImportEntity = 'units' | 'persons' | 'jobTitles' | 'assignments' | 'companies';

export interface ImportCounts {
  created: number;
  updated: number;
  skipped: number;
}

export interface ImportResult {
  dryRun: boolean;
  conflictStrategy: ConflictStrategy;
  counts: Record<ImportEntity, ImportCounts>;
  /** Bundle key -> stored id, per entity. */
  idMap: {
    units: Record<number, number>;
    persons: Record<number, number>;
    jobTitles: Record<number, number>;
    companies: Record<number, number>;
  };
}

export interface ExportedAssignment
  extends Pick<
    AssignmentRow,
    | 'personId'
    | 'unitId'
    | 'jobTitleId'
    | 'version'
    | 'isAdInterim'
    | 'isUnitBoss'
    | 'validFrom'
    | 'validTo'
    | 'status'
    | 'notes'
    | 'flags'
  > {
  percentage: number;
}

export interface ExportBundle {
  exportedAt: string;
  units: Array<Pick<Unit, 'id' | 'name' | 'shortName' | 'unitType' | 'parentUnitId' | 'emoji' | 'image'>>;
  jobTitles: Array<Pick<JobTitle, 'id' | 'name' | 'shortName'>>;
  persons: Array<
    Pick<Person, 'id' | 'firstName' | 'lastName' | 'shortName' | 'registrationNo' | 'email' | 'profileImage'>
  >;
  assignments: ExportedAssignment[];
  companies: Array<Omit<Company, 'datetimeCreated' | 'datetimeUpdated'>>;
}
