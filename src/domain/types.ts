/**
 * Domain types for the cohort registry.
 *
 * Everything is scoped to a project cycle (a semester-long cohort): volunteers,
 * mentors and nonprofit clients belong to exactly one cycle, and the join
 * relations between them carry the cycle id as part of their key.
 */

import type {
  AgeRange,
  ClientSize,
  Ethnicity,
  FliStatus,
  Gender,
  HearAboutSource,
  ImpactCause,
  JobStatus,
  LgbtStatus,
  MentorExperienceLevel,
  MentorYearsExperience,
  StudentStage,
  ValueSetName,
} from './value-sets';

// ============================================================================
// Entities
// ============================================================================

export interface ProjectCycle {
  id: string;
  name: string;
  description?: string;
  archived: boolean;
  createdAt: Date;
  updatedAt?: Date;
}

export interface Volunteer {
  id: string;
  projectCycleId: string;
  firstName: string;
  lastName: string;
  email: string;
  phone?: string;
  gender: Gender;
  ethnicity: Ethnicity[];
  ageRange: AgeRange;
  university: string[];
  lgbt: LgbtStatus;
  country: string;
  usState?: string;
  fli: FliStatus[];
  studentStage: StudentStage;
  majors: string[];
  minors: string[];
  hearAbout: HearAboutSource[];
  createdAt: Date;
  updatedAt?: Date;
}

export interface Mentor {
  id: string;
  projectCycleId: string;
  firstName: string;
  lastName: string;
  email: string;
  phone?: string;
  company: string;
  jobTitle: string;
  country: string;
  usState?: string;
  yearsExperience: MentorYearsExperience;
  experienceLevel: MentorExperienceLevel;
  priorMentor: boolean;
  priorMentee: boolean;
  priorStudent: boolean;
  university: string[];
  hearAbout: HearAboutSource[];
  createdAt: Date;
  updatedAt?: Date;
}

export interface NonprofitClient {
  id: string;
  projectCycleId: string;
  representativeFirstName: string;
  representativeLastName: string;
  representativeJobTitle?: string;
  email: string;
  emailCc?: string;
  phone: string;
  orgName: string;
  projectName: string;
  orgWebsite?: string;
  countryHq?: string;
  usStateHq?: string;
  address: string;
  size: ClientSize;
  impactCauses: ImpactCause[];
  createdAt: Date;
  updatedAt?: Date;
}

export interface TeamRole {
  id: string;
  name: string;
  description: string;
  createdAt: Date;
}

export interface ClientVolunteer {
  projectCycleId: string;
  volunteerId: string;
  clientId: string;
  currentlyActive: boolean;
  createdAt: Date;
  updatedAt?: Date;
}

// ============================================================================
// Inputs
// ============================================================================
// Enumerated fields arrive as plain strings and are checked by the repos.

export interface CreateVolunteerInput {
  firstName: string;
  lastName: string;
  email: string;
  phone?: string | null;
  gender?: string;
  ethnicity?: readonly string[];
  ageRange?: string;
  university?: readonly string[];
  lgbt?: string;
  country: string;
  usState?: string | null;
  fli?: readonly string[];
  studentStage?: string;
  majors?: readonly string[];
  minors?: readonly string[];
  hearAbout?: readonly string[];
}

export type UpdateVolunteerInput = Partial<CreateVolunteerInput>;

export interface CreateMentorInput {
  firstName: string;
  lastName: string;
  email: string;
  phone?: string | null;
  company: string;
  jobTitle: string;
  country: string;
  usState?: string | null;
  yearsExperience: string;
  experienceLevel: string;
  priorMentor?: boolean;
  priorMentee?: boolean;
  priorStudent?: boolean;
  university?: readonly string[];
  hearAbout?: readonly string[];
}

export type UpdateMentorInput = Partial<CreateMentorInput>;

export interface CreateClientInput {
  representativeFirstName: string;
  representativeLastName: string;
  representativeJobTitle?: string | null;
  email: string;
  emailCc?: string | null;
  phone: string;
  orgName: string;
  projectName: string;
  orgWebsite?: string | null;
  countryHq?: string | null;
  usStateHq?: string | null;
  address: string;
  size: string;
  impactCauses?: readonly string[];
}

export type UpdateClientInput = Partial<CreateClientInput>;

export interface CreatedRecord {
  email: string;
  id: string;
}

export interface CycleStats {
  projectCycleId: string;
  volunteers: number;
  mentors: number;
  nonprofits: number;
}

/** Rows removed per table by a cascading delete. */
export type DeletionSummary = Record<string, number>;

// ============================================================================
// Aggregated views
// ============================================================================

export interface VolunteerClientItem {
  clientId: string;
  orgName: string;
  projectName: string;
  currentlyActive: boolean;
}

export interface MentorItem {
  mentorId: string;
  firstName: string;
  lastName: string;
  email: string;
  phone?: string;
  company: string;
  jobTitle: string;
}

export interface RoleItem {
  roleId: string;
  name: string;
  description: string;
}

export interface ExportItem {
  receiptId: string;
  jobId: string;
  jobStatus: JobStatus;
  workspaceEmail: string;
  orgUnit: string;
}

export interface VolunteerDetails extends Volunteer {
  projectCycleName: string;
  /** Email from the most recent export receipt, if any. */
  workspaceEmail: string | null;
  clients: VolunteerClientItem[];
  mentors: MentorItem[];
  roles: RoleItem[];
  exports: ExportItem[];
}

export interface MentorVolunteerItem {
  volunteerId: string;
  email: string;
  name: string;
}

export interface MentorClientItem {
  clientId: string;
  orgName: string;
  projectName: string;
}

export interface MentorDetails extends Mentor {
  projectCycleName: string;
  volunteers: MentorVolunteerItem[];
  clients: MentorClientItem[];
}

export interface ClientVolunteerItem {
  volunteerId: string;
  firstName: string;
  lastName: string;
  email: string;
  phone?: string;
  gender: Gender;
  ethnicity: Ethnicity[];
  ageRange: AgeRange;
  currentlyActive: boolean;
}

export interface ClientDetails extends NonprofitClient {
  projectCycleName: string;
  volunteers: ClientVolunteerItem[];
  mentors: MentorItem[];
}

// ============================================================================
// Jobs
// ============================================================================

export type JobDetailValue = string | number | boolean | null;
export type JobDetails = Record<string, JobDetailValue>;

/** Discriminators written to details.jobType by the import/export workers. */
export const KNOWN_JOB_TYPES = ['import_roster_base', 'export_users', 'undo_workspace_export'] as const;

export interface Job {
  id: string;
  projectCycleId?: string;
  status: JobStatus;
  label: string;
  description?: string;
  details: JobDetails;
  createdAt: Date;
  updatedAt?: Date;
}

export interface ExportReceipt {
  id: string;
  volunteerId: string;
  jobId: string;
  workspaceEmail: string;
  orgUnit: string;
  createdAt: Date;
  updatedAt?: Date;
}

export interface ExportedVolunteerDetail extends ExportReceipt {
  projectCycleId: string;
  jobStatus: JobStatus;
}

// ============================================================================
// Result Type
// ============================================================================

export type ErrorCode =
  | 'DOMAIN_VIOLATION'
  | 'DUPLICATE_KEY'
  | 'DUPLICATE_RELATION'
  | 'DUPLICATE_EXPORT'
  | 'NOT_FOUND'
  | 'CONSTRAINT_ERROR'
  | 'INVALID_TRANSITION'
  | 'UNAVAILABLE'
  | 'INTERNAL_CONSISTENCY_FAULT'
  | 'VALIDATION_ERROR';

export type ErrorDetails = Record<string, string>;

export type Result<T> =
  | { success: true; data: T }
  | { success: false; error: string; code: ErrorCode; details?: ErrorDetails };

// ============================================================================
// Error Types
// ============================================================================

export abstract class RegistryError extends Error {
  abstract readonly code: ErrorCode;
  readonly details: ErrorDetails;

  constructor(message: string, details: ErrorDetails = {}) {
    super(message);
    this.details = details;
  }
}

export class NotFoundError extends RegistryError {
  readonly code = 'NOT_FOUND';

  constructor(entity: string, id: string) {
    super(`${entity} not found: ${id}`, { entity, id });
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends RegistryError {
  readonly code = 'VALIDATION_ERROR';

  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class DomainViolationError extends RegistryError {
  readonly code = 'DOMAIN_VIOLATION';

  constructor(field: string, domain: ValueSetName, value: string) {
    super(`Invalid value for ${field}: "${value}" is not a valid ${domain}`, { field, domain, value });
    this.name = 'DomainViolationError';
  }
}

export class DuplicateKeyError extends RegistryError {
  readonly code = 'DUPLICATE_KEY';

  constructor(constraint: string) {
    super(`Duplicate value violates unique constraint ${constraint}`, { constraint });
    this.name = 'DuplicateKeyError';
  }
}

export class DuplicateRelationError extends RegistryError {
  readonly code = 'DUPLICATE_RELATION';

  constructor(relation: string, keys: ErrorDetails = {}) {
    super(`Relation ${relation} already exists`, { relation, ...keys });
    this.name = 'DuplicateRelationError';
  }
}

export class DuplicateExportError extends RegistryError {
  readonly code = 'DUPLICATE_EXPORT';

  constructor(volunteerId: string, jobId: string) {
    super(`Volunteer ${volunteerId} was already exported by job ${jobId}`, { volunteerId, jobId });
    this.name = 'DuplicateExportError';
  }
}

export class ConstraintError extends RegistryError {
  readonly code = 'CONSTRAINT_ERROR';

  constructor(constraint: string, message: string) {
    super(message, { constraint });
    this.name = 'ConstraintError';
  }
}

export class InvalidTransitionError extends RegistryError {
  readonly code = 'INVALID_TRANSITION';

  constructor(from: JobStatus, to: JobStatus, allowed: readonly JobStatus[]) {
    const allowedText = allowed.length > 0 ? allowed.join(', ') : 'none (terminal)';
    super(`Cannot transition job from ${from} to ${to}. Allowed: ${allowedText}`, { from, to });
    this.name = 'InvalidTransitionError';
  }
}

export class UnavailableError extends RegistryError {
  readonly code = 'UNAVAILABLE';

  constructor(message: string) {
    super(message);
    this.name = 'UnavailableError';
  }
}

export class InternalConsistencyError extends RegistryError {
  readonly code = 'INTERNAL_CONSISTENCY_FAULT';

  constructor(message: string, details: ErrorDetails = {}) {
    super(message, details);
    this.name = 'InternalConsistencyError';
  }
}
