import { queryAll, readEnum, decodeEnumSet, ok, fail } from './base';
import { requireCycle } from './cycles';
import { rowToVolunteer, type VolunteerRow } from './volunteers';
import { rowToMentor, type MentorRow } from './mentors';
import { rowToClient, type ClientRow } from './clients';
import { getExportedDetails } from './exports';
import {
  collectRelation,
  readBoolean,
  readOptionalText,
  readText,
  type BaseTable,
  type ProjectionRow,
  type RelationDescriptor,
} from '../services/aggregation';
import type {
  ClientDetails,
  ClientVolunteerItem,
  ExportItem,
  ExportedVolunteerDetail,
  MentorClientItem,
  MentorDetails,
  MentorItem,
  MentorVolunteerItem,
  Result,
  RoleItem,
  VolunteerClientItem,
  VolunteerDetails,
} from '../domain/types';
import { NotFoundError } from '../domain/types';

type WithCycleName = { project_cycle_name: string };

// ============================================================================
// Projections
// ============================================================================

const MENTOR_COLUMNS = {
  first_name: 'r.first_name',
  last_name: 'r.last_name',
  email: 'r.email',
  phone: 'r.phone',
  company: 'r.company',
  job_title: 'r.job_title',
};

function projectMentor(row: ProjectionRow): MentorItem {
  return {
    mentorId: readText(row, 'related_key'),
    firstName: readText(row, 'first_name'),
    lastName: readText(row, 'last_name'),
    email: readText(row, 'email'),
    phone: readOptionalText(row, 'phone'),
    company: readText(row, 'company'),
    jobTitle: readText(row, 'job_title'),
  };
}

// ============================================================================
// Descriptors
// ============================================================================

const VOLUNTEERS: BaseTable = { table: 'volunteers', idColumn: 'id' };
const MENTORS: BaseTable = { table: 'mentors', idColumn: 'id' };
const CLIENTS: BaseTable = { table: 'nonprofit_clients', idColumn: 'id' };

const volunteerClients: RelationDescriptor<VolunteerClientItem> = {
  collection: 'clients',
  joinTable: 'client_volunteers',
  joinBaseColumn: 'volunteer_id',
  joinRelatedColumn: 'client_id',
  relatedTable: 'nonprofit_clients',
  columns: { org_name: 'r.org_name', project_name: 'r.project_name', currently_active: 'j.currently_active' },
  orderBy: 'org_name, project_name, related_key',
  project: row => ({
    clientId: readText(row, 'related_key'),
    orgName: readText(row, 'org_name'),
    projectName: readText(row, 'project_name'),
    currentlyActive: readBoolean(row, 'currently_active'),
  }),
};

const volunteerMentors: RelationDescriptor<MentorItem> = {
  collection: 'mentors',
  joinTable: 'volunteer_mentors',
  joinBaseColumn: 'volunteer_id',
  joinRelatedColumn: 'mentor_id',
  relatedTable: 'mentors',
  columns: MENTOR_COLUMNS,
  orderBy: 'last_name, first_name, related_key',
  project: projectMentor,
};

const volunteerRoles: RelationDescriptor<RoleItem> = {
  collection: 'roles',
  joinTable: 'volunteer_team_roles',
  joinBaseColumn: 'volunteer_id',
  joinRelatedColumn: 'role_id',
  relatedTable: 'team_roles',
  columns: { role_name: 'r.name', role_description: 'r.description' },
  orderBy: 'role_name',
  project: row => ({
    roleId: readText(row, 'related_key'),
    name: readText(row, 'role_name'),
    description: readText(row, 'role_description'),
  }),
};

const volunteerExports: RelationDescriptor<ExportItem> = {
  collection: 'exports',
  joinTable: 'volunteers_exported_to_workspace',
  joinBaseColumn: 'volunteer_id',
  joinRelatedColumn: 'job_id',
  relatedTable: 'jobs',
  columns: {
    receipt_id: 'j.id',
    workspace_email: 'j.workspace_email',
    org_unit: 'j.org_unit',
    job_status: 'r.status',
    exported_at: 'j.created_at',
  },
  orderBy: 'exported_at, receipt_id',
  project: row => ({
    receiptId: readText(row, 'receipt_id'),
    jobId: readText(row, 'related_key'),
    jobStatus: readEnum('job_status', 'jobStatus', readText(row, 'job_status')),
    workspaceEmail: readText(row, 'workspace_email'),
    orgUnit: readText(row, 'org_unit'),
  }),
};

const mentorVolunteers: RelationDescriptor<MentorVolunteerItem> = {
  collection: 'volunteers',
  joinTable: 'volunteer_mentors',
  joinBaseColumn: 'mentor_id',
  joinRelatedColumn: 'volunteer_id',
  relatedTable: 'volunteers',
  columns: { email: 'r.email', full_name: `r.first_name || ' ' || r.last_name` },
  orderBy: 'full_name, related_key',
  project: row => ({
    volunteerId: readText(row, 'related_key'),
    email: readText(row, 'email'),
    name: readText(row, 'full_name'),
  }),
};

const mentorClients: RelationDescriptor<MentorClientItem> = {
  collection: 'clients',
  joinTable: 'client_mentors',
  joinBaseColumn: 'mentor_id',
  joinRelatedColumn: 'client_id',
  relatedTable: 'nonprofit_clients',
  columns: { org_name: 'r.org_name', project_name: 'r.project_name' },
  orderBy: 'org_name, project_name, related_key',
  project: row => ({
    clientId: readText(row, 'related_key'),
    orgName: readText(row, 'org_name'),
    projectName: readText(row, 'project_name'),
  }),
};

const clientVolunteers: RelationDescriptor<ClientVolunteerItem> = {
  collection: 'volunteers',
  joinTable: 'client_volunteers',
  joinBaseColumn: 'client_id',
  joinRelatedColumn: 'volunteer_id',
  relatedTable: 'volunteers',
  columns: {
    first_name: 'r.first_name',
    last_name: 'r.last_name',
    email: 'r.email',
    phone: 'r.phone',
    gender: 'r.gender',
    ethnicity: 'r.ethnicity',
    age_range: 'r.age_range',
    currently_active: 'j.currently_active',
  },
  orderBy: 'last_name, first_name, related_key',
  project: row => ({
    volunteerId: readText(row, 'related_key'),
    firstName: readText(row, 'first_name'),
    lastName: readText(row, 'last_name'),
    email: readText(row, 'email'),
    phone: readOptionalText(row, 'phone'),
    gender: readEnum('gender', 'gender', readText(row, 'gender')),
    ethnicity: decodeEnumSet(readText(row, 'ethnicity'), 'ethnicity', 'ethnicity'),
    ageRange: readEnum('age_range', 'ageRange', readText(row, 'age_range')),
    currentlyActive: readBoolean(row, 'currently_active'),
  }),
};

const clientMentors: RelationDescriptor<MentorItem> = {
  collection: 'mentors',
  joinTable: 'client_mentors',
  joinBaseColumn: 'client_id',
  joinRelatedColumn: 'mentor_id',
  relatedTable: 'mentors',
  columns: MENTOR_COLUMNS,
  orderBy: 'last_name, first_name, related_key',
  project: projectMentor,
};

// ============================================================================
// Assembly
// ============================================================================

function assembleVolunteers(rows: Array<VolunteerRow & WithCycleName>): VolunteerDetails[] {
  const ids = rows.map(row => row.id);
  const clients = collectRelation(VOLUNTEERS, ids, volunteerClients);
  const mentors = collectRelation(VOLUNTEERS, ids, volunteerMentors);
  const roles = collectRelation(VOLUNTEERS, ids, volunteerRoles);
  const exports = collectRelation(VOLUNTEERS, ids, volunteerExports);

  return rows.map(row => {
    const exported = exports.get(row.id);
    return {
      ...rowToVolunteer(row),
      projectCycleName: row.project_cycle_name,
      workspaceEmail: exported.at(-1)?.workspaceEmail ?? null,
      clients: clients.get(row.id),
      mentors: mentors.get(row.id),
      roles: roles.get(row.id),
      exports: exported,
    };
  });
}

function assembleMentors(rows: Array<MentorRow & WithCycleName>): MentorDetails[] {
  const ids = rows.map(row => row.id);
  const volunteers = collectRelation(MENTORS, ids, mentorVolunteers);
  const clients = collectRelation(MENTORS, ids, mentorClients);

  return rows.map(row => ({
    ...rowToMentor(row),
    projectCycleName: row.project_cycle_name,
    volunteers: volunteers.get(row.id),
    clients: clients.get(row.id),
  }));
}

function assembleClients(rows: Array<ClientRow & WithCycleName>): ClientDetails[] {
  const ids = rows.map(row => row.id);
  const volunteers = collectRelation(CLIENTS, ids, clientVolunteers);
  const mentors = collectRelation(CLIENTS, ids, clientMentors);

  return rows.map(row => ({
    ...rowToClient(row),
    projectCycleName: row.project_cycle_name,
    volunteers: volunteers.get(row.id),
    mentors: mentors.get(row.id),
  }));
}

function baseQuery(table: string, where: string, orderBy: string): string {
  return `SELECT b.*, pc.name AS project_cycle_name
    FROM ${table} b JOIN project_cycles pc ON pc.id = b.project_cycle_id
    WHERE ${where}
    ORDER BY ${orderBy}`;
}

function firstOrNotFound<T>(items: T[], entity: string, id: string): T {
  const [first] = items;
  if (first === undefined) {
    throw new NotFoundError(entity, id);
  }
  return first;
}

// ============================================================================
// Public API
// ============================================================================

export function getVolunteerDetails(id: string): Result<VolunteerDetails> {
  try {
    const rows = queryAll<VolunteerRow & WithCycleName>(baseQuery('volunteers', 'b.id = ?', 'b.id'), [id]);
    return ok(firstOrNotFound(assembleVolunteers(rows), 'Volunteer', id));
  } catch (error) {
    return fail(error);
  }
}

export function listVolunteerDetailsByCycle(projectCycleId: string): Result<VolunteerDetails[]> {
  try {
    requireCycle(projectCycleId);
    const rows = queryAll<VolunteerRow & WithCycleName>(
      baseQuery('volunteers', 'b.project_cycle_id = ?', 'b.last_name, b.first_name, b.id'),
      [projectCycleId]
    );
    return ok(assembleVolunteers(rows));
  } catch (error) {
    return fail(error);
  }
}

export function getMentorDetails(id: string): Result<MentorDetails> {
  try {
    const rows = queryAll<MentorRow & WithCycleName>(baseQuery('mentors', 'b.id = ?', 'b.id'), [id]);
    return ok(firstOrNotFound(assembleMentors(rows), 'Mentor', id));
  } catch (error) {
    return fail(error);
  }
}

export function listMentorDetailsByCycle(projectCycleId: string): Result<MentorDetails[]> {
  try {
    requireCycle(projectCycleId);
    const rows = queryAll<MentorRow & WithCycleName>(
      baseQuery('mentors', 'b.project_cycle_id = ?', 'b.last_name, b.first_name, b.id'),
      [projectCycleId]
    );
    return ok(assembleMentors(rows));
  } catch (error) {
    return fail(error);
  }
}

export function getClientDetails(id: string): Result<ClientDetails> {
  try {
    const rows = queryAll<ClientRow & WithCycleName>(baseQuery('nonprofit_clients', 'b.id = ?', 'b.id'), [id]);
    return ok(firstOrNotFound(assembleClients(rows), 'NonprofitClient', id));
  } catch (error) {
    return fail(error);
  }
}

export function listClientDetailsByCycle(projectCycleId: string): Result<ClientDetails[]> {
  try {
    requireCycle(projectCycleId);
    const rows = queryAll<ClientRow & WithCycleName>(
      baseQuery('nonprofit_clients', 'b.project_cycle_id = ?', 'b.org_name, b.project_name, b.id'),
      [projectCycleId]
    );
    return ok(assembleClients(rows));
  } catch (error) {
    return fail(error);
  }
}

export function getExportedVolunteerDetails(projectCycleId: string): Result<ExportedVolunteerDetail[]> {
  return getExportedDetails(projectCycleId);
}
