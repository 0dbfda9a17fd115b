import {
  queryOne,
  queryAll,
  execute,
  generateId,
  now,
  toDate,
  toOptionalDate,
  toNullableText,
  encodeSet,
  decodeTextSet,
  decodeEnumSet,
  readEnum,
  writeChangedColumns,
  ok,
  fail,
  transaction,
} from './base';
import { requireCycle } from './cycles';
import { deleteOwned } from './ownership';
import type {
  CreateVolunteerInput,
  CreatedRecord,
  DeletionSummary,
  Result,
  UpdateVolunteerInput,
  Volunteer,
} from '../domain/types';
import { NotFoundError, ValidationError } from '../domain/types';
import { assertAllInDomain, assertInDomain } from '../domain/value-sets';

export type VolunteerRow = {
  id: string;
  project_cycle_id: string;
  first_name: string;
  last_name: string;
  email: string;
  phone: string | null;
  gender: string;
  ethnicity: string;
  age_range: string;
  university: string;
  lgbt: string;
  country: string;
  us_state: string | null;
  fli: string;
  student_stage: string;
  majors: string;
  minors: string;
  hear_about: string;
  created_at: string;
  updated_at: string | null;
};

type VolunteerColumns = Partial<Omit<VolunteerRow, 'id' | 'project_cycle_id' | 'created_at' | 'updated_at'>>;

const DEFAULT_FLI = encodeSet(['prefer_not_to_say']);
const EMPTY_SET = encodeSet([]);

export function rowToVolunteer(row: VolunteerRow): Volunteer {
  return {
    id: row.id,
    projectCycleId: row.project_cycle_id,
    firstName: row.first_name,
    lastName: row.last_name,
    email: row.email,
    phone: row.phone ?? undefined,
    gender: readEnum('gender', 'gender', row.gender),
    ethnicity: decodeEnumSet(row.ethnicity, 'ethnicity', 'ethnicity'),
    ageRange: readEnum('age_range', 'ageRange', row.age_range),
    university: decodeTextSet(row.university, 'university'),
    lgbt: readEnum('lgbt', 'lgbtStatus', row.lgbt),
    country: row.country,
    usState: row.us_state ?? undefined,
    fli: decodeEnumSet(row.fli, 'fli', 'fliStatus'),
    studentStage: readEnum('student_stage', 'studentStage', row.student_stage),
    majors: decodeTextSet(row.majors, 'majors'),
    minors: decodeTextSet(row.minors, 'minors'),
    hearAbout: decodeEnumSet(row.hear_about, 'hear_about', 'hearAbout'),
    createdAt: toDate(row.created_at),
    updatedAt: toOptionalDate(row.updated_at),
  };
}

function requireText(field: string, value: string): string;
function requireText(field: string, value: string | undefined): string | undefined;
function requireText(field: string, value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  if (!trimmed) {
    throw new ValidationError(`Volunteer ${field} cannot be empty`);
  }
  return trimmed;
}

/**
 * Validate the provided fields and map them to columns. Fields left
 * undefined stay undefined so updates only touch what was given.
 */
function toColumns(input: UpdateVolunteerInput): VolunteerColumns {
  return {
    first_name: requireText('firstName', input.firstName),
    last_name: requireText('lastName', input.lastName),
    email: requireText('email', input.email),
    phone: toNullableText(input.phone),
    gender: input.gender === undefined ? undefined : assertInDomain('gender', 'gender', input.gender),
    ethnicity: input.ethnicity === undefined
      ? undefined
      : encodeSet(assertAllInDomain('ethnicity', 'ethnicity', input.ethnicity)),
    age_range: input.ageRange === undefined ? undefined : assertInDomain('ageRange', 'ageRange', input.ageRange),
    university: input.university === undefined ? undefined : encodeSet(input.university),
    lgbt: input.lgbt === undefined ? undefined : assertInDomain('lgbt', 'lgbtStatus', input.lgbt),
    country: requireText('country', input.country),
    us_state: toNullableText(input.usState),
    fli: input.fli === undefined ? undefined : encodeSet(assertAllInDomain('fli', 'fliStatus', input.fli)),
    student_stage: input.studentStage === undefined
      ? undefined
      : assertInDomain('studentStage', 'studentStage', input.studentStage),
    majors: input.majors === undefined ? undefined : encodeSet(input.majors),
    minors: input.minors === undefined ? undefined : encodeSet(input.minors),
    hear_about: input.hearAbout === undefined
      ? undefined
      : encodeSet(assertAllInDomain('hearAbout', 'hearAbout', input.hearAbout)),
  };
}

function insertVolunteer(projectCycleId: string, input: CreateVolunteerInput): Volunteer {
  const columns = toColumns(input);
  const row: VolunteerRow = {
    id: generateId(),
    project_cycle_id: projectCycleId,
    first_name: requireText('firstName', input.firstName),
    last_name: requireText('lastName', input.lastName),
    email: requireText('email', input.email),
    phone: columns.phone ?? null,
    gender: columns.gender ?? 'prefer_not_to_say',
    ethnicity: columns.ethnicity ?? EMPTY_SET,
    age_range: columns.age_range ?? 'prefer_not_to_say',
    university: columns.university ?? EMPTY_SET,
    lgbt: columns.lgbt ?? 'prefer_not_to_say',
    country: requireText('country', input.country),
    us_state: columns.us_state ?? null,
    fli: columns.fli ?? DEFAULT_FLI,
    student_stage: columns.student_stage ?? 'recent_graduate',
    majors: columns.majors ?? EMPTY_SET,
    minors: columns.minors ?? EMPTY_SET,
    hear_about: columns.hear_about ?? EMPTY_SET,
    created_at: now(),
    updated_at: null,
  };

  execute(
    `INSERT INTO volunteers (
       id, project_cycle_id, first_name, last_name, email, phone, gender, ethnicity, age_range,
       university, lgbt, country, us_state, fli, student_stage, majors, minors, hear_about,
       created_at, updated_at
     ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    [
      row.id, row.project_cycle_id, row.first_name, row.last_name, row.email, row.phone, row.gender,
      row.ethnicity, row.age_range, row.university, row.lgbt, row.country, row.us_state, row.fli,
      row.student_stage, row.majors, row.minors, row.hear_about, row.created_at, row.updated_at,
    ]
  );

  return rowToVolunteer(row);
}

function loadVolunteerRow(id: string): VolunteerRow {
  const row = queryOne<VolunteerRow>('SELECT * FROM volunteers WHERE id = ?', [id]);
  if (!row) {
    throw new NotFoundError('Volunteer', id);
  }
  return row;
}

export function createVolunteer(projectCycleId: string, input: CreateVolunteerInput): Result<Volunteer> {
  try {
    const volunteer = transaction(() => {
      requireCycle(projectCycleId);
      return insertVolunteer(projectCycleId, input);
    });
    return ok(volunteer);
  } catch (error) {
    return fail(error);
  }
}

/** Insert every row or none. */
export function batchCreateVolunteers(
  projectCycleId: string,
  inputs: readonly CreateVolunteerInput[]
): Result<CreatedRecord[]> {
  try {
    const created = transaction(() => {
      requireCycle(projectCycleId);
      return inputs.map(input => {
        const volunteer = insertVolunteer(projectCycleId, input);
        return { email: volunteer.email, id: volunteer.id };
      });
    });
    return ok(created);
  } catch (error) {
    return fail(error);
  }
}

export function getVolunteer(id: string): Result<Volunteer> {
  try {
    return ok(rowToVolunteer(loadVolunteerRow(id)));
  } catch (error) {
    return fail(error);
  }
}

export function getVolunteerByEmail(email: string): Result<Volunteer> {
  try {
    const row = queryOne<VolunteerRow>('SELECT * FROM volunteers WHERE email = ?', [email.trim()]);
    if (!row) {
      throw new NotFoundError('Volunteer', email);
    }
    return ok(rowToVolunteer(row));
  } catch (error) {
    return fail(error);
  }
}

export function listVolunteersByCycle(projectCycleId: string): Result<Volunteer[]> {
  try {
    requireCycle(projectCycleId);
    const rows = queryAll<VolunteerRow>(
      'SELECT * FROM volunteers WHERE project_cycle_id = ? ORDER BY last_name, first_name, id',
      [projectCycleId]
    );
    return ok(rows.map(rowToVolunteer));
  } catch (error) {
    return fail(error);
  }
}

export function updateVolunteer(id: string, patch: UpdateVolunteerInput): Result<Volunteer> {
  try {
    const columns = toColumns(patch);
    const volunteer = transaction(() => {
      const existing = loadVolunteerRow(id);
      writeChangedColumns('volunteers', id, existing, columns);
      return rowToVolunteer(loadVolunteerRow(id));
    });
    return ok(volunteer);
  } catch (error) {
    return fail(error);
  }
}

/** Removes the volunteer with its relations and export receipts. Jobs are kept. */
export function deleteVolunteer(id: string): Result<DeletionSummary> {
  try {
    const summary = transaction(() => {
      loadVolunteerRow(id);
      return deleteOwned('volunteer', id);
    });
    return ok(summary);
  } catch (error) {
    return fail(error);
  }
}
