import {
  queryOne,
  queryAll,
  execute,
  generateId,
  now,
  toDate,
  toOptionalDate,
  toFlag,
  fromFlag,
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
  CreateMentorInput,
  CreatedRecord,
  DeletionSummary,
  Mentor,
  Result,
  UpdateMentorInput,
} from '../domain/types';
import { NotFoundError, ValidationError } from '../domain/types';
import { assertAllInDomain, assertInDomain } from '../domain/value-sets';

export type MentorRow = {
  id: string;
  project_cycle_id: string;
  first_name: string;
  last_name: string;
  email: string;
  phone: string | null;
  company: string;
  job_title: string;
  country: string;
  us_state: string | null;
  years_experience: string;
  experience_level: string;
  prior_mentor: number;
  prior_mentee: number;
  prior_student: number;
  university: string;
  hear_about: string;
  created_at: string;
  updated_at: string | null;
};

type MentorColumns = Partial<Omit<MentorRow, 'id' | 'project_cycle_id' | 'created_at' | 'updated_at'>>;

const EMPTY_SET = encodeSet([]);

export function rowToMentor(row: MentorRow): Mentor {
  return {
    id: row.id,
    projectCycleId: row.project_cycle_id,
    firstName: row.first_name,
    lastName: row.last_name,
    email: row.email,
    phone: row.phone ?? undefined,
    company: row.company,
    jobTitle: row.job_title,
    country: row.country,
    usState: row.us_state ?? undefined,
    yearsExperience: readEnum('years_experience', 'mentorYearsExperience', row.years_experience),
    experienceLevel: readEnum('experience_level', 'mentorExperienceLevel', row.experience_level),
    priorMentor: fromFlag(row.prior_mentor),
    priorMentee: fromFlag(row.prior_mentee),
    priorStudent: fromFlag(row.prior_student),
    university: decodeTextSet(row.university, 'university'),
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
    throw new ValidationError(`Mentor ${field} cannot be empty`);
  }
  return trimmed;
}

function toColumns(input: UpdateMentorInput): MentorColumns {
  return {
    first_name: requireText('firstName', input.firstName),
    last_name: requireText('lastName', input.lastName),
    email: requireText('email', input.email),
    phone: toNullableText(input.phone),
    company: requireText('company', input.company),
    job_title: requireText('jobTitle', input.jobTitle),
    country: requireText('country', input.country),
    us_state: toNullableText(input.usState),
    years_experience: input.yearsExperience === undefined
      ? undefined
      : assertInDomain('yearsExperience', 'mentorYearsExperience', input.yearsExperience),
    experience_level: input.experienceLevel === undefined
      ? undefined
      : assertInDomain('experienceLevel', 'mentorExperienceLevel', input.experienceLevel),
    prior_mentor: input.priorMentor === undefined ? undefined : toFlag(input.priorMentor),
    prior_mentee: input.priorMentee === undefined ? undefined : toFlag(input.priorMentee),
    prior_student: input.priorStudent === undefined ? undefined : toFlag(input.priorStudent),
    university: input.university === undefined ? undefined : encodeSet(input.university),
    hear_about: input.hearAbout === undefined
      ? undefined
      : encodeSet(assertAllInDomain('hearAbout', 'hearAbout', input.hearAbout)),
  };
}

function insertMentor(projectCycleId: string, input: CreateMentorInput): Mentor {
  const columns = toColumns(input);
  const row: MentorRow = {
    id: generateId(),
    project_cycle_id: projectCycleId,
    first_name: requireText('firstName', input.firstName),
    last_name: requireText('lastName', input.lastName),
    email: requireText('email', input.email),
    phone: columns.phone ?? null,
    company: requireText('company', input.company),
    job_title: requireText('jobTitle', input.jobTitle),
    country: requireText('country', input.country),
    us_state: columns.us_state ?? null,
    years_experience: assertInDomain('yearsExperience', 'mentorYearsExperience', input.yearsExperience),
    experience_level: assertInDomain('experienceLevel', 'mentorExperienceLevel', input.experienceLevel),
    prior_mentor: columns.prior_mentor ?? 0,
    prior_mentee: columns.prior_mentee ?? 0,
    prior_student: columns.prior_student ?? 0,
    university: columns.university ?? EMPTY_SET,
    hear_about: columns.hear_about ?? EMPTY_SET,
    created_at: now(),
    updated_at: null,
  };

  execute(
    `INSERT INTO mentors (
       id, project_cycle_id, first_name, last_name, email, phone, company, job_title, country, us_state,
       years_experience, experience_level, prior_mentor, prior_mentee, prior_student, university,
       hear_about, created_at, updated_at
     ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    [
      row.id, row.project_cycle_id, row.first_name, row.last_name, row.email, row.phone, row.company,
      row.job_title, row.country, row.us_state, row.years_experience, row.experience_level,
      row.prior_mentor, row.prior_mentee, row.prior_student, row.university, row.hear_about,
      row.created_at, row.updated_at,
    ]
  );

  return rowToMentor(row);
}

function loadMentorRow(id: string): MentorRow {
  const row = queryOne<MentorRow>('SELECT * FROM mentors WHERE id = ?', [id]);
  if (!row) {
    throw new NotFoundError('Mentor', id);
  }
  return row;
}

export function createMentor(projectCycleId: string, input: CreateMentorInput): Result<Mentor> {
  try {
    const mentor = transaction(() => {
      requireCycle(projectCycleId);
      return insertMentor(projectCycleId, input);
    });
    return ok(mentor);
  } catch (error) {
    return fail(error);
  }
}

export function batchCreateMentors(
  projectCycleId: string,
  inputs: readonly CreateMentorInput[]
): Result<CreatedRecord[]> {
  try {
    const created = transaction(() => {
      requireCycle(projectCycleId);
      return inputs.map(input => {
        const mentor = insertMentor(projectCycleId, input);
        return { email: mentor.email, id: mentor.id };
      });
    });
    return ok(created);
  } catch (error) {
    return fail(error);
  }
}

export function getMentor(id: string): Result<Mentor> {
  try {
    return ok(rowToMentor(loadMentorRow(id)));
  } catch (error) {
    return fail(error);
  }
}

export function getMentorByEmail(email: string): Result<Mentor> {
  try {
    const row = queryOne<MentorRow>('SELECT * FROM mentors WHERE email = ?', [email.trim()]);
    if (!row) {
      throw new NotFoundError('Mentor', email);
    }
    return ok(rowToMentor(row));
  } catch (error) {
    return fail(error);
  }
}

export function listMentorsByCycle(projectCycleId: string): Result<Mentor[]> {
  try {
    requireCycle(projectCycleId);
    const rows = queryAll<MentorRow>(
      'SELECT * FROM mentors WHERE project_cycle_id = ? ORDER BY last_name, first_name, id',
      [projectCycleId]
    );
    return ok(rows.map(rowToMentor));
  } catch (error) {
    return fail(error);
  }
}

export function updateMentor(id: string, patch: UpdateMentorInput): Result<Mentor> {
  try {
    const columns = toColumns(patch);
    const mentor = transaction(() => {
      const existing = loadMentorRow(id);
      writeChangedColumns('mentors', id, existing, columns);
      return rowToMentor(loadMentorRow(id));
    });
    return ok(mentor);
  } catch (error) {
    return fail(error);
  }
}

export function deleteMentor(id: string): Result<DeletionSummary> {
  try {
    const summary = transaction(() => {
      loadMentorRow(id);
      return deleteOwned('mentor', id);
    });
    return ok(summary);
  } catch (error) {
    return fail(error);
  }
}
