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
  CreateClientInput,
  CreatedRecord,
  DeletionSummary,
  NonprofitClient,
  Result,
  UpdateClientInput,
} from '../domain/types';
import { NotFoundError, ValidationError } from '../domain/types';
import { assertAllInDomain, assertInDomain } from '../domain/value-sets';

export type ClientRow = {
  id: string;
  project_cycle_id: string;
  representative_first_name: string;
  representative_last_name: string;
  representative_job_title: string | null;
  email: string;
  email_cc: string | null;
  phone: string;
  org_name: string;
  project_name: string;
  org_website: string | null;
  country_hq: string | null;
  us_state_hq: string | null;
  address: string;
  size: string;
  impact_causes: string;
  created_at: string;
  updated_at: string | null;
};

type ClientColumns = Partial<Omit<ClientRow, 'id' | 'project_cycle_id' | 'created_at' | 'updated_at'>>;

export function rowToClient(row: ClientRow): NonprofitClient {
  return {
    id: row.id,
    projectCycleId: row.project_cycle_id,
    representativeFirstName: row.representative_first_name,
    representativeLastName: row.representative_last_name,
    representativeJobTitle: row.representative_job_title ?? undefined,
    email: row.email,
    emailCc: row.email_cc ?? undefined,
    phone: row.phone,
    orgName: row.org_name,
    projectName: row.project_name,
    orgWebsite: row.org_website ?? undefined,
    countryHq: row.country_hq ?? undefined,
    usStateHq: row.us_state_hq ?? undefined,
    address: row.address,
    size: readEnum('size', 'clientSize', row.size),
    impactCauses: decodeEnumSet(row.impact_causes, 'impact_causes', 'impactCause'),
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
    throw new ValidationError(`Nonprofit client ${field} cannot be empty`);
  }
  return trimmed;
}

function toColumns(input: UpdateClientInput): ClientColumns {
  return {
    representative_first_name: requireText('representativeFirstName', input.representativeFirstName),
    representative_last_name: requireText('representativeLastName', input.representativeLastName),
    representative_job_title: toNullableText(input.representativeJobTitle),
    email: requireText('email', input.email),
    email_cc: toNullableText(input.emailCc),
    phone: requireText('phone', input.phone),
    org_name: requireText('orgName', input.orgName),
    project_name: requireText('projectName', input.projectName),
    org_website: toNullableText(input.orgWebsite),
    country_hq: toNullableText(input.countryHq),
    us_state_hq: toNullableText(input.usStateHq),
    address: requireText('address', input.address),
    size: input.size === undefined ? undefined : assertInDomain('size', 'clientSize', input.size),
    impact_causes: input.impactCauses === undefined
      ? undefined
      : encodeSet(assertAllInDomain('impactCauses', 'impactCause', input.impactCauses)),
  };
}

function insertClient(projectCycleId: string, input: CreateClientInput): NonprofitClient {
  const columns = toColumns(input);
  const row: ClientRow = {
    id: generateId(),
    project_cycle_id: projectCycleId,
    representative_first_name: requireText('representativeFirstName', input.representativeFirstName),
    representative_last_name: requireText('representativeLastName', input.representativeLastName),
    representative_job_title: columns.representative_job_title ?? null,
    email: requireText('email', input.email),
    email_cc: columns.email_cc ?? null,
    phone: requireText('phone', input.phone),
    org_name: requireText('orgName', input.orgName),
    project_name: requireText('projectName', input.projectName),
    org_website: columns.org_website ?? null,
    country_hq: columns.country_hq ?? null,
    us_state_hq: columns.us_state_hq ?? null,
    address: requireText('address', input.address),
    size: assertInDomain('size', 'clientSize', input.size),
    impact_causes: columns.impact_causes ?? encodeSet([]),
    created_at: now(),
    updated_at: null,
  };

  execute(
    `INSERT INTO nonprofit_clients (
       id, project_cycle_id, representative_first_name, representative_last_name,
       representative_job_title, email, email_cc, phone, org_name, project_name, org_website,
       country_hq, us_state_hq, address, size, impact_causes, created_at, updated_at
     ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    [
      row.id, row.project_cycle_id, row.representative_first_name, row.representative_last_name,
      row.representative_job_title, row.email, row.email_cc, row.phone, row.org_name, row.project_name,
      row.org_website, row.country_hq, row.us_state_hq, row.address, row.size, row.impact_causes,
      row.created_at, row.updated_at,
    ]
  );

  return rowToClient(row);
}

function loadClientRow(id: string): ClientRow {
  const row = queryOne<ClientRow>('SELECT * FROM nonprofit_clients WHERE id = ?', [id]);
  if (!row) {
    throw new NotFoundError('NonprofitClient', id);
  }
  return row;
}

export function createClient(projectCycleId: string, input: CreateClientInput): Result<NonprofitClient> {
  try {
    const client = transaction(() => {
      requireCycle(projectCycleId);
      return insertClient(projectCycleId, input);
    });
    return ok(client);
  } catch (error) {
    return fail(error);
  }
}

export function batchCreateClients(
  projectCycleId: string,
  inputs: readonly CreateClientInput[]
): Result<CreatedRecord[]> {
  try {
    const created = transaction(() => {
      requireCycle(projectCycleId);
      return inputs.map(input => {
        const client = insertClient(projectCycleId, input);
        return { email: client.email, id: client.id };
      });
    });
    return ok(created);
  } catch (error) {
    return fail(error);
  }
}

export function getClient(id: string): Result<NonprofitClient> {
  try {
    return ok(rowToClient(loadClientRow(id)));
  } catch (error) {
    return fail(error);
  }
}

/** Every cycle's records for an organization, oldest first. */
export function getClientsByOrgName(orgName: string): Result<NonprofitClient[]> {
  try {
    const rows = queryAll<ClientRow>(
      'SELECT * FROM nonprofit_clients WHERE org_name = ? ORDER BY created_at, id',
      [orgName.trim()]
    );
    return ok(rows.map(rowToClient));
  } catch (error) {
    return fail(error);
  }
}

export function listClientsByCycle(projectCycleId: string): Result<NonprofitClient[]> {
  try {
    requireCycle(projectCycleId);
    const rows = queryAll<ClientRow>(
      'SELECT * FROM nonprofit_clients WHERE project_cycle_id = ? ORDER BY org_name, project_name, id',
      [projectCycleId]
    );
    return ok(rows.map(rowToClient));
  } catch (error) {
    return fail(error);
  }
}

export function updateClient(id: string, patch: UpdateClientInput): Result<NonprofitClient> {
  try {
    const columns = toColumns(patch);
    const client = transaction(() => {
      const existing = loadClientRow(id);
      writeChangedColumns('nonprofit_clients', id, existing, columns);
      return rowToClient(loadClientRow(id));
    });
    return ok(client);
  } catch (error) {
    return fail(error);
  }
}

export function deleteClient(id: string): Result<DeletionSummary> {
  try {
    const summary = transaction(() => {
      loadClientRow(id);
      return deleteOwned('client', id);
    });
    return ok(summary);
  } catch (error) {
    return fail(error);
  }
}
