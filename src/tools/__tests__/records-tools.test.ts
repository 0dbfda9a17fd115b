/**
 * Tool-level tests for manage_records and query_records.
 *
 * Fixtures go in through the repos; assertions read the JSON the tools return.
 */
import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import { z } from 'zod';
import { connectTools, dataOf, idSchema, type ToolHarness } from './harness';
import { archiveCycle } from '../../repos/cycles';
import { createVolunteer, getVolunteer } from '../../repos/volunteers';
import { createClient } from '../../repos/clients';
import { clientInput, expectOk, makeCycle, resetDatabase, volunteerInput } from '../../test-fixtures';

let tools: ToolHarness;

const countedSchema = z.object({ items: z.array(z.unknown()), count: z.number() });
const namedItemsSchema = z.object({ items: z.array(z.object({ id: z.string(), name: z.string() })), count: z.number() });

function dashed(id: string): string {
  return [id.slice(0, 8), id.slice(8, 12), id.slice(12, 16), id.slice(16, 20), id.slice(20)].join('-').toUpperCase();
}

beforeAll(async () => {
  tools = await connectTools();
});

afterAll(async () => {
  await tools.close();
});

beforeEach(() => {
  resetDatabase();
});

describe('manage_records', () => {
  it('creates a cycle', async () => {
    const response = await tools.call('manage_records', {
      operation: 'create',
      entity: 'cycle',
      fields: { name: 'Spring 2025', description: 'First cohort' },
    });

    expect(response.message).toBe('Project cycle created');
    expect(dataOf(response, z.object({ name: z.string(), description: z.string(), archived: z.boolean() }))).toEqual({
      name: 'Spring 2025',
      description: 'First cohort',
      archived: false,
    });
  });

  it('requires a cycle for volunteers', async () => {
    const response = await tools.call('manage_records', {
      operation: 'create',
      entity: 'volunteer',
      fields: volunteerInput(),
    });

    expect(response.success).toBe(false);
    expect(response.code).toBe('VALIDATION_ERROR');
    expect(response.error).toBe('Missing required parameters for create: projectCycleId');
  });

  it('reports a value outside its set as a domain violation naming field and value', async () => {
    const cycle = makeCycle();
    const response = await tools.call('manage_records', {
      operation: 'create',
      entity: 'volunteer',
      projectCycleId: cycle.id,
      fields: { ...volunteerInput(), ethnicity: ['asian', 'martian'] },
    });

    expect(response.success).toBe(false);
    expect(response.code).toBe('DOMAIN_VIOLATION');
    expect(response.error).toBe('Invalid value for ethnicity: "martian" is not a valid ethnicity');
    expect(response.details).toEqual({ field: 'ethnicity', domain: 'ethnicity', value: 'martian' });
  });

  it('reports a bad single-valued field on update the same way', async () => {
    const cycle = makeCycle();
    const volunteer = expectOk(createVolunteer(cycle.id, volunteerInput()));

    const response = await tools.call('manage_records', {
      operation: 'update',
      entity: 'volunteer',
      id: volunteer.id,
      fields: { studentStage: 'postdoc' },
    });

    expect(response.code).toBe('DOMAIN_VIOLATION');
    expect(response.details).toEqual({ field: 'studentStage', domain: 'studentStage', value: 'postdoc' });
    expect(expectOk(getVolunteer(volunteer.id)).studentStage).toBe('recent_graduate');
  });

  it('creates a volunteer and reports a duplicate email', async () => {
    const cycle = makeCycle();
    const args = { operation: 'create', entity: 'volunteer', projectCycleId: cycle.id, fields: volunteerInput() };

    const created = dataOf(await tools.call('manage_records', args), idSchema);
    const duplicate = await tools.call('manage_records', args);

    expect(expectOk(getVolunteer(created.id)).email).toBe('ada@example.org');
    expect(duplicate.success).toBe(false);
    expect(duplicate.code).toBe('DUPLICATE_KEY');
    expect(duplicate.details).toEqual({ constraint: 'volunteers.email' });
  });

  it('batch-creates volunteers and returns their ids by email', async () => {
    const cycle = makeCycle();
    const response = await tools.call('manage_records', {
      operation: 'batchCreate',
      entity: 'volunteer',
      projectCycleId: cycle.id,
      records: [volunteerInput({ email: 'one@example.org' }), volunteerInput({ email: 'two@example.org' })],
    });

    const data = dataOf(response, z.object({
      created: z.array(z.object({ email: z.string(), id: z.string() })),
      count: z.number(),
    }));
    expect(data.count).toBe(2);
    expect(data.created.map(record => record.email)).toEqual(['one@example.org', 'two@example.org']);
  });

  it('does not batch-create team roles', async () => {
    const cycle = makeCycle();
    const response = await tools.call('manage_records', {
      operation: 'batchCreate',
      entity: 'team_role',
      projectCycleId: cycle.id,
      records: [{ name: 'researcher' }],
    });

    expect(response.code).toBe('INTERNAL_ERROR');
    expect(response.error).toBe('batchCreate is not supported for team_role');
  });

  it('updates a volunteer by a dashed, uppercase id', async () => {
    const cycle = makeCycle();
    const volunteer = expectOk(createVolunteer(cycle.id, volunteerInput()));

    const response = await tools.call('manage_records', {
      operation: 'update',
      entity: 'volunteer',
      id: dashed(volunteer.id),
      fields: { studentStage: 'junior' },
    });

    expect(response.message).toBe('Volunteer updated');
    expect(expectOk(getVolunteer(volunteer.id)).studentStage).toBe('junior');
  });

  it('refuses to update team roles', async () => {
    const response = await tools.call('manage_records', {
      operation: 'update',
      entity: 'team_role',
      id: '1'.repeat(32),
      fields: { name: 'renamed' },
    });

    expect(response.error).toBe('Team roles cannot be updated; delete and recreate instead');
  });

  it('deletes a volunteer and reports rows removed per table', async () => {
    const cycle = makeCycle();
    const volunteer = expectOk(createVolunteer(cycle.id, volunteerInput()));

    const response = await tools.call('manage_records', { operation: 'delete', entity: 'volunteer', id: volunteer.id });

    expect(response.data).toEqual({
      id: volunteer.id,
      deleted: {
        volunteer_team_roles: 0,
        client_volunteers: 0,
        volunteer_mentors: 0,
        volunteers_exported_to_workspace: 0,
        volunteers: 1,
      },
    });
    expect(getVolunteer(volunteer.id).success).toBe(false);
  });

  it('archives cycles only', async () => {
    const cycle = makeCycle();

    const wrongEntity = await tools.call('manage_records', { operation: 'archive', entity: 'volunteer', id: cycle.id });
    const archived = await tools.call('manage_records', { operation: 'archive', entity: 'cycle', id: cycle.id });

    expect(wrongEntity.error).toBe('Missing required parameters for archive: entity=cycle, id');
    expect(dataOf(archived, z.object({ archived: z.boolean() })).archived).toBe(true);
  });
});

describe('query_records', () => {
  it('defaults to cycles and finds one by name', async () => {
    const cycle = makeCycle('Autumn 2025');

    const response = await tools.call('query_records', { operation: 'get', name: 'Autumn 2025' });

    expect(dataOf(response, idSchema).id).toBe(cycle.id);
  });

  it('reports a missing record as NOT_FOUND', async () => {
    const response = await tools.call('query_records', { operation: 'get', entity: 'volunteer', email: 'nobody@example.org' });

    expect(response.code).toBe('NOT_FOUND');
    expect(response.details).toEqual({ entity: 'Volunteer', id: 'nobody@example.org' });
  });

  it('finds every client of an organization', async () => {
    const cycle = makeCycle();
    expectOk(createClient(cycle.id, clientInput({ projectName: 'Portal' })));
    expectOk(createClient(cycle.id, clientInput({ projectName: 'CRM' })));

    const response = await tools.call('query_records', { operation: 'get', entity: 'client', orgName: 'Food Bank' });

    expect(dataOf(response, z.array(z.object({ projectName: z.string() }))).map(c => c.projectName).sort()).toEqual(['CRM', 'Portal']);
  });

  it('hides archived cycles unless asked', async () => {
    const active = makeCycle('Active');
    const old = makeCycle('Old');
    expectOk(archiveCycle(old.id));

    const visible = dataOf(await tools.call('query_records', { operation: 'list' }), namedItemsSchema);
    const all = dataOf(await tools.call('query_records', { operation: 'list', includeArchived: true }), namedItemsSchema);

    expect(visible.items.map(item => item.id)).toEqual([active.id]);
    expect(all.count).toBe(2);
  });

  it('lists the seeded team roles', async () => {
    const response = await tools.call('query_records', { operation: 'list', entity: 'team_role' });

    expect(dataOf(response, countedSchema).count).toBe(6);
  });

  it('needs a cycle to list volunteers', async () => {
    const response = await tools.call('query_records', { operation: 'list', entity: 'volunteer' });

    expect(response.error).toBe('Missing required parameters for list: projectCycleId');
  });

  it('returns volunteer details with the cycle name', async () => {
    const cycle = makeCycle('Winter 2025');
    const volunteer = expectOk(createVolunteer(cycle.id, volunteerInput()));

    const response = await tools.call('query_records', { operation: 'details', entity: 'volunteer', id: volunteer.id });

    expect(response.data).toMatchObject({
      id: volunteer.id,
      projectCycleName: 'Winter 2025',
      workspaceEmail: null,
      clients: [],
      mentors: [],
      roles: [],
      exports: [],
    });
  });

  it('has no details view for team roles', async () => {
    const response = await tools.call('query_records', { operation: 'details', entity: 'team_role', id: '1'.repeat(32) });

    expect(response.error).toBe('details is not available for team_role');
  });

  it('counts a cycle\'s records', async () => {
    const cycle = makeCycle();
    expectOk(createVolunteer(cycle.id, volunteerInput()));

    const response = await tools.call('query_records', { operation: 'stats', projectCycleId: cycle.id });

    expect(response.data).toEqual({ projectCycleId: cycle.id, volunteers: 1, mentors: 0, nonprofits: 0 });
  });

  it('lists exported volunteers of a cycle', async () => {
    const cycle = makeCycle();

    const response = await tools.call('query_records', { operation: 'exports', projectCycleId: cycle.id });

    expect(response.data).toEqual({ items: [], count: 0 });
  });
});
