import { describe, it, expect, beforeEach } from 'vitest';
import {
  batchCreateClients,
  createClient,
  deleteClient,
  getClient,
  getClientsByOrgName,
  listClientsByCycle,
  updateClient,
} from './clients';
import { createVolunteer } from './volunteers';
import { link } from './relations';
import { clientInput, expectOk, makeCycle, resetDatabase, volunteerInput } from '../test-fixtures';

beforeEach(() => {
  resetDatabase();
});

describe('createClient', () => {
  it('stores impact causes and optional contact fields', () => {
    const cycle = makeCycle();
    const client = expectOk(createClient(cycle.id, clientInput({
      emailCc: 'board@nonprofit.example.org',
      orgWebsite: '  ',
      impactCauses: ['poverty_and_hunger', 'education'],
    })));

    expect(client.emailCc).toBe('board@nonprofit.example.org');
    expect(client.orgWebsite).toBeUndefined();
    expect(client.impactCauses).toEqual(['education', 'poverty_and_hunger']);
    expect(client.size).toBe('6-20');
  });

  it('rejects a size outside the value set', () => {
    const cycle = makeCycle();
    const result = createClient(cycle.id, clientInput({ size: '7' }));

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.code).toBe('DOMAIN_VIOLATION');
    }
  });
});

describe('four-field client uniqueness', () => {
  it('allows the same representative email on another project', () => {
    const cycle = makeCycle();
    expectOk(createClient(cycle.id, clientInput()));
    expectOk(createClient(cycle.id, clientInput({ projectName: 'Donor CRM' })));

    expect(expectOk(getClientsByOrgName('Food Bank'))).toHaveLength(2);
  });

  it('allows the same client in another cycle', () => {
    const first = makeCycle('First');
    const second = makeCycle('Second');
    expectOk(createClient(first.id, clientInput()));

    expect(createClient(second.id, clientInput()).success).toBe(true);
  });

  it('rejects the same email, cycle, org and project', () => {
    const cycle = makeCycle();
    expectOk(createClient(cycle.id, clientInput()));
    const result = createClient(cycle.id, clientInput({ representativeFirstName: 'Someone' }));

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.code).toBe('DUPLICATE_KEY');
      expect(result.details).toEqual({ constraint: 'nonprofit_clients.email_cycle_org_project' });
    }
  });
});

describe('batchCreateClients', () => {
  it('creates every row', () => {
    const cycle = makeCycle();
    const created = expectOk(batchCreateClients(cycle.id, [
      clientInput({ projectName: 'A' }),
      clientInput({ projectName: 'B' }),
    ]));

    expect(created).toHaveLength(2);
    expect(expectOk(listClientsByCycle(cycle.id)).map(client => client.projectName)).toEqual(['A', 'B']);
  });
});

describe('updateClient', () => {
  it('updates a field and stamps updatedAt', () => {
    const cycle = makeCycle();
    const client = expectOk(createClient(cycle.id, clientInput()));
    const updated = expectOk(updateClient(client.id, { size: '21-50' }));

    expect(updated.size).toBe('21-50');
    expect(updated.updatedAt).toBeInstanceOf(Date);
  });

  it('rejects a blank org name', () => {
    const cycle = makeCycle();
    const client = expectOk(createClient(cycle.id, clientInput()));
    const result = updateClient(client.id, { orgName: '' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBe('Nonprofit client orgName cannot be empty');
    }
  });
});

describe('deleteClient', () => {
  it('removes pairings and keeps the volunteer', () => {
    const cycle = makeCycle();
    const client = expectOk(createClient(cycle.id, clientInput()));
    const volunteer = expectOk(createVolunteer(cycle.id, volunteerInput()));
    expectOk(link('client_volunteer', { projectCycleId: cycle.id, volunteerId: volunteer.id, clientId: client.id }));

    expect(expectOk(deleteClient(client.id))).toEqual({ client_volunteers: 1, client_mentors: 0, nonprofit_clients: 1 });
    expect(getClient(client.id).success).toBe(false);
    expect(expectOk(listClientsByCycle(cycle.id))).toEqual([]);
  });
});
