import { db } from './db/client';
import { createCycle } from './repos/cycles';
import type {
  CreateClientInput,
  CreateMentorInput,
  CreateVolunteerInput,
  ProjectCycle,
  Result,
} from './domain/types';

const SEEDED_ROLES = [
  'product_lead',
  'product_manager',
  'engineering_manager',
  'design_manager',
  'engineer',
  'designer',
];

/** Clear every table, children first. Seeded team roles survive. */
export function resetDatabase(): void {
  db.exec(`
    DELETE FROM volunteers_exported_to_workspace;
    DELETE FROM volunteer_team_roles;
    DELETE FROM client_volunteers;
    DELETE FROM client_mentors;
    DELETE FROM volunteer_mentors;
    DELETE FROM jobs;
    DELETE FROM volunteers;
    DELETE FROM mentors;
    DELETE FROM nonprofit_clients;
    DELETE FROM project_cycles;
  `);
  db.prepare(`DELETE FROM team_roles WHERE name NOT IN (${SEEDED_ROLES.map(() => '?').join(', ')})`)
    .run(...SEEDED_ROLES);
}

/** Unwrap a successful result, failing the test with the error otherwise. */
export function expectOk<T>(result: Result<T>): T {
  if (!result.success) {
    throw new Error(`Expected success, got ${result.code}: ${result.error}`);
  }
  return result.data;
}

export function makeCycle(name = 'Spring 2024'): ProjectCycle {
  return expectOk(createCycle({ name }));
}

export function volunteerInput(overrides: Partial<CreateVolunteerInput> = {}): CreateVolunteerInput {
  return {
    firstName: 'Ada',
    lastName: 'Lovelace',
    email: 'ada@example.org',
    country: 'United States',
    ...overrides,
  };
}

export function mentorInput(overrides: Partial<CreateMentorInput> = {}): CreateMentorInput {
  return {
    firstName: 'Grace',
    lastName: 'Hopper',
    email: 'grace@example.org',
    company: 'Example Corp',
    jobTitle: 'Staff Engineer',
    country: 'United States',
    yearsExperience: '11-15',
    experienceLevel: 'senior_or_executive',
    ...overrides,
  };
}

export function clientInput(overrides: Partial<CreateClientInput> = {}): CreateClientInput {
  return {
    representativeFirstName: 'Alan',
    representativeLastName: 'Turing',
    email: 'alan@nonprofit.example.org',
    phone: '555-0100',
    orgName: 'Food Bank',
    projectName: 'Volunteer Portal',
    address: '1 Main St',
    size: '6-20',
    ...overrides,
  };
}
