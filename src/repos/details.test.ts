import { describe, it, expect, beforeEach } from 'vitest';
import {
  getClientDetails,
  getExportedVolunteerDetails,
  getMentorDetails,
  getVolunteerDetails,
  listClientDetailsByCycle,
  listMentorDetailsByCycle,
  listVolunteerDetailsByCycle,
} from './details';
import { createVolunteer } from './volunteers';
import { createMentor } from './mentors';
import { createClient } from './clients';
import { getTeamRoleByName } from './team-roles';
import { link } from './relations';
import { createJob } from './jobs';
import { recordExport } from './exports';
import { db } from '../db/client';
import { clientInput, expectOk, makeCycle, mentorInput, resetDatabase, volunteerInput } from '../test-fixtures';

beforeEach(() => {
  resetDatabase();
});

describe('getVolunteerDetails', () => {
  it('returns the stored fields and empty collections when nothing is linked', () => {
    const cycle = makeCycle('Spring 2024');
    const volunteer = expectOk(createVolunteer(cycle.id, volunteerInput({
      gender: 'woman',
      ethnicity: ['asian'],
      university: ['State University'],
    })));

    const details = expectOk(getVolunteerDetails(volunteer.id));

    expect(details).toEqual({
      ...volunteer,
      projectCycleName: 'Spring 2024',
      workspaceEmail: null,
      clients: [],
      mentors: [],
      roles: [],
      exports: [],
    });
  });

  it('embeds three linked mentors exactly once each', () => {
    const cycle = makeCycle();
    const volunteer = expectOk(createVolunteer(cycle.id, volunteerInput()));
    const mentors = ['Cole', 'Abel', 'Bell'].map((lastName, index) =>
      expectOk(createMentor(cycle.id, mentorInput({ lastName, email: `mentor${index}@example.org` })))
    );
    for (const mentor of mentors) {
      expectOk(link('volunteer_mentor', { projectCycleId: cycle.id, mentorId: mentor.id, volunteerId: volunteer.id }));
    }

    const embedded = expectOk(getVolunteerDetails(volunteer.id)).mentors;

    expect(embedded).toHaveLength(3);
    expect(embedded.map(mentor => mentor.lastName)).toEqual(['Abel', 'Bell', 'Cole']);
    expect(new Set(embedded.map(mentor => mentor.mentorId)).size).toBe(3);
    expect(embedded[0]).toEqual({
      mentorId: mentors[1]?.id,
      firstName: 'Grace',
      lastName: 'Abel',
      email: 'mentor1@example.org',
      phone: undefined,
      company: 'Example Corp',
      jobTitle: 'Staff Engineer',
    });
  });

  it('embeds clients, roles and exports', () => {
    const cycle = makeCycle();
    const volunteer = expectOk(createVolunteer(cycle.id, volunteerInput()));
    const client = expectOk(createClient(cycle.id, clientInput()));
    const role = expectOk(getTeamRoleByName('engineer'));
    expectOk(link('client_volunteer', { projectCycleId: cycle.id, volunteerId: volunteer.id, clientId: client.id, currentlyActive: false }));
    expectOk(link('volunteer_team_role', { projectCycleId: cycle.id, volunteerId: volunteer.id, roleId: role.id }));
    const job = expectOk(createJob({ projectCycleId: cycle.id, label: 'Export' }));
    const receipt = expectOk(recordExport({
      volunteerId: volunteer.id,
      jobId: job.id,
      workspaceEmail: 'ada@workspace.example.org',
      orgUnit: '/Eng',
    }));

    const details = expectOk(getVolunteerDetails(volunteer.id));

    expect(details.clients).toEqual([
      { clientId: client.id, orgName: 'Food Bank', projectName: 'Volunteer Portal', currentlyActive: false },
    ]);
    expect(details.roles).toEqual([
      { roleId: role.id, name: 'engineer', description: 'Builds and ships the software' },
    ]);
    expect(details.exports).toEqual([
      { receiptId: receipt.id, jobId: job.id, jobStatus: 'pending', workspaceEmail: 'ada@workspace.example.org', orgUnit: '/Eng' },
    ]);
    expect(details.workspaceEmail).toBe('ada@workspace.example.org');
  });

  it('returns NOT_FOUND for an unknown volunteer', () => {
    const result = getVolunteerDetails('9'.repeat(32));
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.code).toBe('NOT_FOUND');
      expect(result.details).toEqual({ entity: 'Volunteer', id: '9'.repeat(32) });
    }
  });

  it('reports a join row pointing at a missing mentor as a consistency fault', () => {
    const cycle = makeCycle();
    const volunteer = expectOk(createVolunteer(cycle.id, volunteerInput()));
    const ghost = '7'.repeat(32);

    db.pragma('foreign_keys = OFF');
    try {
      db.prepare(
        'INSERT INTO volunteer_mentors (project_cycle_id, mentor_id, volunteer_id, created_at) VALUES (?, ?, ?, ?)'
      ).run(cycle.id, ghost, volunteer.id, '2024-01-01T00:00:00.000Z');
    } finally {
      db.pragma('foreign_keys = ON');
    }

    const result = getVolunteerDetails(volunteer.id);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.code).toBe('INTERNAL_CONSISTENCY_FAULT');
      expect(result.error).toBe(`mentors: volunteer_mentors.mentor_id references missing mentors row ${ghost}`);
      expect(result.details).toEqual({ collection: 'mentors', baseId: volunteer.id, relatedId: ghost });
    }
  });
});

describe('getMentorDetails', () => {
  it('embeds volunteers with a full name and clients', () => {
    const cycle = makeCycle('Fall 2024');
    const mentor = expectOk(createMentor(cycle.id, mentorInput()));
    const volunteer = expectOk(createVolunteer(cycle.id, volunteerInput()));
    const client = expectOk(createClient(cycle.id, clientInput()));
    expectOk(link('volunteer_mentor', { projectCycleId: cycle.id, mentorId: mentor.id, volunteerId: volunteer.id }));
    expectOk(link('client_mentor', { projectCycleId: cycle.id, mentorId: mentor.id, clientId: client.id }));

    const details = expectOk(getMentorDetails(mentor.id));

    expect(details.projectCycleName).toBe('Fall 2024');
    expect(details.volunteers).toEqual([
      { volunteerId: volunteer.id, email: 'ada@example.org', name: 'Ada Lovelace' },
    ]);
    expect(details.clients).toEqual([
      { clientId: client.id, orgName: 'Food Bank', projectName: 'Volunteer Portal' },
    ]);
  });
});

describe('getClientDetails', () => {
  it('embeds volunteer demographics and the pairing flag', () => {
    const cycle = makeCycle();
    const client = expectOk(createClient(cycle.id, clientInput()));
    const volunteer = expectOk(createVolunteer(cycle.id, volunteerInput({
      phone: '555-0101',
      gender: 'woman',
      ethnicity: ['latino_or_hispanic', 'asian'],
      ageRange: '25-29',
    })));
    expectOk(link('client_volunteer', { projectCycleId: cycle.id, volunteerId: volunteer.id, clientId: client.id }));

    const details = expectOk(getClientDetails(client.id));

    expect(details.volunteers).toEqual([{
      volunteerId: volunteer.id,
      firstName: 'Ada',
      lastName: 'Lovelace',
      email: 'ada@example.org',
      phone: '555-0101',
      gender: 'woman',
      ethnicity: ['asian', 'latino_or_hispanic'],
      ageRange: '25-29',
      currentlyActive: true,
    }]);
    expect(details.mentors).toEqual([]);
  });
});

describe('cycle-wide details', () => {
  it('keeps each record\'s collections separate', () => {
    const cycle = makeCycle();
    const first = expectOk(createVolunteer(cycle.id, volunteerInput({ email: 'a@example.org', lastName: 'Able' })));
    const second = expectOk(createVolunteer(cycle.id, volunteerInput({ email: 'b@example.org', lastName: 'Baker' })));
    const mentor = expectOk(createMentor(cycle.id, mentorInput()));
    expectOk(link('volunteer_mentor', { projectCycleId: cycle.id, mentorId: mentor.id, volunteerId: first.id }));

    const volunteers = expectOk(listVolunteerDetailsByCycle(cycle.id));

    expect(volunteers.map(v => [v.id, v.mentors.length])).toEqual([[first.id, 1], [second.id, 0]]);
    expect(expectOk(listMentorDetailsByCycle(cycle.id))[0]?.volunteers.map(v => v.volunteerId)).toEqual([first.id]);
    expect(expectOk(listClientDetailsByCycle(cycle.id))).toEqual([]);
  });

  it('returns NOT_FOUND for an unknown cycle', () => {
    expect(listVolunteerDetailsByCycle('3'.repeat(32)).success).toBe(false);
    expect(getExportedVolunteerDetails('3'.repeat(32)).success).toBe(false);
  });
});
