import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import {
  createSuccessResponse,
  fromResult,
  fromThrown,
  missingParams,
  optionalUuidSchema,
  toToolContent,
  type ToolResponse,
} from './registry';
import {
  clientFieldsSchema,
  cycleFieldsSchema,
  mentorFieldsSchema,
  teamRoleFieldsSchema,
  volunteerFieldsSchema,
} from './record-schemas';
import { archiveCycle, createCycle, deleteCycle, updateCycle } from '../repos/cycles';
import {
  batchCreateVolunteers,
  createVolunteer,
  deleteVolunteer,
  updateVolunteer,
} from '../repos/volunteers';
import { batchCreateMentors, createMentor, deleteMentor, updateMentor } from '../repos/mentors';
import { batchCreateClients, createClient, deleteClient, updateClient } from '../repos/clients';
import { createTeamRole, deleteTeamRole } from '../repos/team-roles';

export const RECORD_ENTITIES = ['cycle', 'volunteer', 'mentor', 'client', 'team_role'] as const;
export type RecordEntity = (typeof RECORD_ENTITIES)[number];

type Fields = Record<string, unknown>;

function create(entity: RecordEntity, fields: Fields, projectCycleId: string | undefined): ToolResponse {
  if (entity === 'cycle') {
    return fromResult(createCycle(cycleFieldsSchema.parse(fields)), 'Project cycle created');
  }
  if (entity === 'team_role') {
    const role = teamRoleFieldsSchema.parse(fields);
    return fromResult(createTeamRole(role.name, role.description), 'Team role created');
  }
  if (!projectCycleId) {
    return missingParams('create', ['projectCycleId']);
  }
  switch (entity) {
    case 'volunteer':
      return fromResult(createVolunteer(projectCycleId, volunteerFieldsSchema.parse(fields)), 'Volunteer created');
    case 'mentor':
      return fromResult(createMentor(projectCycleId, mentorFieldsSchema.parse(fields)), 'Mentor created');
    case 'client':
      return fromResult(createClient(projectCycleId, clientFieldsSchema.parse(fields)), 'Nonprofit client created');
  }
}

function batchCreate(entity: RecordEntity, records: Fields[], projectCycleId: string | undefined): ToolResponse {
  if (!projectCycleId) {
    return missingParams('batchCreate', ['projectCycleId']);
  }
  const summarize = (created: unknown[]) => ({ created, count: created.length });
  switch (entity) {
    case 'volunteer':
      return fromResult(
        batchCreateVolunteers(projectCycleId, records.map(record => volunteerFieldsSchema.parse(record))),
        'Volunteers created',
        summarize
      );
    case 'mentor':
      return fromResult(
        batchCreateMentors(projectCycleId, records.map(record => mentorFieldsSchema.parse(record))),
        'Mentors created',
        summarize
      );
    case 'client':
      return fromResult(
        batchCreateClients(projectCycleId, records.map(record => clientFieldsSchema.parse(record))),
        'Nonprofit clients created',
        summarize
      );
    default:
      return fromThrown(new Error(`batchCreate is not supported for ${entity}`));
  }
}

function update(entity: RecordEntity, id: string, fields: Fields): ToolResponse {
  switch (entity) {
    case 'cycle':
      return fromResult(updateCycle(id, cycleFieldsSchema.partial().parse(fields)), 'Project cycle updated');
    case 'volunteer':
      return fromResult(updateVolunteer(id, volunteerFieldsSchema.partial().parse(fields)), 'Volunteer updated');
    case 'mentor':
      return fromResult(updateMentor(id, mentorFieldsSchema.partial().parse(fields)), 'Mentor updated');
    case 'client':
      return fromResult(updateClient(id, clientFieldsSchema.partial().parse(fields)), 'Nonprofit client updated');
    case 'team_role':
      return fromThrown(new Error('Team roles cannot be updated; delete and recreate instead'));
  }
}

function remove(entity: RecordEntity, id: string): ToolResponse {
  const shape = (deleted: Record<string, number>) => ({ id, deleted });
  switch (entity) {
    case 'cycle':
      return fromResult(deleteCycle(id), 'Project cycle deleted', shape);
    case 'volunteer':
      return fromResult(deleteVolunteer(id), 'Volunteer deleted', shape);
    case 'mentor':
      return fromResult(deleteMentor(id), 'Mentor deleted', shape);
    case 'client':
      return fromResult(deleteClient(id), 'Nonprofit client deleted', shape);
    case 'team_role':
      return fromResult(deleteTeamRole(id), 'Team role deleted', shape);
  }
}

/**
 * Register the manage_records MCP tool
 *
 * Create, update, delete and batch-create cycle records. Deletes cascade.
 */
export function registerManageRecordsTool(server: McpServer): void {
  server.tool(
    'manage_records',
    'Manage cohort records. Operations: create, update, delete, batchCreate (volunteer, mentor, client; all or nothing), archive (cycle). Deleting a cycle, volunteer, mentor or client removes every row that references it.',
    {
      operation: z.enum(['create', 'update', 'delete', 'batchCreate', 'archive']).describe('The operation to perform'),
      entity: z.enum(RECORD_ENTITIES).describe('Record kind'),
      id: optionalUuidSchema.describe('Required for: update, delete, archive'),
      projectCycleId: optionalUuidSchema.describe('Owning cycle. Required to create or batchCreate volunteers, mentors and clients'),
      fields: z.record(z.unknown()).optional().describe('Record fields (camelCase) for create/update'),
      records: z.array(z.record(z.unknown())).optional().describe('Records for batchCreate'),
    },
    async (params) => {
      try {
        switch (params.operation) {
          case 'create':
            if (!params.fields) return toToolContent(missingParams('create', ['fields']));
            return toToolContent(create(params.entity, params.fields, params.projectCycleId));

          case 'batchCreate':
            if (!params.records) return toToolContent(missingParams('batchCreate', ['records']));
            return toToolContent(batchCreate(params.entity, params.records, params.projectCycleId));

          case 'update':
            if (!params.id || !params.fields) return toToolContent(missingParams('update', ['id', 'fields']));
            return toToolContent(update(params.entity, params.id, params.fields));

          case 'delete':
            if (!params.id) return toToolContent(missingParams('delete', ['id']));
            return toToolContent(remove(params.entity, params.id));

          case 'archive':
            if (params.entity !== 'cycle' || !params.id) {
              return toToolContent(missingParams('archive', ['entity=cycle', 'id']));
            }
            return toToolContent(fromResult(archiveCycle(params.id), 'Project cycle archived'));

          default:
            return toToolContent(createSuccessResponse('No operation performed'));
        }
      } catch (error) {
        return toToolContent(fromThrown(error));
      }
    }
  );
}
