import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { fromResult, fromThrown, missingParams, optionalUuidSchema, toToolContent, type ToolResponse } from './registry';
import { getCycle, getCycleByName, getCycleStats, listCycles } from '../repos/cycles';
import { getVolunteer, getVolunteerByEmail, listVolunteersByCycle } from '../repos/volunteers';
import { getMentor, getMentorByEmail, listMentorsByCycle } from '../repos/mentors';
import { getClient, getClientsByOrgName, listClientsByCycle } from '../repos/clients';
import { getTeamRole, getTeamRoleByName, listTeamRoles } from '../repos/team-roles';
import {
  getClientDetails,
  getExportedVolunteerDetails,
  getMentorDetails,
  getVolunteerDetails,
  listClientDetailsByCycle,
  listMentorDetailsByCycle,
  listVolunteerDetailsByCycle,
} from '../repos/details';

const QUERY_ENTITIES = ['cycle', 'volunteer', 'mentor', 'client', 'team_role'] as const;
type QueryEntity = (typeof QUERY_ENTITIES)[number];

interface Lookup {
  id?: string;
  email?: string;
  name?: string;
  orgName?: string;
}

function get(entity: QueryEntity, lookup: Lookup): ToolResponse {
  const { id } = lookup;
  switch (entity) {
    case 'cycle':
      if (id) return fromResult(getCycle(id), 'Project cycle retrieved');
      if (lookup.name) return fromResult(getCycleByName(lookup.name), 'Project cycle retrieved');
      return missingParams('get', ['id or name']);
    case 'volunteer':
      if (id) return fromResult(getVolunteer(id), 'Volunteer retrieved');
      if (lookup.email) return fromResult(getVolunteerByEmail(lookup.email), 'Volunteer retrieved');
      return missingParams('get', ['id or email']);
    case 'mentor':
      if (id) return fromResult(getMentor(id), 'Mentor retrieved');
      if (lookup.email) return fromResult(getMentorByEmail(lookup.email), 'Mentor retrieved');
      return missingParams('get', ['id or email']);
    case 'client':
      if (id) return fromResult(getClient(id), 'Nonprofit client retrieved');
      if (lookup.orgName) return fromResult(getClientsByOrgName(lookup.orgName), 'Nonprofit clients retrieved');
      return missingParams('get', ['id or orgName']);
    case 'team_role':
      if (id) return fromResult(getTeamRole(id), 'Team role retrieved');
      if (lookup.name) return fromResult(getTeamRoleByName(lookup.name), 'Team role retrieved');
      return missingParams('get', ['id or name']);
  }
}

function list(entity: QueryEntity, projectCycleId: string | undefined, includeArchived: boolean): ToolResponse {
  const counted = <T>(items: T[]) => ({ items, count: items.length });
  if (entity === 'cycle') {
    return fromResult(listCycles({ includeArchived }), 'Project cycles retrieved', counted);
  }
  if (entity === 'team_role') {
    return fromResult(listTeamRoles(), 'Team roles retrieved', counted);
  }
  if (!projectCycleId) {
    return missingParams('list', ['projectCycleId']);
  }
  switch (entity) {
    case 'volunteer':
      return fromResult(listVolunteersByCycle(projectCycleId), 'Volunteers retrieved', counted);
    case 'mentor':
      return fromResult(listMentorsByCycle(projectCycleId), 'Mentors retrieved', counted);
    case 'client':
      return fromResult(listClientsByCycle(projectCycleId), 'Nonprofit clients retrieved', counted);
  }
}

function details(entity: QueryEntity, id: string | undefined, projectCycleId: string | undefined): ToolResponse {
  const counted = <T>(items: T[]) => ({ items, count: items.length });
  switch (entity) {
    case 'volunteer':
      if (id) return fromResult(getVolunteerDetails(id), 'Volunteer details retrieved');
      if (projectCycleId) return fromResult(listVolunteerDetailsByCycle(projectCycleId), 'Volunteer details retrieved', counted);
      break;
    case 'mentor':
      if (id) return fromResult(getMentorDetails(id), 'Mentor details retrieved');
      if (projectCycleId) return fromResult(listMentorDetailsByCycle(projectCycleId), 'Mentor details retrieved', counted);
      break;
    case 'client':
      if (id) return fromResult(getClientDetails(id), 'Nonprofit client details retrieved');
      if (projectCycleId) return fromResult(listClientDetailsByCycle(projectCycleId), 'Nonprofit client details retrieved', counted);
      break;
    default:
      return fromThrown(new Error(`details is not available for ${entity}`));
  }
  return missingParams('details', ['id or projectCycleId']);
}

/**
 * Register the query_records MCP tool
 *
 * Operations:
 * - get: one record by id, or by email / name / orgName
 * - list: records of a cycle (cycles and team roles list globally)
 * - details: nested views for volunteers, mentors and clients
 * - stats: record counts for a cycle
 * - exports: workspace export receipts for a cycle
 */
export function registerQueryRecordsTool(server: McpServer): void {
  server.tool(
    'query_records',
    'Read cohort records (cycle, volunteer, mentor, client, team_role). Operations: get, list, details, stats, exports.',
    {
      operation: z.enum(['get', 'list', 'details', 'stats', 'exports']),
      entity: z.enum(QUERY_ENTITIES).optional().default('cycle'),
      id: optionalUuidSchema,
      projectCycleId: optionalUuidSchema,
      email: z.string().optional(),
      name: z.string().optional(),
      orgName: z.string().optional(),
      includeArchived: z.boolean().optional().default(false),
    },
    async (params) => {
      try {
        const { operation, entity } = params;

        switch (operation) {
          case 'get':
            return toToolContent(get(entity, params));

          case 'list':
            return toToolContent(list(entity, params.projectCycleId, params.includeArchived));

          case 'details':
            return toToolContent(details(entity, params.id, params.projectCycleId));

          case 'stats': {
            const cycleId = params.projectCycleId ?? params.id;
            if (!cycleId) return toToolContent(missingParams('stats', ['projectCycleId']));
            return toToolContent(fromResult(getCycleStats(cycleId), 'Project cycle stats retrieved'));
          }

          case 'exports': {
            if (!params.projectCycleId) return toToolContent(missingParams('exports', ['projectCycleId']));
            return toToolContent(fromResult(
              getExportedVolunteerDetails(params.projectCycleId),
              'Exported volunteers retrieved',
              items => ({ items, count: items.length })
            ));
          }
        }
      } catch (error) {
        return toToolContent(fromThrown(error));
      }
    }
  );
}
