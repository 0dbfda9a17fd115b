import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { fromResult, fromThrown, missingParams, toToolContent, uuidSchema, optionalUuidSchema, type ToolResponse } from './registry';
import {
  batchLink,
  hasRelation,
  link,
  RELATION_KINDS,
  setClientVolunteerActive,
  unlink,
  type RelationKeys,
} from '../repos/relations';

const pairSchema = z.object({
  volunteerId: optionalUuidSchema,
  mentorId: optionalUuidSchema,
  clientId: optionalUuidSchema,
  roleId: optionalUuidSchema,
  currentlyActive: z.boolean().optional(),
});

type Pair = z.infer<typeof pairSchema>;

type LinkOperation = 'link' | 'unlink' | 'check';

/** Run one relation operation against typed keys. */
function apply<K extends keyof RelationKeys>(operation: LinkOperation, kind: K, keys: RelationKeys[K]): ToolResponse {
  switch (operation) {
    case 'link':
      return fromResult(link(kind, keys), 'Relation created', () => ({ kind, ...keys }));
    case 'unlink':
      return fromResult(unlink(kind, keys), 'Relation removal processed', removed => ({ kind, removed }));
    case 'check':
      return fromResult(hasRelation(kind, keys), 'Relation checked', exists => ({ kind, exists }));
  }
}

function single(operation: LinkOperation, kind: keyof RelationKeys, projectCycleId: string, pair: Pair): ToolResponse {
  const { volunteerId, mentorId, clientId, roleId } = pair;
  switch (kind) {
    case 'volunteer_team_role':
      if (!volunteerId || !roleId) return missingParams(operation, ['volunteerId', 'roleId']);
      return apply(operation, kind, { projectCycleId, volunteerId, roleId });
    case 'client_volunteer':
      if (!volunteerId || !clientId) return missingParams(operation, ['volunteerId', 'clientId']);
      return apply(operation, kind, { projectCycleId, volunteerId, clientId, currentlyActive: pair.currentlyActive });
    case 'client_mentor':
      if (!mentorId || !clientId) return missingParams(operation, ['mentorId', 'clientId']);
      return apply(operation, kind, { projectCycleId, mentorId, clientId });
    case 'volunteer_mentor':
      if (!mentorId || !volunteerId) return missingParams(operation, ['mentorId', 'volunteerId']);
      return apply(operation, kind, { projectCycleId, mentorId, volunteerId });
  }
}

function batch(kind: keyof RelationKeys, projectCycleId: string, pairs: Pair[]): ToolResponse {
  const linked = (count: number) => ({ kind, linked: count });
  switch (kind) {
    case 'volunteer_team_role': {
      const keys: RelationKeys['volunteer_team_role'][] = [];
      for (const pair of pairs) {
        if (!pair.volunteerId || !pair.roleId) return missingParams('batchLink', ['volunteerId', 'roleId']);
        keys.push({ projectCycleId, volunteerId: pair.volunteerId, roleId: pair.roleId });
      }
      return fromResult(batchLink(kind, keys), 'Relations created', linked);
    }
    case 'client_volunteer': {
      const keys: RelationKeys['client_volunteer'][] = [];
      for (const pair of pairs) {
        if (!pair.volunteerId || !pair.clientId) return missingParams('batchLink', ['volunteerId', 'clientId']);
        keys.push({ projectCycleId, volunteerId: pair.volunteerId, clientId: pair.clientId, currentlyActive: pair.currentlyActive });
      }
      return fromResult(batchLink(kind, keys), 'Relations created', linked);
    }
    case 'client_mentor': {
      const keys: RelationKeys['client_mentor'][] = [];
      for (const pair of pairs) {
        if (!pair.mentorId || !pair.clientId) return missingParams('batchLink', ['mentorId', 'clientId']);
        keys.push({ projectCycleId, mentorId: pair.mentorId, clientId: pair.clientId });
      }
      return fromResult(batchLink(kind, keys), 'Relations created', linked);
    }
    case 'volunteer_mentor': {
      const keys: RelationKeys['volunteer_mentor'][] = [];
      for (const pair of pairs) {
        if (!pair.mentorId || !pair.volunteerId) return missingParams('batchLink', ['mentorId', 'volunteerId']);
        keys.push({ projectCycleId, mentorId: pair.mentorId, volunteerId: pair.volunteerId });
      }
      return fromResult(batchLink(kind, keys), 'Relations created', linked);
    }
  }
}

/**
 * Register the manage_relation MCP tool
 *
 * Pairs volunteers, mentors, clients and team roles inside one cycle.
 */
export function registerManageRelationTool(server: McpServer): void {
  server.tool(
    'manage_relation',
    `Manage cycle relations. Kinds: ${RELATION_KINDS.join(', ')}. Operations: link, unlink, check, batchLink (all or nothing), setActive (client_volunteer only).`,
    {
      operation: z.enum(['link', 'unlink', 'check', 'batchLink', 'setActive']),
      kind: z.enum(RELATION_KINDS),
      projectCycleId: uuidSchema.describe('Cycle both endpoints belong to'),
      volunteerId: optionalUuidSchema,
      mentorId: optionalUuidSchema,
      clientId: optionalUuidSchema,
      roleId: optionalUuidSchema,
      currentlyActive: z.boolean().optional().describe('client_volunteer only. Defaults to true on link'),
      pairs: z.array(pairSchema).optional().describe('Endpoint pairs for batchLink'),
    },
    async (params) => {
      try {
        const { operation, kind, projectCycleId } = params;

        switch (operation) {
          case 'link':
          case 'unlink':
          case 'check':
            return toToolContent(single(operation, kind, projectCycleId, params));

          case 'batchLink':
            if (!params.pairs) return toToolContent(missingParams('batchLink', ['pairs']));
            return toToolContent(batch(kind, projectCycleId, params.pairs));

          case 'setActive': {
            if (kind !== 'client_volunteer') {
              return toToolContent(missingParams('setActive', ['kind=client_volunteer']));
            }
            const { volunteerId, clientId, currentlyActive } = params;
            if (!volunteerId || !clientId || currentlyActive === undefined) {
              return toToolContent(missingParams('setActive', ['volunteerId', 'clientId', 'currentlyActive']));
            }
            return toToolContent(fromResult(
              setClientVolunteerActive({ projectCycleId, volunteerId, clientId }, currentlyActive),
              'Relation updated'
            ));
          }
        }
      } catch (error) {
        return toToolContent(fromThrown(error));
      }
    }
  );
}
