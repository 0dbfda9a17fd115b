import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { fromResult, fromThrown, missingParams, optionalUuidSchema, toToolContent } from './registry';
import { getJob, listJobs } from '../repos/jobs';
import { listExportsForJob } from '../repos/exports';
import { VALUE_SETS } from '../domain/value-sets';
import { KNOWN_JOB_TYPES } from '../domain/types';

/**
 * Register the query_jobs MCP tool
 *
 * Operations:
 * - get: one job
 * - list: newest first, filtered by cycle, status or details.jobType
 * - exports: receipts the job wrote
 */
export function registerQueryJobsTool(server: McpServer): void {
  server.tool(
    'query_jobs',
    'Read background jobs. Operations: get, list (newest first), exports (receipts written by a job).',
    {
      operation: z.enum(['get', 'list', 'exports']),
      id: optionalUuidSchema,
      projectCycleId: optionalUuidSchema,
      status: z.string().optional().describe(`One of: ${VALUE_SETS.jobStatus.join(', ')}`),
      jobType: z.string().optional().describe(`Matches details.jobType, e.g. ${KNOWN_JOB_TYPES.join(', ')}`),
      limit: z.number().int().min(1).max(500).optional().default(50),
      offset: z.number().int().min(0).optional().default(0),
    },
    async (params) => {
      try {
        const { operation, id } = params;

        switch (operation) {
          case 'get':
            if (!id) return toToolContent(missingParams('get', ['id']));
            return toToolContent(fromResult(getJob(id), 'Job retrieved'));

          case 'list':
            return toToolContent(fromResult(
              listJobs({
                projectCycleId: params.projectCycleId,
                status: params.status,
                jobType: params.jobType,
                limit: params.limit,
                offset: params.offset,
              }),
              'Jobs retrieved',
              items => ({ items, count: items.length })
            ));

          case 'exports':
            if (!id) return toToolContent(missingParams('exports', ['id']));
            return toToolContent(fromResult(
              listExportsForJob(id),
              'Export receipts retrieved',
              items => ({ items, count: items.length })
            ));
        }
      } catch (error) {
        return toToolContent(fromThrown(error));
      }
    }
  );
}
