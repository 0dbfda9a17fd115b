import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { fromResult, fromThrown, missingParams, optionalUuidSchema, toToolContent } from './registry';
import { cancelJob, createJob, deleteJob, editJob, jobDetailsSchema, setJobCycle, setJobStatus } from '../repos/jobs';
import { VALUE_SETS } from '../domain/value-sets';
import { KNOWN_JOB_TYPES } from '../domain/types';

/**
 * Register the manage_job MCP tool
 *
 * Jobs start pending. With jobs.strictTransitions on (the default) a
 * complete, cancelled or error job cannot move again.
 */
export function registerManageJobTool(server: McpServer): void {
  server.tool(
    'manage_job',
    'Manage background jobs. Operations: create, setStatus, cancel, edit, setCycle, delete. setStatus with a non-empty errorMessage (whitespace is kept as given) records details.error; without one, details.error is cleared.',
    {
      operation: z.enum(['create', 'setStatus', 'cancel', 'edit', 'setCycle', 'delete']),
      id: optionalUuidSchema.describe('Job ID. Required for everything except create'),
      projectCycleId: optionalUuidSchema.describe('Owning cycle for create or setCycle. Omit on setCycle to detach'),
      label: z.string().optional(),
      description: z.string().nullable().optional(),
      jobType: z.string().optional().describe(`Stored as details.jobType. Workers write: ${KNOWN_JOB_TYPES.join(', ')}`),
      details: jobDetailsSchema.optional().describe('Flat object of string/number/boolean/null values'),
      status: z.string().optional().describe(`One of: ${VALUE_SETS.jobStatus.join(', ')}`),
      errorMessage: z.string().optional(),
    },
    async (params) => {
      try {
        const { operation, id } = params;

        if (operation === 'create') {
          if (!params.label) return toToolContent(missingParams('create', ['label']));
          const details = params.jobType ? { ...params.details, jobType: params.jobType } : params.details;
          return toToolContent(fromResult(
            createJob({
              projectCycleId: params.projectCycleId,
              label: params.label,
              description: params.description,
              details,
            }),
            'Job created'
          ));
        }

        if (!id) {
          return toToolContent(missingParams(operation, ['id']));
        }

        switch (operation) {
          case 'setStatus':
            if (!params.status) return toToolContent(missingParams('setStatus', ['status']));
            return toToolContent(fromResult(setJobStatus(id, params.status, params.errorMessage), 'Job status updated'));

          case 'cancel':
            return toToolContent(fromResult(cancelJob(id), 'Job cancelled'));

          case 'edit':
            return toToolContent(fromResult(
              editJob(id, { label: params.label, description: params.description }),
              'Job updated'
            ));

          case 'setCycle':
            return toToolContent(fromResult(setJobCycle(id, params.projectCycleId ?? null), 'Job cycle updated'));

          case 'delete':
            return toToolContent(fromResult(deleteJob(id), 'Job deleted', deleted => ({ id, deleted })));
        }
      } catch (error) {
        return toToolContent(fromThrown(error));
      }
    }
  );
}
