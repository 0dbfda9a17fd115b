import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { fromResult, fromThrown, missingParams, optionalUuidSchema, toToolContent, uuidSchema } from './registry';
import { batchRecordExports, getExportReceipt, recordExport, removeExports } from '../repos/exports';

const receiptSchema = z.object({
  volunteerId: uuidSchema,
  jobId: uuidSchema,
  workspaceEmail: z.string(),
  orgUnit: z.string().optional(),
});

/**
 * Register the record_export MCP tool
 *
 * Receipts tie a volunteer to the export job that created their workspace
 * account. A volunteer can hold one receipt per job.
 */
export function registerRecordExportTool(server: McpServer): void {
  server.tool(
    'record_export',
    'Workspace export receipts. Operations: record, batchRecord (all or nothing), get, remove (by receipt ids). Exports are refused for volunteers in archived cycles.',
    {
      operation: z.enum(['record', 'batchRecord', 'get', 'remove']),
      id: optionalUuidSchema.describe('Receipt ID for get'),
      volunteerId: optionalUuidSchema,
      jobId: optionalUuidSchema,
      workspaceEmail: z.string().optional(),
      orgUnit: z.string().optional().describe('Defaults to exports.defaultOrgUnit from config'),
      receipts: z.array(receiptSchema).optional().describe('Receipts for batchRecord'),
      ids: z.array(uuidSchema).optional().describe('Receipt IDs for remove'),
    },
    async (params) => {
      try {
        switch (params.operation) {
          case 'record': {
            const { volunteerId, jobId, workspaceEmail } = params;
            if (!volunteerId || !jobId || workspaceEmail === undefined) {
              return toToolContent(missingParams('record', ['volunteerId', 'jobId', 'workspaceEmail']));
            }
            return toToolContent(fromResult(
              recordExport({ volunteerId, jobId, workspaceEmail, orgUnit: params.orgUnit }),
              'Export recorded'
            ));
          }

          case 'batchRecord':
            if (!params.receipts) return toToolContent(missingParams('batchRecord', ['receipts']));
            return toToolContent(fromResult(
              batchRecordExports(params.receipts),
              'Exports recorded',
              items => ({ items, count: items.length })
            ));

          case 'get':
            if (!params.id) return toToolContent(missingParams('get', ['id']));
            return toToolContent(fromResult(getExportReceipt(params.id), 'Export receipt retrieved'));

          case 'remove':
            if (!params.ids) return toToolContent(missingParams('remove', ['ids']));
            return toToolContent(fromResult(removeExports(params.ids), 'Exports removed', removed => ({ removed })));
        }
      } catch (error) {
        return toToolContent(fromThrown(error));
      }
    }
  );
}
