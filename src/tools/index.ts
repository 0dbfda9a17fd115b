import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { registerQueryRecordsTool } from './query-records';
import { registerManageRecordsTool } from './manage-records';
import { registerManageRelationTool } from './manage-relation';
import { registerQueryJobsTool } from './query-jobs';
import { registerManageJobTool } from './manage-job';
import { registerRecordExportTool } from './record-export';

export {
  registerQueryRecordsTool,
  registerManageRecordsTool,
  registerManageRelationTool,
  registerQueryJobsTool,
  registerManageJobTool,
  registerRecordExportTool,
};

export function registerAllTools(server: McpServer): void {
  // Records
  registerQueryRecordsTool(server);
  registerManageRecordsTool(server);

  // Relations
  registerManageRelationTool(server);

  // Jobs and workspace exports
  registerQueryJobsTool(server);
  registerManageJobTool(server);
  registerRecordExportTool(server);
}
