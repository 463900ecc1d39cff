// src/tools/workflow-catalog/index.ts
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { registerTool, type ToolDefinition, type ToolExecutor } from '../../services/routing/toolRegistry.js';
import type { ToolServices } from '../../services/service-container.js';
import { toolSuccess } from '../tool-result.js';
import { listWorkflowsInputSchema, reloadWorkflowConfigInputSchema } from './schema.js';

export const listWorkflows: ToolExecutor = async (
  _params: Record<string, unknown>,
  services: ToolServices
): Promise<CallToolResult> => {
  const catalog = await services.catalog.getCatalog();
  const workflows = Object.values(catalog.workflows);
  return toolSuccess(
    `${workflows.length} workflows available: ${workflows.map(workflow => workflow.name).join(', ')}`,
    {
      version: catalog.version,
      branch_types: catalog.branch_types,
      workflows
    }
  );
};

export const reloadWorkflowConfig: ToolExecutor = async (
  _params: Record<string, unknown>,
  services: ToolServices
): Promise<CallToolResult> => {
  services.catalog.invalidate();
  const catalog = await services.catalog.getCatalog();
  return toolSuccess(
    `Workflow configuration reloaded from ${services.catalog.path}`,
    {
      path: services.catalog.path,
      freshness: services.catalog.freshnessToken,
      workflows: Object.keys(catalog.workflows)
    }
  );
};

const listWorkflowsToolDefinition: ToolDefinition = {
  name: 'list-workflows',
  description: 'Lists the configured workflows with their phases, default execution mode and description.',
  inputSchema: listWorkflowsInputSchema.shape,
  executor: listWorkflows
};

const reloadWorkflowConfigToolDefinition: ToolDefinition = {
  name: 'reload-workflow-config',
  description: 'Discards the cached workflow catalog and reloads workflows.yaml from disk.',
  inputSchema: reloadWorkflowConfigInputSchema.shape,
  executor: reloadWorkflowConfig
};

registerTool(listWorkflowsToolDefinition);
registerTool(reloadWorkflowConfigToolDefinition);
