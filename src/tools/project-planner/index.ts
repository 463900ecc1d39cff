// src/tools/project-planner/index.ts
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { registerTool, type ToolDefinition, type ToolExecutor } from '../../services/routing/toolRegistry.js';
import type { ToolServices } from '../../services/service-container.js';
import { toolSuccess } from '../tool-result.js';
import { getProjectPlanInputSchema, initializeProjectInputSchema } from './schema.js';

export const initializeProject: ToolExecutor = async (
  params: Record<string, unknown>,
  services: ToolServices
): Promise<CallToolResult> => {
  const input = initializeProjectInputSchema.parse(params);
  const plan = await services.projectManager.initializeProject(
    input.issue_number,
    input.issue_title,
    input.workflow_name,
    { customPhases: input.custom_phases, executionMode: input.execution_mode }
  );
  return toolSuccess(
    `Project plan created for issue ${plan.issue_number} (${plan.workflow_name}, ${plan.execution_mode}): ${plan.required_phases.join(' → ')}`,
    plan
  );
};

export const getProjectPlan: ToolExecutor = async (
  params: Record<string, unknown>,
  services: ToolServices
): Promise<CallToolResult> => {
  const input = getProjectPlanInputSchema.parse(params);
  const plan = await services.projectManager.getProjectPlan(input.issue_number);
  return toolSuccess(
    `Project plan for issue ${plan.issue_number}: ${plan.required_phases.join(' → ')}`,
    plan
  );
};

const initializeProjectToolDefinition: ToolDefinition = {
  name: 'initialize-project',
  description: 'Creates the immutable project plan for an issue: its workflow, ordered phases and execution mode. Fails if the issue already has a plan.',
  inputSchema: initializeProjectInputSchema.shape,
  executor: initializeProject
};

const getProjectPlanToolDefinition: ToolDefinition = {
  name: 'get-project-plan',
  description: 'Returns the project plan of an issue.',
  inputSchema: getProjectPlanInputSchema.shape,
  executor: getProjectPlan
};

registerTool(initializeProjectToolDefinition);
registerTool(getProjectPlanToolDefinition);
