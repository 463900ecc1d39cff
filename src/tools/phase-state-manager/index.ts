// src/tools/phase-state-manager/index.ts
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import logger from '../../logger.js';
import { registerTool, type ToolDefinition, type ToolExecutor } from '../../services/routing/toolRegistry.js';
import type { ToolServices } from '../../services/service-container.js';
import { toolSuccess } from '../tool-result.js';
import {
  forcePhaseTransitionInputSchema,
  getPhaseStateInputSchema,
  initializeBranchInputSchema,
  transitionPhaseInputSchema
} from './schema.js';

async function branchOrCurrent(branch: string | undefined, services: ToolServices): Promise<string> {
  if (branch !== undefined) {
    return branch;
  }
  const current = await services.git.getCurrentBranch();
  logger.debug({ branch: current }, 'No branch given, using the checked-out branch');
  return current;
}

export const initializeBranch: ToolExecutor = async (
  params: Record<string, unknown>,
  services: ToolServices
): Promise<CallToolResult> => {
  const input = initializeBranchInputSchema.parse(params);
  const branch = await branchOrCurrent(input.branch, services);
  const state = await services.engine.initializeBranch(branch, input.issue_number);
  return toolSuccess(
    `Branch '${state.branch}' initialized for issue ${state.issue_number} at phase '${state.current_phase}'`,
    state
  );
};

export const getPhaseState: ToolExecutor = async (
  params: Record<string, unknown>,
  services: ToolServices
): Promise<CallToolResult> => {
  const input = getPhaseStateInputSchema.parse(params);
  const branch = await branchOrCurrent(input.branch, services);
  const { state, reconstructed } = await services.engine.resolveState(branch);
  const summary = reconstructed
    ? `Branch '${state.branch}' is in phase '${state.current_phase}' (reconstructed from commit history; provisional until the next transition)`
    : `Branch '${state.branch}' is in phase '${state.current_phase}'`;
  return toolSuccess(summary, { reconstructed, state });
};

export const transitionPhase: ToolExecutor = async (
  params: Record<string, unknown>,
  services: ToolServices
): Promise<CallToolResult> => {
  const input = transitionPhaseInputSchema.parse(params);
  const branch = await branchOrCurrent(input.branch, services);
  const { state, record } = await services.engine.transition(branch, input.to_phase, input.human_approval);
  return toolSuccess(
    `Branch '${state.branch}' moved from '${record.from_phase}' to '${record.to_phase}'`,
    { state, transition: record }
  );
};

export const forcePhaseTransition: ToolExecutor = async (
  params: Record<string, unknown>,
  services: ToolServices
): Promise<CallToolResult> => {
  const input = forcePhaseTransitionInputSchema.parse(params);
  const branch = await branchOrCurrent(input.branch, services);
  const { state, record } = await services.engine.forceTransition(
    branch,
    input.to_phase,
    input.skip_reason,
    input.human_approval
  );
  return toolSuccess(
    `Branch '${state.branch}' forced from '${record.from_phase}' to '${record.to_phase}' (skip reason: ${record.skip_reason})`,
    { state, transition: record }
  );
};

const definitions: ToolDefinition[] = [
  {
    name: 'initialize-branch',
    description: "Starts phase tracking for a branch at the first phase of its issue's plan.",
    inputSchema: initializeBranchInputSchema.shape,
    executor: initializeBranch
  },
  {
    name: 'get-phase-state',
    description: 'Returns the phase state of a branch. Without persisted state it is reconstructed from the plan and recent commit messages and reported as reconstructed.',
    inputSchema: getPhaseStateInputSchema.shape,
    executor: getPhaseState
  },
  {
    name: 'transition-phase',
    description: 'Moves a branch to the next phase of its plan. Interactive plans require human_approval.',
    inputSchema: transitionPhaseInputSchema.shape,
    executor: transitionPhase
  },
  {
    name: 'force-phase-transition',
    description: 'Skips a branch forward to a later phase of its plan, recording skip_reason. Interactive plans require human_approval.',
    inputSchema: forcePhaseTransitionInputSchema.shape,
    executor: forcePhaseTransition
  }
];

for (const definition of definitions) {
  registerTool(definition);
}
