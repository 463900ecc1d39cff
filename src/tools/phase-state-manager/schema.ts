// src/tools/phase-state-manager/schema.ts
import { z } from 'zod';

const branch = z.string().min(1)
  .describe("Git branch name, e.g. 'feature/42-login-form'.");

const humanApproval = z.boolean().default(false)
  .describe('Set to true only after the user confirmed the transition. Required for interactive plans.');

export const initializeBranchInputSchema = z.object({
  branch: branch.optional()
    .describe('Branch to initialize. Defaults to the branch currently checked out.'),
  issue_number: z.number().int().positive().optional()
    .describe('Issue the branch works on. Defaults to the number in the branch name.')
});

export const getPhaseStateInputSchema = z.object({
  branch: branch.optional()
    .describe('Branch to inspect. Defaults to the branch currently checked out.')
});

export const transitionPhaseInputSchema = z.object({
  branch: branch.optional()
    .describe('Branch to advance. Defaults to the branch currently checked out.'),
  to_phase: z.string().min(1)
    .describe('The phase immediately after the current one.'),
  human_approval: humanApproval
});

export const forcePhaseTransitionInputSchema = z.object({
  branch: branch.optional()
    .describe('Branch to move. Defaults to the branch currently checked out.'),
  to_phase: z.string().min(1)
    .describe('Any phase of the plan after the current one.'),
  skip_reason: z.string()
    .describe('Why the intermediate phases are skipped. Must not be blank.'),
  human_approval: humanApproval
});
