// src/tools/project-planner/schema.ts
import { z } from 'zod';
import { executionModeSchema } from '../../types/workflow-schemas.js';

const issueNumber = z.number().int().positive()
  .describe('GitHub issue number the plan belongs to.');

export const initializeProjectInputSchema = z.object({
  issue_number: issueNumber,
  issue_title: z.string().min(1)
    .describe('Title of the issue.'),
  workflow_name: z.string().min(1)
    .describe("Workflow from workflows.yaml, e.g. 'feature', 'bug', 'refactor', 'epic', 'docs' or 'hotfix'."),
  custom_phases: z.array(z.string()).optional()
    .describe("Replaces the workflow's phase list for this issue only."),
  execution_mode: executionModeSchema.optional()
    .describe("Overrides the workflow's default execution mode. Interactive plans require human approval for every transition.")
});

export const getProjectPlanInputSchema = z.object({
  issue_number: issueNumber
});
