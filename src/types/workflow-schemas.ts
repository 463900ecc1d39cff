// src/types/workflow-schemas.ts
import { z } from 'zod';
import type { BranchState, ProjectPlan, TransitionRecord } from './workflow.js';

export const executionModeSchema = z.enum(['interactive', 'autonomous']);

export const issueNumberSchema = z.number().int().positive();

const phaseNameSchema = z.string().trim().min(1, { message: 'Phase names cannot be blank' });

/** Non-empty list of unique, non-blank phase names. */
export const phaseListSchema = z
  .array(phaseNameSchema)
  .min(1, { message: 'At least one phase is required' })
  .refine(phases => new Set(phases).size === phases.length, {
    message: 'Phase names must be unique'
  });

const timestampSchema = z.string().datetime({ offset: true });

export const projectPlanSchema: z.ZodType<ProjectPlan> = z.object({
  issue_number: issueNumberSchema,
  issue_title: z.string(),
  workflow_name: z.string().min(1),
  required_phases: phaseListSchema,
  execution_mode: executionModeSchema,
  created_at: timestampSchema
});

export const transitionRecordSchema: z.ZodType<TransitionRecord> = z.object({
  from_phase: z.string().min(1),
  to_phase: z.string().min(1),
  timestamp: timestampSchema,
  forced: z.boolean(),
  skip_reason: z.string().nullable(),
  human_approval: z.boolean()
});

export const branchStateSchema: z.ZodType<BranchState> = z.object({
  branch: z.string().min(1),
  issue_number: issueNumberSchema,
  workflow_name: z.string().min(1),
  current_phase: z.string().min(1),
  transitions: z.array(transitionRecordSchema),
  created_at: timestampSchema
});

/**
 * Shape of workflows.yaml before workflow names are folded into each definition.
 */
export const workflowCatalogFileSchema = z.object({
  version: z.union([z.string(), z.number()]).transform(String).default('1.0'),
  branch_types: z.array(z.string().trim().min(1)).min(1),
  workflows: z
    .record(
      z.object({
        phases: phaseListSchema,
        default_execution_mode: executionModeSchema.default('interactive'),
        description: z.string().default('')
      })
    )
    .refine(workflows => Object.keys(workflows).length > 0, {
      message: 'At least one workflow must be defined'
    }),
  phase_conventions: z.record(z.array(z.string().trim().min(1))).default({})
});

export type WorkflowCatalogFile = z.infer<typeof workflowCatalogFileSchema>;
