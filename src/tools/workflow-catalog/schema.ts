// src/tools/workflow-catalog/schema.ts
import { z } from 'zod';

export const listWorkflowsInputSchema = z.object({});

export const reloadWorkflowConfigInputSchema = z.object({});
