// src/types/workflow.ts
// Records persisted in projects.json and state.json. Keys are snake_case
// because they are written to disk and returned to MCP clients verbatim.

export type ExecutionMode = 'interactive' | 'autonomous';

/**
 * Immutable per-issue plan: which phases a branch for this issue must
 * pass through, in order.
 */
export interface ProjectPlan {
  issue_number: number;
  issue_title: string;
  workflow_name: string;
  /** Non-empty, unique; the first entry is the initial phase. */
  required_phases: string[];
  execution_mode: ExecutionMode;
  /** ISO-8601 UTC. */
  created_at: string;
}

export interface TransitionRecord {
  from_phase: string;
  to_phase: string;
  timestamp: string;
  forced: boolean;
  skip_reason: string | null;
  human_approval: boolean;
}

/**
 * Mutable per-branch phase state, owned by the PhaseStateEngine.
 */
export interface BranchState {
  branch: string;
  issue_number: number;
  workflow_name: string;
  current_phase: string;
  transitions: TransitionRecord[];
  created_at: string;
}

export interface WorkflowDefinition {
  name: string;
  phases: string[];
  default_execution_mode: ExecutionMode;
  description: string;
}

/**
 * Parsed contents of workflows.yaml.
 */
export interface WorkflowCatalog {
  version: string;
  branch_types: string[];
  workflows: Record<string, WorkflowDefinition>;
  /** Phase name → commit-subject signatures that imply the phase was reached. */
  phase_conventions: Record<string, string[]>;
}

export interface InitializeProjectOptions {
  /** Replaces the workflow's phase list for this issue only. */
  customPhases?: string[];
  /** Overrides the workflow's default execution mode. */
  executionMode?: ExecutionMode;
}

export interface StateResolution {
  state: BranchState;
  /** True when the state was rebuilt from commit history by this call. */
  reconstructed: boolean;
}

export interface TransitionOutcome {
  state: BranchState;
  record: TransitionRecord;
}

/** Source of "now"; injected so tests can pin timestamps. */
export type Clock = () => Date;
