/**
 * Errors raised by the project manager, the phase-state engine and their
 * collaborators. Every error names the branch and/or issue it concerns and
 * ends its message with the step a caller should take next.
 */

import { AppError, type ErrorContext } from './errors.js';

/**
 * Base for all workflow-state errors.
 */
export class WorkflowStateError extends AppError {
  /** Human-readable next step, also appended to the message. */
  public readonly nextStep: string;

  constructor(problem: string, nextStep: string, context: ErrorContext = {}, originalError?: Error) {
    super(`${problem}. Next step: ${nextStep}`, { ...context, nextStep }, originalError);
    this.name = 'WorkflowStateError';
    this.nextStep = nextStep;
  }
}

export class DuplicateIssueError extends WorkflowStateError {
  constructor(public readonly issueNumber: number) {
    super(
      `A project plan already exists for issue ${issueNumber}`,
      `call get-project-plan for issue ${issueNumber}; plans cannot be re-initialized`,
      { issueNumber }
    );
    this.name = 'DuplicateIssueError';
  }
}

export class UnknownWorkflowError extends WorkflowStateError {
  constructor(
    public readonly workflowName: string,
    public readonly availableWorkflows: string[]
  ) {
    super(
      `Unknown workflow '${workflowName}'`,
      `choose one of: ${availableWorkflows.join(', ') || '(none configured)'}`,
      { workflowName, availableWorkflows }
    );
    this.name = 'UnknownWorkflowError';
  }
}

export class PlanNotFoundError extends WorkflowStateError {
  constructor(public readonly issueNumber: number, branch?: string) {
    super(
      branch
        ? `Project plan not found for issue ${issueNumber} (branch '${branch}')`
        : `Project plan not found for issue ${issueNumber}`,
      `call initialize-project for issue ${issueNumber} first`,
      branch ? { issueNumber, branch } : { issueNumber }
    );
    this.name = 'PlanNotFoundError';
  }
}

export class BranchFormatError extends WorkflowStateError {
  constructor(public readonly branch: string, branchTypes: string[]) {
    super(
      `Cannot extract issue number from branch '${branch}'`,
      `name the branch <type>/<issue>-<slug> with type one of ${branchTypes.join(', ')}, or pass issue_number explicitly`,
      { branch, branchTypes }
    );
    this.name = 'BranchFormatError';
  }
}

export class DuplicateBranchError extends WorkflowStateError {
  constructor(public readonly branch: string, currentPhase: string) {
    super(
      `Branch '${branch}' is already initialized (current phase '${currentPhase}')`,
      `call get-phase-state or transition-phase for '${branch}'`,
      { branch, currentPhase }
    );
    this.name = 'DuplicateBranchError';
  }
}

export class InvalidTransitionError extends WorkflowStateError {
  constructor(
    public readonly branch: string,
    public readonly fromPhase: string | null,
    public readonly toPhase: string,
    reason: string,
    nextStep: string
  ) {
    const route = fromPhase === null ? `to '${toPhase}'` : `from '${fromPhase}' to '${toPhase}'`;
    super(
      `Invalid transition on branch '${branch}' ${route}: ${reason}`,
      nextStep,
      { branch, fromPhase, toPhase }
    );
    this.name = 'InvalidTransitionError';
  }
}

/**
 * A forced transition was requested without a usable skip reason.
 */
export class SkipReasonRequiredError extends InvalidTransitionError {
  constructor(branch: string, toPhase: string) {
    super(
      branch,
      null,
      toPhase,
      'a forced transition requires a non-empty skip_reason',
      'retry force-phase-transition with skip_reason explaining why phases are skipped'
    );
    this.name = 'SkipReasonRequiredError';
  }
}

export class ApprovalRequiredError extends WorkflowStateError {
  constructor(
    public readonly branch: string,
    public readonly toPhase: string,
    issueNumber: number
  ) {
    super(
      `Transition of branch '${branch}' to '${toPhase}' requires human approval (issue ${issueNumber} runs in interactive mode)`,
      'confirm with the user and retry with human_approval set to true',
      { branch, toPhase, issueNumber }
    );
    this.name = 'ApprovalRequiredError';
  }
}

/**
 * A persisted record failed to parse or validate. Carries the raw content so
 * it can be repaired by hand; nothing is repaired automatically.
 */
export class StateCorruptError extends WorkflowStateError {
  constructor(
    public readonly filePath: string,
    detail: string,
    public readonly rawContent: string,
    context: ErrorContext = {},
    originalError?: Error
  ) {
    super(
      `Persisted state in ${filePath} is corrupt: ${detail}`,
      `repair or remove the entry in ${filePath} by hand, then retry`,
      { ...context, filePath, rawContent },
      originalError
    );
    this.name = 'StateCorruptError';
  }
}

export type Collaborator = 'git' | 'persistence';

/**
 * Git or the persistence layer could not serve a request. Recovery catches
 * the git variant; the persistence variant always reaches the caller.
 */
export class CollaboratorUnavailableError extends WorkflowStateError {
  constructor(
    public readonly collaborator: Collaborator,
    detail: string,
    context: ErrorContext = {},
    originalError?: Error
  ) {
    super(
      `${collaborator === 'git' ? 'Git' : 'Persistence'} unavailable: ${detail}`,
      collaborator === 'git'
        ? 'check that the workspace is a git repository with the branch checked out'
        : 'check that the state directory is readable and writable, then retry',
      { ...context, collaborator },
      originalError
    );
    this.name = 'CollaboratorUnavailableError';
  }
}
