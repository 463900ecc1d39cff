import logger from '../../logger.js';
import { TimeoutError, ValidationError } from '../../utils/errors.js';
import type { GitCollaborator } from '../../utils/gitHelper.js';
import { KeyedMutex } from '../../utils/keyed-mutex.js';
import { raceWithTimeout } from '../../utils/timeout.js';
import {
  ApprovalRequiredError,
  CollaboratorUnavailableError,
  DuplicateBranchError,
  InvalidTransitionError,
  PlanNotFoundError,
  SkipReasonRequiredError,
  StateCorruptError
} from '../../utils/workflow-errors.js';
import { branchStateSchema, issueNumberSchema } from '../../types/workflow-schemas.js';
import type {
  BranchState,
  Clock,
  ProjectPlan,
  StateResolution,
  TransitionOutcome,
  TransitionRecord
} from '../../types/workflow.js';
import type { ProjectManager } from '../project-manager/index.js';
import { JsonRecordStore } from '../storage/json-record-store.js';
import type { WorkflowCatalogProvider } from '../workflow-config/index.js';
import { extractIssueNumber } from './branch-naming.js';
import { inferPhase } from './phase-inference.js';

export { extractIssueNumber } from './branch-naming.js';
export { inferPhase } from './phase-inference.js';

export const DEFAULT_COMMIT_WINDOW = 50;
export const DEFAULT_GIT_TIMEOUT_MS = 5000;

export interface PhaseStateEngineOptions {
  store: JsonRecordStore<BranchState>;
  projectManager: ProjectManager;
  git: GitCollaborator;
  catalog: WorkflowCatalogProvider;
  /** Number of recent commits examined during recovery. */
  commitWindow?: number;
  /** Upper bound on the git history call during recovery. */
  gitTimeoutMs?: number;
  clock?: Clock;
}

/**
 * Creates the record store for state.json. Each state's `branch` must equal
 * the key it is stored under.
 */
export function createBranchStateStore(filePath: string): JsonRecordStore<BranchState> {
  return new JsonRecordStore<BranchState>({
    filePath,
    schema: branchStateSchema,
    recordLabel: 'branch state',
    checkKey: (key, state) => (state.branch === key ? null : `has branch '${state.branch}'`)
  });
}

function assertBranchName(branch: string): void {
  if (branch.trim() === '') {
    throw new ValidationError('Branch name must not be empty', undefined, { branch });
  }
}

function nextStepFor(plan: ProjectPlan, currentIndex: number): string {
  const next = plan.required_phases[currentIndex + 1];
  return next === undefined
    ? `'${plan.required_phases[currentIndex]}' is the final phase; no further transitions are possible`
    : `transition to '${next}', or use force-phase-transition with a skip_reason to skip ahead`;
}

/**
 * Per-branch phase state with validated transitions.
 *
 * When a branch has no persisted state, `getState` rebuilds it from the
 * issue's project plan and the branch's recent commit subjects, persists the
 * result and reports it as reconstructed. Reconstruction never invents
 * transition history. All read-modify-write sequences on one branch are
 * serialized; different branches proceed independently.
 */
export class PhaseStateEngine {
  private readonly store: JsonRecordStore<BranchState>;
  private readonly projectManager: ProjectManager;
  private readonly git: GitCollaborator;
  private readonly catalog: WorkflowCatalogProvider;
  private readonly commitWindow: number;
  private readonly gitTimeoutMs: number;
  private readonly clock: Clock;
  private readonly branchLock = new KeyedMutex();

  constructor(options: PhaseStateEngineOptions) {
    this.store = options.store;
    this.projectManager = options.projectManager;
    this.git = options.git;
    this.catalog = options.catalog;
    this.commitWindow = options.commitWindow ?? DEFAULT_COMMIT_WINDOW;
    this.gitTimeoutMs = options.gitTimeoutMs ?? DEFAULT_GIT_TIMEOUT_MS;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Starts tracking `branch` at the first phase of its issue's plan.
   *
   * @param issueNumber defaults to the number embedded in the branch name.
   * @throws {BranchFormatError} no issue number given or embedded.
   * @throws {PlanNotFoundError}
   * @throws {DuplicateBranchError} the branch already has persisted state.
   */
  async initializeBranch(branch: string, issueNumber?: number): Promise<BranchState> {
    assertBranchName(branch);
    const issue = issueNumber ?? extractIssueNumber(branch, (await this.catalog.getCatalog()).branch_types);
    const parsedIssue = issueNumberSchema.safeParse(issue);
    if (!parsedIssue.success) {
      throw new ValidationError(
        `Issue number must be a positive integer, got ${issue}`,
        parsedIssue.error.issues,
        { branch, issueNumber: issue }
      );
    }
    const plan = await this.loadPlan(issue, branch);

    return this.branchLock.runExclusive(branch, async () => {
      const existing = await this.store.get(branch);
      if (existing) {
        throw new DuplicateBranchError(branch, existing.current_phase);
      }

      const state: BranchState = {
        branch,
        issue_number: plan.issue_number,
        workflow_name: plan.workflow_name,
        current_phase: plan.required_phases[0],
        transitions: [],
        created_at: this.clock().toISOString()
      };
      await this.store.put(branch, state);
      logger.info(
        { branch, issueNumber: plan.issue_number, phase: state.current_phase },
        'Branch initialized'
      );
      return state;
    });
  }

  /**
   * Persisted state for `branch`, reconstructing it first when absent.
   *
   * @throws {BranchFormatError} reconstruction needed but the branch name has no issue number.
   * @throws {PlanNotFoundError} reconstruction needed but the issue has no plan.
   * @throws {StateCorruptError}
   */
  async resolveState(branch: string): Promise<StateResolution> {
    assertBranchName(branch);
    return this.branchLock.runExclusive(branch, () => this.resolveUnlocked(branch));
  }

  async getState(branch: string): Promise<BranchState> {
    return (await this.resolveState(branch)).state;
  }

  async getCurrentPhase(branch: string): Promise<string> {
    return (await this.getState(branch)).current_phase;
  }

  /**
   * Advances `branch` to the phase immediately after its current one.
   *
   * @throws {ApprovalRequiredError} interactive plan without human approval, checked first.
   * @throws {InvalidTransitionError} target is not the immediate next phase.
   */
  async transition(branch: string, toPhase: string, humanApproval: boolean): Promise<TransitionOutcome> {
    assertBranchName(branch);
    return this.branchLock.runExclusive(branch, async () => {
      const { state } = await this.resolveUnlocked(branch);
      const plan = await this.loadPlan(state.issue_number, branch);
      const currentIndex = this.indexOfCurrentPhase(state, plan);

      if (plan.execution_mode === 'interactive' && !humanApproval) {
        throw new ApprovalRequiredError(branch, toPhase, plan.issue_number);
      }

      const targetIndex = plan.required_phases.indexOf(toPhase);
      if (targetIndex === -1) {
        throw new InvalidTransitionError(
          branch,
          state.current_phase,
          toPhase,
          `'${toPhase}' is not a phase of issue ${plan.issue_number} (${plan.required_phases.join(' → ')})`,
          nextStepFor(plan, currentIndex)
        );
      }
      if (targetIndex !== currentIndex + 1) {
        throw new InvalidTransitionError(
          branch,
          state.current_phase,
          toPhase,
          targetIndex <= currentIndex
            ? 'backward and repeated transitions are not allowed'
            : 'transitions move one phase at a time',
          nextStepFor(plan, currentIndex)
        );
      }

      return this.append(state, {
        from_phase: state.current_phase,
        to_phase: toPhase,
        timestamp: this.clock().toISOString(),
        forced: false,
        skip_reason: null,
        human_approval: humanApproval
      });
    });
  }

  /**
   * Moves `branch` forward to any later phase of its plan, recording why the
   * phases in between were skipped.
   *
   * @throws {SkipReasonRequiredError} blank skip reason, checked before anything else.
   * @throws {ApprovalRequiredError} interactive plan without human approval.
   * @throws {InvalidTransitionError} target not in the plan, or not after the current phase.
   */
  async forceTransition(
    branch: string,
    toPhase: string,
    skipReason: string,
    humanApproval: boolean
  ): Promise<TransitionOutcome> {
    const reason = skipReason.trim();
    if (reason === '') {
      throw new SkipReasonRequiredError(branch, toPhase);
    }
    assertBranchName(branch);

    return this.branchLock.runExclusive(branch, async () => {
      const { state } = await this.resolveUnlocked(branch);
      const plan = await this.loadPlan(state.issue_number, branch);
      const currentIndex = this.indexOfCurrentPhase(state, plan);

      if (plan.execution_mode === 'interactive' && !humanApproval) {
        throw new ApprovalRequiredError(branch, toPhase, plan.issue_number);
      }

      const targetIndex = plan.required_phases.indexOf(toPhase);
      if (targetIndex === -1) {
        throw new InvalidTransitionError(
          branch,
          state.current_phase,
          toPhase,
          `'${toPhase}' is not a phase of issue ${plan.issue_number} (${plan.required_phases.join(' → ')})`,
          `choose a phase after '${state.current_phase}' from the plan`
        );
      }
      if (targetIndex <= currentIndex) {
        throw new InvalidTransitionError(
          branch,
          state.current_phase,
          toPhase,
          'forced transitions only move forward',
          currentIndex === plan.required_phases.length - 1
            ? nextStepFor(plan, currentIndex)
            : `choose a phase after '${state.current_phase}'`
        );
      }

      const outcome = await this.append(state, {
        from_phase: state.current_phase,
        to_phase: toPhase,
        timestamp: this.clock().toISOString(),
        forced: true,
        skip_reason: reason,
        human_approval: humanApproval
      });
      logger.warn(
        {
          branch,
          issueNumber: state.issue_number,
          skipped: plan.required_phases.slice(currentIndex + 1, targetIndex),
          skipReason: reason
        },
        'Phases skipped by forced transition'
      );
      return outcome;
    });
  }

  private async append(state: BranchState, record: TransitionRecord): Promise<TransitionOutcome> {
    const next: BranchState = {
      ...state,
      current_phase: record.to_phase,
      transitions: [...state.transitions, record]
    };
    await this.store.put(state.branch, next);
    logger.info(
      {
        branch: state.branch,
        issueNumber: state.issue_number,
        from: record.from_phase,
        to: record.to_phase,
        forced: record.forced
      },
      'Phase transition recorded'
    );
    return { state: next, record };
  }

  private indexOfCurrentPhase(state: BranchState, plan: ProjectPlan): number {
    const index = plan.required_phases.indexOf(state.current_phase);
    if (index === -1) {
      throw new StateCorruptError(
        this.store.path,
        `branch state '${state.branch}' has current_phase '${state.current_phase}', which is not a phase of issue ${plan.issue_number}`,
        JSON.stringify(state, null, 2),
        { branch: state.branch, issueNumber: plan.issue_number }
      );
    }
    return index;
  }

  private async loadPlan(issueNumber: number, branch: string): Promise<ProjectPlan> {
    try {
      return await this.projectManager.getProjectPlan(issueNumber);
    } catch (error) {
      if (error instanceof PlanNotFoundError) {
        throw new PlanNotFoundError(issueNumber, branch);
      }
      throw error;
    }
  }

  private async resolveUnlocked(branch: string): Promise<StateResolution> {
    const persisted = await this.store.get(branch);
    if (persisted) {
      return { state: persisted, reconstructed: false };
    }
    return { state: await this.reconstruct(branch), reconstructed: true };
  }

  private async reconstruct(branch: string): Promise<BranchState> {
    const catalog = await this.catalog.getCatalog();
    const issueNumber = extractIssueNumber(branch, catalog.branch_types);
    const plan = await this.loadPlan(issueNumber, branch);
    const commitMessages = await this.recentCommits(branch, issueNumber);

    const state: BranchState = {
      branch,
      issue_number: plan.issue_number,
      workflow_name: plan.workflow_name,
      current_phase: inferPhase(plan.required_phases, commitMessages, catalog.phase_conventions),
      transitions: [],
      created_at: this.clock().toISOString()
    };
    await this.store.put(branch, state);
    logger.info(
      {
        branch,
        issueNumber,
        phase: state.current_phase,
        commitsExamined: commitMessages.length
      },
      'Branch state reconstructed from commit history'
    );
    return state;
  }

  private async recentCommits(branch: string, issueNumber: number): Promise<string[]> {
    try {
      return await raceWithTimeout(
        `git history for '${branch}'`,
        this.git.getRecentCommits(branch, this.commitWindow),
        this.gitTimeoutMs
      );
    } catch (error) {
      if (error instanceof CollaboratorUnavailableError || error instanceof TimeoutError) {
        logger.warn(
          { branch, issueNumber, err: error },
          'Commit history unavailable, falling back to the first phase'
        );
        return [];
      }
      throw error;
    }
  }
}
