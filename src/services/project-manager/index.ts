import logger from '../../logger.js';
import { ValidationError } from '../../utils/errors.js';
import { KeyedMutex } from '../../utils/keyed-mutex.js';
import { DuplicateIssueError, PlanNotFoundError } from '../../utils/workflow-errors.js';
import { issueNumberSchema, phaseListSchema, projectPlanSchema } from '../../types/workflow-schemas.js';
import type { Clock, InitializeProjectOptions, ProjectPlan } from '../../types/workflow.js';
import type { WorkflowCatalogProvider } from '../workflow-config/index.js';
import { JsonRecordStore } from '../storage/json-record-store.js';

export interface ProjectManagerOptions {
  store: JsonRecordStore<ProjectPlan>;
  catalog: WorkflowCatalogProvider;
  clock?: Clock;
}

/**
 * Creates the record store for projects.json. Keys are issue numbers in
 * decimal form and must agree with each plan's `issue_number`.
 */
export function createProjectPlanStore(filePath: string): JsonRecordStore<ProjectPlan> {
  return new JsonRecordStore<ProjectPlan>({
    filePath,
    schema: projectPlanSchema,
    recordLabel: 'project plan',
    checkKey: (key, plan) =>
      String(plan.issue_number) === key ? null : `has issue_number ${plan.issue_number}`
  });
}

function assertIssueNumber(issueNumber: number): void {
  const result = issueNumberSchema.safeParse(issueNumber);
  if (!result.success) {
    throw new ValidationError(
      `Issue number must be a positive integer, got ${issueNumber}`,
      result.error.issues,
      { issueNumber }
    );
  }
}

/**
 * Durable store of immutable per-issue project plans.
 */
export class ProjectManager {
  private readonly store: JsonRecordStore<ProjectPlan>;
  private readonly catalog: WorkflowCatalogProvider;
  private readonly clock: Clock;
  private readonly issueLock = new KeyedMutex();

  constructor(options: ProjectManagerOptions) {
    this.store = options.store;
    this.catalog = options.catalog;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Creates the plan for an issue. Phases come from the named workflow unless
   * `options.customPhases` replaces them.
   *
   * @throws {ValidationError} bad issue number or custom phase list.
   * @throws {UnknownWorkflowError}
   * @throws {DuplicateIssueError} a plan already exists; it is left untouched.
   */
  async initializeProject(
    issueNumber: number,
    issueTitle: string,
    workflowName: string,
    options: InitializeProjectOptions = {}
  ): Promise<ProjectPlan> {
    assertIssueNumber(issueNumber);
    const workflow = await this.catalog.getWorkflow(workflowName);

    let requiredPhases = workflow.phases;
    if (options.customPhases !== undefined) {
      const result = phaseListSchema.safeParse(options.customPhases);
      if (!result.success) {
        throw new ValidationError(
          `Invalid custom phases for issue ${issueNumber}: ${result.error.issues.map(issue => issue.message).join('; ')}`,
          result.error.issues,
          { issueNumber }
        );
      }
      requiredPhases = result.data;
    }

    const key = String(issueNumber);
    return this.issueLock.runExclusive(key, async () => {
      if (await this.store.has(key)) {
        throw new DuplicateIssueError(issueNumber);
      }

      const plan: ProjectPlan = {
        issue_number: issueNumber,
        issue_title: issueTitle,
        workflow_name: workflow.name,
        required_phases: [...requiredPhases],
        execution_mode: options.executionMode ?? workflow.default_execution_mode,
        created_at: this.clock().toISOString()
      };

      await this.store.put(key, plan);
      logger.info(
        {
          issueNumber,
          workflowName: plan.workflow_name,
          phases: plan.required_phases,
          executionMode: plan.execution_mode,
          customPhases: options.customPhases !== undefined
        },
        'Project plan initialized'
      );
      return plan;
    });
  }

  /**
   * @throws {PlanNotFoundError}
   * @throws {StateCorruptError} the stored plan does not validate.
   */
  async getProjectPlan(issueNumber: number): Promise<ProjectPlan> {
    assertIssueNumber(issueNumber);
    const plan = await this.store.get(String(issueNumber));
    if (!plan) {
      throw new PlanNotFoundError(issueNumber);
    }
    return plan;
  }

  async hasProjectPlan(issueNumber: number): Promise<boolean> {
    assertIssueNumber(issueNumber);
    return this.store.has(String(issueNumber));
  }
}
