import { createHash } from 'crypto';
import fs from 'fs-extra';
import yaml from 'js-yaml';
import logger from '../../logger.js';
import { ConfigurationError } from '../../utils/errors.js';
import { UnknownWorkflowError } from '../../utils/workflow-errors.js';
import { workflowCatalogFileSchema, type WorkflowCatalogFile } from '../../types/workflow-schemas.js';
import type { WorkflowCatalog, WorkflowDefinition } from '../../types/workflow.js';

/**
 * Read access to the workflow catalog. Injected into the project manager and
 * the phase-state engine.
 */
export interface WorkflowCatalogProvider {
  getCatalog(): Promise<WorkflowCatalog>;
  /** @throws {UnknownWorkflowError} */
  getWorkflow(name: string): Promise<WorkflowDefinition>;
  listWorkflows(): Promise<WorkflowDefinition[]>;
  /** Drops any cached catalog so the next read re-parses the file. */
  invalidate(): void;
}

export interface FreshnessToken {
  mtimeMs: number;
  size: number;
  sha256: string;
}

interface CachedCatalog {
  token: FreshnessToken;
  catalog: WorkflowCatalog;
}

function toCatalog(file: WorkflowCatalogFile): WorkflowCatalog {
  const workflows: Record<string, WorkflowDefinition> = {};
  for (const [name, definition] of Object.entries(file.workflows)) {
    workflows[name] = {
      name,
      phases: definition.phases,
      default_execution_mode: definition.default_execution_mode,
      description: definition.description
    };
  }
  return {
    version: file.version,
    branch_types: file.branch_types,
    workflows,
    phase_conventions: file.phase_conventions
  };
}

/**
 * Workflow catalog backed by a YAML file.
 *
 * The parsed catalog is cached with a freshness token. Every read compares
 * the file's current content hash against the token and re-parses when it
 * changed, so edits to workflows.yaml take effect without a restart.
 */
export class WorkflowConfigSource implements WorkflowCatalogProvider {
  private cached: CachedCatalog | null = null;

  constructor(private readonly filePath: string) {}

  get path(): string {
    return this.filePath;
  }

  async getCatalog(): Promise<WorkflowCatalog> {
    const { content, token } = await this.readWithToken();

    if (this.cached && this.cached.token.sha256 === token.sha256) {
      this.cached.token = token;
      return this.cached.catalog;
    }

    const catalog = this.parse(content);
    const reloaded = this.cached !== null;
    this.cached = { token, catalog };
    logger.info(
      { filePath: this.filePath, workflows: Object.keys(catalog.workflows), reloaded },
      reloaded ? 'Workflow catalog changed on disk, reloaded' : 'Workflow catalog loaded'
    );
    return catalog;
  }

  async getWorkflow(name: string): Promise<WorkflowDefinition> {
    const catalog = await this.getCatalog();
    if (!Object.prototype.hasOwnProperty.call(catalog.workflows, name)) {
      throw new UnknownWorkflowError(name, Object.keys(catalog.workflows));
    }
    return catalog.workflows[name];
  }

  async listWorkflows(): Promise<WorkflowDefinition[]> {
    const catalog = await this.getCatalog();
    return Object.values(catalog.workflows);
  }

  /** Token of the catalog currently cached, if any. */
  get freshnessToken(): FreshnessToken | null {
    return this.cached ? { ...this.cached.token } : null;
  }

  invalidate(): void {
    if (this.cached) {
      logger.debug({ filePath: this.filePath }, 'Workflow catalog cache invalidated');
    }
    this.cached = null;
  }

  private async readWithToken(): Promise<{ content: string; token: FreshnessToken }> {
    try {
      const stats = await fs.stat(this.filePath);
      const content = await fs.readFile(this.filePath, 'utf-8');
      const sha256 = createHash('sha256').update(content).digest('hex');
      return { content, token: { mtimeMs: stats.mtimeMs, size: stats.size, sha256 } };
    } catch (error) {
      throw new ConfigurationError(
        `Cannot read workflow configuration ${this.filePath}`,
        { filePath: this.filePath },
        error instanceof Error ? error : undefined
      );
    }
  }

  private parse(content: string): WorkflowCatalog {
    let document: unknown;
    try {
      document = yaml.load(content);
    } catch (error) {
      throw new ConfigurationError(
        `Invalid YAML in workflow configuration ${this.filePath}`,
        { filePath: this.filePath },
        error instanceof Error ? error : undefined
      );
    }

    const result = workflowCatalogFileSchema.safeParse(document);
    if (!result.success) {
      const summary = result.error.issues
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ConfigurationError(
        `Invalid workflow configuration ${this.filePath}: ${summary}`,
        { filePath: this.filePath, validationIssues: result.error.issues }
      );
    }
    return toCatalog(result.data);
  }
}
