/**
 * Service container: builds the project manager, the phase-state engine and
 * their collaborators once at startup and hands them to every tool call.
 */

import logger from '../logger.js';
import type { Clock } from '../types/workflow.js';
import type { ServerConfig } from '../utils/configLoader.js';
import { SimpleGitCollaborator, type GitCollaborator } from '../utils/gitHelper.js';
import { PhaseStateEngine, createBranchStateStore } from './phase-state-engine/index.js';
import { ProjectManager, createProjectPlanStore } from './project-manager/index.js';
import { WorkflowConfigSource } from './workflow-config/index.js';

export interface ToolServices {
  config: ServerConfig;
  catalog: WorkflowConfigSource;
  projectManager: ProjectManager;
  engine: PhaseStateEngine;
  git: GitCollaborator;
}

export interface ServiceOverrides {
  git?: GitCollaborator;
  clock?: Clock;
}

export function createServices(config: ServerConfig, overrides: ServiceOverrides = {}): ToolServices {
  const catalog = new WorkflowConfigSource(config.workflowsConfigPath);
  const git = overrides.git ?? new SimpleGitCollaborator(config.workspaceRoot);

  const projectManager = new ProjectManager({
    store: createProjectPlanStore(config.projectsFile),
    catalog,
    clock: overrides.clock
  });

  const engine = new PhaseStateEngine({
    store: createBranchStateStore(config.stateFile),
    projectManager,
    git,
    catalog,
    commitWindow: config.commitWindow,
    gitTimeoutMs: config.gitTimeoutMs,
    clock: overrides.clock
  });

  logger.info(
    {
      workspaceRoot: config.workspaceRoot,
      stateDir: config.stateDir,
      workflowsConfigPath: config.workflowsConfigPath
    },
    'Services created'
  );

  return { config, catalog, projectManager, engine, git };
}
