import fs from 'fs-extra';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import logger from '../logger.js';
import { ConfigurationError } from './errors.js';

/**
 * Settings the server is assembled from. Paths are absolute.
 */
export interface ServerConfig {
  workspaceRoot: string;
  /** Directory holding projects.json and state.json. */
  stateDir: string;
  projectsFile: string;
  stateFile: string;
  workflowsConfigPath: string;
  commitWindow: number;
  gitTimeoutMs: number;
  ssePort: number;
}

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/** Catalog shipped with the package; src/utils and dist/utils are both two levels down. */
export const DEFAULT_WORKFLOWS_PATH = path.resolve(__dirname, '../../config/workflows.yaml');

function blankAsUndefined<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(value => (typeof value === 'string' && value.trim() === '' ? undefined : value), schema);
}

const portSchema = z.coerce.number().int().min(1).max(65535);

const envSchema = z.object({
  WORKSPACE_ROOT: blankAsUndefined(z.string().optional()),
  PHASE_STATE_DIR: blankAsUndefined(z.string().optional()),
  WORKFLOWS_CONFIG_PATH: blankAsUndefined(z.string().optional()),
  RECOVERY_COMMIT_WINDOW: blankAsUndefined(z.coerce.number().int().positive().max(10000).default(50)),
  GIT_TIMEOUT_MS: blankAsUndefined(z.coerce.number().int().positive().default(5000)),
  SSE_PORT: blankAsUndefined(portSchema.optional()),
  PORT: blankAsUndefined(portSchema.optional())
});

/**
 * Picks the workflow catalog file: WORKFLOWS_CONFIG_PATH, then
 * `<stateDir>/workflows.yaml`, then the shipped default.
 */
export function resolveWorkflowsConfigPath(
  explicitPath: string | undefined,
  workspaceRoot: string,
  stateDir: string
): string {
  if (explicitPath) {
    const envPath = path.resolve(workspaceRoot, explicitPath);
    if (fs.existsSync(envPath)) {
      logger.info(`Using workflow configuration from WORKFLOWS_CONFIG_PATH: ${envPath}`);
      return envPath;
    }
    logger.warn(`WORKFLOWS_CONFIG_PATH is set to ${envPath}, but the file was not found.`);
  }

  const workspacePath = path.join(stateDir, 'workflows.yaml');
  if (fs.existsSync(workspacePath)) {
    logger.info(`Using workspace workflow configuration: ${workspacePath}`);
    return workspacePath;
  }

  logger.debug(`Using default workflow configuration: ${DEFAULT_WORKFLOWS_PATH}`);
  return DEFAULT_WORKFLOWS_PATH;
}

/**
 * Reads server settings from the environment.
 *
 * @throws {ConfigurationError} when a variable has an invalid value.
 */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const summary = result.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid environment configuration: ${summary}`, {
      validationIssues: result.error.issues
    });
  }

  const vars = result.data;
  const workspaceRoot = path.resolve(vars.WORKSPACE_ROOT ?? process.cwd());
  const stateDir = path.resolve(workspaceRoot, vars.PHASE_STATE_DIR ?? '.st3');

  return {
    workspaceRoot,
    stateDir,
    projectsFile: path.join(stateDir, 'projects.json'),
    stateFile: path.join(stateDir, 'state.json'),
    workflowsConfigPath: resolveWorkflowsConfigPath(vars.WORKFLOWS_CONFIG_PATH, workspaceRoot, stateDir),
    commitWindow: vars.RECOVERY_COMMIT_WINDOW,
    gitTimeoutMs: vars.GIT_TIMEOUT_MS,
    ssePort: vars.SSE_PORT ?? vars.PORT ?? 3000
  };
}
