import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs-extra';
import path from 'path';
import { DEFAULT_WORKFLOWS_PATH, loadServerConfig } from '../configLoader.js';
import { ConfigurationError } from '../errors.js';
import { makeTempDir } from '../../testUtils/workflow-fixtures.js';

describe('loadServerConfig', () => {
  let workspace: string;

  beforeEach(async () => {
    workspace = await makeTempDir('phase-state-config-');
  });

  afterEach(async () => {
    await fs.remove(workspace);
  });

  it('applies defaults relative to the workspace root', () => {
    const config = loadServerConfig({ WORKSPACE_ROOT: workspace });

    expect(config).toEqual({
      workspaceRoot: workspace,
      stateDir: path.join(workspace, '.st3'),
      projectsFile: path.join(workspace, '.st3', 'projects.json'),
      stateFile: path.join(workspace, '.st3', 'state.json'),
      workflowsConfigPath: DEFAULT_WORKFLOWS_PATH,
      commitWindow: 50,
      gitTimeoutMs: 5000,
      ssePort: 3000
    });
  });

  it('points the shipped default at config/workflows.yaml', () => {
    expect(path.basename(DEFAULT_WORKFLOWS_PATH)).toBe('workflows.yaml');
    expect(path.basename(path.dirname(DEFAULT_WORKFLOWS_PATH))).toBe('config');
    expect(fs.existsSync(DEFAULT_WORKFLOWS_PATH)).toBe(true);
  });

  it('reads numeric settings and prefers SSE_PORT over PORT', () => {
    const config = loadServerConfig({
      WORKSPACE_ROOT: workspace,
      PHASE_STATE_DIR: 'state',
      RECOVERY_COMMIT_WINDOW: '20',
      GIT_TIMEOUT_MS: '750',
      SSE_PORT: '4100',
      PORT: '4200'
    });

    expect(config.stateDir).toBe(path.join(workspace, 'state'));
    expect(config.commitWindow).toBe(20);
    expect(config.gitTimeoutMs).toBe(750);
    expect(config.ssePort).toBe(4100);
  });

  it('treats blank variables as unset', () => {
    const config = loadServerConfig({ WORKSPACE_ROOT: workspace, GIT_TIMEOUT_MS: ' ', PORT: '' });

    expect(config.gitTimeoutMs).toBe(5000);
    expect(config.ssePort).toBe(3000);
  });

  it('rejects invalid values with a ConfigurationError', () => {
    expect(() => loadServerConfig({ WORKSPACE_ROOT: workspace, RECOVERY_COMMIT_WINDOW: 'many' }))
      .toThrow(ConfigurationError);
    expect(() => loadServerConfig({ WORKSPACE_ROOT: workspace, SSE_PORT: '70000' }))
      .toThrow(/^Invalid environment configuration: SSE_PORT:/);
  });

  describe('workflow configuration lookup', () => {
    it('prefers an existing WORKFLOWS_CONFIG_PATH, resolved against the workspace', async () => {
      await fs.outputFile(path.join(workspace, 'custom', 'flows.yaml'), 'version: "1.0"\n');
      await fs.outputFile(path.join(workspace, '.st3', 'workflows.yaml'), 'version: "1.0"\n');

      const config = loadServerConfig({ WORKSPACE_ROOT: workspace, WORKFLOWS_CONFIG_PATH: 'custom/flows.yaml' });

      expect(config.workflowsConfigPath).toBe(path.join(workspace, 'custom', 'flows.yaml'));
    });

    it('falls back to workflows.yaml in the state directory', async () => {
      await fs.outputFile(path.join(workspace, '.st3', 'workflows.yaml'), 'version: "1.0"\n');

      const config = loadServerConfig({ WORKSPACE_ROOT: workspace, WORKFLOWS_CONFIG_PATH: 'missing.yaml' });

      expect(config.workflowsConfigPath).toBe(path.join(workspace, '.st3', 'workflows.yaml'));
    });
  });
});
