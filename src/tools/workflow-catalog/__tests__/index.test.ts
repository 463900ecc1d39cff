// src/tools/workflow-catalog/__tests__/index.test.ts
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs-extra';
import { listWorkflows, reloadWorkflowConfig } from '../index.js';
import { executeTool } from '../../../services/routing/toolRegistry.js';
import { createServices, type ToolServices } from '../../../services/service-container.js';
import {
  FakeGit,
  makeTempDir,
  TEST_CATALOG_YAML,
  testServerConfig,
  textOf,
  writeCatalog
} from '../../../testUtils/workflow-fixtures.js';

describe('workflow catalog tools', () => {
  let dir: string;
  let catalogPath: string;
  let services: ToolServices;

  beforeEach(async () => {
    dir = await makeTempDir('phase-state-catalog-');
    catalogPath = await writeCatalog(dir);
    services = createServices(testServerConfig(dir, catalogPath), { git: new FakeGit() });
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('list-workflows summarizes the configured workflows', async () => {
    const result = await listWorkflows({}, services);

    expect(textOf(result, 0)).toBe('4 workflows available: feature, bug, epic, docs');
    const payload = JSON.parse(textOf(result, 1));
    expect(payload.version).toBe('1.0');
    expect(payload.workflows[3]).toEqual({
      name: 'docs',
      phases: ['planning', 'documentation'],
      default_execution_mode: 'autonomous',
      description: 'Documentation only'
    });
  });

  it('reload-workflow-config picks up an edited file', async () => {
    await listWorkflows({}, services);
    await writeCatalog(
      dir,
      TEST_CATALOG_YAML.replace(
        '  docs:\n',
        '  chore:\n    phases: [tdd]\n  docs:\n'
      )
    );

    const result = await reloadWorkflowConfig({}, services);

    expect(textOf(result, 0)).toBe(`Workflow configuration reloaded from ${catalogPath}`);
    const payload = JSON.parse(textOf(result, 1));
    expect(payload.workflows).toEqual(['feature', 'bug', 'epic', 'chore', 'docs']);
    expect(payload.freshness.sha256).toMatch(/^[0-9a-f]{64}$/);
  });

  it('reports an invalid catalog as a configuration error', async () => {
    await writeCatalog(dir, 'workflows: [');

    const result = await executeTool('reload-workflow-config', {}, services);

    expect(result.isError).toBe(true);
    expect(result.errorDetails).toMatchObject({ type: 'ConfigurationError' });
  });
});
