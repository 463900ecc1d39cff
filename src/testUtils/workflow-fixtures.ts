/**
 * Shared fixtures for workflow-state tests: temporary state directories, a
 * catalog file, a fixed clock and an in-process git stand-in.
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import type { ServerConfig } from '../utils/configLoader.js';
import type { GitCollaborator } from '../utils/gitHelper.js';
import { CollaboratorUnavailableError } from '../utils/workflow-errors.js';
import type { Clock } from '../types/workflow.js';

export const TEST_CATALOG_YAML = `version: "1.0"
branch_types: [feature, fix, bug, refactor, docs, epic, hotfix]
workflows:
  feature:
    description: Full lifecycle
    default_execution_mode: interactive
    phases: [research, planning, design, tdd, integration, documentation]
  bug:
    description: Defect fix
    default_execution_mode: interactive
    phases: [research, planning, tdd, integration, documentation]
  epic:
    description: Umbrella issue
    default_execution_mode: interactive
    phases: [research, planning, design, tdd, integration, documentation]
  docs:
    description: Documentation only
    default_execution_mode: autonomous
    phases: [planning, documentation]
phase_conventions:
  research: ["phase:research"]
  planning: ["phase:planning"]
  design: ["phase:design"]
  tdd: ["phase:tdd", "phase:red", "phase:green", "phase:refactor", "test:", "feat:", "fix:", "refactor:", "docs:"]
  integration: ["phase:integration"]
  documentation: ["phase:documentation", "phase:docs"]
`;

export const FIXED_NOW = '2025-03-01T12:00:00.000Z';

export async function makeTempDir(prefix = 'phase-state-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function writeCatalog(dir: string, content: string = TEST_CATALOG_YAML): Promise<string> {
  const filePath = path.join(dir, 'workflows.yaml');
  await fs.writeFile(filePath, content, 'utf-8');
  return filePath;
}

export function testServerConfig(workspaceRoot: string, workflowsConfigPath: string): ServerConfig {
  const stateDir = path.join(workspaceRoot, '.st3');
  return {
    workspaceRoot,
    stateDir,
    projectsFile: path.join(stateDir, 'projects.json'),
    stateFile: path.join(stateDir, 'state.json'),
    workflowsConfigPath,
    commitWindow: 50,
    gitTimeoutMs: 1000,
    ssePort: 3000
  };
}

/** Clock returning FIXED_NOW plus one second per call. */
export function steppingClock(start: string = FIXED_NOW): Clock {
  let tick = 0;
  const base = Date.parse(start);
  return () => new Date(base + 1000 * tick++);
}

/**
 * GitCollaborator holding commit subjects per branch in memory.
 */
export class FakeGit implements GitCollaborator {
  currentBranch: string | null = null;
  readonly history = new Map<string, string[]>();
  failure: Error | null = null;
  delayMs = 0;
  readonly calls: Array<{ branch: string; limit: number }> = [];

  async getCurrentBranch(): Promise<string> {
    if (this.currentBranch === null) {
      throw new CollaboratorUnavailableError('git', 'HEAD is detached');
    }
    return this.currentBranch;
  }

  async getRecentCommits(branch: string, limit: number): Promise<string[]> {
    this.calls.push({ branch, limit });
    if (this.delayMs > 0) {
      await new Promise(resolve => setTimeout(resolve, this.delayMs));
    }
    if (this.failure) {
      throw this.failure;
    }
    return (this.history.get(branch) ?? []).slice(0, limit);
  }
}

/** Text of one content part of a tool result. */
export function textOf(result: CallToolResult, index: number): string {
  const part = result.content[index];
  if (!part || part.type !== 'text') {
    throw new Error(`content[${index}] is not a text part`);
  }
  return part.text;
}
