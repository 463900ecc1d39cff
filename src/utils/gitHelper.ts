// src/utils/gitHelper.ts
import { simpleGit, type SimpleGit, type SimpleGitOptions } from 'simple-git';
import logger from '../logger.js';
import { CollaboratorUnavailableError } from './workflow-errors.js';

/**
 * Read-only view of the repository the phase-state engine needs.
 */
export interface GitCollaborator {
  /**
   * @throws {CollaboratorUnavailableError} not a repository, or HEAD is detached.
   */
  getCurrentBranch(): Promise<string>;
  /**
   * Commit subjects on `branch`, most recent first, at most `limit` of them.
   * Resolves to an empty list for a repository without commits.
   *
   * @throws {CollaboratorUnavailableError} not a repository, unknown branch or log failure.
   */
  getRecentCommits(branch: string, limit: number): Promise<string[]>;
}

function unavailable(detail: string, baseDir: string, error?: unknown): CollaboratorUnavailableError {
  const reason = error instanceof Error ? `${detail}: ${error.message}` : detail;
  return new CollaboratorUnavailableError(
    'git',
    reason,
    { baseDir },
    error instanceof Error ? error : undefined
  );
}

/**
 * GitCollaborator backed by simple-git, rooted at the workspace directory.
 */
export class SimpleGitCollaborator implements GitCollaborator {
  private client: SimpleGit | null = null;

  constructor(private readonly baseDir: string) {}

  async getCurrentBranch(): Promise<string> {
    const git = await this.repository();

    let name: string;
    try {
      name = (await git.revparse(['--abbrev-ref', 'HEAD'])).trim();
    } catch (revparseError) {
      // An unborn branch has no commit for HEAD to resolve to, but still has a name
      logger.debug({ err: revparseError, baseDir: this.baseDir }, 'rev-parse HEAD failed, reading symbolic ref');
      try {
        name = (await git.raw(['symbolic-ref', '--short', 'HEAD'])).trim();
      } catch (symbolicRefError) {
        throw unavailable('cannot resolve HEAD', this.baseDir, symbolicRefError);
      }
    }

    if (name === '' || name === 'HEAD') {
      throw unavailable('HEAD is detached', this.baseDir);
    }
    return name;
  }

  async getRecentCommits(branch: string, limit: number): Promise<string[]> {
    if (!Number.isInteger(limit) || limit <= 0) {
      return [];
    }

    const git = await this.repository();
    if (!(await this.hasCommits(git))) {
      logger.debug({ baseDir: this.baseDir, branch }, 'Repository has no commits');
      return [];
    }

    try {
      const history = await git.log([`--max-count=${limit}`, branch]);
      return history.all.map(entry => entry.message);
    } catch (error) {
      throw unavailable(`cannot read history of '${branch}'`, this.baseDir, error);
    }
  }

  private async repository(): Promise<SimpleGit> {
    let git: SimpleGit;
    let isRepo: boolean;
    try {
      git = this.client ?? this.createClient();
      isRepo = await git.checkIsRepo();
    } catch (error) {
      throw unavailable('git is not usable in the workspace', this.baseDir, error);
    }
    if (!isRepo) {
      throw unavailable('workspace is not a git repository', this.baseDir);
    }
    this.client = git;
    return git;
  }

  private createClient(): SimpleGit {
    const options: Partial<SimpleGitOptions> = {
      baseDir: this.baseDir,
      binary: 'git',
      maxConcurrentProcesses: 6,
      trimmed: false
    };
    return simpleGit(options);
  }

  private async hasCommits(git: SimpleGit): Promise<boolean> {
    try {
      const head = await git.raw(['rev-list', '-n', '1', '--all']);
      return head.trim() !== '';
    } catch (error) {
      throw unavailable('cannot list commits', this.baseDir, error);
    }
  }
}
