// src/utils/__tests__/gitHelper.test.ts
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { SimpleGitCollaborator } from '../gitHelper.js';
import { CollaboratorUnavailableError } from '../workflow-errors.js';

const gitMocks = vi.hoisted(() => ({
  simpleGit: vi.fn(),
  checkIsRepo: vi.fn(),
  revparse: vi.fn(),
  raw: vi.fn(),
  log: vi.fn()
}));

vi.mock('simple-git', () => ({
  simpleGit: gitMocks.simpleGit
}));

function rawResponses(responses: Record<string, string | Error>): void {
  gitMocks.raw.mockImplementation(async (args: string[]) => {
    const response = responses[args[0]];
    if (response instanceof Error) {
      throw response;
    }
    return response ?? '';
  });
}

describe('SimpleGitCollaborator', () => {
  beforeEach(() => {
    gitMocks.simpleGit.mockReturnValue({
      checkIsRepo: gitMocks.checkIsRepo,
      revparse: gitMocks.revparse,
      raw: gitMocks.raw,
      log: gitMocks.log
    });
    gitMocks.checkIsRepo.mockResolvedValue(true);
    gitMocks.revparse.mockResolvedValue('feature/42-login\n');
    rawResponses({ 'rev-list': 'a1b2c3\n' });
    gitMocks.log.mockResolvedValue({ all: [], total: 0, latest: null });
  });

  describe('getCurrentBranch', () => {
    it('returns the checked-out branch name', async () => {
      const git = new SimpleGitCollaborator('/workspace');

      await expect(git.getCurrentBranch()).resolves.toBe('feature/42-login');
      expect(gitMocks.simpleGit).toHaveBeenCalledWith(expect.objectContaining({ baseDir: '/workspace' }));
      expect(gitMocks.revparse).toHaveBeenCalledWith(['--abbrev-ref', 'HEAD']);
    });

    it('rejects a detached HEAD', async () => {
      gitMocks.revparse.mockResolvedValue('HEAD\n');
      const git = new SimpleGitCollaborator('/workspace');

      const attempt = git.getCurrentBranch();
      await expect(attempt).rejects.toBeInstanceOf(CollaboratorUnavailableError);
      await expect(attempt).rejects.toThrow('Git unavailable: HEAD is detached.');
    });

    it('names an unborn branch through its symbolic ref', async () => {
      gitMocks.revparse.mockRejectedValue(new Error("ambiguous argument 'HEAD'"));
      rawResponses({ 'symbolic-ref': 'main\n' });
      const git = new SimpleGitCollaborator('/workspace');

      await expect(git.getCurrentBranch()).resolves.toBe('main');
    });

    it('rejects outside a repository', async () => {
      gitMocks.checkIsRepo.mockResolvedValue(false);
      const git = new SimpleGitCollaborator('/workspace');

      await expect(git.getCurrentBranch()).rejects.toThrow('Git unavailable: workspace is not a git repository.');
    });

    it('rejects when the git client cannot be created', async () => {
      gitMocks.simpleGit.mockImplementation(() => {
        throw new Error('Cannot use simple-git on a directory that does not exist');
      });
      const git = new SimpleGitCollaborator('/missing');

      await expect(git.getCurrentBranch()).rejects.toThrow(
        'Git unavailable: git is not usable in the workspace: Cannot use simple-git on a directory that does not exist.'
      );
    });
  });

  describe('getRecentCommits', () => {
    it('returns subjects most recent first, bounded by the limit', async () => {
      gitMocks.log.mockResolvedValue({
        all: [{ message: 'test: add coverage' }, { message: 'chore: initial commit' }],
        total: 2,
        latest: null
      });
      const git = new SimpleGitCollaborator('/workspace');

      await expect(git.getRecentCommits('epic/91-cleanup', 50)).resolves.toEqual([
        'test: add coverage',
        'chore: initial commit'
      ]);
      expect(gitMocks.log).toHaveBeenCalledWith(['--max-count=50', 'epic/91-cleanup']);
    });

    it('returns an empty list for a repository without commits', async () => {
      rawResponses({ 'rev-list': '' });
      const git = new SimpleGitCollaborator('/workspace');

      await expect(git.getRecentCommits('main', 50)).resolves.toEqual([]);
      expect(gitMocks.log).not.toHaveBeenCalled();
    });

    it('reports an unknown branch as unavailable', async () => {
      gitMocks.log.mockRejectedValue(new Error("fatal: bad revision 'feature/7-gone'"));
      const git = new SimpleGitCollaborator('/workspace');

      await expect(git.getRecentCommits('feature/7-gone', 10)).rejects.toThrow(
        "Git unavailable: cannot read history of 'feature/7-gone': fatal: bad revision 'feature/7-gone'."
      );
    });

    it('does not touch git for a non-positive limit', async () => {
      const git = new SimpleGitCollaborator('/workspace');

      await expect(git.getRecentCommits('main', 0)).resolves.toEqual([]);
      expect(gitMocks.checkIsRepo).not.toHaveBeenCalled();
    });
  });
});
