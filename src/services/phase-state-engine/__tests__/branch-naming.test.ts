import { describe, it, expect } from 'vitest';
import { extractIssueNumber } from '../branch-naming.js';
import { BranchFormatError } from '../../../utils/workflow-errors.js';

const TYPES = ['feature', 'fix', 'bug', 'refactor', 'docs', 'epic', 'hotfix'];

describe('extractIssueNumber', () => {
  it.each([
    ['epic/91-test-suite-cleanup', 91],
    ['feature/42-login-form', 42],
    ['fix/7', 7],
    ['docs/0012-readme', 12]
  ])('reads %s as issue %i', (branch, expected) => {
    expect(extractIssueNumber(branch, TYPES)).toBe(expected);
  });

  it.each([
    'main',
    'feature/login-form',
    'feature/42login',
    'spike/42-idea',
    'feature/0-zero',
    'users/feature/42-nested'
  ])('rejects %s', (branch) => {
    expect(() => extractIssueNumber(branch, TYPES)).toThrow(BranchFormatError);
  });

  it('explains the expected format', () => {
    expect(() => extractIssueNumber('main', ['feature', 'bug'])).toThrow(
      "Cannot extract issue number from branch 'main'. Next step: name the branch <type>/<issue>-<slug> with type one of feature, bug, or pass issue_number explicitly"
    );
  });
});
