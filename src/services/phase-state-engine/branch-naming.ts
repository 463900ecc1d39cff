import { BranchFormatError } from '../../utils/workflow-errors.js';

/**
 * Extracts the issue number embedded in a branch name of the form
 * `<type>/<issue>` or `<type>/<issue>-<slug>`, where `<type>` is one of
 * `branchTypes` (case-sensitive, as git is).
 *
 * @example extractIssueNumber('epic/91-test-suite-cleanup', ['epic']) // 91
 * @throws {BranchFormatError} no issue number, or an issue number of zero.
 */
export function extractIssueNumber(branch: string, branchTypes: readonly string[]): number {
  const match = /^([^/]+)\/(\d+)(?:-|$)/.exec(branch);
  if (match && branchTypes.includes(match[1])) {
    const issueNumber = Number.parseInt(match[2], 10);
    if (Number.isSafeInteger(issueNumber) && issueNumber > 0) {
      return issueNumber;
    }
  }
  throw new BranchFormatError(branch, [...branchTypes]);
}
