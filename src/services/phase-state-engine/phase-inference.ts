/**
 * Phase inference from commit subjects.
 *
 * Pure functions; no git or filesystem access. Used by branch-state recovery
 * when no persisted state exists.
 */

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Builds the matcher for one convention signature.
 *
 * A signature ending in ":" is a conventional-commit type, so `test:` also
 * matches `test(engine): ...` and `test!: ...`. Any other signature must end
 * at a word boundary: `phase:red` matches `phase:red - failing test` but not
 * `phase:redo`.
 */
export function signatureMatcher(signature: string): RegExp {
  const trimmed = signature.trim();
  if (trimmed.endsWith(':')) {
    const type = escapeRegExp(trimmed.slice(0, -1));
    return new RegExp(`^${type}(\\([^)]*\\))?!?:`, 'i');
  }
  return new RegExp(`^${escapeRegExp(trimmed)}(?![a-z0-9])`, 'i');
}

/** First line of a commit message, without leading whitespace. */
export function commitSubject(message: string): string {
  return message.trimStart().split(/\r?\n/, 1)[0];
}

const COMMIT_SCOPE = /^[a-z]+\(([^)]+)\)!?:/i;
const PHASE_SCOPE = /^P_([a-z]+)(?:_SP_[a-z0-9_]+)?$/i;

/**
 * Phase named by a `type(P_<PHASE>[_SP_<SUBPHASE>]):` scope, lower-cased, or
 * null when the subject carries no such scope.
 *
 * @example phaseFromScope('test(P_TDD_SP_RED): failing case') // 'tdd'
 */
export function phaseFromScope(subject: string): string | null {
  const scope = COMMIT_SCOPE.exec(subject)?.[1];
  const phase = scope === undefined ? undefined : PHASE_SCOPE.exec(scope.trim())?.[1];
  return phase === undefined ? null : phase.toLowerCase();
}

/**
 * Infers how far a branch has progressed.
 *
 * Each subject votes for one plan phase. A phase scope
 * (`docs(P_PLANNING): ...`) decides the vote on its own, and a scope naming a
 * phase outside the plan votes for nothing. Other subjects are matched
 * against the convention signatures. The result is the highest-index phase
 * voted for; the order of `commitMessages` does not affect it. With no vote
 * the first phase is returned.
 */
export function inferPhase(
  requiredPhases: readonly string[],
  commitMessages: readonly string[],
  phaseConventions: Readonly<Record<string, readonly string[]>>
): string {
  if (requiredPhases.length === 0) {
    throw new RangeError('requiredPhases must not be empty');
  }

  const matchers = requiredPhases.map(phase => {
    const signatures = Object.prototype.hasOwnProperty.call(phaseConventions, phase)
      ? phaseConventions[phase]
      : [];
    return signatures.filter(signature => signature.trim() !== '').map(signatureMatcher);
  });

  let best = 0;
  for (const subject of commitMessages.map(commitSubject)) {
    const scoped = phaseFromScope(subject);
    if (scoped !== null) {
      best = Math.max(best, requiredPhases.findIndex(phase => phase.toLowerCase() === scoped));
      continue;
    }
    for (let index = requiredPhases.length - 1; index > best; index--) {
      if (matchers[index].some(matcher => matcher.test(subject))) {
        best = index;
        break;
      }
    }
  }
  return requiredPhases[best];
}
