import { describe, it, expect } from 'vitest';
import { AppError } from '../errors.js';
import {
  ApprovalRequiredError,
  CollaboratorUnavailableError,
  InvalidTransitionError,
  PlanNotFoundError,
  SkipReasonRequiredError,
  StateCorruptError,
  UnknownWorkflowError
} from '../workflow-errors.js';

describe('workflow errors', () => {
  it('end their message with the next step and carry it in context', () => {
    const error = new PlanNotFoundError(42, 'feature/42-login');

    expect(error).toBeInstanceOf(AppError);
    expect(error.name).toBe('PlanNotFoundError');
    expect(error.message).toBe(
      "Project plan not found for issue 42 (branch 'feature/42-login'). Next step: call initialize-project for issue 42 first"
    );
    expect(error.context).toEqual({
      issueNumber: 42,
      branch: 'feature/42-login',
      nextStep: 'call initialize-project for issue 42 first'
    });
  });

  it('lists the available workflows for an unknown one', () => {
    const error = new UnknownWorkflowError('spike', ['feature', 'bug']);

    expect(error.message).toBe("Unknown workflow 'spike'. Next step: choose one of: feature, bug");
  });

  it('treats a missing skip reason as an invalid transition', () => {
    const error = new SkipReasonRequiredError('feature/42-login', 'tdd');

    expect(error).toBeInstanceOf(InvalidTransitionError);
    expect(error.name).toBe('SkipReasonRequiredError');
    expect(error.fromPhase).toBeNull();
    expect(error.message).toMatch(/^Invalid transition on branch 'feature\/42-login' to 'tdd': /);
  });

  it('names the branch, target and issue when approval is missing', () => {
    const error = new ApprovalRequiredError('bug/7-crash', 'planning', 7);

    expect(error.context).toMatchObject({ branch: 'bug/7-crash', toPhase: 'planning', issueNumber: 7 });
  });

  it('keeps the raw content of corrupt state', () => {
    const error = new StateCorruptError('/tmp/state.json', 'file is not valid JSON', '{"broken":');

    expect(error.rawContent).toBe('{"broken":');
    expect(error.context).toMatchObject({ filePath: '/tmp/state.json', rawContent: '{"broken":' });
  });

  it('distinguishes git from persistence failures', () => {
    const original = new Error('EACCES');
    const error = new CollaboratorUnavailableError('persistence', 'cannot write state.json: EACCES', {}, original);

    expect(error.collaborator).toBe('persistence');
    expect(error.originalError).toBe(original);
    expect(error.message).toMatch(/^Persistence unavailable: cannot write state.json: EACCES\. Next step: /);
  });
});
