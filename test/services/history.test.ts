import { describe, it, expect } from 'vitest';
import { ExecutionHistory } from '../../src/services/history/index.js';
import type { StepExecutionRecord } from '../../src/domain/types.js';

function record(overrides: Partial<StepExecutionRecord> = {}): StepExecutionRecord {
  return {
    runId: 'run-1',
    stepKind: 'parse',
    attempt: 1,
    output: { site: 'North' },
    verdict: {
      score: 0.5,
      decision: 'RETRY',
      critique: 'Missing units',
      issues: ['no units'],
      improvementOps: ['Add units'],
      parseFailed: false,
    },
    state: 'RETRYING',
    feedbackProvided: [],
    failure: null,
    startedAt: '2026-03-01T10:00:00.000Z',
    completedAt: '2026-03-01T10:00:01.000Z',
    ...overrides,
  };
}

describe('ExecutionHistory', () => {
  it('keeps records in append order and filters by step', () => {
    const history = new ExecutionHistory();
    history.append(record());
    history.append(record({ stepKind: 'generate' }));
    history.append(record({ attempt: 2, state: 'ACCEPTED' }));

    expect(history.size).toBe(3);
    expect(history.all().map((r) => `${r.stepKind}#${r.attempt}`)).toEqual(['parse#1', 'generate#1', 'parse#2']);
    expect(history.forStep('parse').map((r) => r.state)).toEqual(['RETRYING', 'ACCEPTED']);
  });

  it('freezes appended records and their nested lists', () => {
    const history = new ExecutionHistory();
    const appended = history.append(record({ feedbackProvided: ['Add units'] }));

    expect(Object.isFrozen(appended)).toBe(true);
    expect(Object.isFrozen(appended.feedbackProvided)).toBe(true);
    expect(Object.isFrozen(appended.verdict)).toBe(true);
    expect(Object.isFrozen(appended.verdict?.improvementOps)).toBe(true);
  });

  it('is not affected by later changes to the caller arrays', () => {
    const history = new ExecutionHistory();
    const feedback = ['Add units'];
    const ops = ['Cite pages'];
    const input = record({ feedbackProvided: feedback });
    if (input.verdict) input.verdict.improvementOps = ops;

    history.append(input);
    feedback.push('later');
    ops.push('later');

    expect(history.all()[0].feedbackProvided).toEqual(['Add units']);
    expect(history.all()[0].verdict?.improvementOps).toEqual(['Cite pages']);
  });

  it('returns a copy of the record list', () => {
    const history = new ExecutionHistory();
    history.append(record());

    const copy = [...history.all()];
    copy.pop();

    expect(history.size).toBe(1);
  });
});
