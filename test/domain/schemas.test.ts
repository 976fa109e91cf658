import { describe, it, expect } from 'vitest';
import {
  confidenceRequestInput,
  judgeResponseSchema,
  rubricSchema,
  runRequestInput,
  DEFAULT_JUDGE_SYSTEM_PROMPT,
} from '../../src/domain/schemas.js';

describe('rubricSchema', () => {
  it('maps snake_case thresholds onto the rubric node', () => {
    const result = rubricSchema.safeParse({
      nodes: {
        parse: {
          description: 'Extract the overview',
          accept_threshold: 0.7,
          revise_min: 0.4,
          escalation_policy: 'stop',
          criteria: { completeness: { checks: ['Title present'] } },
        },
      },
    });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data).toEqual({
        defaultPrompt: DEFAULT_JUDGE_SYSTEM_PROMPT,
        nodes: {
          parse: {
            description: 'Extract the overview',
            criteria: { completeness: { checks: ['Title present'] } },
            acceptThreshold: 0.7,
            reviseMin: 0.4,
            escalationPolicy: 'stop',
          },
        },
      });
    }
  });

  it('defaults criteria checks to an empty list', () => {
    const result = rubricSchema.safeParse({
      nodes: { parse: { description: 'd', criteria: { fidelity: { description: 'No invention' } } } },
    });
    expect(result.success && result.data.nodes.parse.criteria.fidelity.checks).toEqual([]);
  });

  it('rejects revise_min above accept_threshold', () => {
    const result = rubricSchema.safeParse({
      nodes: { parse: { description: 'd', accept_threshold: 0.5, revise_min: 0.6 } },
    });
    expect(result.success).toBe(false);
  });

  it('rejects an unknown escalation policy', () => {
    const result = rubricSchema.safeParse({
      nodes: { parse: { description: 'd', escalation_policy: 'panic' } },
    });
    expect(result.success).toBe(false);
  });

  it('rejects a node without a goal description', () => {
    expect(rubricSchema.safeParse({ nodes: { parse: { criteria: {} } } }).success).toBe(false);
  });
});

describe('judgeResponseSchema', () => {
  it('accepts a numeric string score', () => {
    const result = judgeResponseSchema.safeParse({ score: ' 0.75 ' });
    expect(result.success && result.data.score).toBe(0.75);
  });

  it('degrades malformed lists and critique to empty values', () => {
    const result = judgeResponseSchema.safeParse({ score: 0.4, critique: 7, issues: 'none', improvement_ops: [1, 2] });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data).toEqual({
        score: 0.4,
        critique: '',
        issues: [],
        improvement_ops: [],
        suggestions: [],
        decision: undefined,
      });
    }
  });

  it('rejects a missing score', () => {
    expect(judgeResponseSchema.safeParse({ critique: 'fine' }).success).toBe(false);
  });

  it('rejects a non-numeric score string', () => {
    expect(judgeResponseSchema.safeParse({ score: 'high' }).success).toBe(false);
  });
});

describe('runRequestInput', () => {
  it('accepts document text with an optional run id', () => {
    expect(runRequestInput.safeParse({ documentText: 'text', runId: 'run-1' }).success).toBe(true);
    expect(runRequestInput.safeParse({ documentText: 'text' }).success).toBe(true);
  });

  it('rejects empty document text', () => {
    expect(runRequestInput.safeParse({ documentText: '' }).success).toBe(false);
  });
});

describe('confidenceRequestInput', () => {
  it('accepts null sources', () => {
    const result = confidenceRequestInput.safeParse({ sources: { judge: 0.9, validation: null } });
    expect(result.success).toBe(true);
  });

  it('rejects scores outside [0,1] and negative weights', () => {
    expect(confidenceRequestInput.safeParse({ sources: { judge: 1.2 } }).success).toBe(false);
    expect(confidenceRequestInput.safeParse({ sources: { judge: 0.5 }, weights: { judge: -1 } }).success).toBe(false);
  });
});
