import { describe, it, expect } from 'vitest';
import { buildJudgePrompt, formatExcerpt, VERDICT_FORMAT } from '../../../src/services/judge/prompt.js';
import type { RubricNode } from '../../../src/domain/types.js';

const node: RubricNode = {
  description: 'Extract the sampling site name',
  criteria: {
    accuracy: { description: 'Values match the text', checks: ['no invented sites', 'keep spelling'] },
    brevity: { checks: [] },
  },
};

describe('formatExcerpt', () => {
  it('keeps strings as they are', () => {
    expect(formatExcerpt('plain text')).toBe('plain text');
  });

  it('pretty prints structured values', () => {
    expect(formatExcerpt({ a: 1 })).toBe('{\n  "a": 1\n}');
  });

  it('truncates long text and reports how much was cut', () => {
    expect(formatExcerpt('abcdefghij', 4)).toBe('abcd\n... [truncated 6 characters]');
  });
});

describe('buildJudgePrompt', () => {
  it('lays out every section in order', () => {
    const prompt = buildJudgePrompt({
      systemPrompt: 'system text',
      stepKind: 'parse',
      node,
      context: { input: 'Site: North Marsh', output: { site: 'North Marsh' }, notes: { fieldCount: 1 } },
      feedback: ['Use the exact spelling', 'Drop the prefix'],
      attempt: 2,
      maxAttempts: 3,
    });

    expect(prompt.system).toBe('system text');
    expect(prompt.user).toBe(
      [
        '## Step\nparse (attempt 2 of 3)',
        '## Goal\nExtract the sampling site name',
        '## Criteria\n- accuracy: Values match the text\n  - no invented sites\n  - keep spelling\n- brevity',
        '## Feedback already given on earlier attempts\n1. Use the exact spelling\n2. Drop the prefix',
        '## Step input\nSite: North Marsh',
        '## Candidate output\n{\n  "site": "North Marsh"\n}',
        '## Notes\n{\n  "fieldCount": 1\n}',
        `## Answer format\n${VERDICT_FORMAT}`,
      ].join('\n\n'),
    );
  });

  it('prefers the context goal and marks a first evaluation', () => {
    const prompt = buildJudgePrompt({
      systemPrompt: 'system text',
      stepKind: 'parse',
      node: { description: 'unused', criteria: {} },
      context: { goal: 'Find the site', output: 'North Marsh' },
      feedback: [],
      attempt: 1,
      maxAttempts: 1,
    });

    expect(prompt.user).toBe(
      [
        '## Step\nparse (attempt 1 of 1)',
        '## Goal\nFind the site',
        '## Criteria\n- Judge overall fitness for the goal.',
        '## Feedback already given on earlier attempts\nNone. This is the first evaluation for this step.',
        '## Candidate output\nNorth Marsh',
        `## Answer format\n${VERDICT_FORMAT}`,
      ].join('\n\n'),
    );
  });
});
