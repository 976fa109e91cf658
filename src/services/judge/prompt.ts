import type { RubricNode } from '../../domain/types.js';
import type { EvaluationContext, JudgePrompt } from './types.js';

const DEFAULT_MAX_EXCERPT_CHARS = 12_000;

export const VERDICT_FORMAT = `Respond with a single JSON object inside a \`\`\`json code block:
{
  "score": <number between 0 and 1>,
  "critique": "<one or two sentences>",
  "issues": ["<short problem statement>", ...],
  "improvement_ops": ["<short actionable instruction>", ...]
}
Only the score decides what happens next. Keep issues and improvement_ops short and specific.`;

export function formatExcerpt(value: unknown, maxChars = DEFAULT_MAX_EXCERPT_CHARS): string {
  let text: string;
  if (typeof value === 'string') {
    text = value;
  } else {
    try {
      text = JSON.stringify(value, null, 2) ?? String(value);
    } catch {
      text = String(value);
    }
  }

  if (text.length <= maxChars) return text;
  return `${text.slice(0, maxChars)}\n... [truncated ${text.length - maxChars} characters]`;
}

function formatCriteria(node: RubricNode): string {
  const entries = Object.entries(node.criteria);
  if (entries.length === 0) return '- Judge overall fitness for the goal.';

  return entries
    .map(([name, criterion]) => {
      const header = criterion.description ? `- ${name}: ${criterion.description}` : `- ${name}`;
      const checks = criterion.checks.map((check) => `  - ${check}`);
      return [header, ...checks].join('\n');
    })
    .join('\n');
}

function formatFeedback(feedback: readonly string[]): string {
  if (feedback.length === 0) return 'None. This is the first evaluation for this step.';
  return feedback.map((op, i) => `${i + 1}. ${op}`).join('\n');
}

export interface JudgePromptInput {
  systemPrompt: string;
  stepKind: string;
  node: RubricNode;
  context: EvaluationContext;
  feedback: readonly string[];
  attempt: number;
  maxAttempts: number;
  maxExcerptChars?: number;
}

export function buildJudgePrompt(input: JudgePromptInput): JudgePrompt {
  const { context, maxExcerptChars } = input;
  const sections = [
    `## Step\n${input.stepKind} (attempt ${input.attempt} of ${input.maxAttempts})`,
    `## Goal\n${context.goal ?? input.node.description}`,
    `## Criteria\n${formatCriteria(input.node)}`,
    `## Feedback already given on earlier attempts\n${formatFeedback(input.feedback)}`,
  ];

  if (context.input !== undefined) {
    sections.push(`## Step input\n${formatExcerpt(context.input, maxExcerptChars)}`);
  }
  sections.push(`## Candidate output\n${formatExcerpt(context.output, maxExcerptChars)}`);
  if (context.notes && Object.keys(context.notes).length > 0) {
    sections.push(`## Notes\n${formatExcerpt(context.notes, maxExcerptChars)}`);
  }
  sections.push(`## Answer format\n${VERDICT_FORMAT}`);

  return { system: input.systemPrompt, user: sections.join('\n\n') };
}
