import { logger } from '../../infrastructure/logger.js';

export { StagnationDetector, type StagnationDetectorOptions } from './stagnation.js';

const log = logger.child({ module: 'feedback-memory' });

export const DEFAULT_FEEDBACK_MAX_ITEMS = 10;

export interface FeedbackMemoryOptions {
  maxItems?: number;
}

interface FeedbackEntry {
  key: string;
  text: string;
}

export function normalizeFeedback(op: string): string {
  return op.trim().toLowerCase();
}

/**
 * Bounded, deduplicated improvement operations per step-kind.
 * Entries keep insertion order; once the cap is reached the oldest entry is evicted.
 */
export class FeedbackMemory {
  private readonly maxItems: number;
  private readonly entries = new Map<string, FeedbackEntry[]>();

  constructor(options: FeedbackMemoryOptions = {}) {
    this.maxItems = Math.max(1, Math.floor(options.maxItems ?? DEFAULT_FEEDBACK_MAX_ITEMS));
  }

  /** Returns the operations that were actually stored. */
  add(stepKind: string, ops: readonly string[]): string[] {
    const stored = this.entries.get(stepKind) ?? [];
    const added: string[] = [];

    for (const op of ops) {
      const key = normalizeFeedback(op);
      if (!key || stored.some((entry) => entry.key === key)) continue;
      stored.push({ key, text: op.trim() });
      added.push(op.trim());
    }

    const overflow = stored.length - this.maxItems;
    if (overflow > 0) {
      stored.splice(0, overflow);
      log.debug({ stepKind, evicted: overflow, maxItems: this.maxItems }, 'Evicted oldest feedback');
    }

    this.entries.set(stepKind, stored);
    return added.filter((text) => stored.some((entry) => entry.text === text));
  }

  get(stepKind: string): string[] {
    return (this.entries.get(stepKind) ?? []).map((entry) => entry.text);
  }

  size(stepKind: string): number {
    return this.entries.get(stepKind)?.length ?? 0;
  }

  clear(stepKind: string): void {
    this.entries.delete(stepKind);
  }
}
