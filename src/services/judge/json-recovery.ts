/**
 * Recovers a JSON object from free-text model output.
 *
 * Strategies run in order and the first one that yields a plain object wins:
 * 1. `direct`: the whole text parses as an object
 * 2. `unwrapped`: the text inside a markdown code fence parses as an object
 * 3. `balanced_block`: the first balanced `{...}` block that parses as an object
 */

export type RecoveryStrategy = 'direct' | 'unwrapped' | 'balanced_block';

export interface RecoveredJson {
  value: Record<string, unknown>;
  strategy: RecoveryStrategy;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseObject(candidate: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(candidate);
    return isPlainObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

export function parseDirect(raw: string): Record<string, unknown> | null {
  const trimmed = raw.trim();
  return trimmed.length > 0 ? parseObject(trimmed) : null;
}

/**
 * Returns the body of the first code fence (```json ... ``` or ``` ... ```).
 * An opening fence without a closing one yields everything after it.
 * Returns null when the text carries no fence.
 */
export function stripWrapperMarkers(raw: string): string | null {
  const closed = /```[a-zA-Z]*[ \t]*\r?\n?([\s\S]*?)```/.exec(raw);
  if (closed) {
    return closed[1].trim();
  }

  const open = /```[a-zA-Z]*[ \t]*\r?\n?([\s\S]*)$/.exec(raw);
  if (open) {
    return open[1].trim();
  }

  return null;
}

export function parseUnwrapped(raw: string): Record<string, unknown> | null {
  const body = stripWrapperMarkers(raw);
  return body === null ? null : parseObject(body);
}

/** Finds balanced `{...}` spans in order, ignoring braces inside string literals. */
export function findBalancedBlocks(raw: string): string[] {
  const blocks: string[] = [];

  for (let start = raw.indexOf('{'); start !== -1; start = raw.indexOf('{', start + 1)) {
    let depth = 0;
    let inString = false;
    let escaping = false;

    for (let i = start; i < raw.length; i += 1) {
      const char = raw[i];

      if (inString) {
        if (escaping) {
          escaping = false;
        } else if (char === '\\') {
          escaping = true;
        } else if (char === '"') {
          inString = false;
        }
        continue;
      }

      if (char === '"') {
        inString = true;
      } else if (char === '{') {
        depth += 1;
      } else if (char === '}') {
        depth -= 1;
        if (depth === 0) {
          blocks.push(raw.slice(start, i + 1));
          break;
        }
      }
    }
  }

  return blocks;
}

export function parseBalancedBlock(raw: string): Record<string, unknown> | null {
  for (const block of findBalancedBlocks(raw)) {
    const parsed = parseObject(block);
    if (parsed) {
      return parsed;
    }
  }
  return null;
}

const STRATEGIES: ReadonlyArray<{ name: RecoveryStrategy; apply: (raw: string) => Record<string, unknown> | null }> = [
  { name: 'direct', apply: parseDirect },
  { name: 'unwrapped', apply: parseUnwrapped },
  { name: 'balanced_block', apply: parseBalancedBlock },
];

export function recoverJsonObject(raw: string): RecoveredJson | null {
  for (const strategy of STRATEGIES) {
    const value = strategy.apply(raw);
    if (value) {
      return { value, strategy: strategy.name };
    }
  }
  return null;
}
