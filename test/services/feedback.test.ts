import { describe, it, expect } from 'vitest';
import { FeedbackMemory, normalizeFeedback } from '../../src/services/feedback/index.js';

describe('normalizeFeedback', () => {
  it('trims and lowercases', () => {
    expect(normalizeFeedback('  Add Units ')).toBe('add units');
  });
});

describe('FeedbackMemory', () => {
  it('stores operations per step kind in insertion order', () => {
    const memory = new FeedbackMemory();

    expect(memory.add('parse', ['Add units', 'Cite the page'])).toEqual(['Add units', 'Cite the page']);
    memory.add('generate', ['Shorten the summary']);

    expect(memory.get('parse')).toEqual(['Add units', 'Cite the page']);
    expect(memory.get('generate')).toEqual(['Shorten the summary']);
    expect(memory.get('retrieve')).toEqual([]);
  });

  it('ignores duplicates that differ only in case and whitespace', () => {
    const memory = new FeedbackMemory();
    memory.add('parse', ['Add units']);

    expect(memory.add('parse', ['  add UNITS', 'Keep dates ISO'])).toEqual(['Keep dates ISO']);
    expect(memory.get('parse')).toEqual(['Add units', 'Keep dates ISO']);
  });

  it('skips blank operations', () => {
    const memory = new FeedbackMemory();
    expect(memory.add('parse', ['', '   '])).toEqual([]);
    expect(memory.size('parse')).toBe(0);
  });

  it('evicts the oldest entries beyond the cap', () => {
    const memory = new FeedbackMemory({ maxItems: 3 });
    memory.add('parse', ['one', 'two']);

    expect(memory.add('parse', ['three', 'four'])).toEqual(['three', 'four']);
    expect(memory.get('parse')).toEqual(['two', 'three', 'four']);
    expect(memory.size('parse')).toBe(3);
  });

  it('does not report operations evicted in the same call', () => {
    const memory = new FeedbackMemory({ maxItems: 2 });

    expect(memory.add('parse', ['a', 'b', 'c'])).toEqual(['b', 'c']);
  });

  it('accepts a previously evicted operation again', () => {
    const memory = new FeedbackMemory({ maxItems: 1 });
    memory.add('parse', ['first']);
    memory.add('parse', ['second']);

    expect(memory.add('parse', ['first'])).toEqual(['first']);
    expect(memory.get('parse')).toEqual(['first']);
  });

  it('clears a single step kind', () => {
    const memory = new FeedbackMemory();
    memory.add('parse', ['a']);
    memory.add('generate', ['b']);

    memory.clear('parse');

    expect(memory.get('parse')).toEqual([]);
    expect(memory.get('generate')).toEqual(['b']);
  });

  it('returns a copy from get', () => {
    const memory = new FeedbackMemory();
    memory.add('parse', ['a']);

    memory.get('parse').push('b');

    expect(memory.get('parse')).toEqual(['a']);
  });
});
