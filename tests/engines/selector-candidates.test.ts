import { describe, it, expect } from 'vitest';
import { formatCandidates, splitSelectorList, toCandidates } from '../../src/engines/selector-candidates.js';

describe('splitSelectorList', () => {
  it('splits a comma-joined list and trims entries', () => {
    expect(splitSelectorList('#q,  input[name="q"] , .search')).toEqual(['#q', 'input[name="q"]', '.search']);
  });

  it('keeps commas inside quotes, parentheses and brackets', () => {
    expect(splitSelectorList(`button:has-text('Save, close'), a[title="x,y"], :is(h1, h2)`)).toEqual([
      `button:has-text('Save, close')`,
      'a[title="x,y"]',
      ':is(h1, h2)',
    ]);
  });

  it('honours escaped quotes', () => {
    expect(splitSelectorList(`[aria-label='it\\'s, here'], #b`)).toEqual([`[aria-label='it\\'s, here']`, '#b']);
  });

  it('drops empty entries', () => {
    expect(splitSelectorList(' , #a,, ')).toEqual(['#a']);
  });
});

describe('toCandidates', () => {
  it('returns an empty list for missing targets', () => {
    expect(toCandidates(undefined)).toEqual([]);
    expect(toCandidates(null)).toEqual([]);
    expect(toCandidates('')).toEqual([]);
  });

  it('flattens arrays of possibly joined selectors', () => {
    expect(toCandidates(['#a, #b', '#c'])).toEqual(['#a', '#b', '#c']);
  });
});

describe('formatCandidates', () => {
  it('joins with a comma and a space', () => {
    expect(formatCandidates(['#a', '#b'])).toBe('#a, #b');
  });
});
