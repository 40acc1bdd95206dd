import type { SelectorCandidate } from '../types/index.js';

/**
 * Splits a comma-joined selector list into ordered candidates. Commas inside
 * quotes, parentheses or brackets belong to the selector
 * (e.g. `button:has-text('Save, close')`).
 */
export function splitSelectorList(raw: string): SelectorCandidate[] {
  const candidates: SelectorCandidate[] = [];
  let current = '';
  let depth = 0;
  let quote: '"' | "'" | null = null;

  for (let i = 0; i < raw.length; i++) {
    const ch = raw[i];

    if (quote) {
      current += ch;
      if (ch === '\\' && i + 1 < raw.length) {
        current += raw[++i];
      } else if (ch === quote) {
        quote = null;
      }
      continue;
    }

    if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === '(' || ch === '[') {
      depth++;
    } else if ((ch === ')' || ch === ']') && depth > 0) {
      depth--;
    } else if (ch === ',' && depth === 0) {
      pushCandidate(candidates, current);
      current = '';
      continue;
    }
    current += ch;
  }
  pushCandidate(candidates, current);

  return candidates;
}

export function toCandidates(target: string | readonly string[] | null | undefined): SelectorCandidate[] {
  if (target == null) return [];
  if (typeof target === 'string') return splitSelectorList(target);
  return target.flatMap((entry) => splitSelectorList(entry));
}

export function formatCandidates(candidates: readonly SelectorCandidate[]): string {
  return candidates.join(', ');
}

function pushCandidate(candidates: SelectorCandidate[], value: string): void {
  const trimmed = value.trim();
  if (trimmed) candidates.push(trimmed);
}
