import { describe, it, expect } from 'vitest';
import { buildPlanPrompt, describeElement, DEFAULT_PROMPT_LIMITS } from '../../src/planner/prompt.js';
import { emptySnapshot } from '../../src/analyzer/page-analyzer.js';
import type { ElementDescriptor, PageSnapshot } from '../../src/types/index.js';

function element(overrides: Partial<ElementDescriptor> = {}): ElementDescriptor {
  return {
    tag: 'input',
    type: null,
    id: '',
    classes: '',
    placeholder: '',
    text: '',
    ariaLabel: null,
    role: null,
    href: null,
    visible: true,
    enabled: true,
    boundingBox: null,
    ...overrides,
  };
}

function snapshot(elements: ElementDescriptor[]): PageSnapshot {
  return { ...emptySnapshot('https://shop.test/', 'Shop'), elements };
}

describe('describeElement', () => {
  it('renders tag, type, id and attributes on one line', () => {
    const line = describeElement(
      element({ type: 'search', id: 'q', placeholder: 'Search products', text: 'a\n  b' }),
      80,
    );

    expect(line).toBe('- input[type=search]#q placeholder="Search products" text="a b"');
  });

  it('marks hidden elements and truncates long text', () => {
    const line = describeElement(element({ tag: 'a', text: 'abcdef', visible: false }), 3);

    expect(line).toBe('- a text="abc..." hidden');
  });
});

describe('buildPlanPrompt', () => {
  it('includes the goal and page facts', () => {
    const prompt = buildPlanPrompt('find red shoes', snapshot([]));

    expect(prompt).toContain('USER GOAL: find red shoes');
    expect(prompt).toContain('- URL: https://shop.test/');
    expect(prompt).toContain('- Page Type: content');
    expect(prompt).toContain('- (none detected)');
    expect(prompt).toContain('Return only the JSON, no other text.');
  });

  it('lists at most the configured number of elements', () => {
    const elements = Array.from({ length: 15 }, (_, i) => element({ id: `field-${i}` }));

    const prompt = buildPlanPrompt('x', snapshot(elements));

    expect(prompt).toContain('- input#field-9');
    expect(prompt).not.toContain('- input#field-10');
  });

  it('stays within the character budget', () => {
    const elements = Array.from({ length: 10 }, (_, i) => element({ id: `f${i}`, text: 'w'.repeat(80) }));
    const limits = { ...DEFAULT_PROMPT_LIMITS, maxPromptChars: 1400 };

    const prompt = buildPlanPrompt('x', snapshot(elements), limits);

    expect(prompt.length).toBeLessThanOrEqual(1400);
    expect(prompt).toContain('- input#f0');
  });
});
