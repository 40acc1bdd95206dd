import type { ElementDescriptor, PageSnapshot } from '../types/index.js';

export interface PromptLimits {
  maxElements: number;
  maxPromptChars: number;
  maxGoalChars: number;
  maxElementTextChars: number;
}

export const DEFAULT_PROMPT_LIMITS: PromptLimits = {
  maxElements: 10,
  maxPromptChars: 6000,
  maxGoalChars: 500,
  maxElementTextChars: 80,
};

const RESPONSE_FORMAT = `
Generate a JSON plan with the following structure:
{
  "steps": [
    {
      "action": "navigate|click|type|wait|get_text|scroll",
      "target": "CSS selector; list fallbacks separated by commas, most specific first",
      "data": "text to type, URL to open, or seconds to wait",
      "reasoning": "why this step is needed"
    }
  ],
  "confidence": 0.0-1.0,
  "reasoning": "overall strategy",
  "expected_outcome": "what should happen"
}

Return only the JSON, no other text.
`;

function truncate(value: string, max: number): string {
  return value.length > max ? `${value.slice(0, max)}...` : value;
}

export function describeElement(element: ElementDescriptor, maxTextChars: number): string {
  let line = element.tag;
  if (element.type) line += `[type=${element.type}]`;
  if (element.id) line += `#${element.id}`;

  const attrs: string[] = [];
  if (element.placeholder) attrs.push(`placeholder="${truncate(element.placeholder, maxTextChars)}"`);
  if (element.ariaLabel) attrs.push(`aria-label="${truncate(element.ariaLabel, maxTextChars)}"`);
  if (element.role) attrs.push(`role=${element.role}`);
  if (element.href) attrs.push(`href="${truncate(element.href, maxTextChars)}"`);
  if (element.text) attrs.push(`text="${truncate(element.text.replace(/\s+/g, ' '), maxTextChars)}"`);
  if (!element.visible) attrs.push('hidden');

  return attrs.length > 0 ? `- ${line} ${attrs.join(' ')}` : `- ${line}`;
}

/** Bounded prompt: goal, page facts, and as many of the first elements as fit. */
export function buildPlanPrompt(
  goal: string,
  context: PageSnapshot,
  limits: PromptLimits = DEFAULT_PROMPT_LIMITS,
): string {
  const facts = context.structuralFacts;
  const header = [
    "You are an AI automation agent. Generate a step-by-step plan to achieve the user's goal on the current page.",
    '',
    `USER GOAL: ${truncate(goal.trim(), limits.maxGoalChars)}`,
    '',
    'PAGE CONTEXT:',
    `- URL: ${truncate(context.url, 300)}`,
    `- Title: ${truncate(context.title, 200)}`,
    `- Page Type: ${facts.pageType}`,
    `- Has Search: ${facts.hasSearch}`,
    `- Has Forms: ${facts.hasForms}`,
    `- Has Products: ${facts.hasProducts}`,
    `- Has Navigation: ${facts.hasNavigation}`,
    '',
    'AVAILABLE ELEMENTS:',
  ].join('\n');

  // Each line pays for its own newline; one more separates the list from the format block
  let budget = limits.maxPromptChars - header.length - RESPONSE_FORMAT.length - 1;
  const lines: string[] = [];
  for (const element of context.elements.slice(0, limits.maxElements)) {
    const line = describeElement(element, limits.maxElementTextChars);
    if (line.length + 1 > budget) break;
    lines.push(line);
    budget -= line.length + 1;
  }
  if (lines.length === 0) lines.push('- (none detected)');

  return `${header}\n${lines.join('\n')}\n${RESPONSE_FORMAT}`;
}
