export type GoalCategory = 'search' | 'navigation' | 'shopping' | 'travel' | 'jobs' | 'general';

export interface StartSiteRule {
  category: Exclude<GoalCategory, 'general'>;
  /** Matched as substrings of the lower-cased goal. */
  keywords: readonly string[];
  url: string;
}

export const DEFAULT_START_URL = 'https://duckduckgo.com';

// Order matters: a goal that mentions searching stays on the search engine
export const START_SITE_RULES: readonly StartSiteRule[] = [
  { category: 'search', keywords: ['search', 'find', 'look for', 'get'], url: DEFAULT_START_URL },
  { category: 'navigation', keywords: ['click', 'navigate', 'go to', 'visit'], url: DEFAULT_START_URL },
  {
    category: 'shopping',
    keywords: ['price', 'cost', 'buy', 'purchase', 'deal'],
    url: 'https://www.amazon.com',
  },
  {
    category: 'travel',
    keywords: ['flight', 'travel', 'trip', 'vacation', 'booking', 'airline'],
    url: 'https://www.skyscanner.com',
  },
  { category: 'jobs', keywords: ['job', 'career', 'employment', 'hiring'], url: 'https://www.linkedin.com/jobs' },
];

export interface StartSite {
  category: GoalCategory;
  url: string;
}

/** Picks a start page for a goal that came without one. First matching rule wins. */
export function resolveStartSite(goal: string, rules: readonly StartSiteRule[] = START_SITE_RULES): StartSite {
  const lowered = goal.toLowerCase();
  const rule = rules.find((candidate) => candidate.keywords.some((keyword) => lowered.includes(keyword)));
  return rule ? { category: rule.category, url: rule.url } : { category: 'general', url: DEFAULT_START_URL };
}

export function resolveStartUrl(goal: string, rules?: readonly StartSiteRule[]): string {
  return resolveStartSite(goal, rules).url;
}
