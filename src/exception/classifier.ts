import type { ActionKind, ErrorType } from '../types/index.js';

interface ClassifyContext {
  action?: ActionKind;
  selector?: string;
  message?: string;
}

export function classifyError(error: unknown, context: ClassifyContext = {}): ErrorType {
  const message = extractMessage(error);
  const combined = `${message} ${context.message ?? ''}`.toLowerCase();

  if (isPageClosed(combined)) {
    return 'PageClosed';
  }

  if (isNavigationFailure(combined, context.action)) {
    return 'NavigationFailed';
  }

  if (isTargetNotFound(combined, context.selector)) {
    return 'TargetNotFound';
  }

  if (isNotActionable(combined)) {
    return 'NotActionable';
  }

  if (isTimeout(combined)) {
    return 'Timeout';
  }

  return 'Unknown';
}

function extractMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

function isPageClosed(text: string): boolean {
  const patterns = [
    'target page, context or browser has been closed',
    'target closed',
    'page has been closed',
    'browser has been closed',
    'page is closed',
  ];
  return patterns.some((p) => text.includes(p));
}

function isNavigationFailure(text: string, action?: ActionKind): boolean {
  if (action === 'navigate') return true;
  const patterns = ['net::err_', 'ns_error_', 'navigation failed', 'page.goto:'];
  return patterns.some((p) => text.includes(p));
}

function isTargetNotFound(text: string, selector?: string): boolean {
  const patterns = [
    'waiting for selector',
    'waiting for locator',
    'no element found',
    'element not found',
    'could not find',
    'unable to find',
    'no selector resolved',
  ];
  if (patterns.some((p) => text.includes(p))) {
    return !text.includes('not actionable') && !text.includes('not clickable');
  }
  // A bare timeout while a selector was involved means the element never showed up
  return Boolean(selector) && text.includes('timeout');
}

function isNotActionable(text: string): boolean {
  const patterns = [
    'not actionable',
    'not clickable',
    'element is not visible',
    'element is not enabled',
    'element is not stable',
    'element is not editable',
    'intercepts pointer events',
    'element is outside of the viewport',
  ];
  return patterns.some((p) => text.includes(p));
}

function isTimeout(text: string): boolean {
  return text.includes('timeout') || text.includes('timed out');
}
