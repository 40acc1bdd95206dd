import { describe, it, expect, afterEach } from 'vitest';
import { mkdir, readFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import { buildSummaryMarkdown, writeSummary } from '../../src/logging/summary-writer.js';
import type { TaskResult } from '../../src/types/index.js';

const completed: TaskResult = {
  success: true,
  message: 'Automation plan completed successfully',
  data: {
    steps: [
      { step: 1, action: 'type', success: true, message: 'Typed text into: #q', durationMs: 40000 },
      { step: 2, action: 'click', success: true, message: 'Clicked element: #go', durationMs: 25000 },
    ],
    expectedOutcome: 'Search and find results for: tea',
    confidence: 0.8,
    reasoning: 'r',
    totalSteps: 2,
    successfulSteps: 2,
    results: {
      pageTitle: 'tea',
      pageUrl: 'https://search.test/?q=tea',
      method: 'search_engine',
      resultCount: 2,
      results: [
        { kind: 'search_result', title: 'Tea Shop', link: 'https://tea.test/' },
        { kind: 'page_content', title: 'Page Content: tea' },
      ],
    },
  },
};

const base = { taskId: 'task-1', goal: 'tea', startUrl: 'https://search.test/', startedAt: '2026-01-01T00:00:00.000Z' };

describe('buildSummaryMarkdown', () => {
  it('renders a completed run', () => {
    expect(buildSummaryMarkdown({ ...base, result: completed })).toBe(
      [
        '# Task Summary',
        '- Goal: tea',
        '- Start URL: https://search.test/',
        '- Result: Success',
        '- Message: Automation plan completed successfully',
        '- Duration: 01m 05s',
        '- Steps: 2/2 succeeded',
        '- Confidence: 0.8',
        '',
        '## Steps',
        '1. type - Typed text into: #q - ok',
        '2. click - Clicked element: #go - ok',
        '',
        '## Results',
        '- Method: search_engine',
        '- [Tea Shop](https://tea.test/)',
        '- Page Content: tea',
        '',
        '## Run Info',
        '- Task ID: task-1',
        '- Started at: 2026-01-01T00:00:00.000Z',
        '',
      ].join('\n'),
    );
  });

  it('renders a run that never reached execution', () => {
    const failed: TaskResult = {
      success: false,
      message: 'Failed to navigate to https://search.test/',
      error: 'net::ERR_CONNECTION_REFUSED',
      data: { steps: [], expectedOutcome: '', confidence: 0, reasoning: '', totalSteps: 0, successfulSteps: 0 },
    };

    const markdown = buildSummaryMarkdown({ ...base, result: failed });

    expect(markdown).toContain('- Result: Failure\n');
    expect(markdown).toContain('## Steps\n- No steps executed\n');
    expect(markdown).not.toContain('## Results');
    expect(markdown.endsWith('- Error: net::ERR_CONNECTION_REFUSED\n')).toBe(true);
  });

  it('marks failed steps with their error', () => {
    const result: TaskResult = {
      ...completed,
      success: false,
      data: {
        ...completed.data,
        results: undefined,
        steps: [
          {
            step: 1,
            action: 'click',
            success: false,
            message: 'Element not found: #go',
            error: 'No selector resolved: #go',
            errorType: 'TargetNotFound',
            durationMs: 10,
          },
        ],
      },
    };

    expect(buildSummaryMarkdown({ ...base, result })).toContain(
      '1. click - Element not found: #go - FAILED (TargetNotFound: No selector resolved: #go)',
    );
  });
});

describe('writeSummary', () => {
  const runDir = join(tmpdir(), `summary-test-${randomUUID()}`);

  afterEach(async () => {
    await rm(runDir, { recursive: true, force: true });
  });

  it('writes summary.md into the run directory', async () => {
    await mkdir(runDir, { recursive: true });

    await writeSummary({ ...base, runDir, result: completed });

    const content = await readFile(join(runDir, 'summary.md'), 'utf-8');
    expect(content.startsWith('# Task Summary\n- Goal: tea\n')).toBe(true);
  });
});
