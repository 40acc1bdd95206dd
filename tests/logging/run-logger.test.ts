import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import { RunLogger } from '../../src/logging/run-logger.js';
import type { StepResult, TaskResult } from '../../src/types/index.js';

const step: StepResult = {
  step: 1,
  action: 'click',
  success: false,
  message: 'Element not found: #buy',
  error: 'No selector resolved: #buy',
  errorType: 'TargetNotFound',
  durationMs: 3001,
};

async function readEntries(runDir: string): Promise<Record<string, unknown>[]> {
  const content = await readFile(join(runDir, 'logs.jsonl'), 'utf-8');
  return content
    .trim()
    .split('\n')
    .map((line) => JSON.parse(line));
}

describe('RunLogger', () => {
  let runDir: string;
  let logger: RunLogger;

  beforeEach(() => {
    runDir = join(tmpdir(), `run-logger-test-${randomUUID()}`);
    logger = new RunLogger(runDir);
  });

  afterEach(async () => {
    await rm(runDir, { recursive: true, force: true });
  });

  it('creates the run directory on first write', async () => {
    await logger.logStage('Navigated');

    const entries = await readEntries(runDir);
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({ type: 'stage', state: 'Navigated' });
    expect(entries[0]?.timestamp).toEqual(expect.any(String));
  });

  it('appends step results', async () => {
    await logger.logStep({ ...step, success: true, message: 'Clicked element: #buy', error: undefined, errorType: undefined });
    await logger.logStep(step);

    const entries = await readEntries(runDir);
    expect(entries).toHaveLength(2);
    expect(entries[1]).toMatchObject({ type: 'step', step: 1, success: false, errorType: 'TargetNotFound' });
  });

  it('logs the task outcome without repeating the steps', async () => {
    const result: TaskResult = {
      success: false,
      message: 'Automation plan failed at step 1: Element not found: #buy',
      error: 'No selector resolved: #buy',
      data: {
        steps: [step],
        expectedOutcome: 'done',
        confidence: 0.8,
        reasoning: 'r',
        totalSteps: 3,
        successfulSteps: 0,
      },
    };

    await logger.logTask(result);

    const [entry] = await readEntries(runDir);
    expect(entry).toMatchObject({ type: 'task', success: false, totalSteps: 3, successfulSteps: 0 });
    expect(entry).not.toHaveProperty('steps');
  });

  it('exposes the run directory', () => {
    expect(logger.getRunDir()).toBe(runDir);
  });
});
