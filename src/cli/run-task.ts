#!/usr/bin/env node
/**
 * CLI: run one goal from stdin JSON → JSONL events on stdout.
 *
 * Usage:
 *   echo '{"goal":"find running shoes","startUrl":"https://duckduckgo.com"}' | run-task
 *   echo '{"goal":"cheap flights to Lisbon"}' | run-task
 *   run-task "find running shoes" https://duckduckgo.com
 *
 * Without startUrl the start page is picked from the goal.
 *
 * Diagnostics go to stderr through the logger; stdout carries only events.
 */

import '../config/env.js';
import { randomUUID } from 'node:crypto';
import { join } from 'node:path';

import { loadConfig, type EngineConfig } from '../config/config.js';
import { createTaskOrchestrator } from '../engine.js';
import { RunLogger } from '../logging/run-logger.js';
import { writeSummary } from '../logging/summary-writer.js';
import { resolveStartSite } from '../planner/start-site.js';
import { parseArgs, parseJsonInput, type CliInput } from './cli-input.js';
import { createLogger, errorMessage, setLogLevel } from '../logging/logger.js';

const log = createLogger('cli');

// ── helpers ────────────────────────────────────────

function emit(event: Record<string, unknown>): void {
  process.stdout.write(JSON.stringify(event) + '\n');
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

async function readInput(argv: string[]): Promise<CliInput> {
  return parseArgs(argv) ?? parseJsonInput(await readStdin());
}

function pickStartUrl(goal: string): string {
  const site = resolveStartSite(goal);
  log.info('No start URL given; picked one from the goal', { category: site.category, url: site.url });
  return site.url;
}

function applyOptions(config: EngineConfig, options: CliInput['options']): EngineConfig {
  return {
    ...config,
    browser: { ...config.browser, headless: options?.headless ?? config.browser.headless },
    extractResults: options?.extractResults ?? config.extractResults,
  };
}

// ── main ───────────────────────────────────────────

async function main(): Promise<void> {
  const baseConfig = loadConfig(process.env, (issue) =>
    log.warn('Invalid configuration value; using default', { key: issue.key, reason: issue.message }),
  );
  setLogLevel(baseConfig.logLevel);

  let input: CliInput;
  try {
    input = await readInput(process.argv.slice(2));
  } catch (err) {
    emit({ type: 'task_error', error: errorMessage(err) });
    process.exitCode = 1;
    return;
  }

  const config = applyOptions(baseConfig, input.options);
  const startUrl = input.startUrl?.trim() || pickStartUrl(input.goal);
  const taskId = randomUUID();
  const startedAt = new Date().toISOString();
  const runDir = config.runsDir ? join(config.runsDir, taskId) : undefined;
  const runLogger = runDir ? new RunLogger(runDir) : undefined;

  emit({ type: 'task_start', taskId, goal: input.goal, startUrl });

  const orchestrator = createTaskOrchestrator(config);
  const result = await orchestrator.run(input.goal, startUrl, {
    taskId,
    runLogger,
    observer: {
      onStage: (state, detail) => emit({ type: 'stage', taskId, state, ...detail }),
      onStep: (step) =>
        emit({
          type: 'step_end',
          taskId,
          step: step.step,
          action: step.action,
          ok: step.success,
          durationMs: step.durationMs,
          message: step.message,
          ...(step.errorType ? { errorType: step.errorType } : {}),
        }),
    },
  });

  if (runDir) {
    try {
      await writeSummary({ runDir, taskId, goal: input.goal, startUrl, result, startedAt });
    } catch (err) {
      log.warn('Failed to write run summary', { runDir, error: errorMessage(err) });
    }
  }

  emit({ type: 'task_complete', taskId, ok: result.success, result });
  if (!result.success) process.exitCode = 1;
}

main().catch((err: unknown) => {
  emit({ type: 'task_error', error: errorMessage(err) });
  process.exitCode = 1;
});
