import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { TaskResult } from '../types/index.js';

export interface SummaryOptions {
  runDir: string;
  taskId: string;
  goal: string;
  startUrl: string;
  result: TaskResult;
  startedAt: string;
}

/**
 * Human-readable markdown summary of a task run.
 */
export async function writeSummary(options: SummaryOptions): Promise<void> {
  await writeFile(join(options.runDir, 'summary.md'), buildSummaryMarkdown(options), 'utf-8');
}

export function buildSummaryMarkdown(options: Omit<SummaryOptions, 'runDir'>): string {
  const { taskId, goal, startUrl, result, startedAt } = options;
  const { data } = result;

  const totalDurationMs = data.steps.reduce((sum, step) => sum + step.durationMs, 0);

  const lines: string[] = [
    '# Task Summary',
    `- Goal: ${goal}`,
    `- Start URL: ${startUrl}`,
    `- Result: ${result.success ? 'Success' : 'Failure'}`,
    `- Message: ${result.message}`,
    `- Duration: ${formatDuration(totalDurationMs)}`,
    `- Steps: ${data.successfulSteps}/${data.totalSteps} succeeded`,
    `- Confidence: ${data.confidence}`,
    '',
    '## Steps',
  ];

  if (data.steps.length === 0) {
    lines.push('- No steps executed');
  }
  for (const step of data.steps) {
    const status = step.success ? 'ok' : `FAILED (${step.errorType ?? 'unknown error'}: ${step.error ?? 'no details'})`;
    lines.push(`${step.step}. ${step.action} - ${step.message} - ${status}`);
  }

  if (data.results) {
    lines.push('');
    lines.push('## Results');
    lines.push(`- Method: ${data.results.method}`);
    for (const item of data.results.results) {
      lines.push(item.link ? `- [${item.title}](${item.link})` : `- ${item.title}`);
    }
  }

  lines.push('');
  lines.push('## Run Info');
  lines.push(`- Task ID: ${taskId}`);
  lines.push(`- Started at: ${startedAt}`);
  if (result.error) {
    lines.push(`- Error: ${result.error}`);
  }

  return lines.join('\n') + '\n';
}

function formatDuration(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `${String(minutes).padStart(2, '0')}m ${String(seconds).padStart(2, '0')}s`;
}
