import { appendFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { StepResult, TaskResult } from '../types/index.js';
import type { TaskState } from '../runner/task-state.js';

/** Append-only JSONL log of one task run. */
export class RunLogger {
  private logPath: string;
  private initialized = false;

  constructor(private runDir: string) {
    this.logPath = join(runDir, 'logs.jsonl');
  }

  private async ensureDir(): Promise<void> {
    if (this.initialized) return;
    await mkdir(this.runDir, { recursive: true });
    this.initialized = true;
  }

  private async append(entry: Record<string, unknown>): Promise<void> {
    await this.ensureDir();
    const line = { timestamp: new Date().toISOString(), ...entry };
    await appendFile(this.logPath, JSON.stringify(line) + '\n', 'utf-8');
  }

  async logStage(state: TaskState): Promise<void> {
    await this.append({ type: 'stage', state });
  }

  async logStep(result: StepResult): Promise<void> {
    await this.append({ type: 'step', ...result });
  }

  async logTask(result: TaskResult): Promise<void> {
    const { steps: _steps, ...summary } = result.data;
    await this.append({
      type: 'task',
      success: result.success,
      message: result.message,
      error: result.error,
      ...summary,
    });
  }

  getRunDir(): string {
    return this.runDir;
  }
}
