import { appendFile, mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { ButtonSymbol, ClickOutcome, ExecutionReport } from '../types/index.js';
import { buildSummaryMarkdown } from './summary-writer.js';

/**
 * One directory per run: `logs.jsonl` gets a line per click or event,
 * `summary.md` is written once the run is over.
 */
export class RunLogger {
  private readonly logPath: string;
  private ready: Promise<void> | null = null;

  constructor(
    readonly runDir: string,
    readonly runId: string,
  ) {
    this.logPath = join(runDir, 'logs.jsonl');
  }

  async logClick(outcome: ClickOutcome): Promise<void> {
    await this.append({ type: 'click', ...outcome });
  }

  async logEvent(type: string, payload: Record<string, unknown> = {}): Promise<void> {
    await this.append({ type, ...payload });
  }

  async writeSummary(instruction: string, symbols: ButtonSymbol[], report: ExecutionReport): Promise<void> {
    await this.prepare();
    const markdown = buildSummaryMarkdown(this.runId, instruction, symbols, report);
    await writeFile(join(this.runDir, 'summary.md'), markdown, 'utf-8');
  }

  private async append(entry: Record<string, unknown>): Promise<void> {
    await this.prepare();
    const line = JSON.stringify({ timestamp: new Date().toISOString(), ...entry });
    await appendFile(this.logPath, line + '\n', 'utf-8');
  }

  private prepare(): Promise<void> {
    this.ready ??= mkdir(this.runDir, { recursive: true }).then(
      () => undefined,
      (error: unknown) => {
        this.ready = null;
        throw error;
      },
    );
    return this.ready;
  }
}
