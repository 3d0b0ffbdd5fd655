import type { ClickOutcome, ClickTarget, ExecutionReport, ReportedError } from '../types/index.js';
import type { ClickPrimitive, WindowLocator } from '../desktop/desktop-engine.js';
import { resolveClickTarget } from '../resolver/coordinate-resolver.js';
import { classifyError } from '../exception/classifier.js';
import { ClickError } from '../exception/errors.js';

export interface ClickLogger {
  logClick(outcome: ClickOutcome): Promise<void>;
}

export interface ActionExecutorOptions {
  settleMs: number;
  logger?: ClickLogger;
  sleep?: (ms: number) => Promise<void>;
}

export interface ExecuteOptions {
  signal?: AbortSignal;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Presses targets one at a time. The window frame is read again before every
 * click and the coordinate recomputed from it, since a press can move the
 * window. The first failure stops the run; issued clicks stay issued.
 */
export class ActionExecutor {
  private sleep: (ms: number) => Promise<void>;

  constructor(
    private windowLocator: WindowLocator,
    private clicker: ClickPrimitive,
    private options: ActionExecutorOptions,
  ) {
    this.sleep = options.sleep ?? defaultSleep;
  }

  async execute(targets: readonly ClickTarget[], executeOptions: ExecuteOptions = {}): Promise<ExecutionReport> {
    const start = Date.now();
    const clicks: ClickOutcome[] = [];
    const succeeded: number[] = [];
    let logError: string | undefined;

    const finish = (extra: Partial<ExecutionReport> = {}): ExecutionReport => ({
      ok: succeeded.length === targets.length,
      total: targets.length,
      succeeded,
      cancelled: false,
      clicks,
      durationMs: Date.now() - start,
      ...(logError !== undefined ? { logError } : {}),
      ...extra,
    });

    for (let i = 0; i < targets.length; i++) {
      if (executeOptions.signal?.aborted) {
        return finish({ ok: false, cancelled: true, failedIndex: i });
      }

      const target = targets[i];
      let outcome: ClickOutcome;

      try {
        const frame = await this.windowLocator.getFrame();
        const fresh = resolveClickTarget(target.element, frame, target.symbol, i);
        outcome = await this.press(fresh);
      } catch (error) {
        outcome = this.failure(target, i, classifyError(error));
      }

      clicks.push(outcome);
      // A click already issued stays in the report even if it cannot be logged.
      try {
        await this.options.logger?.logClick(outcome);
      } catch (error) {
        logError ??= error instanceof Error ? error.message : String(error);
      }

      if (!outcome.ok) {
        return finish({ ok: false, failedIndex: i, error: outcome.error });
      }

      succeeded.push(i);
      if (i < targets.length - 1 && this.options.settleMs > 0) {
        await this.sleep(this.options.settleMs);
      }
    }

    return finish();
  }

  private async press(target: ClickTarget): Promise<ClickOutcome> {
    const base = {
      index: target.index,
      symbol: target.symbol,
      elementId: target.element.id,
      x: target.x,
      y: target.y,
    };

    let message: string | null = null;
    try {
      const result = await this.clicker.click(target.x, target.y);
      if (!result.ok) message = result.message;
    } catch (error) {
      message = error instanceof Error ? error.message : String(error);
    }

    if (message === null) {
      return { ...base, ok: true };
    }

    const error = new ClickError(
      `Click on "${target.symbol}" at (${target.x}, ${target.y}) failed: ${message}`,
      target.index,
      target.symbol,
      target.x,
      target.y,
    );
    return { ...base, ok: false, error: classifyError(error) };
  }

  private failure(target: ClickTarget, index: number, error: ReportedError): ClickOutcome {
    return {
      index,
      symbol: target.symbol,
      elementId: target.element.id,
      ok: false,
      error,
    };
  }
}
