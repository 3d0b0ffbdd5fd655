import type {
  ButtonSymbol,
  ExecutionReport,
  ReportedError,
  Step,
  WindowFrame,
} from '../types/index.js';
import type { WindowLocator } from '../desktop/desktop-engine.js';
import type { ElementRegistry } from '../registry/element-registry.js';
import type { ActionExecutor, ExecuteOptions } from '../executor/action-executor.js';
import { parseInstruction } from '../parser/instruction-parser.js';
import { compileSteps } from '../compiler/button-compiler.js';
import { parseButtonName } from '../registry/element-registry.js';
import { planClicks } from '../resolver/coordinate-resolver.js';
import { classifyError } from '../exception/classifier.js';

export interface OpenResult {
  success: boolean;
  frame?: WindowFrame;
  error?: ReportedError;
}

export interface PressResult {
  success: boolean;
  steps: Step[];
  sequence: ButtonSymbol[];
  report?: ExecutionReport;
  error?: ReportedError;
}

export interface CalculatorToolSurface {
  openApplication(): Promise<OpenResult>;
  runInstruction(text: string, options?: ExecuteOptions): Promise<PressResult>;
  pressButton(name: string, options?: ExecuteOptions): Promise<PressResult>;
}

/**
 * The three operations exposed to callers. Each one composes the pipeline
 * and turns any thrown error into a classified result.
 */
export class CalculatorTools implements CalculatorToolSurface {
  constructor(
    private registry: ElementRegistry,
    private windowLocator: WindowLocator,
    private executor: ActionExecutor,
  ) {}

  async openApplication(): Promise<OpenResult> {
    try {
      const frame = await this.windowLocator.ensureOpen();
      return { success: true, frame };
    } catch (error) {
      return { success: false, error: classifyError(error) };
    }
  }

  async runInstruction(text: string, options: ExecuteOptions = {}): Promise<PressResult> {
    let steps: Step[] = [];
    let sequence: ButtonSymbol[] = [];
    try {
      steps = parseInstruction(text);
      sequence = compileSteps(steps);
      return await this.press(steps, sequence, options);
    } catch (error) {
      return { success: false, steps, sequence, error: classifyError(error) };
    }
  }

  async pressButton(name: string, options: ExecuteOptions = {}): Promise<PressResult> {
    try {
      return await this.press([], [parseButtonName(name)], options);
    } catch (error) {
      return { success: false, steps: [], sequence: [], error: classifyError(error) };
    }
  }

  private async press(steps: Step[], sequence: ButtonSymbol[], options: ExecuteOptions): Promise<PressResult> {
    const frame = await this.windowLocator.ensureOpen();
    const targets = planClicks(sequence, this.registry, frame);
    const report = await this.executor.execute(targets, options);
    return { success: report.ok, steps, sequence, report, error: report.error };
  }
}
