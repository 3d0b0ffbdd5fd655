import type { ClickResult, WindowFrame } from '../types/index.js';

export interface WindowLocator {
  /** Current origin and visibility, or null when the window cannot be found. */
  getFrame(): Promise<WindowFrame | null>;
  /** Launches the target application when it is not running. */
  ensureOpen(): Promise<WindowFrame>;
}

export interface ClickPrimitive {
  click(x: number, y: number): Promise<ClickResult>;
}
