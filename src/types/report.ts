import type { ButtonSymbol } from './button.js';

export type ErrorCode =
  | 'UnsupportedInstruction'
  | 'NumberParse'
  | 'AmbiguousOperand'
  | 'ButtonNotFound'
  | 'RegistryFormat'
  | 'WindowUnavailable'
  | 'ClickFailed'
  | 'MalformedStep'
  | 'Unknown';

export type ErrorDisposition = 'correct_instruction' | 'refresh_registry' | 'retry_after_open' | 'abort';

export interface ReportedError {
  code: ErrorCode;
  disposition: ErrorDisposition;
  retryable: boolean;
  message: string;
  context: Record<string, unknown>;
}

export interface ClickOutcome {
  index: number;
  symbol: ButtonSymbol;
  elementId: string;
  x?: number;
  y?: number;
  ok: boolean;
  error?: ReportedError;
}

export interface ExecutionReport {
  ok: boolean;
  total: number;
  succeeded: number[];
  failedIndex?: number;
  error?: ReportedError;
  cancelled: boolean;
  clicks: ClickOutcome[];
  durationMs: number;
  /** First failure to write a click to the run log, if any. */
  logError?: string;
}
