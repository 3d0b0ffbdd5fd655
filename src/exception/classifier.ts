import { ZodError } from 'zod';
import type { ErrorCode, ErrorDisposition, ReportedError } from '../types/index.js';
import { CalculatorError } from './errors.js';

const DISPOSITIONS: Record<ErrorCode, ErrorDisposition> = {
  UnsupportedInstruction: 'correct_instruction',
  NumberParse: 'correct_instruction',
  AmbiguousOperand: 'correct_instruction',
  ButtonNotFound: 'refresh_registry',
  RegistryFormat: 'refresh_registry',
  WindowUnavailable: 'retry_after_open',
  ClickFailed: 'abort',
  MalformedStep: 'abort',
  Unknown: 'abort',
};

export function classifyError(error: unknown): ReportedError {
  if (error instanceof CalculatorError) {
    return {
      code: error.code,
      disposition: DISPOSITIONS[error.code],
      retryable: error.code === 'WindowUnavailable',
      message: error.message,
      context: error.context,
    };
  }

  if (error instanceof ZodError) {
    return {
      code: 'RegistryFormat',
      disposition: DISPOSITIONS.RegistryFormat,
      retryable: false,
      message: error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`).join('; '),
      context: {},
    };
  }

  return {
    code: 'Unknown',
    disposition: DISPOSITIONS.Unknown,
    retryable: false,
    message: extractMessage(error),
    context: {},
  };
}

function extractMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}
