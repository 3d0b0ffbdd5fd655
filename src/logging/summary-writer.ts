import type { ButtonSymbol, ExecutionReport } from '../types/index.js';
import { describeSequence } from '../compiler/button-compiler.js';

export function buildSummaryMarkdown(
  runId: string,
  instruction: string,
  symbols: ButtonSymbol[],
  report: ExecutionReport,
): string {
  const result = report.ok ? 'Success' : report.cancelled ? 'Cancelled' : 'Failed';

  const lines: string[] = [
    '# Run Summary',
    `- Instruction: ${instruction}`,
    `- Sequence: ${describeSequence(symbols)}`,
    `- Result: ${result}`,
    `- Duration: ${formatDuration(report.durationMs)}`,
    `- Clicks: ${report.succeeded.length}/${report.total} issued`,
    '',
    '## Key Events',
  ];

  if (report.failedIndex !== undefined) {
    const symbol = symbols[report.failedIndex] ?? '?';
    const reason = report.error ? `${report.error.code} - ${report.error.message}` : 'cancelled before click';
    lines.push(`1. Press ${report.failedIndex} ("${symbol}"): ${reason}`);
  } else {
    lines.push('- All presses completed successfully');
  }
  if (report.logError !== undefined) {
    lines.push(`- Click log incomplete: ${report.logError}`);
  }

  lines.push('');
  lines.push('## Run Info');
  lines.push(`- Run ID: ${runId}`);

  return lines.join('\n') + '\n';
}

function formatDuration(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `${String(minutes).padStart(2, '0')}m ${String(seconds).padStart(2, '0')}s`;
}
