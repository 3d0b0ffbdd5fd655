/**
 * CLI: drive the calculator from a natural-language instruction, or serve
 * the tool surface over MCP stdio.
 *
 * Usage:
 *   calc-pilot run "Add 2 and 3 and then find the square of the result" [--dry-run]
 *   calc-pilot press <button>
 *   calc-pilot serve
 *
 * `run` and `press` emit JSONL events on stdout. `serve` keeps stdout for the
 * protocol and writes notices to stderr.
 */

import { parseArgs } from 'node:util';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { loadRuntimeConfig } from '../config/runtime-config.js';
import { createRuntime } from '../runtime.js';
import type { Runtime } from '../runtime.js';
import { parseInstruction } from '../parser/instruction-parser.js';
import { compileSteps, describeSequence } from '../compiler/button-compiler.js';
import { planClicks } from '../resolver/coordinate-resolver.js';
import { classifyError } from '../exception/classifier.js';
import { createCalculatorServer } from '../mcp/calculator-server.js';
import type { PressResult } from '../tools/calculator-tools.js';

// ── helpers ────────────────────────────────────────

function emit(event: Record<string, unknown>): void {
  process.stdout.write(JSON.stringify(event) + '\n');
}

/** Ctrl-C stops the sequence between presses; a second one kills the process. */
async function withInterrupt<T>(task: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  process.once('SIGINT', onInterrupt);
  try {
    return await task(controller.signal);
  } finally {
    process.off('SIGINT', onInterrupt);
  }
}

function emitResult(runtime: Runtime, label: string, result: PressResult): void {
  for (const click of result.report?.clicks ?? []) {
    emit({ type: 'click', ...click });
  }
  emit({
    type: 'run_complete',
    runId: runtime.runId,
    label,
    ok: result.success,
    sequence: describeSequence(result.sequence),
    ...(result.report ? { durationMs: result.report.durationMs } : {}),
    ...(result.report?.failedIndex !== undefined ? { failedIndex: result.report.failedIndex } : {}),
    ...(result.report?.cancelled ? { cancelled: true } : {}),
    ...(result.report?.logError !== undefined ? { logError: result.report.logError } : {}),
    ...(result.error ? { error: result.error } : {}),
  });
  if (!result.success) process.exitCode = 1;
}

// ── commands ───────────────────────────────────────

async function run(runtime: Runtime, instruction: string, dryRun: boolean): Promise<void> {
  emit({ type: 'run_start', runId: runtime.runId, instruction, dryRun });

  if (dryRun) {
    const steps = parseInstruction(instruction);
    const symbols = compileSteps(steps);
    const targets = planClicks(symbols, runtime.registry, { originX: 0, originY: 0, visible: true });
    emit({
      type: 'plan',
      steps,
      sequence: describeSequence(symbols),
      targets: targets.map((t) => ({ index: t.index, symbol: t.symbol, elementId: t.element.id, x: t.x, y: t.y })),
    });
    return;
  }

  const result = await withInterrupt((signal) => runtime.tools.runInstruction(instruction, { signal }));
  emitResult(runtime, instruction, result);

  if (runtime.logger && result.report) {
    await runtime.logger.writeSummary(instruction, result.sequence, result.report);
  }
}

async function press(runtime: Runtime, button: string): Promise<void> {
  emit({ type: 'run_start', runId: runtime.runId, button });
  const result = await withInterrupt((signal) => runtime.tools.pressButton(button, { signal }));
  emitResult(runtime, button, result);
}

async function serve(runtime: Runtime): Promise<void> {
  const server = createCalculatorServer(runtime.tools);
  await server.connect(new StdioServerTransport());
  console.error(`calc-pilot MCP server ready (${runtime.registry.size} elements)`);
}

// ── main ───────────────────────────────────────────

async function main(): Promise<void> {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      'dry-run': { type: 'boolean', default: false },
      registry: { type: 'string' },
    },
  });

  const [command, ...rest] = positionals;
  const config = loadRuntimeConfig(process.env, values.registry ? { registryPath: values.registry } : {});
  const runtime = await createRuntime(config);

  switch (command) {
    case 'run':
      await run(runtime, rest.join(' '), values['dry-run'] ?? false);
      break;
    case 'press':
      await press(runtime, rest.join(' '));
      break;
    case 'serve':
      await serve(runtime);
      break;
    default:
      emit({ type: 'run_error', error: `Unknown command: ${command ?? '<none>'}` });
      process.exitCode = 2;
  }
}

main().catch((error: unknown) => {
  emit({ type: 'run_error', error: classifyError(error) });
  process.exitCode = 1;
});
