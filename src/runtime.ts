import { join } from 'node:path';
import type { RuntimeConfig } from './schemas/config.schema.js';
import type { ClickPrimitive, WindowLocator } from './desktop/desktop-engine.js';
import { loadElementRegistry } from './registry/loader.js';
import type { ElementRegistry } from './registry/element-registry.js';
import { DesktopWindowLocator } from './desktop/window-locator.js';
import { DesktopClickPrimitive } from './desktop/click-primitive.js';
import { ActionExecutor } from './executor/action-executor.js';
import { RunLogger } from './logging/run-logger.js';
import { CalculatorTools } from './tools/calculator-tools.js';

export interface Runtime {
  runId: string;
  config: RuntimeConfig;
  registry: ElementRegistry;
  windowLocator: WindowLocator;
  executor: ActionExecutor;
  tools: CalculatorTools;
  logger: RunLogger | null;
}

export interface RuntimeOverrides {
  windowLocator?: WindowLocator;
  clicker?: ClickPrimitive;
  runId?: string;
}

export function createRunId(): string {
  return `run-${Date.now()}-${Math.random().toString(36).slice(2, 7)}`;
}

/** Loads the registry once and wires every component around it. */
export async function createRuntime(config: RuntimeConfig, overrides: RuntimeOverrides = {}): Promise<Runtime> {
  const runId = overrides.runId ?? createRunId();
  const registry = await loadElementRegistry(config.registryPath, config.registryState);

  const windowLocator =
    overrides.windowLocator ??
    new DesktopWindowLocator({
      appPath: config.appPath,
      appArgs: config.appArgs,
      titlePrefix: config.windowTitle,
      excludedTitles: config.excludedTitles,
      launchTimeoutMs: config.launchTimeoutMs,
      pollIntervalMs: config.pollIntervalMs,
    });
  const clicker = overrides.clicker ?? new DesktopClickPrimitive();

  const logger = config.logDir ? new RunLogger(join(config.logDir, runId), runId) : null;
  const executor = new ActionExecutor(windowLocator, clicker, {
    settleMs: config.settleMs,
    logger: logger ?? undefined,
  });

  return {
    runId,
    config,
    registry,
    windowLocator,
    executor,
    tools: new CalculatorTools(registry, windowLocator, executor),
    logger,
  };
}
