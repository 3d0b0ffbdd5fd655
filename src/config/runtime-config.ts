import { RuntimeConfigSchema } from '../schemas/config.schema.js';
import type { RuntimeConfig } from '../schemas/config.schema.js';

export const DEFAULT_RUNTIME_CONFIG: RuntimeConfig = {
  registryPath: 'apps/calc/fdom.json',
  registryState: 'root',
  appPath: 'calc.exe',
  appArgs: [],
  windowTitle: 'calculator',
  excludedTitles: ['cursor', 'code', 'visual studio', 'pycharm', 'intellij'],
  settleMs: 500,
  launchTimeoutMs: 10_000,
  pollIntervalMs: 250,
  logDir: null,
};

/**
 * Defaults overlaid with CALC_* environment variables, then validated.
 * Throws a ZodError on malformed values.
 */
export function loadRuntimeConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: Partial<RuntimeConfig> = {},
): RuntimeConfig {
  const fromEnv: Record<string, unknown> = {};
  if (env.CALC_REGISTRY_PATH) fromEnv.registryPath = env.CALC_REGISTRY_PATH;
  if (env.CALC_REGISTRY_STATE) fromEnv.registryState = env.CALC_REGISTRY_STATE;
  if (env.CALC_APP_PATH) fromEnv.appPath = env.CALC_APP_PATH;
  if (env.CALC_APP_ARGS) fromEnv.appArgs = splitList(env.CALC_APP_ARGS, ' ');
  if (env.CALC_WINDOW_TITLE) fromEnv.windowTitle = env.CALC_WINDOW_TITLE;
  if (env.CALC_EXCLUDED_TITLES) fromEnv.excludedTitles = splitList(env.CALC_EXCLUDED_TITLES, ',');
  if (env.CALC_SETTLE_MS) fromEnv.settleMs = env.CALC_SETTLE_MS;
  if (env.CALC_LAUNCH_TIMEOUT_MS) fromEnv.launchTimeoutMs = env.CALC_LAUNCH_TIMEOUT_MS;
  if (env.CALC_POLL_INTERVAL_MS) fromEnv.pollIntervalMs = env.CALC_POLL_INTERVAL_MS;
  if (env.CALC_LOG_DIR) fromEnv.logDir = env.CALC_LOG_DIR;

  return RuntimeConfigSchema.parse({ ...DEFAULT_RUNTIME_CONFIG, ...fromEnv, ...overrides });
}

function splitList(value: string, separator: string): string[] {
  return value
    .split(separator)
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}
