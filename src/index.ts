export * from './types/index.js';
export * from './exception/errors.js';
export { classifyError } from './exception/classifier.js';
export { parseInstruction, splitClauses, findOperator } from './parser/instruction-parser.js';
export { compileSteps, describeSequence, toDigits } from './compiler/button-compiler.js';
export { ElementRegistry, parseButtonName, DEFAULT_REGISTRY_STATE } from './registry/element-registry.js';
export { loadElementRegistry } from './registry/loader.js';
export { resolveClickTarget, planClicks } from './resolver/coordinate-resolver.js';
export { ActionExecutor } from './executor/action-executor.js';
export type { ActionExecutorOptions, ClickLogger, ExecuteOptions } from './executor/action-executor.js';
export type { WindowLocator, ClickPrimitive } from './desktop/desktop-engine.js';
export { DesktopWindowLocator } from './desktop/window-locator.js';
export { DesktopClickPrimitive } from './desktop/click-primitive.js';
export { CalculatorTools } from './tools/calculator-tools.js';
export type { CalculatorToolSurface, OpenResult, PressResult } from './tools/calculator-tools.js';
export { createCalculatorServer, handleToolCall, TOOL_DEFINITIONS } from './mcp/calculator-server.js';
export { loadRuntimeConfig, DEFAULT_RUNTIME_CONFIG } from './config/runtime-config.js';
export type { RuntimeConfig } from './schemas/config.schema.js';
export { RunLogger } from './logging/run-logger.js';
export { createRuntime } from './runtime.js';
