import { describe, it, expect, vi } from 'vitest';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { CalculatorTools } from '../../src/tools/calculator-tools.js';
import { ActionExecutor } from '../../src/executor/action-executor.js';
import { ElementRegistry } from '../../src/registry/element-registry.js';
import { WindowUnavailableError } from '../../src/exception/errors.js';
import type { WindowLocator } from '../../src/desktop/desktop-engine.js';
import type { WindowFrame } from '../../src/types/index.js';

const fixturePath = fileURLToPath(new URL('../fixtures/calc-registry.json', import.meta.url));
const registry = ElementRegistry.fromDocument(JSON.parse(readFileSync(fixturePath, 'utf-8')));

const FRAME: WindowFrame = { originX: 100, originY: 50, visible: true };

function createTools(locatorOverrides: Partial<WindowLocator> = {}) {
  const locator: WindowLocator = {
    getFrame: vi.fn().mockResolvedValue(FRAME),
    ensureOpen: vi.fn().mockResolvedValue(FRAME),
    ...locatorOverrides,
  };
  const click = vi.fn().mockResolvedValue({ ok: true });
  const executor = new ActionExecutor(locator, { click }, { settleMs: 0 });
  return { tools: new CalculatorTools(registry, locator, executor), locator, click };
}

describe('CalculatorTools.openApplication', () => {
  it('returns the window frame', async () => {
    const { tools } = createTools();
    await expect(tools.openApplication()).resolves.toEqual({ success: true, frame: FRAME });
  });

  it('classifies a window failure as retryable', async () => {
    const { tools } = createTools({
      ensureOpen: vi.fn().mockRejectedValue(new WindowUnavailableError('No window titled "calculator"')),
    });

    const result = await tools.openApplication();

    expect(result.success).toBe(false);
    expect(result.error).toMatchObject({
      code: 'WindowUnavailable',
      disposition: 'retry_after_open',
      retryable: true,
    });
  });
});

describe('CalculatorTools.runInstruction', () => {
  it('parses, compiles and clicks the whole sequence', async () => {
    const { tools, click, locator } = createTools();

    const result = await tools.runInstruction('Add 2 and 3 and then find the square of the result');

    expect(result.success).toBe(true);
    expect(result.steps).toEqual([{ operator: 'add', operandA: 2, operandB: 3 }, { operator: 'square' }]);
    expect(result.sequence).toEqual(['2', '+', '3', '=', 'square']);
    expect(locator.ensureOpen).toHaveBeenCalledTimes(1);
    expect(click.mock.calls).toEqual([
      [210, 470],
      [350, 470],
      [280, 470],
      [350, 520],
      [210, 320],
    ]);
    expect(result.report?.succeeded).toEqual([0, 1, 2, 3, 4]);
  });

  it('returns a parse error without clicking', async () => {
    const { tools, click, locator } = createTools();

    const result = await tools.runInstruction('Find the square of 4');

    expect(result.success).toBe(false);
    expect(result.sequence).toEqual([]);
    expect(result.error).toMatchObject({ code: 'AmbiguousOperand', disposition: 'correct_instruction' });
    expect(locator.ensureOpen).not.toHaveBeenCalled();
    expect(click).not.toHaveBeenCalled();
  });

  it('returns the compiled sequence when a button is missing from the registry', async () => {
    const partial = ElementRegistry.fromDocument({
      states: { root: { nodes: { A: { g_icon_name: '1 Button', bbox: [0, 0, 10, 10] } } } },
    });
    const locator: WindowLocator = {
      getFrame: vi.fn().mockResolvedValue(FRAME),
      ensureOpen: vi.fn().mockResolvedValue(FRAME),
    };
    const click = vi.fn().mockResolvedValue({ ok: true });
    const tools = new CalculatorTools(partial, locator, new ActionExecutor(locator, { click }, { settleMs: 0 }));

    const result = await tools.runInstruction('add 1 and 1');

    expect(result.success).toBe(false);
    expect(result.sequence).toEqual(['1', '+', '1', '=']);
    expect(result.error).toMatchObject({ code: 'ButtonNotFound', context: { symbol: '+', reason: 'missing' } });
    expect(click).not.toHaveBeenCalled();
  });
});

describe('CalculatorTools.pressButton', () => {
  it('presses a single named button', async () => {
    const { tools, click } = createTools();

    const result = await tools.pressButton('plus');

    expect(result.success).toBe(true);
    expect(result.sequence).toEqual(['+']);
    expect(click).toHaveBeenCalledWith(350, 470);
  });

  it('rejects an unknown button name', async () => {
    const { tools, click } = createTools();

    const result = await tools.pressButton('banana');

    expect(result.success).toBe(false);
    expect(result.error).toMatchObject({ code: 'ButtonNotFound', disposition: 'refresh_registry' });
    expect(click).not.toHaveBeenCalled();
  });
});

describe('CalculatorTools with a failing run log', () => {
  it('still returns the report of the clicks that were issued', async () => {
    const locator: WindowLocator = {
      getFrame: vi.fn().mockResolvedValue(FRAME),
      ensureOpen: vi.fn().mockResolvedValue(FRAME),
    };
    const click = vi.fn().mockResolvedValue({ ok: true });
    const logger = { logClick: vi.fn().mockResolvedValueOnce(undefined).mockRejectedValue(new Error('ENOSPC')) };
    const executor = new ActionExecutor(locator, { click }, { settleMs: 0, logger });
    const tools = new CalculatorTools(registry, locator, executor);

    const result = await tools.runInstruction('Add 2 and 3');

    expect(click).toHaveBeenCalledTimes(4);
    expect(result.success).toBe(true);
    expect(result.error).toBeUndefined();
    expect(result.report).toMatchObject({ ok: true, succeeded: [0, 1, 2, 3], logError: 'ENOSPC' });
  });
});
