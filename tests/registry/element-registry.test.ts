import { describe, it, expect } from 'vitest';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { ElementRegistry, parseButtonName } from '../../src/registry/element-registry.js';
import { BUTTON_SYMBOLS } from '../../src/registry/symbol-aliases.js';
import { ButtonNotFoundError, RegistryFormatError } from '../../src/exception/errors.js';

const fixturePath = fileURLToPath(new URL('../fixtures/calc-registry.json', import.meta.url));
const fixture: unknown = JSON.parse(readFileSync(fixturePath, 'utf-8'));

function registryOf(nodes: Record<string, unknown>): ElementRegistry {
  return ElementRegistry.fromDocument({ states: { root: { nodes } } });
}

function notFound(fn: () => unknown): ButtonNotFoundError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ButtonNotFoundError) return error;
    throw error;
  }
  throw new Error('expected ButtonNotFoundError');
}

describe('ElementRegistry.fromDocument', () => {
  it('indexes every node of the root state', () => {
    const registry = ElementRegistry.fromDocument(fixture);
    expect(registry.size).toBe(19);
  });

  it('normalizes corner boxes to left/top/width/height', () => {
    const registry = ElementRegistry.fromDocument(fixture);
    expect(registry.get('H1_8')?.boundingBox).toEqual({ left: 80, top: 400, width: 60, height: 40 });
  });

  it('accepts sized boxes as they are', () => {
    const registry = ElementRegistry.fromDocument(fixture);
    expect(registry.get('H1_7')?.boundingBox).toEqual({ left: 10, top: 400, width: 60, height: 40 });
  });

  it('derives aliases from icon name and brief', () => {
    const registry = ElementRegistry.fromDocument(fixture);
    expect([...(registry.get('H1_11')?.aliases ?? [])]).toEqual(['+ button', '+', 'addition']);
  });

  it('rejects a document without the requested state', () => {
    expect(() => ElementRegistry.fromDocument(fixture, { stateId: 'scientific' })).toThrow(
      'Element registry has no state "scientific"',
    );
  });

  it('rejects malformed nodes', () => {
    expect(() => registryOf({ A: { g_icon_name: 'x', bbox: [1, 2, 3] } })).toThrow(RegistryFormatError);
  });

  it('rejects inverted corner boxes', () => {
    expect(() => registryOf({ A: { g_icon_name: 'x', bbox: [50, 50, 10, 10] } })).toThrow(
      'Bounding box must have non-negative width and height',
    );
  });
});

describe('ElementRegistry.resolve', () => {
  const registry = ElementRegistry.fromDocument(fixture);

  it('resolves every button symbol in the fixture', () => {
    for (const symbol of BUTTON_SYMBOLS) {
      expect(() => registry.resolve(symbol)).not.toThrow();
    }
  });

  it('resolves digits by their numeric alias', () => {
    expect(registry.resolve('2').id).toBe('H1_8');
    expect(registry.resolve('0').id).toBe('H1_10');
  });

  it('resolves "+" to the addition key, not memory add or negate', () => {
    expect(registry.resolve('+').id).toBe('H1_11');
  });

  it('resolves functions by icon glyph or label', () => {
    expect(registry.resolve('square').id).toBe('H1_16');
    expect(registry.resolve('sqrt').id).toBe('H1_17');
  });

  it('falls back to phrase containment on the label', () => {
    const labelled = registryOf({
      K1: { g_icon_name: 'Plus Key', g_brief: 'Addition operator', bbox: [0, 0, 10, 10] },
    });
    expect(labelled.resolve('+').id).toBe('K1');
  });

  it('does not match a label phrase inside a longer word', () => {
    const labelled = registryOf({
      K1: { g_icon_name: 'Key', g_brief: 'Additional options', bbox: [0, 0, 10, 10] },
    });
    expect(notFound(() => labelled.resolve('+')).reason).toBe('missing');
  });

  it('fails when the symbol is absent', () => {
    const partial = registryOf({
      A: { g_icon_name: '1 Button', g_brief: 'Digit one', bbox: [0, 0, 10, 10] },
    });
    const error = notFound(() => partial.resolve('sqrt'));
    expect(error.reason).toBe('missing');
    expect(error.symbol).toBe('sqrt');
  });

  it('fails instead of picking between two exact matches', () => {
    const duplicated = registryOf({
      A: { g_icon_name: '+ Button', g_brief: 'Addition', bbox: [0, 0, 10, 10] },
      B: { g_icon_name: '+ Button', g_brief: 'Addition', bbox: [20, 0, 30, 10] },
    });
    const error = notFound(() => duplicated.resolve('+'));
    expect(error.reason).toBe('ambiguous');
    expect(error.candidates).toEqual(['A', 'B']);
  });

  it('fails instead of picking between two label matches', () => {
    const duplicated = registryOf({
      A: { g_icon_name: 'Key A', g_brief: 'Addition', bbox: [0, 0, 10, 10] },
      B: { g_icon_name: 'Key B', g_brief: 'Addition of memory', bbox: [20, 0, 30, 10] },
    });
    expect(notFound(() => duplicated.resolve('+')).candidates).toEqual(['A', 'B']);
  });
});

describe('parseButtonName', () => {
  it.each([
    ['7', '7'],
    ['plus', '+'],
    ['*', '×'],
    ['/', '÷'],
    ['Equals', '='],
    ['x²', 'square'],
    ['√', 'sqrt'],
    ['square root', 'sqrt'],
    ['5 button', '5'],
  ])('maps "%s" to "%s"', (name, symbol) => {
    expect(parseButtonName(name)).toBe(symbol);
  });

  it('rejects unknown names', () => {
    expect(notFound(() => parseButtonName('banana')).reason).toBe('unknown_name');
  });
});
