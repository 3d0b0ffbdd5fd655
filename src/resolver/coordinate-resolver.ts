import type { ButtonSymbol, ClickTarget, ElementDescriptor, WindowFrame } from '../types/index.js';
import type { ElementRegistry } from '../registry/element-registry.js';
import { WindowUnavailableError } from '../exception/errors.js';

/**
 * Absolute click point for an element: window origin plus the centroid of
 * its window-relative bounding box.
 */
export function resolveClickTarget(
  element: ElementDescriptor,
  frame: WindowFrame | null,
  symbol: ButtonSymbol,
  index = 0,
): ClickTarget {
  if (!frame) {
    throw new WindowUnavailableError('Target window could not be located', { index, symbol });
  }
  if (!frame.visible) {
    throw new WindowUnavailableError('Target window is not visible', { index, symbol });
  }

  const { left, top, width, height } = element.boundingBox;
  return {
    index,
    symbol,
    element,
    x: frame.originX + Math.floor(left + width / 2),
    y: frame.originY + Math.floor(top + height / 2),
  };
}

export function planClicks(
  symbols: readonly ButtonSymbol[],
  registry: ElementRegistry,
  frame: WindowFrame | null,
): ClickTarget[] {
  return symbols.map((symbol, index) => resolveClickTarget(registry.resolve(symbol), frame, symbol, index));
}
