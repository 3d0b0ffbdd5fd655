import type { ButtonSymbol } from './button.js';
import type { ElementDescriptor } from './element.js';

export interface ClickTarget {
  index: number;
  symbol: ButtonSymbol;
  element: ElementDescriptor;
  x: number;
  y: number;
}

export type ClickResult = { ok: true } | { ok: false; message: string };
