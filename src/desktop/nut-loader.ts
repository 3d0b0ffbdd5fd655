export type NutModule = typeof import('@nut-tree-fork/nut-js');

let cached: Promise<NutModule> | null = null;

/** Loaded on first use so that nothing native is touched until a desktop call happens. */
export function loadNut(): Promise<NutModule> {
  cached ??= import('@nut-tree-fork/nut-js');
  return cached;
}
