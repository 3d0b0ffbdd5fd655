import type { ClickResult } from '../types/index.js';
import type { ClickPrimitive } from './desktop-engine.js';
import { loadNut } from './nut-loader.js';
import type { NutModule } from './nut-loader.js';

export class DesktopClickPrimitive implements ClickPrimitive {
  constructor(private nut: () => Promise<NutModule> = loadNut) {}

  async click(x: number, y: number): Promise<ClickResult> {
    try {
      const { mouse, Point } = await this.nut();
      await mouse.setPosition(new Point(x, y));
      await mouse.leftClick();
      return { ok: true };
    } catch (error) {
      return { ok: false, message: error instanceof Error ? error.message : String(error) };
    }
  }
}
