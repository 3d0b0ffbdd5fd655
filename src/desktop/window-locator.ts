import { spawn } from 'node:child_process';
import type { WindowFrame } from '../types/index.js';
import type { WindowLocator } from './desktop-engine.js';
import { WindowUnavailableError } from '../exception/errors.js';
import { loadNut } from './nut-loader.js';
import type { NutModule } from './nut-loader.js';

export interface WindowInfo {
  title: string;
  left: number;
  top: number;
  width: number;
  height: number;
}

export interface ScreenSize {
  width: number;
  height: number;
}

export interface DesktopWindowOptions {
  appPath: string;
  appArgs: string[];
  /** Lowercased prefix the window title must start with. */
  titlePrefix: string;
  /** Titles containing any of these are skipped (editors showing the app's name). */
  excludedTitles: string[];
  launchTimeoutMs: number;
  pollIntervalMs: number;
}

export interface DesktopWindowDeps {
  listWindows?: () => Promise<WindowInfo[]>;
  screenSize?: () => Promise<ScreenSize>;
  launch?: (appPath: string, args: string[]) => Promise<void>;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export class DesktopWindowLocator implements WindowLocator {
  private listWindows: () => Promise<WindowInfo[]>;
  private screenSize: () => Promise<ScreenSize>;
  private launch: (appPath: string, args: string[]) => Promise<void>;
  private sleep: (ms: number) => Promise<void>;

  constructor(
    private options: DesktopWindowOptions,
    deps: DesktopWindowDeps = {},
  ) {
    this.listWindows = deps.listWindows ?? (() => listDesktopWindows());
    this.screenSize = deps.screenSize ?? (() => readScreenSize());
    this.launch = deps.launch ?? launchApplication;
    this.sleep = deps.sleep ?? defaultSleep;
  }

  async getFrame(): Promise<WindowFrame | null> {
    const windows = await this.listWindows();
    const match = windows.find((w) => this.matches(w.title));
    if (!match) return null;

    const screen = await this.screenSize();
    return {
      originX: match.left,
      originY: match.top,
      visible: isOnScreen(match, screen),
    };
  }

  async ensureOpen(): Promise<WindowFrame> {
    const existing = await this.getFrame();
    if (existing) return existing;

    try {
      await this.launch(this.options.appPath, this.options.appArgs);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new WindowUnavailableError(`Failed to launch ${this.options.appPath}: ${reason}`, {
        appPath: this.options.appPath,
      });
    }

    const deadline = Date.now() + this.options.launchTimeoutMs;
    while (Date.now() < deadline) {
      await this.sleep(this.options.pollIntervalMs);
      const frame = await this.getFrame();
      if (frame) return frame;
    }

    throw new WindowUnavailableError(
      `No window titled "${this.options.titlePrefix}" appeared within ${this.options.launchTimeoutMs}ms`,
      { appPath: this.options.appPath, launchTimeoutMs: this.options.launchTimeoutMs },
    );
  }

  private matches(title: string): boolean {
    const lower = title.trim().toLowerCase();
    if (this.options.excludedTitles.some((excluded) => lower.includes(excluded))) return false;
    return lower.startsWith(this.options.titlePrefix);
  }
}

/**
 * Minimized windows keep their size but are parked off-screen (Windows
 * reports them at -32000, -32000), so size alone does not mean visible.
 */
export function isOnScreen(window: WindowInfo, screen: ScreenSize): boolean {
  if (window.width <= 0 || window.height <= 0) return false;
  return (
    window.left < screen.width &&
    window.top < screen.height &&
    window.left + window.width > 0 &&
    window.top + window.height > 0
  );
}

export async function listDesktopWindows(nut: () => Promise<NutModule> = loadNut): Promise<WindowInfo[]> {
  const { getWindows } = await nut();
  const windows = await getWindows();
  const settled = await Promise.allSettled(
    windows.map(async (window) => {
      const [title, region] = await Promise.all([window.title, window.region]);
      return { title, left: region.left, top: region.top, width: region.width, height: region.height };
    }),
  );
  // Windows closed while being enumerated reject here; they are not candidates anyway.
  return settled.flatMap((entry) => (entry.status === 'fulfilled' ? [entry.value] : []));
}

export async function readScreenSize(nut: () => Promise<NutModule> = loadNut): Promise<ScreenSize> {
  const { screen } = await nut();
  const [width, height] = await Promise.all([screen.width(), screen.height()]);
  return { width, height };
}

function launchApplication(appPath: string, args: string[]): Promise<void> {
  return new Promise((resolve, reject) => {
    const child = spawn(appPath, args, { detached: true, stdio: 'ignore' });
    child.once('error', reject);
    child.once('spawn', () => {
      child.unref();
      resolve();
    });
  });
}
