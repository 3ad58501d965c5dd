import type { Button as NutButton, Key } from "@nut-tree-fork/nut-js";
import { Point, ScreenSize, errorMessage } from "../types.js";

export type MouseButton = "left" | "right" | "middle";

export interface ClickOptions {
  button?: MouseButton;
  clicks?: number;
  /** Seconds between repeated clicks */
  interval?: number;
}

/**
 * Synthetic input primitives. The element locator only ever calls `click`.
 */
export interface InputDriver {
  click(x: number, y: number, options?: ClickOptions): Promise<void>;
  doubleClick(x: number, y: number): Promise<void>;
  rightClick(x: number, y: number): Promise<void>;
  move(x: number, y: number, durationSeconds?: number): Promise<void>;
  type(text: string, intervalSeconds?: number): Promise<void>;
  press(key: string): Promise<void>;
  hotkey(...keys: string[]): Promise<void>;
  scroll(amount: number, x?: number, y?: number): Promise<void>;
  position(): Promise<Point>;
  screenSize(): Promise<ScreenSize>;
}

export interface InputDriverConfig {
  /** Seconds to wait after every action so the UI can settle */
  pauseBetweenActions: number;
  /** Refuse to act while the pointer rests in a screen corner */
  abortOnCorner: boolean;
}

export const DEFAULT_INPUT_CONFIG: InputDriverConfig = {
  pauseBetweenActions: 0.5,
  abortOnCorner: true
};

export const KEY_NAMES = [
  "enter", "return", "tab", "escape", "esc", "space", "backspace", "delete", "del",
  "home", "end", "pageup", "pagedown", "up", "down", "left", "right", "insert", "printscreen",
  "ctrl", "control", "alt", "shift", "cmd", "win", "super",
  "f1", "f2", "f3", "f4", "f5", "f6", "f7", "f8", "f9", "f10", "f11", "f12",
  "a", "b", "c", "d", "e", "f", "g", "h", "i", "j", "k", "l", "m",
  "n", "o", "p", "q", "r", "s", "t", "u", "v", "w", "x", "y", "z",
  "0", "1", "2", "3", "4", "5", "6", "7", "8", "9"
] as const;

export type KeyName = (typeof KEY_NAMES)[number];

export function toKeyName(key: string): KeyName | undefined {
  const lower = key.trim().toLowerCase();
  return KEY_NAMES.find(name => name === lower);
}

/**
 * What the driver needs from the OS. `loadNutBackend` adapts nut-js to it.
 */
export interface DesktopBackend {
  position(): Promise<Point>;
  screenSize(): Promise<ScreenSize>;
  setPosition(point: Point): Promise<void>;
  /** Glide to a point at the given speed in pixels per second */
  glide(point: Point, pixelsPerSecond: number): Promise<void>;
  click(button: MouseButton): Promise<void>;
  typeText(text: string, delayMs: number): Promise<void>;
  pressKeys(keys: KeyName[]): Promise<void>;
  releaseKeys(keys: KeyName[]): Promise<void>;
  scrollUp(steps: number): Promise<void>;
  scrollDown(steps: number): Promise<void>;
}

export class FailSafeError extends Error {
  constructor(point: Point) {
    super(`Fail-safe triggered: pointer is in a screen corner at (${point.x}, ${point.y})`);
    this.name = "FailSafeError";
  }
}

export class InputUnavailableError extends Error {
  constructor(reason: string) {
    super(`Input control unavailable: ${reason}`);
    this.name = "InputUnavailableError";
  }
}

/**
 * Stand-in backend for machines where nut-js cannot load. Every call
 * rejects with `InputUnavailableError`.
 */
export function unavailableBackend(reason: string): DesktopBackend {
  const fail = async (): Promise<never> => {
    throw new InputUnavailableError(reason);
  };
  return {
    position: fail,
    screenSize: fail,
    setPosition: fail,
    glide: fail,
    click: fail,
    typeText: fail,
    pressKeys: fail,
    releaseKeys: fail,
    scrollUp: fail,
    scrollDown: fail
  };
}

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

export class DesktopInputDriver implements InputDriver {
  readonly config: InputDriverConfig;

  constructor(private backend: DesktopBackend, config: Partial<InputDriverConfig> = {}) {
    this.config = { ...DEFAULT_INPUT_CONFIG, ...config };
  }

  async click(x: number, y: number, options: ClickOptions = {}): Promise<void> {
    const { button = "left", clicks = 1, interval = 0 } = options;
    await this.act(async () => {
      console.log(`🖱️  Clicking ${button} at (${x}, ${y})${clicks > 1 ? ` x${clicks}` : ""}`);
      await this.backend.setPosition({ x, y });
      for (let i = 0; i < clicks; i++) {
        if (i > 0 && interval > 0) await sleep(interval * 1000);
        await this.backend.click(button);
      }
    });
  }

  async doubleClick(x: number, y: number): Promise<void> {
    await this.click(x, y, { clicks: 2, interval: 0.1 });
  }

  async rightClick(x: number, y: number): Promise<void> {
    await this.click(x, y, { button: "right" });
  }

  async move(x: number, y: number, durationSeconds = 0.5): Promise<void> {
    await this.act(async () => {
      console.log(`🖱️  Moving mouse to (${x}, ${y})`);
      if (durationSeconds <= 0) {
        await this.backend.setPosition({ x, y });
        return;
      }
      const from = await this.backend.position();
      const distance = Math.hypot(x - from.x, y - from.y);
      await this.backend.glide({ x, y }, Math.max(1, distance / durationSeconds));
    });
  }

  async type(text: string, intervalSeconds = 0.05): Promise<void> {
    await this.act(async () => {
      console.log(`⌨️  Typing: ${text}`);
      await this.backend.typeText(text, Math.round(intervalSeconds * 1000));
    });
  }

  async press(key: string): Promise<void> {
    const name = toKeyName(key);
    if (!name) throw new Error(`Unknown key: ${key}`);

    await this.act(async () => {
      console.log(`⌨️  Pressing key: ${name}`);
      await this.backend.pressKeys([name]);
      await this.backend.releaseKeys([name]);
    });
  }

  async hotkey(...keys: string[]): Promise<void> {
    const names: KeyName[] = [];
    for (const key of keys) {
      const name = toKeyName(key);
      if (!name) throw new Error(`Unknown key: ${key}`);
      names.push(name);
    }
    if (names.length === 0) throw new Error("Hotkey needs at least one key");

    await this.act(async () => {
      console.log(`⌨️  Pressing hotkey: ${names.join("+")}`);
      // Press in order, release in reverse
      await this.backend.pressKeys(names);
      await this.backend.releaseKeys([...names].reverse());
    });
  }

  async scroll(amount: number, x?: number, y?: number): Promise<void> {
    await this.act(async () => {
      console.log(`🖱️  Scrolling ${amount} clicks`);
      if (x !== undefined && y !== undefined) {
        await this.backend.setPosition({ x, y });
      }
      if (amount > 0) {
        await this.backend.scrollUp(amount);
      } else if (amount < 0) {
        await this.backend.scrollDown(-amount);
      }
    });
  }

  position(): Promise<Point> {
    return this.backend.position();
  }

  screenSize(): Promise<ScreenSize> {
    return this.backend.screenSize();
  }

  private async act(action: () => Promise<void>): Promise<void> {
    if (this.config.abortOnCorner) {
      await this.checkFailSafe();
    }
    await action();
    if (this.config.pauseBetweenActions > 0) {
      await sleep(this.config.pauseBetweenActions * 1000);
    }
  }

  private async checkFailSafe() {
    const [pointer, size] = await Promise.all([this.backend.position(), this.backend.screenSize()]);
    const atX = pointer.x <= 0 || pointer.x >= size.width - 1;
    const atY = pointer.y <= 0 || pointer.y >= size.height - 1;
    if (atX && atY) {
      throw new FailSafeError(pointer);
    }
  }
}

type NutModule = typeof import("@nut-tree-fork/nut-js");

function keyTable(keys: NutModule["Key"]): Record<KeyName, Key> {
  return {
    enter: keys.Return, return: keys.Return, tab: keys.Tab, escape: keys.Escape, esc: keys.Escape,
    space: keys.Space, backspace: keys.Backspace, delete: keys.Delete, del: keys.Delete,
    home: keys.Home, end: keys.End, pageup: keys.PageUp, pagedown: keys.PageDown,
    up: keys.Up, down: keys.Down, left: keys.Left, right: keys.Right,
    insert: keys.Insert, printscreen: keys.Print,
    ctrl: keys.LeftControl, control: keys.LeftControl, alt: keys.LeftAlt, shift: keys.LeftShift,
    cmd: keys.LeftSuper, win: keys.LeftSuper, super: keys.LeftSuper,
    f1: keys.F1, f2: keys.F2, f3: keys.F3, f4: keys.F4, f5: keys.F5, f6: keys.F6,
    f7: keys.F7, f8: keys.F8, f9: keys.F9, f10: keys.F10, f11: keys.F11, f12: keys.F12,
    a: keys.A, b: keys.B, c: keys.C, d: keys.D, e: keys.E, f: keys.F, g: keys.G,
    h: keys.H, i: keys.I, j: keys.J, k: keys.K, l: keys.L, m: keys.M, n: keys.N,
    o: keys.O, p: keys.P, q: keys.Q, r: keys.R, s: keys.S, t: keys.T, u: keys.U,
    v: keys.V, w: keys.W, x: keys.X, y: keys.Y, z: keys.Z,
    "0": keys.Num0, "1": keys.Num1, "2": keys.Num2, "3": keys.Num3, "4": keys.Num4,
    "5": keys.Num5, "6": keys.Num6, "7": keys.Num7, "8": keys.Num8, "9": keys.Num9
  };
}

/**
 * Adapts nut-js. Rejects when the native module cannot load, for example
 * without a display server.
 */
export async function loadNutBackend(): Promise<DesktopBackend> {
  const nut = await import("@nut-tree-fork/nut-js");
  const { mouse, keyboard, screen, Button, Point: NutPoint, straightTo } = nut;
  const keys = keyTable(nut.Key);
  const buttons: Record<MouseButton, NutButton> = {
    left: Button.LEFT,
    right: Button.RIGHT,
    middle: Button.MIDDLE
  };

  // Pauses are handled by the driver, not by nut-js
  mouse.config.autoDelayMs = 0;
  keyboard.config.autoDelayMs = 0;

  return {
    async position() {
      const { x, y } = await mouse.getPosition();
      return { x, y };
    },
    async screenSize() {
      return { width: await screen.width(), height: await screen.height() };
    },
    async setPosition({ x, y }) {
      await mouse.setPosition(new NutPoint(x, y));
    },
    async glide({ x, y }, pixelsPerSecond) {
      mouse.config.mouseSpeed = pixelsPerSecond;
      await mouse.move(straightTo(new NutPoint(x, y)));
    },
    async click(button) {
      await mouse.click(buttons[button]);
    },
    async typeText(text, delayMs) {
      keyboard.config.autoDelayMs = delayMs;
      try {
        await keyboard.type(text);
      } finally {
        keyboard.config.autoDelayMs = 0;
      }
    },
    async pressKeys(names) {
      await keyboard.pressKey(...names.map(name => keys[name]));
    },
    async releaseKeys(names) {
      await keyboard.releaseKey(...names.map(name => keys[name]));
    },
    async scrollUp(steps) {
      await mouse.scrollUp(steps);
    },
    async scrollDown(steps) {
      await mouse.scrollDown(steps);
    }
  };
}

/**
 * The nut-js backend, or `unavailableBackend` when it fails to load so the
 * agent can still observe and suggest.
 */
export async function loadDesktopBackend(
  load: () => Promise<DesktopBackend> = loadNutBackend
): Promise<DesktopBackend> {
  try {
    const backend = await load();
    console.log("✅ nut-js loaded successfully");
    return backend;
  } catch (err) {
    const reason = errorMessage(err);
    console.error(`⚠️  nut-js not available. Mouse/keyboard control disabled. (${reason})`);
    return unavailableBackend(reason);
  }
}
