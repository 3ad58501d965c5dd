import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { Point } from "../types.js";
import {
  DesktopBackend,
  DesktopInputDriver,
  FailSafeError,
  InputUnavailableError,
  loadDesktopBackend,
  toKeyName,
  unavailableBackend
} from "./input-driver.js";

class FakeBackend implements DesktopBackend {
  calls: string[] = [];
  pointer: Point = { x: 500, y: 400 };
  size = { width: 1000, height: 800 };

  async position() {
    return this.pointer;
  }
  async screenSize() {
    return this.size;
  }
  async setPosition(point: Point) {
    this.calls.push(`setPosition ${point.x},${point.y}`);
    this.pointer = point;
  }
  async glide(point: Point, pixelsPerSecond: number) {
    this.calls.push(`glide ${point.x},${point.y} @${pixelsPerSecond}`);
    this.pointer = point;
  }
  async click(button: string) {
    this.calls.push(`click ${button}`);
  }
  async typeText(text: string, delayMs: number) {
    this.calls.push(`type ${text} ${delayMs}ms`);
  }
  async pressKeys(keys: string[]) {
    this.calls.push(`press ${keys.join(",")}`);
  }
  async releaseKeys(keys: string[]) {
    this.calls.push(`release ${keys.join(",")}`);
  }
  async scrollUp(steps: number) {
    this.calls.push(`scrollUp ${steps}`);
  }
  async scrollDown(steps: number) {
    this.calls.push(`scrollDown ${steps}`);
  }
}

describe("DesktopInputDriver", () => {
  let backend: FakeBackend;
  let driver: DesktopInputDriver;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    backend = new FakeBackend();
    driver = new DesktopInputDriver(backend, { pauseBetweenActions: 0 });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("moves then clicks", async () => {
    await driver.click(100, 160);

    expect(backend.calls).toEqual(["setPosition 100,160", "click left"]);
  });

  it("double- and right-clicks", async () => {
    await driver.doubleClick(1, 2);
    await driver.rightClick(3, 4);

    expect(backend.calls).toEqual([
      "setPosition 1,2",
      "click left",
      "click left",
      "setPosition 3,4",
      "click right"
    ]);
  });

  it("glides at a speed that covers the distance in the given time", async () => {
    backend.pointer = { x: 100, y: 100 };

    await driver.move(400, 500, 0.5);

    expect(backend.calls).toEqual(["glide 400,500 @1000"]);
  });

  it("jumps when the duration is zero", async () => {
    await driver.move(7, 8, 0);

    expect(backend.calls).toEqual(["setPosition 7,8"]);
  });

  it("types with a per-character delay", async () => {
    await driver.type("hello", 0.02);

    expect(backend.calls).toEqual(["type hello 20ms"]);
  });

  it("maps key aliases", async () => {
    await driver.press("Esc");

    expect(backend.calls).toEqual(["press esc", "release esc"]);
    expect(toKeyName(" ENTER ")).toBe("enter");
    expect(toKeyName("hyper")).toBeUndefined();
  });

  it("rejects unknown keys before touching the backend", async () => {
    await expect(driver.press("hyper")).rejects.toThrow("Unknown key: hyper");
    await expect(driver.hotkey("ctrl", "nope")).rejects.toThrow("Unknown key: nope");
    await expect(driver.hotkey()).rejects.toThrow("Hotkey needs at least one key");
    expect(backend.calls).toEqual([]);
  });

  it("releases hotkeys in reverse order", async () => {
    await driver.hotkey("ctrl", "shift", "t");

    expect(backend.calls).toEqual(["press ctrl,shift,t", "release t,shift,ctrl"]);
  });

  it("scrolls up for positive and down for negative amounts", async () => {
    await driver.scroll(3);
    await driver.scroll(-2, 10, 20);
    await driver.scroll(0);

    expect(backend.calls).toEqual(["scrollUp 3", "setPosition 10,20", "scrollDown 2"]);
  });

  it.each([
    [{ x: 0, y: 0 }],
    [{ x: 999, y: 0 }],
    [{ x: 0, y: 799 }],
    [{ x: 999, y: 799 }]
  ])("refuses to act with the pointer at corner %o", async pointer => {
    backend.pointer = pointer;

    await expect(driver.click(10, 10)).rejects.toBeInstanceOf(FailSafeError);
    expect(backend.calls).toEqual([]);
  });

  it("acts along an edge that is not a corner", async () => {
    backend.pointer = { x: 0, y: 400 };

    await driver.click(10, 10);

    expect(backend.calls).toEqual(["setPosition 10,10", "click left"]);
  });

  it("skips the corner check when disabled", async () => {
    backend.pointer = { x: 0, y: 0 };
    const unchecked = new DesktopInputDriver(backend, { pauseBetweenActions: 0, abortOnCorner: false });

    await unchecked.click(10, 10);

    expect(backend.calls).toEqual(["setPosition 10,10", "click left"]);
  });
});

describe("loadDesktopBackend", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("uses the loaded backend", async () => {
    const backend = new FakeBackend();

    expect(await loadDesktopBackend(async () => backend)).toBe(backend);
  });

  it("falls back to a backend that refuses input when loading fails", async () => {
    const backend = await loadDesktopBackend(async () => {
      throw new Error("cannot open display");
    });
    const driver = new DesktopInputDriver(backend, { pauseBetweenActions: 0 });

    await expect(driver.click(10, 20)).rejects.toBeInstanceOf(InputUnavailableError);
    await expect(driver.type("hi")).rejects.toThrow("Input control unavailable: cannot open display");
    expect(console.error).toHaveBeenCalledWith(
      "⚠️  nut-js not available. Mouse/keyboard control disabled. (cannot open display)"
    );
  });

  it("names the reason on every call", async () => {
    await expect(unavailableBackend("no display").screenSize()).rejects.toThrow("Input control unavailable: no display");
  });
});
