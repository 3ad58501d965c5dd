import { describe, it, expect } from "vitest";
import { parseCommand } from "./commands.js";

describe("parseCommand", () => {
  it("treats blank lines as empty", () => {
    expect(parseCommand("   ")).toEqual({ kind: "empty" });
  });

  it("accepts quit and exit in any case", () => {
    expect(parseCommand("quit")).toEqual({ kind: "quit" });
    expect(parseCommand("EXIT")).toEqual({ kind: "quit" });
  });

  it("parses smart_click with a multi-word description", () => {
    expect(parseCommand("smart_click  the blue Submit button ")).toEqual({
      kind: "smart_click",
      element: "the blue Submit button"
    });
  });

  it("requires a description for smart_click", () => {
    expect(parseCommand("smart_click")).toEqual({ kind: "error", message: "Usage: smart_click <element>" });
  });

  it("parses goal text", () => {
    expect(parseCommand("goal open the settings")).toEqual({ kind: "goal", goal: "open the settings" });
  });

  it("parses coordinate actions", () => {
    expect(parseCommand("click 10 20")).toEqual({ kind: "action", action: { type: "click", x: 10, y: 20 } });
    expect(parseCommand("right_click 5 6")).toEqual({ kind: "action", action: { type: "right_click", x: 5, y: 6 } });
    expect(parseCommand("move 0 0")).toEqual({ kind: "action", action: { type: "move", x: 0, y: 0 } });
  });

  it("rejects non-integer coordinates", () => {
    expect(parseCommand("double_click 1.5 2")).toEqual({ kind: "error", message: "Usage: double_click <x> <y>" });
    expect(parseCommand("click 10")).toEqual({ kind: "error", message: "Usage: click <x> <y>" });
  });

  it("keeps typed text verbatim after the first space", () => {
    expect(parseCommand("type hello   world")).toEqual({
      kind: "action",
      action: { type: "type", text: "hello   world" }
    });
  });

  it("parses press and hotkey", () => {
    expect(parseCommand("press enter")).toEqual({ kind: "action", action: { type: "press_key", key: "enter" } });
    expect(parseCommand("hotkey ctrl+shift+t")).toEqual({
      kind: "action",
      action: { type: "hotkey", keys: ["ctrl", "shift", "t"] }
    });
    expect(parseCommand("hotkey ctrl c")).toEqual({
      kind: "action",
      action: { type: "hotkey", keys: ["ctrl", "c"] }
    });
  });

  it("parses scroll and wait", () => {
    expect(parseCommand("scroll -3")).toEqual({ kind: "action", action: { type: "scroll", clicks: -3 } });
    expect(parseCommand("wait 1.5")).toEqual({ kind: "action", action: { type: "wait", seconds: 1.5 } });
    expect(parseCommand("wait -1")).toEqual({ kind: "error", message: "Usage: wait <seconds>" });
    expect(parseCommand("scroll up")).toEqual({ kind: "error", message: "Usage: scroll <amount>" });
  });

  it("reports unknown commands", () => {
    expect(parseCommand("dance now")).toEqual({ kind: "error", message: "Unknown command: dance now" });
  });
});
