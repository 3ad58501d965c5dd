import { describe, expect, it } from "vitest";
import { ConfigError, loadConfig } from "./config.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({ GEMINI_KEY_1: "test-secret" })).toEqual({
      mode: "text",
      apiKeys: ["test-secret"],
      model: "gemini-2.5-flash",
      elementsDir: "elements",
      screenshotsDir: "screenshots",
      saveScreenshots: true,
      elementDetection: true,
      matchConfidence: 0.8,
      geometryPolicy: "clamp",
      input: { pauseBetweenActions: 0.5, abortOnCorner: true }
    });
  });

  it("reads overrides", () => {
    const config = loadConfig({
      GEMINI_KEY_1: "test-secret",
      MODE: "MCP",
      ELEMENTS_DIR: "/tmp/el",
      SAVE_SCREENSHOTS: "no",
      ELEMENT_DETECTION: "0",
      MATCH_CONFIDENCE: "0.9",
      GEOMETRY_POLICY: "Reject",
      PAUSE_BETWEEN_ACTIONS: "0",
      ABORT_ON_CORNER: "false"
    });

    expect(config).toMatchObject({
      mode: "mcp",
      elementsDir: "/tmp/el",
      saveScreenshots: false,
      elementDetection: false,
      matchConfidence: 0.9,
      geometryPolicy: "reject",
      input: { pauseBetweenActions: 0, abortOnCorner: false }
    });
  });

  it("treats empty values as unset", () => {
    const config = loadConfig({ GEMINI_KEY_1: "test-secret", MODE: "", MATCH_CONFIDENCE: "" });

    expect(config.mode).toBe("text");
    expect(config.matchConfidence).toBe(0.8);
  });

  it("requires at least one API key", () => {
    expect(() => loadConfig({})).toThrow(ConfigError);
    expect(() => loadConfig({ GEMINI_KEY_1: "" })).toThrow("Missing GEMINI_KEY_X");
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ GEMINI_KEY_1: "test-secret", MODE: "voice" })).toThrow(/^Invalid configuration: MODE/);
    expect(() => loadConfig({ GEMINI_KEY_1: "test-secret", MATCH_CONFIDENCE: "2" })).toThrow(ConfigError);
    expect(() => loadConfig({ GEMINI_KEY_1: "test-secret", SAVE_SCREENSHOTS: "maybe" })).toThrow(ConfigError);
  });
});
