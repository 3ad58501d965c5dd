import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { GeminiKeyPool } from "./key-pool.js";
import { GeminiVisionAnalyzer, PerceptionError, VisionModel, VisionModelFactory } from "./vision-analyzer.js";

type Reply = string | Error;

function scriptedFactory(replies: Record<string, Reply[]>) {
  const requests: Array<{ apiKey: string; model: string; prompt: unknown }> = [];
  const factory: VisionModelFactory = (apiKey, model): VisionModel => ({
    async generateContent(request) {
      requests.push({ apiKey, model, prompt: request[0] });
      const reply = replies[apiKey]?.shift();
      if (reply === undefined) throw new Error(`no scripted reply for ${apiKey}`);
      if (reply instanceof Error) throw reply;
      return { response: { text: () => reply } };
    }
  });
  return { factory, requests };
}

describe("GeminiVisionAnalyzer", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("sends the instructions and image to the configured model", async () => {
    const { factory, requests } = scriptedFactory({ "test-key-1": ["LEFT: 1"] });
    const analyzer = new GeminiVisionAnalyzer(new GeminiKeyPool(["test-key-1"]), "gemini-test", factory);

    expect(await analyzer.analyze("aW1n", "find it")).toBe("LEFT: 1");
    expect(requests).toEqual([{ apiKey: "test-key-1", model: "gemini-test", prompt: "find it" }]);
  });

  it("rotates to the next key on a quota error", async () => {
    const { factory, requests } = scriptedFactory({
      "test-key-1": [new Error("[429 Too Many Requests] Resource exhausted")],
      "test-key-2": ["ok"]
    });
    const analyzer = new GeminiVisionAnalyzer(new GeminiKeyPool(["test-key-1", "test-key-2"]), "m", factory);

    expect(await analyzer.analyze("aW1n", "x")).toBe("ok");
    expect(requests.map(r => r.apiKey)).toEqual(["test-key-1", "test-key-2"]);
  });

  it("gives up once every key is rate limited", async () => {
    const { factory } = scriptedFactory({
      "test-key-1": [new Error("quota exceeded")],
      "test-key-2": [new Error("quota exceeded")]
    });
    const analyzer = new GeminiVisionAnalyzer(new GeminiKeyPool(["test-key-1", "test-key-2"]), "m", factory);

    await expect(analyzer.analyze("aW1n", "x")).rejects.toThrow("All 2 Gemini key(s) are rate limited: quota exceeded");
  });

  it("does not retry other failures", async () => {
    const { factory, requests } = scriptedFactory({
      "test-key-1": [new Error("invalid image")],
      "test-key-2": ["never used"]
    });
    const analyzer = new GeminiVisionAnalyzer(new GeminiKeyPool(["test-key-1", "test-key-2"]), "m", factory);

    const failure = analyzer.analyze("aW1n", "x");
    await expect(failure).rejects.toBeInstanceOf(PerceptionError);
    await expect(failure).rejects.toThrow("Vision request failed: invalid image");
    expect(requests).toHaveLength(1);
  });

  it("reports description failures as text", async () => {
    const { factory } = scriptedFactory({ "test-key-1": [new Error("offline")] });
    const analyzer = new GeminiVisionAnalyzer(new GeminiKeyPool(["test-key-1"]), "m", factory);

    expect(await analyzer.describeScreen("aW1n")).toBe("Error analyzing screenshot: Vision request failed: offline");
  });

  it("asks for a next step towards a goal", async () => {
    const { factory, requests } = scriptedFactory({ "test-key-1": ["ACTION: click"] });
    const analyzer = new GeminiVisionAnalyzer(new GeminiKeyPool(["test-key-1"]), "m", factory);

    expect(await analyzer.suggestAction("aW1n", "open settings")).toBe("ACTION: click");
    expect(String(requests[0]?.prompt)).toContain("open settings");
  });
});
