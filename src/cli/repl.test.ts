import { type MockInstance, afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { LocateOutcome } from "../agent/element-locator.js";
import { runCommand } from "./repl.js";

function stubAgent(outcome: LocateOutcome, names: string[] = []) {
  return {
    observe: vi.fn(async () => ({
      screen: { data: Buffer.alloc(0), width: 10, height: 10, capturedAt: 0 },
      screenBase64: "",
      analysis: "screen"
    })),
    observeAndSuggest: vi.fn(async (_goal: string) => ({
      text: "ACTION: type",
      action: { action: "type" as const, target: "hello", reason: "" }
    })),
    executeAction: vi.fn(async () => undefined),
    smartClick: vi.fn(async (_element: string) => outcome),
    listLearnedElements: vi.fn(async () => names),
    clearLearnedElements: vi.fn(async () => undefined)
  };
}

const LEARNED: LocateOutcome = {
  success: true,
  point: { x: 125, y: 172 },
  source: "estimate",
  trace: ["idle", "matching", "needs_learning", "estimating", "learned", "done"]
};

describe("runCommand", () => {
  let log: MockInstance<typeof console.log>;

  beforeEach(() => {
    log = vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const printed = () => log.mock.calls.map(call => String(call[0]));

  it("stops on quit", async () => {
    expect(await runCommand(stubAgent(LEARNED), { kind: "quit" })).toBe(false);
    expect(printed()).toEqual(["👋 Exiting agent..."]);
  });

  it("reports where a smart click landed", async () => {
    const agent = stubAgent(LEARNED);

    expect(await runCommand(agent, { kind: "smart_click", element: "login" })).toBe(true);
    expect(agent.smartClick).toHaveBeenCalledWith("login");
    expect(printed()).toEqual(["✅ Clicked 'login' at (125, 172) - learned from screen"]);
  });

  it("reports a failed smart click with its diagnostic", async () => {
    const agent = stubAgent({ success: false, point: null, diagnostic: "Response is missing HEIGHT", trace: [] });

    await runCommand(agent, { kind: "smart_click", element: "login" });

    expect(printed()).toEqual(["❌ Could not find element 'login' (Response is missing HEIGHT)"]);
  });

  it("passes actions through to the agent", async () => {
    const agent = stubAgent(LEARNED);

    await runCommand(agent, { kind: "action", action: { type: "press_key", key: "enter" } });

    expect(agent.executeAction).toHaveBeenCalledWith({ type: "press_key", key: "enter" });
  });

  it("prints the suggested next step for a goal", async () => {
    const agent = stubAgent(LEARNED);

    await runCommand(agent, { kind: "goal", goal: "say hello" });

    expect(agent.observeAndSuggest).toHaveBeenCalledWith("say hello");
    expect(printed()).toEqual(["💡 Next: type → hello"]);
  });

  it("lists learned elements", async () => {
    await runCommand(stubAgent(LEARNED), { kind: "list_elements" });
    await runCommand(stubAgent(LEARNED, ["login", "search"]), { kind: "list_elements" });

    expect(printed()).toEqual(["No elements learned yet", "\nLearned elements:", "  - login", "  - search"]);
  });

  it("clears learned elements", async () => {
    const agent = stubAgent(LEARNED);

    await runCommand(agent, { kind: "clear_elements" });

    expect(agent.clearLearnedElements).toHaveBeenCalledTimes(1);
  });
});
