import { ScreenCapture } from "../capture/screen-capture.js";
import { InputDriver } from "../control/input-driver.js";
import { ElementRepository } from "../memory/element-store.js";
import { SuggestedAction, parseSuggestedAction } from "../perception/coordinate-parser.js";
import { ScreenImage } from "../types.js";
import { ElementLocator, LocateOutcome } from "./element-locator.js";
import { GeminiVisionAnalyzer } from "./vision-analyzer.js";

export type AgentAction =
  | { type: "click"; x: number; y: number }
  | { type: "double_click"; x: number; y: number }
  | { type: "right_click"; x: number; y: number }
  | { type: "type"; text: string }
  | { type: "press_key"; key: string }
  | { type: "hotkey"; keys: string[] }
  | { type: "move"; x: number; y: number; duration?: number }
  | { type: "scroll"; clicks: number; x?: number; y?: number }
  | { type: "wait"; seconds: number };

export interface Observation {
  screen: ScreenImage;
  screenBase64: string;
  analysis: string;
}

export interface Suggestion {
  text: string;
  action?: SuggestedAction;
}

export interface DesktopAgentDeps {
  capture: ScreenCapture;
  vision: Pick<GeminiVisionAnalyzer, "describeScreen" | "suggestAction">;
  input: InputDriver;
  store: ElementRepository;
  /** Absent when element detection is disabled */
  locator?: ElementLocator;
}

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

function rule() {
  console.log("-".repeat(60));
}

/**
 * Sequences capture -> perception/locate -> input, one action at a time.
 */
export class DesktopAgent {
  private capture: ScreenCapture;
  private vision: DesktopAgentDeps["vision"];
  private input: InputDriver;
  private store: ElementRepository;
  private locator?: ElementLocator;
  private actions = 0;

  constructor(deps: DesktopAgentDeps) {
    this.capture = deps.capture;
    this.vision = deps.vision;
    this.input = deps.input;
    this.store = deps.store;
    this.locator = deps.locator;
  }

  get actionCount(): number {
    return this.actions;
  }

  get elementDetection(): boolean {
    return this.locator !== undefined;
  }

  async observe(): Promise<Observation> {
    console.log(`\n${"=".repeat(60)}`);
    console.log(`Action #${this.actions + 1} - Taking screenshot...`);

    const screen = await this.capture.takeScreenshot();
    const screenBase64 = this.capture.encode(screen);

    console.log("🔍 Analyzing screenshot...");
    const analysis = await this.vision.describeScreen(screenBase64);

    console.log("\nScreen Analysis:");
    rule();
    console.log(analysis);
    rule();

    return { screen, screenBase64, analysis };
  }

  async observeAndSuggest(goal: string): Promise<Suggestion> {
    console.log(`\n${"=".repeat(60)}`);
    console.log(`Action #${this.actions + 1} - Observing for goal: ${goal}`);

    const screen = await this.capture.takeScreenshot();
    const text = await this.vision.suggestAction(this.capture.encode(screen), goal);

    console.log("\nSuggested Action:");
    rule();
    console.log(text);
    rule();

    const parsed = parseSuggestedAction(text);
    return { text, action: parsed.status === "found" ? parsed.value : undefined };
  }

  async executeAction(action: AgentAction): Promise<void> {
    console.log(`\n▶️  Executing action: ${action.type}`);

    switch (action.type) {
      case "click":
        await this.input.click(action.x, action.y);
        break;
      case "double_click":
        await this.input.doubleClick(action.x, action.y);
        break;
      case "right_click":
        await this.input.rightClick(action.x, action.y);
        break;
      case "type":
        await this.input.type(action.text);
        break;
      case "press_key":
        await this.input.press(action.key);
        break;
      case "hotkey":
        await this.input.hotkey(...action.keys);
        break;
      case "move":
        await this.input.move(action.x, action.y, action.duration);
        break;
      case "scroll":
        await this.input.scroll(action.clicks, action.x, action.y);
        break;
      case "wait":
        console.log(`⏳ Waiting ${action.seconds} seconds...`);
        await sleep(action.seconds * 1000);
        break;
    }

    await this.recordAction();
  }

  /**
   * Finds an element by description and clicks it, learning a template the
   * first time it is seen.
   */
  async smartClick(description: string): Promise<LocateOutcome> {
    if (!this.locator) {
      console.log("⚠️  Element detection is disabled. Use click <x> <y> instead.");
      return { success: false, point: null, diagnostic: "Element detection is disabled", trace: [] };
    }

    const screen = await this.capture.takeScreenshot();
    const outcome = await this.locator.locateAndAct(description, screen, this.capture.encode(screen));

    if (outcome.success) {
      await this.recordAction();
    }
    return outcome;
  }

  async listLearnedElements(): Promise<string[]> {
    if (!this.locator) return [];
    return this.store.listNames();
  }

  async clearLearnedElements(): Promise<void> {
    await this.store.clear();
  }

  private async recordAction() {
    this.actions++;
    console.log("\n📸 Taking post-action screenshot...");
    await this.capture.takeScreenshot(`action_${String(this.actions).padStart(3, "0")}_after.png`);
  }
}
