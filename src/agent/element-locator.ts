import { InputDriver } from "../control/input-driver.js";
import { CorruptCacheError, ElementRecord, ElementRepository } from "../memory/element-store.js";
import {
  GeometryPolicy,
  centerOf,
  describeGeometry,
  fitGeometry,
  parseCoordinates
} from "../perception/coordinate-parser.js";
import { TemplateMatcher } from "../vision/template-matcher.js";
import { Geometry, Lookup, Point, ScreenImage, errorMessage } from "../types.js";
import { PerceptionPort } from "./vision-analyzer.js";
import { locateElementPrompt } from "./prompts.js";

export type LocatorState =
  | "idle"
  | "matching"
  | "matched"
  | "needs_learning"
  | "estimating"
  | "learned"
  | "failed"
  | "done";

export interface LocateOutcome {
  success: boolean;
  point: Point | null;
  /** How the point was obtained */
  source?: "template" | "estimate";
  geometry?: Geometry;
  confidence?: number;
  diagnostic?: string;
  trace: LocatorState[];
}

export interface ElementLocatorOptions {
  store: ElementRepository;
  perception: PerceptionPort;
  matcher: TemplateMatcher;
  input: InputDriver;
  /** Minimum template match score, 0-1 */
  minConfidence?: number;
  geometryPolicy?: GeometryPolicy;
}

type Resolution =
  | { kind: "resolved"; point: Point; geometry: Geometry; source: "template" | "estimate"; confidence?: number }
  | { kind: "failed"; diagnostic: string };

/**
 * Finds a described element and clicks it. Known elements are re-found by
 * template matching; unknown or stale ones are estimated by the vision model,
 * cropped into a new template and stored.
 */
export class ElementLocator {
  private store: ElementRepository;
  private perception: PerceptionPort;
  private matcher: TemplateMatcher;
  private input: InputDriver;
  readonly minConfidence: number;
  readonly geometryPolicy: GeometryPolicy;

  constructor(options: ElementLocatorOptions) {
    this.store = options.store;
    this.perception = options.perception;
    this.matcher = options.matcher;
    this.input = options.input;
    this.minConfidence = options.minConfidence ?? 0.8;
    this.geometryPolicy = options.geometryPolicy ?? "clamp";
  }

  /**
   * Never rejects for a missing element, a bad model response or an input
   * failure; those end in `success: false`. A corrupt cache file does reject.
   */
  async locateAndAct(description: string, screen: ScreenImage, screenBase64: string): Promise<LocateOutcome> {
    const trace: LocatorState[] = ["idle"];
    const enter = (state: LocatorState, detail?: string) => {
      trace.push(state);
      console.log(`   ↳ ${state}${detail ? `: ${detail}` : ""}`);
    };

    console.log(`\n🎯 Locating: ${description}`);

    enter("matching");
    let resolution = await this.matchStored(description, screen);

    if (resolution.kind === "failed") {
      enter("needs_learning", resolution.diagnostic);
      enter("estimating");
      resolution = await this.estimate(description, screen, screenBase64);
      enter(resolution.kind === "resolved" ? "learned" : "failed",
        resolution.kind === "resolved" ? describeGeometry(resolution.geometry) : resolution.diagnostic);
    } else {
      enter("matched", `(${resolution.point.x}, ${resolution.point.y})`);
    }

    if (resolution.kind === "resolved") {
      const { point } = resolution;
      try {
        await this.input.click(point.x, point.y);
      } catch (err) {
        resolution = { kind: "failed", diagnostic: `Click at (${point.x}, ${point.y}) failed: ${errorMessage(err)}` };
        enter("failed", resolution.diagnostic);
      }
    }

    enter("done");

    if (resolution.kind === "failed") {
      console.log(`❌ Could not find element '${description}'`);
      return { success: false, point: null, diagnostic: resolution.diagnostic, trace };
    }

    return {
      success: true,
      point: resolution.point,
      source: resolution.source,
      geometry: resolution.geometry,
      confidence: resolution.confidence,
      trace
    };
  }

  private async matchStored(description: string, screen: ScreenImage): Promise<Resolution> {
    let lookup: Lookup<ElementRecord>;
    try {
      lookup = await this.store.get(description);
    } catch (err) {
      if (err instanceof CorruptCacheError) throw err;
      return { kind: "failed", diagnostic: `Element cache unavailable: ${errorMessage(err)}` };
    }
    if (lookup.status === "not_found") {
      return { kind: "failed", diagnostic: lookup.reason };
    }

    const template = await this.store.readTemplate(lookup.value);
    if (template.status === "not_found") {
      return { kind: "failed", diagnostic: template.reason };
    }

    try {
      const match = await this.matcher.match(screen, template.value, this.minConfidence);
      if (match.status === "not_found") {
        return { kind: "failed", diagnostic: match.reason };
      }
      const { center, confidence, left, top, width, height } = match.value;
      return {
        kind: "resolved",
        point: center,
        geometry: { left, top, width, height },
        source: "template",
        confidence
      };
    } catch (err) {
      return { kind: "failed", diagnostic: `Template search failed: ${errorMessage(err)}` };
    }
  }

  private async estimate(description: string, screen: ScreenImage, screenBase64: string): Promise<Resolution> {
    let response: string;
    try {
      response = await this.perception.analyze(screenBase64, locateElementPrompt(description, screen));
    } catch (err) {
      return { kind: "failed", diagnostic: `Perception failure: ${errorMessage(err)}` };
    }

    console.log("\nAI Element Detection Response:");
    console.log("-".repeat(60));
    console.log(response);
    console.log("-".repeat(60));

    const parsed = parseCoordinates(response, screen.width, screen.height);
    if (parsed.status === "not_found") {
      return { kind: "failed", diagnostic: parsed.reason };
    }

    const fitted = fitGeometry(parsed.value.geometry, screen, this.geometryPolicy);
    if (fitted.status === "not_found") {
      return { kind: "failed", diagnostic: fitted.reason };
    }
    const geometry = fitted.value;

    try {
      const template = await this.matcher.crop(screen, geometry);
      await this.store.put(description, template, geometry);
    } catch (err) {
      if (err instanceof CorruptCacheError) throw err;
      return { kind: "failed", diagnostic: `Could not store template: ${errorMessage(err)}` };
    }

    return { kind: "resolved", point: centerOf(geometry), geometry, source: "estimate" };
  }
}
