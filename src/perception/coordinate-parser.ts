import { Geometry, Lookup, ScreenSize, found, notFound } from "../types.js";

export type GeometryPolicy = "clamp" | "reject";

export type Confidence = "low" | "medium" | "high";

export interface ParsedLocation {
  geometry: Geometry;
  confidence?: Confidence;
}

export type SuggestedActionKind = "click" | "type" | "scroll" | "move" | "wait";

export interface SuggestedAction {
  action: SuggestedActionKind;
  target: string;
  reason: string;
}

const REQUIRED_KEYS = ["LEFT", "TOP", "WIDTH", "HEIGHT"] as const;
const ACTION_KINDS: readonly SuggestedActionKind[] = ["click", "type", "scroll", "move", "wait"];
const NUMBER_PATTERN = /\d+(?:\.\d+)?/;

/**
 * Splits model output into upper-cased `KEY` -> raw value pairs.
 * A key given twice keeps its last value, so an answer that follows a
 * restated list of the expected fields wins. List items ("- LEFT: ...")
 * are not keys.
 */
export function parseKeyValueLines(text: string): Map<string, string> {
  const fields = new Map<string, string>();

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    const separator = line.indexOf(":");
    if (separator <= 0) continue;

    // Models like to bold the keys ("**LEFT**: 10")
    const key = line.slice(0, separator).replace(/[*_`#]/g, "").trim().toUpperCase();
    if (key) {
      fields.set(key, line.slice(separator + 1).trim());
    }
  }

  return fields;
}

function firstNumber(value: string): number | undefined {
  const match = NUMBER_PATTERN.exec(value);
  if (!match) return undefined;
  const parsed = Number.parseFloat(match[0]);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function toPixels(percent: number, dimension: number): number {
  return Math.round((percent * dimension) / 100);
}

/**
 * Parses a `LEFT/TOP/WIDTH/HEIGHT` percentage response into pixel geometry.
 * All four keys must be present and numeric; there is no partial result.
 */
export function parseCoordinates(
  response: string,
  screenWidth: number,
  screenHeight: number
): Lookup<ParsedLocation> {
  const fields = parseKeyValueLines(response);
  const percents: Partial<Record<(typeof REQUIRED_KEYS)[number], number>> = {};

  for (const key of REQUIRED_KEYS) {
    const raw = fields.get(key);
    if (raw === undefined) {
      return notFound(`Response is missing ${key}`);
    }
    const value = firstNumber(raw);
    if (value === undefined) {
      return notFound(`${key} has no numeric value: "${raw}"`);
    }
    percents[key] = value;
  }

  const { LEFT, TOP, WIDTH, HEIGHT } = percents;
  if (LEFT === undefined || TOP === undefined || WIDTH === undefined || HEIGHT === undefined) {
    return notFound("Incomplete coordinates");
  }

  const confidence = fields.get("CONFIDENCE")?.toLowerCase();

  return found({
    geometry: {
      left: toPixels(LEFT, screenWidth),
      top: toPixels(TOP, screenHeight),
      width: toPixels(WIDTH, screenWidth),
      height: toPixels(HEIGHT, screenHeight)
    },
    confidence: confidence === "low" || confidence === "medium" || confidence === "high" ? confidence : undefined
  });
}

/**
 * Makes a geometry safe to crop from a screen of the given size.
 * An exact fit (left + width == screen width) is always valid.
 */
export function fitGeometry(geometry: Geometry, screen: ScreenSize, policy: GeometryPolicy): Lookup<Geometry> {
  const { left, top, width, height } = geometry;

  if (policy === "reject") {
    if (left < 0 || top < 0 || width <= 0 || height <= 0) {
      return notFound(`Geometry is empty or negative: ${describeGeometry(geometry)}`);
    }
    if (left + width > screen.width || top + height > screen.height) {
      return notFound(`Geometry ${describeGeometry(geometry)} exceeds screen ${screen.width}x${screen.height}`);
    }
    return found({ ...geometry });
  }

  const clampedLeft = Math.min(Math.max(0, left), screen.width);
  const clampedTop = Math.min(Math.max(0, top), screen.height);
  const clamped: Geometry = {
    left: clampedLeft,
    top: clampedTop,
    width: Math.min(left + width, screen.width) - clampedLeft,
    height: Math.min(top + height, screen.height) - clampedTop
  };

  if (clamped.width <= 0 || clamped.height <= 0) {
    return notFound(`Geometry ${describeGeometry(geometry)} has no area on screen ${screen.width}x${screen.height}`);
  }
  return found(clamped);
}

export function centerOf(geometry: Geometry): { x: number; y: number } {
  return {
    x: geometry.left + Math.floor(geometry.width / 2),
    y: geometry.top + Math.floor(geometry.height / 2)
  };
}

export function describeGeometry(geometry: Geometry): string {
  return `(${geometry.left}, ${geometry.top}) ${geometry.width}x${geometry.height}`;
}

/**
 * Parses the `ACTION / TARGET / REASON` suggestion format.
 */
export function parseSuggestedAction(response: string): Lookup<SuggestedAction> {
  const fields = parseKeyValueLines(response);
  const rawAction = fields.get("ACTION");
  if (!rawAction) {
    return notFound("Response is missing ACTION");
  }

  const action = ACTION_KINDS.find(kind => rawAction.toLowerCase().replace(/[[\]]/g, "").trim().startsWith(kind));
  if (!action) {
    return notFound(`Unknown action: "${rawAction}"`);
  }

  return found({
    action,
    target: fields.get("TARGET") ?? "",
    reason: fields.get("REASON") ?? ""
  });
}
