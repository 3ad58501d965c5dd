import { z } from "zod";
import { GeminiKeyPool } from "./agent/key-pool.js";
import { DEFAULT_VISION_MODEL } from "./agent/vision-analyzer.js";

/**
 * Available Modes:
 * - text: Interactive command loop in the terminal.
 * - mcp:  Model Context Protocol tool server on stdio.
 */
export const MODES = ["text", "mcp"] as const;
export type Mode = (typeof MODES)[number];

const booleanFlag = (fallback: boolean) =>
  z
    .string()
    .toLowerCase()
    .pipe(z.enum(["true", "false", "1", "0", "yes", "no"]))
    .optional()
    .transform(value => (value === undefined ? fallback : ["true", "1", "yes"].includes(value)));

const EnvSchema = z.object({
  MODE: z.string().toLowerCase().pipe(z.enum(MODES)).default("text"),
  GEMINI_MODEL: z.string().min(1).default(DEFAULT_VISION_MODEL),
  ELEMENTS_DIR: z.string().min(1).default("elements"),
  SCREENSHOTS_DIR: z.string().min(1).default("screenshots"),
  SAVE_SCREENSHOTS: booleanFlag(true),
  ELEMENT_DETECTION: booleanFlag(true),
  MATCH_CONFIDENCE: z.coerce.number().min(0).max(1).default(0.8),
  GEOMETRY_POLICY: z.string().toLowerCase().pipe(z.enum(["clamp", "reject"])).default("clamp"),
  PAUSE_BETWEEN_ACTIONS: z.coerce.number().min(0).default(0.5),
  ABORT_ON_CORNER: booleanFlag(true)
});

export interface AgentConfig {
  mode: Mode;
  apiKeys: string[];
  model: string;
  elementsDir: string;
  screenshotsDir: string;
  saveScreenshots: boolean;
  elementDetection: boolean;
  matchConfidence: number;
  geometryPolicy: "clamp" | "reject";
  input: {
    pauseBetweenActions: number;
    abortOnCorner: boolean;
  };
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Reads agent settings from the environment (after dotenv has loaded .env).
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AgentConfig {
  // Empty strings in .env mean "unset"
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ""));
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const details = parsed.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  const apiKeys = GeminiKeyPool.keysFromEnv(env);
  if (apiKeys.length === 0) {
    throw new ConfigError("Missing GEMINI_KEY_X in .env (get a key from https://aistudio.google.com/apikey)");
  }

  const settings = parsed.data;
  return {
    mode: settings.MODE,
    apiKeys,
    model: settings.GEMINI_MODEL,
    elementsDir: settings.ELEMENTS_DIR,
    screenshotsDir: settings.SCREENSHOTS_DIR,
    saveScreenshots: settings.SAVE_SCREENSHOTS,
    elementDetection: settings.ELEMENT_DETECTION,
    matchConfidence: settings.MATCH_CONFIDENCE,
    geometryPolicy: settings.GEOMETRY_POLICY,
    input: {
      pauseBetweenActions: settings.PAUSE_BETWEEN_ACTIONS,
      abortOnCorner: settings.ABORT_ON_CORNER
    }
  };
}
