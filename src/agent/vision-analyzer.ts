import { GoogleGenerativeAI } from "@google/generative-ai";
import { GeminiKeyPool } from "./key-pool.js";
import { DESCRIBE_SCREEN_PROMPT, suggestActionPrompt } from "./prompts.js";
import { errorMessage } from "../types.js";

/**
 * The vision model as the rest of the agent sees it: an image and
 * instructions in, free text out. Rejects on transport, quota or model errors.
 */
export interface PerceptionPort {
  analyze(imageBase64: string, instructions: string): Promise<string>;
}

export class PerceptionError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "PerceptionError";
  }
}

/** The slice of a Gemini GenerativeModel used here. */
export interface VisionModel {
  generateContent(
    request: Array<string | { inlineData: { data: string; mimeType: string } }>
  ): Promise<{ response: { text(): string } }>;
}

export type VisionModelFactory = (apiKey: string, model: string) => VisionModel;

export const DEFAULT_VISION_MODEL = "gemini-2.5-flash";

const defaultFactory: VisionModelFactory = (apiKey, model) =>
  new GoogleGenerativeAI(apiKey).getGenerativeModel({ model });

function isQuotaError(err: unknown): boolean {
  const message = errorMessage(err);
  return /\b429\b|quota|rate.?limit|resource.?exhausted/i.test(message);
}

/**
 * Gemini-backed perception. Quota errors rotate to the next key in the pool;
 * any other failure rejects with a PerceptionError.
 */
export class GeminiVisionAnalyzer implements PerceptionPort {
  private models = new Map<string, VisionModel>();

  constructor(
    private keyPool: GeminiKeyPool,
    private modelName: string = DEFAULT_VISION_MODEL,
    private factory: VisionModelFactory = defaultFactory
  ) {}

  async analyze(imageBase64: string, instructions: string): Promise<string> {
    const attempts = Math.max(1, this.keyPool.size());
    let lastError: unknown;

    for (let attempt = 0; attempt < attempts; attempt++) {
      const apiKey = this.keyPool.next();
      try {
        const result = await this.modelFor(apiKey).generateContent([
          instructions,
          { inlineData: { data: imageBase64, mimeType: "image/png" } }
        ]);
        this.keyPool.release(apiKey);
        return result.response.text();
      } catch (err) {
        lastError = err;
        if (!isQuotaError(err)) {
          this.keyPool.release(apiKey);
          throw new PerceptionError(`Vision request failed: ${errorMessage(err)}`, err);
        }
        console.warn(`⚠️  Gemini key hit its quota, rotating (attempt ${attempt + 1}/${attempts})`);
        this.keyPool.deprioritize(apiKey);
      }
    }

    throw new PerceptionError(`All ${attempts} Gemini key(s) are rate limited: ${errorMessage(lastError)}`, lastError);
  }

  /**
   * Free-form description of the screen. Failures come back as text.
   */
  async describeScreen(imageBase64: string, prompt: string = DESCRIBE_SCREEN_PROMPT): Promise<string> {
    try {
      return await this.analyze(imageBase64, prompt);
    } catch (err) {
      return `Error analyzing screenshot: ${errorMessage(err)}`;
    }
  }

  async suggestAction(imageBase64: string, goal: string): Promise<string> {
    return this.describeScreen(imageBase64, suggestActionPrompt(goal));
  }

  private modelFor(apiKey: string): VisionModel {
    let model = this.models.get(apiKey);
    if (!model) {
      model = this.factory(apiKey, this.modelName);
      this.models.set(apiKey, model);
    }
    return model;
  }
}
