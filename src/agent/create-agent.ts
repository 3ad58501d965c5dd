import { ScreenCapture } from "../capture/screen-capture.js";
import { DesktopInputDriver, loadDesktopBackend } from "../control/input-driver.js";
import { AgentConfig } from "../config.js";
import { JsonElementStore } from "../memory/element-store.js";
import { SharpTemplateMatcher } from "../vision/template-matcher.js";
import { DesktopAgent } from "./desktop-agent.js";
import { ElementLocator } from "./element-locator.js";
import { GeminiKeyPool } from "./key-pool.js";
import { GeminiVisionAnalyzer } from "./vision-analyzer.js";

/**
 * Wires the production collaborators together from configuration.
 */
export async function createDesktopAgent(config: AgentConfig): Promise<DesktopAgent> {
  console.log("Initializing Desktop Element Agent...");

  const keyPool = new GeminiKeyPool(config.apiKeys);
  const vision = new GeminiVisionAnalyzer(keyPool, config.model);
  const capture = new ScreenCapture({
    saveScreenshots: config.saveScreenshots,
    screenshotsDir: config.screenshotsDir
  });
  const input = new DesktopInputDriver(await loadDesktopBackend(), config.input);
  const store = new JsonElementStore({ elementsDir: config.elementsDir });

  // A corrupt cache stops startup here
  await store.load();

  const locator = config.elementDetection
    ? new ElementLocator({
        store,
        perception: vision,
        matcher: new SharpTemplateMatcher(),
        input,
        minConfidence: config.matchConfidence,
        geometryPolicy: config.geometryPolicy
      })
    : undefined;

  if (locator) {
    console.log(`✅ Element detection enabled (${(await store.listNames()).length} known element(s))`);
  }
  console.log(`✅ Using ${config.model} with ${keyPool.size()} API key(s)`);

  return new DesktopAgent({ capture, vision, input, store, locator });
}
