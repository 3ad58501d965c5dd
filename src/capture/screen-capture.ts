import { mkdir, writeFile } from "fs/promises";
import * as path from "path";
import screenshot from "screenshot-desktop";
import sharp from "sharp";
import { ScreenImage } from "../types.js";

export type ScreenGrabber = () => Promise<Buffer>;

export interface ScreenCaptureOptions {
  saveScreenshots?: boolean;
  screenshotsDir?: string;
  grab?: ScreenGrabber;
  now?: () => Date;
}

const grabPrimaryDisplay: ScreenGrabber = () => screenshot({ format: "png" });

function screenshotName(date: Date): string {
  const iso = date.toISOString().replace(/[-:]/g, "").replace("T", "_");
  return `screenshot_${iso.slice(0, 15)}.png`;
}

export class ScreenCapture {
  readonly saveScreenshots: boolean;
  readonly screenshotsDir: string;
  private grab: ScreenGrabber;
  private now: () => Date;

  constructor(options: ScreenCaptureOptions = {}) {
    this.saveScreenshots = options.saveScreenshots ?? true;
    this.screenshotsDir = options.screenshotsDir ?? "screenshots";
    this.grab = options.grab ?? grabPrimaryDisplay;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Captures the screen. When saving is enabled the PNG is also written to
   * the screenshots directory under `filename` or a timestamped name.
   */
  async takeScreenshot(filename?: string): Promise<ScreenImage> {
    const png = await this.grab();
    const { width, height } = await sharp(png).metadata();
    if (!width || !height) {
      throw new Error("Screenshot has no readable dimensions");
    }

    const capturedAt = this.now();
    if (this.saveScreenshots) {
      await mkdir(this.screenshotsDir, { recursive: true });
      const filepath = path.join(this.screenshotsDir, filename ?? screenshotName(capturedAt));
      await writeFile(filepath, png);
      console.log(`📸 Screenshot saved to ${filepath}`);
    }

    return { data: png, width, height, capturedAt: capturedAt.getTime() };
  }

  encode(image: ScreenImage): string {
    return image.data.toString("base64");
  }
}
