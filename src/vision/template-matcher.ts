import sharp from "sharp";
import { Geometry, Lookup, Point, ScreenImage, found, notFound } from "../types.js";

export interface TemplateMatch extends Geometry {
  center: Point;
  /** Normalized cross-correlation, 0-1 */
  confidence: number;
}

/**
 * Image operations the locator needs: cutting a template out of a capture
 * and finding a template inside a capture.
 */
export interface TemplateMatcher {
  crop(screen: ScreenImage, geometry: Geometry): Promise<Buffer>;
  match(screen: ScreenImage, template: Buffer, minConfidence: number): Promise<Lookup<TemplateMatch>>;
}

export interface GrayImage {
  data: Float64Array;
  width: number;
  height: number;
}

const MIN_COARSE_SIDE = 8;
const MAX_STRIDE = 8;
const TARGET_COARSE_PIXELS = 256;
const COARSE_CANDIDATES = 8;
const COARSE_MARGIN = 0.4;

async function toGray(png: Buffer): Promise<GrayImage> {
  const { data, info } = await sharp(png)
    .removeAlpha()
    .grayscale()
    .raw()
    .toBuffer({ resolveWithObject: true });

  const { width, height, channels } = info;
  const pixels = new Float64Array(width * height);
  for (let i = 0; i < pixels.length; i++) {
    let sum = 0;
    for (let c = 0; c < channels; c++) sum += data[i * channels + c];
    pixels[i] = sum / channels;
  }
  return { data: pixels, width, height };
}

/** Summed-area tables of pixel values and squared values, one row and column of padding. */
interface Integral {
  sum: Float64Array;
  sq: Float64Array;
  stride: number;
}

function integral(image: GrayImage): Integral {
  const stride = image.width + 1;
  const sum = new Float64Array(stride * (image.height + 1));
  const sq = new Float64Array(stride * (image.height + 1));

  for (let y = 0; y < image.height; y++) {
    let rowSum = 0;
    let rowSq = 0;
    for (let x = 0; x < image.width; x++) {
      const v = image.data[y * image.width + x];
      rowSum += v;
      rowSq += v * v;
      const at = (y + 1) * stride + x + 1;
      sum[at] = sum[at - stride] + rowSum;
      sq[at] = sq[at - stride] + rowSq;
    }
  }
  return { sum, sq, stride };
}

function boxTotal(table: Float64Array, stride: number, x: number, y: number, width: number, height: number): number {
  const top = y * stride;
  const bottom = (y + height) * stride;
  return table[bottom + x + width] - table[bottom + x] - table[top + x + width] + table[top + x];
}

/**
 * Box-filtered copy of the image sampled every `step` pixels, starting at
 * `offset`. Boxes are twice the step wide so neighbouring samples overlap.
 */
function pool(image: GrayImage, table: Integral, step: Strides, offset: Point): GrayImage {
  const boxW = step.x === 1 ? 1 : step.x * 2;
  const boxH = step.y === 1 ? 1 : step.y * 2;
  const width = Math.max(0, Math.floor((image.width - offset.x - boxW) / step.x) + 1);
  const height = Math.max(0, Math.floor((image.height - offset.y - boxH) / step.y) + 1);
  const data = new Float64Array(width * height);
  const area = boxW * boxH;

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      data[y * width + x] =
        boxTotal(table.sum, table.stride, offset.x + x * step.x, offset.y + y * step.y, boxW, boxH) / area;
    }
  }
  return { data, width, height };
}

interface TemplateStats {
  width: number;
  height: number;
  /** Pixel values with the mean subtracted */
  centered: Float64Array;
  norm: number;
}

function templateStats(image: GrayImage): TemplateStats {
  const n = image.data.length;
  let sum = 0;
  for (let i = 0; i < n; i++) sum += image.data[i];
  const mean = sum / n;

  const centered = new Float64Array(n);
  let sq = 0;
  for (let i = 0; i < n; i++) {
    centered[i] = image.data[i] - mean;
    sq += centered[i] * centered[i];
  }
  // Rounding noise on a flat image is not contrast
  const norm = n > 0 && sq > 1e-9 * n ? Math.sqrt(sq) : 0;
  return { width: image.width, height: image.height, centered, norm };
}

/**
 * Pearson correlation between the template and the source window at (x, y),
 * clipped to [0, 1]. Window sums come from the source's summed-area tables.
 */
function correlationAt(source: GrayImage, table: Integral, template: TemplateStats, x: number, y: number): number {
  const { width: tw, height: th, centered, norm } = template;

  let cross = 0;
  for (let ty = 0; ty < th; ty++) {
    const srcRow = (y + ty) * source.width + x;
    const tplRow = ty * tw;
    for (let tx = 0; tx < tw; tx++) {
      cross += source.data[srcRow + tx] * centered[tplRow + tx];
    }
  }

  const n = tw * th;
  const sum = boxTotal(table.sum, table.stride, x, y, tw, th);
  const sumSq = boxTotal(table.sq, table.stride, x, y, tw, th);
  const srcVariance = sumSq - (sum * sum) / n;
  if (srcVariance <= 1e-9 * n || norm === 0) return 0;

  const r = cross / (Math.sqrt(srcVariance) * norm);
  return Math.max(0, Math.min(1, r));
}

interface Candidate {
  x: number;
  y: number;
  score: number;
}

function pushCandidate(candidates: Candidate[], candidate: Candidate, limit: number) {
  if (candidates.length === limit && candidate.score <= candidates[candidates.length - 1].score) return;
  candidates.push(candidate);
  candidates.sort((a, b) => b.score - a.score);
  if (candidates.length > limit) candidates.pop();
}

export interface Strides {
  x: number;
  y: number;
}

/**
 * Sampling steps for the coarse pass. Aims for a coarse template of about
 * 256 pixels, at least eight on each side, and never skips more than eight
 * pixels. Thin templates get a step of 1 along their short axis.
 */
export function chooseStrides(templateWidth: number, templateHeight: number): Strides {
  const area = templateWidth * templateHeight;
  const even = Math.sqrt(area / TARGET_COARSE_PIXELS);
  const y = Math.max(1, Math.min(MAX_STRIDE, Math.floor(even), Math.floor(templateHeight / MIN_COARSE_SIDE)));
  const x = Math.max(
    1,
    Math.min(MAX_STRIDE, Math.floor(area / (TARGET_COARSE_PIXELS * y)), Math.floor(templateWidth / MIN_COARSE_SIDE))
  );
  return { x, y };
}

/** Sample offsets tried along one axis: the grid itself and the grid shifted by half a step. */
function phases(step: number): number[] {
  return step === 1 ? [0] : [0, Math.floor(step / 2)];
}

/**
 * Locates a template in a larger image using normalized cross-correlation.
 * A coarse pass compares box-filtered samples of template and screen on a
 * grid of `chooseStrides` steps, at two phases per axis, and keeps the best
 * few positions. Each is refined at full resolution within half a step.
 */
export function findTemplate(
  source: GrayImage,
  template: GrayImage,
  minConfidence: number
): Lookup<TemplateMatch> {
  if (template.width > source.width || template.height > source.height) {
    return notFound(`Template ${template.width}x${template.height} is larger than screen ${source.width}x${source.height}`);
  }

  const full = templateStats(template);
  if (full.norm === 0) {
    return notFound("Template has no contrast");
  }

  const step = chooseStrides(template.width, template.height);
  const sourceTable = integral(source);
  const maxX = source.width - template.width;
  const maxY = source.height - template.height;
  const candidates: Candidate[] = [];

  const refine = (left: number, right: number, top: number, bottom: number) => {
    for (let y = Math.max(0, top); y <= Math.min(maxY, bottom); y++) {
      for (let x = Math.max(0, left); x <= Math.min(maxX, right); x++) {
        const score = correlationAt(source, sourceTable, full, x, y);
        if (score >= minConfidence) pushCandidate(candidates, { x, y, score }, 1);
      }
    }
  };

  if (step.x === 1 && step.y === 1) {
    refine(0, maxX, 0, maxY);
  } else {
    const coarseSource = pool(source, sourceTable, step, { x: 0, y: 0 });
    const coarseTable = integral(coarseSource);
    const templateTable = integral(template);
    const floor = Math.max(0, minConfidence - COARSE_MARGIN);
    const seeds: Candidate[] = [];
    let contrasted = 0;

    for (const py of phases(step.y)) {
      for (const px of phases(step.x)) {
        const phase = templateStats(pool(template, templateTable, step, { x: px, y: py }));
        if (phase.norm === 0) continue;
        contrasted++;

        const limitX = coarseSource.width - phase.width;
        const limitY = coarseSource.height - phase.height;
        for (let cy = 0; cy <= limitY; cy++) {
          for (let cx = 0; cx <= limitX; cx++) {
            // Sample (px, py) of the template lines up with sample (cx, cy) of the screen
            const x = Math.max(0, Math.min(maxX, cx * step.x - px));
            const y = Math.max(0, Math.min(maxY, cy * step.y - py));
            const score = correlationAt(coarseSource, coarseTable, phase, cx, cy);
            if (score >= floor) pushCandidate(seeds, { x, y, score }, COARSE_CANDIDATES);
          }
        }
      }
    }

    if (contrasted === 0) {
      // Detail finer than the coarse grid
      refine(0, maxX, 0, maxY);
    }

    const reachX = step.x === 1 ? 0 : Math.ceil(step.x / 2);
    const reachY = step.y === 1 ? 0 : Math.ceil(step.y / 2);
    for (const seed of seeds) {
      refine(seed.x - reachX, seed.x + reachX, seed.y - reachY, seed.y + reachY);
    }
  }

  const best = candidates[0];
  if (!best) {
    return notFound(`No match at confidence >= ${minConfidence}`);
  }

  return found({
    left: best.x,
    top: best.y,
    width: template.width,
    height: template.height,
    center: {
      x: best.x + Math.floor(template.width / 2),
      y: best.y + Math.floor(template.height / 2)
    },
    confidence: best.score
  });
}

export class SharpTemplateMatcher implements TemplateMatcher {
  async crop(screen: ScreenImage, geometry: Geometry): Promise<Buffer> {
    return sharp(screen.data)
      .extract({ left: geometry.left, top: geometry.top, width: geometry.width, height: geometry.height })
      .png()
      .toBuffer();
  }

  async match(screen: ScreenImage, template: Buffer, minConfidence: number): Promise<Lookup<TemplateMatch>> {
    const [source, tpl] = await Promise.all([toGray(screen.data), toGray(template)]);
    return findTemplate(source, tpl, minConfidence);
  }
}
