import { readFile, writeFile, rename, mkdir, access } from "fs/promises";
import * as path from "path";
import { z } from "zod";
import { Geometry, Lookup, errorMessage, found, notFound } from "../types.js";

export const GeometrySchema = z.object({
  left: z.number().int().nonnegative(),
  top: z.number().int().nonnegative(),
  width: z.number().int().nonnegative(),
  height: z.number().int().nonnegative()
});

export const ElementRecordSchema = z.object({
  filename: z.string().min(1),
  filepath: z.string().min(1),
  coords: GeometrySchema,
  timestamp: z.string().min(1)
});

export type StoredElement = z.infer<typeof ElementRecordSchema>;
export type ElementMap = Record<string, StoredElement>;

export interface ElementRecord extends StoredElement {
  name: string;
}

/**
 * Persistent name -> template mapping. The locator only talks to this
 * interface, so the JSON file backend can be swapped for another store.
 */
export interface ElementRepository {
  load(): Promise<ElementMap>;
  save(elements: ElementMap): Promise<void>;
  put(name: string, template: Buffer, coords: Geometry): Promise<ElementRecord>;
  get(name: string): Promise<Lookup<ElementRecord>>;
  readTemplate(record: ElementRecord): Promise<Lookup<Buffer>>;
  listNames(): Promise<string[]>;
  clear(): Promise<void>;
}

export class CorruptCacheError extends Error {
  constructor(public readonly cachePath: string, detail: string) {
    super(`Element cache ${cachePath} is corrupt: ${detail}`);
    this.name = "CorruptCacheError";
  }
}

export const CACHE_FILENAME = "elements_cache.json";

/**
 * Lookup key for an element description.
 */
export function normalizeName(name: string): string {
  return name.trim().toLowerCase();
}

/**
 * Filesystem-safe stem: alphanumerics, space, hyphen and underscore survive,
 * spaces become underscores.
 */
export function sanitizeName(name: string): string {
  const kept = Array.from(name)
    .filter(c => /[\p{L}\p{N}]/u.test(c) || c === " " || c === "-" || c === "_")
    .join("")
    .trim();
  return kept.replace(/ /g, "_").toLowerCase() || "element";
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}_${pad(date.getMilliseconds(), 3)}`;
}

function isMissingFile(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

let tmpFiles = 0;

export interface JsonElementStoreOptions {
  elementsDir?: string;
  now?: () => Date;
}

/**
 * Element cache backed by `elements_cache.json` plus one PNG per element.
 * Writes run one at a time, so concurrent `put` calls all land in the file.
 */
export class JsonElementStore implements ElementRepository {
  readonly elementsDir: string;
  readonly cachePath: string;
  private now: () => Date;
  // A Map keeps names such as "__proto__" as ordinary keys
  private elements?: Map<string, StoredElement>;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(options: JsonElementStoreOptions = {}) {
    this.elementsDir = options.elementsDir ?? "elements";
    this.cachePath = path.join(this.elementsDir, CACHE_FILENAME);
    this.now = options.now ?? (() => new Date());
  }

  async load(): Promise<ElementMap> {
    return Object.fromEntries(await this.exclusive(() => this.read()));
  }

  async save(elements: ElementMap): Promise<void> {
    await this.exclusive(() => this.write(new Map(Object.entries(elements))));
  }

  async put(name: string, template: Buffer, coords: Geometry): Promise<ElementRecord> {
    const key = normalizeName(name);

    const stored = await this.exclusive(async () => {
      const elements = this.elements ?? (await this.read());
      const timestamp = formatTimestamp(this.now());
      const filename = `${sanitizeName(key)}_${timestamp}.png`;
      const filepath = path.join(this.elementsDir, filename);

      await mkdir(this.elementsDir, { recursive: true });
      await writeFile(filepath, template);

      const record: StoredElement = { filename, filepath, coords: { ...coords }, timestamp };
      await this.write(new Map(elements).set(key, record));
      return record;
    });

    console.log(`✅ Saved element '${key}' to ${stored.filepath}`);
    return { name: key, ...stored };
  }

  async get(name: string): Promise<Lookup<ElementRecord>> {
    const key = normalizeName(name);
    const stored = (await this.ensureLoaded()).get(key);

    if (!stored) {
      return notFound(`Element '${key}' not in cache`);
    }

    try {
      await access(stored.filepath);
    } catch {
      return notFound(`Template for '${key}' is missing: ${stored.filepath}`);
    }

    return found({ name: key, ...stored });
  }

  async readTemplate(record: ElementRecord): Promise<Lookup<Buffer>> {
    try {
      return found(await readFile(record.filepath));
    } catch (err) {
      return notFound(`Cannot read template ${record.filepath}: ${errorMessage(err)}`);
    }
  }

  async listNames(): Promise<string[]> {
    return [...(await this.ensureLoaded()).keys()];
  }

  async clear(): Promise<void> {
    // Template PNGs are left on disk
    await this.exclusive(() => this.write(new Map()));
    console.log("🧹 Element cache cleared");
  }

  /** Runs `task` after every earlier queued task has settled. */
  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const result = this.queue.then(task);
    this.queue = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  private async ensureLoaded(): Promise<Map<string, StoredElement>> {
    return this.elements ?? this.exclusive(async () => this.elements ?? this.read());
  }

  private async read(): Promise<Map<string, StoredElement>> {
    let raw: string;
    try {
      raw = await readFile(this.cachePath, "utf-8");
    } catch (err) {
      if (isMissingFile(err)) {
        this.elements = new Map();
        return this.elements;
      }
      throw err;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new CorruptCacheError(this.cachePath, errorMessage(err));
    }

    if (typeof json !== "object" || json === null || Array.isArray(json)) {
      throw new CorruptCacheError(this.cachePath, "expected an object of elements");
    }

    const elements = new Map<string, StoredElement>();
    const entries: [string, unknown][] = Object.entries(json);
    for (const [name, value] of entries) {
      const parsed = ElementRecordSchema.safeParse(value);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = [name, ...(issue?.path ?? [])].join(".");
        throw new CorruptCacheError(this.cachePath, `${where}: ${issue?.message ?? "invalid record"}`);
      }
      elements.set(name, parsed.data);
    }

    this.elements = elements;
    return elements;
  }

  private async write(elements: Map<string, StoredElement>): Promise<void> {
    await mkdir(this.elementsDir, { recursive: true });

    // Write beside the cache and rename so a crash never leaves half a file
    const tmpPath = `${this.cachePath}.${process.pid}.${++tmpFiles}.tmp`;
    await writeFile(tmpPath, JSON.stringify(Object.fromEntries(elements), null, 2), "utf-8");
    await rename(tmpPath, this.cachePath);

    this.elements = new Map(elements);
  }
}
