export interface Geometry {
  left: number;
  top: number;
  width: number;
  height: number;
}

export interface Point {
  x: number;
  y: number;
}

export interface ScreenSize {
  width: number;
  height: number;
}

/**
 * A single full-screen capture. `data` is PNG-encoded.
 */
export interface ScreenImage extends ScreenSize {
  readonly data: Buffer;
  readonly capturedAt: number;
}

export interface Found<T> {
  status: "found";
  value: T;
}

export interface NotFound {
  status: "not_found";
  reason: string;
}

export type Lookup<T> = Found<T> | NotFound;

export function found<T>(value: T): Found<T> {
  return { status: "found", value };
}

export function notFound(reason: string): NotFound {
  return { status: "not_found", reason };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
