/**
 * Stored asset type definitions
 */

import type { Readable } from "node:stream";
import type { DisplayConfig } from "./config";

/**
 * The three representations a device image can be stored in.
 * RasterImage (.bmp) is legacy: only ever read or deleted, never written.
 */
export type AssetKind = "VectorSource" | "RasterImage" | "PreviewImage";

export interface AssetFormat {
  extension: string;
  contentType: string;
}

export const ASSET_FORMATS: Readonly<Record<AssetKind, AssetFormat>> = {
  VectorSource: { extension: "svg", contentType: "image/svg+xml" },
  RasterImage: { extension: "bmp", contentType: "image/bmp" },
  PreviewImage: { extension: "png", contentType: "image/png" },
};

// Order used by deleteDevice; the preview is removed last
export const ASSET_KINDS: readonly AssetKind[] = [
  "VectorSource",
  "RasterImage",
  "PreviewImage",
];

/**
 * Looks up an asset kind by its file extension (without the dot)
 */
export function assetKindFromExtension(extension: string): AssetKind | null {
  const ext = extension.toLowerCase();
  for (const kind of ASSET_KINDS) {
    if (ASSET_FORMATS[kind].extension === ext) return kind;
  }
  return null;
}

export type DisplayGeometry = Readonly<DisplayConfig>;

/**
 * Immutable settings injected into the store at construction
 */
export interface StoreSettings {
  readonly imageDir: string;
  readonly display: DisplayGeometry;
}

/**
 * An opened asset: a lazily-consumed stream over the file handle.
 * Destroying the stream releases the handle.
 */
export interface AssetStream {
  kind: AssetKind;
  contentType: string;
  size: number;
  stream: Readable;
}
