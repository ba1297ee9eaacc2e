/**
 * SVG Rasterizer
 * Turns a sized SVG document into a pixel buffer and its PNG encoding
 */

import { Resvg, type ResvgRenderOptions } from "@resvg/resvg-js";
import type { DisplayGeometry, RenderConfig } from "./types";

export type RenderErrorKind = "invalid-input" | "internal";

export class RenderError extends Error {
  constructor(
    readonly kind: RenderErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "RenderError";
  }
}

export interface RenderedRaster {
  width: number;
  height: number;
  /** RGBA, row-major */
  pixels: Uint8Array;
  encodePng(): Uint8Array;
}

export interface Rasterizer {
  /**
   * Render `document` at exactly `size` pixels, without any fit transform
   *
   * @throws {RenderError} "invalid-input" when the markup cannot be parsed,
   *   "internal" when rendering itself fails
   */
  rasterize(document: string, size: DisplayGeometry): RenderedRaster;
}

export class ResvgRasterizer implements Rasterizer {
  constructor(private readonly options: RenderConfig) {}

  rasterize(document: string, size: DisplayGeometry): RenderedRaster {
    const renderOptions: ResvgRenderOptions = {
      // The envelope declares width/height, so original size is the target size
      fitTo: { mode: "original" },
      font: {
        loadSystemFonts: this.options.loadSystemFonts,
        ...(this.options.defaultFontFamily
          ? { defaultFontFamily: this.options.defaultFontFamily }
          : {}),
      },
    };

    let resvg: Resvg;
    try {
      resvg = new Resvg(document, renderOptions);
    } catch (error) {
      throw new RenderError("invalid-input", messageOf(error), { cause: error });
    }

    try {
      const image = resvg.render();
      if (image.width !== size.width || image.height !== size.height) {
        throw new Error(
          `Rendered ${image.width}x${image.height}, expected ${size.width}x${size.height}`,
        );
      }
      return {
        width: image.width,
        height: image.height,
        pixels: image.pixels,
        encodePng: () => image.asPng(),
      };
    } catch (error) {
      throw new RenderError("internal", messageOf(error), { cause: error });
    }
  }
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
