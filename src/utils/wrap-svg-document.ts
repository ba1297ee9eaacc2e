import type { DisplayGeometry } from "../types";

export const SVG_NAMESPACE = "http://www.w3.org/2000/svg";

/**
 * Wrap caller-supplied inner SVG markup in a root element whose viewport is
 * the display geometry. The document starts with the <svg> element itself
 * (no XML prolog) so the stored file's first tag is always the root.
 */
export function wrapSvgDocument(body: string, display: DisplayGeometry): string {
  const { width, height } = display;
  return (
    `<svg xmlns="${SVG_NAMESPACE}" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">` +
    body +
    "</svg>"
  );
}
