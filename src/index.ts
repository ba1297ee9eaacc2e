/**
 * epd-image-store - device-keyed image store and SVG rendering for e-paper displays
 *
 * Main entry point exporting the public API.
 */

// Core store API
export { DeviceAddress, parseAddress, formatAddress, ADDRESS_LENGTH } from "./address";
export { ImageStore } from "./image-store";
export { ResvgRasterizer, RenderError } from "./rasterizer";
export type { Rasterizer, RenderedRaster, RenderErrorKind } from "./rasterizer";

// HTTP surface
export { Dispatcher, PayloadTooLargeError, matchRoute, createImageServer, readBody } from "./server";
export type { DispatchRequest, DispatchResponse, ServerOptions } from "./server";

// Models and types
export * from "./types";

// Errors
export * from "./errors";

// Utilities
export { loadConfig, loadDefaultConfig, getUserConfigPath, wrapSvgDocument, Logger } from "./utils";
