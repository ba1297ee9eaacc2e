/**
 * Request Dispatcher
 * Maps HTTP methods and paths onto image store operations, and store errors
 * onto status codes
 *
 *   GET    /macs              sorted list of device addresses (JSON)
 *   GET    /macs/:mac/svg     vector source
 *   GET    /macs/:mac/png     preview image
 *   GET    /macs/:mac/bmp     legacy raster image
 *   PUT    /macs/:mac/svg     render and store an SVG body fragment
 *   DELETE /macs/:mac         delete every image of a device
 */

import type { Readable } from "node:stream";
import { DeviceAddress } from "../address";
import { isStoreError, type StoreErrorKind } from "../errors";
import type { ImageStore } from "../image-store";
import { assetKindFromExtension, type AssetKind } from "../types";
import { Logger } from "../utils/logger";

export interface DispatchRequest {
  method: string;
  pathname: string;
  /** Reads the request body; may reject with PayloadTooLargeError */
  readBody: () => Promise<string>;
}

export interface DispatchResponse {
  status: number;
  headers: Record<string, string>;
  body?: string | Readable;
}

export class PayloadTooLargeError extends Error {
  constructor(readonly limit: number) {
    super(`Request body exceeds ${limit} bytes`);
    this.name = "PayloadTooLargeError";
  }
}

const STATUS_BY_KIND: Record<StoreErrorKind, number> = {
  "invalid-address": 400,
  "invalid-vector-input": 400,
  "asset-not-found": 404,
  "store-unavailable": 500,
};

type Route =
  | { name: "list" }
  | { name: "device"; mac: string }
  | { name: "asset"; mac: string; kind: AssetKind };

const LIST_PATTERN = /^\/macs\/?$/;
const DEVICE_PATTERN = /^\/macs\/([^/]+)\/?$/;
const ASSET_PATTERN = /^\/macs\/([^/]+)\/([a-z]+)$/;

// Malformed escapes are left as-is; address parsing rejects them later
function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

/**
 * Resolve a path to a route, or null for unknown paths
 */
export function matchRoute(pathname: string): Route | null {
  if (LIST_PATTERN.test(pathname)) return { name: "list" };

  const device = DEVICE_PATTERN.exec(pathname);
  if (device) return { name: "device", mac: decodeSegment(device[1]) };

  const asset = ASSET_PATTERN.exec(pathname);
  if (asset) {
    const kind = assetKindFromExtension(asset[2]);
    if (kind) return { name: "asset", mac: decodeSegment(asset[1]), kind };
  }

  return null;
}

function allowedMethods(route: Route): string[] {
  switch (route.name) {
    case "list":
      return ["GET"];
    case "device":
      return ["DELETE"];
    case "asset":
      return route.kind === "VectorSource" ? ["GET", "PUT"] : ["GET"];
  }
}

function json(status: number, value: unknown): DispatchResponse {
  return {
    status,
    headers: { "content-type": "application/json" },
    body: JSON.stringify(value),
  };
}

function failure(status: number, error: string, message: string): DispatchResponse {
  return json(status, { error, message });
}

export class Dispatcher {
  constructor(
    private readonly store: ImageStore,
    private readonly logger: Logger = new Logger("silent"),
  ) {}

  async dispatch(request: DispatchRequest): Promise<DispatchResponse> {
    const started = Date.now();
    const response = await this.handle(request);
    this.logger.debug(
      `${request.method} ${request.pathname} -> ${response.status} (${Date.now() - started}ms)`,
    );
    return response;
  }

  private async handle(request: DispatchRequest): Promise<DispatchResponse> {
    const route = matchRoute(request.pathname);
    if (!route) {
      return failure(404, "not-found", `No route for ${request.pathname}`);
    }

    const allowed = allowedMethods(route);
    if (!allowed.includes(request.method)) {
      return {
        ...failure(405, "method-not-allowed", `${request.method} is not allowed here`),
        headers: { "content-type": "application/json", allow: allowed.join(", ") },
      };
    }

    try {
      switch (route.name) {
        case "list": {
          const addresses = await this.store.listDevicesSorted();
          return json(200, addresses.map((address) => address.format()));
        }

        case "device": {
          const address = DeviceAddress.parse(route.mac);
          await this.store.deleteDevice(address);
          return { status: 200, headers: {} };
        }

        case "asset": {
          const address = DeviceAddress.parse(route.mac);
          if (request.method === "PUT") {
            const body = await request.readBody();
            await this.store.renderAndStore(address, body);
            return { status: 204, headers: {} };
          }

          const asset = await this.store.readAsset(address, route.kind);
          return {
            status: 200,
            headers: {
              "content-type": asset.contentType,
              "content-length": String(asset.size),
            },
            body: asset.stream,
          };
        }
      }
    } catch (error) {
      return this.toResponse(error);
    }
  }

  private toResponse(error: unknown): DispatchResponse {
    if (error instanceof PayloadTooLargeError) {
      return failure(413, "payload-too-large", error.message);
    }

    if (isStoreError(error)) {
      const status = STATUS_BY_KIND[error.kind];
      if (status >= 500) {
        this.logger.error(`${error.operation} failed: ${error.message}`, error.cause);
      }
      return failure(status, error.kind, error.message);
    }

    this.logger.error("Unexpected error while handling request", error);
    return failure(500, "internal", "Internal server error");
  }
}
