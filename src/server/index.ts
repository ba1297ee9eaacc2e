/**
 * HTTP Server
 * Thin adapter between node:http and the dispatcher
 */

import { createServer, type IncomingMessage, type Server } from "node:http";
import { pipeline } from "node:stream/promises";
import { Dispatcher, PayloadTooLargeError } from "./dispatcher";
import type { Logger } from "../utils/logger";

export { Dispatcher, PayloadTooLargeError, matchRoute } from "./dispatcher";
export type { DispatchRequest, DispatchResponse } from "./dispatcher";

export interface ServerOptions {
  maxBodyBytes: number;
}

/**
 * Collect the request body as UTF-8, refusing more than `limit` bytes.
 * An oversized body is still drained to its end so the connection can carry
 * the 413 response.
 */
export async function readBody(req: IncomingMessage, limit: number): Promise<string> {
  const chunks: Buffer[] = [];
  let total = 0;

  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    total += buffer.length;
    if (total <= limit) {
      chunks.push(buffer);
    }
  }

  if (total > limit) {
    throw new PayloadTooLargeError(limit);
  }
  return Buffer.concat(chunks).toString("utf-8");
}

/**
 * Path part of a request target, or null when the target is not a valid URL
 * reference (e.g. "//")
 */
export function requestPathname(target: string | undefined): string | null {
  try {
    return new URL(target ?? "/", "http://localhost").pathname;
  } catch {
    return null;
  }
}

export function createImageServer(
  dispatcher: Dispatcher,
  options: ServerOptions,
  logger: Logger,
): Server {
  return createServer((req, res) => {
    const pathname = requestPathname(req.url);
    if (pathname === null) {
      logger.debug(`Rejecting unparseable request target ${JSON.stringify(req.url)}`);
      res.writeHead(400, { "content-type": "application/json" });
      res.end(JSON.stringify({ error: "bad-request", message: "Invalid request target" }));
      return;
    }

    dispatcher
      .dispatch({
        method: req.method ?? "GET",
        pathname,
        readBody: () => readBody(req, options.maxBodyBytes),
      })
      .then(async (response) => {
        res.writeHead(response.status, response.headers);
        if (response.body === undefined) {
          res.end();
        } else if (typeof response.body === "string") {
          res.end(response.body);
        } else {
          // Destroys the file stream (and closes its handle) if the client goes away
          await pipeline(response.body, res);
        }
      })
      .catch((error: unknown) => {
        logger.warn(`Response for ${req.method} ${pathname} aborted: ${String(error)}`);
        if (res.headersSent) {
          res.destroy();
          return;
        }
        res.writeHead(500, { "content-type": "application/json" });
        res.end(JSON.stringify({ error: "internal", message: "Internal server error" }));
      });
  });
}
