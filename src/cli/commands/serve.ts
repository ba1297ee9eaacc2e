/**
 * Serve command - Start the HTTP server in front of the image store
 */

import { z } from "zod";
import { createImageServer, Dispatcher } from "../../server";
import { createContext } from "../context";
import { fail } from "../fail";

const ServeOptionsSchema = z.object({
  host: z.string().optional(),
  port: z.coerce.number().int().min(0).max(65535).optional(),
});

export async function serveCommand(opts: unknown): Promise<void> {
  try {
    const options = ServeOptionsSchema.parse(opts);
    const { config, logger, store } = await createContext(opts);

    const host = options.host ?? config.server.host;
    const port = options.port ?? config.server.port;

    const server = createImageServer(
      new Dispatcher(store, logger),
      { maxBodyBytes: config.server.maxBodyBytes },
      logger,
    );

    server.on("error", fail);
    server.listen(port, host, () => {
      logger.info(
        `Serving ${config.imageDir} (${config.display.width}x${config.display.height}) on http://${host}:${port}`,
      );
    });
  } catch (error) {
    fail(error);
  }
}
