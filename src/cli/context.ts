/**
 * Shared command setup - validates global options, loads config and wires
 * the logger, rasterizer and store together
 */

import { z } from "zod";
import { ImageStore } from "../image-store";
import { ResvgRasterizer } from "../rasterizer";
import type { PartialStoreConfig, StoreConfig } from "../types";
import { loadConfig, Logger } from "../utils";

export const GlobalOptionsSchema = z.object({
  imageDir: z.string().optional(),
  epdWidth: z.coerce.number().int().positive().optional(),
  epdHeight: z.coerce.number().int().positive().optional(),
  config: z.string().optional(),
  verbose: z.boolean().optional(),
});

export type GlobalOptions = z.infer<typeof GlobalOptionsSchema>;

export interface CommandContext {
  config: StoreConfig;
  logger: Logger;
  store: ImageStore;
}

/**
 * Turn validated CLI flags into a config layer, leaving unset flags out
 */
export function toOverrides(options: GlobalOptions): PartialStoreConfig {
  const overrides: PartialStoreConfig = {};

  if (options.imageDir) {
    overrides.imageDir = options.imageDir;
  }

  const display: NonNullable<PartialStoreConfig["display"]> = {};
  if (options.epdWidth !== undefined) display.width = options.epdWidth;
  if (options.epdHeight !== undefined) display.height = options.epdHeight;
  if (Object.keys(display).length > 0) overrides.display = display;

  if (options.verbose) {
    overrides.logging = { level: "debug" };
  }

  return overrides;
}

export async function createContext(opts: unknown): Promise<CommandContext> {
  const options = GlobalOptionsSchema.parse(opts);
  const { config, errors } = await loadConfig(options.config, toOverrides(options));

  const logger = new Logger(config.logging.level);
  for (const err of errors) {
    logger.warn(`Ignoring config ${err.path}: ${err.error.message}`);
  }
  logger.debug(`Config: ${JSON.stringify(config)}`);

  const store = new ImageStore(
    { imageDir: config.imageDir, display: config.display },
    new ResvgRasterizer(config.render),
    logger,
  );

  return { config, logger, store };
}
