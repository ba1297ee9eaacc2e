/**
 * Show command - Stream one stored asset to stdout
 */

import { pipeline } from "node:stream/promises";
import { z } from "zod";
import { DeviceAddress } from "../../address";
import { assetKindFromExtension } from "../../types";
import { createContext } from "../context";
import { fail } from "../fail";

const ShowOptionsSchema = z.object({
  kind: z.enum(["svg", "png", "bmp"]).default("svg"),
});

export async function showCommand(mac: string, opts: unknown): Promise<void> {
  try {
    const { kind: extension } = ShowOptionsSchema.parse(opts);
    const address = DeviceAddress.parse(mac);
    const { store } = await createContext(opts);

    const kind = assetKindFromExtension(extension);
    if (!kind) {
      throw new Error(`Unknown asset kind: ${extension}`);
    }

    const asset = await store.readAsset(address, kind);
    await pipeline(asset.stream, process.stdout);
  } catch (error) {
    fail(error);
  }
}
