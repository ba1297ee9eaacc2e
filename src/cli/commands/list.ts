/**
 * List command - Print every device that has a preview image
 */

import chalk from "chalk";
import { createContext } from "../context";
import { fail } from "../fail";

export async function listCommand(opts: unknown): Promise<void> {
  try {
    const { store } = await createContext(opts);
    const addresses = await store.listDevicesSorted();

    if (addresses.length === 0) {
      console.error(chalk.yellow("No devices with images found"));
      return;
    }

    for (const address of addresses) {
      console.log(address.format());
    }
  } catch (error) {
    fail(error);
  }
}
