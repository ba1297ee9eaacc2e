/**
 * Delete command - Remove every stored image of a device
 */

import chalk from "chalk";
import { DeviceAddress } from "../../address";
import { createContext } from "../context";
import { fail } from "../fail";

export async function deleteCommand(mac: string, opts: unknown): Promise<void> {
  try {
    const address = DeviceAddress.parse(mac);
    const { store } = await createContext(opts);

    await store.deleteDevice(address);
    console.log(chalk.green(`✓ Deleted images for ${address}`));
  } catch (error) {
    fail(error);
  }
}
