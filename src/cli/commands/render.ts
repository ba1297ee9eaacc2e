/**
 * Render command - Render an SVG body fragment from a file and store it
 */

import { readFile } from "fs/promises";
import ora from "ora";
import { DeviceAddress } from "../../address";
import { createContext } from "../context";
import { fail } from "../fail";

export async function renderCommand(
  mac: string,
  file: string,
  opts: unknown,
): Promise<void> {
  const spinner = ora({ text: "Initializing...", indent: 2 }).start();

  try {
    const address = DeviceAddress.parse(mac);
    const { store } = await createContext(opts);
    const { width, height } = store.settings.display;

    spinner.text = `Reading ${file}...`;
    const body = await readFile(file, "utf-8");

    spinner.text = `Rendering ${width}x${height} image for ${address}...`;
    await store.renderAndStore(address, body);

    spinner.succeed(`Stored image for ${address}`);
  } catch (error) {
    spinner.fail("Render failed");
    fail(error);
  }
}
