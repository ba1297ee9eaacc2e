#!/usr/bin/env node

/**
 * CLI entry point for the e-paper display image store
 * Handles command-line argument parsing and user interaction
 */

import { Command } from "commander";
import { configCommand } from "./commands/config";
import { deleteCommand } from "./commands/delete";
import { listCommand } from "./commands/list";
import { renderCommand } from "./commands/render";
import { serveCommand } from "./commands/serve";
import { showCommand } from "./commands/show";

const program = new Command();

program
  .name("epd-store")
  .description("Store and render display images for e-paper devices")
  .version("0.1.0")
  .option("-d, --image-dir <path>", "Directory holding the device images")
  .option("-W, --epd-width <pixels>", "Display width in pixels")
  .option("-H, --epd-height <pixels>", "Display height in pixels")
  .option("-c, --config <path>", "Path to custom config file")
  .option("-v, --verbose", "Verbose output");

program
  .command("serve")
  .description("Start the HTTP server")
  .option("--host <host>", "Interface to listen on")
  .option("-p, --port <port>", "Port to listen on")
  .action((_opts: unknown, command: Command) => serveCommand(command.optsWithGlobals()));

program
  .command("list")
  .description("List devices that have an image")
  .action((_opts: unknown, command: Command) => listCommand(command.optsWithGlobals()));

program
  .command("render <mac> <file>")
  .description("Render an SVG body fragment from <file> and store it for <mac>")
  .action((mac: string, file: string, _opts: unknown, command: Command) =>
    renderCommand(mac, file, command.optsWithGlobals()),
  );

program
  .command("show <mac>")
  .description("Write a stored image to stdout")
  .option("-k, --kind <kind>", "Asset kind: svg, png or bmp", "svg")
  .action((mac: string, _opts: unknown, command: Command) =>
    showCommand(mac, command.optsWithGlobals()),
  );

program
  .command("delete <mac>")
  .description("Delete every stored image of a device")
  .action((mac: string, _opts: unknown, command: Command) =>
    deleteCommand(mac, command.optsWithGlobals()),
  );

program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

await program.parseAsync();
