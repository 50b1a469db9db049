/**
 * Main CLI setup and command registration.
 */

import { Command, Option } from "commander";
import packageJson from "../../package.json";
import { createConvertCommand } from "./commands/convert";
import { createDetectCommand } from "./commands/detect";
import { createEncodingsCommand } from "./commands/encodings";
import type { GlobalOptions } from "./types";
import { setupLogging } from "./utils";

/**
 * Creates and configures the main CLI program with all commands.
 */
export function createCliProgram(): Command {
  const program = new Command();

  program
    .name("textnorm")
    .description("Read text files of unknown encoding as UTF-8 without a byte-order mark.")
    .version(packageJson.version)
    .addOption(
      new Option("--verbose", "Enable verbose (debug) logging").conflicts("silent"),
    )
    .addOption(new Option("--silent", "Disable all logging except errors"))
    .enablePositionalOptions()
    .showHelpAfterError(true);

  program.hook("preAction", (thisCommand) => {
    const globalOptions: GlobalOptions = thisCommand.opts();
    setupLogging(globalOptions);
  });

  createDetectCommand(program);
  createConvertCommand(program);
  createEncodingsCommand(program);

  return program;
}
