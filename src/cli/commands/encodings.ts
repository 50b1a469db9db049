/**
 * Encodings command - Lists the canonical names of all supported encodings.
 */

import type { Command } from "commander";
import { supportedEncodings } from "../../encoding";
import { formatOutput } from "../utils";

export async function encodingsAction() {
  console.log(formatOutput(supportedEncodings()));
}

export function createEncodingsCommand(program: Command): Command {
  return program
    .command("encodings")
    .description("List the encodings that can be converted to UTF-8")
    .action(encodingsAction);
}
