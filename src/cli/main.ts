/**
 * CLI main entry point with error handling.
 */

import { TextNormError } from "../utils/errors";
import { logger } from "../utils/logger";
import { createCliProgram } from "./index";

/**
 * Main CLI execution function
 */
export async function runCli(argv: string[] = process.argv): Promise<void> {
  try {
    const program = createCliProgram();
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof TextNormError) {
      logger.error(error.cause ? `${error.message}: ${error.cause.message}` : error.message);
      logger.debug(error.stack ?? "");
    } else {
      logger.error(`❌ Error in CLI: ${error}`);
    }
    process.exitCode = 1;
  }
}
