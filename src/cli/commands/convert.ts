/**
 * Convert command - Writes files as UTF-8 without a byte-order mark.
 */

import { once } from "node:events";
import fs from "node:fs/promises";
import type { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import type { Command } from "commander";
import { createOutputFile, openFile } from "../../reader";
import { toError } from "../../utils/errors";
import { logger } from "../../utils/logger";
import type { ReadCommandOptions } from "../types";
import { convertedFileName, parseLookaheadBytes } from "../utils";

export interface ConvertOptions extends ReadCommandOptions {
  output?: string;
  outDir?: string;
}

async function writeToStdout(stream: Readable): Promise<void> {
  for await (const chunk of stream) {
    if (!process.stdout.write(chunk)) {
      await once(process.stdout, "drain");
    }
  }
}

/**
 * Converts one file. Without `target` the result goes to stdout.
 */
export async function convertFile(
  file: string,
  target: string | undefined,
  options: ReadCommandOptions = {},
): Promise<void> {
  const input = await openFile(file, options);
  try {
    if (target === undefined) {
      await writeToStdout(input.stream);
      return;
    }

    const output = await createOutputFile(target);
    try {
      await pipeline(input.stream, output.stream);
    } catch (error) {
      await output.close().catch((closeError: unknown) => {
        logger.warn(`Failed to close ${target}: ${toError(closeError).message}`);
      });
      throw error;
    }
    await output.close();
    logger.info(`✅ ${file} (${input.resolution.name}) -> ${target}`);
  } finally {
    await input.close();
  }
}

export async function convertAction(files: string[], options: ConvertOptions) {
  const { output, outDir, ...readOptions } = options;
  if (output !== undefined && outDir !== undefined) {
    throw new Error("Use either --output or --out-dir, not both.");
  }
  if (files.length > 1 && outDir === undefined) {
    throw new Error("Converting several files requires --out-dir.");
  }

  if (outDir !== undefined) {
    await fs.mkdir(outDir, { recursive: true });
  }
  for (const file of files) {
    const target = outDir !== undefined ? convertedFileName(file, outDir) : output;
    await convertFile(file, target, readOptions);
  }
}

export function createConvertCommand(program: Command): Command {
  return program
    .command("convert <files...>")
    .description("Convert files to UTF-8 without a byte-order mark")
    .option("-o, --output <file>", "Write the converted file here instead of stdout")
    .option("--out-dir <dir>", "Write each converted file to <dir>/<name>_UTF8<ext>")
    .option(
      "--content-type <type>",
      "Declared Content-Type, e.g. 'text/html; charset=windows-1252'",
    )
    .option(
      "--lookahead-bytes <bytes>",
      "Number of leading bytes inspected to choose the encoding",
      parseLookaheadBytes,
    )
    .action(convertAction);
}
