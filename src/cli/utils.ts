/**
 * Shared CLI utilities and helper functions.
 */

import path from "node:path";
import { InvalidArgumentError } from "commander";
import { lookaheadBytesSchema, MAX_LOOKAHEAD_BYTES } from "../utils/config";
import { LogLevel, setLogLevel } from "../utils/logger";
import type { GlobalOptions } from "./types";

export const formatOutput = (data: unknown): string => JSON.stringify(data, null, 2);

/**
 * Sets up logging based on global options
 */
export function setupLogging(options: GlobalOptions): void {
  if (options.silent) {
    setLogLevel(LogLevel.ERROR);
  } else if (options.verbose) {
    setLogLevel(LogLevel.DEBUG);
  }
}

/**
 * Argument parser for `--lookahead-bytes`.
 */
export function parseLookaheadBytes(value: string): number {
  const parsed = lookaheadBytesSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidArgumentError(`Expected an integer between 1 and ${MAX_LOOKAHEAD_BYTES}.`);
  }
  return parsed.data;
}

/**
 * Where `--out-dir` puts the converted copy of `file`: `notes.txt` becomes `notes_UTF8.txt`.
 */
export function convertedFileName(file: string, outDir: string): string {
  const extension = path.extname(file);
  const name = path.basename(file, extension);
  return path.join(outDir, `${name}_UTF8${extension}`);
}
