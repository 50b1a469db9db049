/**
 * Detect command - Reports the encoding chosen for each file without converting it.
 */

import type { Command } from "commander";
import type { ResolutionSource } from "../../encoding";
import { openFile } from "../../reader";
import { MimeTypeUtils } from "../../utils/mimeTypeUtils";
import type { ReadCommandOptions } from "../types";
import { formatOutput, parseLookaheadBytes } from "../utils";

export interface DetectionReport {
  file: string;
  encoding: string;
  certain: boolean;
  source: ResolutionSource;
  mimeType: string | null;
}

export async function detectFile(
  file: string,
  options: ReadCommandOptions = {},
): Promise<DetectionReport> {
  const opened = await openFile(file, options);
  try {
    const { resolution } = opened;
    return {
      file,
      encoding: resolution.name,
      certain: resolution.certain,
      source: resolution.source,
      mimeType: MimeTypeUtils.detectMimeTypeFromPath(file),
    };
  } finally {
    await opened.close();
  }
}

export async function detectAction(files: string[], options: ReadCommandOptions) {
  const reports: DetectionReport[] = [];
  for (const file of files) {
    reports.push(await detectFile(file, options));
  }
  console.log(formatOutput(reports));
}

export function createDetectCommand(program: Command): Command {
  return program
    .command("detect <files...>")
    .description("Show the encoding each file would be read as")
    .option(
      "--content-type <type>",
      "Declared Content-Type, e.g. 'text/html; charset=windows-1252'",
    )
    .option(
      "--lookahead-bytes <bytes>",
      "Number of leading bytes inspected to choose the encoding",
      parseLookaheadBytes,
    )
    .action(detectAction);
}
