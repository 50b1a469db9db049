import { z } from "zod";
import { ConfigurationError } from "./errors";

/**
 * Number of leading bytes inspected when choosing an encoding.
 */
export const DEFAULT_LOOKAHEAD_BYTES = 10240;

export const MAX_LOOKAHEAD_BYTES = 1024 * 1024;

export const lookaheadBytesSchema = z.coerce
  .number()
  .int()
  .positive()
  .max(MAX_LOOKAHEAD_BYTES);

/**
 * Options accepted by the reader constructors.
 */
export const readerOptionsSchema = z.object({
  contentType: z.string().optional(),
  lookaheadBytes: lookaheadBytesSchema.optional(),
});

export type ReaderOptions = z.input<typeof readerOptionsSchema>;

export interface ResolvedReaderOptions {
  contentType?: string;
  lookaheadBytes: number;
}

/**
 * Reads the lookahead size from `TEXTNORM_LOOKAHEAD_BYTES`, falling back to the default.
 */
export function getLookaheadBytesFromEnv(env: NodeJS.ProcessEnv = process.env): number {
  const raw = env.TEXTNORM_LOOKAHEAD_BYTES;
  if (raw === undefined || raw.trim() === "") {
    return DEFAULT_LOOKAHEAD_BYTES;
  }
  const parsed = lookaheadBytesSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid TEXTNORM_LOOKAHEAD_BYTES '${raw}': expected an integer between 1 and ${MAX_LOOKAHEAD_BYTES}`,
    );
  }
  return parsed.data;
}

export function resolveReaderOptions(options: ReaderOptions = {}): ResolvedReaderOptions {
  const parsed = readerOptionsSchema.safeParse(options);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "options"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid reader options: ${detail}`);
  }
  return {
    contentType: parsed.data.contentType,
    lookaheadBytes: parsed.data.lookaheadBytes ?? getLookaheadBytesFromEnv(),
  };
}
