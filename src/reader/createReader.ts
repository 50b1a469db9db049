import { Readable } from "node:stream";
import { determineEncoding, type EncodingResolution } from "../encoding";
import { type ReaderOptions, resolveReaderOptions } from "../utils/config";
import { logger } from "../utils/logger";
import { decodeChunks } from "./decode";
import { type ByteSource, readLookahead } from "./lookahead";
import { stripUtf8Bom } from "./stripBom";

export interface TextReader {
  /** UTF-8 bytes without a leading byte-order mark. */
  stream: Readable;
  resolution: EncodingResolution;
}

/**
 * Wraps `source` in a stream of BOM-free UTF-8.
 *
 * The first `lookaheadBytes` bytes are read up front to choose the encoding; everything
 * else is converted lazily as the returned stream is consumed. The BOM is stripped after
 * decoding because decoders such as UTF-16 emit one of their own.
 *
 * Rejects with `SourceReadError` if the source fails while the lookahead is read.
 */
export async function createReader(
  source: ByteSource,
  options: ReaderOptions = {},
): Promise<TextReader> {
  const { contentType, lookaheadBytes } = resolveReaderOptions(options);
  const lookahead = await readLookahead(source, lookaheadBytes);
  if (lookahead.exhausted) {
    logger.debug(`Input ended within the lookahead (${lookahead.preview.length} bytes)`);
  }

  const resolution = determineEncoding(lookahead.preview, contentType, lookaheadBytes);
  const normalized = stripUtf8Bom(decodeChunks(lookahead.chunks, resolution.encoding));

  return {
    stream: Readable.from(normalized, { objectMode: false }),
    resolution,
  };
}

/**
 * Collects everything a stream yields.
 */
export async function readAll(stream: AsyncIterable<Uint8Array | string>): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : Buffer.from(chunk));
  }
  return Buffer.concat(chunks);
}

/**
 * Normalizes a complete input held in memory.
 */
export async function normalize(source: ByteSource, options: ReaderOptions = {}): Promise<Buffer> {
  const reader = await createReader(source, options);
  return readAll(reader.stream);
}
