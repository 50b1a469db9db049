import { SourceReadError, toError } from "../utils/errors";

/**
 * Anything that yields bytes in order: a buffer, a Node `Readable`, or any
 * (async) iterable of byte chunks. String chunks are taken as UTF-8.
 */
export type ByteSource =
  | Uint8Array
  | Iterable<Uint8Array>
  | AsyncIterable<Uint8Array | string>;

export interface Lookahead {
  /** At most the requested number of bytes from the start of the source. */
  preview: Buffer;
  /** True when the source ended while the preview was being read. */
  exhausted: boolean;
  /** The whole source again: the preview followed by everything not yet read. */
  chunks: AsyncIterable<Buffer>;
}

function toBuffer(chunk: Uint8Array | string): Buffer {
  if (typeof chunk === "string") {
    return Buffer.from(chunk, "utf8");
  }
  return Buffer.isBuffer(chunk)
    ? chunk
    : Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength);
}

function isAsyncIterable(value: unknown): value is AsyncIterable<Uint8Array | string> {
  return typeof value === "object" && value !== null && Symbol.asyncIterator in value;
}

function iteratorOf(source: ByteSource): AsyncIterator<Uint8Array | string> | Iterator<Uint8Array> {
  if (source instanceof Uint8Array) {
    return [source][Symbol.iterator]();
  }
  if (isAsyncIterable(source)) {
    return source[Symbol.asyncIterator]();
  }
  return source[Symbol.iterator]();
}

/**
 * Reads up to `size` bytes from `source` once, then hands back a stream that replays
 * them ahead of the unread remainder. A source that ends early is not an error; any
 * other failure while reading the preview rejects with `SourceReadError`.
 */
export async function readLookahead(source: ByteSource, size: number): Promise<Lookahead> {
  const iterator = iteratorOf(source);
  const head: Buffer[] = [];
  let headLength = 0;
  let overflow: Buffer | undefined;
  let exhausted = false;

  try {
    while (headLength < size) {
      const result = await iterator.next();
      if (result.done) {
        exhausted = true;
        break;
      }
      const chunk = toBuffer(result.value);
      const room = size - headLength;
      if (chunk.length > room) {
        head.push(chunk.subarray(0, room));
        overflow = chunk.subarray(room);
        headLength = size;
      } else {
        head.push(chunk);
        headLength += chunk.length;
      }
    }
  } catch (error) {
    throw new SourceReadError("Failed to read the start of the input", toError(error));
  }

  const preview = Buffer.concat(head, headLength);

  async function* replay(): AsyncGenerator<Buffer> {
    let finished = exhausted;
    try {
      if (preview.length > 0) {
        yield preview;
      }
      if (overflow && overflow.length > 0) {
        yield overflow;
      }
      while (!finished) {
        const result = await iterator.next();
        if (result.done) {
          finished = true;
          break;
        }
        const chunk = toBuffer(result.value);
        if (chunk.length > 0) {
          yield chunk;
        }
      }
    } finally {
      // Stopped early by the consumer or by an error: release the source.
      if (!finished) {
        await iterator.return?.();
      }
    }
  }

  return { preview, exhausted, chunks: replay() };
}
