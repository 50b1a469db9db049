import type { Decoder, Encoding } from "../encoding";
import { DecodeError, toError } from "../utils/errors";

/**
 * Converts `chunks` from `encoding` to UTF-8 bytes as they are pulled.
 * The no-op encoding passes chunks through untouched.
 *
 * Errors from `chunks` propagate unchanged; a failing decoder raises `DecodeError`.
 */
export async function* decodeChunks(
  chunks: AsyncIterable<Buffer>,
  encoding: Encoding,
): AsyncGenerator<Buffer> {
  if (encoding.isNop) {
    yield* chunks;
    return;
  }

  let decoder: Decoder;
  try {
    decoder = encoding.newDecoder();
  } catch (error) {
    throw new DecodeError(encoding.name, toError(error));
  }
  const convert = (read: () => string | undefined): Buffer | undefined => {
    let text: string | undefined;
    try {
      text = read();
    } catch (error) {
      throw new DecodeError(encoding.name, toError(error));
    }
    return text ? Buffer.from(text, "utf8") : undefined;
  };

  for await (const chunk of chunks) {
    const decoded = convert(() => decoder.write(chunk));
    if (decoded) {
      yield decoded;
    }
  }
  const tail = convert(() => decoder.end());
  if (tail) {
    yield tail;
  }
}
