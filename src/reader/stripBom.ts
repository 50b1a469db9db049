import { hasPrefix, UTF8_BOM } from "../encoding";

/**
 * Drops a UTF-8 byte-order mark from the start of `chunks`.
 *
 * Only the first three bytes are held back while probing. When the input ends before
 * three bytes arrive, the bytes seen so far are yielded unchanged.
 */
export async function* stripUtf8Bom(chunks: AsyncIterable<Buffer>): AsyncGenerator<Buffer> {
  let probe: Buffer = Buffer.alloc(0);
  let probing = true;

  for await (const chunk of chunks) {
    if (!probing) {
      yield chunk;
      continue;
    }
    probe = probe.length === 0 ? chunk : Buffer.concat([probe, chunk]);
    if (probe.length < UTF8_BOM.length) {
      continue;
    }
    probing = false;
    const rest = hasPrefix(probe, UTF8_BOM) ? probe.subarray(UTF8_BOM.length) : probe;
    if (rest.length > 0) {
      yield rest;
    }
  }

  if (probing && probe.length > 0) {
    yield probe;
  }
}
