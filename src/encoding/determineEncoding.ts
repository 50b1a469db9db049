import { isUtf8 } from "node:buffer";
import { DEFAULT_LOOKAHEAD_BYTES } from "../utils/config";
import { logger } from "../utils/logger";
import { MimeTypeUtils } from "../utils/mimeTypeUtils";
import { matchBom, UTF8_BOM } from "./bom";
import { prescan } from "./metaPrescan";
import { Encoding, lookup } from "./registry";

/**
 * Which rule picked the encoding.
 */
export type ResolutionSource = "bom" | "content-type" | "meta" | "utf-8" | "default";

export interface EncodingResolution {
  encoding: Encoding;
  /** Canonical charset name, e.g. `windows-1252`. */
  name: string;
  /**
   * True when a byte-order mark or a declared content type decided; false for
   * anything guessed from the content. Advisory only.
   */
  certain: boolean;
  source: ResolutionSource;
}

function resolved(encoding: Encoding, certain: boolean, source: ResolutionSource): EncodingResolution {
  logger.debug(`Resolved encoding ${encoding.name} from ${source} (certain: ${certain})`);
  return { encoding, name: encoding.name, certain, source };
}

/**
 * Drops a multi-byte UTF-8 sequence cut off by the end of `content`.
 */
export function trimPartialRune(content: Uint8Array): Uint8Array {
  for (let index = content.length - 1; index >= 0 && index > content.length - 4; index--) {
    const byte = content[index];
    if (byte < 0x80) {
      break;
    }
    // Continuation bytes are 10xxxxxx; anything else starts a sequence.
    if ((byte & 0xc0) !== 0x80) {
      return content.subarray(0, index);
    }
  }
  return content;
}

function looksLikeUtf8(content: Uint8Array): boolean {
  const candidate = trimPartialRune(content);
  return candidate.some((byte) => byte >= 0x80) && isUtf8(candidate);
}

/**
 * Chooses the encoding of `content`, the first bytes of a text document, optionally
 * helped by the document's declared Content-Type. Rules in order: byte-order mark,
 * declared charset, `<meta>` declaration, valid UTF-8 with non-ASCII bytes, Latin-1.
 *
 * Only the first `maxBytes` bytes are examined.
 */
export function determineEncoding(
  content: Uint8Array,
  contentType?: string,
  maxBytes: number = DEFAULT_LOOKAHEAD_BYTES,
): EncodingResolution {
  const prefix = content.length > maxBytes ? content.subarray(0, maxBytes) : content;

  const bom = matchBom(prefix);
  if (bom) {
    // UTF-8 passes through byte for byte; the BOM is stripped after decoding.
    const encoding = bom.signature === UTF8_BOM ? Encoding.NOP : lookup(bom.label);
    if (encoding) {
      return resolved(encoding, true, "bom");
    }
  }

  const declared = MimeTypeUtils.parseContentType(contentType)?.charset;
  if (declared !== undefined) {
    const encoding = lookup(declared);
    if (encoding) {
      return resolved(encoding, true, "content-type");
    }
    logger.debug(`Ignoring unknown declared charset '${declared}'`);
  }

  if (prefix.length > 0) {
    const encoding = prescan(prefix);
    if (encoding) {
      return resolved(encoding, false, "meta");
    }
  }

  if (looksLikeUtf8(prefix)) {
    return resolved(Encoding.NOP, false, "utf-8");
  }

  return resolved(Encoding.LATIN1, false, "default");
}
