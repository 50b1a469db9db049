import iconv from "iconv-lite";
import labelTable from "./labels.json";

/**
 * Incremental byte-to-text conversion. Multi-byte sequences split across
 * `write` calls are carried over to the next call.
 */
export interface Decoder {
  write(chunk: Buffer): string;
  end(): string | undefined;
}

/**
 * A named charset. One instance exists per canonical name; instances hold no state,
 * every `newDecoder()` call starts a fresh conversion.
 */
export class Encoding {
  /** Content that is already UTF-8 and is passed through untouched. */
  static readonly NOP = new Encoding("utf-8", null);

  /** ISO-8859-1 proper: every byte maps to the code point of the same value. */
  static readonly LATIN1 = new Encoding("iso-8859-1", "latin1");

  constructor(
    readonly name: string,
    private readonly codec: string | null,
  ) {}

  get isNop(): boolean {
    return this.codec === null;
  }

  /**
   * The decoder keeps a leading BOM in its output so it can be stripped after decoding.
   */
  newDecoder(): Decoder {
    return iconv.getDecoder(this.codec ?? "utf8", { stripBOM: false });
  }

  toString(): string {
    return this.name;
  }
}

const encodingsByLabel = new Map<string, Encoding>();
const encodingsByName = new Map<string, Encoding>();

for (const entry of labelTable) {
  // Labels whose codec iconv-lite lacks stay unknown rather than failing at decode time.
  if (!iconv.encodingExists(entry.codec)) {
    continue;
  }
  const encoding = new Encoding(entry.name, entry.codec);
  encodingsByName.set(entry.name, encoding);
  for (const label of entry.labels) {
    encodingsByLabel.set(label, encoding);
  }
}

const ASCII_WHITESPACE_EDGES = /^[\t\n\f\r ]+|[\t\n\f\r ]+$/g;

/**
 * Finds the encoding for a charset label such as `"Latin1"` or `" shift_jis "`.
 * Labels are matched case-insensitively after trimming ASCII whitespace.
 */
export function lookup(label: string): Encoding | undefined {
  return encodingsByLabel.get(label.replace(ASCII_WHITESPACE_EDGES, "").toLowerCase());
}

/**
 * Canonical names of every encoding that can be decoded.
 */
export function supportedEncodings(): string[] {
  return [...encodingsByName.keys()];
}
