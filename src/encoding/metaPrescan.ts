/**
 * Finds a charset declared by a `<meta>` element in the first bytes of an HTML document,
 * following the prescan rules of the HTML encoding sniffing algorithm.
 */

import { Parser } from "htmlparser2";
import { Encoding, lookup } from "./registry";

/**
 * Whether a charset found on a `<meta>` tag needs `http-equiv="content-type"` on the same tag.
 */
export enum PragmaRequirement {
  /** No usable charset attribute seen yet. */
  Unknown = "unknown",
  /** The charset came from `content` and only counts with the pragma. */
  Needed = "needed",
  /** The charset came from a `charset` attribute. */
  Exempt = "exempt",
}

type Attribute = readonly [name: string, value: string];

const ASCII_WHITESPACE = " \t\n\f\r";

/**
 * Elements whose content is text, not markup. htmlparser2 already treats `script`,
 * `style`, `textarea` and `title` this way; the rest are skipped here.
 */
const RAW_TEXT_ELEMENTS = new Set([
  "iframe",
  "noembed",
  "noframes",
  "noscript",
  "plaintext",
  "xmp",
]);

function trimLeadingWhitespace(value: string): string {
  let index = 0;
  while (index < value.length && ASCII_WHITESPACE.includes(value[index])) {
    index++;
  }
  return value.slice(index);
}

function toAsciiLowerCase(value: string): string {
  return value.replace(/[A-Z]/g, (letter) => letter.toLowerCase());
}

/**
 * Extracts the charset name from a `content` attribute value such as
 * `text/html; charset=utf-8`. Returns `""` when there is none or the value is malformed.
 */
export function charsetFromMetaContent(content: string): string {
  let rest = content;
  while (rest !== "") {
    const position = rest.indexOf("charset");
    if (position === -1) {
      return "";
    }
    rest = trimLeadingWhitespace(rest.slice(position + "charset".length));
    if (!rest.startsWith("=")) {
      continue;
    }
    rest = trimLeadingWhitespace(rest.slice(1));
    if (rest === "") {
      return "";
    }

    const quote = rest[0];
    if (quote === '"' || quote === "'") {
      const closing = rest.indexOf(quote, 1);
      return closing === -1 ? "" : rest.slice(1, closing);
    }

    let end = 0;
    while (end < rest.length && rest[end] !== ";" && !ASCII_WHITESPACE.includes(rest[end])) {
      end++;
    }
    return rest.slice(0, end);
  }
  return "";
}

/**
 * Applies the attribute rules to one `<meta>` tag. Attributes arrive in source order;
 * only the first occurrence of a name counts.
 */
export function evaluateMetaTag(attributes: readonly Attribute[]): Encoding | undefined {
  const seen = new Set<string>();
  let gotPragma = false;
  let requirement = PragmaRequirement.Unknown;
  let encoding: Encoding | undefined;

  for (const [name, rawValue] of attributes) {
    if (seen.has(name)) {
      continue;
    }
    seen.add(name);
    const value = toAsciiLowerCase(rawValue);

    switch (name) {
      case "http-equiv":
        if (value === "content-type") {
          gotPragma = true;
        }
        break;
      case "content":
        if (encoding === undefined) {
          const label = charsetFromMetaContent(value);
          if (label !== "") {
            encoding = lookup(label);
            if (encoding) {
              requirement = PragmaRequirement.Needed;
            }
          }
        }
        break;
      case "charset":
        encoding = lookup(value);
        requirement = PragmaRequirement.Exempt;
        break;
    }
  }

  if (
    requirement === PragmaRequirement.Unknown ||
    (requirement === PragmaRequirement.Needed && !gotPragma)
  ) {
    return undefined;
  }
  // A document that can declare its charset in ASCII markup is not UTF-16.
  if (encoding?.name.startsWith("utf-16")) {
    return Encoding.NOP;
  }
  return encoding;
}

/**
 * Tokenizes `content` as HTML and returns the encoding of the first `<meta>` tag that
 * declares one. An unfinished tag at the end of `content` is never considered.
 */
export function prescan(content: Uint8Array): Encoding | undefined {
  // One character per byte keeps byte values intact whatever the real encoding is.
  const text = Buffer.from(content.buffer, content.byteOffset, content.byteLength).toString(
    "latin1",
  );

  let found: Encoding | undefined;
  let tagName = "";
  let attributes: Attribute[] = [];
  // Open raw-text element; it ends at the first matching close tag.
  let rawText: string | undefined;

  const parser = new Parser(
    {
      onopentagname(name) {
        tagName = name;
        attributes = [];
        if (rawText === undefined && RAW_TEXT_ELEMENTS.has(name)) {
          rawText = name;
        }
      },
      onattribute(name, value) {
        if (tagName === "meta") {
          attributes.push([name, value]);
        }
      },
      onopentag(name) {
        if (found || name !== "meta" || rawText !== undefined) {
          return;
        }
        found = evaluateMetaTag(attributes);
        if (found) {
          parser.pause();
        }
      },
      onclosetag(name) {
        if (name === rawText) {
          rawText = undefined;
        }
      },
    },
    { decodeEntities: true },
  );

  parser.write(text);
  if (!found) {
    parser.end();
  }
  return found;
}
