import mime from "mime";

/**
 * Represents a parsed Content-Type header.
 */
export interface ParsedContentType {
  mimeType: string;
  charset?: string;
}

const TOKEN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;

const LEADING_SPACE = /^[ \t]+/;

/**
 * Extensions the mime package misses or reports as binary, for files we read as text.
 */
const TEXT_MIME_OVERRIDES: Record<string, string> = {
  ts: "text/x-typescript",
  tsx: "text/x-tsx",
  py: "text/x-python",
  go: "text/x-go",
  rs: "text/x-rust",
  rb: "text/x-ruby",
  php: "text/x-php",
  cs: "text/x-csharp",
  c: "text/x-csrc",
  h: "text/x-chdr",
  sh: "text/x-shellscript",
  sql: "text/x-sql",
  log: "text/plain",
  srt: "text/plain",
  sub: "text/plain",
  tsv: "text/tab-separated-values",
};

// biome-ignore lint/complexity/noStaticOnlyClass: helpers are static
export class MimeTypeUtils {
  /**
   * Parses a Content-Type value such as `text/html; charset="Shift_JIS"`.
   * A bare type without `/subtype` is accepted. Parameter names are matched case-insensitively;
   * the charset value is kept verbatim, unescaped when quoted.
   * Returns undefined when the media type or any parameter is malformed, or a parameter repeats.
   */
  public static parseContentType(contentType?: string | null): ParsedContentType | undefined {
    if (!contentType) {
      return undefined;
    }

    const separator = contentType.indexOf(";");
    const mimeType = (separator === -1 ? contentType : contentType.slice(0, separator))
      .trim()
      .toLowerCase();
    const [type, subtype, ...extra] = mimeType.split("/");
    if (
      extra.length > 0 ||
      !TOKEN.test(type) ||
      (subtype !== undefined && !TOKEN.test(subtype))
    ) {
      return undefined;
    }

    const parameters = new Map<string, string>();
    let rest = separator === -1 ? "" : contentType.slice(separator + 1);

    while (rest.trim() !== "") {
      rest = rest.replace(LEADING_SPACE, "");
      const equals = rest.indexOf("=");
      if (equals === -1) {
        return undefined;
      }
      const name = rest.slice(0, equals).trim().toLowerCase();
      if (!TOKEN.test(name)) {
        return undefined;
      }
      rest = rest.slice(equals + 1).replace(LEADING_SPACE, "");

      let value = "";
      if (rest.startsWith('"')) {
        let index = 1;
        for (; index < rest.length && rest[index] !== '"'; index++) {
          if (rest[index] === "\\" && index + 1 < rest.length) {
            index++;
          }
          value += rest[index];
        }
        if (index >= rest.length) {
          return undefined;
        }
        rest = rest.slice(index + 1);
      } else {
        value = /^[^;\s]*/.exec(rest)?.[0] ?? "";
        if (!TOKEN.test(value)) {
          return undefined;
        }
        rest = rest.slice(value.length);
      }

      if (parameters.has(name)) {
        return undefined;
      }
      parameters.set(name, value);

      rest = rest.replace(LEADING_SPACE, "");
      if (rest === "") {
        break;
      }
      if (!rest.startsWith(";")) {
        return undefined;
      }
      rest = rest.slice(1);
    }

    return { mimeType, charset: parameters.get("charset") };
  }

  /**
   * Detects the MIME type of a file from its extension.
   *
   * @returns The detected MIME type or null if unknown
   */
  public static detectMimeTypeFromPath(filePath: string): string | null {
    const extension = filePath.toLowerCase().split(".").pop();
    if (extension && TEXT_MIME_OVERRIDES[extension]) {
      return TEXT_MIME_OVERRIDES[extension];
    }
    return mime.getType(filePath);
  }
}
