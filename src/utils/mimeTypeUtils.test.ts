import { describe, expect, it } from "vitest";
import { MimeTypeUtils } from "./mimeTypeUtils";

describe("MimeTypeUtils", () => {
  describe("parseContentType", () => {
    it("parses the media type and charset", () => {
      const parsed = MimeTypeUtils.parseContentType("text/html; charset=Shift_JIS");
      expect(parsed?.mimeType).toBe("text/html");
      expect(parsed?.charset).toBe("Shift_JIS");
    });

    it("lower-cases the media type and parameter names", () => {
      const parsed = MimeTypeUtils.parseContentType("Text/HTML;Charset=UTF-8");
      expect(parsed?.mimeType).toBe("text/html");
      expect(parsed?.charset).toBe("UTF-8");
    });

    it("unquotes quoted values", () => {
      expect(MimeTypeUtils.parseContentType('text/plain; charset="utf-8"')?.charset).toBe("utf-8");
      expect(MimeTypeUtils.parseContentType('text/plain; charset="utf\\-8"')?.charset).toBe("utf-8");
    });

    it("finds the charset among other parameters", () => {
      const parsed = MimeTypeUtils.parseContentType("text/csv; header=present; charset=cp1252");
      expect(parsed).toEqual({ mimeType: "text/csv", charset: "cp1252" });
    });

    it("accepts a type without a subtype", () => {
      expect(MimeTypeUtils.parseContentType("text; charset=koi8-r")).toEqual({
        mimeType: "text",
        charset: "koi8-r",
      });
    });

    it("accepts a trailing semicolon", () => {
      expect(MimeTypeUtils.parseContentType("text/plain;")?.charset).toBeUndefined();
      expect(MimeTypeUtils.parseContentType("text/plain; charset=utf-8;")?.charset).toBe("utf-8");
    });

    it("returns undefined for malformed values", () => {
      expect(MimeTypeUtils.parseContentType(undefined)).toBeUndefined();
      expect(MimeTypeUtils.parseContentType("")).toBeUndefined();
      expect(MimeTypeUtils.parseContentType("text/")).toBeUndefined();
      expect(MimeTypeUtils.parseContentType("/plain")).toBeUndefined();
      expect(MimeTypeUtils.parseContentType("; charset=utf-8")).toBeUndefined();
      expect(MimeTypeUtils.parseContentType("text/plain/extra")).toBeUndefined();
      expect(MimeTypeUtils.parseContentType("text/plain; charset")).toBeUndefined();
      expect(MimeTypeUtils.parseContentType('text/plain; charset="utf-8')).toBeUndefined();
    });

    it("returns undefined when a parameter repeats", () => {
      expect(MimeTypeUtils.parseContentType("text/plain; charset=a; charset=b")).toBeUndefined();
    });
  });

  describe("detectMimeTypeFromPath", () => {
    it("uses the mime database", () => {
      expect(MimeTypeUtils.detectMimeTypeFromPath("notes.txt")).toBe("text/plain");
      expect(MimeTypeUtils.detectMimeTypeFromPath("page.html")).toBe("text/html");
    });

    it("prefers text types for source files", () => {
      expect(MimeTypeUtils.detectMimeTypeFromPath("main.ts")).toBe("text/x-typescript");
      expect(MimeTypeUtils.detectMimeTypeFromPath("server.LOG")).toBe("text/plain");
    });

    it("returns null for unknown extensions", () => {
      expect(MimeTypeUtils.detectMimeTypeFromPath("data.unknownext")).toBeNull();
    });
  });
});
