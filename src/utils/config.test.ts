import { afterEach, describe, expect, it, vi } from "vitest";
import {
  DEFAULT_LOOKAHEAD_BYTES,
  getLookaheadBytesFromEnv,
  resolveReaderOptions,
} from "./config";
import { ConfigurationError } from "./errors";

describe("getLookaheadBytesFromEnv", () => {
  it("defaults when unset or blank", () => {
    expect(getLookaheadBytesFromEnv({})).toBe(DEFAULT_LOOKAHEAD_BYTES);
    expect(getLookaheadBytesFromEnv({ TEXTNORM_LOOKAHEAD_BYTES: "  " })).toBe(10240);
  });

  it("reads a valid size", () => {
    expect(getLookaheadBytesFromEnv({ TEXTNORM_LOOKAHEAD_BYTES: "4096" })).toBe(4096);
  });

  it.each(["abc", "0", "-5", "1.5", "2000000"])("rejects %j", (value) => {
    expect(() => getLookaheadBytesFromEnv({ TEXTNORM_LOOKAHEAD_BYTES: value })).toThrow(
      ConfigurationError,
    );
  });
});

describe("resolveReaderOptions", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("keeps explicit options", () => {
    expect(resolveReaderOptions({ contentType: "text/plain", lookaheadBytes: 2048 })).toEqual({
      contentType: "text/plain",
      lookaheadBytes: 2048,
    });
  });

  it("takes the lookahead size from the environment", () => {
    vi.stubEnv("TEXTNORM_LOOKAHEAD_BYTES", "64");
    expect(resolveReaderOptions().lookaheadBytes).toBe(64);
  });

  it("rejects invalid options", () => {
    expect(() => resolveReaderOptions({ lookaheadBytes: 1.5 })).toThrow(
      "Invalid reader options: lookaheadBytes",
    );
    expect(() => resolveReaderOptions({ lookaheadBytes: 0 })).toThrow(ConfigurationError);
  });
});
