import type { FileHandle } from "node:fs/promises";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  ConfigurationError,
  FatalError,
  SinkWriteError,
  SourceReadError,
} from "../utils/errors";
import { readAll } from "./createReader";
import { createOutputFile, mustOpenFile, openFile } from "./files";

describe("files", () => {
  let dir: string;
  let handles: FileHandle[];

  /** Records every handle the wrappers open. */
  const trackHandles = () => {
    const open = fs.open;
    vi.spyOn(fs, "open").mockImplementation(async (file, flags, mode) => {
      const handle = await open(file, flags, mode);
      handles.push(handle);
      return handle;
    });
  };

  beforeEach(async () => {
    handles = [];
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "textnorm-files-"));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await Promise.all(handles.map((handle) => handle.close()));
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe("openFile", () => {
    it("reads a file as BOM-free UTF-8", async () => {
      const file = path.join(dir, "latin1.txt");
      await fs.writeFile(file, Buffer.from([0x63, 0x61, 0x66, 0xe9]));

      const opened = await openFile(file);
      expect(opened.path).toBe(file);
      expect(opened.resolution.name).toBe("iso-8859-1");
      expect((await readAll(opened.stream)).toString("utf8")).toBe("café");
      await opened.close();
    });

    it("can be closed more than once", async () => {
      const file = path.join(dir, "bom.txt");
      await fs.writeFile(file, Buffer.from([0xef, 0xbb, 0xbf, 0x61]));

      const opened = await openFile(file);
      await opened.close();
      await expect(opened.close()).resolves.toBeUndefined();
    });

    it("passes reader options through", async () => {
      const file = path.join(dir, "quoted.txt");
      await fs.writeFile(file, Buffer.from([0x93, 0x61, 0x94]));

      const opened = await openFile(file, { contentType: "text/plain; charset=cp1252" });
      expect((await readAll(opened.stream)).toString("utf8")).toBe("“a”");
      await opened.close();
    });

    it("closes the file when the reader cannot be set up", async () => {
      const file = path.join(dir, "plain.txt");
      await fs.writeFile(file, "plain");
      trackHandles();

      await expect(openFile(file, { lookaheadBytes: 0 })).rejects.toBeInstanceOf(ConfigurationError);
      expect(handles).toHaveLength(1);
      await expect(handles[0].stat()).rejects.toMatchObject({ code: "EBADF" });
    });

    it("releases the file on close without reading it", async () => {
      const file = path.join(dir, "plain.txt");
      await fs.writeFile(file, "plain");
      trackHandles();

      const opened = await openFile(file);
      await opened.close();
      await expect(handles[0].stat()).rejects.toMatchObject({ code: "EBADF" });
    });

    it("rejects with SourceReadError when closing fails", async () => {
      const file = path.join(dir, "plain.txt");
      await fs.writeFile(file, "plain");
      trackHandles();

      const opened = await openFile(file);
      vi.spyOn(handles[0], "close").mockRejectedValueOnce(new Error("EIO"));
      const failure = opened.close();
      await expect(failure).rejects.toBeInstanceOf(SourceReadError);
      await expect(failure).rejects.toThrow(`Failed to close ${file}`);
    });

    it("rejects with SourceReadError for a missing file", async () => {
      const missing = path.join(dir, "missing.txt");
      const failure = openFile(missing);
      await expect(failure).rejects.toBeInstanceOf(SourceReadError);
      await expect(failure).rejects.toThrow(`Failed to open ${missing}`);
    });
  });

  describe("mustOpenFile", () => {
    it("opens readable files", async () => {
      const file = path.join(dir, "plain.txt");
      await fs.writeFile(file, "plain");

      const opened = await mustOpenFile(file);
      expect((await readAll(opened.stream)).toString("utf8")).toBe("plain");
      await opened.close();
    });

    it("turns a close failure into FatalError", async () => {
      const file = path.join(dir, "plain.txt");
      await fs.writeFile(file, "plain");
      trackHandles();

      const opened = await mustOpenFile(file);
      vi.spyOn(handles[0], "close").mockRejectedValueOnce(new Error("EIO"));
      const failure = opened.close();
      await expect(failure).rejects.toBeInstanceOf(FatalError);
      await expect(failure).rejects.toThrow(`Failed to close ${file}`);
    });

    it("turns failures into FatalError", async () => {
      const missing = path.join(dir, "missing.txt");
      const failure = mustOpenFile(missing);
      await expect(failure).rejects.toBeInstanceOf(FatalError);
      await expect(failure).rejects.toThrow(`Failed to open ${missing}`);
    });
  });

  describe("createOutputFile", () => {
    it("writes, syncs and closes", async () => {
      const file = path.join(dir, "out.txt");
      const output = await createOutputFile(file);
      output.stream.write(Buffer.from("hello "));
      output.stream.write(Buffer.from("world"));
      await output.close();
      await output.close();

      expect(await fs.readFile(file, "utf8")).toBe("hello world");
    });

    it("truncates an existing file", async () => {
      const file = path.join(dir, "out.txt");
      await fs.writeFile(file, "old content that is longer");
      const output = await createOutputFile(file);
      output.stream.end(Buffer.from("new"));
      await output.close();

      expect(await fs.readFile(file, "utf8")).toBe("new");
    });

    it("rejects with SinkWriteError when the data cannot be flushed", async () => {
      const file = path.join(dir, "out.txt");
      trackHandles();
      const output = await createOutputFile(file);
      await handles[0].close();

      const failure = output.close();
      await expect(failure).rejects.toBeInstanceOf(SinkWriteError);
      await expect(failure).rejects.toThrow(`Failed to flush and close ${file}`);
    });

    it("rejects with SinkWriteError when the file cannot be closed", async () => {
      const file = path.join(dir, "out.txt");
      trackHandles();
      const output = await createOutputFile(file);
      vi.spyOn(handles[0], "close").mockRejectedValueOnce(new Error("EIO"));
      output.stream.end(Buffer.from("done"));

      await expect(output.close()).rejects.toBeInstanceOf(SinkWriteError);
      expect(await fs.readFile(file, "utf8")).toBe("done");
    });

    it("rejects with SinkWriteError when the file cannot be created", async () => {
      const target = path.join(dir, "no-such-dir", "out.txt");
      const failure = createOutputFile(target);
      await expect(failure).rejects.toBeInstanceOf(SinkWriteError);
      await expect(failure).rejects.toThrow(`Failed to create ${target}`);
    });
  });
});
