import type { FileHandle } from "node:fs/promises";
import fs from "node:fs/promises";
import { Writable } from "node:stream";
import { finished } from "node:stream/promises";
import type { ReaderOptions } from "../utils/config";
import { FatalError, SinkWriteError, SourceReadError, toError } from "../utils/errors";
import { logger } from "../utils/logger";
import { createReader, type TextReader } from "./createReader";

export interface OpenedFile extends TextReader {
  path: string;
  /** Releases the file. Safe to call more than once. */
  close(): Promise<void>;
}

export interface OutputFile {
  path: string;
  stream: Writable;
  /** Ends the stream, syncs the file to disk and closes it. Safe to call more than once. */
  close(): Promise<void>;
}

const READ_CHUNK_BYTES = 64 * 1024;

/**
 * Reads `handle` from its current position until end of file.
 */
async function* readChunks(handle: FileHandle): AsyncGenerator<Buffer> {
  while (true) {
    const buffer = Buffer.alloc(READ_CHUNK_BYTES);
    const { bytesRead } = await handle.read(buffer, 0, READ_CHUNK_BYTES, null);
    if (bytesRead === 0) {
      return;
    }
    yield buffer.subarray(0, bytesRead);
  }
}

async function writeFully(handle: FileHandle, chunk: Buffer): Promise<void> {
  let offset = 0;
  while (offset < chunk.length) {
    const { bytesWritten } = await handle.write(chunk, offset, chunk.length - offset, null);
    offset += bytesWritten;
  }
}

/**
 * A writable over `handle` that fsyncs once all writes are done.
 * The handle itself stays open.
 */
function createSyncingWritable(handle: FileHandle): Writable {
  return new Writable({
    write(chunk: Buffer, _encoding, callback) {
      writeFully(handle, chunk).then(() => callback(), callback);
    },
    final(callback) {
      handle.sync().then(() => callback(), callback);
    },
  });
}

/**
 * Opens `path` and wraps it in a BOM-free UTF-8 reader.
 * The file is closed again if the reader cannot be set up.
 */
export async function openFile(path: string, options: ReaderOptions = {}): Promise<OpenedFile> {
  let handle: FileHandle;
  try {
    handle = await fs.open(path, "r");
  } catch (error) {
    throw new SourceReadError(`Failed to open ${path}`, toError(error));
  }

  let reader: TextReader;
  try {
    reader = await createReader(readChunks(handle), options);
  } catch (error) {
    await handle.close().catch((closeError: unknown) => {
      logger.warn(`Failed to close ${path} after setup error: ${toError(closeError).message}`);
    });
    throw error;
  }
  logger.debug(`Opened ${path} as ${reader.resolution.name}`);

  let closing: Promise<void> | undefined;
  const close = () => {
    closing ??= (async () => {
      reader.stream.destroy();
      try {
        await handle.close();
      } catch (error) {
        throw new SourceReadError(`Failed to close ${path}`, toError(error));
      }
      logger.debug(`Closed ${path}`);
    })();
    return closing;
  };

  return { ...reader, path, close };
}

/**
 * Creates (or truncates) `path` for writing normalized output.
 */
export async function createOutputFile(path: string): Promise<OutputFile> {
  let handle: FileHandle;
  try {
    handle = await fs.open(path, "w");
  } catch (error) {
    throw new SinkWriteError(`Failed to create ${path}`, toError(error));
  }
  const stream = createSyncingWritable(handle);

  let closing: Promise<void> | undefined;
  const close = () => {
    closing ??= (async () => {
      let failure: Error | undefined;
      try {
        if (!stream.writableEnded) {
          stream.end();
        }
        await finished(stream);
      } catch (error) {
        failure = toError(error);
      }
      try {
        await handle.close();
      } catch (error) {
        failure ??= toError(error);
      }
      if (failure) {
        throw new SinkWriteError(`Failed to flush and close ${path}`, failure);
      }
      logger.debug(`Wrote ${path}`);
    })();
    return closing;
  };

  return { path, stream, close };
}

function fatal(error: unknown): FatalError {
  const cause = toError(error);
  return new FatalError(cause.message, cause);
}

/**
 * Like `openFile`, but every failure, including one while closing, is a `FatalError`.
 * For callers with no way to recover from unreadable input.
 */
export async function mustOpenFile(path: string, options: ReaderOptions = {}): Promise<OpenedFile> {
  let opened: OpenedFile;
  try {
    opened = await openFile(path, options);
  } catch (error) {
    throw fatal(error);
  }
  return {
    ...opened,
    close: () =>
      opened.close().catch((error: unknown) => {
        throw fatal(error);
      }),
  };
}
