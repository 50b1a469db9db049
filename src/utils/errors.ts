export class TextNormError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = this.constructor.name;
    if (cause?.stack) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/**
 * The byte source failed for a reason other than reaching its end.
 */
export class SourceReadError extends TextNormError {}

/**
 * The bytes are not valid for the encoding chosen for them.
 * Raised while the output is being consumed, never while the reader is built.
 */
export class DecodeError extends TextNormError {
  constructor(
    public readonly encodingName: string,
    cause?: Error,
  ) {
    super(`Failed to decode input as ${encodingName}`, cause);
  }
}

/**
 * Flushing, syncing or closing an output failed.
 */
export class SinkWriteError extends TextNormError {}

export class ConfigurationError extends TextNormError {}

/**
 * Raised by the `must*` helpers in place of any recoverable failure.
 */
export class FatalError extends TextNormError {}

/**
 * Narrows an unknown thrown value to an `Error` so it can be chained as a cause.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
