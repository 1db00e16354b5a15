/**
 * Base class of every error raised by this library.
 */
export class FlacError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "FlacError";
  }
}

/** The bytes are not a well-formed FLAC container. */
export class FormatError extends FlacError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "FormatError";
  }
}

/** Opening, reading or writing a file failed. The fs error is the cause. */
export class IOError extends FlacError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "IOError";
  }
}

export class NotFoundError extends FlacError {
  constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}

/** A vorbis comment block is present but its length prefixes are broken. */
export class DecodeError extends FlacError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "DecodeError";
  }
}

/**
 * Runs a filesystem call and rethrows its failure as an {@link IOError}.
 */
export function io<T>(action: string, path: string, fn: () => T): T {
  try {
    return fn();
  } catch (e) {
    if (e instanceof FlacError) throw e;
    const reason = e instanceof Error ? e.message : String(e);
    throw new IOError(`Failed to ${action} ${path}: ${reason}`, e);
  }
}
