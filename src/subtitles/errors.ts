/**
 * Base class for subtitle parsing failures
 */
export class SubtitleError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Raised when a format tag is not one of the supported formats
 */
export class UnsupportedFormatError extends SubtitleError {
  readonly format: string;

  constructor(format: string) {
    super(`Unsupported format: ${format}`);
    this.format = format;
  }
}

/**
 * Raised when content lacks the structure its format requires
 */
export class MalformedInputError extends SubtitleError {
  readonly format: string;

  constructor(format: string, reason: string) {
    super(`Malformed ${format.toUpperCase()} file: ${reason}`);
    this.format = format;
  }
}
