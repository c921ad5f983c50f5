export type ConversionErrorCode =
  | 'filename-too-long'
  | 'malformed-event-sequence'
  | 'degenerate-geometry-exhausted'
  | 'io-failure';

/**
 * Base class for failures a conversion run reports to its caller.
 * `code` is stable and safe to branch on.
 */
export abstract class WeldConversionError extends Error {
  abstract readonly code: ConversionErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class FilenameTooLongError extends WeldConversionError {
  readonly code = 'filename-too-long';

  constructor(readonly filename: string, readonly length: number, readonly limit: number) {
    super(
      `G-code filename '${filename}' is ${length} characters long, ` +
        `which exceeds the ${limit} character limit (including extension)`
    );
  }
}

export class EventSequenceError extends WeldConversionError {
  readonly code = 'malformed-event-sequence';
}

export class DegenerateGeometryError extends WeldConversionError {
  readonly code = 'degenerate-geometry-exhausted';
}

export class OutputWriteError extends WeldConversionError {
  readonly code = 'io-failure';
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class RequestValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RequestValidationError';
  }
}
