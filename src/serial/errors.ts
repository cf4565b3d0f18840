/**
 * Link Error Types
 * Frame-scoped decode errors are values; the rest are thrown
 */

export type DecodeErrorCode = "InvalidLength" | "InvalidMode";
export type ValidationErrorCode = "InvalidMode" | "InvalidNumber" | "InvalidRetention" | "InvalidBody";
export type LinkErrorCode = "Open" | "Read" | "Write" | "Closed" | "NotConnected";

export class DecodeError extends Error {
  readonly code: DecodeErrorCode;

  constructor(code: DecodeErrorCode, message: string) {
    super(message);
    this.name = "DecodeError";
    this.code = code;
  }
}

export class ValidationError extends Error {
  readonly code: ValidationErrorCode;

  constructor(code: ValidationErrorCode, message: string) {
    super(message);
    this.name = "ValidationError";
    this.code = code;
  }
}

/**
 * Thrown by the encoder when handed a command that was never clamped
 */
export class EncodePreconditionError extends Error {
  readonly code = "EncodePrecondition";

  constructor(message: string) {
    super(message);
    this.name = "EncodePreconditionError";
  }
}

export class LinkError extends Error {
  readonly code: LinkErrorCode;

  constructor(code: LinkErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "LinkError";
    this.code = code;
  }
}
