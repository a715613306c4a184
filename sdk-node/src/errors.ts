import type { ZodError } from "zod";

export type DocServeErrorCode =
  | "INVALID_CONFIGURATION"
  | "NETWORK_ERROR"
  | "TIMEOUT"
  | "HTTP_ERROR"
  | "SERIALIZATION_ERROR";

export class DocServeError extends Error {
  public readonly code: DocServeErrorCode;
  public readonly details?: unknown;

  constructor(args: {
    message: string;
    code: DocServeErrorCode;
    details?: unknown;
    cause?: unknown;
  }) {
    super(args.message, { cause: args.cause });
    this.name = "DocServeError";
    this.code = args.code;
    this.details = args.details;
  }
}

/**
 * A required setting was missing, blank or unusable. Raised before any
 * network activity.
 */
export class ConfigurationError extends DocServeError {
  constructor(message: string) {
    super({ message, code: "INVALID_CONFIGURATION" });
    this.name = "ConfigurationError";
  }
}

export class TransportError extends DocServeError {
  constructor(args: {
    message: string;
    code: "NETWORK_ERROR" | "TIMEOUT";
    details?: unknown;
    cause?: unknown;
  }) {
    super(args);
    this.name = "TransportError";
  }
}

/**
 * The service answered with a non-2xx status. `details` holds the parsed
 * JSON body when there was one, otherwise the raw text.
 */
export class ProtocolError extends DocServeError {
  public readonly status: number;
  public readonly requestId?: string;

  constructor(args: {
    message: string;
    status: number;
    requestId?: string;
    details?: unknown;
  }) {
    super({ message: args.message, code: "HTTP_ERROR", details: args.details });
    this.name = "ProtocolError";
    this.status = args.status;
    this.requestId = args.requestId;
  }
}

export class SerializationError extends DocServeError {
  public readonly issues: ZodError["issues"];

  constructor(args: {
    message: string;
    issues?: ZodError["issues"];
    cause?: unknown;
  }) {
    super({
      message: args.message,
      code: "SERIALIZATION_ERROR",
      cause: args.cause,
    });
    this.name = "SerializationError";
    this.issues = args.issues ?? [];
  }
}
