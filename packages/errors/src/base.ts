import {
  type BaseErrorType,
  ERROR_CATALOG,
  type ErrorCode,
  type ErrorDomain,
  type GrpcStatusCode,
  type HttpStatusCode,
} from "./catalog.js";

/**
 * Optional context attached to any error.
 */
export interface ErrorContext {
  readonly metadata?: Record<string, string> | undefined;
  readonly traceId?: string | undefined;
  readonly cause?: Error | undefined;
}

/**
 * JSON shape produced by {@link MetronomeError.toJSON}.
 */
export interface ErrorJSON {
  readonly _tag: BaseErrorType;
  readonly name: string;
  readonly code: ErrorCode;
  readonly message: string;
  readonly domain: ErrorDomain;
  readonly httpStatus: HttpStatusCode;
  readonly grpcCode: GrpcStatusCode;
  readonly isExpected: boolean;
  readonly timestamp: string;
  readonly metadata?: Record<string, string> | undefined;
  readonly traceId?: string | undefined;
  readonly stack?: string | undefined;
}

/**
 * Root of the Metronome error hierarchy.
 *
 * Every concrete error carries a catalog `code`; the HTTP / gRPC mapping,
 * domain and `isExpected` flag are looked up from `ERROR_CATALOG` here, so
 * subclasses only declare their `_tag` and narrow `code`.
 * Discriminate on `_tag` (category) or `code` (specific condition).
 */
export abstract class MetronomeError extends Error {
  abstract readonly _tag: BaseErrorType;
  readonly code: ErrorCode;
  readonly httpStatus: HttpStatusCode;
  readonly grpcCode: GrpcStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;

  readonly timestamp: Date;
  readonly metadata: Record<string, string> | undefined;
  readonly traceId: string | undefined;

  constructor(code: ErrorCode, message: string, context: ErrorContext = {}) {
    super(message, ...(context.cause ? [{ cause: context.cause }] : []));
    const entry = ERROR_CATALOG[code];
    this.name = new.target.name;
    this.code = code;
    this.httpStatus = entry.httpStatus;
    this.grpcCode = entry.grpcCode;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.timestamp = new Date();
    this.metadata = context.metadata;
    this.traceId = context.traceId;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace?.(this, new.target);
  }

  toJSON(): ErrorJSON {
    return {
      _tag: this._tag,
      name: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      httpStatus: this.httpStatus,
      grpcCode: this.grpcCode,
      isExpected: this.isExpected,
      timestamp: this.timestamp.toISOString(),
      metadata: this.metadata,
      traceId: this.traceId,
      stack: this.stack,
    };
  }

  override toString(): string {
    let str = `${this.name} [${this.code}]: ${this.message}`;
    if (this.metadata && Object.keys(this.metadata).length > 0) {
      str += ` ${JSON.stringify(this.metadata)}`;
    }
    if (this.traceId) {
      str += ` [trace: ${this.traceId}]`;
    }
    return str;
  }
}

/** Check if a value is a MetronomeError */
export function isMetronomeError(error: unknown): error is MetronomeError {
  return error instanceof MetronomeError;
}

/** Check if a value is an Error instance */
export function isError(error: unknown): error is Error {
  return error instanceof Error;
}
