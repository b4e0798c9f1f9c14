/**
 * Error Catalog - Single Source of Truth
 *
 * This catalog defines all error codes used across the Metronome monorepo.
 * Each error code maps to an HTTP status code, a gRPC canonical code, and a
 * base error type.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 * Domains: TICKER
 */

/**
 * The behavioral base error types that error codes map to.
 */
export type BaseErrorType = "ValidationError" | "ConflictError";

export const ERROR_CATALOG = {
  // ============================================================================
  // TICKER ERRORS - Resettable ticker lifecycle
  // ============================================================================
  TICKER_CONFIGURATION_INVALID: {
    domain: "ticker",
    httpStatus: 400,
    grpcCode: "INVALID_ARGUMENT" as const,
    baseType: "ValidationError" as const,
    isExpected: false,
    title: "Invalid ticker configuration",
    description: "The ticker interval, parent scope, or options are invalid",
  },
  TICKER_CLOSED: {
    domain: "ticker",
    httpStatus: 409,
    grpcCode: "FAILED_PRECONDITION" as const,
    baseType: "ConflictError" as const,
    isExpected: true,
    title: "Ticker closed",
    description: "The ticker has been closed and no longer accepts operations",
  },
} as const;

// ============================================================================
// TYPE EXPORTS
// ============================================================================

/**
 * Union type of all error codes
 */
export type ErrorCode = keyof typeof ERROR_CATALOG;

/**
 * Type representing a single error catalog entry
 */
export type ErrorCatalogEntry = (typeof ERROR_CATALOG)[ErrorCode];

/**
 * Union type of all domain names
 */
export type ErrorDomain = ErrorCatalogEntry["domain"];

/**
 * gRPC canonical status codes used in the catalog
 */
export type GrpcStatusCode = ErrorCatalogEntry["grpcCode"];

/**
 * HTTP status codes used in the catalog
 */
export type HttpStatusCode = ErrorCatalogEntry["httpStatus"];
