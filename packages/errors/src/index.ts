/**
 * @metronome/errors
 *
 * Shared error taxonomy for the Metronome packages.
 *
 * Every error carries a `.code` from the catalog that discriminates the
 * specific condition. Use `error.code === "XXX"` for fine-grained matching,
 * or `_tag` / the category guards for category matching.
 */

// ============================================================================
// CORE EXPORTS
// ============================================================================

export {
  type ErrorContext,
  type ErrorJSON,
  isError,
  isMetronomeError,
  MetronomeError,
} from "./base.js";

export {
  type BaseErrorType,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
  type GrpcStatusCode,
  type HttpStatusCode,
} from "./catalog.js";

export {
  getAllErrorCodes,
  getCatalogEntry,
  getErrorMessage,
  isValidErrorCode,
  validateCatalog,
} from "./utils.js";

// ============================================================================
// TYPE INFRASTRUCTURE
// ============================================================================

export type { ValidationIssue } from "./types.js";

// ============================================================================
// TYPE GUARDS
// ============================================================================

export {
  hasCode,
  isConflictError,
  isExpectedError,
  isValidationError,
} from "./guards.js";

// ============================================================================
// DOMAIN ERRORS
// ============================================================================

export { TickerClosedError, TickerConfigurationError, TickerError } from "./ticker.js";
