/**
 * Consolidated error system for the meeting rotation.
 *
 * All error classes extend RotationError, which carries a typed error code.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const RotationErrorCode = {
  // Settings & input validation
  CONFIGURATION: 'CONFIGURATION',
  VALIDATION: 'VALIDATION',

  // Event log ingestion
  PARSE_ERROR: 'PARSE_ERROR',
  INVALID_DATA: 'INVALID_DATA',
  DATA_INCONSISTENCY: 'DATA_INCONSISTENCY',

  // Collaborators
  PERSISTENCE: 'PERSISTENCE',
  NOTIFICATION: 'NOTIFICATION',
} as const

export type RotationErrorCode = (typeof RotationErrorCode)[keyof typeof RotationErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class RotationError extends Error {
  readonly code: RotationErrorCode

  constructor(code: RotationErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'RotationError'
    this.code = code
  }
}

// ============================================================================
// Settings Errors
// ============================================================================

/** Missing or empty roster, unusable settings file. Fatal before any event is built. */
export class ConfigurationError extends RotationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(RotationErrorCode.CONFIGURATION, message, options)
    this.name = 'ConfigurationError'
  }
}

export class ValidationError extends RotationError {
  constructor(message: string) {
    super(RotationErrorCode.VALIDATION, message)
    this.name = 'ValidationError'
  }
}

// ============================================================================
// Event Log Errors
// ============================================================================

export class ParseError extends RotationError {
  constructor(message: string) {
    super(RotationErrorCode.PARSE_ERROR, message)
    this.name = 'ParseError'
  }
}

export class InvalidDataError extends RotationError {
  constructor(message: string) {
    super(RotationErrorCode.INVALID_DATA, message)
    this.name = 'InvalidDataError'
  }
}

/**
 * A log entry that cannot be reconciled with the roster. Reported as a
 * warning; the cursor falls back to the top of the roster.
 */
export class DataInconsistencyError extends RotationError {
  constructor(message: string) {
    super(RotationErrorCode.DATA_INCONSISTENCY, message)
    this.name = 'DataInconsistencyError'
  }
}

// ============================================================================
// Collaborator Errors
// ============================================================================

export class PersistenceError extends RotationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(RotationErrorCode.PERSISTENCE, message, options)
    this.name = 'PersistenceError'
  }
}

export class NotificationError extends RotationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(RotationErrorCode.NOTIFICATION, message, options)
    this.name = 'NotificationError'
  }
}
