/**
 * Global error types for the irrigation balance service
 * Custom errors for validation, data quality and lookup failures
 */

/**
 * Base validation error for all modules
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Error raised when the service configuration is invalid
 */
export class ConfigValidationError extends ValidationError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Reading outside the physically plausible range for its sensor kind
 */
export class SensorRangeError extends ValidationError {
  constructor(message: string) {
    super(message);
    this.name = 'SensorRangeError';
  }
}

/**
 * Daily aggregate lacks temperature or humidity, so ET cannot be computed
 */
export class InsufficientDataError extends ValidationError {
  constructor(message: string) {
    super(message);
    this.name = 'InsufficientDataError';
  }
}

/**
 * Precipitation counter jumped further than a real storm could explain
 */
export class AnomalousDeltaError extends ValidationError {
  constructor(message: string) {
    super(message);
    this.name = 'AnomalousDeltaError';
  }
}

/**
 * Valve was opened but never closed before the process stopped
 */
export class IncompleteRunError extends ValidationError {
  constructor(message: string) {
    super(message);
    this.name = 'IncompleteRunError';
  }
}

/**
 * Error thrown when an operation names a zone that is not configured
 */
export class ZoneNotFoundError extends Error {
  constructor(zoneId: string) {
    super('Unknown zone: ' + zoneId);
    this.name = 'ZoneNotFoundError';
  }
}
