/**
 * Error hierarchy for the scanner
 *
 * Per-symbol errors (history, risk, upstream data) are caught by the scanner
 * and turned into diagnostics. Configuration errors abort a run before any
 * symbol is evaluated.
 */

export enum ErrorCode {
  INSUFFICIENT_HISTORY = 'INSUFFICIENT_HISTORY',
  INVALID_RISK = 'INVALID_RISK',
  UPSTREAM_DATA = 'UPSTREAM_DATA',
  CONFIG_VALIDATION = 'CONFIG_VALIDATION',
  MISSING_BASELINE = 'MISSING_BASELINE',
  SCAN_IN_PROGRESS = 'SCAN_IN_PROGRESS',
}

export class ScannerError extends Error {
  public readonly code: ErrorCode;
  public readonly context?: Record<string, unknown>;
  public readonly timestamp: number;

  constructor(code: ErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'ScannerError';
    this.code = code;
    this.context = context;
    this.timestamp = Date.now();
  }

  /**
   * Convert to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp,
    };
  }
}

/**
 * A series is shorter than the window an indicator needs.
 */
export class InsufficientHistoryError extends ScannerError {
  public readonly indicator: string;
  public readonly required: number;
  public readonly actual: number;

  constructor(indicator: string, required: number, actual: number) {
    super(
      ErrorCode.INSUFFICIENT_HISTORY,
      `${indicator} requires ${required} bars, got ${actual}`,
      { indicator, required, actual },
    );
    this.name = 'InsufficientHistoryError';
    this.indicator = indicator;
    this.required = required;
    this.actual = actual;
  }
}

export class InvalidRiskError extends ScannerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(ErrorCode.INVALID_RISK, message, context);
    this.name = 'InvalidRiskError';
  }
}

export class UpstreamDataError extends ScannerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(ErrorCode.UPSTREAM_DATA, message, context);
    this.name = 'UpstreamDataError';
  }
}

export class ConfigValidationError extends ScannerError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(
      ErrorCode.CONFIG_VALIDATION,
      `Invalid scanner configuration: ${issues.join('; ')}`,
      { issues },
    );
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
