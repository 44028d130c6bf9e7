/**
 * Bross Sequential Analysis - Errors
 * ===================================
 * Precondition failures raised at the boundary that receives bad input
 */

export class SeqAnalysisError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SeqAnalysisError';
  }
}

/** Pair values outside {0,1}, malformed pairs, or an empty pair list */
export class InvalidInputError extends SeqAnalysisError {
  /** Offending row (0-based), when known */
  public readonly row: number | null;

  constructor(message: string, row: number | null = null) {
    super(message);
    this.name = 'InvalidInputError';
    this.row = row;
  }
}

/** Decision grid of the wrong shape or holding unknown region codes */
export class InvalidMapError extends SeqAnalysisError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidMapError';
  }
}

/** A walk step left the grid */
export class OutOfBoundsError extends SeqAnalysisError {
  public readonly row: number;
  public readonly col: number;

  constructor(row: number, col: number, size: number) {
    super(`Walk left the decision map at (${row}, ${col}); valid range is [1, ${size}]`);
    this.name = 'OutOfBoundsError';
    this.row = row;
    this.col = col;
  }
}

/** Iteration count, alpha or another numeric argument out of range */
export class InvalidArgumentError extends SeqAnalysisError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

/** An async order check was cancelled by its caller */
export class AbortError extends SeqAnalysisError {
  constructor(message = 'Order check aborted') {
    super(message);
    this.name = 'AbortError';
  }
}

/** A second order check was started while one is still running */
export class BusyError extends SeqAnalysisError {
  constructor(message = 'An order check is already running') {
    super(message);
    this.name = 'BusyError';
  }
}
