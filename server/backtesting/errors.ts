/**
 * Configuration errors raised by the backtesting engine.
 *
 * Numerical degeneracies (NaN prices, zero volatility of returns, no losing
 * trades) are never thrown; they come back as NaN or Infinity inside results.
 */

export enum BacktestErrorCode {
  INVALID_SIZING_METHOD = "INVALID_SIZING_METHOD",
  INVALID_SIZING_VALUE = "INVALID_SIZING_VALUE",
  INVALID_STRATEGY = "INVALID_STRATEGY",
  INVALID_REQUEST = "INVALID_REQUEST",
}

export class BacktestConfigError extends Error {
  readonly code: BacktestErrorCode;
  readonly issues: string[];

  constructor(code: BacktestErrorCode, message: string, issues: string[] = []) {
    super(message);
    this.name = "BacktestConfigError";
    this.code = code;
    this.issues = issues;
  }
}

export class InvalidSizingMethodError extends BacktestConfigError {
  readonly method: string;

  constructor(method: string, allowed: readonly string[]) {
    super(
      BacktestErrorCode.INVALID_SIZING_METHOD,
      `Unknown position sizing method "${method}". Expected one of: ${allowed.join(", ")}`
    );
    this.name = "InvalidSizingMethodError";
    this.method = method;
  }
}

export class InvalidSizingValueError extends BacktestConfigError {
  readonly value: number;

  constructor(method: string, value: number, requirement: string) {
    super(
      BacktestErrorCode.INVALID_SIZING_VALUE,
      `Invalid value ${value} for position sizing method "${method}": ${requirement}`
    );
    this.name = "InvalidSizingValueError";
    this.value = value;
  }
}

export class InvalidStrategyError extends BacktestConfigError {
  constructor(message: string, issues: string[] = []) {
    super(BacktestErrorCode.INVALID_STRATEGY, message, issues);
    this.name = "InvalidStrategyError";
  }
}

export class InvalidRequestError extends BacktestConfigError {
  constructor(message: string, issues: string[] = []) {
    super(BacktestErrorCode.INVALID_REQUEST, message, issues);
    this.name = "InvalidRequestError";
  }
}
