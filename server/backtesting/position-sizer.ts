import { sizingMethods, type SizingMethod, type PositionSizingConfig } from "@shared/schema";
import { InvalidSizingMethodError, InvalidSizingValueError } from "./errors";

export function isSizingMethod(method: string): method is SizingMethod {
  return (sizingMethods as readonly string[]).includes(method);
}

/**
 * Whole-share quantity for one order.
 *
 * `fixed_risk` uses the same formula as `percentage`; there is no stop-loss
 * distance to size against. Price-dependent methods give NaN for a missing or
 * non-positive price.
 */
export function computeShares(
  method: SizingMethod,
  value: number,
  currentPrice: number,
  priorTotalValue: number
): number {
  const validPrice = Number.isFinite(currentPrice) && currentPrice > 0;

  switch (method) {
    case "fixed_dollar":
      return validPrice ? Math.floor(value / currentPrice) : NaN;
    case "percentage":
    case "fixed_risk":
      return validPrice ? Math.floor((priorTotalValue * (value / 100)) / currentPrice) : NaN;
    case "fixed_shares":
      return value;
    default: {
      const unknownMethod: never = method;
      throw new InvalidSizingMethodError(String(unknownMethod), sizingMethods);
    }
  }
}

/** Reason the value is unusable for the method, or null when it is valid. */
export function sizingValueProblem(method: SizingMethod, value: number): string | null {
  if (!Number.isFinite(value) || value < 0) return "must be a finite, non-negative number";
  if (method === "fixed_shares" && !Number.isInteger(value)) return "share count must be a whole number";
  return null;
}

export function sharesToSell(computedShares: number, currentPosition: number): number {
  return Math.max(0, Math.min(computedShares, currentPosition));
}

export class PositionSizer {
  readonly method: SizingMethod;
  readonly value: number;

  constructor(method: string, value: number) {
    if (!isSizingMethod(method)) {
      throw new InvalidSizingMethodError(method, sizingMethods);
    }
    const problem = sizingValueProblem(method, value);
    if (problem) {
      throw new InvalidSizingValueError(method, value, problem);
    }
    this.method = method;
    this.value = value;
  }

  static from(config: PositionSizingConfig): PositionSizer {
    return new PositionSizer(config.method, config.value);
  }

  computeShares(currentPrice: number, priorTotalValue: number): number {
    return computeShares(this.method, this.value, currentPrice, priorTotalValue);
  }

  toConfig(): PositionSizingConfig {
    return { method: this.method, value: this.value };
  }
}
