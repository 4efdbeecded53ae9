import type { PriceBar } from "@shared/schema";
import { BaseStrategy, type SignalComputation } from "../strategies/base";
import type { PriceSeries } from "../market";
import type { PortfolioState, Signal } from "../types";

const DAY_MS = 24 * 60 * 60 * 1000;
const START = Date.UTC(2024, 0, 1);

export function makeBars(closes: readonly number[], extra: Partial<PriceBar>[] = []): PriceBar[] {
  return closes.map((close, i) => ({
    timestamp: new Date(START + i * DAY_MS),
    open: close,
    high: close,
    low: close,
    close,
    volume: 1000,
    ...extra[i],
  }));
}

export function makeState(overrides: Partial<PortfolioState> = {}): PortfolioState {
  return {
    timestamp: new Date(START),
    close: 100,
    signal: 0,
    positionChange: 0,
    position: 0,
    cash: 100000,
    holdings: 0,
    total: 100000,
    periodReturn: 0,
    sharesTraded: 0,
    ...overrides,
  };
}

/** Emits a fixed signal per bar; bars past the end of the list are flat. */
export class FixedSignalStrategy extends BaseStrategy {
  name = "Fixed Signals";
  type = "ma_cross" as const;
  lookback = 1;
  private fixed: Signal[];

  constructor(fixed: Signal[]) {
    super();
    this.fixed = fixed;
  }

  parameters(): Record<string, number> {
    return {};
  }

  protected computeSignals(series: PriceSeries): SignalComputation {
    return {
      signals: series.getBars().map((_, i) => this.fixed[i] ?? 0),
      indicators: {},
    };
  }
}
