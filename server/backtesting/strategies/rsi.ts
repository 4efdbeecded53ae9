import type { StrategyConfigOf } from "@shared/schema";
import { BaseStrategy, type SignalComputation } from "./base";
import type { PriceSeries } from "../market";
import type { Signal } from "../types";

export type RsiConfig = Omit<StrategyConfigOf<"rsi">, "type">;

/**
 * Long below `oversold`, exit above `overbought`. A reading between the two
 * keeps the last signal, so each crossing yields one position change.
 */
export class RsiStrategy extends BaseStrategy {
  name = "RSI Strategy";
  type = "rsi" as const;
  lookback: number;
  private config: RsiConfig;

  constructor(config: Partial<RsiConfig> = {}) {
    super();
    this.config = {
      rsiPeriod: config.rsiPeriod ?? 14,
      overbought: config.overbought ?? 70,
      oversold: config.oversold ?? 30,
    };
    this.lookback = this.config.rsiPeriod + 1;
  }

  parameters(): Record<string, number> {
    return { ...this.config };
  }

  protected computeSignals(series: PriceSeries): SignalComputation {
    const rsi = this.indicatorColumn(series, "rsi", { rsiPeriod: this.config.rsiPeriod });

    // Inside the neutral band the previous signal stands
    let current: Signal = 0;
    const signals: Signal[] = rsi.map(value => {
      if (value > this.config.overbought) current = -1;
      else if (value < this.config.oversold) current = 1;
      return current;
    });

    return { signals, indicators: { rsi } };
  }
}
