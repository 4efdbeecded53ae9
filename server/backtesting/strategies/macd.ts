import type { StrategyConfigOf } from "@shared/schema";
import { BaseStrategy, type SignalComputation } from "./base";
import type { PriceSeries } from "../market";
import type { Signal } from "../types";

export type MacdConfig = Omit<StrategyConfigOf<"macd">, "type">;

/** Edge-triggered: only the bar on which the lines cross carries a signal. */
export class MacdStrategy extends BaseStrategy {
  name = "MACD Strategy";
  type = "macd" as const;
  lookback: number;
  private config: MacdConfig;

  constructor(config: Partial<MacdConfig> = {}) {
    super();
    this.config = {
      fast: config.fast ?? 12,
      slow: config.slow ?? 26,
      signal: config.signal ?? 9,
    };
    this.lookback = this.config.slow + this.config.signal - 1;
  }

  parameters(): Record<string, number> {
    return { ...this.config };
  }

  protected computeSignals(series: PriceSeries): SignalComputation {
    const options = {
      macdFast: this.config.fast,
      macdSlow: this.config.slow,
      macdSignal: this.config.signal,
    };
    const [macd, signalLine] = this.indicatorColumns(series, ["macd", "macdSignal"], options);

    const signals: Signal[] = macd.map((_, i) => {
      if (this.crossedBelow(macd, signalLine, i)) return -1;
      if (this.crossedAbove(macd, signalLine, i)) return 1;
      return 0;
    });

    return { signals, indicators: { macd, macdSignal: signalLine } };
  }
}
