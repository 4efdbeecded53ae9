import type { StrategyConfigOf } from "@shared/schema";
import { BaseStrategy, type SignalComputation } from "./base";
import type { PriceSeries } from "../market";
import type { Signal } from "../types";

export type MovingAverageCrossConfig = Omit<StrategyConfigOf<"ma_cross">, "type">;

export class MovingAverageCrossStrategy extends BaseStrategy {
  name = "Moving Average Crossover";
  type = "ma_cross" as const;
  lookback: number;
  private config: MovingAverageCrossConfig;

  constructor(config: Partial<MovingAverageCrossConfig> = {}) {
    super();
    this.config = {
      shortWindow: config.shortWindow ?? 20,
      longWindow: config.longWindow ?? 50,
    };
    this.lookback = this.config.longWindow;
  }

  parameters(): Record<string, number> {
    return { ...this.config };
  }

  protected computeSignals(series: PriceSeries): SignalComputation {
    const { shortMa, longMa } = this.movingAverages(
      series.getCloses(),
      this.config.shortWindow,
      this.config.longWindow
    );

    // NaN comparisons are false, so the warm-up bars stay flat
    const signals: Signal[] = shortMa.map((value, i) => (value > longMa[i] ? 1 : 0));

    return { signals, indicators: { shortMa, longMa } };
  }
}
