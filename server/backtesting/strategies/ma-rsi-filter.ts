import type { StrategyConfigOf } from "@shared/schema";
import { BaseStrategy, type SignalComputation } from "./base";
import type { PriceSeries } from "../market";
import type { Signal } from "../types";

export type MaRsiFilterConfig = Omit<StrategyConfigOf<"ma_rsi">, "type">;

/**
 * Moving average crossover gated by RSI: buy when the short MA is above the
 * long MA and RSI is below `rsiBuy`; sell when the short MA is below the long
 * MA and RSI is above `rsiSell`.
 */
export class MaRsiFilterStrategy extends BaseStrategy {
  name = "MA with RSI Filter";
  type = "ma_rsi" as const;
  lookback: number;
  private config: MaRsiFilterConfig;

  constructor(config: Partial<MaRsiFilterConfig> = {}) {
    super();
    this.config = {
      shortWindow: config.shortWindow ?? 20,
      longWindow: config.longWindow ?? 50,
      rsiPeriod: config.rsiPeriod ?? 14,
      rsiBuy: config.rsiBuy ?? 30,
      rsiSell: config.rsiSell ?? 70,
    };
    this.lookback = Math.max(this.config.longWindow, this.config.rsiPeriod + 1);
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
    const rsi = this.indicatorColumn(series, "rsi", { rsiPeriod: this.config.rsiPeriod });

    const signals: Signal[] = shortMa.map((short, i) => {
      if (short < longMa[i] && rsi[i] > this.config.rsiSell) return -1;
      if (short > longMa[i] && rsi[i] < this.config.rsiBuy) return 1;
      return 0;
    });

    return { signals, indicators: { shortMa, longMa, rsi } };
  }
}
