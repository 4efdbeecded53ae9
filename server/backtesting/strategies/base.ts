import type { IndicatorField, PriceBar, StrategyType } from "@shared/schema";
import type { Strategy, PriceSeriesLike, Signal, SignalFrame } from "../types";
import { PriceSeries } from "../market";
import { addTechnicalIndicators, forwardFill, simpleMovingAverage, type IndicatorOptions } from "../indicators";

export interface SignalComputation {
  signals: Signal[];
  indicators: Record<string, number[]>;
}

export function toPositionChanges(signals: readonly Signal[]): number[] {
  return signals.map((signal, i) => (i === 0 ? 0 : signal - signals[i - 1]));
}

export abstract class BaseStrategy implements Strategy {
  abstract name: string;
  abstract type: StrategyType;
  abstract lookback: number;
  abstract parameters(): Record<string, number>;
  protected abstract computeSignals(series: PriceSeries): SignalComputation;

  generateSignals(input: readonly PriceBar[] | PriceSeriesLike): SignalFrame {
    const series = PriceSeries.from(input);
    const { signals, indicators } = this.computeSignals(series);

    return {
      timestamps: series.getTimestamps(),
      closes: series.getCloses(),
      signals,
      positionChanges: toPositionChanges(signals),
      indicators,
    };
  }

  /**
   * Uses the precomputed columns when every bar carries all of them; otherwise
   * asks the indicator module to compute the whole group, so related lines
   * (MACD and its signal) never mix sources.
   */
  protected indicatorColumns(
    series: PriceSeries,
    fields: readonly IndicatorField[],
    options: IndicatorOptions = {}
  ): number[][] {
    if (fields.every(field => series.hasIndicator(field))) {
      return fields.map(field => series.getColumn(field));
    }

    const enriched: PriceBar[] = addTechnicalIndicators(series.getBars(), options);
    return fields.map(field => enriched.map(bar => bar[field] ?? NaN));
  }

  protected indicatorColumn(
    series: PriceSeries,
    field: IndicatorField,
    options: IndicatorOptions = {}
  ): number[] {
    return this.indicatorColumns(series, [field], options)[0];
  }

  protected movingAverages(
    closes: readonly number[],
    shortWindow: number,
    longWindow: number
  ): { shortMa: number[]; longMa: number[] } {
    const filled = forwardFill(closes);
    return {
      shortMa: simpleMovingAverage(filled, shortWindow),
      longMa: simpleMovingAverage(filled, longWindow),
    };
  }

  protected crossedAbove(a: readonly number[], b: readonly number[], i: number): boolean {
    return i > 0 && a[i] > b[i] && a[i - 1] <= b[i - 1];
  }

  protected crossedBelow(a: readonly number[], b: readonly number[], i: number): boolean {
    return i > 0 && a[i] < b[i] && a[i - 1] >= b[i - 1];
  }
}
