import type { PriceBar, IndicatorField } from "@shared/schema";
import type { PriceSeriesLike } from "./types";

export class PriceSeries implements PriceSeriesLike {
  private bars: PriceBar[];

  // Sorted by timestamp; a repeated timestamp keeps its last bar
  constructor(bars: readonly PriceBar[]) {
    const byTime = new Map<number, PriceBar>();
    for (const bar of bars) {
      byTime.set(bar.timestamp.getTime(), bar);
    }
    this.bars = Array.from(byTime.entries())
      .sort((a, b) => a[0] - b[0])
      .map(([, bar]) => bar);
  }

  static from(input: readonly PriceBar[] | PriceSeriesLike): PriceSeries {
    if (input instanceof PriceSeries) return input;
    return new PriceSeries("getBars" in input ? input.getBars() : input);
  }

  getBars(): readonly PriceBar[] {
    return this.bars;
  }

  getCloses(): number[] {
    return this.bars.map(bar => bar.close);
  }

  getTimestamps(): Date[] {
    return this.bars.map(bar => bar.timestamp);
  }

  getColumn(field: IndicatorField): number[] {
    return this.bars.map(bar => bar[field] ?? NaN);
  }

  hasIndicator(field: IndicatorField): boolean {
    return this.bars.length > 0 && this.bars.every(bar => bar[field] !== undefined);
  }

  withBars(bars: readonly PriceBar[]): PriceSeries {
    return new PriceSeries(bars);
  }

  getStart(): Date | undefined {
    return this.bars[0]?.timestamp;
  }

  getEnd(): Date | undefined {
    return this.bars[this.bars.length - 1]?.timestamp;
  }

  size(): number {
    return this.bars.length;
  }
}
