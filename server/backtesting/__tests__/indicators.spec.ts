import { describe, it, expect } from "vitest";
import {
  simpleMovingAverage,
  exponentialMovingAverage,
  relativeStrengthIndex,
  movingAverageConvergenceDivergence,
  addTechnicalIndicators,
  forwardFill,
  generateTechSignal,
} from "../indicators";
import { makeBars } from "./fixtures";

describe("forwardFill", () => {
  it("carries the last finite value over gaps", () => {
    expect(forwardFill([NaN, 1, NaN, NaN, 4, NaN])).toEqual([NaN, 1, 1, 1, 4, 4]);
  });
});

describe("simpleMovingAverage", () => {
  it("is undefined until the window fills", () => {
    expect(simpleMovingAverage([1, 2, 3, 4, 5], 3)).toEqual([NaN, NaN, 2, 3, 4]);
  });

  it("returns all NaN when the window is longer than the series", () => {
    expect(simpleMovingAverage([1, 2], 3)).toEqual([NaN, NaN]);
  });
});

describe("exponentialMovingAverage", () => {
  it("seeds with the simple mean of the first period", () => {
    expect(exponentialMovingAverage([1, 2, 3, 4, 5], 3)).toEqual([NaN, NaN, 2, 3, 4]);
  });

  it("skips leading NaN values", () => {
    const ema = exponentialMovingAverage([NaN, 2, 4, 6], 2);
    expect(ema[1]).toBeNaN();
    expect(ema[2]).toBe(3);
    expect(ema[3]).toBeCloseTo(5, 12);
  });
});

describe("relativeStrengthIndex", () => {
  it("is 100 on a strictly rising series", () => {
    const closes = Array.from({ length: 20 }, (_, i) => 100 + i);
    const rsi = relativeStrengthIndex(closes, 14);

    expect(rsi[13]).toBeNaN();
    expect(rsi.slice(14)).toEqual(new Array(6).fill(100));
  });

  it("is 0 on a strictly falling series", () => {
    const closes = Array.from({ length: 20 }, (_, i) => 100 - i);
    expect(relativeStrengthIndex(closes, 14)[19]).toBe(0);
  });

  it("is undefined on a flat series", () => {
    const rsi = relativeStrengthIndex(new Array(20).fill(50), 14);
    expect(rsi.every(value => Number.isNaN(value))).toBe(true);
  });

  it("starts after leading gaps", () => {
    const rsi = relativeStrengthIndex([NaN, 1, 2, 1, 2], 2);
    expect(rsi[2]).toBeNaN();
    expect(rsi[3]).toBe(50);
    expect(rsi[4]).toBe(75);
  });

  it("applies Wilder smoothing after the seed window", () => {
    const rsi = relativeStrengthIndex([1, 2, 1, 2], 2);
    expect(rsi[2]).toBe(50);
    expect(rsi[3]).toBe(75);
  });
});

describe("movingAverageConvergenceDivergence", () => {
  it("starts each line once its inputs have warmed up", () => {
    const closes = [1, 2, 3, 4, 5, 6, 7, 8];
    const { macd, signal, histogram } = movingAverageConvergenceDivergence(closes, 2, 3, 2);

    expect(macd[1]).toBeNaN();
    expect(Number.isFinite(macd[2])).toBe(true);
    expect(signal[2]).toBeNaN();
    expect(Number.isFinite(signal[3])).toBe(true);
    expect(histogram[3]).toBeCloseTo(macd[3] - signal[3], 12);
  });
});

describe("addTechnicalIndicators", () => {
  it("returns new bars carrying every indicator column", () => {
    const bars = makeBars([1, 2, 1, 2]);
    const enriched = addTechnicalIndicators(bars, { rsiPeriod: 2 });

    expect(enriched).toHaveLength(4);
    expect(enriched[3].rsi).toBe(75);
    expect(enriched[3]).toHaveProperty("macd");
    expect(enriched[3]).toHaveProperty("macdSignal");
    expect(enriched[3]).toHaveProperty("macdHist");
    expect(bars[3].rsi).toBeUndefined();
  });

  it("fills a missing close before computing and keeps the original bar", () => {
    const bars = makeBars([1, 2, NaN, 1, 2]);
    const enriched = addTechnicalIndicators(bars, { rsiPeriod: 2 });

    expect(enriched[2].close).toBeNaN();
    expect(enriched[2].rsi).toBe(100);
    expect(enriched[3].rsi).toBeCloseTo(100 / 3, 10);
    expect(enriched[4].rsi).toBeCloseTo(500 / 7, 10);
  });
});

describe("generateTechSignal", () => {
  it("labels RSI readings by zone", () => {
    expect(generateTechSignal(25)).toBe("STRONG BUY");
    expect(generateTechSignal(40)).toBe("BUY");
    expect(generateTechSignal(50)).toBe("HOLD");
    expect(generateTechSignal(60)).toBe("SELL");
    expect(generateTechSignal(75)).toBe("STRONG SELL");
  });

  it("honours custom thresholds and missing readings", () => {
    expect(generateTechSignal(35, 40, 80)).toBe("STRONG BUY");
    expect(generateTechSignal(75, 40, 80)).toBe("SELL");
    expect(generateTechSignal(NaN)).toBe("UNKNOWN");
    expect(generateTechSignal(undefined)).toBe("UNKNOWN");
  });
});
