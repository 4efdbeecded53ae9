import type { PriceBar } from "@shared/schema";

/** Carries the last finite value over gaps; leading gaps stay NaN. */
export function forwardFill(values: readonly number[]): number[] {
  let last = NaN;
  return values.map(value => {
    if (Number.isFinite(value)) last = value;
    return last;
  });
}

export function simpleMovingAverage(values: readonly number[], window: number): number[] {
  const result: number[] = new Array(values.length).fill(NaN);
  if (window <= 0) return result;

  for (let i = window - 1; i < values.length; i++) {
    let sum = 0;
    for (let j = i - window + 1; j <= i; j++) {
      sum += values[j];
    }
    result[i] = sum / window;
  }

  return result;
}

/**
 * EMA seeded with the simple mean of the first `period` finite values.
 * Leading NaNs (e.g. an upstream line still warming up) are skipped.
 */
export function exponentialMovingAverage(values: readonly number[], period: number): number[] {
  const result: number[] = new Array(values.length).fill(NaN);
  const start = values.findIndex(v => Number.isFinite(v));
  if (start < 0 || period <= 0 || start + period > values.length) return result;

  const alpha = 2 / (period + 1);
  let seed = 0;
  for (let i = start; i < start + period; i++) {
    seed += values[i];
  }

  let ema = seed / period;
  result[start + period - 1] = ema;

  for (let i = start + period; i < values.length; i++) {
    ema = alpha * values[i] + (1 - alpha) * ema;
    result[i] = ema;
  }

  return result;
}

/**
 * Wilder RSI. Undefined for the first `period` bars after the first finite
 * close and wherever the smoothed gain and loss are both zero (a perfectly
 * flat stretch). Expects gaps already filled; see `forwardFill`.
 */
export function relativeStrengthIndex(closes: readonly number[], period: number = 14): number[] {
  const result: number[] = new Array(closes.length).fill(NaN);
  const start = closes.findIndex(v => Number.isFinite(v));
  if (period <= 0 || start < 0 || closes.length - start <= period) return result;

  let avgGain = 0;
  let avgLoss = 0;
  for (let i = start + 1; i <= start + period; i++) {
    const change = closes[i] - closes[i - 1];
    avgGain += Math.max(change, 0);
    avgLoss += Math.max(-change, 0);
  }
  avgGain /= period;
  avgLoss /= period;
  result[start + period] = rsiFromAverages(avgGain, avgLoss);

  for (let i = start + period + 1; i < closes.length; i++) {
    const change = closes[i] - closes[i - 1];
    avgGain = (avgGain * (period - 1) + Math.max(change, 0)) / period;
    avgLoss = (avgLoss * (period - 1) + Math.max(-change, 0)) / period;
    result[i] = rsiFromAverages(avgGain, avgLoss);
  }

  return result;
}

function rsiFromAverages(avgGain: number, avgLoss: number): number {
  const range = avgGain + avgLoss;
  return range === 0 ? NaN : (100 * avgGain) / range;
}

export interface MacdLines {
  macd: number[];
  signal: number[];
  histogram: number[];
}

export function movingAverageConvergenceDivergence(
  closes: readonly number[],
  fast: number = 12,
  slow: number = 26,
  signalPeriod: number = 9
): MacdLines {
  const fastEma = exponentialMovingAverage(closes, fast);
  const slowEma = exponentialMovingAverage(closes, slow);
  const macd = fastEma.map((value, i) => value - slowEma[i]);
  const signal = exponentialMovingAverage(macd, signalPeriod);
  const histogram = macd.map((value, i) => value - signal[i]);

  return { macd, signal, histogram };
}

export interface IndicatorOptions {
  rsiPeriod?: number;
  macdFast?: number;
  macdSlow?: number;
  macdSignal?: number;
}

// Gaps in the close column are forward-filled before any line is computed;
// the returned bars keep their original close.
export function addTechnicalIndicators(bars: readonly PriceBar[], options: IndicatorOptions = {}): PriceBar[] {
  const closes = forwardFill(bars.map(bar => bar.close));
  const rsi = relativeStrengthIndex(closes, options.rsiPeriod ?? 14);
  const macd = movingAverageConvergenceDivergence(
    closes,
    options.macdFast ?? 12,
    options.macdSlow ?? 26,
    options.macdSignal ?? 9
  );

  return bars.map((bar, i) => ({
    ...bar,
    rsi: rsi[i],
    macd: macd.macd[i],
    macdSignal: macd.signal[i],
    macdHist: macd.histogram[i],
  }));
}

export type TechSignal = "STRONG BUY" | "BUY" | "HOLD" | "SELL" | "STRONG SELL" | "UNKNOWN";

/** Recommendation label for a single RSI reading. */
export function generateTechSignal(rsi: number | undefined, rsiBuy: number = 30, rsiSell: number = 70): TechSignal {
  if (rsi === undefined || Number.isNaN(rsi)) return "UNKNOWN";

  if (rsi < rsiBuy) return "STRONG BUY";
  if (rsi < 45) return "BUY";
  if (rsi > rsiSell) return "STRONG SELL";
  if (rsi > 55) return "SELL";
  return "HOLD";
}
