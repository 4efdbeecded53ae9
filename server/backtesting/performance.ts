import type { PortfolioState, Trade, TradeStatistics, PerformanceMetrics } from "./types";

const TRADING_DAYS_PER_YEAR = 252;
const MS_PER_DAY = 24 * 60 * 60 * 1000;

function mean(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

function sampleStdDev(values: readonly number[]): number {
  if (values.length < 2) return NaN;
  const avg = mean(values);
  const variance = values.reduce((sum, v) => sum + (v - avg) ** 2, 0) / (values.length - 1);
  return Math.sqrt(variance);
}

// NaN returns (bars with a missing close) are skipped, not treated as zero
function finiteReturns(history: readonly PortfolioState[]): number[] {
  return history.map(state => state.periodReturn).filter(r => Number.isFinite(r));
}

/** Annualisation assumes daily bars. */
export function sharpeRatio(history: readonly PortfolioState[]): number {
  const returns = finiteReturns(history);
  const stdev = sampleStdDev(returns);
  if (!Number.isFinite(stdev) || stdev === 0) return NaN;
  return Math.sqrt(TRADING_DAYS_PER_YEAR) * (mean(returns) / stdev);
}

/** Per-bar decline of compounded equity from its running peak, as a fraction. */
export function drawdownSeries(history: readonly PortfolioState[]): number[] {
  let equity = 1;
  let peak = -Infinity;

  return history.map(state => {
    if (Number.isFinite(state.periodReturn)) {
      equity *= 1 + state.periodReturn;
    }
    peak = Math.max(peak, equity);
    return equity / peak - 1;
  });
}

export function maxDrawdown(history: readonly PortfolioState[]): number {
  if (history.length === 0) return NaN;
  return drawdownSeries(history).reduce((worst, dd) => Math.min(worst, dd), 0) * 100;
}

export function totalReturn(history: readonly PortfolioState[], initialCapital: number): number {
  const last = history[history.length - 1];
  if (!last) return NaN;
  return (last.total / initialCapital - 1) * 100;
}

export function annualizedReturn(history: readonly PortfolioState[], totalReturnPercent: number): number {
  if (history.length === 0) return NaN;

  const first = history[0].timestamp.getTime();
  const last = history[history.length - 1].timestamp.getTime();
  const days = Math.floor((last - first) / MS_PER_DAY);
  if (days <= 0) return 0;

  return ((1 + totalReturnPercent / 100) ** (365 / days) - 1) * 100;
}

/**
 * Pairs position changes into round trips: a buy while flat opens a trade at
 * that bar's close, the next sell closes it. Buys during an open trade are
 * ignored, and a trade still open on the last bar is not counted.
 */
export function extractTrades(history: readonly PortfolioState[]): Trade[] {
  const trades: Trade[] = [];
  let entry: PortfolioState | null = null;

  for (const state of history) {
    if (state.positionChange > 0 && entry === null) {
      entry = state;
    } else if (state.positionChange < 0 && entry !== null) {
      const returnPct = state.close / entry.close - 1;
      trades.push({
        entryTime: entry.timestamp,
        entryPrice: entry.close,
        exitTime: state.timestamp,
        exitPrice: state.close,
        returnPct,
        profitable: returnPct > 0,
      });
      entry = null;
    }
  }

  return trades;
}

export function tradeStatistics(history: readonly PortfolioState[], trades: readonly Trade[]): TradeStatistics {
  const buySignals = history.filter(state => state.positionChange > 0).length;
  const sellSignals = history.filter(state => state.positionChange < 0).length;

  const winners = trades.filter(t => t.profitable).map(t => t.returnPct);
  const losers = trades.filter(t => !t.profitable).map(t => t.returnPct);
  const grossWin = winners.reduce((sum, r) => sum + r, 0);
  const grossLoss = losers.reduce((sum, r) => sum + r, 0);

  let profitFactor: number;
  if (trades.length === 0) {
    profitFactor = NaN;
  } else if (grossLoss === 0) {
    profitFactor = Infinity;
  } else {
    profitFactor = Math.abs(grossWin / grossLoss);
  }

  return {
    totalTrades: buySignals + sellSignals,
    buySignals,
    sellSignals,
    completedTrades: trades.length,
    winningTrades: winners.length,
    losingTrades: losers.length,
    winRate: trades.length > 0 ? (winners.length / trades.length) * 100 : NaN,
    avgWin: mean(winners),
    avgLoss: mean(losers),
    profitFactor,
  };
}

export class PerformanceAnalyzer {
  private history: readonly PortfolioState[];
  private initialCapital: number;

  constructor(history: readonly PortfolioState[], initialCapital: number) {
    this.history = history;
    this.initialCapital = initialCapital;
  }

  getTrades(): Trade[] {
    return extractTrades(this.history);
  }

  getMetrics(): PerformanceMetrics {
    const total = totalReturn(this.history, this.initialCapital);
    const last = this.history[this.history.length - 1];

    return {
      totalReturn: total,
      annualizedReturn: annualizedReturn(this.history, total),
      sharpeRatio: sharpeRatio(this.history),
      maxDrawdown: maxDrawdown(this.history),
      finalEquity: last ? last.total : NaN,
      trades: tradeStatistics(this.history, this.getTrades()),
    };
  }
}
