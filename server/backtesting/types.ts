import type { PriceBar, StrategyType } from "@shared/schema";

export type Signal = 1 | -1 | 0;

export interface SignalFrame {
  timestamps: Date[];
  closes: number[];
  signals: Signal[];
  // First difference of signals; the first bar is always 0
  positionChanges: number[];
  // Indicator lines the strategy evaluated, keyed by name (shortMa, rsi, ...)
  indicators: Record<string, number[]>;
}

export interface PriceSeriesLike {
  getBars(): readonly PriceBar[];
}

export interface Strategy {
  name: string;
  type: StrategyType;
  // Longest lookback in bars before the strategy can emit a non-flat signal
  lookback: number;
  parameters(): Record<string, number>;
  generateSignals(series: PriceSeriesLike): SignalFrame;
}

export interface PortfolioState {
  readonly timestamp: Date;
  readonly close: number;
  readonly signal: Signal;
  readonly positionChange: number;
  readonly position: number;
  readonly cash: number;
  readonly holdings: number;
  readonly total: number;
  readonly periodReturn: number;
  // Shares bought (positive) or sold (negative) on this bar
  readonly sharesTraded: number;
}

export interface Trade {
  entryTime: Date;
  entryPrice: number;
  exitTime: Date;
  exitPrice: number;
  // Fractional return, 0.05 = +5%
  returnPct: number;
  profitable: boolean;
}

export interface TradeStatistics {
  totalTrades: number;
  buySignals: number;
  sellSignals: number;
  completedTrades: number;
  winningTrades: number;
  losingTrades: number;
  winRate: number;
  avgWin: number;
  avgLoss: number;
  profitFactor: number;
}

export interface PerformanceMetrics {
  totalReturn: number;        // percent
  annualizedReturn: number;   // percent
  sharpeRatio: number;
  maxDrawdown: number;        // percent, <= 0
  finalEquity: number;
  trades: TradeStatistics;
}

export type BacktestLogType = "entry" | "exit" | "info" | "warn";

export interface BacktestLog {
  timestamp: Date;
  type: BacktestLogType;
  message: string;
  details?: Record<string, unknown>;
}

export interface BacktestRun {
  symbol: string;
  initialCapital: number;
  commission: number;
  frame: SignalFrame;
  history: readonly PortfolioState[];
  logs: BacktestLog[];
}

export interface BacktestResult {
  history: readonly PortfolioState[];
  trades: Trade[];
  metrics: PerformanceMetrics;
  logs: BacktestLog[];
}
