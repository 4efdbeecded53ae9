import type { PriceBar } from "@shared/schema";
import type {
  Strategy,
  PriceSeriesLike,
  PortfolioState,
  BacktestLog,
  BacktestLogType,
  BacktestRun,
} from "./types";
import { PriceSeries } from "./market";
import { PositionSizer } from "./position-sizer";
import { seedState, advanceState, type BarInput } from "./portfolio";
import { config as appConfig } from "../config";
import { log as writeLog } from "../logger";

export interface BacktesterConfig {
  strategy: Strategy;
  sizer: PositionSizer;
  symbol?: string;
  initialCapital?: number;
  commission?: number;
}

export class Backtester {
  private strategy: Strategy;
  private sizer: PositionSizer;
  private symbol: string;
  private initialCapital: number;
  private commission: number;
  private logs: BacktestLog[] = [];
  private currentTimestamp: Date | null = null;
  private onProgress?: (progress: number, message: string) => void;

  constructor(config: BacktesterConfig) {
    this.strategy = config.strategy;
    this.sizer = config.sizer;
    this.symbol = config.symbol ?? "UNKNOWN";
    this.initialCapital = config.initialCapital ?? appConfig.BACKTEST_INITIAL_CAPITAL;
    this.commission = config.commission ?? appConfig.BACKTEST_COMMISSION;
  }

  setProgressCallback(callback: (progress: number, message: string) => void): void {
    this.onProgress = callback;
  }

  private log(type: BacktestLogType, message: string, details?: Record<string, unknown>): void {
    this.logs.push({
      timestamp: this.currentTimestamp ?? new Date(0),
      type,
      message,
      details,
    });
    writeLog(`Backtest ${type.toUpperCase()}`, message, type === "warn" ? "warn" : "info");
  }

  /**
   * Replays the series bar by bar. Each run starts from a fresh history, so a
   * Backtester can be reused across series.
   */
  run(input: readonly PriceBar[] | PriceSeriesLike): BacktestRun {
    this.logs = [];
    this.currentTimestamp = null;

    const series = PriceSeries.from(input);
    const frame = this.strategy.generateSignals(series);
    const history: PortfolioState[] = [];

    this.log("info", `Starting ${this.strategy.name} backtest for ${this.symbol}`, {
      bars: series.size(),
      parameters: this.strategy.parameters(),
      sizing: this.sizer.toConfig(),
    });

    if (series.size() === 0) {
      this.log("warn", "Price series is empty; no portfolio history produced");
      return this.finish(frame, history);
    }

    if (series.size() < this.strategy.lookback) {
      this.log("warn", `Only ${series.size()} bars for a ${this.strategy.lookback}-bar lookback; signals stay flat`);
    }

    const bars: BarInput[] = frame.timestamps.map((timestamp, i) => ({
      timestamp,
      close: frame.closes[i],
      signal: frame.signals[i],
      positionChange: frame.positionChanges[i],
    }));

    this.currentTimestamp = bars[0].timestamp;
    history.push(seedState(bars[0], this.initialCapital));
    this.log("info", `Initial capital: $${this.initialCapital.toLocaleString("en-US")}`);

    const params = { sizer: this.sizer, commission: this.commission };

    for (let i = 1; i < bars.length; i++) {
      const bar = bars[i];
      this.currentTimestamp = bar.timestamp;

      const { state, fill, skipped } = advanceState(history[i - 1], bar, params);
      history.push(state);

      if (fill && fill.side === "buy") {
        this.log("entry",
          `Bought ${fill.shares} @ $${fill.price.toFixed(2)} | Cash: $${state.cash.toFixed(2)}`,
          { fill }
        );
        if (state.cash < 0) {
          this.log("warn", `Cash is negative after buy ($${state.cash.toFixed(2)}); margin is not modelled`);
        }
      } else if (fill) {
        this.log("exit",
          `Sold ${fill.shares} @ $${fill.price.toFixed(2)} | Position: ${state.position} | Cash: $${state.cash.toFixed(2)}`,
          { fill }
        );
      } else if (skipped === "invalid_price" || skipped === "invalid_size") {
        this.log("warn", `Order skipped (${skipped}) at close ${bar.close}`, { positionChange: bar.positionChange });
      }

      if (this.onProgress) {
        const progress = Math.round((i / (bars.length - 1)) * 100);
        this.onProgress(progress, `Processing ${bar.timestamp.toDateString()}`);
      }
    }

    return this.finish(frame, history);
  }

  private finish(frame: BacktestRun["frame"], history: PortfolioState[]): BacktestRun {
    const last = history[history.length - 1];
    if (last) {
      this.log("info", `Backtest completed | Final equity: $${last.total.toFixed(2)} | Position: ${last.position}`);
    }

    return {
      symbol: this.symbol,
      initialCapital: this.initialCapital,
      commission: this.commission,
      frame,
      history: Object.freeze(history),
      logs: this.getLogs(),
    };
  }

  getLogs(): BacktestLog[] {
    return [...this.logs];
  }
}
