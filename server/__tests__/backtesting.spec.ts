import { describe, it, expect } from "vitest";
import { runBacktest, metricsToResults } from "../backtesting";
import { InvalidRequestError, InvalidSizingMethodError, InvalidStrategyError } from "../backtesting/errors";
import { PerformanceAnalyzer } from "../backtesting/performance";
import { makeBars } from "../backtesting/__tests__/fixtures";

const rising = makeBars(Array.from({ length: 10 }, (_, i) => 10 + i));

describe("runBacktest", () => {
  it("runs a moving average crossover and builds the result record", () => {
    const result = runBacktest({
      ticker: "TEST",
      bars: rising,
      strategy: { type: "ma_cross", shortWindow: 2, longWindow: 3 },
      sizing: { method: "fixed_dollar", value: 1000 },
      initialCapital: 100000,
      commission: 0,
    });

    expect(result.history).toHaveLength(10);
    expect(result.history[2].position).toBe(83);
    expect(result.history[2].cash).toBe(99004);
    expect(result.metrics.finalEquity).toBe(100581);
    expect(result.trades).toEqual([]);

    expect(result.record).not.toBeNull();
    expect(result.record?.name).toBe("TEST Moving Average Crossover");
    expect(result.record?.ticker).toBe("TEST");
    expect(result.record?.startDate).toBe("2024-01-01T00:00:00");
    expect(result.record?.endDate).toBe("2024-01-10T00:00:00");
    expect(result.record?.strategyType).toBe("ma_cross");
    expect(result.record?.parameters).toEqual({
      shortWindow: 2,
      longWindow: 3,
      initialCapital: 100000,
      commission: 0,
      positionSizing: "fixed_dollar",
      positionSizeValue: 1000,
    });
    expect(result.record?.results.buySignals).toBe(1);
    expect(result.record?.results.completedTrades).toBe(0);
    expect(result.record?.results.finalEquity).toBe(100581);
    expect(result.record?.results.profitFactor).toBeNull();
    expect(result.record?.results.winRate).toBeNull();
  });

  it("uses the request name and default sizing", () => {
    const result = runBacktest({
      name: "rsi check",
      ticker: "TEST",
      bars: rising,
      strategy: { type: "rsi" },
    });

    expect(result.record?.name).toBe("rsi check");
    expect(result.record?.parameters.positionSizing).toBe("fixed_dollar");
    expect(result.record?.parameters.positionSizeValue).toBe(10000);
  });

  it("produces no record for an empty series", () => {
    const result = runBacktest({ ticker: "TEST", bars: [], strategy: { type: "macd" } });

    expect(result.history).toEqual([]);
    expect(result.record).toBeNull();
    expect(result.metrics.totalReturn).toBeNaN();
  });

  it("rejects an unknown sizing method", () => {
    expect(() =>
      runBacktest({ ticker: "TEST", bars: rising, strategy: { type: "rsi" }, sizing: { method: "kelly", value: 1 } })
    ).toThrow(InvalidSizingMethodError);
  });

  it("rejects an invalid strategy configuration", () => {
    expect(() =>
      runBacktest({ ticker: "TEST", bars: rising, strategy: { type: "macd", fast: 26, slow: 12 } })
    ).toThrow(InvalidStrategyError);
  });

  it("rejects a fractional fixed share count before running", () => {
    expect(() =>
      runBacktest({
        ticker: "TEST",
        bars: rising,
        strategy: { type: "ma_cross", shortWindow: 2, longWindow: 3 },
        sizing: { method: "fixed_shares", value: 10.5 },
      })
    ).toThrow("Invalid backtest request: sizing.value: fixed_shares needs a whole number of shares");
  });

  it("rejects names and tickers longer than the record allows", () => {
    expect(() =>
      runBacktest({ name: "x".repeat(200), ticker: "TEST", bars: rising, strategy: { type: "rsi" } })
    ).toThrow(InvalidRequestError);
    expect(() =>
      runBacktest({ ticker: "T".repeat(21), bars: rising, strategy: { type: "rsi" } })
    ).toThrow(InvalidRequestError);
  });

  it("rejects a malformed request", () => {
    expect(() => runBacktest({ ticker: "", bars: rising, strategy: { type: "rsi" } })).toThrow(InvalidRequestError);
    expect(() =>
      runBacktest({ ticker: "TEST", bars: rising, strategy: { type: "rsi" }, commission: 2 })
    ).toThrow(InvalidRequestError);
  });
});

describe("metricsToResults", () => {
  it("flattens trade statistics and maps non-finite values to null", () => {
    const metrics = new PerformanceAnalyzer([], 100000).getMetrics();
    const results = metricsToResults({ ...metrics, sharpeRatio: 1.5, trades: { ...metrics.trades, profitFactor: Infinity } });

    expect(results.sharpeRatio).toBe(1.5);
    expect(results.totalReturn).toBeNull();
    expect(results.profitFactor).toBeNull();
    expect(results.totalTrades).toBe(0);
    expect(Object.keys(results)).toHaveLength(15);
  });
});
