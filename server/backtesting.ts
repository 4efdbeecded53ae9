import {
  backtestRequestSchema,
  insertBacktestSchema,
  type BacktestRequest,
  type BacktestRecord,
  type ParameterValue,
  type ResultValue,
  type StrategyType,
} from "@shared/schema";
import {
  Backtester,
  PerformanceAnalyzer,
  PositionSizer,
  createStrategy,
  parseStrategyConfig,
  toNaiveIsoString,
  InvalidRequestError,
  type BacktestResult,
  type BacktestRun,
  type PerformanceMetrics,
} from "./backtesting/index";
import { log } from "./logger";

export interface BacktestServiceResult extends BacktestResult {
  // Null when the series was empty and there is no date range to record
  record: BacktestRecord | null;
}

function finiteOrNull(value: number): ResultValue {
  return Number.isFinite(value) ? value : null;
}

// NaN and Infinity have no JSON form; they are stored as null
export function metricsToResults(metrics: PerformanceMetrics): Record<string, ResultValue> {
  const { trades, ...summary } = metrics;
  const results: Record<string, ResultValue> = {};

  for (const [key, value] of Object.entries(summary)) {
    results[key] = finiteOrNull(value);
  }
  for (const [key, value] of Object.entries(trades)) {
    results[key] = finiteOrNull(value);
  }

  return results;
}

export function buildBacktestRecord(
  name: string,
  strategyType: StrategyType,
  run: BacktestRun,
  parameters: Record<string, ParameterValue>,
  metrics: PerformanceMetrics
): BacktestRecord | null {
  const first = run.history[0];
  const last = run.history[run.history.length - 1];
  if (!first || !last) return null;

  const record: BacktestRecord = {
    name,
    ticker: run.symbol,
    startDate: toNaiveIsoString(first.timestamp),
    endDate: toNaiveIsoString(last.timestamp),
    strategyType,
    parameters,
    results: metricsToResults(metrics),
  };

  const checked = insertBacktestSchema.safeParse(record);
  if (!checked.success) {
    throw new Error(`Backtest record failed validation: ${checked.error.message}`);
  }

  return record;
}

export function runBacktest(request: BacktestRequest): BacktestServiceResult {
  const parsed = backtestRequestSchema.safeParse(request);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`);
    throw new InvalidRequestError(`Invalid backtest request: ${issues.join("; ")}`, issues);
  }

  const { ticker, bars, strategy: strategyConfig, sizing, initialCapital, commission } = parsed.data;
  const strategy = createStrategy(parseStrategyConfig(strategyConfig));
  const sizer = new PositionSizer(sizing.method, sizing.value);

  const backtester = new Backtester({ strategy, sizer, symbol: ticker, initialCapital, commission });
  const run = backtester.run(bars);

  const analyzer = new PerformanceAnalyzer(run.history, run.initialCapital);
  const trades = analyzer.getTrades();
  const metrics = analyzer.getMetrics();

  const parameters: Record<string, ParameterValue> = {
    ...strategy.parameters(),
    initialCapital: run.initialCapital,
    commission: run.commission,
    positionSizing: sizer.method,
    positionSizeValue: sizer.value,
  };
  const name = parsed.data.name ?? `${ticker} ${strategy.name}`;
  const record = buildBacktestRecord(name, strategy.type, run, parameters, metrics);

  if (!record) {
    log("Backtest", `No bars for ${ticker}; result record not produced`, "warn");
  }

  return { history: run.history, trades, metrics, logs: run.logs, record };
}
