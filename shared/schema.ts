import { pgTable, serial, varchar, timestamp, jsonb } from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

export type OptionType = "call" | "put";

export interface Greeks {
  delta: number;
  gamma: number;
  theta: number;   // per calendar day
  vega: number;    // per 1% volatility move
  rho: number;     // per 1% rate move
}

export interface OptionGreeks extends Greeks {
  price: number;
}

export interface OptionQuote {
  spot: number;
  strike: number;
  timeToExpiry: number;  // years
  riskFreeRate: number;
  volatility: number;
  optionType: OptionType;
}

// Missing cells in an OHLCV table arrive as NaN and must survive validation
const numericCell = z.union([z.number(), z.nan()]);

export const priceBarSchema = z.object({
  timestamp: z.coerce.date(),
  open: numericCell,
  high: numericCell,
  low: numericCell,
  close: numericCell,
  volume: numericCell,
  rsi: numericCell.optional(),
  macd: numericCell.optional(),
  macdSignal: numericCell.optional(),
  macdHist: numericCell.optional(),
  shortMa: numericCell.optional(),
  longMa: numericCell.optional(),
});

export type PriceBar = z.infer<typeof priceBarSchema>;
export type IndicatorField = "rsi" | "macd" | "macdSignal" | "macdHist" | "shortMa" | "longMa";

const windowLength = z.number().int().positive();
const threshold = z.number().min(0).max(100);

export const maCrossConfigSchema = z.object({
  type: z.literal("ma_cross"),
  shortWindow: windowLength.default(20),
  longWindow: windowLength.default(50),
});

export const rsiConfigSchema = z.object({
  type: z.literal("rsi"),
  rsiPeriod: windowLength.default(14),
  overbought: threshold.default(70),
  oversold: threshold.default(30),
});

export const macdConfigSchema = z.object({
  type: z.literal("macd"),
  fast: windowLength.default(12),
  slow: windowLength.default(26),
  signal: windowLength.default(9),
});

export const maRsiConfigSchema = z.object({
  type: z.literal("ma_rsi"),
  shortWindow: windowLength.default(20),
  longWindow: windowLength.default(50),
  rsiPeriod: windowLength.default(14),
  rsiBuy: threshold.default(30),
  rsiSell: threshold.default(70),
});

export const strategyTypes = ["ma_cross", "rsi", "macd", "ma_rsi"] as const;
export type StrategyType = typeof strategyTypes[number];

export const strategyConfigSchema = z
  .discriminatedUnion("type", [maCrossConfigSchema, rsiConfigSchema, macdConfigSchema, maRsiConfigSchema])
  .superRefine((config, ctx) => {
    const ordered = (low: number, high: number, path: string, message: string) => {
      if (low >= high) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [path], message });
      }
    };

    switch (config.type) {
      case "ma_cross":
        ordered(config.shortWindow, config.longWindow, "longWindow", "longWindow must exceed shortWindow");
        break;
      case "rsi":
        ordered(config.oversold, config.overbought, "overbought", "overbought must exceed oversold");
        break;
      case "macd":
        ordered(config.fast, config.slow, "slow", "slow period must exceed fast period");
        break;
      case "ma_rsi":
        ordered(config.shortWindow, config.longWindow, "longWindow", "longWindow must exceed shortWindow");
        ordered(config.rsiBuy, config.rsiSell, "rsiSell", "rsiSell must exceed rsiBuy");
        break;
    }
  });

export type StrategyConfig = z.infer<typeof strategyConfigSchema>;
export type StrategyConfigInput = z.input<typeof strategyConfigSchema>;
export type StrategyConfigOf<T extends StrategyType> = Extract<StrategyConfig, { type: T }>;

export const sizingMethods = ["fixed_dollar", "percentage", "fixed_risk", "fixed_shares"] as const;
export type SizingMethod = typeof sizingMethods[number];

export interface PositionSizingConfig {
  method: SizingMethod;
  value: number;
}

// Strategy and sizing keys are only shape-checked here; the strategy factory
// and the position sizer report their own configuration errors.
export const backtestRequestSchema = z.object({
  name: z.string().min(1).max(128).optional(),
  ticker: z.string().min(1).max(20),
  bars: z.array(priceBarSchema),
  strategy: z.custom<StrategyConfigInput>(
    value => typeof value === "object" && value !== null && "type" in value,
    { message: "strategy must be an object with a type" }
  ),
  sizing: z
    .object({
      method: z.string(),
      value: z.number().nonnegative(),
    })
    .refine(sizing => sizing.method !== "fixed_shares" || Number.isInteger(sizing.value), {
      message: "fixed_shares needs a whole number of shares",
      path: ["value"],
    })
    .default({ method: "fixed_dollar", value: 10000 }),
  initialCapital: z.number().positive().optional(),
  commission: z.number().min(0).max(1).optional(),
});

export type BacktestRequest = z.input<typeof backtestRequestSchema>;
export type ParsedBacktestRequest = z.infer<typeof backtestRequestSchema>;

export type ParameterValue = string | number | boolean;
export type ResultValue = number | null;

// Saved backtest row. Storage itself lives outside this package; the table
// definition fixes the shape every persisted result record must take.
export const backtests = pgTable("backtests", {
  id: serial("id").primaryKey(),
  name: varchar("name", { length: 128 }).notNull(),
  ticker: varchar("ticker", { length: 20 }).notNull(),
  startDate: timestamp("start_date", { mode: "string" }).notNull(),
  endDate: timestamp("end_date", { mode: "string" }).notNull(),
  strategyType: varchar("strategy_type", { length: 50 }).notNull(),
  parameters: jsonb("parameters").$type<Record<string, ParameterValue>>().notNull(),
  results: jsonb("results").$type<Record<string, ResultValue>>(),
  createdAt: timestamp("created_at").defaultNow(),
});

export const insertBacktestSchema = createInsertSchema(backtests, {
  startDate: z.string().datetime({ local: true }),
  endDate: z.string().datetime({ local: true }),
  strategyType: z.enum(strategyTypes),
  parameters: z.record(z.union([z.string(), z.number(), z.boolean()])),
  results: z.record(z.number().nullable()),
}).omit({
  id: true,
  createdAt: true,
});

export interface BacktestRecord {
  name: string;
  ticker: string;
  startDate: string;      // ISO-8601, timezone-naive
  endDate: string;
  strategyType: StrategyType;
  parameters: Record<string, ParameterValue>;
  results: Record<string, ResultValue>;
}
