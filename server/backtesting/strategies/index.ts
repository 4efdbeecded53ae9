import { strategyConfigSchema, type StrategyConfig, type StrategyConfigInput } from "@shared/schema";
import { InvalidStrategyError } from "../errors";
import type { Strategy } from "../types";
import { MovingAverageCrossStrategy } from "./moving-average-cross";
import { RsiStrategy } from "./rsi";
import { MacdStrategy } from "./macd";
import { MaRsiFilterStrategy } from "./ma-rsi-filter";

export { BaseStrategy, toPositionChanges } from "./base";
export { MovingAverageCrossStrategy, RsiStrategy, MacdStrategy, MaRsiFilterStrategy };

export function parseStrategyConfig(input: unknown): StrategyConfig {
  const parsed = strategyConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
    );
    throw new InvalidStrategyError(`Invalid strategy configuration: ${issues.join("; ")}`, issues);
  }
  return parsed.data;
}

export function createStrategy(input: StrategyConfigInput): Strategy {
  const config = parseStrategyConfig(input);

  switch (config.type) {
    case "ma_cross": {
      const { type, ...params } = config;
      return new MovingAverageCrossStrategy(params);
    }
    case "rsi": {
      const { type, ...params } = config;
      return new RsiStrategy(params);
    }
    case "macd": {
      const { type, ...params } = config;
      return new MacdStrategy(params);
    }
    case "ma_rsi": {
      const { type, ...params } = config;
      return new MaRsiFilterStrategy(params);
    }
    default: {
      const unreachable: never = config;
      throw new InvalidStrategyError(`Unknown strategy type: ${JSON.stringify(unreachable)}`);
    }
  }
}
