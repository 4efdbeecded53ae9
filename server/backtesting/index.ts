export * from "./types";
export * from "./errors";
export * from "./indicators";
export * from "./market";
export * from "./data-loader";
export * from "./position-sizer";
export * from "./portfolio";
export * from "./backtester";
export * from "./performance";

export {
  BaseStrategy,
  toPositionChanges,
  createStrategy,
  parseStrategyConfig,
  MovingAverageCrossStrategy,
  RsiStrategy,
  MacdStrategy,
  MaRsiFilterStrategy,
} from "./strategies/index";
