import type { PortfolioState, Signal } from "./types";
import { sharesToSell, type PositionSizer } from "./position-sizer";

export interface BarInput {
  timestamp: Date;
  close: number;
  signal: Signal;
  positionChange: number;
}

export interface ExecutionParams {
  sizer: PositionSizer;
  commission: number;
}

export interface Fill {
  side: "buy" | "sell";
  shares: number;
  price: number;
  cashDelta: number;
}

export type SkipReason = "sell_while_flat" | "invalid_price" | "invalid_size";

export interface StepOutcome {
  state: PortfolioState;
  fill?: Fill;
  skipped?: SkipReason;
}

function freezeState(state: PortfolioState): PortfolioState {
  return Object.freeze(state);
}

export function seedState(bar: BarInput, initialCapital: number): PortfolioState {
  return freezeState({
    timestamp: bar.timestamp,
    close: bar.close,
    signal: bar.signal,
    positionChange: 0,
    position: 0,
    cash: initialCapital,
    holdings: 0,
    total: initialCapital,
    periodReturn: 0,
    sharesTraded: 0,
  });
}

/**
 * One bar of bookkeeping. Orders fill at the bar's close; commission is a
 * fraction of traded value charged on both sides.
 */
export function advanceState(prev: PortfolioState, bar: BarInput, params: ExecutionParams): StepOutcome {
  let position = prev.position;
  let cash = prev.cash;
  let fill: Fill | undefined;
  let skipped: SkipReason | undefined;

  if (bar.positionChange !== 0) {
    const price = bar.close;
    const buying = bar.positionChange > 0;

    if (!buying && prev.position <= 0) {
      skipped = "sell_while_flat";
    } else if (!Number.isFinite(price) || price <= 0) {
      skipped = "invalid_price";
    } else {
      const shares = params.sizer.computeShares(price, prev.total);

      if (!Number.isFinite(shares)) {
        skipped = "invalid_size";
      } else if (buying) {
        const cost = shares * price * (1 + params.commission);
        position += shares;
        cash -= cost;
        fill = { side: "buy", shares, price, cashDelta: -cost };
      } else {
        const sold = sharesToSell(shares, prev.position);
        const proceeds = sold * price * (1 - params.commission);
        position -= sold;
        cash += proceeds;
        fill = { side: "sell", shares: sold, price, cashDelta: proceeds };
      }
    }
  }

  const holdings = position * bar.close;
  const total = holdings + cash;

  const state = freezeState({
    timestamp: bar.timestamp,
    close: bar.close,
    signal: bar.signal,
    positionChange: bar.positionChange,
    position,
    cash,
    holdings,
    total,
    periodReturn: total / prev.total - 1,
    sharesTraded: fill ? (fill.side === "buy" ? fill.shares : -fill.shares) : 0,
  });

  return { state, fill, skipped };
}
