import type { OptionType, OptionQuote, OptionGreeks } from "./schema";

export function cumulativeNormalDistribution(x: number): number {
  const t = 1 / (1 + 0.2316419 * Math.abs(x));
  const d = 0.3989423 * Math.exp(-x * x / 2);
  const p = d * t * (0.3193815 + t * (-0.3565638 + t * (1.781478 + t * (-1.821256 + t * 1.330274))));
  return x > 0 ? 1 - p : p;
}

export function normalDensity(x: number): number {
  return (1 / Math.sqrt(2 * Math.PI)) * Math.exp(-x * x / 2);
}

const NAN_GREEKS: OptionGreeks = Object.freeze({
  delta: NaN,
  gamma: NaN,
  theta: NaN,
  vega: NaN,
  rho: NaN,
  price: NaN,
});

// Written as negated comparisons so NaN inputs count as degenerate too
function isDegenerate(spot: number, strike: number, T: number, sigma: number): boolean {
  return !(T > 0) || !(sigma > 0) || !(spot > 0) || !(strike > 0);
}

export function intrinsicValue(type: OptionType, spot: number, strike: number): number {
  return type === "call" ? Math.max(spot - strike, 0) : Math.max(strike - spot, 0);
}

/**
 * Black-Scholes price and Greeks for a European option.
 * Theta is per calendar day, vega and rho per 1% move. Any non-positive spot,
 * strike, time or volatility gives NaN in every field.
 */
export function blackScholesGreeks(quote: OptionQuote): OptionGreeks {
  const { spot: S, strike: K, timeToExpiry: T, riskFreeRate: r, volatility: sigma } = quote;

  if (isDegenerate(S, K, T, sigma)) {
    return { ...NAN_GREEKS };
  }

  const sqrtT = Math.sqrt(T);
  const d1 = (Math.log(S / K) + (r + sigma * sigma / 2) * T) / (sigma * sqrtT);
  const d2 = d1 - sigma * sqrtT;
  const discount = Math.exp(-r * T);
  const nprime_d1 = normalDensity(d1);

  let delta: number;
  let theta: number;
  let rho: number;
  let price: number;

  if (quote.optionType === "call") {
    const nd1 = cumulativeNormalDistribution(d1);
    const nd2 = cumulativeNormalDistribution(d2);
    delta = nd1;
    price = S * nd1 - K * discount * nd2;
    theta = (-S * nprime_d1 * sigma / (2 * sqrtT) - r * K * discount * nd2) / 365;
    rho = K * T * discount * nd2 / 100;
  } else {
    const nMinusD1 = cumulativeNormalDistribution(-d1);
    const nMinusD2 = cumulativeNormalDistribution(-d2);
    delta = -nMinusD1;
    price = K * discount * nMinusD2 - S * nMinusD1;
    theta = (-S * nprime_d1 * sigma / (2 * sqrtT) + r * K * discount * nMinusD2) / 365;
    rho = -K * T * discount * nMinusD2 / 100;
  }

  const gamma = nprime_d1 / (S * sigma * sqrtT);
  const vega = S * nprime_d1 * sqrtT / 100;

  return { delta, gamma, theta, vega, rho, price };
}

export function blackScholesPrice(quote: OptionQuote): number {
  return blackScholesGreeks(quote).price;
}

export interface BinomialParams extends OptionQuote {
  steps: number;
  american: boolean;
}

/**
 * Cox-Ross-Rubinstein tree. Only one layer of node values is kept, so memory
 * is O(steps) while time is O(steps²).
 */
export function binomialOptionPrice(params: BinomialParams): number {
  const { spot: S, strike: K, timeToExpiry: T, riskFreeRate: r, volatility: sigma, steps, optionType } = params;

  if (isDegenerate(S, K, T, sigma) || !Number.isInteger(steps) || steps < 1) {
    return NaN;
  }

  const dt = T / steps;
  const u = Math.exp(sigma * Math.sqrt(dt));
  const d = 1 / u;
  const p = (Math.exp(r * dt) - d) / (u - d);
  const discount = Math.exp(-r * dt);

  // values[j]: node with j down-moves at the current level
  const values: number[] = new Array(steps + 1);
  for (let j = 0; j <= steps; j++) {
    const price = S * Math.pow(u, steps - j) * Math.pow(d, j);
    values[j] = intrinsicValue(optionType, price, K);
  }

  for (let i = steps - 1; i >= 0; i--) {
    for (let j = 0; j <= i; j++) {
      const continuation = discount * (p * values[j] + (1 - p) * values[j + 1]);

      if (params.american) {
        const price = S * Math.pow(u, i - j) * Math.pow(d, j);
        values[j] = Math.max(continuation, intrinsicValue(optionType, price, K));
      } else {
        values[j] = continuation;
      }
    }
  }

  return values[0];
}

// Calculate implied volatility using Newton-Raphson method
export function calculateImpliedVolatility(
  quote: Omit<OptionQuote, "volatility">,
  marketPrice: number,
  maxIterations: number = 100,
  tolerance: number = 1e-6
): number {
  const { spot: S, strike: K, timeToExpiry: T, riskFreeRate: r } = quote;

  if (isDegenerate(S, K, T, 1) || !(marketPrice > 0)) return NaN;

  let sigma = 0.3;

  for (let i = 0; i < maxIterations; i++) {
    const theoreticalPrice = blackScholesPrice({ ...quote, volatility: sigma });
    const priceDiff = theoreticalPrice - marketPrice;

    if (Math.abs(priceDiff) < tolerance) {
      return sigma;
    }

    // Raw vega (per 1.0 of volatility)
    const d1 = (Math.log(S / K) + (r + sigma * sigma / 2) * T) / (sigma * Math.sqrt(T));
    const vega = S * normalDensity(d1) * Math.sqrt(T);
    if (Math.abs(vega) < 1e-10) break;

    sigma = sigma - priceDiff / vega;

    // Constrain sigma to reasonable range (1% to 300%)
    sigma = Math.max(0.01, Math.min(3.0, sigma));
  }

  return sigma;
}

export interface PayoffPoint {
  price: number;
  payoffPerShare: number;
  totalPayoff: number;
}

/** Expiry P/L of a long option across 70%–130% of the current spot. */
export function optionPayoffCurve(
  spot: number,
  strike: number,
  premium: number,
  type: OptionType,
  contractSize: number = 100,
  points: number = 100
): PayoffPoint[] {
  const low = 0.7 * spot;
  const high = 1.3 * spot;

  return Array.from({ length: points }, (_, i) => {
    const price = points === 1 ? low : low + (high - low) * (i / (points - 1));
    const payoffPerShare = intrinsicValue(type, price, strike) - premium;
    return { price, payoffPerShare, totalPayoff: payoffPerShare * contractSize };
  });
}

export function optionBreakeven(strike: number, premium: number, type: OptionType): number {
  return type === "call" ? strike + premium : strike - premium;
}

export interface ChainContract {
  strike: number;
  impliedVolatility?: number;
}

export type ContractWithGreeks<C extends ChainContract> = C & { greeks: OptionGreeks };

/** Contracts without a usable implied volatility get NaN Greeks. */
export function addGreeksToChain<C extends ChainContract>(
  contracts: readonly C[],
  spot: number,
  timeToExpiry: number,
  riskFreeRate: number,
  optionType: OptionType
): ContractWithGreeks<C>[] {
  return contracts.map(contract => ({
    ...contract,
    greeks:
      contract.impliedVolatility === undefined
        ? { ...NAN_GREEKS }
        : blackScholesGreeks({
            spot,
            strike: contract.strike,
            timeToExpiry,
            riskFreeRate,
            volatility: contract.impliedVolatility,
            optionType,
          }),
  }));
}
