import { describe, it, expect } from "vitest";
import {
  cumulativeNormalDistribution,
  blackScholesGreeks,
  blackScholesPrice,
  binomialOptionPrice,
  calculateImpliedVolatility,
  optionPayoffCurve,
  optionBreakeven,
  addGreeksToChain,
} from "../options-pricing";
import type { OptionQuote } from "../schema";

const atm: OptionQuote = {
  spot: 100,
  strike: 100,
  timeToExpiry: 1,
  riskFreeRate: 0.05,
  volatility: 0.2,
  optionType: "call",
};
const atmPut: OptionQuote = { ...atm, optionType: "put" };

describe("cumulativeNormalDistribution", () => {
  it("matches standard normal values", () => {
    expect(cumulativeNormalDistribution(0)).toBeCloseTo(0.5, 6);
    expect(cumulativeNormalDistribution(1.96)).toBeCloseTo(0.975, 4);
    expect(cumulativeNormalDistribution(-1.96)).toBeCloseTo(0.025, 4);
  });
});

describe("blackScholesGreeks", () => {
  it("prices an at-the-money call and put", () => {
    expect(blackScholesPrice(atm)).toBeCloseTo(10.4506, 3);
    expect(blackScholesPrice(atmPut)).toBeCloseTo(5.5735, 3);
  });

  it("reports scaled Greeks for a call", () => {
    const greeks = blackScholesGreeks(atm);

    expect(greeks.delta).toBeCloseTo(0.6368, 3);
    expect(greeks.gamma).toBeCloseTo(0.01876, 4);
    expect(greeks.theta).toBeCloseTo(-0.01757, 4);
    expect(greeks.vega).toBeCloseTo(0.3752, 3);
    expect(greeks.rho).toBeCloseTo(0.5323, 3);
  });

  it("gives a put delta one below the call delta", () => {
    expect(blackScholesGreeks(atmPut).delta).toBeCloseTo(blackScholesGreeks(atm).delta - 1, 12);
  });

  it("satisfies put-call parity", () => {
    const cases: OptionQuote[] = [
      atm,
      { ...atm, strike: 110, timeToExpiry: 0.5 },
      { ...atm, spot: 80, strike: 95, volatility: 0.45, riskFreeRate: 0.02 },
    ];

    for (const quote of cases) {
      const call = blackScholesPrice(quote);
      const put = blackScholesPrice({ ...quote, optionType: "put" });
      const forward = quote.spot - quote.strike * Math.exp(-quote.riskFreeRate * quote.timeToExpiry);
      expect(Math.abs(call - put - forward)).toBeLessThan(1e-6);
    }
  });

  it("returns NaN in every field for degenerate inputs", () => {
    for (const quote of [
      { ...atm, timeToExpiry: 0 },
      { ...atm, volatility: 0 },
      { ...atm, spot: 0 },
      { ...atm, strike: -1 },
    ]) {
      expect(Object.values(blackScholesGreeks(quote)).every(value => Number.isNaN(value))).toBe(true);
    }
  });
});

describe("binomialOptionPrice", () => {
  it("converges to Black-Scholes for a European option", () => {
    const bs = blackScholesPrice(atm);

    expect(Math.abs(binomialOptionPrice({ ...atm, steps: 100, american: false }) - bs)).toBeLessThan(0.05);
    expect(Math.abs(binomialOptionPrice({ ...atm, steps: 500, american: false }) - bs)).toBeLessThan(0.01);
  });

  it("values the early exercise right of an American put", () => {
    const european = binomialOptionPrice({ ...atmPut, steps: 200, american: false });
    const american = binomialOptionPrice({ ...atmPut, steps: 200, american: true });

    expect(american).toBeGreaterThan(european + 0.3);
  });

  it("gives the same value for American and European calls", () => {
    const european = binomialOptionPrice({ ...atm, steps: 100, american: false });
    const american = binomialOptionPrice({ ...atm, steps: 100, american: true });

    expect(american).toBeCloseTo(european, 8);
  });

  it("returns NaN for degenerate inputs or step counts", () => {
    expect(binomialOptionPrice({ ...atm, volatility: 0, steps: 100, american: false })).toBeNaN();
    expect(binomialOptionPrice({ ...atm, steps: 0, american: false })).toBeNaN();
    expect(binomialOptionPrice({ ...atm, steps: 2.5, american: true })).toBeNaN();
  });

  it("reduces to discounted intrinsic value on a one-step tree", () => {
    const u = Math.exp(0.2);
    const d = 1 / u;
    const p = (Math.exp(0.05) - d) / (u - d);
    const expected = Math.exp(-0.05) * p * (100 * u - 100);

    expect(binomialOptionPrice({ ...atm, steps: 1, american: false })).toBeCloseTo(expected, 10);
  });
});

describe("calculateImpliedVolatility", () => {
  it("recovers the volatility used to price the option", () => {
    const { volatility, ...contract } = { ...atm, volatility: 0.25 };
    const price = blackScholesPrice({ ...contract, volatility });

    expect(calculateImpliedVolatility(contract, price)).toBeCloseTo(0.25, 4);
  });

  it("returns NaN without a positive market price", () => {
    const { volatility, ...contract } = atm;
    expect(calculateImpliedVolatility(contract, 0)).toBeNaN();
  });
});

describe("payoff helpers", () => {
  it("spans 70% to 130% of spot", () => {
    const curve = optionPayoffCurve(100, 100, 5, "call");

    expect(curve).toHaveLength(100);
    expect(curve[0].price).toBeCloseTo(70, 10);
    expect(curve[0].payoffPerShare).toBe(-5);
    expect(curve[0].totalPayoff).toBe(-500);
    expect(curve[99].price).toBeCloseTo(130, 10);
    expect(curve[99].payoffPerShare).toBeCloseTo(25, 10);
  });

  it("computes put payoffs per contract", () => {
    const curve = optionPayoffCurve(100, 100, 4, "put", 100, 3);

    expect(curve.map(point => point.payoffPerShare)).toEqual([
      expect.closeTo(26, 10),
      expect.closeTo(-4, 10),
      expect.closeTo(-4, 10),
    ]);
  });

  it("finds the breakeven price", () => {
    expect(optionBreakeven(100, 5, "call")).toBe(105);
    expect(optionBreakeven(100, 5, "put")).toBe(95);
  });
});

describe("addGreeksToChain", () => {
  it("prices contracts with an implied volatility and keeps their fields", () => {
    const chain = addGreeksToChain(
      [{ symbol: "TEST240119C100", strike: 100, impliedVolatility: 0.2 }, { symbol: "TEST240119C110", strike: 110 }],
      100,
      1,
      0.05,
      "call"
    );

    expect(chain[0].symbol).toBe("TEST240119C100");
    expect(chain[0].greeks).toEqual(blackScholesGreeks(atm));
    expect(chain[1].greeks.delta).toBeNaN();
    expect(chain[1].greeks.price).toBeNaN();
  });
});
