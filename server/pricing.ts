import { z } from "zod";
import type { OptionGreeks } from "@shared/schema";
import { blackScholesGreeks, binomialOptionPrice } from "@shared/options-pricing";
import { InvalidRequestError } from "./backtesting/errors";
import { config } from "./config";
import { log } from "./logger";

export const optionPricingRequestSchema = z.object({
  spot: z.number(),
  strike: z.number(),
  timeToExpiry: z.number(),
  volatility: z.number(),
  optionType: z.enum(["call", "put"]),
  riskFreeRate: z.number().optional(),
  steps: z.number().int().positive().optional(),
});

export type OptionPricingRequest = z.input<typeof optionPricingRequestSchema>;

export interface OptionPricingResult {
  blackScholes: OptionGreeks;
  binomial: {
    european: number;
    american: number;
  };
  riskFreeRate: number;
  steps: number;
}

/**
 * Prices one contract under both models. The risk-free rate and tree depth
 * fall back to RISK_FREE_RATE and BINOMIAL_STEPS.
 */
export function priceOption(request: OptionPricingRequest): OptionPricingResult {
  const parsed = optionPricingRequestSchema.safeParse(request);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`);
    throw new InvalidRequestError(`Invalid option pricing request: ${issues.join("; ")}`, issues);
  }

  const { steps: requestedSteps, riskFreeRate: requestedRate, ...contract } = parsed.data;
  const riskFreeRate = requestedRate ?? config.RISK_FREE_RATE;
  const steps = requestedSteps ?? config.BINOMIAL_STEPS;
  const quote = { ...contract, riskFreeRate };

  const blackScholes = blackScholesGreeks(quote);
  if (Number.isNaN(blackScholes.price)) {
    log("Pricing", `Degenerate inputs for ${quote.optionType} S=${quote.spot} K=${quote.strike} T=${quote.timeToExpiry} sigma=${quote.volatility}; returning NaN`, "warn");
  }

  return {
    blackScholes,
    binomial: {
      european: binomialOptionPrice({ ...quote, steps, american: false }),
      american: binomialOptionPrice({ ...quote, steps, american: true }),
    },
    riskFreeRate,
    steps,
  };
}
