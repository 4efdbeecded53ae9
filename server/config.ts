import { z } from "zod";

const envSchema = z.object({
  BACKTEST_INITIAL_CAPITAL: z.coerce.number().positive().default(100000),
  BACKTEST_COMMISSION: z.coerce.number().min(0).max(1).default(0.001),
  RISK_FREE_RATE: z.coerce.number().default(0.05),
  BINOMIAL_STEPS: z.coerce.number().int().positive().default(100),
  LOG_LEVEL: z.enum(["info", "silent"]).default("info"),
});

export type AppConfig = z.infer<typeof envSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid environment configuration: ${details}`);
  }
  return parsed.data;
}

export const config = loadConfig();
