import { z } from "zod";

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8000),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Reasoning provider (keys are checked lazily on first use, not at boot)
  LLM_PROVIDER: z.enum(["openai", "anthropic"]).default("openai"),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().default("gpt-4o-mini"),
  ANTHROPIC_API_KEY: z.string().optional(),
  ANTHROPIC_MODEL: z.string().default("claude-3-5-haiku-latest"),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),

  // Agent loop limits
  AGENT_MAX_ROUND_TRIPS: z.coerce.number().int().min(1).max(20).default(8),
  REASONING_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  TOOL_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),

  // TradingView scanner
  TRADINGVIEW_SCANNER_URL: z
    .string()
    .url()
    .default("https://scanner.tradingview.com"),
  MARKET_DATA_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),

  // Email (mock mode when RESEND_API_KEY is missing)
  RESEND_API_KEY: z.string().optional(),
  EMAIL_FROM: z.string().default("alerts@psx-portfolio.local"),

  CORS_ORIGIN: z.string().default("*"),
});

export type Env = z.infer<typeof envSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  ${issue.path.join(".")}: ${issue.message}`)
      .join("\n");
    throw new Error(`Environment validation failed:\n${issues}`);
  }

  return result.data;
}
