import { config as dotenvConfig } from "dotenv";
import { z } from "zod";
import { ConfigError } from "./errors";

dotenvConfig();

const optionalSecret = z
  .string()
  .optional()
  .transform((v) => (v && v.trim().length > 0 ? v.trim() : undefined));

const envSchema = z.object({
  OPENAI_API_KEY: optionalSecret,
  OPENAI_BASE_URL: optionalSecret,
  VISION_MODEL: z.string().default("gpt-4o-mini"),
  INTERPRETER_MODEL: z.string().default("gpt-4o-mini"),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
  LLM_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(1),
  LLM_PRICE_PER_1K_TOKENS: z.coerce.number().nonnegative().default(0.00015),
  DATA_DIR: z.string().default("./data"),
  PLAYWRIGHT_HEADLESS: z.string().default("true").transform((v) => v === "true"),
  PLAYWRIGHT_SLOW_MO: z.coerce.number().default(0),
  PLAYWRIGHT_EXECUTABLE_PATH: optionalSecret,
  LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
  LOG_PRETTY: z.string().default("true").transform((v) => v === "true"),
  DEEPSCRAPE_DEFAULT_RESULTS: z.coerce.number().int().min(1).default(10),
  DEEPSCRAPE_DEFAULT_PLATFORMS: z.string().default("duckduckgo"),
  DEEPSCRAPE_DEFAULT_TIMEOUT_SECONDS: z.coerce.number().int().min(1).default(900),
  SCRAPER_STAGE_TIMEOUT_MS: z.coerce.number().int().positive().default(45000),
  SCRAPER_NAVIGATION_TIMEOUT_MS: z.coerce.number().int().positive().default(12000),
  SCRAPER_MAX_SCROLL_ROUNDS: z.coerce.number().int().min(1).default(8),
  SCRAPER_MAX_EMPTY_ROUNDS: z.coerce.number().int().min(1).default(3),
  FACEBOOK_DEFAULT_MAX_POSTS: z.coerce.number().int().min(1).default(30),
  FACEBOOK_MAX_SCROLL_ROUNDS: z.coerce.number().int().min(1).default(20),
  FACEBOOK_MAX_EMPTY_ROUNDS: z.coerce.number().int().min(1).default(5),
  SCRAPER_ACTION_DELAY_MIN_MS: z.coerce.number().default(600),
  SCRAPER_ACTION_DELAY_MAX_MS: z.coerce.number().default(1800),
});

export type Env = z.infer<typeof envSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid environment configuration: ${issues.join("; ")}`);
  }
  return parsed.data;
}

export const env: Env = loadEnv();
