import { z } from "zod";

const booleanFlag = z
  .enum(["true", "false"])
  .default("false")
  .transform((v) => v === "true");

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().min(1).max(65535).default(8787),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  CORS_ORIGIN: z.string().default("*"),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().min(1000).default(60000),
  RATE_LIMIT_MAX: z.coerce.number().int().min(1).default(120),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().min(500).default(15000),
  GRAPH_API_BASE_URL: z.string().url().default("https://graph.facebook.com"),
  GRAPH_API_VERSION: z.string().regex(/^v\d+\.\d+$/).default("v20.0"),
  PAGE_ID: z.string().default(""),
  ACCESS_TOKEN: z.string().default(""),
  USE_MOCK_DATA: booleanFlag,
  REELS_LIMIT: z.coerce.number().int().min(1).max(100).default(25),
  COMMENTS_LIMIT: z.coerce.number().int().min(1).max(500).default(100),
  REPLIES_LIMIT: z.coerce.number().int().min(1).max(500).default(100),
  MONITOR_INTERVAL_SECONDS: z.coerce.number().int().min(60).default(300),
  MONITOR_AUTOSTART: booleanFlag,
  METRICS_HISTORY_LIMIT: z.coerce.number().int().min(1).max(1000).default(200),
  RULES_PATH: z.string().default("data/rules.json"),
  STATE_PATH: z.string().default("data/monitor-state.json"),
  USE_REDIS: booleanFlag,
  REDIS_URL: z.string().default(""),
  REDIS_PREFIX: z.string().default("reel-reply"),
});

export type Env = z.infer<typeof envSchema>;

export const env: Env = envSchema.parse(process.env);
