import { z } from "zod";

const toInt = (def?: number) =>
  z.preprocess((v) => {
    if (v === undefined || v === null || v === "") return def;
    const n = typeof v === "number" ? v : Number(String(v).trim());
    return Number.isFinite(n) ? n : v;
  }, z.number().int());

const toOptionalInt = () =>
  z.preprocess((v) => {
    if (v === undefined || v === null || v === "") return undefined;
    const n = typeof v === "number" ? v : Number(String(v).trim());
    return Number.isFinite(n) ? n : v;
  }, z.number().int().optional());

const toFloat = (def?: number) =>
  z.preprocess((v) => {
    if (v === undefined || v === null || v === "") return def;
    const n = typeof v === "number" ? v : Number(String(v).trim());
    return Number.isFinite(n) ? n : v;
  }, z.number());

const toOptionalFloat = () =>
  z.preprocess((v) => {
    if (v === undefined || v === null || v === "") return undefined;
    const n = typeof v === "number" ? v : Number(String(v).trim());
    return Number.isFinite(n) ? n : v;
  }, z.number().optional());

const toBool = (def?: boolean) =>
  z.preprocess((v) => {
    if (v === undefined || v === null || v === "") return def;
    if (typeof v === "boolean") return v;
    const s = String(v).trim().toLowerCase();
    if (["true", "1", "yes", "y", "on"].includes(s)) return true;
    if (["false", "0", "no", "n", "off"].includes(s)) return false;
    return v;
  }, z.boolean());

const csv = (def: string[] = []) =>
  z.preprocess((v) => {
    if (v === undefined || v === null) return def;
    if (Array.isArray(v)) return v.map(String);
    const s = String(v).trim();
    if (!s) return def;
    return s.split(",").map((x) => x.trim()).filter(Boolean);
  }, z.array(z.string()));

/**
 * Rubric overrides are optional: when unset the selected preset's value wins.
 * Range checks that involve several keys (weights summing to 100, ordered ranges)
 * happen in `validateRubric`, which raises ConfigError.
 */
const envObject = z
  .object({
    NODE_ENV: z.enum(["development", "test", "production"]).default("production"),
    APP_NAME: z.string().trim().default("macd-volume-trader"),
    LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace"]).default("info"),

    PORT: toInt(3001).pipe(z.number().int().min(1).max(65535)),

    REDIS_URL: z.string().trim().optional(),
    REDIS_HOST: z.string().trim().default("localhost"),
    REDIS_PORT: toInt(6379).pipe(z.number().int().min(1).max(65535)),
    REDIS_PASSWORD: z.string().optional().default(""),

    QUEUE_SIGNALS_NAME: z.string().trim().default("signals"),
    QUEUE_CONCURRENCY: toInt(5).pipe(z.number().int().min(1).max(200)),
    SIGNALS_JOB_ATTEMPTS: toInt(5).pipe(z.number().int().min(1).max(50)),
    SIGNALS_JOB_BACKOFF_DELAY_MS: toInt(3000).pipe(z.number().int().min(0).max(60_000)),
    TRADE_RECORDS_KEY_PREFIX: z.string().trim().default("trades"),

    LIVE_TRADING_ENABLED: toBool(true).default(true),
    INSTRUMENTS: csv(["BTCUSDT"]).default(["BTCUSDT"]),
    CANDLE_INTERVAL: z.string().trim().default("1h"),
    POLL_INTERVAL_SECONDS: toInt(60).pipe(z.number().int().min(1).max(24 * 3600)),
    FETCH_TIMEOUT_MS: toInt(10000).pipe(z.number().int().min(100).max(120_000)),
    MAX_CONSECUTIVE_FAILURES: toInt(5).pipe(z.number().int().min(1).max(1000)),
    MAX_BACKOFF_SECONDS: toInt(600).pipe(z.number().int().min(1).max(24 * 3600)),
    WINDOW_MARGIN: toInt(50).pipe(z.number().int().min(0).max(5000)),
    CATCH_UP_LIMIT: toInt(5).pipe(z.number().int().min(1).max(1000)),
    SINK_TIMEOUT_MS: toInt(5000).pipe(z.number().int().min(100).max(120_000)),

    MARKET_DATA_PROVIDER: z.enum(["binance", "max"]).default("binance"),
    MARKET_DATA_REST_TIMEOUT_MS: toInt(10000).pipe(z.number().int().min(1000).max(120_000)),
    MARKET_DATA_RETRY_ATTEMPTS: toInt(3).pipe(z.number().int().min(1).max(10)),
    MARKET_DATA_RETRY_BASE_DELAY_MS: toInt(500).pipe(z.number().int().min(0).max(60_000)),
    BINANCE_REST_URL: z.string().trim().optional(),
    MAX_REST_URL: z.string().trim().optional(),

    RUBRIC_PRESET: z.string().trim().default("final-85"),
    OUT_OF_STATE_POLICY: z.enum(["ignore", "report"]).default("ignore"),
    CONFIDENCE_THRESHOLD: toOptionalFloat(),
    TRADE_QUANTITY: toOptionalFloat(),
    FEE_RATE: toOptionalFloat(),
    ADVISORY_MAX_ADJUSTMENT: toOptionalFloat(),
    TREND_BONUS: toOptionalFloat(),
    WEIGHT_VOLUME: toOptionalFloat(),
    WEIGHT_VOLUME_TREND: toOptionalFloat(),
    WEIGHT_RSI: toOptionalFloat(),
    WEIGHT_BOLLINGER: toOptionalFloat(),
    WEIGHT_OBV: toOptionalFloat(),

    MACD_FAST_PERIOD: toOptionalInt(),
    MACD_SLOW_PERIOD: toOptionalInt(),
    MACD_SIGNAL_PERIOD: toOptionalInt(),
    RSI_PERIOD: toOptionalInt(),
    BOLLINGER_PERIOD: toOptionalInt(),
    BOLLINGER_STDDEV: toOptionalFloat(),
    VOLUME_PERIOD: toOptionalInt(),
    VOLUME_TREND_LOOKBACK: toOptionalInt(),
    OBV_TREND_LOOKBACK: toOptionalInt(),
    MA_FAST_PERIOD: toOptionalInt(),
    MA_SLOW_PERIOD: toOptionalInt(),

    BACKTEST_REPORT_DECIMALS: toInt(2).pipe(z.number().int().min(0).max(10)),
    BACKTEST_ABORT_ON_DATA_ERROR: toBool(false).default(false),
  })
  .passthrough();

export const envSchema = envObject;

export const envSchemaWithRefinements = envObject.superRefine((env, ctx) => {
  if (env.LIVE_TRADING_ENABLED && env.INSTRUMENTS.length === 0) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["INSTRUMENTS"],
      message: "INSTRUMENTS must list at least one instrument when LIVE_TRADING_ENABLED=true",
    });
  }

  if (env.MAX_BACKOFF_SECONDS < env.POLL_INTERVAL_SECONDS) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["MAX_BACKOFF_SECONDS"],
      message: "MAX_BACKOFF_SECONDS must be >= POLL_INTERVAL_SECONDS",
    });
  }
});

export const EnvSchema = envSchemaWithRefinements;
export type Env = z.infer<typeof envSchemaWithRefinements>;
