import { readFileSync } from "node:fs";
import { z } from "zod";
import { ConfigError, errorMessage } from "@perp/futures-core";
import {
  DEFAULT_RETRY_SETTINGS,
  OKX_DEFAULT_PUBLIC_WS_URL,
  OKX_DEFAULT_REST_BASE_URL,
  OKX_SIMULATED_PUBLIC_WS_URL,
  type OkxCredentials
} from "@perp/futures-exchange";

const positive = z.number().positive();
const positiveInt = (max = Number.MAX_SAFE_INTEGER) => z.number().int().min(1).max(max);
const fraction = z.number().gt(0).lt(1);
const ratio = z.number().min(0).max(1);

const symbolSchema = z
  .object({
    symbol: z.string().trim().min(1),
    basePositionSize: positive,
    maxPositionSize: positive,
    maxLeverage: positiveInt(125),
    /** Base-asset amount per contract. */
    contractValue: positive.default(1),
    lotSize: z.number().min(0).default(0)
  })
  .refine((value) => value.basePositionSize <= value.maxPositionSize, {
    message: "basePositionSize must not exceed maxPositionSize",
    path: ["basePositionSize"]
  });

const periodsSchema = z
  .object({
    shortPeriod: positiveInt(500),
    longPeriod: positiveInt(1000)
  })
  .refine((value) => value.shortPeriod < value.longPeriod, {
    message: "shortPeriod must be smaller than longPeriod",
    path: ["shortPeriod"]
  });

const trendSchema = z.object({
  variant: z.literal("trend"),
  shortPeriod: positiveInt(500).default(5),
  longPeriod: positiveInt(1000).default(20),
  rsiPeriod: positiveInt(200).default(14),
  timeFilter: z.boolean().default(true)
});

const weightSchema = z.number().min(0).max(100);

// Weights and thresholds have no defaults: they must be chosen per market.
const weightedSchema = z.object({
  variant: z.literal("weighted"),
  weights: z.object({
    macd: weightSchema,
    kdj: weightSchema,
    rsi: weightSchema,
    bollinger: weightSchema,
    trend: weightSchema
  }),
  thresholds: z.object({
    rsiOverbought: z.number().min(0).max(100),
    rsiOversold: z.number().min(0).max(100),
    kdjOverbought: z.number(),
    kdjOversold: z.number()
  }),
  periods: z
    .object({
      macdFast: positiveInt(200).default(12),
      macdSlow: positiveInt(400).default(26),
      macdSignal: positiveInt(100).default(9),
      kdjPeriod: positiveInt(200).default(9),
      kdjSignal: positiveInt(50).default(3),
      rsiPeriod: positiveInt(200).default(14),
      bollingerPeriod: positiveInt(400).default(20),
      bollingerStdDev: positive.default(2),
      smaShort: positiveInt(500).default(5),
      smaLong: positiveInt(1000).default(20)
    })
    .default({})
});

const gridSchema = z.object({
  variant: z.literal("grid"),
  lower: positive,
  upper: positive,
  levels: z.number().int().min(2).max(500),
  spacing: z.enum(["arithmetic", "geometric"]).default("arithmetic")
});

const directionalSchema = z.object({
  variant: z.literal("directional"),
  shortPeriod: positiveInt(500).default(5),
  longPeriod: positiveInt(1000).default(20)
});

const strategySchema = z
  .discriminatedUnion("variant", [trendSchema, weightedSchema, gridSchema, directionalSchema])
  .superRefine((value, ctx) => {
    if (value.variant === "grid" && value.lower >= value.upper) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "lower must be below upper", path: ["lower"] });
    }
    if (value.variant === "weighted" && value.thresholds.rsiOversold >= value.thresholds.rsiOverbought) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "rsiOversold must be below rsiOverbought", path: ["thresholds"] });
    }
    if ((value.variant === "trend" || value.variant === "directional") && !periodsSchema.safeParse(value).success) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "shortPeriod must be smaller than longPeriod", path: ["shortPeriod"] });
    }
  });

export const botConfigSchema = z
  .object({
    exchange: z
      .object({
        name: z.literal("okx").default("okx"),
        restBaseUrl: z.string().url().default(OKX_DEFAULT_REST_BASE_URL),
        publicWsUrl: z.string().url().optional(),
        simulated: z.boolean().default(false),
        timeoutMs: positiveInt(120_000).default(10_000),
        quoteCurrency: z.string().default("USDT")
      })
      .default({}),
    trading: z.object({
      symbols: z.array(symbolSchema).min(1),
      leverage: positiveInt(125),
      marginMode: z.enum(["isolated", "cross"]).default("isolated"),
      minSignalStrength: z.number().min(0).max(100).default(60),
      windowSize: positiveInt(10_000).default(200),
      evaluationIntervalMs: z.number().int().min(0).default(5_000),
      strategy: strategySchema
    }),
    exits: z
      .object({
        stopLoss: fraction.default(0.05),
        takeProfit: positive.default(0.1),
        trailingEnabled: z.boolean().default(true),
        trailingTrigger: positive.default(0.02),
        trailingDistance: fraction.default(0.01),
        volatilityAdapt: z.boolean().default(false)
      })
      .default({}),
    risk: z
      .object({
        maxOpenPositions: positiveInt(3).default(3),
        maxHourlyTrades: positiveInt(1_000).default(10),
        maxConsecutiveLosses: positiveInt(100).default(5),
        cooldownMs: z.number().int().min(0).default(60 * 60 * 1000),
        maxDailyLoss: positive.default(500),
        maxDrawdown: fraction.default(0.2),
        winRateWindow: positiveInt(1_000).default(20),
        minTradesForWinRate: positiveInt(1_000).default(5),
        winRateThreshold: ratio.default(0.5),
        highWinRateThreshold: ratio.default(0.6),
        winStreakForIncrease: positiveInt(100).default(3),
        increaseFactor: z.number().min(1).max(5).default(1.2),
        decreaseFactor: z.number().gt(0).max(1).default(0.5)
      })
      .default({}),
    gateway: z
      .object({
        rateLimitPerSecond: positiveInt(1_000).default(10),
        maxAttempts: positiveInt(20).default(DEFAULT_RETRY_SETTINGS.maxAttempts),
        baseDelayMs: z.number().int().min(0).default(DEFAULT_RETRY_SETTINGS.baseDelayMs),
        maxDelayMs: z.number().int().min(0).default(DEFAULT_RETRY_SETTINGS.maxDelayMs),
        jitterRatio: ratio.default(DEFAULT_RETRY_SETTINGS.jitterRatio),
        attemptTimeoutMs: positiveInt(120_000).default(10_000),
        fillPollIntervalMs: positiveInt(60_000).default(250)
      })
      .default({}),
    feed: z
      .object({
        pingIntervalMs: z.number().int().min(0).default(25_000),
        staleAfterMs: z.number().int().min(0).default(60_000),
        reconnectBaseDelayMs: z.number().int().min(0).default(500),
        reconnectMaxDelayMs: z.number().int().min(0).default(30_000)
      })
      .default({}),
    runtime: z
      .object({
        shutdownTimeoutMs: positiveInt(600_000).default(15_000),
        balanceSyncMs: z.number().int().min(0).default(60_000),
        healthPort: z.number().int().min(1).max(65_535).optional(),
        paperBalance: positive.default(10_000)
      })
      .default({})
  })
  .superRefine((value, ctx) => {
    const seen = new Set<string>();
    value.trading.symbols.forEach((entry, index) => {
      if (seen.has(entry.symbol)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate symbol ${entry.symbol}`,
          path: ["trading", "symbols", index, "symbol"]
        });
      }
      seen.add(entry.symbol);

      if (value.trading.leverage > entry.maxLeverage) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `leverage ${value.trading.leverage} above maxLeverage ${entry.maxLeverage} for ${entry.symbol}`,
          path: ["trading", "leverage"]
        });
      }
    });

    if (value.risk.winRateThreshold > value.risk.highWinRateThreshold) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "winRateThreshold must not exceed highWinRateThreshold",
        path: ["risk", "winRateThreshold"]
      });
    }

    if (value.gateway.baseDelayMs > value.gateway.maxDelayMs) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "baseDelayMs must not exceed maxDelayMs",
        path: ["gateway", "baseDelayMs"]
      });
    }
  });

export type BotSettings = z.infer<typeof botConfigSchema>;

export type BotConfig = Readonly<
  BotSettings & {
    credentials: OkxCredentials | null;
    publicWsUrl: string;
  }
>;

export type Env = Readonly<Record<string, string | undefined>>;

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

function isTruthy(raw: string | undefined): boolean {
  const normalized = (raw ?? "").trim().toLowerCase();
  return normalized === "1" || normalized === "true" || normalized === "yes" || normalized === "on";
}

export function credentialsFromEnv(env: Env): OkxCredentials | null {
  const apiKey = env.OKX_API_KEY?.trim();
  const secretKey = env.OKX_SECRET_KEY?.trim();
  const passphrase = env.OKX_PASSPHRASE?.trim();
  if (!apiKey || !secretKey || !passphrase) return null;
  return { apiKey, secretKey, passphrase };
}

/** Validates raw JSON plus environment into an immutable config. Throws ConfigError. */
export function parseConfig(raw: unknown, env: Env = process.env): BotConfig {
  const parsed = botConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => {
      const path = issue.path.join(".");
      return path ? `${path}: ${issue.message}` : issue.message;
    });
    throw new ConfigError("Invalid configuration", issues);
  }

  const settings = parsed.data;
  const simulated = settings.exchange.simulated || isTruthy(env.OKX_SIMULATED);
  return deepFreeze({
    ...settings,
    exchange: { ...settings.exchange, simulated },
    credentials: credentialsFromEnv(env),
    publicWsUrl: settings.exchange.publicWsUrl ?? (simulated ? OKX_SIMULATED_PUBLIC_WS_URL : OKX_DEFAULT_PUBLIC_WS_URL)
  });
}

export function loadConfig(path: string, env: Env = process.env): BotConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (error) {
    throw new ConfigError(`Cannot read config ${path}`, [errorMessage(error)]);
  }
  return parseConfig(raw, env);
}

export function requireCredentials(config: BotConfig): OkxCredentials {
  if (!config.credentials) {
    throw new ConfigError("Missing exchange credentials", [
      "set OKX_API_KEY, OKX_SECRET_KEY and OKX_PASSPHRASE"
    ]);
  }
  return config.credentials;
}
