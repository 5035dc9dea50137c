import type { Server } from "node:http";
import { parseArgs } from "node:util";
import { z } from "zod";
import { ConfigError, errorMessage, type Logger } from "@perp/futures-core";
import { TradingSupervisor, type EngineSettings } from "@perp/futures-engine";
import {
  ManagedOrderGateway,
  OkxTransport,
  PaperTransport,
  RetryPolicy,
  createOkxTickerFeed,
  type OrderTransport
} from "@perp/futures-exchange";
import { RiskManager, type SymbolLimits } from "@perp/risk";
import { createStrategy } from "@perp/strategies";
import { requireCredentials, type BotConfig, type Env } from "./config.js";
import { startOperatorServer } from "./health.js";

export const runModeSchema = z.enum(["test", "live", "paper"]);
export type RunMode = z.infer<typeof runModeSchema>;

export type CliOptions = {
  mode: RunMode;
  configPath: string;
};

export const DEFAULT_CONFIG_PATH = "config/perp.config.json";

export function parseCli(argv: string[], env: Env = process.env): CliOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      mode: { type: "string", short: "m" },
      config: { type: "string", short: "c" }
    },
    strict: true,
    allowPositionals: false
  });

  const mode = runModeSchema.safeParse(values.mode ?? "test");
  if (!mode.success) {
    throw new ConfigError(`Unknown mode ${values.mode ?? ""}`, ["expected test, live or paper"]);
  }

  return {
    mode: mode.data,
    configPath: values.config ?? env.PERP_CONFIG ?? DEFAULT_CONFIG_PATH
  };
}

export function toEngineSettings(config: BotConfig): EngineSettings[] {
  return config.trading.symbols.map((entry) => ({
    symbol: entry.symbol,
    leverage: config.trading.leverage,
    marginMode: config.trading.marginMode,
    minSignalStrength: config.trading.minSignalStrength,
    windowSize: config.trading.windowSize,
    evaluationIntervalMs: config.trading.evaluationIntervalMs,
    contractValue: entry.contractValue,
    lotSize: entry.lotSize,
    shutdownTimeoutMs: config.runtime.shutdownTimeoutMs,
    exits: { ...config.exits }
  }));
}

export function symbolLimits(config: BotConfig): Record<string, SymbolLimits> {
  const limits: Record<string, SymbolLimits> = {};
  for (const entry of config.trading.symbols) {
    limits[entry.symbol] = {
      basePositionSize: entry.basePositionSize,
      maxPositionSize: entry.maxPositionSize,
      contractValue: entry.contractValue
    };
  }
  return limits;
}

export function createGateway(config: BotConfig, transport: OrderTransport, logger: Logger): ManagedOrderGateway {
  const { gateway } = config;
  return new ManagedOrderGateway(transport, {
    retry: new RetryPolicy({
      maxAttempts: gateway.maxAttempts,
      baseDelayMs: gateway.baseDelayMs,
      maxDelayMs: gateway.maxDelayMs,
      jitterRatio: gateway.jitterRatio
    }),
    rateLimitPerSecond: gateway.rateLimitPerSecond,
    attemptTimeoutMs: gateway.attemptTimeoutMs,
    fillPollIntervalMs: gateway.fillPollIntervalMs,
    marginMode: config.trading.marginMode,
    logger
  });
}

export function createOkxTransport(config: BotConfig, logger: Logger): OkxTransport {
  const restLogger = logger.child("okx");
  return new OkxTransport(
    {
      credentials: config.credentials ?? undefined,
      restBaseUrl: config.exchange.restBaseUrl,
      simulated: config.exchange.simulated,
      timeoutMs: config.exchange.timeoutMs,
      log: (entry) => {
        if (entry.ok) restLogger.debug("okx request", entry);
        else restLogger.warn("okx request failed", entry);
      }
    },
    { marginMode: config.trading.marginMode, quoteCurrency: config.exchange.quoteCurrency }
  );
}

/** `--mode test`: public ticker per symbol, plus the balance when credentials are present. */
export async function runConnectivityTest(config: BotConfig, logger: Logger): Promise<void> {
  const transport = createOkxTransport(config, logger);

  for (const entry of config.trading.symbols) {
    const ticker = await transport.getTicker(entry.symbol);
    logger.info("ticker", { symbol: ticker.symbol, price: ticker.price, ts: ticker.ts });
  }

  if (!config.credentials) {
    logger.warn("no credentials configured, balance check skipped");
    return;
  }

  const balance = await createGateway(config, transport, logger).queryBalance();
  logger.info("balance", { equity: balance.equity, available: balance.available, simulated: config.exchange.simulated });
}

export type TradingRuntime = {
  supervisor: TradingSupervisor;
  stop(): Promise<void>;
};

/** Starts the operator server; when it cannot bind, the already running supervisor is stopped again. */
export async function serveOperator(
  supervisor: TradingSupervisor,
  options: { port: number; host?: string; logger: Logger }
): Promise<Server> {
  try {
    return await startOperatorServer(supervisor, options);
  } catch (error) {
    options.logger.error("operator server failed to start", { port: options.port, error: errorMessage(error) });
    await supervisor.stop();
    throw error;
  }
}

export async function startTrading(
  config: BotConfig,
  mode: Exclude<RunMode, "test">,
  logger: Logger
): Promise<TradingRuntime> {
  const feed = createOkxTickerFeed({
    url: config.publicWsUrl,
    reconnect: new RetryPolicy({
      baseDelayMs: config.feed.reconnectBaseDelayMs,
      maxDelayMs: config.feed.reconnectMaxDelayMs,
      jitterRatio: config.gateway.jitterRatio
    }),
    pingIntervalMs: config.feed.pingIntervalMs,
    staleAfterMs: config.feed.staleAfterMs,
    logger
  });

  let transport: OrderTransport;
  if (mode === "paper") {
    const contractValues: Record<string, number> = {};
    for (const entry of config.trading.symbols) contractValues[entry.symbol] = entry.contractValue;
    const paper = new PaperTransport({
      initialBalance: config.runtime.paperBalance,
      leverage: config.trading.leverage,
      contractValues
    });
    for (const entry of config.trading.symbols) {
      feed.subscribe(entry.symbol, "ticker", (tick) => paper.observe(tick));
    }
    transport = paper;
  } else {
    requireCredentials(config);
    transport = createOkxTransport(config, logger);
  }

  const gateway = createGateway(config, transport, logger);
  const account = await gateway.queryBalance();

  const risk = new RiskManager(
    { ...config.risk },
    {
      symbols: symbolLimits(config),
      leverage: config.trading.leverage,
      initialEquity: account.equity,
      logger: logger.child("risk")
    }
  );

  const supervisor = new TradingSupervisor({
    markets: toEngineSettings(config),
    strategy: createStrategy(config.trading.strategy),
    risk,
    gateway,
    feed,
    balanceSyncMs: config.runtime.balanceSyncMs,
    logger
  });

  logger.info("starting", {
    mode,
    symbols: config.trading.symbols.map((entry) => entry.symbol),
    strategy: config.trading.strategy.variant,
    leverage: config.trading.leverage,
    equity: account.equity,
    simulated: config.exchange.simulated
  });
  await supervisor.start();

  let server: Server | null = null;
  if (config.runtime.healthPort !== undefined) {
    server = await serveOperator(supervisor, { port: config.runtime.healthPort, logger });
  }

  return {
    supervisor,
    async stop() {
      await supervisor.stop();
      if (server) {
        const closing = server;
        await new Promise<void>((resolve, reject) => {
          closing.close((error) => (error ? reject(error) : resolve()));
        });
      }
      const status = supervisor.status();
      logger.info("stopped", {
        openPositions: status.positions.length,
        trades: status.trades.length,
        dailyPnl: status.risk.dailyPnl,
        riskMode: status.risk.mode
      });
    }
  };
}

export function describeFailure(error: unknown): { msg: string; meta: Record<string, unknown> } {
  if (error instanceof ConfigError) {
    return { msg: "invalid configuration", meta: { error: error.message, issues: error.issues } };
  }
  return { msg: "runner crashed", meta: { error: errorMessage(error) } };
}
