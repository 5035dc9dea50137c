import {
  errorMessage,
  silentLogger,
  type FeedHealth,
  type FuturesSymbol,
  type Logger,
  type Position,
  type TradeRecord
} from "@perp/futures-core";
import type { MarketDataFeed, OrderGateway } from "@perp/futures-exchange";
import type { RiskManager, RiskState } from "@perp/risk";
import type { SignalStrategy } from "@perp/strategies";
import { ExecutionEngine, type EngineSettings, type EngineStatus } from "./engine.js";
import { PositionTracker } from "./position-tracker.js";

export type SupervisorOptions = {
  markets: EngineSettings[];
  strategy: SignalStrategy;
  risk: RiskManager;
  gateway: OrderGateway;
  feed: MarketDataFeed;
  /** Balance sync period; 0 syncs once at start only. */
  balanceSyncMs: number;
  tradeLogLimit?: number;
  now?: () => number;
  logger?: Logger;
};

export type SupervisorStatus = {
  running: boolean;
  feed: FeedHealth;
  risk: RiskState;
  positions: Position[];
  unrealizedPnl: number;
  engines: EngineStatus[];
  trades: TradeRecord[];
  lastBalanceSyncAt: number | null;
};

export class TradingSupervisor {
  readonly tracker: PositionTracker;
  private readonly engines: ExecutionEngine[];
  private readonly trades: TradeRecord[] = [];
  private readonly tradeLogLimit: number;
  private readonly now: () => number;
  private readonly logger: Logger;

  private running = false;
  private balanceTimer: ReturnType<typeof setInterval> | null = null;
  private syncing = false;
  private lastBalanceSyncAt: number | null = null;
  private unsubscribeHealth: (() => void) | null = null;

  constructor(private readonly options: SupervisorOptions) {
    this.now = options.now ?? Date.now;
    this.logger = (options.logger ?? silentLogger).child("supervisor");
    this.tradeLogLimit = options.tradeLogLimit ?? 200;

    const contractValues = new Map(options.markets.map((market) => [market.symbol, market.contractValue]));
    this.tracker = new PositionTracker((symbol) => contractValues.get(symbol) ?? 1);

    this.engines = options.markets.map(
      (settings) =>
        new ExecutionEngine(settings, {
          strategy: options.strategy,
          risk: options.risk,
          gateway: options.gateway,
          feed: options.feed,
          tracker: this.tracker,
          onTrade: (record) => this.recordTrade(record),
          now: this.now,
          logger: options.logger
        })
    );
  }

  engine(symbol: FuturesSymbol): ExecutionEngine | null {
    return this.engines.find((engine) => engine.symbol === symbol) ?? null;
  }

  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;

    this.unsubscribeHealth = this.options.feed.onHealth((health) => {
      const level = health === "connected" ? "info" : "warn";
      this.logger[level]("feed health changed", { health });
    });

    await Promise.all(this.engines.map((engine) => engine.start()));
    await this.syncBalance();
    await this.options.feed.connect();

    if (this.options.balanceSyncMs > 0) {
      this.balanceTimer = setInterval(() => {
        void this.syncBalance();
      }, this.options.balanceSyncMs);
    }

    this.logger.info("supervisor started", { symbols: this.engines.map((engine) => engine.symbol) });
  }

  /** Pulls account equity into the risk manager. Failures are logged and retried on the next period. */
  async syncBalance(): Promise<void> {
    if (this.syncing) return;
    this.syncing = true;
    try {
      const account = await this.options.gateway.queryBalance();
      this.options.risk.updateEquity(account.equity, this.now());
      this.lastBalanceSyncAt = this.now();
      this.logger.debug("balance synced", { equity: account.equity, available: account.available });
    } catch (error) {
      this.logger.warn("balance sync failed", { error: errorMessage(error) });
    } finally {
      this.syncing = false;
    }
  }

  status(): SupervisorStatus {
    const engines = this.engines.map((engine) => engine.status());
    const prices: Record<FuturesSymbol, number> = {};
    for (const engine of engines) {
      if (engine.lastPrice !== null) prices[engine.symbol] = engine.lastPrice;
    }

    return {
      running: this.running,
      feed: this.options.feed.health,
      risk: this.options.risk.snapshot(),
      positions: this.tracker.list(),
      unrealizedPnl: this.tracker.unrealizedPnl(prices),
      engines,
      trades: [...this.trades],
      lastBalanceSyncAt: this.lastBalanceSyncAt
    };
  }

  recentTrades(): TradeRecord[] {
    return [...this.trades];
  }

  async forceEmergencyStop(reason: string): Promise<void> {
    this.options.risk.forceEmergencyStop(reason);
    await this.activateAll();
  }

  async clearCooldown(): Promise<void> {
    this.options.risk.clearCooldown();
    await this.activateAll();
  }

  async resetEmergencyStop(): Promise<void> {
    this.options.risk.resetEmergencyStop();
    await this.activateAll();
  }

  /** Engines shut down in parallel, then the feed closes. */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    if (this.balanceTimer) {
      clearInterval(this.balanceTimer);
      this.balanceTimer = null;
    }

    const results = await Promise.allSettled(this.engines.map((engine) => engine.stop()));
    results.forEach((result, index) => {
      if (result.status === "rejected") {
        this.logger.error("engine stop failed", {
          symbol: this.engines[index]?.symbol,
          error: errorMessage(result.reason)
        });
      }
    });

    this.unsubscribeHealth?.();
    this.unsubscribeHealth = null;
    await this.options.feed.close();
    this.logger.info("supervisor stopped", { openPositions: this.tracker.openCount });
  }

  private async activateAll() {
    await Promise.all(this.engines.map((engine) => engine.trigger()));
  }

  private recordTrade(record: TradeRecord) {
    this.trades.push(record);
    if (this.trades.length > this.tradeLogLimit) {
      this.trades.splice(0, this.trades.length - this.tradeLogLimit);
    }
  }
}
