import { errorMessage, silentLogger, type FeedHealth, type FuturesSymbol, type Logger, type Tick } from "@perp/futures-core";
import type { FeedChannel, HealthHandler, MarketDataFeed, TickHandler } from "../futures-exchange.interface.js";

/** Feed driven from inside the process. Ticks and health changes are pushed by the owner. */
export class PaperFeed implements MarketDataFeed {
  private current: FeedHealth = "disconnected";
  private readonly handlers = new Map<string, Set<TickHandler>>();
  private readonly healthHandlers = new Set<HealthHandler>();
  private readonly logger: Logger;

  constructor(logger: Logger = silentLogger) {
    this.logger = logger.child("paper-feed");
  }

  get health(): FeedHealth {
    return this.current;
  }

  subscribe(symbol: FuturesSymbol, channel: FeedChannel, handler: TickHandler): () => void {
    const key = `${channel}:${symbol}`;
    const set = this.handlers.get(key) ?? new Set<TickHandler>();
    set.add(handler);
    this.handlers.set(key, set);
    return () => {
      set.delete(handler);
      if (set.size === 0) this.handlers.delete(key);
    };
  }

  onHealth(handler: HealthHandler): () => void {
    this.healthHandlers.add(handler);
    return () => {
      this.healthHandlers.delete(handler);
    };
  }

  async connect(): Promise<void> {
    this.setHealth("connected");
  }

  async close(): Promise<void> {
    this.setHealth("disconnected");
  }

  subscriberCount(symbol: FuturesSymbol, channel: FeedChannel = "ticker"): number {
    return this.handlers.get(`${channel}:${symbol}`)?.size ?? 0;
  }

  push(tick: Tick, channel: FeedChannel = "ticker") {
    const set = this.handlers.get(`${channel}:${tick.symbol}`);
    if (!set) return;
    for (const handler of [...set]) {
      try {
        handler(tick);
      } catch (error) {
        this.logger.error("tick handler failed", { symbol: tick.symbol, error: errorMessage(error) });
      }
    }
  }

  setHealth(health: FeedHealth) {
    if (health === this.current) return;
    this.current = health;
    for (const handler of [...this.healthHandlers]) handler(health);
  }
}
