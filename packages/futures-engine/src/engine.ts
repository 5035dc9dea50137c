import {
  entrySide,
  errorMessage,
  exitSide,
  realizedPnl,
  roundQtyToStep,
  silentLogger,
  type ExitReason,
  type FeedHealth,
  type FuturesSymbol,
  type Logger,
  type MarginMode,
  type Order,
  type Position,
  type PositionSide,
  type Tick,
  type TradeRecord
} from "@perp/futures-core";
import {
  createOrder,
  type MarketDataFeed,
  type OrderFill,
  type OrderGateway,
  type OrderResult
} from "@perp/futures-exchange";
import type { RiskManager } from "@perp/risk";
import type { SignalStrategy } from "@perp/strategies";
import { adoptExchangePosition, exitTrigger, openPosition, updateTrailing, type ExitSettings } from "./exits.js";
import type { PositionClaim, PositionTracker } from "./position-tracker.js";

export type EngineSettings = {
  symbol: FuturesSymbol;
  leverage: number;
  marginMode: MarginMode;
  minSignalStrength: number;
  /** Ticks kept for the strategy window. */
  windowSize: number;
  /** Timer-driven activations; 0 disables the timer. */
  evaluationIntervalMs: number;
  contractValue: number;
  /** Exchange lot size; sizes are rounded down to it. 0 keeps the raw size. */
  lotSize: number;
  shutdownTimeoutMs: number;
  exits: ExitSettings;
};

export type EnginePhase = "idle" | "running" | "stopping" | "stopped";

export type ExecutionEngineDeps = {
  strategy: SignalStrategy;
  risk: RiskManager;
  gateway: OrderGateway;
  feed: MarketDataFeed;
  tracker: PositionTracker;
  onTrade?: (record: TradeRecord) => void;
  now?: () => number;
  logger?: Logger;
};

export type EngineStatus = {
  symbol: FuturesSymbol;
  phase: EnginePhase;
  feed: FeedHealth;
  lastPrice: number | null;
  lastTickAt: number | null;
  position: Position | null;
  activations: number;
  lastError: string | null;
};

/** An order the gateway could not settle; the engine asks again before doing anything else. */
type PendingOrder =
  | { intent: "entry"; order: Order; side: PositionSide; size: number }
  | { intent: "exit"; order: Order; reason: ExitReason };

type PartialClose = { size: number; notional: number; pnl: number };

function missedDetail(result: Exclude<OrderResult, { kind: "filled" }>): string {
  return result.kind === "exhausted" ? result.lastError : result.reason;
}

class ShutdownTimeoutError extends Error {
  constructor(symbol: FuturesSymbol, ms: number) {
    super(`${symbol} shutdown did not finish within ${ms}ms`);
    this.name = "ShutdownTimeoutError";
  }
}

/**
 * Per-symbol orchestration loop. Activations come from ticks and from the
 * evaluation timer and never overlap: a trigger that lands while one runs
 * schedules exactly one follow-up.
 */
export class ExecutionEngine {
  readonly symbol: FuturesSymbol;
  private phase: EnginePhase = "idle";
  private feedHealth: FeedHealth = "disconnected";
  private ticks: Tick[] = [];
  private lastPrice: number | null = null;
  private lastTickAt: number | null = null;
  private activations = 0;
  private lastError: string | null = null;

  private running: Promise<void> | null = null;
  private stopping: Promise<void> | null = null;
  private rerun = false;
  private pending: PendingOrder | null = null;
  private partialClose: PartialClose | null = null;
  private claim: PositionClaim | null = null;
  private timer: ReturnType<typeof setInterval> | null = null;
  private unsubscribers: Array<() => void> = [];

  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(
    private readonly settings: EngineSettings,
    private readonly deps: ExecutionEngineDeps
  ) {
    this.symbol = settings.symbol;
    this.now = deps.now ?? Date.now;
    this.logger = (deps.logger ?? silentLogger).child(`engine.${settings.symbol}`);
  }

  get currentPhase(): EnginePhase {
    return this.phase;
  }

  status(): EngineStatus {
    return {
      symbol: this.symbol,
      phase: this.phase,
      feed: this.feedHealth,
      lastPrice: this.lastPrice,
      lastTickAt: this.lastTickAt,
      position: this.deps.tracker.get(this.symbol),
      activations: this.activations,
      lastError: this.lastError
    };
  }

  /** Claims the symbol, applies leverage, adopts any exchange position, then listens to the feed. */
  async start(): Promise<void> {
    if (this.phase !== "idle") return;
    this.claim = this.deps.tracker.claim(this.symbol);

    try {
      if (this.deps.gateway.configureLeverage) {
        await this.deps.gateway.configureLeverage(this.symbol, this.settings.leverage, this.settings.marginMode);
      }
      await this.reconcile();
    } catch (error) {
      this.deps.tracker.release(this.claim);
      this.claim = null;
      throw error;
    }

    this.feedHealth = this.deps.feed.health;
    this.unsubscribers.push(
      this.deps.feed.subscribe(this.symbol, "ticker", (tick) => this.onTick(tick)),
      this.deps.feed.onHealth((health) => this.onFeedHealth(health))
    );

    if (this.settings.evaluationIntervalMs > 0) {
      this.timer = setInterval(() => {
        void this.trigger();
      }, this.settings.evaluationIntervalMs);
    }

    this.phase = "running";
    this.logger.info("engine started", { leverage: this.settings.leverage, marginMode: this.settings.marginMode });
  }

  /**
   * Ordered shutdown: stop entries, cancel open orders, wait for the current
   * activation, close the position unless the emergency stop forbids it,
   * then leave the feed. Everything before leaving the feed shares one
   * `shutdownTimeoutMs` deadline. Later calls get the same promise.
   */
  stop(): Promise<void> {
    if (!this.stopping) this.stopping = this.shutdown();
    return this.stopping;
  }

  private async shutdown(): Promise<void> {
    const wasRunning = this.phase === "running";
    this.phase = "stopping";
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }

    if (wasRunning) {
      try {
        await this.withDeadline(this.unwind());
      } catch (error) {
        this.lastError = errorMessage(error);
        this.logger.error("shutdown incomplete", { error: this.lastError });
      }
    }

    for (const unsubscribe of this.unsubscribers) unsubscribe();
    this.unsubscribers = [];
    if (this.claim) {
      this.deps.tracker.release(this.claim);
      this.claim = null;
    }
    this.phase = "stopped";
    this.logger.info("engine stopped");
  }

  /** Runs an activation now, or schedules one follow-up if one is in progress. */
  trigger(): Promise<void> {
    if (this.running) {
      this.rerun = true;
      return this.running;
    }

    this.running = this.drain().finally(() => {
      this.running = null;
    });
    return this.running;
  }

  /** Resolves once the current activation and its follow-up, if any, are done. */
  whenIdle(): Promise<void> {
    return this.running ?? Promise.resolve();
  }

  private async drain(): Promise<void> {
    do {
      this.rerun = false;
      await this.safeActivate();
    } while (this.rerun && this.phase === "running");
  }

  private async safeActivate(): Promise<void> {
    this.activations += 1;
    try {
      await this.activate();
    } catch (error) {
      this.lastError = errorMessage(error);
      this.logger.error("activation failed", { symbol: this.symbol, error: this.lastError });
    }
  }

  private onTick(tick: Tick) {
    if (tick.symbol !== this.symbol || !Number.isFinite(tick.price) || tick.price <= 0) return;
    this.ticks.push(tick);
    if (this.ticks.length > this.settings.windowSize) {
      this.ticks = this.ticks.slice(-this.settings.windowSize);
    }
    this.lastPrice = tick.price;
    this.lastTickAt = tick.ts;
    void this.trigger();
  }

  private onFeedHealth(health: FeedHealth) {
    if (health === this.feedHealth) return;
    this.feedHealth = health;
    if (health === "disconnected") {
      this.logger.warn("feed disconnected, entries suspended");
      return;
    }
    this.logger.info("feed connected, entries resumed");
    void this.trigger();
  }

  private async activate() {
    if (this.phase !== "running") return;
    if (this.pending) {
      await this.settlePending();
      if (this.pending) return;
    }
    if (this.lastPrice === null) return;
    const price = this.lastPrice;

    if (this.deps.tracker.get(this.symbol)) {
      await this.manageOpenPosition(price);
      return;
    }

    if (this.feedHealth !== "connected") return;
    await this.tryEntry(price);
  }

  private async manageOpenPosition(price: number) {
    const position = this.deps.tracker.update(this.ownClaim(), (current) => {
      updateTrailing(current, price, this.settings.exits);
    });
    if (!position) return;

    const reason = exitTrigger(position, price);
    if (!reason) return;
    await this.closePosition(reason, price);
  }

  private async tryEntry(price: number) {
    const window = { symbol: this.symbol, ticks: [...this.ticks] };
    const signal = this.deps.strategy.evaluate(window);
    const direction = signal.direction;
    if (direction === "flat" || signal.strength < this.settings.minSignalStrength) return;

    const decision = this.deps.risk.reserveEntry(signal, this.symbol, this.now());
    if (!decision.ok) {
      this.logger.debug("entry rejected", { reason: decision.reason, message: decision.message });
      return;
    }

    let holdSlot = false;
    try {
      const account = await this.deps.gateway.queryBalance();
      const size = roundQtyToStep(
        this.deps.risk.sizePosition(signal, account, this.symbol, price),
        this.settings.lotSize,
        "down"
      );
      if (size <= 0) {
        this.logger.info("entry skipped, size rounds to zero", { available: account.available, price });
        return;
      }

      if (this.deps.risk.currentMode === "emergency_stop" || this.phase !== "running") {
        this.logger.warn("entry dropped before submission", { mode: this.deps.risk.currentMode, phase: this.phase });
        return;
      }

      const order = createOrder({
        symbol: this.symbol,
        side: entrySide(direction),
        size,
        reduceOnly: false,
        now: this.now()
      });
      this.logger.info("submitting entry", {
        key: order.idempotencyKey,
        side: direction,
        size,
        strength: signal.strength,
        reason: signal.reason
      });

      const result = await this.deps.gateway.submit(order);
      if (result.kind === "unresolved") {
        this.pending = { intent: "entry", order, side: direction, size };
        holdSlot = true;
        this.logger.error("entry outcome unknown, slot held until the exchange settles it", {
          key: order.idempotencyKey,
          detail: result.reason
        });
        return;
      }
      if (result.kind !== "filled") {
        this.logger.warn("missed trade", { key: order.idempotencyKey, outcome: result.kind, detail: missedDetail(result) });
        return;
      }

      this.openFromFill(direction, size, result.fill);
      holdSlot = true;
    } finally {
      if (!holdSlot) this.deps.risk.releaseEntry(this.symbol);
    }
  }

  private openFromFill(side: PositionSide, requestedSize: number, fill: OrderFill) {
    const opened = openPosition({
      symbol: this.symbol,
      side,
      size: fill.filledSize > 0 ? fill.filledSize : requestedSize,
      entryPrice: fill.fillPrice,
      leverage: this.settings.leverage,
      openedAt: fill.filledAt,
      exits: this.settings.exits,
      recentPrices: this.ticks.map((tick) => tick.price)
    });
    this.partialClose = null;
    this.deps.tracker.open(this.ownClaim(), opened);
    this.deps.risk.confirmEntry(this.symbol, this.now());
    this.logger.info("position opened", {
      side: opened.side,
      size: opened.size,
      entryPrice: opened.entryPrice,
      stopLossPrice: opened.stopLossPrice,
      takeProfitPrice: opened.takeProfitPrice
    });
  }

  /** Asks the gateway again about an unresolved order and applies the outcome once it is known. */
  private async settlePending() {
    const pending = this.pending;
    if (!pending) return;

    const result = await this.deps.gateway.resolve(pending.order);
    if (result.kind === "unresolved") {
      this.logger.warn("order still unresolved", { key: pending.order.idempotencyKey, detail: result.reason });
      return;
    }
    this.pending = null;

    if (pending.intent === "entry") {
      if (result.kind === "filled") {
        this.openFromFill(pending.side, pending.size, result.fill);
        return;
      }
      this.deps.risk.releaseEntry(this.symbol);
      this.logger.warn("missed trade", {
        key: pending.order.idempotencyKey,
        outcome: result.kind,
        detail: missedDetail(result)
      });
      return;
    }

    if (result.kind === "filled") {
      this.applyExitFill(pending.reason, result.fill);
      return;
    }
    this.logger.warn("missed exit", {
      key: pending.order.idempotencyKey,
      reason: pending.reason,
      outcome: result.kind,
      detail: missedDetail(result)
    });
  }

  /** Submits a reduce-only market close. In emergency stop the position is flagged instead. */
  private async closePosition(reason: ExitReason, price: number) {
    const position = this.deps.tracker.get(this.symbol);
    if (!position) return;

    if (this.deps.risk.currentMode === "emergency_stop") {
      if (!position.attentionRequired) {
        this.deps.tracker.update(this.ownClaim(), (current) => {
          current.attentionRequired = true;
        });
        this.logger.error("exit triggered during emergency stop, manual attention required", {
          reason,
          price,
          side: position.side,
          size: position.size
        });
      }
      return;
    }

    const order = createOrder({
      symbol: this.symbol,
      side: exitSide(position.side),
      size: position.size,
      reduceOnly: true,
      now: this.now()
    });
    this.logger.info("submitting exit", { key: order.idempotencyKey, reason, price });

    const result = await this.deps.gateway.submit(order);
    if (result.kind === "unresolved") {
      this.pending = { intent: "exit", order, reason };
      this.logger.error("exit outcome unknown, position kept until the exchange settles it", {
        key: order.idempotencyKey,
        reason,
        detail: result.reason
      });
      return;
    }
    if (result.kind !== "filled") {
      this.logger.warn("missed exit", {
        key: order.idempotencyKey,
        reason,
        outcome: result.kind,
        detail: missedDetail(result)
      });
      return;
    }
    this.applyExitFill(reason, result.fill);
  }

  /**
   * A partial close shrinks the position and carries its PnL; the trade
   * result is recorded once, when the last contract is closed.
   */
  private applyExitFill(reason: ExitReason, fill: OrderFill) {
    const position = this.deps.tracker.get(this.symbol);
    if (!position) return;

    const size = fill.filledSize > 0 ? Math.min(fill.filledSize, position.size) : position.size;
    const pnl = realizedPnl(position.side, position.entryPrice, fill.fillPrice, size * this.settings.contractValue);
    const carried: PartialClose = {
      size: (this.partialClose?.size ?? 0) + size,
      notional: (this.partialClose?.notional ?? 0) + size * fill.fillPrice,
      pnl: (this.partialClose?.pnl ?? 0) + pnl
    };

    if (size < position.size) {
      this.partialClose = carried;
      this.deps.tracker.update(this.ownClaim(), (current) => {
        current.size = position.size - size;
      });
      this.logger.warn("position partially closed", {
        reason,
        closedSize: size,
        remainingSize: position.size - size,
        fillPrice: fill.fillPrice
      });
      return;
    }

    const closed = this.deps.tracker.close(this.ownClaim());
    if (!closed) return;
    this.partialClose = null;

    const exitPrice = carried.notional / carried.size;
    this.deps.risk.recordTradeResult({ symbol: this.symbol, pnl: carried.pnl }, this.now());

    const record: TradeRecord = {
      symbol: this.symbol,
      side: closed.side,
      size: carried.size,
      entryPrice: closed.entryPrice,
      exitPrice,
      pnl: carried.pnl,
      reason,
      openedAt: closed.openedAt,
      closedAt: fill.filledAt
    };
    this.deps.onTrade?.(record);
    this.logger.info("position closed", { reason, exitPrice, pnl: carried.pnl });
  }

  private async reconcile() {
    const remote = (await this.deps.gateway.queryPositions()).find((position) => position.symbol === this.symbol);
    if (!remote || remote.size <= 0 || this.deps.tracker.get(this.symbol)) return;

    const adopted = adoptExchangePosition(remote, {
      leverage: this.settings.leverage,
      openedAt: this.now(),
      exits: this.settings.exits
    });
    this.deps.tracker.open(this.ownClaim(), adopted);
    this.deps.risk.adoptPosition(this.symbol);
    if (this.lastPrice === null) this.lastPrice = remote.entryPrice;
    this.logger.warn("adopted exchange position", {
      side: adopted.side,
      size: adopted.size,
      entryPrice: adopted.entryPrice,
      stopLossPrice: adopted.stopLossPrice
    });
  }

  private async unwind() {
    await this.cancelOpenOrders();
    await this.whenIdle();

    if (this.pending) await this.settlePending();
    if (this.pending) {
      this.logger.error("order outcome still unknown at shutdown", { key: this.pending.order.idempotencyKey });
      return;
    }

    const position = this.deps.tracker.get(this.symbol);
    if (!position) return;
    if (this.deps.risk.currentMode === "emergency_stop") {
      this.logger.error("position left open, emergency stop forbids orders", {
        side: position.side,
        size: position.size
      });
      return;
    }
    await this.closePosition("shutdown", this.lastPrice ?? position.entryPrice);
  }

  /** In-flight orders included; their submissions observe the cancel and return. */
  private async cancelOpenOrders() {
    for (const order of this.deps.gateway.openOrders(this.symbol)) {
      try {
        await this.deps.gateway.cancel(order.idempotencyKey);
      } catch (error) {
        this.logger.warn("cancel failed during shutdown", { key: order.idempotencyKey, error: errorMessage(error) });
      }
    }
  }

  private withDeadline(work: Promise<void>): Promise<void> {
    const ms = this.settings.shutdownTimeoutMs;
    let timer: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new ShutdownTimeoutError(this.symbol, ms)), ms);
    });
    return Promise.race([work, deadline]).finally(() => clearTimeout(timer));
  }

  private ownClaim(): PositionClaim {
    if (!this.claim) throw new Error(`${this.symbol} engine is not started`);
    return this.claim;
  }
}
