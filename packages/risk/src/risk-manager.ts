import {
  SymbolUnknownError,
  clamp,
  qtyFromMargin,
  silentLogger,
  type AccountState,
  type FuturesSymbol,
  type Logger,
  type Signal
} from "@perp/futures-core";

export type RiskMode = "normal" | "cooldown" | "emergency_stop";

export type RiskConfig = {
  maxOpenPositions: number;
  maxHourlyTrades: number;
  maxConsecutiveLosses: number;
  cooldownMs: number;
  /** Absolute loss in quote currency that trips the emergency stop. */
  maxDailyLoss: number;
  /** Fraction of peak equity, e.g. 0.2 for 20%. */
  maxDrawdown: number;
  winRateWindow: number;
  minTradesForWinRate: number;
  winRateThreshold: number;
  highWinRateThreshold: number;
  winStreakForIncrease: number;
  increaseFactor: number;
  decreaseFactor: number;
};

export type SymbolLimits = {
  basePositionSize: number;
  maxPositionSize: number;
  /** Base-asset amount per contract. */
  contractValue: number;
};

export type RiskState = {
  mode: RiskMode;
  consecutiveLosses: number;
  consecutiveWins: number;
  dailyPnl: number;
  dayKey: string;
  peakEquity: number;
  equity: number;
  drawdown: number;
  tradeTimestamps: number[];
  cooldownUntil: number | null;
  openSymbols: FuturesSymbol[];
  reservedSymbols: FuturesSymbol[];
  emergencyReason: string | null;
  recentPnls: number[];
};

export type RiskRejectReason =
  | "emergency_stop"
  | "cooldown"
  | "symbol_busy"
  | "max_open_positions"
  | "hourly_limit"
  | "flat_signal";

export type RiskDecision =
  | { ok: true }
  | { ok: false; reason: RiskRejectReason; message: string };

export type RiskEvent = {
  type:
    | "COOLDOWN_STARTED"
    | "COOLDOWN_ENDED"
    | "COOLDOWN_CLEARED"
    | "EMERGENCY_STOP"
    | "EMERGENCY_STOP_RESET"
    | "DAY_ROLLOVER";
  timestamp: string;
  message: string;
  meta: Record<string, unknown>;
};

export type TradeResult = {
  symbol: FuturesSymbol;
  pnl: number;
};

export type RiskManagerOptions = {
  symbols: Record<FuturesSymbol, SymbolLimits>;
  leverage: number;
  initialEquity: number;
  now?: () => number;
  emitRiskEvent?: (event: RiskEvent) => void;
  logger?: Logger;
};

const HOUR_MS = 60 * 60 * 1000;

export function utcDayKey(ts: number): string {
  return new Date(ts).toISOString().slice(0, 10);
}

/**
 * Single owner of the shared risk state. Every method is synchronous, so a
 * gate check followed by a reservation cannot interleave with another
 * symbol's loop.
 */
export class RiskManager {
  private mode: RiskMode = "normal";
  private consecutiveLosses = 0;
  private consecutiveWins = 0;
  private dailyPnl = 0;
  private dayKey: string;
  private peakEquity: number;
  private equity: number;
  private drawdown = 0;
  private tradeTimestamps: number[] = [];
  private cooldownUntil: number | null = null;
  private readonly openSymbols = new Set<FuturesSymbol>();
  private readonly reservedSymbols = new Set<FuturesSymbol>();
  private emergencyReason: string | null = null;
  private recentPnls: number[] = [];

  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(
    private readonly cfg: RiskConfig,
    private readonly options: RiskManagerOptions
  ) {
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? silentLogger;
    this.equity = options.initialEquity;
    this.peakEquity = options.initialEquity;
    this.dayKey = utcDayKey(this.now());
  }

  get currentMode(): RiskMode {
    return this.mode;
  }

  canOpenPosition(signal: Signal, symbol: FuturesSymbol, now: number = this.now()): RiskDecision {
    this.refresh(now);

    if (this.mode === "emergency_stop") {
      return { ok: false, reason: "emergency_stop", message: `Emergency stop active: ${this.emergencyReason ?? "unknown"}` };
    }

    if (this.mode === "cooldown") {
      return { ok: false, reason: "cooldown", message: `Cooling down until ${new Date(this.cooldownUntil ?? now).toISOString()}` };
    }

    if (this.openSymbols.has(symbol) || this.reservedSymbols.has(symbol)) {
      return { ok: false, reason: "symbol_busy", message: `${symbol} already holds a position` };
    }

    const inUse = this.openSymbols.size + this.reservedSymbols.size;
    if (inUse >= this.cfg.maxOpenPositions) {
      return { ok: false, reason: "max_open_positions", message: `Open positions at limit: ${inUse}/${this.cfg.maxOpenPositions}` };
    }

    // Reservations count as trades until they are confirmed or released.
    const hourly = this.tradeTimestamps.length + this.reservedSymbols.size;
    if (hourly >= this.cfg.maxHourlyTrades) {
      return { ok: false, reason: "hourly_limit", message: `Hourly trade limit reached: ${hourly}` };
    }

    if (signal.direction === "flat") {
      return { ok: false, reason: "flat_signal", message: "Signal is flat" };
    }

    return { ok: true };
  }

  /** Gate check plus slot reservation in one step. */
  reserveEntry(signal: Signal, symbol: FuturesSymbol, now: number = this.now()): RiskDecision {
    const decision = this.canOpenPosition(signal, symbol, now);
    if (decision.ok) this.reservedSymbols.add(symbol);
    return decision;
  }

  confirmEntry(symbol: FuturesSymbol, now: number = this.now()) {
    this.reservedSymbols.delete(symbol);
    this.openSymbols.add(symbol);
    this.pruneHourly(now);
    this.tradeTimestamps.push(now);
  }

  releaseEntry(symbol: FuturesSymbol) {
    this.reservedSymbols.delete(symbol);
  }

  /** Registers a position found on the exchange at startup. Not counted as a trade. */
  adoptPosition(symbol: FuturesSymbol) {
    this.reservedSymbols.delete(symbol);
    this.openSymbols.add(symbol);
  }

  sizingMultiplier(): number {
    const known = this.recentPnls.length;
    const winRate = known > 0 ? this.recentPnls.filter((pnl) => pnl > 0).length / known : 0;
    const winRateKnown = known >= this.cfg.minTradesForWinRate;

    if (winRateKnown && winRate < this.cfg.winRateThreshold) return this.cfg.decreaseFactor;
    if (this.consecutiveWins >= this.cfg.winStreakForIncrease) return this.cfg.increaseFactor;
    if (winRateKnown && winRate >= this.cfg.highWinRateThreshold) return this.cfg.increaseFactor;
    return 1;
  }

  /**
   * Base size scaled by recent performance, capped by what the available
   * margin carries at the configured leverage and by the symbol's maximum.
   */
  sizePosition(signal: Signal, account: AccountState, symbol: FuturesSymbol, price: number): number {
    const limits = this.options.symbols[symbol];
    if (!limits) throw new SymbolUnknownError(symbol);
    if (signal.direction === "flat") return 0;

    const wanted = limits.basePositionSize * this.sizingMultiplier();
    const affordable = qtyFromMargin(account.available, this.options.leverage, price * limits.contractValue);
    return clamp(Math.min(wanted, affordable), 0, limits.maxPositionSize);
  }

  recordTradeResult(result: TradeResult, now: number = this.now()) {
    this.refresh(now);
    this.openSymbols.delete(result.symbol);
    this.reservedSymbols.delete(result.symbol);

    if (result.pnl < 0) {
      this.consecutiveLosses += 1;
      this.consecutiveWins = 0;
    } else if (result.pnl > 0) {
      this.consecutiveLosses = 0;
      this.consecutiveWins += 1;
    }

    this.recentPnls.push(result.pnl);
    if (this.recentPnls.length > this.cfg.winRateWindow) {
      this.recentPnls = this.recentPnls.slice(-this.cfg.winRateWindow);
    }

    this.dailyPnl += result.pnl;
    this.applyEquity(this.equity + result.pnl);

    this.logger.info("trade recorded", {
      symbol: result.symbol,
      pnl: result.pnl,
      dailyPnl: this.dailyPnl,
      consecutiveLosses: this.consecutiveLosses
    });

    if (this.checkEmergency()) return;

    if (this.mode === "normal" && this.consecutiveLosses >= this.cfg.maxConsecutiveLosses) {
      this.mode = "cooldown";
      this.cooldownUntil = now + this.cfg.cooldownMs;
      this.emit("COOLDOWN_STARTED", `Cooldown after ${this.consecutiveLosses} consecutive losses`, {
        until: this.cooldownUntil,
        consecutiveLosses: this.consecutiveLosses
      });
    }
  }

  /** Balance sync from the exchange. */
  updateEquity(equity: number, now: number = this.now()) {
    if (!Number.isFinite(equity)) return;
    this.refresh(now);
    this.applyEquity(equity);
    this.checkEmergency();
  }

  forceEmergencyStop(reason: string) {
    this.enterEmergency(reason);
  }

  clearCooldown() {
    if (this.mode !== "cooldown") return;
    this.mode = "normal";
    this.cooldownUntil = null;
    this.consecutiveLosses = 0;
    this.emit("COOLDOWN_CLEARED", "Cooldown cleared by operator", {});
  }

  /** Operator reset. Rebases the peak and the day's PnL so the same loss does not trip again. */
  resetEmergencyStop() {
    if (this.mode !== "emergency_stop") return;
    const reason = this.emergencyReason;
    this.mode = "normal";
    this.emergencyReason = null;
    this.cooldownUntil = null;
    this.consecutiveLosses = 0;
    this.dailyPnl = 0;
    this.peakEquity = this.equity;
    this.drawdown = 0;
    this.emit("EMERGENCY_STOP_RESET", "Emergency stop reset by operator", { previousReason: reason });
  }

  snapshot(): RiskState {
    this.refresh(this.now());
    return {
      mode: this.mode,
      consecutiveLosses: this.consecutiveLosses,
      consecutiveWins: this.consecutiveWins,
      dailyPnl: this.dailyPnl,
      dayKey: this.dayKey,
      peakEquity: this.peakEquity,
      equity: this.equity,
      drawdown: this.drawdown,
      tradeTimestamps: [...this.tradeTimestamps],
      cooldownUntil: this.cooldownUntil,
      openSymbols: [...this.openSymbols],
      reservedSymbols: [...this.reservedSymbols],
      emergencyReason: this.emergencyReason,
      recentPnls: [...this.recentPnls]
    };
  }

  private refresh(now: number) {
    const dayKey = utcDayKey(now);
    if (dayKey !== this.dayKey) {
      const previous = this.dayKey;
      this.dayKey = dayKey;
      this.dailyPnl = 0;
      this.emit("DAY_ROLLOVER", `New trading day ${dayKey}`, { previous });
    }

    if (this.mode === "cooldown" && this.cooldownUntil !== null && now >= this.cooldownUntil) {
      this.mode = "normal";
      this.cooldownUntil = null;
      this.consecutiveLosses = 0;
      this.emit("COOLDOWN_ENDED", "Cooldown expired", {});
    }

    this.pruneHourly(now);
  }

  private pruneHourly(now: number) {
    this.tradeTimestamps = this.tradeTimestamps.filter((ts) => now - ts < HOUR_MS);
  }

  private applyEquity(equity: number) {
    this.equity = equity;
    if (equity > this.peakEquity) this.peakEquity = equity;
    this.drawdown = this.peakEquity > 0 ? (this.peakEquity - equity) / this.peakEquity : 0;
  }

  private checkEmergency(): boolean {
    if (this.mode === "emergency_stop") return true;

    if (this.cfg.maxDailyLoss > 0 && this.dailyPnl <= -this.cfg.maxDailyLoss) {
      this.enterEmergency(`Daily loss limit reached: ${this.dailyPnl}`);
      return true;
    }

    if (this.cfg.maxDrawdown > 0 && this.drawdown >= this.cfg.maxDrawdown) {
      this.enterEmergency(`Drawdown limit reached: ${(this.drawdown * 100).toFixed(2)}%`);
      return true;
    }

    return false;
  }

  private enterEmergency(reason: string) {
    if (this.mode === "emergency_stop") return;
    this.mode = "emergency_stop";
    this.emergencyReason = reason;
    this.cooldownUntil = null;
    this.emit("EMERGENCY_STOP", reason, { dailyPnl: this.dailyPnl, drawdown: this.drawdown });
  }

  private emit(type: RiskEvent["type"], message: string, meta: Record<string, unknown>) {
    const level = type === "EMERGENCY_STOP" ? "error" : type === "DAY_ROLLOVER" ? "info" : "warn";
    this.logger[level](message, { event: type, ...meta });
    this.options.emitRiskEvent?.({
      type,
      timestamp: new Date(this.now()).toISOString(),
      message,
      meta
    });
  }
}
