import { randomBytes } from "node:crypto";
import {
  errorMessage,
  silentLogger,
  type AccountState,
  type ExchangePosition,
  type FuturesSymbol,
  type Logger,
  type MarginMode,
  type Order,
  type OrderSide,
  type OrderStatus,
  type OrderType
} from "@perp/futures-core";
import {
  BusinessRejectionError,
  DuplicateOrderError,
  GatewayTimeoutError,
  InvalidOrderTransitionError,
  OrderCancelledError,
  TransientGatewayError,
  isTransientError
} from "./errors.js";
import type {
  ExchangeOrderState,
  OrderFill,
  OrderGateway,
  OrderResult,
  OrderTransport
} from "./futures-exchange.interface.js";
import { RateLimiter } from "./rate-limiter.js";
import { RetryPolicy } from "./retry-policy.js";

export const ORDER_TRANSITIONS: Readonly<Record<OrderStatus, readonly OrderStatus[]>> = {
  pending: ["submitted", "rejected", "cancelled"],
  submitted: ["filled", "rejected", "cancelled"],
  filled: [],
  rejected: [],
  cancelled: []
};

export function isTerminalStatus(status: OrderStatus): boolean {
  return ORDER_TRANSITIONS[status].length === 0;
}

export function transitionOrder(order: Order, next: OrderStatus): void {
  if (!ORDER_TRANSITIONS[order.status].includes(next)) {
    throw new InvalidOrderTransitionError(order.idempotencyKey, order.status, next);
  }
  order.status = next;
}

/** Alphanumeric and at most 32 characters, the client order id format exchanges accept. */
export function createIdempotencyKey(prefix = "pt"): string {
  return `${prefix}${Date.now().toString(36)}${randomBytes(6).toString("hex")}`;
}

export function createOrder(params: {
  symbol: FuturesSymbol;
  side: OrderSide;
  size: number;
  reduceOnly: boolean;
  type?: OrderType;
  price?: number;
  now?: number;
}): Order {
  return {
    idempotencyKey: createIdempotencyKey(),
    symbol: params.symbol,
    side: params.side,
    size: params.size,
    type: params.type ?? "market",
    price: params.price,
    reduceOnly: params.reduceOnly,
    status: "pending",
    retryCount: 0,
    createdAt: params.now ?? Date.now()
  };
}

export type ManagedOrderGatewayOptions = {
  retry?: RetryPolicy;
  rateLimiter?: RateLimiter;
  rateLimitPerSecond?: number;
  attemptTimeoutMs?: number;
  fillPollIntervalMs?: number;
  marginMode?: MarginMode;
  ledgerLimit?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  logger?: Logger;
};

type OrderLookup = { ok: true; state: ExchangeOrderState | null } | { ok: false; error: string };

function sleep(ms: number) {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

/**
 * Order gateway over a single-attempt exchange transport: paces calls,
 * retries transient failures under one idempotency key, drives the order
 * state machine and remembers fills so a key never fills twice.
 */
export class ManagedOrderGateway implements OrderGateway {
  readonly retry: RetryPolicy;
  private readonly limiter: RateLimiter;
  private readonly attemptTimeoutMs: number;
  private readonly fillPollIntervalMs: number;
  private readonly ledgerLimit: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;
  private readonly logger: Logger;

  private readonly orders = new Map<string, Order>();
  private readonly fills = new Map<string, OrderFill>();
  private readonly inflight = new Map<string, Promise<OrderResult>>();

  constructor(
    private readonly transport: OrderTransport,
    private readonly options: ManagedOrderGatewayOptions = {}
  ) {
    this.retry = options.retry ?? new RetryPolicy();
    this.limiter = options.rateLimiter ?? new RateLimiter({ limit: options.rateLimitPerSecond ?? 10 });
    this.attemptTimeoutMs = options.attemptTimeoutMs ?? 10_000;
    this.fillPollIntervalMs = options.fillPollIntervalMs ?? 250;
    this.ledgerLimit = options.ledgerLimit ?? 1_000;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? sleep;
    this.random = options.random ?? Math.random;
    this.logger = (options.logger ?? silentLogger).child("gateway");
  }

  recordedFill(idempotencyKey: string): OrderFill | null {
    return this.fills.get(idempotencyKey) ?? null;
  }

  openOrders(symbol?: FuturesSymbol): Order[] {
    return [...this.orders.values()].filter(
      (order) => !isTerminalStatus(order.status) && (symbol === undefined || order.symbol === symbol)
    );
  }

  submit(order: Order): Promise<OrderResult> {
    const recorded = this.fills.get(order.idempotencyKey);
    if (recorded) {
      this.applyFill(order, recorded);
      return Promise.resolve({ kind: "filled", order, fill: recorded, replayed: true });
    }

    const running = this.inflight.get(order.idempotencyKey);
    if (running) return running;

    if (order.status !== "pending") {
      return Promise.reject(new InvalidOrderTransitionError(order.idempotencyKey, order.status, "submitted"));
    }

    const result = this.runSubmission(order).finally(() => {
      this.inflight.delete(order.idempotencyKey);
    });
    this.inflight.set(order.idempotencyKey, result);
    return result;
  }

  /**
   * Settles an order left `unresolved`: a fill found on the exchange is
   * recorded, a closed order is dropped, a live one is cancelled again.
   */
  resolve(order: Order): Promise<OrderResult> {
    const recorded = this.fills.get(order.idempotencyKey);
    if (recorded) {
      this.applyFill(order, recorded);
      return Promise.resolve({ kind: "filled", order, fill: recorded, replayed: true });
    }
    if (order.status === "rejected") {
      return Promise.resolve({ kind: "rejected", order, reason: order.rejectReason ?? "rejected" });
    }
    if (order.status === "cancelled") {
      return Promise.resolve({ kind: "cancelled", order, reason: order.rejectReason ?? "cancelled" });
    }

    const running = this.inflight.get(order.idempotencyKey);
    if (running) return running;

    const result = this.settleAbandoned(order, order.retryCount + 1, "outcome unresolved").finally(() => {
      this.inflight.delete(order.idempotencyKey);
    });
    this.inflight.set(order.idempotencyKey, result);
    return result;
  }

  /** While a submission is in flight the cancel is only sent; the submission observes the outcome. */
  async cancel(idempotencyKey: string): Promise<boolean> {
    const order = this.orders.get(idempotencyKey);
    if (!order || order.status !== "submitted" || !order.exchangeOrderId) return false;

    const exchangeOrderId = order.exchangeOrderId;
    await this.call(`cancel ${idempotencyKey}`, (signal) =>
      this.transport.cancelOrder(order.symbol, exchangeOrderId, signal)
    );

    if (this.inflight.has(idempotencyKey)) {
      this.logger.info("cancel sent for in-flight order", { key: idempotencyKey, symbol: order.symbol });
      return true;
    }
    if (order.status !== "submitted") return false;
    transitionOrder(order, "cancelled");
    this.orders.delete(idempotencyKey);
    this.logger.info("order cancelled", { key: idempotencyKey, symbol: order.symbol });
    return true;
  }

  queryPositions(): Promise<ExchangePosition[]> {
    return this.call("positions", (signal) => this.transport.getPositions(signal));
  }

  queryBalance(): Promise<AccountState> {
    return this.call("balance", (signal) => this.transport.getBalance(signal));
  }

  async configureLeverage(symbol: FuturesSymbol, leverage: number, marginMode: MarginMode): Promise<void> {
    const setLeverage = this.transport.setLeverage?.bind(this.transport);
    if (!setLeverage) return;
    await this.call(`leverage ${symbol}`, (signal) => setLeverage(symbol, leverage, marginMode, signal));
  }

  private async runSubmission(order: Order): Promise<OrderResult> {
    this.orders.set(order.idempotencyKey, order);
    const maxAttempts = Math.max(1, this.retry.maxAttempts);
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      order.retryCount = attempt - 1;
      try {
        const fill = await this.withTimeout(`submit ${order.idempotencyKey}`, (signal) => this.attempt(order, signal));
        return this.recordFill(order, fill);
      } catch (error) {
        lastError = error;
        if (error instanceof OrderCancelledError) {
          return this.cancelled(order, errorMessage(error));
        }
        if (!isTransientError(error)) {
          return this.reject(order, errorMessage(error));
        }

        this.logger.warn("order attempt failed", {
          key: order.idempotencyKey,
          symbol: order.symbol,
          attempt,
          maxAttempts,
          error: errorMessage(error)
        });

        if (!this.retry.canRetry(attempt)) break;
        await this.sleep(this.retry.delayFor(attempt, this.random));
      }
    }

    return this.settleAbandoned(order, maxAttempts, errorMessage(lastError));
  }

  /**
   * Cancels an order whose submission gave up, then reads it back. A fill
   * that landed meanwhile is recorded; an order the exchange cannot show as
   * closed stays open and comes back `unresolved`.
   */
  private async settleAbandoned(order: Order, attempts: number, lastError: string): Promise<OrderResult> {
    const cancelError = await this.abandon(order);
    const lookup = await this.lookup(order);

    if (lookup.ok) {
      const state = lookup.state;
      const fill = state ? this.fillFromState(order, state) : null;
      if (fill) {
        this.logger.warn("fill found after submission gave up", { key: order.idempotencyKey, symbol: order.symbol });
        return this.recordFill(order, fill);
      }

      const closed = state === null
        ? order.status === "pending"
        : state.status === "cancelled" || state.status === "rejected";
      if (closed) {
        this.settle(order, "rejected");
        order.rejectReason = `retries exhausted: ${lastError}`;
        this.orders.delete(order.idempotencyKey);
        this.logger.error("order retries exhausted", { key: order.idempotencyKey, symbol: order.symbol, error: lastError });
        return { kind: "exhausted", order, attempts, lastError };
      }
    }

    const reason = lookup.ok
      ? `order ${lookup.state?.status ?? "missing"} after ${lastError}`
      : `order lookup failed after ${lastError}: ${lookup.error}`;
    this.logger.error("order outcome unresolved", {
      key: order.idempotencyKey,
      symbol: order.symbol,
      reason,
      cancelError
    });
    return { kind: "unresolved", order, reason };
  }

  private async lookup(order: Order): Promise<OrderLookup> {
    try {
      await this.limiter.acquire();
      const state = await this.withTimeout(`lookup ${order.idempotencyKey}`, (signal) =>
        this.transport.getOrder(order.symbol, order.idempotencyKey, signal)
      );
      if (state) {
        order.exchangeOrderId = state.exchangeOrderId;
        if (order.status === "pending") transitionOrder(order, "submitted");
      }
      return { ok: true, state };
    } catch (error) {
      return { ok: false, error: errorMessage(error) };
    }
  }

  /** A fill carried by an exchange state: complete, or partial on an order closed early. */
  private fillFromState(order: Order, state: ExchangeOrderState): OrderFill | null {
    if (state.status === "live") return null;
    const filledSize = state.status === "filled" ? state.filledSize ?? order.size : state.filledSize ?? 0;
    if (!(filledSize > 0) || state.fillPrice === undefined || !(state.fillPrice > 0)) return null;
    return {
      idempotencyKey: order.idempotencyKey,
      exchangeOrderId: state.exchangeOrderId,
      fillPrice: state.fillPrice,
      filledSize,
      filledAt: this.now()
    };
  }

  private async attempt(order: Order, signal: AbortSignal): Promise<OrderFill> {
    if (order.status === "pending") {
      await this.limiter.acquire();
      try {
        const ack = await this.transport.placeOrder(
          {
            clientOrderId: order.idempotencyKey,
            symbol: order.symbol,
            side: order.side,
            type: order.type,
            size: order.size,
            price: order.price,
            reduceOnly: order.reduceOnly,
            marginMode: this.options.marginMode
          },
          signal
        );
        order.exchangeOrderId = ack.exchangeOrderId;
      } catch (error) {
        if (!(error instanceof DuplicateOrderError)) throw error;
        this.logger.info("client order id already known, resolving by lookup", { key: order.idempotencyKey });
      }
      if (order.status === "pending") transitionOrder(order, "submitted");
    }

    return this.awaitFill(order, signal);
  }

  private async awaitFill(order: Order, signal: AbortSignal): Promise<OrderFill> {
    const maxPolls = Math.max(1, Math.ceil(this.attemptTimeoutMs / Math.max(1, this.fillPollIntervalMs)));

    for (let poll = 0; poll < maxPolls; poll += 1) {
      if (signal.aborted) break;
      await this.limiter.acquire();
      const state = await this.transport.getOrder(order.symbol, order.idempotencyKey, signal);
      if (!state) {
        throw new TransientGatewayError(`Order ${order.idempotencyKey} not visible on ${this.transport.name}`);
      }

      order.exchangeOrderId = state.exchangeOrderId;
      const fill = this.fillFromState(order, state);
      if (fill) return fill;

      if (state.status === "filled" || (state.status !== "live" && (state.filledSize ?? 0) > 0)) {
        throw new TransientGatewayError(`Order ${order.idempotencyKey} filled without a price`);
      }
      if (state.status === "cancelled") {
        throw new OrderCancelledError(state.reason ?? `Order cancelled by ${this.transport.name}`);
      }
      if (state.status === "rejected") {
        throw new BusinessRejectionError(state.reason ?? `Order rejected by ${this.transport.name}`);
      }

      await this.sleep(this.fillPollIntervalMs);
    }

    throw new GatewayTimeoutError(`Order ${order.idempotencyKey} not filled within ${this.attemptTimeoutMs}ms`);
  }

  /** Cancel of an acknowledged order whose fill never arrived. Resolves to the failure message, if any. */
  private async abandon(order: Order): Promise<string | null> {
    if (order.status !== "submitted" || !order.exchangeOrderId) return null;
    const exchangeOrderId = order.exchangeOrderId;
    try {
      await this.withTimeout(`abandon ${order.idempotencyKey}`, (signal) =>
        this.transport.cancelOrder(order.symbol, exchangeOrderId, signal)
      );
      return null;
    } catch (error) {
      const message = errorMessage(error);
      this.logger.warn("cancel of abandoned order failed", { key: order.idempotencyKey, error: message });
      return message;
    }
  }

  private recordFill(order: Order, fill: OrderFill): OrderResult {
    this.applyFill(order, fill);
    this.fills.set(order.idempotencyKey, fill);
    if (this.fills.size > this.ledgerLimit) {
      const oldest = this.fills.keys().next();
      if (!oldest.done) this.fills.delete(oldest.value);
    }
    this.orders.delete(order.idempotencyKey);

    this.logger.info(fill.filledSize < order.size ? "order partially filled" : "order filled", {
      key: order.idempotencyKey,
      symbol: order.symbol,
      side: order.side,
      size: fill.filledSize,
      price: fill.fillPrice,
      retries: order.retryCount
    });
    return { kind: "filled", order, fill, replayed: false };
  }

  private applyFill(order: Order, fill: OrderFill) {
    if (order.status === "pending") transitionOrder(order, "submitted");
    if (order.status === "submitted") transitionOrder(order, "filled");
    order.exchangeOrderId = fill.exchangeOrderId;
    order.fillPrice = fill.fillPrice;
  }

  private reject(order: Order, reason: string): OrderResult {
    this.settle(order, "rejected");
    order.rejectReason = reason;
    this.orders.delete(order.idempotencyKey);
    this.logger.warn("order rejected", { key: order.idempotencyKey, symbol: order.symbol, reason });
    return { kind: "rejected", order, reason };
  }

  private cancelled(order: Order, reason: string): OrderResult {
    this.settle(order, "cancelled");
    order.rejectReason = reason;
    this.orders.delete(order.idempotencyKey);
    this.logger.warn("order cancelled by exchange", { key: order.idempotencyKey, symbol: order.symbol, reason });
    return { kind: "cancelled", order, reason };
  }

  private settle(order: Order, status: OrderStatus) {
    if (isTerminalStatus(order.status)) return;
    transitionOrder(order, status);
  }

  private async call<T>(label: string, fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
    for (let attempt = 1; ; attempt += 1) {
      try {
        await this.limiter.acquire();
        return await this.withTimeout(label, fn);
      } catch (error) {
        if (!this.retry.shouldRetry(error, attempt)) throw error;
        this.logger.debug("request retry", { label, attempt, error: errorMessage(error) });
        await this.sleep(this.retry.delayFor(attempt, this.random));
      }
    }
  }

  private async withTimeout<T>(label: string, fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new GatewayTimeoutError(`${label} timed out after ${this.attemptTimeoutMs}ms`));
      }, this.attemptTimeoutMs);
    });

    try {
      return await Promise.race([fn(controller.signal), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
