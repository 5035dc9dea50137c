import {
  realizedPnl,
  type AccountState,
  type ExchangePosition,
  type FuturesSymbol,
  type MarginMode,
  type PositionSide,
  type Tick
} from "@perp/futures-core";
import { BusinessRejectionError, DuplicateOrderError } from "../errors.js";
import type { ExchangeOrderState, OrderTransport, PlaceOrderRequest } from "../futures-exchange.interface.js";

type PaperPosition = {
  side: PositionSide;
  size: number;
  entryPrice: number;
};

export type PaperTransportOptions = {
  initialBalance: number;
  leverage?: number;
  /** Taker fee as a fraction of notional. */
  feeRate?: number;
  /** Base-asset amount per contract; 1 when omitted. */
  contractValues?: Readonly<Record<FuturesSymbol, number>>;
};

/**
 * Simulated exchange: market orders fill at the last observed price against
 * a local balance. Net position mode, one position per symbol.
 */
export class PaperTransport implements OrderTransport {
  readonly name = "paper";
  private balance: number;
  private readonly feeRate: number;
  private readonly defaultLeverage: number;
  private readonly contractValues: Readonly<Record<FuturesSymbol, number>>;
  private seq = 0;

  private readonly prices = new Map<FuturesSymbol, number>();
  private readonly leverage = new Map<FuturesSymbol, number>();
  private readonly positions = new Map<FuturesSymbol, PaperPosition>();
  private readonly orders = new Map<string, ExchangeOrderState>();

  constructor(options: PaperTransportOptions) {
    this.balance = options.initialBalance;
    this.feeRate = options.feeRate ?? 0;
    this.defaultLeverage = options.leverage ?? 1;
    this.contractValues = options.contractValues ?? {};
  }

  observe(tick: Tick) {
    this.setPrice(tick.symbol, tick.price);
  }

  setPrice(symbol: FuturesSymbol, price: number) {
    if (Number.isFinite(price) && price > 0) this.prices.set(symbol, price);
  }

  async placeOrder(req: PlaceOrderRequest): Promise<{ exchangeOrderId: string }> {
    if (this.orders.has(req.clientOrderId)) {
      throw new DuplicateOrderError(`Duplicate client order id ${req.clientOrderId}`, { code: "duplicate" });
    }

    const price = req.type === "limit" && req.price !== undefined ? req.price : this.prices.get(req.symbol);
    if (price === undefined) throw new BusinessRejectionError(`No market price for ${req.symbol}`);
    if (!(req.size > 0)) throw new BusinessRejectionError(`Invalid size ${req.size}`);

    const side: PositionSide = req.side === "buy" ? "long" : "short";
    const current = this.positions.get(req.symbol);
    const notional = req.size * this.contractValueOf(req.symbol) * price;

    if (req.reduceOnly && (!current || current.side === side)) {
      throw new BusinessRejectionError(`Reduce-only order would open a position on ${req.symbol}`);
    }

    if (!current || current.side === side) {
      const margin = notional / this.leverageFor(req.symbol);
      if (margin > this.available()) {
        throw new BusinessRejectionError(`Insufficient margin: need ${margin.toFixed(2)}`);
      }
      const size = (current?.size ?? 0) + req.size;
      const entryPrice = current ? (current.entryPrice * current.size + price * req.size) / size : price;
      this.positions.set(req.symbol, { side, size, entryPrice });
    } else {
      const closed = Math.min(current.size, req.size);
      this.balance += realizedPnl(current.side, current.entryPrice, price, closed * this.contractValueOf(req.symbol));
      const remaining = current.size - closed;
      if (remaining > 0) this.positions.set(req.symbol, { ...current, size: remaining });
      else this.positions.delete(req.symbol);
    }

    this.balance -= notional * this.feeRate;

    this.seq += 1;
    const exchangeOrderId = `paper-${this.seq}`;
    this.orders.set(req.clientOrderId, {
      exchangeOrderId,
      clientOrderId: req.clientOrderId,
      status: "filled",
      fillPrice: price,
      filledSize: req.size
    });
    return { exchangeOrderId };
  }

  async getOrder(_symbol: FuturesSymbol, clientOrderId: string): Promise<ExchangeOrderState | null> {
    const order = this.orders.get(clientOrderId);
    return order ? { ...order } : null;
  }

  async cancelOrder(_symbol: FuturesSymbol, exchangeOrderId: string): Promise<void> {
    for (const order of this.orders.values()) {
      if (order.exchangeOrderId === exchangeOrderId && order.status === "live") order.status = "cancelled";
    }
  }

  async getPositions(): Promise<ExchangePosition[]> {
    return [...this.positions.entries()].map(([symbol, position]) => ({
      symbol,
      side: position.side,
      size: position.size,
      entryPrice: position.entryPrice,
      leverage: this.leverageFor(symbol),
      unrealizedPnl: this.unrealized(symbol, position)
    }));
  }

  async getBalance(): Promise<AccountState> {
    return { equity: this.equity(), available: this.available() };
  }

  async setLeverage(symbol: FuturesSymbol, leverage: number, _marginMode: MarginMode): Promise<void> {
    if (!(leverage >= 1)) throw new BusinessRejectionError(`Invalid leverage ${leverage}`);
    this.leverage.set(symbol, leverage);
  }

  private contractValueOf(symbol: FuturesSymbol): number {
    return this.contractValues[symbol] ?? 1;
  }

  private leverageFor(symbol: FuturesSymbol): number {
    return this.leverage.get(symbol) ?? this.defaultLeverage;
  }

  private unrealized(symbol: FuturesSymbol, position: PaperPosition): number {
    const price = this.prices.get(symbol) ?? position.entryPrice;
    return realizedPnl(position.side, position.entryPrice, price, position.size * this.contractValueOf(symbol));
  }

  private equity(): number {
    let equity = this.balance;
    for (const [symbol, position] of this.positions) equity += this.unrealized(symbol, position);
    return equity;
  }

  private available(): number {
    let used = 0;
    for (const [symbol, position] of this.positions) {
      used += (position.size * this.contractValueOf(symbol) * position.entryPrice) / this.leverageFor(symbol);
    }
    return Math.max(0, this.equity() - used);
  }
}
