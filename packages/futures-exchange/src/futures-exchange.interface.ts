import type {
  AccountState,
  ExchangePosition,
  FeedHealth,
  FuturesSymbol,
  MarginMode,
  Order,
  OrderSide,
  OrderType,
  Tick
} from "@perp/futures-core";

export type PlaceOrderRequest = {
  clientOrderId: string;
  symbol: FuturesSymbol;
  side: OrderSide;
  type: OrderType;
  size: number;
  price?: number;
  reduceOnly: boolean;
  marginMode?: MarginMode;
};

export type ExchangeOrderState = {
  exchangeOrderId: string;
  clientOrderId: string;
  status: "live" | "filled" | "cancelled" | "rejected";
  fillPrice?: number;
  filledSize?: number;
  reason?: string;
};

/**
 * One exchange, one attempt per call. Retries, pacing and timeouts live in
 * the gateway wrapped around it.
 */
export interface OrderTransport {
  readonly name: string;
  placeOrder(req: PlaceOrderRequest, signal?: AbortSignal): Promise<{ exchangeOrderId: string }>;
  getOrder(symbol: FuturesSymbol, clientOrderId: string, signal?: AbortSignal): Promise<ExchangeOrderState | null>;
  cancelOrder(symbol: FuturesSymbol, exchangeOrderId: string, signal?: AbortSignal): Promise<void>;
  getPositions(signal?: AbortSignal): Promise<ExchangePosition[]>;
  getBalance(signal?: AbortSignal): Promise<AccountState>;
  setLeverage?(symbol: FuturesSymbol, leverage: number, marginMode: MarginMode, signal?: AbortSignal): Promise<void>;
}

export type OrderFill = {
  idempotencyKey: string;
  exchangeOrderId: string;
  fillPrice: number;
  filledSize: number;
  filledAt: number;
};

/**
 * `unresolved`: retries ran out and the exchange could not confirm whether
 * the order is closed. The order stays open in the gateway until `resolve`
 * settles it.
 */
export type OrderResult =
  | { kind: "filled"; order: Order; fill: OrderFill; replayed: boolean }
  | { kind: "rejected"; order: Order; reason: string }
  | { kind: "cancelled"; order: Order; reason: string }
  | { kind: "exhausted"; order: Order; attempts: number; lastError: string }
  | { kind: "unresolved"; order: Order; reason: string };

export interface OrderGateway {
  submit(order: Order): Promise<OrderResult>;
  /** Asks the exchange again about an order a submission left unresolved. */
  resolve(order: Order): Promise<OrderResult>;
  /** Cancels a submitted order by idempotency key. Resolves false when nothing was cancelled. */
  cancel(idempotencyKey: string): Promise<boolean>;
  openOrders(symbol?: FuturesSymbol): Order[];
  queryPositions(): Promise<ExchangePosition[]>;
  queryBalance(): Promise<AccountState>;
  configureLeverage?(symbol: FuturesSymbol, leverage: number, marginMode: MarginMode): Promise<void>;
}

export type FeedChannel = "ticker";

export type TickHandler = (tick: Tick) => void;
export type HealthHandler = (health: FeedHealth) => void;

export interface MarketDataFeed {
  readonly health: FeedHealth;
  subscribe(symbol: FuturesSymbol, channel: FeedChannel, handler: TickHandler): () => void;
  onHealth(handler: HealthHandler): () => void;
  connect(): Promise<void>;
  close(): Promise<void>;
}
