export type MarginMode = "isolated" | "cross";
export type PositionSide = "long" | "short";
export type OrderSide = "buy" | "sell";
export type OrderType = "market" | "limit";
export type SignalDirection = PositionSide | "flat";

export type FuturesSymbol = string;

export type Candle = Readonly<{
  open: number;
  high: number;
  low: number;
  close: number;
}>;

export type Tick = Readonly<{
  symbol: FuturesSymbol;
  ts: number;
  price: number;
  volume: number;
  candle?: Candle;
}>;

export type MarketWindow = Readonly<{
  symbol: FuturesSymbol;
  ticks: readonly Tick[];
}>;

export type Signal = Readonly<{
  direction: SignalDirection;
  strength: number;           // 0..100
  breakdown: Readonly<Record<string, number>>;
  reason?: string;
}>;

export type TrailingStop = {
  active: boolean;
  anchorPrice: number | null;
  distance: number;
  stopPrice: number | null;
};

export type Position = {
  symbol: FuturesSymbol;
  side: PositionSide;
  size: number;
  entryPrice: number;
  leverage: number;
  stopLossPrice: number;
  takeProfitPrice: number;
  trailing: TrailingStop;
  openedAt: number;
  attentionRequired: boolean;
};

export type OrderStatus = "pending" | "submitted" | "filled" | "rejected" | "cancelled";

export type Order = {
  idempotencyKey: string;
  symbol: FuturesSymbol;
  side: OrderSide;
  size: number;
  type: OrderType;
  price?: number;
  reduceOnly: boolean;
  status: OrderStatus;
  retryCount: number;
  exchangeOrderId?: string;
  fillPrice?: number;
  rejectReason?: string;
  createdAt: number;
};

export type AccountState = {
  equity: number;
  available: number;
};

export type ExchangePosition = {
  symbol: FuturesSymbol;
  side: PositionSide;
  size: number;
  entryPrice: number;
  leverage?: number;
  unrealizedPnl?: number;
};

export type FeedHealth = "connected" | "disconnected";

export type ExitReason = "stop_loss" | "take_profit" | "trailing_stop" | "manual" | "shutdown";

export type TradeRecord = {
  symbol: FuturesSymbol;
  side: PositionSide;
  size: number;
  entryPrice: number;
  exitPrice: number;
  pnl: number;
  reason: ExitReason;
  openedAt: number;
  closedAt: number;
};

export function flatSignal(reason: string, breakdown: Record<string, number> = {}): Signal {
  return {
    direction: "flat",
    strength: 0,
    breakdown,
    reason
  };
}

export function entrySide(side: PositionSide): OrderSide {
  return side === "long" ? "buy" : "sell";
}

export function exitSide(side: PositionSide): OrderSide {
  return side === "long" ? "sell" : "buy";
}
