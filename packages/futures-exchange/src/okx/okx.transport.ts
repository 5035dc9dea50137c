import type { AccountState, ExchangePosition, FuturesSymbol, MarginMode } from "@perp/futures-core";
import type { ExchangeOrderState, OrderTransport, PlaceOrderRequest } from "../futures-exchange.interface.js";
import { OKX_ENDPOINTS, OKX_ORDER_NOT_FOUND_CODE } from "./okx.constants.js";
import { OkxApiError, toGatewayError } from "./okx.errors.js";
import { OkxRestClient } from "./okx.rest.js";
import {
  okxBalanceSchema,
  okxOrderAckSchema,
  okxOrderSchema,
  okxPositionSchema,
  okxTickerSchema,
  type OkxClientConfig,
  type OkxOrder
} from "./okx.types.js";

export function mapOkxOrderState(order: OkxOrder): ExchangeOrderState {
  const base = { exchangeOrderId: order.ordId, clientOrderId: order.clOrdId };
  const fillPrice = order.avgPx !== undefined && Number.isFinite(order.avgPx) && order.avgPx > 0 ? order.avgPx : undefined;
  const filledSize = order.accFillSz !== undefined && Number.isFinite(order.accFillSz) ? order.accFillSz : undefined;

  switch (order.state) {
    case "filled":
      return { ...base, status: "filled", fillPrice, filledSize };
    case "canceled":
    case "mmp_canceled":
      return {
        ...base,
        status: "cancelled",
        fillPrice,
        filledSize,
        reason: order.cancelSource ? `cancelled (source ${order.cancelSource})` : "cancelled"
      };
    default:
      return { ...base, status: "live", fillPrice, filledSize };
  }
}

export function mapOkxPosition(raw: {
  instId: string;
  pos: number;
  posSide: string;
  avgPx: number;
  lever?: number;
  upl?: number;
}): ExchangePosition | null {
  if (!Number.isFinite(raw.pos) || raw.pos === 0) return null;

  let side: ExchangePosition["side"];
  if (raw.posSide === "long") side = "long";
  else if (raw.posSide === "short") side = "short";
  else side = raw.pos > 0 ? "long" : "short";

  return {
    symbol: raw.instId,
    side,
    size: Math.abs(raw.pos),
    entryPrice: raw.avgPx,
    leverage: raw.lever !== undefined && Number.isFinite(raw.lever) ? raw.lever : undefined,
    unrealizedPnl: raw.upl !== undefined && Number.isFinite(raw.upl) ? raw.upl : undefined
  };
}

/** OKX USDT-margined swap transport in net position mode. */
export class OkxTransport implements OrderTransport {
  readonly name = "okx";
  readonly rest: OkxRestClient;

  constructor(
    config: OkxClientConfig = {},
    private readonly settings: { marginMode?: MarginMode; quoteCurrency?: string } = {}
  ) {
    this.rest = new OkxRestClient(config);
  }

  async placeOrder(req: PlaceOrderRequest, signal?: AbortSignal): Promise<{ exchangeOrderId: string }> {
    const [ack] = await this.guard(() =>
      this.rest.request({
        method: "POST",
        endpoint: OKX_ENDPOINTS.placeOrder,
        schema: okxOrderAckSchema,
        privateAuth: true,
        signal,
        body: {
          instId: req.symbol,
          tdMode: req.marginMode ?? this.settings.marginMode ?? "isolated",
          side: req.side,
          ordType: req.type,
          sz: String(req.size),
          px: req.type === "limit" && req.price !== undefined ? String(req.price) : undefined,
          clOrdId: req.clientOrderId,
          reduceOnly: req.reduceOnly ? true : undefined
        }
      })
    );

    return { exchangeOrderId: ack?.ordId ?? "" };
  }

  async getOrder(symbol: FuturesSymbol, clientOrderId: string, signal?: AbortSignal): Promise<ExchangeOrderState | null> {
    try {
      const [order] = await this.rest.request({
        method: "GET",
        endpoint: OKX_ENDPOINTS.getOrder,
        schema: okxOrderSchema,
        privateAuth: true,
        signal,
        query: { instId: symbol, clOrdId: clientOrderId }
      });
      return order ? mapOkxOrderState(order) : null;
    } catch (error) {
      if (error instanceof OkxApiError && error.options.code === OKX_ORDER_NOT_FOUND_CODE) return null;
      throw toGatewayError(error);
    }
  }

  async cancelOrder(symbol: FuturesSymbol, exchangeOrderId: string, signal?: AbortSignal): Promise<void> {
    await this.guard(() =>
      this.rest.request({
        method: "POST",
        endpoint: OKX_ENDPOINTS.cancelOrder,
        schema: okxOrderAckSchema,
        privateAuth: true,
        signal,
        body: { instId: symbol, ordId: exchangeOrderId }
      })
    );
  }

  async getPositions(signal?: AbortSignal): Promise<ExchangePosition[]> {
    const rows = await this.guard(() =>
      this.rest.request({
        method: "GET",
        endpoint: OKX_ENDPOINTS.positions,
        schema: okxPositionSchema,
        privateAuth: true,
        signal,
        query: { instType: "SWAP" }
      })
    );

    return rows.map(mapOkxPosition).filter((row): row is ExchangePosition => row !== null);
  }

  async getBalance(signal?: AbortSignal): Promise<AccountState> {
    const quote = this.settings.quoteCurrency ?? "USDT";
    const [account] = await this.guard(() =>
      this.rest.request({
        method: "GET",
        endpoint: OKX_ENDPOINTS.balance,
        schema: okxBalanceSchema,
        privateAuth: true,
        signal,
        query: { ccy: quote }
      })
    );

    const detail = account?.details.find((row) => row.ccy === quote);
    const equity = detail?.eq ?? account?.totalEq ?? 0;
    const available = detail?.availBal ?? detail?.availEq ?? equity;
    return {
      equity: Number.isFinite(equity) ? equity : 0,
      available: Number.isFinite(available) ? available : 0
    };
  }

  async setLeverage(symbol: FuturesSymbol, leverage: number, marginMode: MarginMode, signal?: AbortSignal): Promise<void> {
    await this.guard(() =>
      this.rest.request({
        method: "POST",
        endpoint: OKX_ENDPOINTS.setLeverage,
        schema: okxOrderAckSchema.partial(),
        privateAuth: true,
        signal,
        body: { instId: symbol, lever: String(leverage), mgnMode: marginMode }
      })
    );
  }

  async getTicker(symbol: FuturesSymbol, signal?: AbortSignal): Promise<{ symbol: FuturesSymbol; price: number; ts: number }> {
    const [ticker] = await this.guard(() =>
      this.rest.request({
        method: "GET",
        endpoint: OKX_ENDPOINTS.ticker,
        schema: okxTickerSchema,
        privateAuth: false,
        signal,
        query: { instId: symbol }
      })
    );

    if (!ticker || !Number.isFinite(ticker.last)) {
      throw new OkxApiError(`No ticker for ${symbol}`, { endpoint: OKX_ENDPOINTS.ticker, method: "GET" });
    }
    return { symbol: ticker.instId, price: ticker.last, ts: ticker.ts };
  }

  private async guard<T>(fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw toGatewayError(error);
    }
  }
}
