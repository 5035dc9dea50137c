export const OKX_DEFAULT_REST_BASE_URL = "https://www.okx.com";
export const OKX_DEFAULT_PUBLIC_WS_URL = "wss://ws.okx.com:8443/ws/v5/public";
export const OKX_SIMULATED_PUBLIC_WS_URL = "wss://wspap.okx.com:8443/ws/v5/public";

export const OKX_SUCCESS_CODE = "0";

export const OKX_RATE_LIMIT_CODES = new Set<string>(["50011", "50061"]);
export const OKX_BUSY_CODES = new Set<string>(["50001", "50004", "50013"]);
export const OKX_DUPLICATE_CLIENT_ORDER_ID_CODE = "51016";
export const OKX_ORDER_NOT_FOUND_CODE = "51603";

export const OKX_ENDPOINTS = {
  placeOrder: "/api/v5/trade/order",
  getOrder: "/api/v5/trade/order",
  cancelOrder: "/api/v5/trade/cancel-order",
  positions: "/api/v5/account/positions",
  balance: "/api/v5/account/balance",
  setLeverage: "/api/v5/account/set-leverage",
  ticker: "/api/v5/market/ticker"
} as const;

export const OKX_DEFAULT_TIMEOUT_MS = 10_000;
export const OKX_DEFAULT_PING_INTERVAL_MS = 25_000;
