import {
  BusinessRejectionError,
  DuplicateOrderError,
  GatewayError,
  GatewayTimeoutError,
  RateLimitError,
  TransientGatewayError
} from "../errors.js";
import { OKX_BUSY_CODES, OKX_DUPLICATE_CLIENT_ORDER_ID_CODE, OKX_RATE_LIMIT_CODES } from "./okx.constants.js";

export class OkxApiError extends Error {
  constructor(
    message: string,
    public readonly options: {
      endpoint: string;
      method: string;
      status?: number;
      code?: string;
      responseBody?: unknown;
    }
  ) {
    super(message);
    this.name = "OkxApiError";
  }
}

function normalize(value: unknown): string {
  return String(value ?? "").trim().toLowerCase();
}

/** Maps an OKX failure onto the gateway's retry classes. */
export function toGatewayError(error: unknown): GatewayError {
  if (error instanceof GatewayError) return error;

  if (error instanceof OkxApiError) {
    const { code, status, endpoint } = error.options;
    const options = { code, endpoint, cause: error };

    if (code === OKX_DUPLICATE_CLIENT_ORDER_ID_CODE) return new DuplicateOrderError(error.message, options);
    if ((code && OKX_RATE_LIMIT_CODES.has(code)) || status === 429) return new RateLimitError(error.message, options);
    if (code && OKX_BUSY_CODES.has(code)) return new TransientGatewayError(error.message, options);
    if (status !== undefined && status >= 500) return new TransientGatewayError(error.message, options);
    return new BusinessRejectionError(error.message, options);
  }

  if (error instanceof Error && error.name === "AbortError") {
    return new GatewayTimeoutError("OKX request aborted", { cause: error });
  }

  const message = error instanceof Error ? error.message : String(error);
  const normalized = normalize(message);
  if (normalized.includes("fetch failed") || normalized.includes("network") || normalized.includes("econn")) {
    return new TransientGatewayError(message, { cause: error });
  }

  return new GatewayError(message, { cause: error });
}
