import type { OrderStatus } from "@perp/futures-core";

export type GatewayErrorOptions = {
  code?: string;
  endpoint?: string;
  cause?: unknown;
};

/** Base class of every error the order gateway acts on. `transient` decides retry. */
export class GatewayError extends Error {
  readonly transient: boolean = false;
  readonly code?: string;
  readonly endpoint?: string;

  constructor(message: string, options: GatewayErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "GatewayError";
    this.code = options.code;
    this.endpoint = options.endpoint;
  }
}

export class TransientGatewayError extends GatewayError {
  override readonly transient = true;

  constructor(message: string, options: GatewayErrorOptions = {}) {
    super(message, options);
    this.name = "TransientGatewayError";
  }
}

export class GatewayTimeoutError extends TransientGatewayError {
  constructor(message: string, options: GatewayErrorOptions = {}) {
    super(message, options);
    this.name = "GatewayTimeoutError";
  }
}

export class RateLimitError extends TransientGatewayError {
  constructor(message: string, options: GatewayErrorOptions = {}) {
    super(message, options);
    this.name = "RateLimitError";
  }
}

export class BusinessRejectionError extends GatewayError {
  constructor(message: string, options: GatewayErrorOptions = {}) {
    super(message, options);
    this.name = "BusinessRejectionError";
  }
}

/** The exchange already holds an order with this client order id. */
export class DuplicateOrderError extends BusinessRejectionError {
  constructor(message: string, options: GatewayErrorOptions = {}) {
    super(message, options);
    this.name = "DuplicateOrderError";
  }
}

/** The exchange closed the order before any of it filled. */
export class OrderCancelledError extends BusinessRejectionError {
  constructor(message: string, options: GatewayErrorOptions = {}) {
    super(message, options);
    this.name = "OrderCancelledError";
  }
}

export class InvalidOrderTransitionError extends Error {
  constructor(
    public readonly idempotencyKey: string,
    public readonly from: OrderStatus,
    public readonly to: OrderStatus
  ) {
    super(`Order ${idempotencyKey} cannot move from ${from} to ${to}`);
    this.name = "InvalidOrderTransitionError";
  }
}

const NETWORK_HINTS = ["network", "timeout", "timed out", "econnreset", "econnrefused", "socket hang up", "fetch failed"];

export function isTransientError(error: unknown): boolean {
  if (error instanceof GatewayError) return error.transient;
  const msg = String(error).toLowerCase();
  return NETWORK_HINTS.some((hint) => msg.includes(hint));
}
