export * from "./futures-exchange.interface.js";
export * from "./errors.js";
export * from "./retry-policy.js";
export * from "./rate-limiter.js";
export * from "./order-gateway.js";
export * from "./ws-feed.js";
export * from "./okx/okx.constants.js";
export * from "./okx/okx.types.js";
export * from "./okx/okx.signing.js";
export * from "./okx/okx.errors.js";
export * from "./okx/okx.rest.js";
export * from "./okx/okx.transport.js";
export * from "./okx/okx.ws.public.js";
export * from "./paper/paper.transport.js";
export * from "./paper/paper.feed.js";
