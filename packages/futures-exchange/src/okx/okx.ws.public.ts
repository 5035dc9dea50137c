import type { Logger, Tick } from "@perp/futures-core";
import type { FeedChannel } from "../futures-exchange.interface.js";
import type { RetryPolicy } from "../retry-policy.js";
import { ReconnectingWsFeed, type FeedProtocol, type FeedSocketFactory, type FeedTopic } from "../ws-feed.js";
import { OKX_DEFAULT_PING_INTERVAL_MS, OKX_DEFAULT_PUBLIC_WS_URL } from "./okx.constants.js";
import { okxWsEventSchema, okxWsTickerFrameSchema } from "./okx.types.js";

const CHANNELS: Record<FeedChannel, string> = {
  ticker: "tickers"
};

function safeJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

function buildArgs(topics: FeedTopic[]) {
  return topics.map((topic) => ({ channel: CHANNELS[topic.channel], instId: topic.symbol }));
}

export function createOkxPublicProtocol(url: string = OKX_DEFAULT_PUBLIC_WS_URL, logger?: Logger): FeedProtocol {
  return {
    url,
    pingPayload: "ping",
    subscribeMessage: (topics) => JSON.stringify({ op: "subscribe", args: buildArgs(topics) }),
    unsubscribeMessage: (topics) => JSON.stringify({ op: "unsubscribe", args: buildArgs(topics) }),
    isPong: (text) => text === "pong",
    parse(text) {
      const json = safeJson(text);

      const frame = okxWsTickerFrameSchema.safeParse(json);
      if (frame.success) {
        if (frame.data.arg.channel !== CHANNELS.ticker) return [];
        return frame.data.data
          .filter((row) => Number.isFinite(row.last) && row.last > 0)
          .map((row) => {
            const tick: Tick = {
              symbol: row.instId,
              ts: Number.isFinite(row.ts) ? row.ts : Date.now(),
              price: row.last,
              volume: row.lastSz !== undefined && Number.isFinite(row.lastSz) ? row.lastSz : 0
            };
            return { channel: "ticker" as const, tick };
          });
      }

      const event = okxWsEventSchema.safeParse(json);
      if (event.success && event.data.event === "error") {
        logger?.warn("okx ws error event", { code: event.data.code, msg: event.data.msg });
      }
      return [];
    }
  };
}

export function createOkxTickerFeed(options: {
  url?: string;
  socketFactory?: FeedSocketFactory;
  reconnect?: RetryPolicy;
  pingIntervalMs?: number;
  staleAfterMs?: number;
  logger?: Logger;
} = {}): ReconnectingWsFeed {
  return new ReconnectingWsFeed({
    protocol: createOkxPublicProtocol(options.url, options.logger),
    socketFactory: options.socketFactory,
    reconnect: options.reconnect,
    pingIntervalMs: options.pingIntervalMs ?? OKX_DEFAULT_PING_INTERVAL_MS,
    staleAfterMs: options.staleAfterMs,
    logger: options.logger
  });
}
