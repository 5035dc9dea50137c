import WebSocket from "ws";
import { errorMessage, silentLogger, type FeedHealth, type FuturesSymbol, type Logger, type Tick } from "@perp/futures-core";
import type { FeedChannel, HealthHandler, MarketDataFeed, TickHandler } from "./futures-exchange.interface.js";
import { RetryPolicy } from "./retry-policy.js";

export type FeedState = "disconnected" | "connecting" | "connected";

export type FeedSocketEvents = {
  onOpen(): void;
  onMessage(text: string): void;
  onClose(): void;
  onError(error: Error): void;
};

/** Minimal socket surface the feed needs; the default wraps `ws`. */
export interface FeedSocket {
  send(data: string): void;
  close(): void;
}

export type FeedSocketFactory = (url: string, events: FeedSocketEvents) => FeedSocket;

export type FeedTopic = { symbol: FuturesSymbol; channel: FeedChannel };

/** Exchange-specific framing of a streaming market data protocol. */
export interface FeedProtocol {
  readonly url: string;
  readonly pingPayload: string;
  subscribeMessage(topics: FeedTopic[]): string;
  unsubscribeMessage(topics: FeedTopic[]): string;
  isPong(text: string): boolean;
  /** Ticks carried by one frame; empty for acks, errors and unknown frames. */
  parse(text: string): Array<{ channel: FeedChannel; tick: Tick }>;
}

function rawToText(raw: WebSocket.RawData): string {
  if (Array.isArray(raw)) return Buffer.concat(raw).toString("utf8");
  if (Buffer.isBuffer(raw)) return raw.toString("utf8");
  return Buffer.from(raw).toString("utf8");
}

export const wsSocketFactory: FeedSocketFactory = (url, events) => {
  const ws = new WebSocket(url);
  ws.on("open", () => events.onOpen());
  ws.on("message", (raw) => events.onMessage(rawToText(raw).trim()));
  ws.on("close", () => events.onClose());
  ws.on("error", (error) => events.onError(error));

  return {
    send(data) {
      if (ws.readyState === WebSocket.OPEN) ws.send(data);
    },
    close() {
      if (ws.readyState === WebSocket.CLOSED || ws.readyState === WebSocket.CLOSING) return;
      ws.terminate();
    }
  };
};

export type ReconnectingWsFeedOptions = {
  protocol: FeedProtocol;
  socketFactory?: FeedSocketFactory;
  reconnect?: RetryPolicy;
  pingIntervalMs?: number;
  /** Reconnect when nothing arrived for this long. 0 disables. */
  staleAfterMs?: number;
  now?: () => number;
  random?: () => number;
  logger?: Logger;
};

type Subscription = FeedTopic & { handlers: Set<TickHandler> };

function topicKey(symbol: FuturesSymbol, channel: FeedChannel) {
  return `${channel}:${symbol}`;
}

/**
 * Streaming feed with an explicit connection state machine. A dropped socket
 * is retried on a timer with capped, jittered backoff, and every live
 * subscription is replayed once the socket is back.
 */
export class ReconnectingWsFeed implements MarketDataFeed {
  private readonly socketFactory: FeedSocketFactory;
  private readonly reconnect: RetryPolicy;
  private readonly pingIntervalMs: number;
  private readonly staleAfterMs: number;
  private readonly now: () => number;
  private readonly random: () => number;
  private readonly logger: Logger;

  private socket: FeedSocket | null = null;
  private state: FeedState = "disconnected";
  private reconnectAttempt = 0;
  private manualClose = false;
  private lastMessageAt = 0;
  private pingTimer: ReturnType<typeof setInterval> | null = null;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private connectWaiters: Array<() => void> = [];

  private readonly subscriptions = new Map<string, Subscription>();
  private readonly healthHandlers = new Set<HealthHandler>();

  constructor(private readonly options: ReconnectingWsFeedOptions) {
    this.socketFactory = options.socketFactory ?? wsSocketFactory;
    this.reconnect = options.reconnect ?? new RetryPolicy({ baseDelayMs: 1_000, maxDelayMs: 30_000 });
    this.pingIntervalMs = options.pingIntervalMs ?? 25_000;
    this.staleAfterMs = options.staleAfterMs ?? 0;
    this.now = options.now ?? Date.now;
    this.random = options.random ?? Math.random;
    this.logger = (options.logger ?? silentLogger).child("feed");
  }

  get connectionState(): FeedState {
    return this.state;
  }

  get health(): FeedHealth {
    return this.state === "connected" ? "connected" : "disconnected";
  }

  get attempts(): number {
    return this.reconnectAttempt;
  }

  connect(): Promise<void> {
    this.manualClose = false;
    if (this.state === "connected") return Promise.resolve();

    const ready = new Promise<void>((resolve) => this.connectWaiters.push(resolve));
    if (this.state === "disconnected" && !this.reconnectTimer) this.open();
    return ready;
  }

  async close(): Promise<void> {
    this.manualClose = true;
    this.clearTimers();
    const socket = this.socket;
    this.socket = null;
    socket?.close();
    this.setState("disconnected");
    this.releaseWaiters();
  }

  subscribe(symbol: FuturesSymbol, channel: FeedChannel, handler: TickHandler): () => void {
    const key = topicKey(symbol, channel);
    let sub = this.subscriptions.get(key);
    if (!sub) {
      sub = { symbol, channel, handlers: new Set() };
      this.subscriptions.set(key, sub);
      this.send(this.options.protocol.subscribeMessage([{ symbol, channel }]));
    }
    sub.handlers.add(handler);

    return () => {
      const current = this.subscriptions.get(key);
      if (!current) return;
      current.handlers.delete(handler);
      if (current.handlers.size > 0) return;
      this.subscriptions.delete(key);
      this.send(this.options.protocol.unsubscribeMessage([{ symbol, channel }]));
    };
  }

  onHealth(handler: HealthHandler): () => void {
    this.healthHandlers.add(handler);
    return () => {
      this.healthHandlers.delete(handler);
    };
  }

  private send(payload: string) {
    if (this.state !== "connected" || !this.socket) return;
    this.socket.send(payload);
  }

  private open() {
    this.setState("connecting");
    const socket = this.socketFactory(this.options.protocol.url, {
      onOpen: () => {
        if (socket === this.socket) this.handleOpen();
      },
      onMessage: (text) => {
        if (socket === this.socket) this.handleMessage(text);
      },
      onClose: () => {
        if (socket === this.socket) this.handleClose();
      },
      onError: (error) => {
        if (socket === this.socket) this.logger.warn("socket error", { error: errorMessage(error) });
      }
    });
    this.socket = socket;
  }

  private handleOpen() {
    this.reconnectAttempt = 0;
    this.lastMessageAt = this.now();
    this.setState("connected");

    const topics = [...this.subscriptions.values()].map(({ symbol, channel }) => ({ symbol, channel }));
    if (topics.length > 0) this.send(this.options.protocol.subscribeMessage(topics));

    this.startPingLoop();
    this.logger.info("feed connected", { url: this.options.protocol.url, topics: topics.length });
    this.releaseWaiters();
  }

  private handleMessage(text: string) {
    this.lastMessageAt = this.now();
    const protocol = this.options.protocol;
    if (protocol.isPong(text)) return;

    for (const { channel, tick } of protocol.parse(text)) {
      const sub = this.subscriptions.get(topicKey(tick.symbol, channel));
      if (!sub) continue;
      for (const handler of sub.handlers) {
        try {
          handler(tick);
        } catch (error) {
          this.logger.error("tick handler failed", { symbol: tick.symbol, error: errorMessage(error) });
        }
      }
    }
  }

  private handleClose() {
    this.clearTimers();
    this.socket = null;
    this.setState("disconnected");
    if (this.manualClose) return;
    this.scheduleReconnect();
  }

  private scheduleReconnect() {
    this.reconnectAttempt += 1;
    const delay = this.reconnect.delayFor(this.reconnectAttempt, this.random);
    this.logger.warn("feed disconnected, reconnecting", { attempt: this.reconnectAttempt, delayMs: delay });

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      if (this.manualClose) return;
      this.open();
    }, delay);
  }

  private startPingLoop() {
    if (this.pingIntervalMs <= 0) return;
    this.pingTimer = setInterval(() => {
      if (this.staleAfterMs > 0 && this.now() - this.lastMessageAt > this.staleAfterMs) {
        this.logger.warn("feed stale, forcing reconnect", { silentMs: this.now() - this.lastMessageAt });
        const socket = this.socket;
        socket?.close();
        if (socket === this.socket) this.handleClose();
        return;
      }
      this.send(this.options.protocol.pingPayload);
    }, this.pingIntervalMs);
  }

  private clearTimers() {
    if (this.pingTimer) clearInterval(this.pingTimer);
    if (this.reconnectTimer) clearTimeout(this.reconnectTimer);
    this.pingTimer = null;
    this.reconnectTimer = null;
  }

  private setState(next: FeedState) {
    if (this.state === next) return;
    const before = this.health;
    this.state = next;
    const after = this.health;
    if (before === after) return;

    for (const handler of this.healthHandlers) {
      try {
        handler(after);
      } catch (error) {
        this.logger.error("health handler failed", { error: errorMessage(error) });
      }
    }
  }

  private releaseWaiters() {
    const waiters = this.connectWaiters;
    this.connectWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
