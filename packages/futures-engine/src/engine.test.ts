import assert from "node:assert/strict";
import test from "node:test";
import type { FuturesSymbol, Order, Signal, TradeRecord } from "@perp/futures-core";
import {
  ManagedOrderGateway,
  PaperFeed,
  PaperTransport,
  RateLimiter,
  RetryPolicy,
  TransientGatewayError,
  type OrderGateway,
  type OrderResult,
  type OrderTransport,
  type PlaceOrderRequest
} from "@perp/futures-exchange";
import { RiskManager, type RiskConfig } from "@perp/risk";
import type { SignalStrategy } from "@perp/strategies";
import { ExecutionEngine, type EngineSettings } from "./engine.js";
import { PositionTracker } from "./position-tracker.js";

const SYMBOL = "ETH-USDT-SWAP";
const NOW = Date.UTC(2026, 0, 5, 10, 0, 0);

const riskConfig: RiskConfig = {
  maxOpenPositions: 3,
  maxHourlyTrades: 10,
  maxConsecutiveLosses: 5,
  cooldownMs: 60_000,
  maxDailyLoss: 500,
  maxDrawdown: 0.5,
  winRateWindow: 10,
  minTradesForWinRate: 5,
  winRateThreshold: 0.5,
  highWinRateThreshold: 0.6,
  winStreakForIncrease: 3,
  increaseFactor: 1.5,
  decreaseFactor: 0.5
};

const settings: EngineSettings = {
  symbol: SYMBOL,
  leverage: 5,
  marginMode: "isolated",
  minSignalStrength: 50,
  windowSize: 10,
  evaluationIntervalMs: 0,
  contractValue: 1,
  lotSize: 0,
  shutdownTimeoutMs: 1_000,
  exits: {
    stopLoss: 0.02,
    takeProfit: 0.1,
    trailingEnabled: true,
    trailingTrigger: 0.02,
    trailingDistance: 0.01
  }
};

const LONG: Signal = { direction: "long", strength: 80, breakdown: {}, reason: "test" };
const FLAT: Signal = { direction: "flat", strength: 0, breakdown: {}, reason: "test" };

function close(actual: number | undefined, expected: number) {
  assert.ok(actual !== undefined && Math.abs(actual - expected) < 1e-9, `expected ${expected}, got ${actual}`);
}

function paperGateway(transport: OrderTransport) {
  return new ManagedOrderGateway(transport, {
    retry: new RetryPolicy({ maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0, jitterRatio: 0 }),
    rateLimiter: new RateLimiter({ limit: 1_000 }),
    sleep: async () => undefined,
    now: () => NOW
  });
}

function setup(overrides: { transport?: OrderTransport; gateway?: OrderGateway; settings?: Partial<EngineSettings> } = {}) {
  const paper = new PaperTransport({ initialBalance: 10_000, leverage: 5 });
  const placed: PlaceOrderRequest[] = [];
  const inner = overrides.transport ?? paper;
  const placeOrder = inner.placeOrder.bind(inner);
  inner.placeOrder = async (req: PlaceOrderRequest) => {
    placed.push(req);
    return placeOrder(req);
  };

  const feed = new PaperFeed();
  feed.subscribe(SYMBOL, "ticker", (tick) => paper.observe(tick));

  const risk = new RiskManager(riskConfig, {
    symbols: { [SYMBOL]: { basePositionSize: 1, maxPositionSize: 2, contractValue: 1 } },
    leverage: 5,
    initialEquity: 10_000,
    now: () => NOW
  });

  const gateway = overrides.gateway ?? paperGateway(inner);

  const current = { signal: LONG };
  const strategy: SignalStrategy = {
    variant: "directional",
    minWindow: 1,
    evaluate: () => current.signal
  };

  const tracker = new PositionTracker();
  const trades: TradeRecord[] = [];
  const engine = new ExecutionEngine({ ...settings, ...overrides.settings }, {
    strategy,
    risk,
    gateway,
    feed,
    tracker,
    onTrade: (record) => trades.push(record),
    now: () => NOW
  });

  async function push(price: number) {
    feed.push({ symbol: SYMBOL, ts: NOW, price, volume: 1 });
    await engine.whenIdle();
  }

  return { paper, placed, feed, risk, tracker, engine, trades, current, push };
}

test("entry fill opens a position with protective levels and confirms the slot", async () => {
  const { feed, risk, tracker, engine, placed, push } = setup();
  await engine.start();
  await feed.connect();
  await push(2000);

  const position = tracker.get(SYMBOL);
  assert.equal(position?.side, "long");
  assert.equal(position?.size, 1);
  assert.equal(position?.entryPrice, 2000);
  close(position?.stopLossPrice, 1960);
  close(position?.takeProfitPrice, 2200);

  assert.equal(placed.length, 1);
  assert.equal(placed[0]?.side, "buy");
  assert.equal(placed[0]?.reduceOnly, false);

  const state = risk.snapshot();
  assert.deepEqual(state.openSymbols, [SYMBOL]);
  assert.deepEqual(state.reservedSymbols, []);
  assert.deepEqual(state.tradeTimestamps, [NOW]);
  await engine.stop();
});

test("no entries while the feed is disconnected, resumed on reconnect", async () => {
  const { feed, tracker, engine, placed, push } = setup();
  await engine.start();

  await push(2000);
  assert.equal(placed.length, 0);
  assert.equal(tracker.get(SYMBOL), null);

  await feed.connect();
  await engine.whenIdle();
  assert.equal(placed.length, 1);
  assert.equal(tracker.get(SYMBOL)?.side, "long");
});

test("signals below the strength threshold are ignored", async () => {
  const { feed, engine, placed, current, push } = setup();
  current.signal = { direction: "long", strength: 40, breakdown: {} };
  await engine.start();
  await feed.connect();
  await push(2000);
  assert.equal(placed.length, 0);
});

test("round trip through the trailing stop records exactly one trade result", async () => {
  const { feed, risk, tracker, engine, placed, trades, current, push } = setup();
  await engine.start();
  await feed.connect();
  await push(2000);
  current.signal = FLAT;

  await push(2050);
  const armed = tracker.get(SYMBOL);
  assert.equal(armed?.trailing.active, true);
  assert.equal(armed?.trailing.anchorPrice, 2050);

  await push(2100);
  assert.equal(tracker.get(SYMBOL)?.trailing.anchorPrice, 2100);

  await push(2070);

  assert.equal(tracker.get(SYMBOL), null);
  assert.equal(placed.length, 2);
  assert.equal(placed.filter((req) => req.reduceOnly).length, 1);
  assert.equal(placed[1]?.side, "sell");

  assert.equal(trades.length, 1);
  assert.equal(trades[0]?.reason, "trailing_stop");
  assert.equal(trades[0]?.pnl, 70);

  const state = risk.snapshot();
  assert.deepEqual(state.recentPnls, [70]);
  assert.equal(state.consecutiveWins, 1);
  assert.deepEqual(state.openSymbols, []);
});

test("stop loss closes a losing short", async () => {
  const { feed, risk, engine, trades, current, push } = setup();
  current.signal = { direction: "short", strength: 90, breakdown: {} };
  await engine.start();
  await feed.connect();
  await push(2000);
  current.signal = FLAT;

  await push(2040);

  assert.equal(trades.length, 1);
  assert.equal(trades[0]?.side, "short");
  assert.equal(trades[0]?.reason, "stop_loss");
  assert.equal(trades[0]?.pnl, -40);
  assert.equal(risk.snapshot().consecutiveLosses, 1);
});

test("exhausted retries leave no position and release the reservation", async () => {
  let attempts = 0;
  const flaky: OrderTransport = {
    name: "flaky",
    placeOrder: async () => {
      attempts += 1;
      throw new TransientGatewayError("exchange busy");
    },
    getOrder: async () => null,
    cancelOrder: async () => undefined,
    getPositions: async () => [],
    getBalance: async () => ({ equity: 10_000, available: 10_000 })
  };

  const { feed, risk, tracker, engine, push } = setup({ transport: flaky });
  await engine.start();
  await feed.connect();
  await push(2000);

  assert.equal(attempts, 3);
  assert.equal(tracker.get(SYMBOL), null);
  const state = risk.snapshot();
  assert.deepEqual(state.openSymbols, []);
  assert.deepEqual(state.reservedSymbols, []);
  assert.deepEqual(state.tradeTimestamps, []);
});

test("emergency stop flags the exit instead of submitting it", async () => {
  const { feed, risk, tracker, engine, placed, current, push } = setup();
  await engine.start();
  await feed.connect();
  await push(2000);
  current.signal = FLAT;

  risk.forceEmergencyStop("operator");
  await push(1950);

  assert.equal(placed.length, 1);
  assert.equal(tracker.get(SYMBOL)?.attentionRequired, true);
  assert.deepEqual(risk.snapshot().recentPnls, []);

  await engine.stop();
  assert.equal(placed.length, 1);
  assert.equal(engine.currentPhase, "stopped");
  assert.equal(feed.subscriberCount(SYMBOL), 1);
});

test("emergency stop blocks new entries", async () => {
  const { feed, risk, engine, placed, push } = setup();
  risk.forceEmergencyStop("operator");
  await engine.start();
  await feed.connect();
  await push(2000);
  assert.equal(placed.length, 0);
});

test("start adopts an existing exchange position", async () => {
  const { paper, risk, tracker, engine } = setup();
  paper.setPrice(SYMBOL, 2000);
  await paper.placeOrder({ clientOrderId: "manual1", symbol: SYMBOL, side: "sell", type: "market", size: 2, reduceOnly: false });

  await engine.start();

  const adopted = tracker.get(SYMBOL);
  assert.equal(adopted?.side, "short");
  assert.equal(adopted?.size, 2);
  assert.equal(adopted?.leverage, 5);
  close(adopted?.stopLossPrice, 2040);
  close(adopted?.takeProfitPrice, 1800);

  const state = risk.snapshot();
  assert.deepEqual(state.openSymbols, [SYMBOL]);
  assert.deepEqual(state.tradeTimestamps, []);
});

test("stop closes the open position before leaving the feed", async () => {
  const { feed, tracker, engine, placed, trades, current, push } = setup();
  await engine.start();
  await feed.connect();
  await push(2000);
  current.signal = FLAT;
  await push(2010);

  await engine.stop();

  assert.equal(tracker.get(SYMBOL), null);
  assert.equal(placed.length, 2);
  assert.equal(trades[0]?.reason, "shutdown");
  assert.equal(trades[0]?.pnl, 10);
  assert.equal(feed.subscriberCount(SYMBOL), 1);
});

function fillOf(order: Order, fillPrice: number, filledSize = order.size): OrderResult {
  return {
    kind: "filled",
    order,
    fill: { idempotencyKey: order.idempotencyKey, exchangeOrderId: "ex-1", fillPrice, filledSize, filledAt: NOW },
    replayed: false
  };
}

function stubGateway(script: {
  submit: (order: Order) => Promise<OrderResult>;
  resolve?: (order: Order) => OrderResult;
}) {
  const submitted: Order[] = [];
  const resolved: string[] = [];
  const cancels: string[] = [];
  const gateway: OrderGateway = {
    submit: (order) => {
      submitted.push(order);
      return script.submit(order);
    },
    resolve: async (order) => {
      resolved.push(order.idempotencyKey);
      return script.resolve ? script.resolve(order) : { kind: "unresolved", order, reason: "no answer" };
    },
    cancel: async (key) => {
      cancels.push(key);
      return true;
    },
    openOrders: () => [...submitted],
    queryPositions: async () => [],
    queryBalance: async () => ({ equity: 10_000, available: 10_000 })
  };
  return { gateway, submitted, resolved, cancels };
}

test("stop gives up on a submission that never returns once the shutdown deadline passes", async () => {
  const stub = stubGateway({ submit: () => new Promise<OrderResult>(() => undefined) });
  const { feed, engine } = setup({ gateway: stub.gateway, settings: { shutdownTimeoutMs: 100 } });
  await engine.start();
  await feed.connect();
  feed.push({ symbol: SYMBOL, ts: NOW, price: 2000, volume: 1 });
  await new Promise<void>((resolve) => setImmediate(resolve));
  assert.equal(stub.submitted.length, 1);

  const startedAt = Date.now();
  await engine.stop();

  assert.ok(Date.now() - startedAt < 1_000);
  assert.equal(engine.currentPhase, "stopped");
  assert.deepEqual(stub.cancels, [stub.submitted[0]?.idempotencyKey]);
  assert.equal(engine.status().lastError, "ETH-USDT-SWAP shutdown did not finish within 100ms");
  assert.equal(feed.subscriberCount(SYMBOL), 1);
});

test("a second stop call shares the first one's shutdown", async () => {
  const { feed, engine, placed, push } = setup();
  await engine.start();
  await feed.connect();
  await push(2000);

  const first = engine.stop();
  const second = engine.stop();
  assert.equal(first, second);
  await second;

  assert.equal(placed.length, 2);
  assert.equal(engine.currentPhase, "stopped");
  assert.equal(engine.stop(), first);
});

test("exits still go out while the risk manager is cooling down", async () => {
  const { feed, risk, tracker, engine, placed, trades, current, push } = setup();
  await engine.start();
  await feed.connect();
  await push(2000);
  current.signal = FLAT;

  for (let i = 0; i < riskConfig.maxConsecutiveLosses; i += 1) {
    risk.recordTradeResult({ symbol: "BTC-USDT-SWAP", pnl: -1 });
  }
  assert.equal(risk.currentMode, "cooldown");

  await push(1950);

  assert.equal(placed.length, 2);
  assert.equal(placed[1]?.reduceOnly, true);
  assert.equal(tracker.get(SYMBOL), null);
  assert.equal(trades[0]?.reason, "stop_loss");
  assert.equal(trades[0]?.pnl, -50);
  assert.deepEqual(risk.snapshot().openSymbols, []);
});

for (const limit of [
  { name: "open position cap", overrides: { maxOpenPositions: 1 } },
  { name: "hourly trade cap", overrides: { maxHourlyTrades: 1 } }
]) {
  test(`engines sharing one risk manager respect the ${limit.name}`, async () => {
    const symbols: FuturesSymbol[] = [SYMBOL, "BTC-USDT-SWAP"];
    const paper = new PaperTransport({ initialBalance: 10_000, leverage: 5 });
    const feed = new PaperFeed();
    for (const symbol of symbols) feed.subscribe(symbol, "ticker", (tick) => paper.observe(tick));

    const limits = { basePositionSize: 1, maxPositionSize: 2, contractValue: 1 };
    const risk = new RiskManager(
      { ...riskConfig, ...limit.overrides },
      {
        symbols: { [SYMBOL]: limits, "BTC-USDT-SWAP": limits },
        leverage: 5,
        initialEquity: 10_000,
        now: () => NOW
      }
    );
    const gateway = paperGateway(paper);
    const tracker = new PositionTracker();
    const strategy: SignalStrategy = { variant: "directional", minWindow: 1, evaluate: () => LONG };
    const engines = symbols.map(
      (symbol) => new ExecutionEngine({ ...settings, symbol }, { strategy, risk, gateway, feed, tracker, now: () => NOW })
    );

    for (const engine of engines) await engine.start();
    await feed.connect();
    feed.push({ symbol: SYMBOL, ts: NOW, price: 2000, volume: 1 });
    feed.push({ symbol: "BTC-USDT-SWAP", ts: NOW, price: 40_000, volume: 1 });
    await Promise.all(engines.map((engine) => engine.whenIdle()));

    feed.push({ symbol: "BTC-USDT-SWAP", ts: NOW, price: 40_100, volume: 1 });
    await Promise.all(engines.map((engine) => engine.whenIdle()));

    assert.deepEqual(
      tracker.list().map((position) => position.symbol),
      [SYMBOL]
    );
    const state = risk.snapshot();
    assert.deepEqual(state.openSymbols, [SYMBOL]);
    assert.deepEqual(state.reservedSymbols, []);
    assert.deepEqual(state.tradeTimestamps, [NOW]);
  });
}

test("an unresolved entry holds its slot until the gateway settles it", async () => {
  let answers = 0;
  const stub = stubGateway({
    submit: async (order) => ({ kind: "unresolved", order, reason: "cancel failed: network reset" }),
    resolve: (order) => {
      answers += 1;
      return answers < 2 ? { kind: "unresolved", order, reason: "still live" } : fillOf(order, 2000);
    }
  });
  const { feed, risk, tracker, engine, push } = setup({ gateway: stub.gateway });
  await engine.start();
  await feed.connect();

  await push(2000);
  assert.equal(tracker.get(SYMBOL), null);
  assert.deepEqual(risk.snapshot().reservedSymbols, [SYMBOL]);

  await push(2001);
  assert.equal(stub.submitted.length, 1);
  assert.deepEqual(risk.snapshot().reservedSymbols, [SYMBOL]);

  await push(2002);
  assert.equal(stub.resolved.length, 2);
  assert.equal(stub.submitted.length, 1);
  assert.equal(tracker.get(SYMBOL)?.entryPrice, 2000);
  const state = risk.snapshot();
  assert.deepEqual(state.reservedSymbols, []);
  assert.deepEqual(state.openSymbols, [SYMBOL]);
  assert.deepEqual(state.tradeTimestamps, [NOW]);
});

test("an unresolved entry that ends without a fill frees the slot", async () => {
  const stub = stubGateway({
    submit: async (order) => ({ kind: "unresolved", order, reason: "cancel failed: network reset" }),
    resolve: (order) => ({ kind: "exhausted", order, attempts: 4, lastError: "outcome unresolved" })
  });
  const { feed, risk, tracker, engine, current, push } = setup({ gateway: stub.gateway });
  await engine.start();
  await feed.connect();
  await push(2000);
  current.signal = FLAT;

  await push(2001);
  assert.equal(tracker.get(SYMBOL), null);
  const state = risk.snapshot();
  assert.deepEqual(state.reservedSymbols, []);
  assert.deepEqual(state.openSymbols, []);
  assert.deepEqual(state.tradeTimestamps, []);
});

test("a partially filled exit records one trade once the rest is closed", async () => {
  const exits = [
    { price: 1950, size: 0.4 },
    { price: 1940, size: 0.6 }
  ];
  const stub = stubGateway({
    submit: async (order) => {
      if (!order.reduceOnly) return fillOf(order, 2000);
      const next = exits.shift();
      return next ? fillOf(order, next.price, next.size) : { kind: "rejected", order, reason: "unexpected exit" };
    }
  });
  const { feed, risk, tracker, engine, trades, current, push } = setup({ gateway: stub.gateway });
  await engine.start();
  await feed.connect();
  await push(2000);
  current.signal = FLAT;

  await push(1950);
  close(tracker.get(SYMBOL)?.size, 0.6);
  assert.equal(trades.length, 0);
  assert.deepEqual(risk.snapshot().recentPnls, []);

  await push(1940);
  assert.equal(tracker.get(SYMBOL), null);
  close(stub.submitted[2]?.size, 0.6);
  assert.equal(trades.length, 1);
  close(trades[0]?.size, 1);
  close(trades[0]?.pnl, -56);
  close(trades[0]?.exitPrice, 1944);
  assert.equal(trades[0]?.reason, "stop_loss");
  assert.equal(risk.snapshot().recentPnls.length, 1);
});
