import assert from "node:assert/strict";
import test from "node:test";
import { SymbolUnknownError, type Signal } from "@perp/futures-core";
import { RiskManager, type RiskConfig, type RiskEvent } from "./risk-manager.js";

const baseConfig: RiskConfig = {
  maxOpenPositions: 3,
  maxHourlyTrades: 10,
  maxConsecutiveLosses: 5,
  cooldownMs: 30 * 60 * 1000,
  maxDailyLoss: 100,
  maxDrawdown: 0.5,
  winRateWindow: 10,
  minTradesForWinRate: 5,
  winRateThreshold: 0.5,
  highWinRateThreshold: 0.6,
  winStreakForIncrease: 3,
  increaseFactor: 1.2,
  decreaseFactor: 0.5
};

const limits = { basePositionSize: 1, maxPositionSize: 5, contractValue: 1 };

const LONG: Signal = { direction: "long", strength: 80, breakdown: {} };
const SHORT: Signal = { direction: "short", strength: 90, breakdown: {} };
const FLAT: Signal = { direction: "flat", strength: 0, breakdown: {} };

function setup(overrides: Partial<RiskConfig> = {}) {
  const clock = { now: Date.UTC(2026, 0, 5, 10, 0, 0) };
  const events: RiskEvent[] = [];
  const risk = new RiskManager(
    { ...baseConfig, ...overrides },
    {
      symbols: {
        "ETH-USDT-SWAP": limits,
        "BTC-USDT-SWAP": limits,
        "SOL-USDT-SWAP": limits,
        "XRP-USDT-SWAP": { basePositionSize: 10, maxPositionSize: 5, contractValue: 1 }
      },
      leverage: 10,
      initialEquity: 1000,
      now: () => clock.now,
      emitRiskEvent: (event) => events.push(event)
    }
  );
  return { risk, clock, events };
}

test("a winning trade resets the loss streak immediately", () => {
  const { risk } = setup();
  risk.recordTradeResult({ symbol: "ETH-USDT-SWAP", pnl: -1 });
  risk.recordTradeResult({ symbol: "ETH-USDT-SWAP", pnl: -1 });
  assert.equal(risk.snapshot().consecutiveLosses, 2);

  risk.recordTradeResult({ symbol: "ETH-USDT-SWAP", pnl: 3 });
  const state = risk.snapshot();
  assert.equal(state.consecutiveLosses, 0);
  assert.equal(state.consecutiveWins, 1);
});

test("a zero PnL trade leaves both streaks alone", () => {
  const { risk } = setup();
  risk.recordTradeResult({ symbol: "ETH-USDT-SWAP", pnl: -1 });
  risk.recordTradeResult({ symbol: "ETH-USDT-SWAP", pnl: 0 });
  assert.equal(risk.snapshot().consecutiveLosses, 1);
  assert.equal(risk.snapshot().consecutiveWins, 0);
});

test("five losses start a cooldown that expires lazily", () => {
  const { risk, clock, events } = setup();
  for (let i = 0; i < 5; i += 1) risk.recordTradeResult({ symbol: "ETH-USDT-SWAP", pnl: -1 });

  assert.equal(risk.currentMode, "cooldown");
  assert.equal(risk.snapshot().cooldownUntil, clock.now + baseConfig.cooldownMs);
  assert.equal(events.at(-1)?.type, "COOLDOWN_STARTED");

  clock.now += baseConfig.cooldownMs - 1;
  const blocked = risk.canOpenPosition(LONG, "ETH-USDT-SWAP");
  assert.equal(blocked.ok, false);
  assert.equal(blocked.ok ? null : blocked.reason, "cooldown");

  clock.now += 1;
  assert.deepEqual(risk.canOpenPosition(LONG, "ETH-USDT-SWAP"), { ok: true });
  assert.equal(risk.currentMode, "normal");
  assert.equal(risk.snapshot().consecutiveLosses, 0);
  assert.equal(events.at(-1)?.type, "COOLDOWN_ENDED");
});

test("clearCooldown returns to normal at once", () => {
  const { risk } = setup({ maxConsecutiveLosses: 1 });
  risk.recordTradeResult({ symbol: "ETH-USDT-SWAP", pnl: -1 });
  assert.equal(risk.currentMode, "cooldown");

  risk.clearCooldown();
  assert.equal(risk.currentMode, "normal");
  assert.equal(risk.canOpenPosition(SHORT, "ETH-USDT-SWAP").ok, true);
});

test("reaching the daily loss limit trips the emergency stop", () => {
  const { risk, events } = setup();
  risk.recordTradeResult({ symbol: "ETH-USDT-SWAP", pnl: -60 });
  assert.equal(risk.currentMode, "normal");

  risk.recordTradeResult({ symbol: "BTC-USDT-SWAP", pnl: -40 });
  assert.equal(risk.currentMode, "emergency_stop");
  assert.equal(events.at(-1)?.type, "EMERGENCY_STOP");

  for (const signal of [LONG, SHORT, FLAT]) {
    for (const symbol of ["ETH-USDT-SWAP", "SOL-USDT-SWAP"]) {
      const decision = risk.canOpenPosition(signal, symbol);
      assert.equal(decision.ok ? null : decision.reason, "emergency_stop");
    }
  }
});

test("daily PnL rolls over at the UTC day boundary", () => {
  const { risk, clock, events } = setup();
  risk.recordTradeResult({ symbol: "ETH-USDT-SWAP", pnl: -60 });

  clock.now = Date.UTC(2026, 0, 6, 0, 0, 1);
  risk.recordTradeResult({ symbol: "ETH-USDT-SWAP", pnl: -60 });

  const state = risk.snapshot();
  assert.equal(state.mode, "normal");
  assert.equal(state.dailyPnl, -60);
  assert.equal(state.dayKey, "2026-01-06");
  assert.ok(events.some((event) => event.type === "DAY_ROLLOVER"));
});

test("drawdown from the equity peak trips the emergency stop", () => {
  const { risk } = setup();
  risk.updateEquity(1200);
  assert.equal(risk.snapshot().peakEquity, 1200);

  risk.updateEquity(600);
  const state = risk.snapshot();
  assert.equal(state.drawdown, 0.5);
  assert.equal(state.mode, "emergency_stop");
  assert.match(state.emergencyReason ?? "", /Drawdown limit reached: 50.00%/);
});

test("emergency stop holds until the operator resets it", () => {
  const { risk } = setup();
  risk.forceEmergencyStop("operator");
  assert.equal(risk.canOpenPosition(LONG, "ETH-USDT-SWAP").ok, false);

  risk.clearCooldown();
  assert.equal(risk.currentMode, "emergency_stop");

  risk.resetEmergencyStop();
  assert.equal(risk.currentMode, "normal");
  assert.equal(risk.snapshot().emergencyReason, null);
  assert.equal(risk.canOpenPosition(LONG, "ETH-USDT-SWAP").ok, true);
});

test("reservations count toward the global cap", () => {
  const { risk } = setup();
  assert.equal(risk.reserveEntry(LONG, "ETH-USDT-SWAP").ok, true);
  assert.equal(risk.reserveEntry(LONG, "BTC-USDT-SWAP").ok, true);
  assert.equal(risk.reserveEntry(SHORT, "SOL-USDT-SWAP").ok, true);

  const full = risk.reserveEntry(LONG, "XRP-USDT-SWAP");
  assert.equal(full.ok ? null : full.reason, "max_open_positions");

  const busy = risk.reserveEntry(LONG, "ETH-USDT-SWAP");
  assert.equal(busy.ok ? null : busy.reason, "symbol_busy");

  risk.releaseEntry("SOL-USDT-SWAP");
  assert.equal(risk.reserveEntry(LONG, "XRP-USDT-SWAP").ok, true);
  assert.deepEqual(risk.snapshot().reservedSymbols, ["ETH-USDT-SWAP", "BTC-USDT-SWAP", "XRP-USDT-SWAP"]);
});

test("confirmed entries fill the hourly window", () => {
  const { risk, clock } = setup({ maxHourlyTrades: 2 });

  for (let i = 0; i < 2; i += 1) {
    assert.equal(risk.reserveEntry(LONG, "ETH-USDT-SWAP").ok, true);
    risk.confirmEntry("ETH-USDT-SWAP");
    assert.deepEqual(risk.snapshot().openSymbols, ["ETH-USDT-SWAP"]);
    risk.recordTradeResult({ symbol: "ETH-USDT-SWAP", pnl: 1 });
    clock.now += 60_000;
  }

  const limited = risk.canOpenPosition(LONG, "ETH-USDT-SWAP");
  assert.equal(limited.ok ? null : limited.reason, "hourly_limit");

  clock.now += 60 * 60 * 1000;
  assert.equal(risk.canOpenPosition(LONG, "ETH-USDT-SWAP").ok, true);
});

test("pending reservations count against the hourly window", () => {
  const { risk } = setup({ maxHourlyTrades: 2 });
  risk.reserveEntry(LONG, "ETH-USDT-SWAP");
  risk.confirmEntry("ETH-USDT-SWAP");
  assert.equal(risk.reserveEntry(LONG, "BTC-USDT-SWAP").ok, true);

  const limited = risk.reserveEntry(SHORT, "SOL-USDT-SWAP");
  assert.equal(limited.ok ? null : limited.message, "Hourly trade limit reached: 2");

  risk.releaseEntry("BTC-USDT-SWAP");
  assert.equal(risk.reserveEntry(SHORT, "SOL-USDT-SWAP").ok, true);
});

test("flat signals are rejected", () => {
  const { risk } = setup();
  const decision = risk.canOpenPosition(FLAT, "ETH-USDT-SWAP");
  assert.equal(decision.ok ? null : decision.reason, "flat_signal");
});

test("a 60% win rate scales the base size by the increase factor", () => {
  const { risk } = setup();
  for (const pnl of [10, -5, 10, -5, 10]) risk.recordTradeResult({ symbol: "ETH-USDT-SWAP", pnl });

  assert.equal(risk.sizingMultiplier(), 1.2);
  assert.equal(risk.sizePosition(LONG, { equity: 1020, available: 1000 }, "ETH-USDT-SWAP", 2000), 1.2);
});

test("a win rate below the threshold halves the size", () => {
  const { risk } = setup();
  for (const pnl of [-5, 10, -5, 10, -5]) risk.recordTradeResult({ symbol: "ETH-USDT-SWAP", pnl });

  assert.equal(risk.sizePosition(SHORT, { equity: 1005, available: 1000 }, "ETH-USDT-SWAP", 2000), 0.5);
});

test("three straight wins raise the size before the win rate is known", () => {
  const { risk } = setup();
  for (const pnl of [1, 1, 1]) risk.recordTradeResult({ symbol: "ETH-USDT-SWAP", pnl });
  assert.equal(risk.sizingMultiplier(), 1.2);
});

test("size stays within margin and the symbol maximum", () => {
  const { risk } = setup();

  // 100 available * 10x / 2000 = 0.5
  assert.equal(risk.sizePosition(LONG, { equity: 100, available: 100 }, "ETH-USDT-SWAP", 2000), 0.5);
  assert.equal(risk.sizePosition(LONG, { equity: 1000, available: 1000 }, "XRP-USDT-SWAP", 1), 5);
  assert.equal(risk.sizePosition(LONG, { equity: 0, available: 0 }, "ETH-USDT-SWAP", 2000), 0);
  assert.equal(risk.sizePosition(FLAT, { equity: 1000, available: 1000 }, "ETH-USDT-SWAP", 2000), 0);
  assert.throws(
    () => risk.sizePosition(LONG, { equity: 1000, available: 1000 }, "DOGE-USDT-SWAP", 1),
    SymbolUnknownError
  );
});
