import assert from "node:assert/strict";
import type { Server } from "node:http";
import test from "node:test";
import { silentLogger, type Signal } from "@perp/futures-core";
import { TradingSupervisor, type EngineSettings } from "@perp/futures-engine";
import { ManagedOrderGateway, PaperFeed, PaperTransport, RateLimiter } from "@perp/futures-exchange";
import { RiskManager } from "@perp/risk";
import type { SignalStrategy } from "@perp/strategies";
import { handleOperatorRequest, startOperatorServer } from "./health.js";
import { serveOperator } from "./runner.js";

const ETH = "ETH-USDT-SWAP";
const NOW = Date.UTC(2026, 0, 5, 10, 0, 0);
const STARTED_AT = NOW - 500;

const market: EngineSettings = {
  symbol: ETH,
  leverage: 5,
  marginMode: "cross",
  minSignalStrength: 50,
  windowSize: 10,
  evaluationIntervalMs: 0,
  contractValue: 1,
  lotSize: 0,
  shutdownTimeoutMs: 1_000,
  exits: { stopLoss: 0.02, takeProfit: 0.1, trailingEnabled: false, trailingTrigger: 0.02, trailingDistance: 0.01 }
};

async function startedSupervisor() {
  const paper = new PaperTransport({ initialBalance: 5_000, leverage: 5 });
  const risk = new RiskManager(
    {
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
    },
    {
      symbols: { [ETH]: { basePositionSize: 1, maxPositionSize: 2, contractValue: 1 } },
      leverage: 5,
      initialEquity: 5_000,
      now: () => NOW
    }
  );
  const signal: Signal = { direction: "flat", strength: 0, breakdown: {} };
  const strategy: SignalStrategy = { variant: "directional", minWindow: 1, evaluate: () => signal };

  const supervisor = new TradingSupervisor({
    markets: [market],
    strategy,
    risk,
    gateway: new ManagedOrderGateway(paper, { rateLimiter: new RateLimiter({ limit: 1_000 }), now: () => NOW }),
    feed: new PaperFeed(),
    balanceSyncMs: 0,
    now: () => NOW
  });
  await supervisor.start();
  return supervisor;
}

function request(method: string, path: string, body = "") {
  return { method, path, body };
}

test("health reports feed, risk mode and uptime", async () => {
  const supervisor = await startedSupervisor();
  const response = await handleOperatorRequest(supervisor, request("GET", "/health"), STARTED_AT, NOW);

  assert.deepEqual(response, {
    status: 200,
    body: { ok: true, service: "runner", uptimeMs: 500, feed: "connected", riskMode: "normal", openPositions: 0 }
  });
  await supervisor.stop();
});

test("status returns the supervisor snapshot", async () => {
  const supervisor = await startedSupervisor();
  const response = await handleOperatorRequest(supervisor, request("GET", "/status"), STARTED_AT, NOW);

  assert.equal(response.status, 200);
  assert.equal(response.body.running, true);
  assert.equal(response.body.feed, "connected");
  assert.deepEqual(response.body.positions, []);
  await supervisor.stop();
});

test("unknown paths and wrong methods are rejected", async () => {
  const supervisor = await startedSupervisor();

  assert.deepEqual(await handleOperatorRequest(supervisor, request("GET", "/metrics"), STARTED_AT, NOW), {
    status: 404,
    body: { error: "not_found" }
  });
  assert.deepEqual(await handleOperatorRequest(supervisor, request("POST", "/health"), STARTED_AT, NOW), {
    status: 405,
    body: { error: "method_not_allowed" }
  });
  assert.deepEqual(await handleOperatorRequest(supervisor, request("GET", "/emergency-stop"), STARTED_AT, NOW), {
    status: 405,
    body: { error: "method_not_allowed" }
  });
  assert.equal(supervisor.status().risk.mode, "normal");
  await supervisor.stop();
});

test("emergency stop validates its body", async () => {
  const supervisor = await startedSupervisor();

  assert.deepEqual(await handleOperatorRequest(supervisor, request("POST", "/emergency-stop", "{oops"), STARTED_AT, NOW), {
    status: 400,
    body: { error: "invalid_json" }
  });
  assert.deepEqual(
    await handleOperatorRequest(supervisor, request("POST", "/emergency-stop", '{"reason":"  "}'), STARTED_AT, NOW),
    { status: 400, body: { error: "invalid_body" } }
  );
  assert.equal(supervisor.status().risk.mode, "normal");
  await supervisor.stop();
});

test("emergency stop and reset round trip", async () => {
  const supervisor = await startedSupervisor();

  const stopped = await handleOperatorRequest(
    supervisor,
    request("POST", "/emergency-stop", '{"reason":"maintenance"}'),
    STARTED_AT,
    NOW
  );
  assert.deepEqual(stopped, { status: 200, body: { ok: true, riskMode: "emergency_stop" } });
  assert.equal(supervisor.status().risk.emergencyReason, "maintenance");

  const health = await handleOperatorRequest(supervisor, request("GET", "/health"), STARTED_AT, NOW);
  assert.equal(health.body.ok, false);

  const reset = await handleOperatorRequest(supervisor, request("POST", "/reset-emergency-stop"), STARTED_AT, NOW);
  assert.deepEqual(reset, { status: 200, body: { ok: true, riskMode: "normal" } });
  await supervisor.stop();
});

test("emergency stop without a body uses the default reason", async () => {
  const supervisor = await startedSupervisor();
  await handleOperatorRequest(supervisor, request("POST", "/emergency-stop"), STARTED_AT, NOW);
  assert.equal(supervisor.status().risk.emergencyReason, "operator request");
  await supervisor.stop();
});

test("clear cooldown is a no-op outside cooldown", async () => {
  const supervisor = await startedSupervisor();
  assert.deepEqual(await handleOperatorRequest(supervisor, request("POST", "/clear-cooldown"), STARTED_AT, NOW), {
    status: 200,
    body: { ok: true, riskMode: "normal" }
  });
  await supervisor.stop();
});

function closeServer(server: Server) {
  return new Promise<void>((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

async function occupiedPort(supervisor: TradingSupervisor) {
  const server = await startOperatorServer(supervisor, { port: 0, host: "127.0.0.1" });
  const address = server.address();
  assert.ok(address !== null && typeof address === "object");
  return { server, port: address.port };
}

test("starting the operator server on a port in use rejects", async () => {
  const supervisor = await startedSupervisor();
  const { server, port } = await occupiedPort(supervisor);

  await assert.rejects(startOperatorServer(supervisor, { port, host: "127.0.0.1" }), { code: "EADDRINUSE" });

  await closeServer(server);
  await supervisor.stop();
});

test("a failed operator server start stops the supervisor", async () => {
  const supervisor = await startedSupervisor();
  const { server, port } = await occupiedPort(supervisor);

  await assert.rejects(
    serveOperator(supervisor, { port, host: "127.0.0.1", logger: silentLogger }),
    { code: "EADDRINUSE" }
  );
  assert.equal(supervisor.status().running, false);

  await closeServer(server);
});
