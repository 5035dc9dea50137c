import { createServer, type IncomingMessage, type Server } from "node:http";
import { z } from "zod";
import { errorMessage, silentLogger, type Logger } from "@perp/futures-core";
import type { TradingSupervisor } from "@perp/futures-engine";

export type OperatorControls = Pick<
  TradingSupervisor,
  "status" | "forceEmergencyStop" | "clearCooldown" | "resetEmergencyStop"
>;

export type OperatorResponse = {
  status: number;
  body: Record<string, unknown>;
};

const emergencyStopBodySchema = z.object({
  reason: z.string().trim().min(1).max(200).optional()
});

const MAX_BODY_BYTES = 16 * 1024;

class RequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RequestError";
  }
}

function parseBody(raw: string): unknown {
  if (raw.trim() === "") return {};
  return JSON.parse(raw);
}

export async function handleOperatorRequest(
  controls: OperatorControls,
  request: { method: string; path: string; body: string },
  startedAt: number,
  now: number = Date.now()
): Promise<OperatorResponse> {
  const { method, path } = request;

  if (path === "/health") {
    if (method !== "GET") return { status: 405, body: { error: "method_not_allowed" } };
    const status = controls.status();
    return {
      status: 200,
      body: {
        ok: status.running && status.risk.mode !== "emergency_stop",
        service: "runner",
        uptimeMs: now - startedAt,
        feed: status.feed,
        riskMode: status.risk.mode,
        openPositions: status.positions.length
      }
    };
  }

  if (path === "/status") {
    if (method !== "GET") return { status: 405, body: { error: "method_not_allowed" } };
    return { status: 200, body: { ...controls.status() } };
  }

  const actions: Record<string, () => Promise<void>> = {
    "/emergency-stop": async () => {
      let parsed: unknown;
      try {
        parsed = parseBody(request.body);
      } catch {
        throw new RequestError("invalid_json");
      }
      const body = emergencyStopBodySchema.safeParse(parsed);
      if (!body.success) throw new RequestError("invalid_body");
      await controls.forceEmergencyStop(body.data.reason ?? "operator request");
    },
    "/clear-cooldown": () => controls.clearCooldown(),
    "/reset-emergency-stop": () => controls.resetEmergencyStop()
  };

  const action = actions[path];
  if (!action) return { status: 404, body: { error: "not_found" } };
  if (method !== "POST") return { status: 405, body: { error: "method_not_allowed" } };

  try {
    await action();
  } catch (error) {
    if (error instanceof RequestError) return { status: 400, body: { error: error.message } };
    throw error;
  }
  return { status: 200, body: { ok: true, riskMode: controls.status().risk.mode } };
}

function readBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    let size = 0;
    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => {
      size += chunk.length;
      if (size > MAX_BODY_BYTES) {
        reject(new RequestError("body_too_large"));
        req.destroy();
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => resolve(Buffer.concat(chunks).toString("utf8")));
    req.on("error", reject);
  });
}

/** Resolves once the server listens; a bind failure such as a port in use rejects. */
export function startOperatorServer(
  controls: OperatorControls,
  options: { port: number; host?: string; logger?: Logger }
): Promise<Server> {
  const logger = (options.logger ?? silentLogger).child("http");
  const startedAt = Date.now();

  const server = createServer((req, res) => {
    const path = new URL(req.url ?? "/", "http://localhost").pathname;
    const method = req.method ?? "GET";

    readBody(req)
      .then((body) => handleOperatorRequest(controls, { method, path, body }, startedAt))
      .then((response) => {
        res.statusCode = response.status;
        res.setHeader("content-type", "application/json");
        res.end(JSON.stringify(response.body));
        if (method === "POST") logger.info("operator action", { path, status: response.status });
      })
      .catch((error: unknown) => {
        const status = error instanceof RequestError ? 413 : 500;
        logger.error("operator request failed", { path, error: errorMessage(error) });
        res.statusCode = status;
        res.setHeader("content-type", "application/json");
        res.end(JSON.stringify({ error: errorMessage(error) }));
      });
  });

  return new Promise<Server>((resolve, reject) => {
    server.once("error", reject);
    server.listen(options.port, options.host ?? "0.0.0.0", () => {
      server.off("error", reject);
      server.on("error", (error) => logger.error("operator server error", { error: errorMessage(error) }));
      logger.info("operator server listening", { port: options.port });
      resolve(server);
    });
  });
}
