import crypto from "node:crypto";
import type { HttpMethod, OkxCredentials } from "./okx.types.js";

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** JSON body with undefined fields dropped; the exact string is what gets signed and sent. */
export function serializeBody(value: unknown): string {
  if (value === undefined || value === null) return "";
  if (!isObject(value)) return JSON.stringify(value);

  const out: Record<string, unknown> = {};
  for (const [key, val] of Object.entries(value)) {
    if (val === undefined) continue;
    out[key] = val;
  }
  return JSON.stringify(out);
}

export function buildQueryString(query: Record<string, unknown> | undefined): string {
  if (!query) return "";
  return Object.entries(query)
    .filter(([, value]) => value !== undefined && value !== null && value !== "")
    .map(([key, value]) => `${key}=${encodeURIComponent(String(value))}`)
    .join("&");
}

export function buildPrehash(params: {
  timestamp: string;
  method: HttpMethod;
  requestPath: string;
  body?: string;
}): string {
  return `${params.timestamp}${params.method.toUpperCase()}${params.requestPath}${params.body ?? ""}`;
}

export function signRequest(params: {
  timestamp: string;
  method: HttpMethod;
  requestPath: string;
  body?: string;
  secretKey: string;
}): string {
  const prehash = buildPrehash(params);
  return crypto.createHmac("sha256", params.secretKey).update(prehash).digest("base64");
}

export function buildRestHeaders(params: {
  credentials: OkxCredentials;
  timestamp: string;
  method: HttpMethod;
  requestPath: string;
  body?: string;
  simulated?: boolean;
}): Record<string, string> {
  const headers: Record<string, string> = {
    "OK-ACCESS-KEY": params.credentials.apiKey,
    "OK-ACCESS-SIGN": signRequest({
      timestamp: params.timestamp,
      method: params.method,
      requestPath: params.requestPath,
      body: params.body,
      secretKey: params.credentials.secretKey
    }),
    "OK-ACCESS-TIMESTAMP": params.timestamp,
    "OK-ACCESS-PASSPHRASE": params.credentials.passphrase,
    "Content-Type": "application/json"
  };

  if (params.simulated) headers["x-simulated-trading"] = "1";
  return headers;
}
