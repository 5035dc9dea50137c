import { z } from "zod";
import { OKX_DEFAULT_REST_BASE_URL, OKX_DEFAULT_TIMEOUT_MS, OKX_SUCCESS_CODE } from "./okx.constants.js";
import { OkxApiError } from "./okx.errors.js";
import { buildQueryString, buildRestHeaders, serializeBody } from "./okx.signing.js";
import { okxEnvelopeSchema, type HttpMethod, type OkxClientConfig, type OkxLogEntry } from "./okx.types.js";

const itemErrorSchema = z.array(z.object({ sCode: z.string(), sMsg: z.string().optional() }).passthrough());

function nowIso() {
  return new Date().toISOString();
}

function firstItemError(data: unknown): { code: string; message: string } | null {
  const parsed = itemErrorSchema.safeParse(data);
  if (!parsed.success) return null;
  const failed = parsed.data.find((item) => item.sCode !== OKX_SUCCESS_CODE);
  return failed ? { code: failed.sCode, message: failed.sMsg ?? "" } : null;
}

/** OKX v5 REST client. One HTTP round trip per call; no retries here. */
export class OkxRestClient {
  readonly baseUrl: string;
  readonly timeoutMs: number;

  constructor(private readonly config: OkxClientConfig = {}) {
    this.baseUrl = (config.restBaseUrl ?? OKX_DEFAULT_REST_BASE_URL).replace(/\/+$/, "");
    this.timeoutMs = config.timeoutMs ?? OKX_DEFAULT_TIMEOUT_MS;
  }

  get hasCredentials(): boolean {
    return Boolean(this.config.credentials);
  }

  private log(entry: Omit<OkxLogEntry, "at">): void {
    this.config.log?.({ at: nowIso(), ...entry });
  }

  async request<S extends z.ZodTypeAny>(params: {
    method: HttpMethod;
    endpoint: string;
    schema: S;
    query?: Record<string, unknown>;
    body?: unknown;
    privateAuth: boolean;
    signal?: AbortSignal;
  }): Promise<Array<z.output<S>>> {
    const startedAt = Date.now();
    const queryString = buildQueryString(params.query);
    const requestPath = `${params.endpoint}${queryString ? `?${queryString}` : ""}`;
    const body = params.method === "POST" ? serializeBody(params.body) : "";

    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (params.privateAuth) {
      const credentials = this.config.credentials;
      if (!credentials) {
        throw new OkxApiError("Missing OKX credentials", { endpoint: params.endpoint, method: params.method });
      }
      Object.assign(
        headers,
        buildRestHeaders({
          credentials,
          timestamp: nowIso(),
          method: params.method,
          requestPath,
          body,
          simulated: this.config.simulated
        })
      );
    } else if (this.config.simulated) {
      headers["x-simulated-trading"] = "1";
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    const forwardAbort = () => controller.abort();
    params.signal?.addEventListener("abort", forwardAbort, { once: true });

    try {
      const res = await fetch(`${this.baseUrl}${requestPath}`, {
        method: params.method,
        headers,
        body: params.method === "POST" ? body : undefined,
        signal: controller.signal
      });

      const text = await res.text();
      let json: unknown = {};
      if (text) {
        try {
          json = JSON.parse(text);
        } catch {
          throw new OkxApiError(`Non-JSON response (HTTP ${res.status})`, {
            endpoint: params.endpoint,
            method: params.method,
            status: res.status,
            responseBody: text.slice(0, 200)
          });
        }
      }

      const envelope = okxEnvelopeSchema.safeParse(json);
      if (!res.ok || !envelope.success || envelope.data.code !== OKX_SUCCESS_CODE) {
        const itemError = envelope.success ? firstItemError(envelope.data.data) : null;
        const code = itemError?.code ?? (envelope.success ? envelope.data.code : String(res.status));
        const message = itemError?.message || (envelope.success ? envelope.data.msg : "") || `HTTP ${res.status}`;
        throw new OkxApiError(message, {
          endpoint: params.endpoint,
          method: params.method,
          status: res.status,
          code,
          responseBody: json
        });
      }

      const items = z.array(params.schema).safeParse(envelope.data.data ?? []);
      if (!items.success) {
        throw new OkxApiError(`Unexpected response shape: ${items.error.issues[0]?.message ?? "invalid"}`, {
          endpoint: params.endpoint,
          method: params.method,
          status: res.status,
          responseBody: json
        });
      }

      this.log({
        endpoint: params.endpoint,
        method: params.method,
        durationMs: Date.now() - startedAt,
        status: res.status,
        code: OKX_SUCCESS_CODE,
        ok: true
      });
      return items.data;
    } catch (error) {
      this.log({
        endpoint: params.endpoint,
        method: params.method,
        durationMs: Date.now() - startedAt,
        status: error instanceof OkxApiError ? error.options.status : undefined,
        code: error instanceof OkxApiError ? error.options.code : undefined,
        ok: false,
        message: String(error)
      });
      throw error;
    } finally {
      clearTimeout(timeout);
      params.signal?.removeEventListener("abort", forwardAbort);
    }
  }
}
