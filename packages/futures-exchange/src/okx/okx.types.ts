import { z } from "zod";

export type HttpMethod = "GET" | "POST";

export type OkxCredentials = {
  apiKey: string;
  secretKey: string;
  passphrase: string;
};

export type OkxLogEntry = {
  at: string;
  endpoint: string;
  method: HttpMethod;
  durationMs: number;
  status?: number;
  code?: string;
  ok: boolean;
  message?: string;
};

export type OkxClientConfig = {
  credentials?: OkxCredentials;
  restBaseUrl?: string;
  /** Demo trading: adds the `x-simulated-trading: 1` header. */
  simulated?: boolean;
  timeoutMs?: number;
  log?: (entry: OkxLogEntry) => void;
};

const numeric = z
  .union([z.string(), z.number()])
  .transform((value) => (value === "" ? Number.NaN : Number(value)));

export const okxEnvelopeSchema = z.object({
  code: z.string(),
  msg: z.string().optional().default(""),
  data: z.unknown().optional()
});

export const okxOrderAckSchema = z.object({
  ordId: z.string().optional().default(""),
  clOrdId: z.string().optional().default(""),
  sCode: z.string().optional().default("0"),
  sMsg: z.string().optional().default("")
});

export const okxOrderSchema = z.object({
  ordId: z.string(),
  clOrdId: z.string().optional().default(""),
  instId: z.string(),
  state: z.string(),
  avgPx: numeric.optional(),
  accFillSz: numeric.optional(),
  cancelSource: z.string().optional()
});

export const okxPositionSchema = z.object({
  instId: z.string(),
  pos: numeric,
  posSide: z.string().optional().default("net"),
  avgPx: numeric,
  lever: numeric.optional(),
  upl: numeric.optional()
});

export const okxBalanceSchema = z.object({
  totalEq: numeric,
  details: z
    .array(
      z.object({
        ccy: z.string(),
        eq: numeric.optional(),
        availBal: numeric.optional(),
        availEq: numeric.optional()
      })
    )
    .default([])
});

export const okxTickerSchema = z.object({
  instId: z.string(),
  last: numeric,
  lastSz: numeric.optional(),
  ts: numeric
});

export type OkxOrderAck = z.infer<typeof okxOrderAckSchema>;
export type OkxOrder = z.infer<typeof okxOrderSchema>;
export type OkxPosition = z.infer<typeof okxPositionSchema>;
export type OkxBalance = z.infer<typeof okxBalanceSchema>;
export type OkxTicker = z.infer<typeof okxTickerSchema>;

export const okxWsTickerFrameSchema = z.object({
  arg: z.object({ channel: z.string(), instId: z.string() }),
  data: z.array(okxTickerSchema)
});

export const okxWsEventSchema = z.object({
  event: z.string(),
  code: z.string().optional(),
  msg: z.string().optional()
});
