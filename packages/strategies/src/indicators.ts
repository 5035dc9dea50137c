import { BollingerBands, MACD, RSI, SMA, Stochastic } from "technicalindicators";
import type { MarketWindow } from "@perp/futures-core";

export type MacdReading = { line: number; signal: number; hist: number };
export type KdjReading = { k: number; d: number; j: number };
export type BollingerReading = { upper: number; middle: number; lower: number };

export function toFinite(value: unknown): number | null {
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

function last<T>(series: T[]): T | undefined {
  return series[series.length - 1];
}

export function closesOf(window: MarketWindow): number[] {
  return window.ticks.map((tick) => tick.candle?.close ?? tick.price);
}

export function highsOf(window: MarketWindow): number[] {
  return window.ticks.map((tick) => tick.candle?.high ?? tick.price);
}

export function lowsOf(window: MarketWindow): number[] {
  return window.ticks.map((tick) => tick.candle?.low ?? tick.price);
}

export function smaLatest(values: number[], period: number): number | null {
  if (period <= 0 || values.length < period) return null;
  return toFinite(last(SMA.calculate({ period, values })));
}

export function rsiLatest(values: number[], period: number): number | null {
  if (values.length < period + 1) return null;
  return toFinite(last(RSI.calculate({ values, period })));
}

export function macdLatest(
  values: number[],
  periods: { fast: number; slow: number; signal: number }
): MacdReading | null {
  if (values.length < periods.slow + periods.signal) return null;
  const latest = last(
    MACD.calculate({
      values,
      fastPeriod: periods.fast,
      slowPeriod: periods.slow,
      signalPeriod: periods.signal,
      SimpleMAOscillator: false,
      SimpleMASignal: false
    })
  );

  const line = toFinite(latest?.MACD);
  const signal = toFinite(latest?.signal);
  const hist = toFinite(latest?.histogram);
  if (line === null || signal === null || hist === null) return null;
  return { line, signal, hist };
}

export function bollingerLatest(values: number[], period: number, stdDev: number): BollingerReading | null {
  if (values.length < period) return null;
  const latest = last(BollingerBands.calculate({ values, period, stdDev }));

  const upper = toFinite(latest?.upper);
  const middle = toFinite(latest?.middle);
  const lower = toFinite(latest?.lower);
  if (upper === null || middle === null || lower === null) return null;
  return { upper, middle, lower };
}

/** Stochastic %K/%D with J = 3K - 2D. */
export function kdjLatest(
  series: { high: number[]; low: number[]; close: number[] },
  periods: { period: number; signalPeriod: number }
): KdjReading | null {
  if (series.close.length < periods.period + periods.signalPeriod) return null;
  const latest = last(
    Stochastic.calculate({
      high: series.high,
      low: series.low,
      close: series.close,
      period: periods.period,
      signalPeriod: periods.signalPeriod
    })
  );

  const k = toFinite(latest?.k);
  const d = toFinite(latest?.d);
  if (k === null || d === null) return null;
  return { k, d, j: 3 * k - 2 * d };
}
