import { flatSignal, type MarketWindow, type PositionSide, type Signal } from "@perp/futures-core";
import { closesOf, rsiLatest, smaLatest } from "./indicators.js";
import type { SignalStrategy } from "./strategy.interface.js";

export type TrendStrategyConfig = {
  variant: "trend";
  shortPeriod: number;
  longPeriod: number;
  rsiPeriod: number;
  timeFilter: boolean;
};

// UTC hours with the most volume: Asia afternoon, EU/US overlap, US close.
export function isActiveSession(ts: number): boolean {
  const hour = new Date(ts).getUTCHours();
  return (hour >= 12 && hour < 16) || hour >= 20 || hour < 2;
}

function maGapScore(gap: number): number {
  if (gap > 0.005) return 40;
  if (gap > 0.003) return 30;
  if (gap > 0.001) return 20;
  return 10;
}

function rsiScore(side: PositionSide, rsi: number | null): number {
  if (rsi === null) return 0;
  if (side === "long") {
    if (rsi < 30) return 30;
    if (rsi < 50) return 20;
    if (rsi < 70) return 10;
    return 0;
  }
  if (rsi > 70) return 30;
  if (rsi > 50) return 20;
  if (rsi > 30) return 10;
  return 0;
}

export function createTrendStrategy(config: TrendStrategyConfig): SignalStrategy {
  const minWindow = Math.max(config.longPeriod, config.rsiPeriod + 1);

  return {
    variant: "trend",
    minWindow,
    evaluate(window: MarketWindow): Signal {
      const lastTick = window.ticks[window.ticks.length - 1];
      if (!lastTick || window.ticks.length < minWindow) return flatSignal("insufficient_data");

      const closes = closesOf(window);
      const smaShort = smaLatest(closes, config.shortPeriod);
      const smaLong = smaLatest(closes, config.longPeriod);
      if (smaShort === null || smaLong === null) return flatSignal("insufficient_data");

      const price = lastTick.price;
      let side: PositionSide;
      if (smaShort > smaLong && price > smaShort) side = "long";
      else if (smaShort < smaLong && price < smaShort) side = "short";
      else return flatSignal("no_trend");

      const beyondShortMa = side === "long" ? price > smaShort : price < smaShort;
      const breakdown = {
        maGap: maGapScore(Math.abs(smaShort - smaLong) / price),
        rsi: rsiScore(side, rsiLatest(closes, config.rsiPeriod)),
        pricePosition: beyondShortMa ? 20 : 10,
        session: config.timeFilter && isActiveSession(lastTick.ts) ? 10 : 0
      };

      const strength = breakdown.maGap + breakdown.rsi + breakdown.pricePosition + breakdown.session;
      return {
        direction: side,
        strength: Math.min(100, strength),
        breakdown,
        reason: `ma_${side}`
      };
    }
  };
}
