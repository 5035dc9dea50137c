import { flatSignal, type MarketWindow, type Signal } from "@perp/futures-core";
import { closesOf, smaLatest } from "./indicators.js";
import type { SignalStrategy } from "./strategy.interface.js";

export type DirectionalStrategyConfig = {
  variant: "directional";
  shortPeriod: number;
  longPeriod: number;
};

export function createDirectionalStrategy(config: DirectionalStrategyConfig): SignalStrategy {
  const minWindow = Math.max(config.shortPeriod, config.longPeriod);

  return {
    variant: "directional",
    minWindow,
    evaluate(window: MarketWindow): Signal {
      const lastTick = window.ticks[window.ticks.length - 1];
      if (!lastTick || window.ticks.length < minWindow) return flatSignal("insufficient_data");

      const closes = closesOf(window);
      const smaShort = smaLatest(closes, config.shortPeriod);
      const smaLong = smaLatest(closes, config.longPeriod);
      if (smaShort === null || smaLong === null) return flatSignal("insufficient_data");

      const price = lastTick.price;
      if (smaShort > smaLong && price > smaShort) {
        return { direction: "long", strength: 100, breakdown: { smaShort, smaLong }, reason: "ma_cross_long" };
      }
      if (smaShort < smaLong && price < smaShort) {
        return { direction: "short", strength: 100, breakdown: { smaShort, smaLong }, reason: "ma_cross_short" };
      }
      return flatSignal("no_cross", { smaShort, smaLong });
    }
  };
}
