import { clamp, flatSignal, type MarketWindow, type Signal } from "@perp/futures-core";
import type { SignalStrategy } from "./strategy.interface.js";

export type GridSpacing = "arithmetic" | "geometric";

export type GridStrategyConfig = {
  variant: "grid";
  lower: number;
  upper: number;
  levels: number;
  spacing: GridSpacing;
};

export function gridLevels(lower: number, upper: number, count: number, spacing: GridSpacing): number[] {
  if (count < 2 || !(upper > lower) || lower <= 0) return [];

  if (spacing === "geometric") {
    const ratio = Math.pow(upper / lower, 1 / (count - 1));
    return Array.from({ length: count }, (_, i) => lower * Math.pow(ratio, i));
  }

  const step = (upper - lower) / (count - 1);
  return Array.from({ length: count }, (_, i) => lower + step * i);
}

/**
 * Range-bound grid: buys when the price falls through a level and sells when
 * it rises through one. Strength grows with the distance from the range
 * midpoint, so entries near the edges of the range score highest.
 */
export function createGridStrategy(config: GridStrategyConfig): SignalStrategy {
  const levels = gridLevels(config.lower, config.upper, config.levels, config.spacing);
  const midpoint = (config.lower + config.upper) / 2;
  const halfRange = (config.upper - config.lower) / 2;

  return {
    variant: "grid",
    minWindow: 2,
    evaluate(window: MarketWindow): Signal {
      const ticks = window.ticks;
      if (ticks.length < 2 || levels.length === 0) return flatSignal("insufficient_data");

      const previous = ticks[ticks.length - 2].price;
      const price = ticks[ticks.length - 1].price;
      if (price < config.lower || price > config.upper) return flatSignal("outside_range");

      const crossedDown = levels.find((level) => price <= level && level < previous);
      const crossedUp = levels.find((level) => previous < level && level <= price);
      const crossed = crossedDown ?? crossedUp;
      if (crossed === undefined) return flatSignal("no_level_crossed");

      const strength = clamp((Math.abs(price - midpoint) * 100) / halfRange, 0, 100);
      return {
        direction: crossedDown !== undefined ? "long" : "short",
        strength,
        breakdown: { level: crossed, distance: strength },
        reason: crossedDown !== undefined ? "level_crossed_down" : "level_crossed_up"
      };
    }
  };
}
