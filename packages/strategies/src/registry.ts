import { createDirectionalStrategy, type DirectionalStrategyConfig } from "./directional.strategy.js";
import { createGridStrategy, type GridStrategyConfig } from "./grid.strategy.js";
import type { SignalStrategy } from "./strategy.interface.js";
import { createTrendStrategy, type TrendStrategyConfig } from "./trend.strategy.js";
import { createWeightedStrategy, type WeightedStrategyConfig } from "./weighted.strategy.js";

export type StrategyConfig =
  | TrendStrategyConfig
  | WeightedStrategyConfig
  | GridStrategyConfig
  | DirectionalStrategyConfig;

export function createStrategy(config: StrategyConfig): SignalStrategy {
  switch (config.variant) {
    case "trend":
      return createTrendStrategy(config);
    case "weighted":
      return createWeightedStrategy(config);
    case "grid":
      return createGridStrategy(config);
    case "directional":
      return createDirectionalStrategy(config);
  }
}
