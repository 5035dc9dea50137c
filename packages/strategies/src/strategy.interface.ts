import type { MarketWindow, Signal } from "@perp/futures-core";

export type StrategyVariant = "trend" | "weighted" | "grid" | "directional";

/**
 * A signal strategy is a pure function of the market window: the same window
 * always yields the same signal. Variants are plain objects built by factory
 * functions, not subclasses.
 */
export interface SignalStrategy {
  readonly variant: StrategyVariant;
  /** Number of ticks required before the strategy can emit a directional signal. */
  readonly minWindow: number;
  evaluate(window: MarketWindow): Signal;
}
