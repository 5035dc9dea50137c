import {
  clamp,
  pnlRate,
  protectiveLevels,
  type ExitReason,
  type ExchangePosition,
  type FuturesSymbol,
  type Position,
  type PositionSide,
  type TrailingStop
} from "@perp/futures-core";

export type ExitSettings = {
  /** Fractions of the entry price, e.g. 0.02 for 2%. */
  stopLoss: number;
  takeProfit: number;
  trailingEnabled: boolean;
  /** Profit rate at which the trailing stop arms. */
  trailingTrigger: number;
  /** Retracement from the best price that fires the trailing stop. */
  trailingDistance: number;
  /** Scale stop loss and take profit by recent return volatility. */
  volatilityAdapt?: boolean;
};

const VOLATILITY_SAMPLES = 20;
const BASELINE_VOLATILITY = 0.04;
const ADAPTIVE_STOP_LOSS = { min: 0.015, max: 0.03 };
const ADAPTIVE_TAKE_PROFIT = { min: 0.03, max: 0.06 };

/** Sample stdev of the returns over the last 20 prices; the baseline when fewer are known. */
export function returnVolatility(prices: readonly number[]): number {
  if (prices.length < VOLATILITY_SAMPLES) return BASELINE_VOLATILITY;
  const recent = prices.slice(-VOLATILITY_SAMPLES);
  const returns: number[] = [];
  for (let i = 1; i < recent.length; i += 1) {
    const previous = recent[i - 1];
    const current = recent[i];
    if (previous === undefined || current === undefined || previous <= 0) continue;
    returns.push((current - previous) / previous);
  }
  if (returns.length < 2) return BASELINE_VOLATILITY;

  const mean = returns.reduce((sum, value) => sum + value, 0) / returns.length;
  const variance = returns.reduce((sum, value) => sum + (value - mean) ** 2, 0) / (returns.length - 1);
  return Math.sqrt(variance);
}

export function exitRates(exits: ExitSettings, recentPrices: readonly number[] = []): { stopLoss: number; takeProfit: number } {
  if (!exits.volatilityAdapt) return { stopLoss: exits.stopLoss, takeProfit: exits.takeProfit };
  const ratio = returnVolatility(recentPrices) / BASELINE_VOLATILITY;
  return {
    stopLoss: clamp(exits.stopLoss * ratio, ADAPTIVE_STOP_LOSS.min, ADAPTIVE_STOP_LOSS.max),
    takeProfit: clamp(exits.takeProfit * ratio, ADAPTIVE_TAKE_PROFIT.min, ADAPTIVE_TAKE_PROFIT.max)
  };
}

export function idleTrailing(distance: number): TrailingStop {
  return { active: false, anchorPrice: null, distance, stopPrice: null };
}

export function openPosition(params: {
  symbol: FuturesSymbol;
  side: PositionSide;
  size: number;
  entryPrice: number;
  leverage: number;
  openedAt: number;
  exits: ExitSettings;
  /** Prices leading up to the entry, read when `volatilityAdapt` is on. */
  recentPrices?: readonly number[];
}): Position {
  const levels = protectiveLevels(params.side, params.entryPrice, exitRates(params.exits, params.recentPrices));
  return {
    symbol: params.symbol,
    side: params.side,
    size: params.size,
    entryPrice: params.entryPrice,
    leverage: params.leverage,
    stopLossPrice: levels.stopLossPrice,
    takeProfitPrice: levels.takeProfitPrice,
    trailing: idleTrailing(params.exits.trailingDistance),
    openedAt: params.openedAt,
    attentionRequired: false
  };
}

export function adoptExchangePosition(
  remote: ExchangePosition,
  params: { leverage: number; openedAt: number; exits: ExitSettings }
): Position {
  return openPosition({
    symbol: remote.symbol,
    side: remote.side,
    size: remote.size,
    entryPrice: remote.entryPrice,
    leverage: remote.leverage ?? params.leverage,
    openedAt: params.openedAt,
    exits: params.exits
  });
}

/**
 * Arms the trailing stop once the profit rate reaches the trigger, then
 * follows the best price seen. Mutates `position.trailing`.
 */
export function updateTrailing(position: Position, price: number, exits: ExitSettings) {
  if (!exits.trailingEnabled) return;
  const trailing = position.trailing;

  if (!trailing.active) {
    if (pnlRate(position.side, position.entryPrice, price) < exits.trailingTrigger) return;
    trailing.active = true;
    trailing.anchorPrice = price;
  } else if (trailing.anchorPrice === null) {
    trailing.anchorPrice = price;
  } else if (position.side === "long" ? price > trailing.anchorPrice : price < trailing.anchorPrice) {
    trailing.anchorPrice = price;
  }

  const anchor = trailing.anchorPrice;
  trailing.stopPrice = position.side === "long"
    ? anchor * (1 - trailing.distance)
    : anchor * (1 + trailing.distance);
}

export function exitTrigger(position: Position, price: number): ExitReason | null {
  const { trailing } = position;

  if (position.side === "long") {
    if (price <= position.stopLossPrice) return "stop_loss";
    if (trailing.active && trailing.stopPrice !== null && price <= trailing.stopPrice) return "trailing_stop";
    if (price >= position.takeProfitPrice) return "take_profit";
    return null;
  }

  if (price >= position.stopLossPrice) return "stop_loss";
  if (trailing.active && trailing.stopPrice !== null && price >= trailing.stopPrice) return "trailing_stop";
  if (price <= position.takeProfitPrice) return "take_profit";
  return null;
}
