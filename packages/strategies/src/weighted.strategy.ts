import { clamp, flatSignal, type MarketWindow, type Signal } from "@perp/futures-core";
import {
  bollingerLatest,
  closesOf,
  highsOf,
  kdjLatest,
  lowsOf,
  macdLatest,
  rsiLatest,
  smaLatest,
  type BollingerReading,
  type KdjReading,
  type MacdReading
} from "./indicators.js";
import type { SignalStrategy } from "./strategy.interface.js";

export const WEIGHTED_INDICATORS = ["macd", "kdj", "rsi", "bollinger", "trend"] as const;
export type WeightedIndicator = (typeof WEIGHTED_INDICATORS)[number];

export type IndicatorWeights = Record<WeightedIndicator, number>;

export type WeightedThresholds = {
  rsiOverbought: number;
  rsiOversold: number;
  kdjOverbought: number;
  kdjOversold: number;
};

export type WeightedPeriods = {
  macdFast: number;
  macdSlow: number;
  macdSignal: number;
  kdjPeriod: number;
  kdjSignal: number;
  rsiPeriod: number;
  bollingerPeriod: number;
  bollingerStdDev: number;
  smaShort: number;
  smaLong: number;
};

export type WeightedStrategyConfig = {
  variant: "weighted";
  weights: IndicatorWeights;
  thresholds: WeightedThresholds;
  periods: WeightedPeriods;
};

export type IndicatorReadings = {
  price: number;
  macd: MacdReading | null;
  kdj: KdjReading | null;
  rsi: number | null;
  bollinger: BollingerReading | null;
  smaShort: number | null;
  smaLong: number | null;
};

type Vote = { vote: -1 | 0 | 1; score: number };

const ABSTAIN: Vote = { vote: 0, score: 0 };

function macdVote(macd: MacdReading | null): Vote {
  if (!macd) return ABSTAIN;
  if (macd.line > macd.signal) return { vote: 1, score: macd.hist > 0 ? 1 : 0.6 };
  if (macd.line < macd.signal) return { vote: -1, score: macd.hist < 0 ? 1 : 0.6 };
  return ABSTAIN;
}

function kdjVote(kdj: KdjReading | null, thresholds: WeightedThresholds): Vote {
  if (!kdj) return ABSTAIN;
  if (kdj.k > kdj.d) return { vote: 1, score: kdj.k < thresholds.kdjOversold ? 1 : 0.6 };
  if (kdj.k < kdj.d) return { vote: -1, score: kdj.k > thresholds.kdjOverbought ? 1 : 0.6 };
  return ABSTAIN;
}

function rsiVote(rsi: number | null, thresholds: WeightedThresholds): Vote {
  if (rsi === null) return ABSTAIN;
  if (rsi < thresholds.rsiOversold) return { vote: 1, score: 1 };
  if (rsi > thresholds.rsiOverbought) return { vote: -1, score: 1 };
  if (rsi < 50) return { vote: 1, score: 0.5 };
  if (rsi > 50) return { vote: -1, score: 0.5 };
  return ABSTAIN;
}

function bollingerVote(price: number, bands: BollingerReading | null): Vote {
  if (!bands) return ABSTAIN;
  if (price <= bands.lower) return { vote: 1, score: 1 };
  if (price >= bands.upper) return { vote: -1, score: 1 };
  if (price < bands.middle) return { vote: 1, score: 0.5 };
  if (price > bands.middle) return { vote: -1, score: 0.5 };
  return ABSTAIN;
}

function trendVote(smaShort: number | null, smaLong: number | null): Vote {
  if (smaShort === null || smaLong === null) return ABSTAIN;
  if (smaShort > smaLong) return { vote: 1, score: 1 };
  if (smaShort < smaLong) return { vote: -1, score: 1 };
  return ABSTAIN;
}

/**
 * Combines per-indicator votes into one signal. Direction is the sign of the
 * vote sum; strength only counts indicators that agree with it. The breakdown
 * carries each indicator's signed contribution.
 */
export function scoreIndicators(
  readings: IndicatorReadings,
  config: Pick<WeightedStrategyConfig, "weights" | "thresholds">
): Signal {
  const votes: Record<WeightedIndicator, Vote> = {
    macd: macdVote(readings.macd),
    kdj: kdjVote(readings.kdj, config.thresholds),
    rsi: rsiVote(readings.rsi, config.thresholds),
    bollinger: bollingerVote(readings.price, readings.bollinger),
    trend: trendVote(readings.smaShort, readings.smaLong)
  };

  let voteSum = 0;
  const breakdown: Record<string, number> = {};
  for (const name of WEIGHTED_INDICATORS) {
    const { vote, score } = votes[name];
    voteSum += vote;
    breakdown[name] = vote * score * config.weights[name];
  }

  if (voteSum === 0) return flatSignal("votes_tied", breakdown);
  const direction = voteSum > 0 ? 1 : -1;

  let strength = 0;
  for (const name of WEIGHTED_INDICATORS) {
    const { vote, score } = votes[name];
    if (vote === direction) strength += config.weights[name] * score;
  }

  return {
    direction: direction > 0 ? "long" : "short",
    strength: clamp(strength, 0, 100),
    breakdown,
    reason: `votes_${voteSum > 0 ? "+" : ""}${voteSum}`
  };
}

export function createWeightedStrategy(config: WeightedStrategyConfig): SignalStrategy {
  const p = config.periods;
  const minWindow = Math.max(
    p.macdSlow + p.macdSignal,
    p.kdjPeriod + p.kdjSignal,
    p.rsiPeriod + 1,
    p.bollingerPeriod,
    p.smaLong
  );

  return {
    variant: "weighted",
    minWindow,
    evaluate(window: MarketWindow): Signal {
      const lastTick = window.ticks[window.ticks.length - 1];
      if (!lastTick || window.ticks.length < minWindow) return flatSignal("insufficient_data");

      const closes = closesOf(window);
      const readings: IndicatorReadings = {
        price: lastTick.price,
        macd: macdLatest(closes, { fast: p.macdFast, slow: p.macdSlow, signal: p.macdSignal }),
        kdj: kdjLatest(
          { high: highsOf(window), low: lowsOf(window), close: closes },
          { period: p.kdjPeriod, signalPeriod: p.kdjSignal }
        ),
        rsi: rsiLatest(closes, p.rsiPeriod),
        bollinger: bollingerLatest(closes, p.bollingerPeriod, p.bollingerStdDev),
        smaShort: smaLatest(closes, p.smaShort),
        smaLong: smaLatest(closes, p.smaLong)
      };

      return scoreIndicators(readings, config);
    }
  };
}
