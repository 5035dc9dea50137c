import type { PositionSide } from "./types.js";

export type RoundingMode = "down" | "up" | "nearest";

export type ProtectiveLevels = {
  stopLossPrice: number;
  takeProfitPrice: number;
};

function countDecimals(value: number): number {
  const text = String(value).toLowerCase();
  if (text.includes("e-")) {
    const [, exp] = text.split("e-");
    const expValue = Number(exp);
    return Number.isFinite(expValue) ? expValue : 0;
  }

  const dot = text.indexOf(".");
  if (dot < 0) return 0;
  return text.length - dot - 1;
}

function normalizeFloat(value: number, increment: number): number {
  const decimals = Math.max(countDecimals(increment), 0);
  return Number(value.toFixed(Math.min(12, decimals + 2)));
}

function isValidIncrement(increment: number): boolean {
  return Number.isFinite(increment) && increment > 0;
}

function align(value: number, increment: number, mode: RoundingMode): number {
  if (!isValidIncrement(increment)) return value;
  const ratio = value / increment;

  if (mode === "down") return Math.floor(ratio) * increment;
  if (mode === "up") return Math.ceil(ratio) * increment;
  return Math.round(ratio) * increment;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function roundQtyToStep(qty: number, stepSize: number, mode: RoundingMode = "down"): number {
  if (!isValidIncrement(stepSize)) return qty;
  return normalizeFloat(align(qty, stepSize, mode), stepSize);
}

/** Largest size the available margin can carry at `leverage`. */
export function qtyFromMargin(available: number, leverage: number, price: number): number {
  if (!Number.isFinite(available) || available <= 0) return 0;
  if (!Number.isFinite(price) || price <= 0) return 0;
  if (!Number.isFinite(leverage) || leverage <= 0) return 0;
  return (available * leverage) / price;
}

export function pnlRate(side: PositionSide, entryPrice: number, price: number): number {
  if (!Number.isFinite(entryPrice) || entryPrice <= 0) return 0;
  return side === "long"
    ? (price - entryPrice) / entryPrice
    : (entryPrice - price) / entryPrice;
}

export function realizedPnl(side: PositionSide, entryPrice: number, exitPrice: number, size: number): number {
  return side === "long"
    ? (exitPrice - entryPrice) * size
    : (entryPrice - exitPrice) * size;
}

export function protectiveLevels(
  side: PositionSide,
  entryPrice: number,
  rates: { stopLoss: number; takeProfit: number }
): ProtectiveLevels {
  if (side === "long") {
    return {
      stopLossPrice: entryPrice * (1 - rates.stopLoss),
      takeProfitPrice: entryPrice * (1 + rates.takeProfit)
    };
  }
  return {
    stopLossPrice: entryPrice * (1 + rates.stopLoss),
    takeProfitPrice: entryPrice * (1 - rates.takeProfit)
  };
}
