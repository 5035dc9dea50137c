import { realizedPnl, type FuturesSymbol, type Position } from "@perp/futures-core";

export class PositionOwnershipError extends Error {
  constructor(
    message: string,
    readonly symbol: FuturesSymbol
  ) {
    super(message);
    this.name = "PositionOwnershipError";
  }
}

/** Write capability for one symbol, handed out once by `claim`. */
export class PositionClaim {
  constructor(readonly symbol: FuturesSymbol) {}
}

function copyPosition(position: Position): Position {
  return { ...position, trailing: { ...position.trailing } };
}

/**
 * Authoritative positions, one per symbol. Anyone may read; only the holder
 * of the symbol's claim may write.
 */
export class PositionTracker {
  private readonly positions = new Map<FuturesSymbol, Position>();
  private readonly claims = new Map<FuturesSymbol, PositionClaim>();

  constructor(private readonly contractValueOf: (symbol: FuturesSymbol) => number = () => 1) {}

  claim(symbol: FuturesSymbol): PositionClaim {
    if (this.claims.has(symbol)) {
      throw new PositionOwnershipError(`${symbol} is already owned by another engine`, symbol);
    }
    const claim = new PositionClaim(symbol);
    this.claims.set(symbol, claim);
    return claim;
  }

  release(claim: PositionClaim) {
    if (this.claims.get(claim.symbol) === claim) this.claims.delete(claim.symbol);
  }

  get(symbol: FuturesSymbol): Position | null {
    const position = this.positions.get(symbol);
    return position ? copyPosition(position) : null;
  }

  list(): Position[] {
    return [...this.positions.values()].map(copyPosition);
  }

  get openCount(): number {
    return this.positions.size;
  }

  open(claim: PositionClaim, position: Position) {
    this.assertOwner(claim, position.symbol);
    if (this.positions.has(position.symbol)) {
      throw new PositionOwnershipError(`${position.symbol} already has an open position`, position.symbol);
    }
    this.positions.set(position.symbol, copyPosition(position));
  }

  update(claim: PositionClaim, mutate: (position: Position) => void): Position | null {
    this.assertOwner(claim, claim.symbol);
    const current = this.positions.get(claim.symbol);
    if (!current) return null;
    mutate(current);
    return copyPosition(current);
  }

  close(claim: PositionClaim): Position | null {
    this.assertOwner(claim, claim.symbol);
    const current = this.positions.get(claim.symbol);
    if (!current) return null;
    this.positions.delete(claim.symbol);
    return current;
  }

  /** Sum over positions with a known price; symbols missing from `prices` count as zero. */
  unrealizedPnl(prices: Readonly<Record<FuturesSymbol, number>>): number {
    let total = 0;
    for (const position of this.positions.values()) {
      const price = prices[position.symbol];
      if (price === undefined || !Number.isFinite(price)) continue;
      total += realizedPnl(
        position.side,
        position.entryPrice,
        price,
        position.size * this.contractValueOf(position.symbol)
      );
    }
    return total;
  }

  private assertOwner(claim: PositionClaim, symbol: FuturesSymbol) {
    if (claim.symbol !== symbol || this.claims.get(symbol) !== claim) {
      throw new PositionOwnershipError(`Write to ${symbol} without its claim`, symbol);
    }
  }
}
