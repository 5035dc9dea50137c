export class FuturesValidationError extends Error {
  constructor(message: string, public readonly symbol: string) {
    super(message);
    this.name = "FuturesValidationError";
  }
}

export class SymbolUnknownError extends FuturesValidationError {
  constructor(symbol: string, message = `Unknown symbol: ${symbol}`) {
    super(message, symbol);
    this.name = "SymbolUnknownError";
  }
}

export class ConfigError extends Error {
  constructor(message: string, public readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigError";
  }
}
