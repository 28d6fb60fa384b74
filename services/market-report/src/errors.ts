export const MarketErrorCodes = {
  UNRESOLVABLE_STATION: 'UNRESOLVABLE_STATION',
  MARKET_GENERATION: 'MARKET_GENERATION',
} as const;

export type MarketErrorCode = (typeof MarketErrorCodes)[keyof typeof MarketErrorCodes];

export class MarketError extends Error {
  public readonly code: MarketErrorCode;

  constructor(message: string, code: MarketErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MarketError';
    this.code = code;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * A station cannot be mapped to its base station: it is unknown, has no
 * region/district, or no base station is registered for its location.
 */
export class UnresolvableStationError extends MarketError {
  public readonly stationCode: string;

  constructor(stationCode: string, message: string) {
    super(message, MarketErrorCodes.UNRESOLVABLE_STATION);
    this.name = 'UnresolvableStationError';
    this.stationCode = stationCode;
  }
}

/**
 * The market view could not be produced. `diagnostics` are user-facing
 * messages meant to be shown as they are.
 */
export class MarketGenerationError extends MarketError {
  public readonly diagnostics: string[];

  constructor(message: string, diagnostics: string[], options?: { cause?: unknown }) {
    super(message, MarketErrorCodes.MARKET_GENERATION, options);
    this.name = 'MarketGenerationError';
    this.diagnostics = diagnostics;
  }
}
