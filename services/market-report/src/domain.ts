// Shared domain types for the market table

export type BidDirection = 'BUY' | 'SELL';

export type TaxMode = 'EXCLUDED' | 'INCLUDED';

export const BID_DIRECTIONS: readonly BidDirection[] = ['BUY', 'SELL'];
export const TAX_MODES: readonly TaxMode[] = ['EXCLUDED', 'INCLUDED'];

export type Elevator = {
  id: number;
  name: string;
  stationCode: string;
  stationName: string;
  // Filled by the directory when known, or after the engine resolves it.
  baseStationCode?: string;
  // Loading service prices in insertion order; the first one is the loading fee.
  servicePrices: number[];
};

export type TransportationPrice = {
  excluded?: number;
  included?: number;
};

type BidBase = {
  id: number;
  taxMode: TaxMode;
  price: number;
  transportationPrice?: TransportationPrice;
  qualityClass: string;
  elevator: Elevator;
  isActive: boolean;
  archiveDate: Date | null;
};

export type SellBid = BidBase & { direction: 'SELL' };
export type BuyBid = BidBase & { direction: 'BUY' };
export type Bid = SellBid | BuyBid;

export type Station = {
  code: string;
  name: string;
  regionId?: number;
  regionName?: string;
  districtId?: number;
  districtName?: string;
  localityId?: number;
  localityName?: string;
};

export type MarketRow = {
  bid: Bid;
  pickupPrice?: number;
  deliveredPrice?: number;
  comparisonPrice: number;
};

export type MarketGroup = {
  qualityClass: string;
  rows: MarketRow[];
};

export type MarketView = MarketGroup[];

export type MarketQuery = {
  stationCode?: string;
  direction: BidDirection;
  taxMode?: TaxMode;
  rowsLimit?: number;
};

export function isBidDirection(value: unknown): value is BidDirection {
  return value === 'BUY' || value === 'SELL';
}

export function isTaxMode(value: unknown): value is TaxMode {
  return value === 'EXCLUDED' || value === 'INCLUDED';
}
