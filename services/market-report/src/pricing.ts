import type { Bid, BidDirection, Elevator, TaxMode } from './domain.js';

export type Destination = {
  stationCode: string;
  baseStationCode: string;
};

export type PricingContext = {
  destination?: Destination;
  // Overrides each bid's own tax mode when choosing the transportation figure.
  taxMode?: TaxMode;
};

export type SortOrder = 'ascending' | 'descending';

type DirectionPricing = {
  pickup(bid: Bid, ctx: PricingContext): number | undefined;
  delivered(bid: Bid, ctx: PricingContext): number | undefined;
  comparison(bid: Bid, ctx: PricingContext): number;
  order: SortOrder;
};

export function transportationPrice(bid: Bid, taxMode: TaxMode = bid.taxMode): number {
  const tp = bid.transportationPrice;
  if (taxMode === 'EXCLUDED' && tp?.excluded !== undefined) return tp.excluded;
  if (taxMode === 'INCLUDED' && tp?.included !== undefined) return tp.included;
  return 0;
}

export function loadingFee(elevator: Elevator): number {
  return elevator.servicePrices.length > 0 ? elevator.servicePrices[0] : 0;
}

function sellPickup(bid: Bid): number {
  return bid.price + loadingFee(bid.elevator);
}

function sameBaseStation(bid: Bid, destination: Destination): boolean {
  return bid.elevator.baseStationCode === destination.baseStationCode;
}

const sellPricing: DirectionPricing = {
  pickup: (bid) => sellPickup(bid),
  delivered: (bid, ctx) => {
    if (!ctx.destination) return undefined;
    return sellPickup(bid) + transportationPrice(bid, ctx.taxMode);
  },
  comparison: (bid, ctx) => {
    if (!ctx.destination) return sellPickup(bid);
    // Loaded at the destination hub: no transport markup.
    if (sameBaseStation(bid, ctx.destination)) return bid.price;
    return sellPickup(bid) + transportationPrice(bid, ctx.taxMode);
  },
  order: 'ascending',
};

// A buy offer is already quoted delivered to the buyer.
const buyPricing: DirectionPricing = {
  pickup: (bid, ctx) => {
    if (!ctx.destination) return undefined;
    return bid.price - transportationPrice(bid, ctx.taxMode);
  },
  delivered: (bid) => bid.price,
  comparison: (bid, ctx) => {
    if (!ctx.destination) return bid.price;
    return bid.price - transportationPrice(bid, ctx.taxMode);
  },
  order: 'descending',
};

const pricingByDirection: Record<BidDirection, DirectionPricing> = {
  SELL: sellPricing,
  BUY: buyPricing,
};

/** Price at the bid's origin, excluding delivery. */
export function pickupPrice(bid: Bid, ctx: PricingContext = {}): number | undefined {
  return pricingByDirection[bid.direction].pickup(bid, ctx);
}

/** Price including transport to the destination. */
export function deliveredPrice(bid: Bid, ctx: PricingContext = {}): number | undefined {
  return pricingByDirection[bid.direction].delivered(bid, ctx);
}

/** Price used to rank a bid among its quality class. */
export function comparisonPrice(bid: Bid, ctx: PricingContext = {}): number {
  return pricingByDirection[bid.direction].comparison(bid, ctx);
}

export function sortOrder(direction: BidDirection): SortOrder {
  return pricingByDirection[direction].order;
}
