import type { Bid, BidDirection, MarketRow, MarketView } from './domain.js';
import {
  comparisonPrice,
  deliveredPrice,
  pickupPrice,
  sortOrder,
  type PricingContext,
  type SortOrder,
} from './pricing.js';

// Natural order: "3" < "4" < "10", then plain lexical order for names.
const qualityClassCollator = new Intl.Collator('en', { numeric: true });

export function compareQualityClass(a: string, b: string): number {
  return qualityClassCollator.compare(a, b);
}

export function enrichBid(bid: Bid, ctx: PricingContext): MarketRow {
  const row: MarketRow = { bid, comparisonPrice: comparisonPrice(bid, ctx) };
  const destination = ctx.destination;
  const needsPrices =
    !destination || destination.baseStationCode !== bid.elevator.baseStationCode || bid.direction === 'BUY';
  if (!needsPrices) return row;

  const pickup = pickupPrice(bid, ctx);
  if (pickup !== undefined) row.pickupPrice = pickup;
  const delivered = deliveredPrice(bid, ctx);
  if (delivered !== undefined) row.deliveredPrice = delivered;
  return row;
}

/** Stable sort by comparison price. */
export function sortRows(rows: MarketRow[], order: SortOrder): MarketRow[] {
  const sign = order === 'ascending' ? 1 : -1;
  return [...rows].sort((a, b) => sign * (a.comparisonPrice - b.comparisonPrice));
}

export function groupByQualityClass(rows: MarketRow[]): MarketView {
  const groups = new Map<string, MarketRow[]>();
  for (const row of rows) {
    const group = groups.get(row.bid.qualityClass);
    if (group) {
      group.push(row);
    } else {
      groups.set(row.bid.qualityClass, [row]);
    }
  }
  return Array.from(groups.entries())
    .sort(([a], [b]) => compareQualityClass(a, b))
    .map(([qualityClass, groupRows]) => ({ qualityClass, rows: groupRows }));
}

/**
 * Keeps at most `rowsLimit` rows, taking whole groups in order and cutting
 * the group that exhausts the budget. A missing or negative limit keeps all.
 */
export function truncateMarketView(view: MarketView, rowsLimit?: number): MarketView {
  if (rowsLimit === undefined || rowsLimit < 0) return view;

  const limited: MarketView = [];
  let taken = 0;
  for (const group of view) {
    if (taken >= rowsLimit) break;
    const remaining = rowsLimit - taken;
    if (group.rows.length > remaining) {
      limited.push({ qualityClass: group.qualityClass, rows: group.rows.slice(0, remaining) });
      taken = rowsLimit;
    } else {
      limited.push(group);
      taken += group.rows.length;
    }
  }
  return limited;
}

export function rankMarket(
  bids: Bid[],
  direction: BidDirection,
  ctx: PricingContext,
  rowsLimit?: number
): MarketView {
  const order = sortOrder(direction);
  const grouped = groupByQualityClass(bids.map((bid) => enrichBid(bid, ctx)));
  const sorted = grouped.map((group) => ({ qualityClass: group.qualityClass, rows: sortRows(group.rows, order) }));
  return truncateMarketView(sorted, rowsLimit);
}
