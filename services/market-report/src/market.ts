import pino, { Logger } from 'pino';
import { resolveBaseStation } from './baseStation.js';
import { cannotResolveStation, noTransportationPrice } from './diagnostics.js';
import type { MarketDirectories, StationDirectory } from './directories.js';
import type { Bid, MarketQuery, MarketView, Station } from './domain.js';
import { MarketGenerationError, UnresolvableStationError } from './errors.js';
import { rankMarket } from './ranking.js';

type EngineOptions = {
  directories: MarketDirectories;
  logger?: Logger;
};

export type MarketEngine = ReturnType<typeof createMarketEngine>;

/** A market view together with the destination station read in the same snapshot. */
export type MarketSnapshot = {
  view: MarketView;
  station: Station | null;
};

// Query strings and templates pass a missing station through as "null".
export function normalizeStationCode(stationCode: string | null | undefined): string | undefined {
  if (!stationCode || stationCode === 'null') return undefined;
  return stationCode;
}

export function createMarketEngine(options: EngineOptions) {
  const logger = options.logger ?? pino({ level: process.env.LOG_LEVEL || 'info' });
  const { directories } = options;

  async function timed<T>(phase: string, fn: () => Promise<T> | T): Promise<T> {
    const startedAt = Date.now();
    const result = await fn();
    logger.debug({ phase, ms: Date.now() - startedAt }, 'market computation phase');
    return result;
  }

  async function tryResolveBaseStation(stations: StationDirectory, stationCode: string): Promise<string | null> {
    try {
      return await resolveBaseStation(stations, stationCode);
    } catch (err) {
      if (!(err instanceof UnresolvableStationError)) throw err;
      logger.warn({ stationCode, reason: err.message }, 'base station not resolved');
      return null;
    }
  }

  /**
   * Builds the market table for one direction. With a destination station,
   * every active bid must either have a transportation price to the
   * destination's base station or be loaded at that base station itself;
   * otherwise the whole computation fails with every problem listed.
   */
  async function computeMarket(query: MarketQuery): Promise<MarketSnapshot> {
    const { direction, taxMode, rowsLimit } = query;
    const stationCode = normalizeStationCode(query.stationCode);

    return directories.snapshot(async ({ bids, stations }) => {
      if (!stationCode) {
        const all = await timed('fetch all bids', () => bids.fetchActiveBids(direction));
        const view = await timed('enrich and sort', () => rankMarket(all, direction, { taxMode }, rowsLimit));
        return { view, station: null };
      }

      const baseStationCode = await tryResolveBaseStation(stations, stationCode);
      if (baseStationCode === null) {
        logger.error({ stationCode }, 'could not calculate destination station');
        throw new MarketGenerationError('Could not calculate destination station', [cannotResolveStation(stationCode)]);
      }

      const priced = await timed('fetch priced bids', () =>
        bids.fetchBidsPricedForDestination(baseStationCode, direction)
      );
      const all = await timed('fetch all bids', () => bids.fetchActiveBids(direction));

      const pricedIds = new Set(priced.map((bid) => bid.id));
      const unpriced = all.filter((bid) => !pricedIds.has(bid.id));

      const salvaged: Bid[] = [];
      if (unpriced.length > 0) {
        logger.error({ baseStationCode, count: unpriced.length }, 'some bids could not be calculated for station');
        const diagnostics: string[] = [];
        for (const bid of unpriced) {
          const { stationCode: originCode, stationName } = bid.elevator;
          const originBase = await tryResolveBaseStation(stations, originCode);
          if (originBase === null) {
            diagnostics.push(cannotResolveStation(originCode, stationName));
          } else if (originBase === baseStationCode) {
            salvaged.push({ ...bid, elevator: { ...bid.elevator, baseStationCode: originBase } });
          } else {
            diagnostics.push(noTransportationPrice(originBase, baseStationCode));
          }
        }
        if (diagnostics.length > 0) {
          throw new MarketGenerationError(
            `Some bids could not be calculated for station ${baseStationCode}`,
            diagnostics
          );
        }
      }

      const destination = { stationCode, baseStationCode };
      const view = await timed('enrich and sort', () =>
        rankMarket([...priced, ...salvaged], direction, { destination, taxMode }, rowsLimit)
      );
      return { view, station: await stations.findStation(stationCode) };
    });
  }

  async function computeMarketView(query: MarketQuery): Promise<MarketView> {
    const { view } = await computeMarket(query);
    return view;
  }

  return { computeMarket, computeMarketView };
}
