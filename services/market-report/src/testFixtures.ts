// Builders and an in-process directory stand-in shared by the tests.
import type { Directories, MarketDirectories } from './directories.js';
import type { Bid, BidDirection, Station, TaxMode } from './domain.js';

type BidFixture = {
  id: number;
  direction?: BidDirection;
  taxMode?: TaxMode;
  price?: number;
  transportation?: { excluded?: number; included?: number };
  qualityClass?: string;
  stationCode?: string;
  stationName?: string;
  baseStationCode?: string;
  servicePrices?: number[];
  isActive?: boolean;
};

export function makeBid(fixture: BidFixture): Bid {
  const stationCode = fixture.stationCode ?? 'A';
  return {
    id: fixture.id,
    direction: fixture.direction ?? 'SELL',
    taxMode: fixture.taxMode ?? 'EXCLUDED',
    price: fixture.price ?? 1000,
    transportationPrice: fixture.transportation,
    qualityClass: fixture.qualityClass ?? '3',
    elevator: {
      id: fixture.id,
      name: `Elevator ${fixture.id}`,
      stationCode,
      stationName: fixture.stationName ?? `Station ${stationCode}`,
      baseStationCode: fixture.baseStationCode,
      servicePrices: fixture.servicePrices ?? [],
    },
    isActive: fixture.isActive ?? true,
    archiveDate: null,
  };
}

export type BaseStationEntry = {
  regionId: number;
  districtId: number;
  localityId?: number;
  stationCode: string;
};

export type RouteEntry = {
  from: string;
  to: string;
  excluded?: number;
  included?: number;
};

type InMemoryData = {
  bids: Bid[];
  stations: Station[];
  baseStations: BaseStationEntry[];
  routes: RouteEntry[];
};

export function createInMemoryDirectories(data: InMemoryData): MarketDirectories & { snapshotCount(): number } {
  let snapshots = 0;

  const current = (direction: BidDirection) =>
    data.bids.filter((bid) => bid.isActive && bid.archiveDate === null && bid.direction === direction);

  const directories: Directories = {
    bids: {
      async fetchActiveBids(direction) {
        return current(direction);
      },
      async fetchBidsPricedForDestination(baseStationCode, direction) {
        const priced: Bid[] = [];
        for (const bid of current(direction)) {
          const route = data.routes.find((r) => r.from === bid.elevator.stationCode && r.to === baseStationCode);
          if (route) {
            priced.push({ ...bid, transportationPrice: { excluded: route.excluded, included: route.included } });
          }
        }
        return priced;
      },
    },
    stations: {
      async findStation(code) {
        return data.stations.find((station) => station.code === code) ?? null;
      },
      async findBaseStation(regionId, districtId, localityId) {
        const entry = data.baseStations.find(
          (b) => b.regionId === regionId && b.districtId === districtId && (b.localityId ?? null) === localityId
        );
        if (!entry) return null;
        return data.stations.find((station) => station.code === entry.stationCode) ?? null;
      },
    },
  };

  return {
    ...directories,
    async snapshot<T>(fn: (directories: Directories) => Promise<T>): Promise<T> {
      snapshots += 1;
      return fn(directories);
    },
    snapshotCount: () => snapshots,
  };
}
