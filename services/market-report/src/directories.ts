import type { Bid, BidDirection, Station } from './domain.js';

export interface BidDirectory {
  /** Active, non-archived bids of one direction. */
  fetchActiveBids(direction: BidDirection): Promise<Bid[]>;
  /** Active bids that have a transportation price to the given base station. */
  fetchBidsPricedForDestination(baseStationCode: string, direction: BidDirection): Promise<Bid[]>;
}

export interface StationDirectory {
  findStation(code: string): Promise<Station | null>;
  findBaseStation(regionId: number, districtId: number, localityId: number | null): Promise<Station | null>;
}

export type Directories = {
  bids: BidDirectory;
  stations: StationDirectory;
};

export interface MarketDirectories extends Directories {
  /** Runs `fn` against directories that all read from one consistent snapshot. */
  snapshot<T>(fn: (directories: Directories) => Promise<T>): Promise<T>;
}
