import { Pool, QueryResultRow } from 'pg';
import type { BidDirectory, Directories, MarketDirectories, StationDirectory } from './directories.js';
import { Bid, BidDirection, isBidDirection, isTaxMode, Station } from './domain.js';

type RunQuery = <R extends QueryResultRow>(text: string, values: unknown[]) => Promise<R[]>;

// int8 columns come back as strings from pg.
type Numeric = string | number;

type StationRow = {
  code: string;
  name: string;
  region_id: number | null;
  region_name: string | null;
  district_id: number | null;
  district_name: string | null;
  locality_id: number | null;
  locality_name: string | null;
};

type BidRow = {
  id: number;
  bid_type: string;
  nds: string;
  price: Numeric;
  quality_class: string;
  is_active: boolean;
  archive_date: Date | string | null;
  elevator_id: number;
  elevator_name: string;
  station_code: string;
  station_name: string;
  base_station_code: string | null;
  service_price_id: number | null;
  service_price: Numeric | null;
  transportation_price_id?: number | null;
  transportation_price?: Numeric | null;
  transportation_price_nds?: Numeric | null;
};

const STATION_COLUMNS = `
  s.code, s.name, s.region_id, s.region_name, s.district_id, s.district_name, s.locality_id, s.locality_name
`;

const BID_COLUMNS = `
  b.id, b.bid_type, b.nds, b.price, b.quality_class, b.is_active, b.archive_date,
  e.id AS elevator_id, e.name AS elevator_name, e.station_code, st.name AS station_name, e.base_station_code,
  sp.id AS service_price_id, sp.price AS service_price
`;

const CURRENT_BIDS_WHERE = 'b.is_active = true AND b.archive_date IS NULL';

function mapRowToStation(row: StationRow): Station {
  return {
    code: row.code,
    name: row.name,
    regionId: row.region_id ?? undefined,
    regionName: row.region_name ?? undefined,
    districtId: row.district_id ?? undefined,
    districtName: row.district_name ?? undefined,
    localityId: row.locality_id ?? undefined,
    localityName: row.locality_name ?? undefined,
  };
}

function mapRowToBid(row: BidRow): Bid {
  if (!isBidDirection(row.bid_type)) {
    throw new Error(`bid ${row.id} has unknown bid type ${row.bid_type}`);
  }
  if (!isTaxMode(row.nds)) {
    throw new Error(`bid ${row.id} has unknown tax mode ${row.nds}`);
  }
  const hasRoute = row.transportation_price_id !== undefined && row.transportation_price_id !== null;
  return {
    id: Number(row.id),
    direction: row.bid_type,
    taxMode: row.nds,
    price: Number(row.price),
    transportationPrice: hasRoute
      ? {
          excluded: row.transportation_price == null ? undefined : Number(row.transportation_price),
          included: row.transportation_price_nds == null ? undefined : Number(row.transportation_price_nds),
        }
      : undefined,
    qualityClass: row.quality_class,
    elevator: {
      id: Number(row.elevator_id),
      name: row.elevator_name,
      stationCode: row.station_code,
      stationName: row.station_name,
      baseStationCode: row.base_station_code ?? undefined,
      servicePrices: [],
    },
    isActive: row.is_active,
    archiveDate: row.archive_date === null ? null : new Date(row.archive_date),
  };
}

// One row per (bid, service price); rows arrive ordered by bid then service price.
function collectBids(rows: BidRow[]): Bid[] {
  const bids = new Map<number, { bid: Bid; routeId: number | null | undefined }>();
  for (const row of rows) {
    const id = Number(row.id);
    let entry = bids.get(id);
    if (!entry) {
      entry = { bid: mapRowToBid(row), routeId: row.transportation_price_id };
      bids.set(id, entry);
    }
    // A second route row for the same bid repeats its service prices.
    if (row.transportation_price_id !== entry.routeId) continue;
    if (row.service_price !== null) {
      entry.bid.elevator.servicePrices.push(Number(row.service_price));
    }
  }
  return Array.from(bids.values(), (entry) => entry.bid);
}

function bindDirectories(run: RunQuery): Directories {
  const bids: BidDirectory = {
    async fetchActiveBids(direction: BidDirection) {
      const rows = await run<BidRow>(
        `SELECT ${BID_COLUMNS}
         FROM bids b
         JOIN elevators e ON e.id = b.elevator_id
         JOIN stations st ON st.code = e.station_code
         LEFT JOIN elevator_service_prices sp ON sp.elevator_id = e.id
         WHERE ${CURRENT_BIDS_WHERE} AND b.bid_type = $1
         ORDER BY b.id, sp.id`,
        [direction]
      );
      return collectBids(rows);
    },

    async fetchBidsPricedForDestination(baseStationCode: string, direction: BidDirection) {
      // Routes are recorded from the elevator's own station to the destination base station.
      const rows = await run<BidRow>(
        `SELECT ${BID_COLUMNS},
           tp.id AS transportation_price_id, tp.price AS transportation_price, tp.price_nds AS transportation_price_nds
         FROM bids b
         JOIN elevators e ON e.id = b.elevator_id
         JOIN stations st ON st.code = e.station_code
         JOIN transportation_prices tp
           ON tp.station_from_code = e.station_code AND tp.station_to_code = $1
         LEFT JOIN elevator_service_prices sp ON sp.elevator_id = e.id
         WHERE ${CURRENT_BIDS_WHERE} AND b.bid_type = $2
         ORDER BY b.id, tp.id, sp.id`,
        [baseStationCode, direction]
      );
      return collectBids(rows);
    },
  };

  const stations: StationDirectory = {
    async findStation(code: string) {
      const rows = await run<StationRow>(`SELECT ${STATION_COLUMNS} FROM stations s WHERE s.code = $1`, [code]);
      return rows.length > 0 ? mapRowToStation(rows[0]) : null;
    },

    async findBaseStation(regionId: number, districtId: number, localityId: number | null) {
      const params: unknown[] = [regionId, districtId];
      let where = 'bs.region_id = $1 AND bs.district_id = $2';
      if (localityId === null) {
        where += ' AND bs.locality_id IS NULL';
      } else {
        params.push(localityId);
        where += ` AND bs.locality_id = $${params.length}`;
      }
      const rows = await run<StationRow>(
        `SELECT ${STATION_COLUMNS}
         FROM base_stations bs
         JOIN stations s ON s.code = bs.station_code
         WHERE ${where}
         ORDER BY bs.id
         LIMIT 1`,
        params
      );
      return rows.length > 0 ? mapRowToStation(rows[0]) : null;
    },
  };

  return { bids, stations };
}

export function createPgDirectories(pool: Pool): MarketDirectories {
  const direct = bindDirectories(async <R extends QueryResultRow>(text: string, values: unknown[]) => {
    const res = await pool.query<R>(text, values);
    return res.rows;
  });

  return {
    ...direct,
    async snapshot<T>(fn: (directories: Directories) => Promise<T>): Promise<T> {
      const client = await pool.connect();
      try {
        await client.query('BEGIN ISOLATION LEVEL REPEATABLE READ');
        const result = await fn(
          bindDirectories(async <R extends QueryResultRow>(text: string, values: unknown[]) => {
            const res = await client.query<R>(text, values);
            return res.rows;
          })
        );
        await client.query('COMMIT');
        return result;
      } catch (err) {
        await client.query('ROLLBACK');
        throw err;
      } finally {
        client.release();
      }
    },
  };
}
