// In-process Postgres (pg-mem) loaded with the service schema and a small market.
import { readFileSync } from 'fs';
import path from 'path';
import { Pool } from 'pg';
import { newDb } from 'pg-mem';

const schemaPath = path.join(__dirname, '..', 'db', 'schema.sql');

export function createTestPool(): Pool {
  const db = newDb();
  db.public.none(readFileSync(schemaPath, 'utf8'));
  const { Pool: MemPool } = db.adapters.createPg();
  return new MemPool();
}

/**
 * Stations A and A2 share base station A, B and D are their own base
 * stations. Routes exist from B and D to A; B to A is listed twice.
 */
export async function seedMarket(pool: Pool): Promise<void> {
  await pool.query(`
    INSERT INTO stations (code, name, region_id, region_name, district_id, district_name, locality_id, locality_name) VALUES
      ('A', 'Station A', 1, 'Region 1', 1, 'District 1', NULL, NULL),
      ('A2', 'Station A2', 1, 'Region 1', 1, 'District 1', NULL, NULL),
      ('B', 'Station B', 2, 'Region 2', 2, 'District 2', NULL, NULL),
      ('D', 'Station D', 4, 'Region 4', 4, 'District 4', 40, 'Locality 40'),
      ('X', 'Station X', NULL, NULL, NULL, NULL, NULL, NULL);

    INSERT INTO base_stations (region_id, district_id, locality_id, station_code) VALUES
      (1, 1, NULL, 'A'),
      (2, 2, NULL, 'B'),
      (4, 4, 40, 'D');

    INSERT INTO elevators (id, name, station_code, base_station_code) VALUES
      (1, 'Elevator B', 'B', NULL),
      (2, 'Elevator A2', 'A2', 'A'),
      (3, 'Elevator D', 'D', NULL),
      (4, 'Elevator X', 'X', NULL);

    INSERT INTO elevator_service_prices (elevator_id, price) VALUES
      (1, 70),
      (1, 50);

    INSERT INTO bids (id, bid_type, nds, price, quality_class, elevator_id, is_active, archive_date) VALUES
      (10, 'SELL', 'EXCLUDED', 1000, '3', 1, true, NULL),
      (11, 'SELL', 'INCLUDED', 1200, '4', 2, true, NULL),
      (12, 'SELL', 'EXCLUDED', 800, '3', 3, true, '2024-01-10T00:00:00Z'),
      (13, 'SELL', 'EXCLUDED', 700, '3', 1, false, NULL),
      (14, 'BUY', 'EXCLUDED', 3000, '3', 3, true, NULL);

    INSERT INTO transportation_prices (station_from_code, station_to_code, price, price_nds) VALUES
      ('B', 'A', 200, 240),
      ('D', 'A', 300, NULL),
      ('B', 'A', 999, 999);
  `);
}
