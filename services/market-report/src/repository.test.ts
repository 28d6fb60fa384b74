import { afterAll, beforeAll, describe, expect, it } from '@jest/globals';
import { Pool } from 'pg';
import pino from 'pino';
import { createMarketEngine } from './market.js';
import { createPgDirectories } from './repository.js';
import { createTestPool, seedMarket } from './testDatabase.js';

describe('pg market directories', () => {
  let pool: Pool;
  let directories: ReturnType<typeof createPgDirectories>;

  beforeAll(async () => {
    pool = createTestPool();
    await seedMarket(pool);
    directories = createPgDirectories(pool);
  });

  afterAll(async () => {
    await pool.end();
  });

  it('fetches current bids of one direction with their service prices in order', async () => {
    const bids = await directories.bids.fetchActiveBids('SELL');

    expect(bids.map((bid) => bid.id)).toEqual([10, 11]);
    expect(bids[0]).toMatchObject({
      direction: 'SELL',
      taxMode: 'EXCLUDED',
      price: 1000,
      qualityClass: '3',
      isActive: true,
      archiveDate: null,
      elevator: { id: 1, name: 'Elevator B', stationCode: 'B', stationName: 'Station B', servicePrices: [70, 50] },
    });
    expect(bids[0].transportationPrice).toBeUndefined();
    expect(bids[0].elevator.baseStationCode).toBeUndefined();
    expect(bids[1]).toMatchObject({
      taxMode: 'INCLUDED',
      price: 1200,
      qualityClass: '4',
      elevator: { stationCode: 'A2', baseStationCode: 'A', servicePrices: [] },
    });
  });

  it('fetches buy bids separately', async () => {
    const bids = await directories.bids.fetchActiveBids('BUY');
    expect(bids.map((bid) => bid.id)).toEqual([14]);
    expect(bids[0].direction).toBe('BUY');
  });

  it('attaches the first route price to bids priced for a destination', async () => {
    const bids = await directories.bids.fetchBidsPricedForDestination('A', 'SELL');

    expect(bids.map((bid) => bid.id)).toEqual([10]);
    expect(bids[0].transportationPrice).toEqual({ excluded: 200, included: 240 });
    expect(bids[0].elevator.servicePrices).toEqual([70, 50]);
  });

  it('leaves a missing tax-included route price unset', async () => {
    const bids = await directories.bids.fetchBidsPricedForDestination('A', 'BUY');
    expect(bids.map((bid) => bid.id)).toEqual([14]);
    expect(bids[0].transportationPrice).toEqual({ excluded: 300, included: undefined });
  });

  it('returns nothing for a destination without routes', async () => {
    expect(await directories.bids.fetchBidsPricedForDestination('B', 'SELL')).toEqual([]);
  });

  it('finds stations by code', async () => {
    expect(await directories.stations.findStation('D')).toEqual({
      code: 'D',
      name: 'Station D',
      regionId: 4,
      regionName: 'Region 4',
      districtId: 4,
      districtName: 'District 4',
      localityId: 40,
      localityName: 'Locality 40',
    });
    expect(await directories.stations.findStation('nope')).toBeNull();
  });

  it('finds base stations by region, district and locality', async () => {
    expect((await directories.stations.findBaseStation(1, 1, null))?.code).toBe('A');
    expect((await directories.stations.findBaseStation(4, 4, 40))?.code).toBe('D');
    expect(await directories.stations.findBaseStation(4, 4, null)).toBeNull();
    expect(await directories.stations.findBaseStation(9, 9, null)).toBeNull();
  });

  it('runs reads inside a snapshot', async () => {
    const bids = await directories.snapshot(({ bids }) => bids.fetchActiveBids('BUY'));
    expect(bids.map((bid) => bid.id)).toEqual([14]);
  });

  it('rolls the snapshot back when the work fails', async () => {
    await expect(
      directories.snapshot(async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
    expect(await directories.stations.findStation('A')).not.toBeNull();
  });
});

describe('pg market directories with a route from an elevator station', () => {
  let pool: Pool;

  beforeAll(async () => {
    pool = createTestPool();
    await seedMarket(pool);
    await pool.query(
      `INSERT INTO transportation_prices (station_from_code, station_to_code, price, price_nds) VALUES ('A2', 'B', 150, 180)`
    );
  });

  afterAll(async () => {
    await pool.end();
  });

  it('joins the route on the elevator station rather than its base station', async () => {
    const bids = await createPgDirectories(pool).bids.fetchBidsPricedForDestination('B', 'SELL');

    expect(bids.map((bid) => bid.id)).toEqual([11]);
    expect(bids[0].elevator).toMatchObject({ stationCode: 'A2', baseStationCode: 'A' });
    expect(bids[0].transportationPrice).toEqual({ excluded: 150, included: 180 });
  });

  it('prices the market for the destination through the engine', async () => {
    const engine = createMarketEngine({ directories: createPgDirectories(pool), logger: pino({ level: 'silent' }) });

    const view = await engine.computeMarketView({ direction: 'SELL', stationCode: 'B' });

    // Bid 10 is loaded at B itself; bid 11 is tax-included and ships from A2 at 180.
    expect(view.map((group) => group.rows.map((row) => [row.bid.id, row.comparisonPrice]))).toEqual([
      [[10, 1000]],
      [[11, 1380]],
    ]);
    expect(view[1].rows[0].deliveredPrice).toBe(1380);
  });
});
