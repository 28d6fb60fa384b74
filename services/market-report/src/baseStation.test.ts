import { describe, expect, it } from '@jest/globals';
import { resolveBaseStation } from './baseStation.js';
import { UnresolvableStationError } from './errors.js';
import { createInMemoryDirectories } from './testFixtures.js';

const { stations } = createInMemoryDirectories({
  bids: [],
  stations: [
    { code: 'HUB', name: 'Hub', regionId: 1, districtId: 2, localityId: 3 },
    { code: 'S1', name: 'Siding', regionId: 1, districtId: 2, localityId: 3 },
    { code: 'S2', name: 'Far', regionId: 5, districtId: 6, regionName: 'North', districtName: 'Lake' },
    { code: 'S3', name: 'Loose', regionId: 1 },
  ],
  baseStations: [{ regionId: 1, districtId: 2, localityId: 3, stationCode: 'HUB' }],
  routes: [],
});

async function failure(stationCode: string): Promise<UnresolvableStationError> {
  try {
    await resolveBaseStation(stations, stationCode);
  } catch (err) {
    if (err instanceof UnresolvableStationError) return err;
    throw err;
  }
  throw new Error('expected an UnresolvableStationError');
}

describe('resolveBaseStation', () => {
  it('maps a station to the base station of its location', async () => {
    await expect(resolveBaseStation(stations, 'S1')).resolves.toBe('HUB');
    await expect(resolveBaseStation(stations, 'HUB')).resolves.toBe('HUB');
  });

  it('rejects unknown stations', async () => {
    const err = await failure('NOPE');
    expect(err.stationCode).toBe('NOPE');
    expect(err.code).toBe('UNRESOLVABLE_STATION');
  });

  it('rejects stations without a district', async () => {
    expect((await failure('S3')).message).toBe(
      'Station with code "S3" doesn\'t have region and/or district. Please specify it.'
    );
  });

  it('names the location when no base station serves it', async () => {
    expect((await failure('S2')).message).toBe(
      'Base station for location "North", "Lake", "" was not found. Please specify it.'
    );
  });
});
