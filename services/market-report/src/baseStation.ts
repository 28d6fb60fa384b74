import type { StationDirectory } from './directories.js';
import { UnresolvableStationError } from './errors.js';

/**
 * Maps a station to the code of the base station serving its
 * region/district/locality.
 */
export async function resolveBaseStation(stations: StationDirectory, stationCode: string): Promise<string> {
  const station = await stations.findStation(stationCode);
  if (!station) {
    throw new UnresolvableStationError(stationCode, `Station with code "${stationCode}" was not found.`);
  }
  if (station.regionId === undefined || station.districtId === undefined) {
    throw new UnresolvableStationError(
      stationCode,
      `Station with code "${stationCode}" doesn't have region and/or district. Please specify it.`
    );
  }

  const base = await stations.findBaseStation(station.regionId, station.districtId, station.localityId ?? null);
  if (!base) {
    throw new UnresolvableStationError(
      stationCode,
      `Base station for location "${station.regionName ?? ''}", "${station.districtName ?? ''}", "${
        station.localityName ?? ''
      }" was not found. Please specify it.`
    );
  }
  return base.code;
}
