// User-facing messages shown on the market error page.

export function cannotResolveStation(stationCode: string, stationName?: string): string {
  const suffix = stationName ? ` (${stationName})` : '';
  return `Невозможно вычислить базовую станцию для станции ${stationCode}${suffix}`;
}

export function noTransportationPrice(fromBaseStation: string, toBaseStation: string): string {
  return `Нет цены для перевозки из ${fromBaseStation} в ${toBaseStation}`;
}
