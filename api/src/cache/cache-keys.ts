/**
 * Flight Board Cache Keys
 * @module cache/cache-keys
 */

export const CacheKeyPrefixes = {
  FLIGHTS: 'flights',
  FLIGHT_DETAIL: 'flight:detail',
} as const;

export const CacheKeys = {
  allFlights: (): string => `${CacheKeyPrefixes.FLIGHTS}:all`,
  flightsByDeparture: (date: string): string => `${CacheKeyPrefixes.FLIGHTS}:departure:${date}`,
  flightsByArrival: (date: string): string => `${CacheKeyPrefixes.FLIGHTS}:arrival:${date}`,
  flightsByStatus: (status: string): string => `${CacheKeyPrefixes.FLIGHTS}:status:${status.toLowerCase()}`,
  flightsByAirline: (airlineCode: string): string => `${CacheKeyPrefixes.FLIGHTS}:airline:${airlineCode.toUpperCase()}`,
  flightDetail: (id: string | number): string => `${CacheKeyPrefixes.FLIGHT_DETAIL}:${id}`,
  /** Pattern matching every key under a prefix */
  patternFor: (prefix: string): string => `${prefix}:*`,
};

