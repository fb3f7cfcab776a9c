import { UNKNOWN_AIRLINE, type TravelHistory } from './types';

export interface TravelStatistics {
  totalFlights: number;
  uniqueAirlines: number;
  flightsByMonth: Record<string, number>;   // "2024-06" -> 3
  mostFrequentRoute: { route: string; count: number } | null;
  totalDurationMinutes: number;
}

export function generateStatistics(history: TravelHistory): TravelStatistics {
  const airlines = new Set<string>();
  const flightsByMonth: Record<string, number> = {};
  const routes = new Map<string, number>();
  let totalDurationMinutes = 0;

  for (const flight of history) {
    if (flight.airline !== UNKNOWN_AIRLINE) {
      airlines.add(flight.airline);
    }

    // Local calendar month, read straight off the offset timestamp
    const month = flight.departure.slice(0, 7);
    flightsByMonth[month] = (flightsByMonth[month] ?? 0) + 1;

    const route = `${flight.origin}-${flight.destination}`;
    routes.set(route, (routes.get(route) ?? 0) + 1);

    totalDurationMinutes += flight.durationMinutes ?? 0;
  }

  let mostFrequentRoute: TravelStatistics['mostFrequentRoute'] = null;
  for (const [route, count] of routes) {
    if (
      !mostFrequentRoute ||
      count > mostFrequentRoute.count ||
      (count === mostFrequentRoute.count && route < mostFrequentRoute.route)
    ) {
      mostFrequentRoute = { route, count };
    }
  }

  return {
    totalFlights: history.length,
    uniqueAirlines: airlines.size,
    flightsByMonth,
    mostFrequentRoute,
    totalDurationMinutes
  };
}
