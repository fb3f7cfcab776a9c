import airportData from '../data/airports.json';
import airlineData from '../data/airlines.json';
import { airportTimeZonesSchema, airlineDesignatorsSchema } from '../validations';

const AIRPORT_TIME_ZONES = airportTimeZonesSchema.parse(airportData);
const AIRLINE_DESIGNATORS = airlineDesignatorsSchema.parse(airlineData);

export function getTimezoneForAirport(iata: string): string | undefined {
  return AIRPORT_TIME_ZONES[iata.toUpperCase()];
}

/**
 * Airline name for the two-character designator a flight number starts with
 * ("VJ123" → "VietJet Air").
 */
export function getAirlineName(flightNumber: string): string | undefined {
  const designator = flightNumber.replace(/\s+/g, '').toUpperCase().slice(0, 2);
  return AIRLINE_DESIGNATORS[designator];
}
