import { z } from "zod"

export const FLIGHT_NUMBER_PATTERN = /^[A-Z]{1,3}\d{1,4}[A-Z]?$/

export const flightNumberSchema = z
  .string()
  .transform((val) => val.replace(/\s+/g, "").toUpperCase())
  .pipe(
    z.string().regex(FLIGHT_NUMBER_PATTERN, {
      message: "Invalid flight number format. Expected a form like 'VJ123' or 'AA100'",
    })
  )

export const iataCodeSchema = z
  .string()
  .transform((val) => val.trim().toUpperCase())
  .pipe(z.string().regex(/^[A-Z]{3}$/, { message: "IATA airport codes are three letters" }))

export const airportTimeZonesSchema = z.record(
  z.string().regex(/^[A-Z]{3}$/),
  z.string().min(1)
)

export const airlineDesignatorsSchema = z.record(
  z.string().regex(/^[A-Z0-9]{2}$/),
  z.string().min(1)
)

export type AirportTimeZones = z.infer<typeof airportTimeZonesSchema>
export type AirlineDesignators = z.infer<typeof airlineDesignatorsSchema>
