import { z } from "zod";

const iataCode = z
  .string()
  .regex(/^[A-Z]{3}$/, "must be a 3-letter uppercase IATA code");

const isoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "must be a YYYY-MM-DD date");

/** Raw round-trip fare as handed over by a fare source. */
export const fareObservationSchema = z.object({
  origin: iataCode,
  destination: iataCode,
  outbound_date: isoDate,
  return_date: isoDate,
  price: z.number().finite().nonnegative(), // reference currency
  currency: z.string().min(1).default("EUR"),
  carrier: z.string().default(""),
  observed_at: z.string().datetime({ offset: true }).optional(),
});

export type FareObservationInput = z.input<typeof fareObservationSchema>;
export type FareObservation = z.output<typeof fareObservationSchema>;

export interface FareQuery {
  origin: string;
  destination: string;
  outbound_date: string;
  return_date: string;
  max_results?: number;
}

export interface FareSource {
  readonly name: string;
  searchRoundTrips(query: FareQuery): Promise<FareObservationInput[]>;
  isAvailable(): boolean;
}
