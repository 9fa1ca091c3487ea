import type { FareObservationInput, FareQuery, FareSource } from "./provider.js";
import { RateLimiter } from "../utils/rate-limiter.js";

export interface AmadeusOptions {
  client_id: string;
  client_secret: string;
  base_url: string;
  currency: string;
  limiter?: RateLimiter;
  now?: () => Date;
}

/** Round-trip fares from the Amadeus Self-Service flight-offers search. */
export class AmadeusFareSource implements FareSource {
  readonly name = "amadeus";
  private readonly options: AmadeusOptions;
  private readonly baseUrl: string;
  private readonly limiter: RateLimiter;
  private readonly now: () => Date;

  private accessToken = "";
  private tokenExpiry = 0;
  private tokenRequest: Promise<void> | null = null;

  constructor(options: AmadeusOptions) {
    this.options = options;
    this.baseUrl = options.base_url.replace(/\/+$/, "");
    this.limiter = options.limiter ?? new RateLimiter(5, 1);
    this.now = options.now ?? (() => new Date());
  }

  isAvailable(): boolean {
    return this.options.client_id.length > 0 && this.options.client_secret.length > 0;
  }

  async searchRoundTrips(query: FareQuery): Promise<FareObservationInput[]> {
    await this.ensureToken();
    await this.limiter.acquire();

    const params = new URLSearchParams({
      originLocationCode: query.origin,
      destinationLocationCode: query.destination,
      departureDate: query.outbound_date,
      returnDate: query.return_date,
      adults: "1",
      max: String(query.max_results ?? 10),
      currencyCode: this.options.currency,
    });

    const resp = await fetch(`${this.baseUrl}/v2/shopping/flight-offers?${params}`, {
      headers: { Authorization: `Bearer ${this.accessToken}` },
    });

    if (!resp.ok) {
      const body = await resp.text();
      throw new Error(`Amadeus API error: ${resp.status} ${body}`);
    }

    const data = (await resp.json()) as AmadeusResponse;
    const observedAt = this.now().toISOString();
    const fares: FareObservationInput[] = [];
    for (const offer of data.data ?? []) {
      const fare = this.normalize(offer, query, observedAt);
      if (fare) fares.push(fare);
    }
    return fares;
  }

  /** Concurrent searches share one in-flight token request. */
  private async ensureToken(): Promise<void> {
    if (this.accessToken && this.now().getTime() < this.tokenExpiry) return;

    if (!this.tokenRequest) {
      this.tokenRequest = this.fetchToken().finally(() => {
        this.tokenRequest = null;
      });
    }
    await this.tokenRequest;
  }

  private async fetchToken(): Promise<void> {
    await this.limiter.acquire();
    const resp = await fetch(`${this.baseUrl}/v1/security/oauth2/token`, {
      method: "POST",
      headers: { "Content-Type": "application/x-www-form-urlencoded" },
      body: new URLSearchParams({
        grant_type: "client_credentials",
        client_id: this.options.client_id,
        client_secret: this.options.client_secret,
      }),
    });

    if (!resp.ok) {
      throw new Error(`Amadeus OAuth error: ${resp.status}`);
    }

    const token = (await resp.json()) as {
      access_token: string;
      expires_in: number;
    };
    this.accessToken = token.access_token;
    // Refresh 60s before expiry
    this.tokenExpiry = this.now().getTime() + (token.expires_in - 60) * 1000;
  }

  /** Offers in another currency are dropped; there is no conversion. */
  private normalize(offer: AmadeusOffer, query: FareQuery, observedAt: string): FareObservationInput | null {
    const price = parseFloat(offer.price?.total ?? "");
    if (!Number.isFinite(price)) return null;
    if (offer.price?.currency !== this.options.currency) return null;

    const outbound = offer.itineraries?.[0]?.segments?.[0];
    const inbound = offer.itineraries?.[1]?.segments?.[0];

    return {
      origin: query.origin,
      destination: query.destination,
      outbound_date: outbound?.departure?.at?.slice(0, 10) ?? query.outbound_date,
      return_date: inbound?.departure?.at?.slice(0, 10) ?? query.return_date,
      price,
      currency: offer.price.currency,
      carrier: offer.validatingAirlineCodes?.[0] ?? outbound?.carrierCode ?? "",
      observed_at: observedAt,
    };
  }
}

interface AmadeusSegment {
  carrierCode: string;
  number: string;
  departure: { iataCode: string; at: string };
  arrival: { iataCode: string; at: string };
}

interface AmadeusOffer {
  id: string;
  price: { total: string; currency: string };
  itineraries: Array<{
    duration: string;
    segments: AmadeusSegment[];
  }>;
  validatingAirlineCodes?: string[];
}

interface AmadeusResponse {
  data?: AmadeusOffer[];
}
