import DEBUG from "debug";
import { differenceInMilliseconds } from "date-fns";
import { defer, from, Observable, of, throwError } from "rxjs";
import { catchError, map } from "rxjs/operators";
import { z } from "zod";
import type { RateType } from "../tariff/types";
import {
  EvTrackerApiError,
  EvTrackerAuthenticationError,
  EvTrackerConnectionError,
  EvTrackerRateLimitError,
  EvTrackerValidationError,
} from "./errors";

const debug = DEBUG("ev-tracker.api");

export const VERSION = "1.0.0";
export const DEFAULT_RETRY_AFTER_SECONDS = 60;

export const ENDPOINTS = {
  cars: "/cars",
  state: "/homeassistant/state",
  sessions: "/sessions",
  sessionsSimple: "/sessions/simple",
} as const;

const carSchema = z
  .object({
    id: z.number(),
    name: z.string().nullish(),
  })
  .passthrough();

const periodSchema = z
  .object({
    energyConsumedKwh: z.number().nullish(),
    totalCostWithVat: z.number().nullish(),
    sessionCount: z.number().nullish(),
    averageCostPerKwh: z.number().nullish(),
    currency: z.string().nullish(),
  })
  .passthrough();

const lastSessionSchema = z
  .object({
    energyConsumedKwh: z.number().nullish(),
    totalCostWithVat: z.number().nullish(),
    carName: z.string().nullish(),
    startTime: z.string().nullish(),
    endTime: z.string().nullish(),
    provider: z.string().nullish(),
    location: z.string().nullish(),
  })
  .passthrough();

const stateSchema = z
  .object({
    currentMonth: periodSchema.nullish(),
    currentYear: periodSchema.nullish(),
    lastSession: lastSessionSchema.nullish(),
    cars: z.array(carSchema).nullish(),
  })
  .passthrough();

const carsResponse = z.object({ data: z.array(carSchema).default([]) });
const stateResponse = z.object({ data: stateSchema.default({}) });
const sessionResponse = z.object({
  data: z.record(z.unknown()).default({}),
});

export type Car = z.infer<typeof carSchema>;
export type TrackerState = z.infer<typeof stateSchema>;
export type LoggedSession = z.infer<typeof sessionResponse>["data"];

export type EnergySource = "GRID" | "SOLAR";

export type SessionRequest = {
  energyKwh: number;
  startTime?: Date;
  endTime?: Date;
  carId?: number;
  location?: string;
  externalId?: string;
  provider?: string;
  energySource?: EnergySource;
  rateType?: RateType;
  /** Without VAT. */
  pricePerKwh?: number;
  vatPercentage?: number;
  notes?: string;
};

export type SessionPayload = Record<string, string | number>;

/**
 * The request body for the sessions endpoints. The simple endpoint only takes
 * the fields it can fill in itself; provider, prices and notes are left out.
 */
export function buildSessionPayload(
  session: SessionRequest,
  simple: boolean
): SessionPayload {
  const payload: SessionPayload = {
    energyConsumedKwh: session.energyKwh,
  };

  if (session.startTime) {
    payload.startTime = session.startTime.toISOString();
  }
  if (session.endTime) {
    payload.endTime = session.endTime.toISOString();
  }
  if (session.carId !== undefined) {
    payload.carId = session.carId;
  }
  if (session.location) {
    payload.location = session.location;
  }
  if (session.externalId) {
    payload.externalId = session.externalId;
  }
  if (session.energySource) {
    payload.energySource = session.energySource.toUpperCase();
  }
  if (session.rateType) {
    payload.rateType = session.rateType.toUpperCase();
  }

  if (simple) {
    return payload;
  }

  if (session.provider) {
    payload.provider = session.provider;
  }
  if (session.pricePerKwh !== undefined) {
    payload.pricePerKwhWithoutVat = session.pricePerKwh;
  }
  if (session.vatPercentage !== undefined) {
    payload.vatPercentage = session.vatPercentage;
  }
  if (session.notes) {
    payload.notes = session.notes;
  }

  return payload;
}

function errorMessage(body: string): string {
  try {
    const parsed = z
      .object({ error: z.object({ message: z.string().optional() }).optional() })
      .safeParse(JSON.parse(body));

    if (parsed.success) {
      return parsed.data.error?.message ?? "Unknown error";
    }
  } catch (e) {
    debug("error body is not JSON: %s", e instanceof Error ? e.message : e);
  }

  return body;
}

function retryAfter(header: string | null): number {
  const seconds = Number(header ?? DEFAULT_RETRY_AFTER_SECONDS);
  return Number.isFinite(seconds) ? seconds : DEFAULT_RETRY_AFTER_SECONDS;
}

type Method = "GET" | "POST";

/**
 * Client for the EV Tracker cloud. Every call is lazy and runs again on every
 * subscription.
 */
export default class EvTrackerApi {
  private apiKey: string;
  private baseUrl: string;

  constructor(apiKey: string, baseUrl: string) {
    this.apiKey = apiKey;
    this.baseUrl = baseUrl.replace(/\/+$/, "");
  }

  private headers(): Record<string, string> {
    return {
      "x-api-key": this.apiKey,
      "Content-Type": "application/json",
      Accept: "application/json",
      "User-Agent": `ev-tracker-hass/${VERSION}`,
    };
  }

  private async request(
    method: Method,
    endpoint: string,
    body?: SessionPayload
  ): Promise<unknown> {
    const url = `${this.baseUrl}${endpoint}`;
    debug("API request %s %s", method, url);
    const start = new Date();

    let response: Response;
    try {
      response = await fetch(url, {
        method,
        headers: this.headers(),
        body: body ? JSON.stringify(body) : undefined,
      });
    } catch (err: unknown) {
      debug("failed fetching %s %s", method, url);
      throw new EvTrackerConnectionError(err);
    }

    debug(
      "API response %d for %s %s in %dms",
      response.status,
      method,
      url,
      differenceInMilliseconds(new Date(), start)
    );

    if (response.status === 401) {
      throw new EvTrackerAuthenticationError("Invalid API key");
    }

    if (response.status === 403) {
      throw new EvTrackerAuthenticationError(
        "API key lacks required permissions or PRO subscription required"
      );
    }

    if (response.status === 429) {
      throw new EvTrackerRateLimitError(
        retryAfter(response.headers.get("Retry-After"))
      );
    }

    if (response.status >= 500) {
      const text = await response.text();
      throw new EvTrackerApiError(`Server error: ${response.status} - ${text}`);
    }

    if (response.status >= 400) {
      const text = await response.text();
      throw new EvTrackerValidationError(response.status, errorMessage(text));
    }

    try {
      const json: unknown = await response.json();
      return json;
    } catch (err: unknown) {
      throw new EvTrackerApiError(
        `Invalid JSON from ${endpoint}: ${err instanceof Error ? err.message : String(err)}`
      );
    }
  }

  private call$<S extends z.ZodTypeAny>(
    method: Method,
    endpoint: string,
    schema: S,
    body?: SessionPayload
  ): Observable<z.output<S>> {
    return defer(() => from(this.request(method, endpoint, body))).pipe(
      map((json) => {
        const parsed = schema.safeParse(json);
        if (!parsed.success) {
          throw new EvTrackerApiError(
            `Unexpected response from ${endpoint}: ${parsed.error.message}`
          );
        }

        return parsed.data;
      })
    );
  }

  getCars$(): Observable<Car[]> {
    return this.call$("GET", ENDPOINTS.cars, carsResponse).pipe(
      map((response) => response.data)
    );
  }

  /**
   * All statistics the Home Assistant sensors show.
   */
  getState$(): Observable<TrackerState> {
    return this.call$("GET", ENDPOINTS.state, stateResponse).pipe(
      map((response) => response.data)
    );
  }

  logSession$(session: SessionRequest): Observable<LoggedSession> {
    const payload = buildSessionPayload(session, false);
    debug("logging session %j", payload);

    return this.call$("POST", ENDPOINTS.sessions, sessionResponse, payload).pipe(
      map((response) => response.data)
    );
  }

  logSessionSimple$(session: SessionRequest): Observable<LoggedSession> {
    const payload = buildSessionPayload(session, true);
    debug("logging simple session %j", payload);

    return this.call$(
      "POST",
      ENDPOINTS.sessionsSimple,
      sessionResponse,
      payload
    ).pipe(map((response) => response.data));
  }

  /**
   * true when the key can list cars. Any API error counts as an invalid key.
   */
  validateApiKey$(): Observable<boolean> {
    return this.getCars$().pipe(
      map(() => true),
      catchError((err: unknown) => {
        if (err instanceof EvTrackerApiError) {
          debug("API key validation failed: %s", err.message);
          return of(false);
        }

        return throwError(() => err);
      })
    );
  }
}
