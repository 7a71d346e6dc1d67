import { z } from "zod";
import type { SessionRequest } from "./EvTrackerApi";
import { ServiceCallValidationError } from "./errors";

export const SERVICE_LOG_SESSION = "ev_tracker_log_session";
export const SERVICE_LOG_SESSION_SIMPLE = "ev_tracker_log_session_simple";

export type SessionService =
  | typeof SERVICE_LOG_SESSION
  | typeof SERVICE_LOG_SESSION_SIMPLE;

const upperCased = z.string().transform((value) => value.toUpperCase());

function isFilledString(value: unknown): value is string {
  return typeof value === "string" && value.trim() !== "";
}

// Only non-blank strings are converted, null and "" stay invalid.
const numeric = z.preprocess(
  (value) => (isFilledString(value) ? Number(value) : value),
  z.number()
);
const integer = z.preprocess(
  (value) => (isFilledString(value) ? Number(value) : value),
  z.number().int()
);
const dateTime = z.preprocess(
  (value) => (isFilledString(value) ? new Date(value) : value),
  z.date()
);

const baseFields = {
  energy_kwh: numeric,
  start_time: dateTime.optional(),
  end_time: dateTime.optional(),
  car_id: integer.optional(),
  location: z.string().optional(),
  external_id: z.string().optional(),
  energy_source: upperCased.pipe(z.enum(["GRID", "SOLAR"])).optional(),
  rate_type: upperCased.pipe(z.enum(["HIGH", "LOW"])).optional(),
};

export const logSessionSimpleSchema = z.object(baseFields).strict();

export const logSessionSchema = z
  .object({
    ...baseFields,
    provider: z.string().optional(),
    price_per_kwh: numeric.optional(),
    vat_percentage: numeric.optional(),
    notes: z.string().optional(),
  })
  .strict();

type SimpleFields = z.output<typeof logSessionSimpleSchema>;

function baseRequest(data: SimpleFields): SessionRequest {
  return {
    energyKwh: data.energy_kwh,
    startTime: data.start_time,
    endTime: data.end_time,
    carId: data.car_id,
    location: data.location,
    externalId: data.external_id,
    energySource: data.energy_source,
    rateType: data.rate_type,
  };
}

function issues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
}

/**
 * Validates the data of a session logging call and turns it into a request.
 * Throws a ServiceCallValidationError when it does not validate.
 */
export function parseSessionCall(
  service: SessionService,
  data: unknown
): SessionRequest {
  if (service === SERVICE_LOG_SESSION_SIMPLE) {
    const parsed = logSessionSimpleSchema.safeParse(data);
    if (!parsed.success) {
      throw new ServiceCallValidationError(service, issues(parsed.error));
    }

    return baseRequest(parsed.data);
  }

  const parsed = logSessionSchema.safeParse(data);
  if (!parsed.success) {
    throw new ServiceCallValidationError(service, issues(parsed.error));
  }

  return {
    ...baseRequest(parsed.data),
    provider: parsed.data.provider,
    pricePerKwh: parsed.data.price_per_kwh,
    vatPercentage: parsed.data.vat_percentage,
    notes: parsed.data.notes,
  };
}
