import DEBUG from "debug";
import { defer, EMPTY, Observable } from "rxjs";
import { catchError, map, mergeMap, tap } from "rxjs/operators";
import { resolvePrice } from "../tariff/resolvePrice";
import { resolveRateType } from "../tariff/resolveRateType";
import type { StateLookup } from "../tariff/types";
import type Coordinator from "./coordinator";
import type EvTrackerApi from "./EvTrackerApi";
import type { SessionRequest } from "./EvTrackerApi";
import type { Installation } from "./installation";
import {
  parseSessionCall,
  SERVICE_LOG_SESSION_SIMPLE,
  SessionService,
} from "./serviceSchemas";

const debug = DEBUG("ev-tracker.log-session");

/**
 * One configured car with the clients that serve it.
 */
export type InstallationRuntime = {
  installation: Installation;
  api: Pick<EvTrackerApi, "logSession$" | "logSessionSimple$">;
  coordinator: Pick<Coordinator, "requestRefresh">;
};

export type LogSessionDependencies = {
  runtimes: InstallationRuntime[];
  lookup: StateLookup;
  now?: () => Date;
};

export function selectInstallation(
  runtimes: InstallationRuntime[],
  carId: number | undefined
): InstallationRuntime {
  if (runtimes.length === 0) {
    throw new Error("No EV Tracker cars configured");
  }

  if (carId === undefined) {
    return runtimes[0];
  }

  const runtime = runtimes.find(
    (candidate) => candidate.installation.carId === carId
  );
  if (!runtime) {
    throw new Error(`No installation found for car_id: ${carId}`);
  }

  return runtime;
}

/**
 * Fills in what the call left out: the car, the rate type and, for the full
 * service, the price.
 */
export function completeSession(
  service: SessionService,
  request: SessionRequest,
  installation: Installation,
  lookup: StateLookup,
  now: Date
): SessionRequest {
  const rateType = resolveRateType(
    { rateType: request.rateType },
    installation.tariffSource,
    lookup,
    now
  );
  if (!request.rateType && rateType) {
    debug("detected rate type %s for car %d", rateType, installation.carId);
  }

  const session: SessionRequest = {
    ...request,
    carId: installation.carId,
    rateType,
  };

  if (service === SERVICE_LOG_SESSION_SIMPLE) {
    return session;
  }

  return {
    ...session,
    ...resolvePrice(
      {
        pricePerKwh: request.pricePerKwh,
        vatPercentage: request.vatPercentage,
      },
      installation.prices,
      rateType
    ),
  };
}

/**
 * Handles one call of a session logging service. Errors when the call does not
 * validate, no car matches or the API rejects the session.
 */
export function logSession$(
  service: SessionService,
  data: unknown,
  { runtimes, lookup, now = () => new Date() }: LogSessionDependencies
): Observable<string> {
  return defer(() => {
    const request = parseSessionCall(service, data);
    const runtime = selectInstallation(runtimes, request.carId);
    const session = completeSession(
      service,
      request,
      runtime.installation,
      lookup,
      now()
    );

    const logged$ =
      service === SERVICE_LOG_SESSION_SIMPLE
        ? runtime.api.logSessionSimple$(session)
        : runtime.api.logSession$(session);

    return logged$.pipe(
      tap(() => runtime.coordinator.requestRefresh()),
      map(
        () =>
          `logged ${session.energyKwh} kWh for car ${runtime.installation.carId}`
      )
    );
  });
}

/**
 * Logs a session for every call that comes in. A failing call is reported and
 * dropped, the calls after it are still handled.
 */
export function handleSessionCalls$(
  service: SessionService,
  calls$: Observable<unknown>,
  dependencies: LogSessionDependencies
): Observable<string> {
  return calls$.pipe(
    mergeMap((data) =>
      logSession$(service, data, dependencies).pipe(
        catchError((err: unknown) => {
          console.error(
            `${service} failed:`,
            err instanceof Error ? err.message : err
          );
          return EMPTY;
        })
      )
    )
  );
}
