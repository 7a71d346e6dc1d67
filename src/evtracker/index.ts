import DEBUG from "debug";
import { EMPTY, merge, Observable, of } from "rxjs";
import {
  catchError,
  distinctUntilChanged,
  filter,
  map,
  switchMap,
  tap,
} from "rxjs/operators";
import { minuteTick$ } from "../helpers/minuteTick";
import type BinarySensor from "../services/BinarySensor";
import type Config from "../services/Config";
import { carDevice } from "../services/Discovery";
import type Events from "../services/Events";
import type Sensor from "../services/Sensor";
import type StateStore from "../services/StateStore";
import type States from "../services/States";
import { lowTariff$, lowTariffAttributes } from "../tariff/lowTariff";
import type { EntityAttributes } from "../types";
import Coordinator, { CoordinatorData } from "./coordinator";
import EvTrackerApi from "./EvTrackerApi";
import type { Installation } from "./installation";
import { handleSessionCalls$, InstallationRuntime } from "./logSession";
import {
  SERVICE_LOG_SESSION,
  SERVICE_LOG_SESSION_SIMPLE,
} from "./serviceSchemas";
import { STATISTIC_SENSORS, StatisticSensorDescription } from "./sensors";

const debug = DEBUG("ev-tracker.cars");

export type EvTrackerServices = {
  config: Pick<Config, "root$">;
  states: Pick<States, "state$">;
  events: Pick<Events, "type$">;
  stateStore: Pick<StateStore, "lookup">;
  binarySensor: Pick<BinarySensor, "create$">;
  sensor: Pick<Sensor, "create$">;
};

export type TrackerApi = Pick<
  EvTrackerApi,
  "getState$" | "getCars$" | "validateApiKey$" | "logSession$" | "logSessionSimple$"
>;

export type CreateApi = (apiKey: string, baseUrl: string) => TrackerApi;

type CarRuntime = InstallationRuntime & {
  api: TrackerApi;
  coordinator: Coordinator;
};

function sameAttributes(a: EntityAttributes, b: EntityAttributes): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}

/**
 * Logs a rejected key or a car the account does not know. The car keeps
 * running either way.
 */
export function verifyInstallation$(
  api: Pick<EvTrackerApi, "validateApiKey$" | "getCars$">,
  installation: Installation
): Observable<string> {
  const { carId } = installation;

  return api.validateApiKey$().pipe(
    switchMap((valid) => {
      if (!valid) {
        console.error(`the EV Tracker API key of car ${carId} was rejected`);
        return EMPTY;
      }

      return api.getCars$().pipe(
        map((cars) => cars.some((car) => car.id === carId)),
        tap((known) => {
          if (!known) {
            console.error(`car ${carId} is not on this EV Tracker account`);
          }
        }),
        map((known) => `car ${carId} verified: ${known}`)
      );
    }),
    catchError((err: unknown) => {
      console.error(
        `could not verify car ${carId}:`,
        err instanceof Error ? err.message : err
      );
      return EMPTY;
    })
  );
}

function statisticSensor$(
  services: EvTrackerServices,
  runtime: CarRuntime,
  description: StatisticSensorDescription
): Observable<string> {
  const { installation, coordinator } = runtime;
  const withState$ = coordinator.data$.pipe(
    filter(
      (data): data is CoordinatorData & { state: NonNullable<CoordinatorData["state"]> } =>
        data.state !== undefined
    )
  );

  const value$ = withState$.pipe(
    map((data) => description.value(data.state)),
    filter((value): value is number => value !== undefined && value !== null)
  );

  const { attributes } = description;
  const attributes$ = attributes
    ? withState$.pipe(
        map((data) => attributes(data.state)),
        filter((value): value is EntityAttributes => value !== undefined),
        distinctUntilChanged(sameAttributes)
      )
    : undefined;

  return services.sensor
    .create$(value$, `${installation.carId}_${description.key}`, {
      name: description.name,
      unit: description.unit,
      deviceClass: description.deviceClass,
      stateClass: description.stateClass,
      icon: description.icon,
      attributes$,
      device: carDevice(installation.carId, installation.carName),
    })
    .pipe(map(({ id, state }) => `${id} -> ${state}`));
}

/**
 * Every entity of one car: the low tariff indicator, the statistics and the
 * connection status.
 */
function carEntities$(
  services: EvTrackerServices,
  runtime: CarRuntime
): Observable<string> {
  const { installation, coordinator, api } = runtime;
  const device = carDevice(installation.carId, installation.carName);
  const source = installation.tariffSource;

  const lowTariffSensor$ =
    source.type === "none"
      ? EMPTY
      : services.binarySensor.create$(
          lowTariff$(source, {
            tick$: minuteTick$(),
            state$: (entityId) =>
              services.states.state$(entityId).pipe(map((entity) => entity?.state)),
          }),
          `${installation.carId}_low_tariff`,
          {
            name: "Low Tariff",
            icon: "mdi:flash",
            attributes$: of(lowTariffAttributes(source)),
            device,
          }
        );

  const connected$ = services.binarySensor.create$(
    coordinator.data$.pipe(map((data) => data.lastUpdateSuccess)),
    `${installation.carId}_connected`,
    { name: "Connected", deviceClass: "connectivity", device }
  );

  const statistics$ = STATISTIC_SENSORS.map((description) =>
    statisticSensor$(services, runtime, description)
  );

  return merge(
    verifyInstallation$(api, installation),
    merge(lowTariffSensor$, connected$).pipe(
      map(({ id, state }) => `${id} -> ${state ? "ON" : "OFF"}`)
    ),
    ...statistics$
  );
}

/**
 * The whole EV Tracker integration for every configured car.
 */
export function createEvTracker$(
  services: EvTrackerServices,
  createApi: CreateApi = (apiKey, baseUrl) => new EvTrackerApi(apiKey, baseUrl)
): Observable<string> {
  return services.config.root$().pipe(
    switchMap((config) => {
      debug("tracking %d cars", config.installations.length);

      const runtimes: CarRuntime[] = config.installations.map((installation) => {
        const api = createApi(installation.apiKey, config.evTracker.baseUrl);
        return {
          installation,
          api,
          coordinator: new Coordinator(api, {
            carId: installation.carId,
            updateInterval: installation.updateInterval,
            debug: debug.extend(`car-${installation.carId}`),
          }),
        };
      });

      const sessionDependencies = {
        runtimes,
        lookup: services.stateStore.lookup,
      };

      return merge(
        ...runtimes.map((runtime) => carEntities$(services, runtime)),
        handleSessionCalls$(
          SERVICE_LOG_SESSION,
          services.events.type$(SERVICE_LOG_SESSION),
          sessionDependencies
        ),
        handleSessionCalls$(
          SERVICE_LOG_SESSION_SIMPLE,
          services.events.type$(SERVICE_LOG_SESSION_SIMPLE),
          sessionDependencies
        )
      );
    })
  );
}
