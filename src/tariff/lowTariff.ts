import { concat, defer, EMPTY, Observable, of } from "rxjs";
import { distinctUntilChanged, map } from "rxjs/operators";
import { isLowTariffState } from "./classifyTariffState";
import { isLowTariff } from "./isLowTariff";
import type { EntityAttributes } from "../types";
import type { TariffScheduleConfig, TariffSource } from "./types";

export type LowTariffDependencies = {
  /**
   * Emits the current date whenever the schedule should be re-evaluated.
   */
  tick$: Observable<Date>;
  /**
   * The state of an entity, undefined while it does not exist.
   */
  state$: (entityId: string) => Observable<string | undefined>;
  now?: () => Date;
};

export function scheduleLowTariff$(
  schedule: TariffScheduleConfig,
  tick$: Observable<Date>,
  now: () => Date = () => new Date()
): Observable<boolean> {
  return concat(
    defer(() => of(now())),
    tick$
  ).pipe(
    map((date) => isLowTariff(schedule, date)),
    distinctUntilChanged()
  );
}

export function entityLowTariff$(
  entityId: string | undefined,
  state$: (entityId: string) => Observable<string | undefined>
): Observable<boolean> {
  if (!entityId) {
    return of(false);
  }

  return state$(entityId).pipe(
    map((state) => typeof state !== "undefined" && isLowTariffState(state)),
    distinctUntilChanged()
  );
}

/**
 * Whether the low tariff is active, for as long as it is subscribed.
 * Completes without emitting when there is no tariff source.
 */
export function lowTariff$(
  source: TariffSource,
  dependencies: LowTariffDependencies
): Observable<boolean> {
  switch (source.type) {
    case "schedule":
      return scheduleLowTariff$(
        source.schedule,
        dependencies.tick$,
        dependencies.now
      );
    case "entity":
      return entityLowTariff$(source.entityId, dependencies.state$);
    case "none":
      return EMPTY;
  }
}

export function lowTariffAttributes(source: TariffSource): EntityAttributes {
  switch (source.type) {
    case "schedule": {
      const attributes: EntityAttributes = {
        tariff_source: source.type,
        window_type: source.schedule.windowType,
      };

      source.schedule.windows.forEach((window, index) => {
        attributes[`window_${index + 1}_start`] = window.start;
        attributes[`window_${index + 1}_end`] = window.end;
      });

      attributes.weekend_always_low = source.schedule.weekendAlwaysLow;

      return attributes;
    }
    case "entity":
      return { tariff_source: source.type, source_entity: source.entityId ?? null };
    case "none":
      return { tariff_source: source.type };
  }
}
