import DEBUG, { Debugger } from "debug";
import {
  asyncScheduler,
  merge,
  Observable,
  of,
  SchedulerLike,
  Subject,
  timer,
} from "rxjs";
import { catchError, map, scan, shareReplay, switchMap, tap } from "rxjs/operators";
import type EvTrackerApi from "./EvTrackerApi";
import type { TrackerState } from "./EvTrackerApi";

export type CoordinatorData = {
  /**
   * The statistics of the last poll that succeeded.
   */
  state?: TrackerState;
  lastUpdateSuccess: boolean;
};

export type CoordinatorOptions = {
  carId: number;
  /**
   * In milliseconds.
   */
  updateInterval: number;
  scheduler?: SchedulerLike;
  debug?: Debugger;
};

/**
 * Polls the statistics of one car. A failed poll keeps the previous statistics
 * and only flips lastUpdateSuccess, so the stream itself never errors.
 */
export default class Coordinator {
  readonly data$: Observable<CoordinatorData>;

  private refresh$ = new Subject<void>();

  constructor(
    api: Pick<EvTrackerApi, "getState$">,
    { carId, updateInterval, scheduler = asyncScheduler, debug = DEBUG("ev-tracker.coordinator") }: CoordinatorOptions
  ) {
    this.data$ = merge(timer(0, updateInterval, scheduler), this.refresh$).pipe(
      tap(() => debug("polling statistics of car %d", carId)),
      switchMap(() =>
        api.getState$().pipe(
          map((state): CoordinatorData => ({ state, lastUpdateSuccess: true })),
          catchError((err: unknown) => {
            console.error(
              `error fetching EV Tracker data for car ${carId}:`,
              err instanceof Error ? err.message : err
            );
            return of<CoordinatorData>({ lastUpdateSuccess: false });
          })
        )
      ),
      scan(
        (previous: CoordinatorData, next: CoordinatorData): CoordinatorData =>
          next.lastUpdateSuccess ? next : { ...next, state: previous.state },
        { lastUpdateSuccess: false }
      ),
      shareReplay({ bufferSize: 1, refCount: true })
    );
  }

  /**
   * Polls again right away, e.g. after a session was logged.
   */
  requestRefresh(): void {
    this.refresh$.next();
  }
}
