import ms from "ms";
import { asyncScheduler, defer, Observable, SchedulerLike, timer } from "rxjs";
import { map } from "rxjs/operators";

const MINUTE = ms("1m");

/**
 * Emits the current date at the start of every wall clock minute.
 * The first emission is at the next minute boundary, not immediately.
 */
export function minuteTick$(
  scheduler: SchedulerLike = asyncScheduler
): Observable<Date> {
  return defer(() => {
    const untilNextMinute = MINUTE - (scheduler.now() % MINUTE);
    return timer(untilNextMinute, MINUTE, scheduler);
  }).pipe(map(() => new Date(scheduler.now())));
}
