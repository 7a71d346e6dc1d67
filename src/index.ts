import DEBUG from "debug";
import { EventEmitter } from "events";
import { merge, timer } from "rxjs";

import { catchError, switchMap, tap } from "rxjs/operators";

import servicesCradle from "./services/cradle";
import { createEvTracker$ } from "./evtracker/index";

const debug = DEBUG("ev-tracker.index");

// Every sensor of every car listens on the same sockets.
EventEmitter.defaultMaxListeners = Infinity;

const process$ = merge(
  servicesCradle.stateStore.sync$,
  createEvTracker$(servicesCradle)
).pipe(
  tap((output) => {
    debug(output);
  })
);

debug("starting up");

process$
  .pipe(
    catchError((e, obs$) => {
      console.error("process errored", e);

      return timer(5000).pipe(switchMap(() => obs$));
    })
  )
  .subscribe({
    complete() {
      debug("completed process");
      process.exit(0);
    },
  });
