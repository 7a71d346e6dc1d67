import DEBUG from "debug";
import { defer, merge, Observable } from "rxjs";
import { map, tap } from "rxjs/operators";
import type { StateLookup } from "../tariff/types";
import type Events from "./Events";
import type States from "./States";

const debug = DEBUG("ev-tracker.state-store");

export type StateStoreDependencies = {
  states: Pick<States, "all$">;
  events: Pick<Events, "stateChanged$">;
};

/**
 * Remembers the latest state of every entity so it can be read synchronously.
 *
 * Nothing is recorded unless `sync$` is subscribed.
 */
export default class StateStore {
  private states: Pick<States, "all$">;
  private events: Pick<Events, "stateChanged$">;
  private latest = new Map<string, string>();

  constructor(dependencies: StateStoreDependencies) {
    this.states = dependencies.states;
    this.events = dependencies.events;
  }

  get sync$(): Observable<string> {
    return defer(() => {
      // The snapshot can arrive after newer state_changed events.
      const updated = new Set<string>();

      const initial$ = this.states.all$.pipe(
        tap((all) => {
          all
            .filter((entity) => !updated.has(entity.entity_id))
            .forEach((entity) => this.latest.set(entity.entity_id, entity.state));
        }),
        map((all) => `loaded ${all.length} states`)
      );

      const updates$ = this.events.stateChanged$.pipe(
        tap((change) => {
          updated.add(change.entity_id);
          if (change.new_state) {
            this.latest.set(change.entity_id, change.new_state.state);
          } else {
            this.latest.delete(change.entity_id);
          }
        }),
        map((change) => `state of ${change.entity_id} changed`)
      );

      return merge(initial$, updates$);
    }).pipe(tap((v) => debug(v)));
  }

  lookup: StateLookup = (entityId) => {
    return this.latest.get(entityId);
  };
}
