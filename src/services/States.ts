import { merge, Observable } from "rxjs";
import { filter, map, share, takeUntil } from "rxjs/operators";
import type { HassEntityBase } from "../types";
import type Events from "./Events";
import { isHassEntity, StateChangedEventData } from "./Events";
import type Socket from "./Socket";

export type StatesDependencies = {
  socket: Pick<Socket, "single$">;
  events: Pick<Events, "stateChanged$">;
};

export default class States {
  socket: Pick<Socket, "single$">;
  events: Pick<Events, "stateChanged$">;

  constructor(dependencies: StatesDependencies) {
    this.socket = dependencies.socket;
    this.events = dependencies.events;
  }

  /**
   * Returns an observable with all the states.
   */
  get all$(): Observable<HassEntityBase[]> {
    return this.socket.single$("get_states").pipe(
      map((v) => (Array.isArray(v.result) ? v.result.filter(isHassEntity) : []))
    );
  }

  private updatesForEntityId$(
    entityId: string
  ): Observable<StateChangedEventData> {
    return this.events.stateChanged$.pipe(
      filter((v) => v.entity_id === entityId)
    );
  }

  /**
   * The current state of the entity followed by every change.
   * Emits undefined while the entity does not exist.
   */
  state$(entityId: string): Observable<HassEntityBase | undefined> {
    const initial$ = this.all$.pipe(
      map((all) => all.find((item) => item.entity_id === entityId))
    );

    const updates$ = this.updatesForEntityId$(entityId).pipe(
      map((v) => v.new_state ?? undefined),
      share()
    );

    // The snapshot is dropped once a newer state_changed came in.
    return merge(initial$.pipe(takeUntil(updates$)), updates$);
  }
}
