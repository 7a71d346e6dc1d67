import { Observable } from "rxjs";
import type { IServicesCradle } from "./cradle";
import DEBUG from "debug";
import type { HassEntityBase, StateChangedEvent } from "../types";
import Socket from "./Socket";
import { filter, map } from "rxjs/operators";

const debug = DEBUG("ev-tracker.events");

export type StateChangedEventData = StateChangedEvent["data"];

type CreateEventStreamOptions = {
  type: string;
  event_type?: string;
};

export function isHassEntity(value: unknown): value is HassEntityBase {
  return (
    typeof value === "object" &&
    value !== null &&
    "entity_id" in value &&
    typeof value.entity_id === "string" &&
    "state" in value &&
    typeof value.state === "string"
  );
}

function isEntityOrNull(value: unknown): value is HassEntityBase | null {
  return value === null || isHassEntity(value);
}

export function isStateChangedData(
  value: unknown
): value is StateChangedEventData {
  return (
    typeof value === "object" &&
    value !== null &&
    "entity_id" in value &&
    typeof value.entity_id === "string" &&
    "new_state" in value &&
    isEntityOrNull(value.new_state) &&
    "old_state" in value &&
    isEntityOrNull(value.old_state)
  );
}

export default class Events {
  socket: Socket;

  constructor(dependencies: Pick<IServicesCradle, "socket">) {
    this.socket = dependencies.socket;
  }

  private createEventStream$(
    msg: CreateEventStreamOptions
  ): Observable<unknown> {
    debug("creating events stream for %j", msg);
    return this.socket.subscribe$(msg).pipe(
      map((item) => {
        return item.event?.data;
      })
    );
  }

  /**
   * The data of every event of this type. Custom events carry whatever the sender put in them.
   */
  type$(eventType: string): Observable<unknown> {
    return this.createEventStream$({
      type: "subscribe_events",
      event_type: eventType,
    });
  }

  get stateChanged$(): Observable<StateChangedEventData> {
    return this.type$("state_changed").pipe(filter(isStateChangedData));
  }
}
