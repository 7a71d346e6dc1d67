export type HassContext = {
  id: string;
  user_id: string | null;
  parent_id?: string | null;
};

export type HassEntityAttributes = {
  friendly_name?: string;
  unit_of_measurement?: string;
  [key: string]: unknown;
};

export type HassEntityBase = {
  entity_id: string;
  state: string;
  last_changed: string;
  last_updated: string;
  attributes: HassEntityAttributes;
  context?: HassContext;
};

export type StateChangedEvent = {
  event_type: "state_changed";
  data: {
    entity_id: string;
    new_state: HassEntityBase | null;
    old_state: HassEntityBase | null;
  };
  origin: string;
  time_fired: string;
};

export type HassEvent<T = Record<string, unknown>> = {
  event_type: string;
  data: T;
  origin: string;
  time_fired: string;
};

/**
 * Everything the Home Assistant WebSocket API sends us has a type.
 * Replies to our own requests carry the id we sent.
 */
export type MessageBase = {
  type: string;
  id?: number;
  success?: boolean;
  result?: unknown;
  error?: { code: string; message: string };
  event?: HassEvent<unknown>;
};

/**
 * Published as the JSON attributes of an entity.
 */
export type EntityAttributes = Record<string, string | number | boolean | null>;
