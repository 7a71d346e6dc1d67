import Config from "./Config";
import type { IServicesCradle } from "./cradle";
import { Observable } from "rxjs";
import { map, switchMap } from "rxjs/operators";
import HassStatus from "./HassStatus";
import Mqtt from "./Mqtt";
import DEBUG from "debug";

const debug = DEBUG("ev-tracker.discovery");

export type DiscoveryComponent = "binary_sensor" | "sensor";

export type DiscoveryDevice = {
  name: string;
  manufacturer: string;
  model: string;
  identifiers: string[];
};

export type DiscoveryPayload = {
  unique_id: string;
  name: string;
  state_topic: string;
  json_attributes_topic: string;
  object_id: string;
  device: DiscoveryDevice;
};

export type DiscoveryState = {
  topics: {
    root: string;
    config: string;
    state: string;
    attributes: string;
  };
  payload: DiscoveryPayload;
};

export type DiscoveryOptions = {
  name?: string;
  device: DiscoveryDevice;
};

/**
 * The device every entity of one car is grouped under.
 */
export function carDevice(carId: number, carName: string): DiscoveryDevice {
  return {
    name: `EV Tracker - ${carName}`,
    manufacturer: "EV Tracker",
    model: "Cloud Integration",
    identifiers: [`ev_tracker_${carId}`],
  };
}

/**
 * Home Assistant forgets discovered entities when it restarts, so the config
 * is emitted again every time it comes back online.
 */
export default class Discovery {
  private config: Config;
  private hassStatus: HassStatus;
  private mqtt: Mqtt;

  constructor(
    dependencies: Pick<IServicesCradle, "config" | "hassStatus" | "mqtt">
  ) {
    this.config = dependencies.config;
    this.hassStatus = dependencies.hassStatus;
    this.mqtt = dependencies.mqtt;
  }

  create$(
    id: string,
    component: DiscoveryComponent,
    options: DiscoveryOptions
  ): Observable<DiscoveryState> {
    const prefix$ = this.config.root$().pipe(
      map((config) => {
        const uniqueId = [config.idPrefix, component, id]
          .filter((v) => v)
          .join("-");

        const objectId = `${config.objectId}_${id}`;
        const root = `${config.mqttDiscoveryPrefix}/${component}/${uniqueId}`;

        debug(`creating discovery for ${component}/${id} with object_id ${objectId}`);

        return {
          topics: {
            root,
            config: `${root}/config`,
            state: `${root}/state`,
            attributes: `${root}/attributes`,
          },
          payload: {
            object_id: objectId,
            unique_id: uniqueId,
            state_topic: `${root}/state`,
            json_attributes_topic: `${root}/attributes`,
            name: options.name ?? id,
            device: options.device,
          },
        };
      })
    );

    return this.hassStatus.online$.pipe(switchMap(() => prefix$));
  }

  /**
   * Announces the entity with the extra config keys of its component.
   * Completes once the broker took the message.
   */
  announce$(
    discovery: DiscoveryState,
    extra: Record<string, string | undefined>
  ): Observable<never> {
    const payload: Record<string, unknown> = { ...discovery.payload };
    Object.entries(extra).forEach(([key, value]) => {
      if (value !== undefined) {
        payload[key] = value;
      }
    });

    return this.mqtt.publish$(discovery.topics.config, payload, {
      qos: 1,
      retain: true,
    });
  }
}
