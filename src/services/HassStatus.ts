import DEBUG from "debug";
import { Observable } from "rxjs";
import { filter, map, shareReplay, startWith, switchMap, tap } from "rxjs/operators";
import type { IServicesCradle } from "./cradle";
import Config from "./Config";
import Mqtt from "./Mqtt";

const debug = DEBUG("ev-tracker.hass-status");

export default class HassStatus {
  private mqtt: Mqtt;
  private config: Config;
  private status$: Observable<string>;

  constructor(dependencies: Pick<IServicesCradle, "mqtt" | "config">) {
    this.mqtt = dependencies.mqtt;
    this.config = dependencies.config;

    this.status$ = this.config.root$().pipe(
      switchMap((config) =>
        this.mqtt.subscribe$(`${config.mqttDiscoveryPrefix}/status`)
      ),
      tap((v) => {
        debug("status %s", v);
      }),
      shareReplay(1)
    );
  }

  /**
   * nexts whenever HASS goes online, and once right away.
   */
  get online$(): Observable<boolean> {
    return this.status$.pipe(
      map((v) => v === "online"),
      filter((v) => v),
      startWith(true)
    );
  }
}
