import DEBUG from "debug";

import { connect, IClientPublishOptions, IPublishPacket } from "mqtt";

import { concat, Observable, Subject } from "rxjs";
import {
  filter,
  map,
  switchMap,
  tap,
  shareReplay,
  takeUntil,
} from "rxjs/operators";
import Config from "./Config";
import type { IServicesCradle } from "./cradle";

type MqttMessage = [string, Buffer, IPublishPacket];

export interface ISimplifiedMqttClient {
  message$: Observable<MqttMessage>;
  subscribe$: ({ topic }: { topic: string }) => Observable<never>;
  publish$: ({
    topic,
    payload,
    options,
  }: {
    topic: string;
    payload: string | Buffer;
    options?: IClientPublishOptions;
  }) => Observable<never>;
}

const debug = DEBUG("ev-tracker.mqtt");

function mqttClient(url: string): Observable<ISimplifiedMqttClient> {
  return new Observable<ISimplifiedMqttClient>((subscriber) => {
    debug("going to connect");

    const client = connect(url);

    client.on("close", () => {
      debug("close");
    });

    client.on("connect", () => {
      debug("connect");

      subscriber.next({
        message$: new Observable<MqttMessage>((messageSubscriber) => {
          const onMessage = (
            topic: string,
            payload: Buffer,
            packet: IPublishPacket
          ) => {
            messageSubscriber.next([topic, payload, packet]);
          };

          client.on("message", onMessage);
          return () => {
            client.off("message", onMessage);
          };
        }),
        publish$: ({ options, payload, topic }) => {
          debug("publishing to topic %s", topic);

          return new Observable<never>((publishSubscriber) => {
            client.publish(topic, payload, options ?? { qos: 1 }, (err) => {
              if (err) {
                publishSubscriber.error(err);
                return;
              }

              publishSubscriber.complete();
            });
          });
        },
        subscribe$: ({ topic }) => {
          return new Observable<never>((subscribeSubscriber) => {
            client.subscribe(topic, (err) => {
              if (err) {
                subscribeSubscriber.error(err);
                return;
              }

              subscribeSubscriber.complete();
            });
          });
        },
      });
    });

    if (process.env.DEBUG_MQTT_EVENTS) {
      client.on("reconnect", () => {
        debug("reconnect");
      });

      client.on("offline", () => {
        debug("offline");
      });

      client.on("error", (error) => {
        debug("error %s", error.message);
      });
    }

    client.on("end", () => {
      subscriber.complete();
    });

    return () => {
      debug("request for socket termination");
      client.end();
    };
  }).pipe(
    // Without it every publish would open its own connection.
    shareReplay(1)
  );
}

export default class Mqtt {
  private config: Config;
  private client$: Observable<ISimplifiedMqttClient>;

  constructor(dependencies: Pick<IServicesCradle, "config">) {
    this.config = dependencies.config;

    debug("constructing mqtt instance");
    this.client$ = this.config.root$().pipe(
      switchMap((config) => {
        return mqttClient(config.mqttUrl);
      }),
      shareReplay(1)
    );
  }

  public subscribe$(topic: string): Observable<string> {
    return this.client$.pipe(
      switchMap((d) => {
        const subscribe$ = d.subscribe$({ topic });

        const replies$ = d.message$.pipe(
          filter(([incomingTopic]) => incomingTopic === topic),
          map((args) => args[1].toString()),
          tap({
            next(msg) {
              debug("got message for topic %s -> %s", topic, msg);
            },
          })
        );

        return concat(subscribe$, replies$);
      })
    );
  }

  /**
   * Publishes once and completes. Objects are sent as JSON.
   */
  public publish$(
    topic: string,
    payload: string | Buffer | object,
    options?: IClientPublishOptions
  ): Observable<never> {
    const done$ = new Subject<true>();
    const body =
      typeof payload === "string" || Buffer.isBuffer(payload)
        ? payload
        : JSON.stringify(payload);

    return this.client$.pipe(
      takeUntil(done$),
      switchMap((d) => {
        return d.publish$({ topic, payload: body, options }).pipe(
          tap({
            complete() {
              done$.next(true);
            },
          })
        );
      }),
      tap({
        complete() {
          debug("completed publish to %s", topic);
        },
      })
    );
  }
}
