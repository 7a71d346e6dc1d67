import {
  filter,
  map,
  shareReplay,
  switchMap,
  take,
  tap,
} from "rxjs/operators";
import DEBUG from "debug";

import { EMPTY, merge, Observable, throwError } from "rxjs";

import Config from "./Config";
import WebSocket from "./WebSocket";
import { URL } from "url";
import type { MessageBase } from "../types";
import type { IServicesCradle } from "./cradle";

const debug = DEBUG("ev-tracker.socket");

type SocketManager = {
  messages$: Observable<MessageBase>;
  sendWithId$: (message: Record<string, unknown>) => Observable<MessageBase>;
};

export class SocketAuthenticationError extends Error {
  constructor(public reply: MessageBase) {
    super("Home Assistant rejected the access token");
  }
}

function isMessage(value: unknown): value is MessageBase {
  return (
    typeof value === "object" &&
    value !== null &&
    "type" in value &&
    typeof value.type === "string"
  );
}

export function websocketUrl(host: string): string {
  const url = new URL(host);
  return `ws${url.protocol === "https:" ? "s" : ""}://${url.host}/api/websocket`;
}

/**
 * Authenticated session on the Home Assistant WebSocket API.
 * Every request gets its own id and only sees the replies carrying that id.
 */
export default class Socket {
  config: Config;

  socket$: Observable<SocketManager>;

  constructor({ config }: Pick<IServicesCradle, "config">) {
    this.config = config;

    this.socket$ = this.config.root$().pipe(
      map((config) => {
        debug("making new websocket for HA at %s", config.host);

        const socket = new WebSocket(websocketUrl(config.host));

        const parsedMessages$ = socket.messages$.pipe(
          map((raw): unknown => JSON.parse(raw)),
          filter(isMessage)
        );

        const rawSend$ = (msg: Record<string, unknown>) => {
          return socket.send$(JSON.stringify(msg));
        };

        const respondToAuthentication$ = parsedMessages$.pipe(
          filter((msg) => msg.type === "auth_required"),
          tap(() => debug("sending auth!")),
          switchMap(() =>
            rawSend$({ type: "auth", access_token: config.token }).pipe(
              take(1),
              switchMap(() => EMPTY)
            )
          )
        );

        // The handshake runs once, later requests get the replayed outcome.
        const authenticated$ = merge(
          respondToAuthentication$,
          parsedMessages$.pipe(
            filter(
              (msg) => msg.type === "auth_ok" || msg.type === "auth_invalid"
            )
          )
        ).pipe(
          take(1),
          switchMap((msg) =>
            msg.type === "auth_ok"
              ? [msg]
              : throwError(() => new SocketAuthenticationError(msg))
          ),
          tap(() => debug("authenticated")),
          shareReplay(1)
        );

        const messages$ = parsedMessages$;

        let i = 0;
        function next() {
          i += 1;
          return i;
        }

        return {
          messages$,
          sendWithId$(message: Record<string, unknown>) {
            const id = next();

            const result$ = messages$.pipe(filter((item) => item.id === id));

            const sendAndHide$ = authenticated$.pipe(
              switchMap(() => rawSend$({ ...message, id })),
              take(1),
              switchMap(() => EMPTY)
            );

            return merge(result$, sendAndHide$);
          },
        };
      }),
      shareReplay(1)
    );
  }

  /**
   * Sends a command and completes with its result.
   */
  single$(type: string): Observable<MessageBase> {
    return this.socket$.pipe(
      switchMap((socket) => {
        return socket.sendWithId$({ type }).pipe(take(1));
      })
    );
  }

  /**
   * Sends a subscription and keeps streaming the events for it.
   */
  subscribe$(message: Record<string, unknown>): Observable<MessageBase> {
    return this.socket$.pipe(
      switchMap((socket) => {
        return socket.sendWithId$(message).pipe(
          filter((v) => {
            return v.type !== "result";
          })
        );
      })
    );
  }
}
