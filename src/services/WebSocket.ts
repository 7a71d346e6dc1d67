import { map, share, shareReplay, switchMap } from "rxjs/operators";
import WS from "ws";
import DEBUG from "debug";

import { Observable, of } from "rxjs";

const debug = DEBUG("ev-tracker.web-socket");

export type SocketManager = {
  messages$: Observable<string>;
  send$: (message: string) => Observable<boolean>;
};

/**
 * NOTE: This is not injected with awilix.
 */
export default class WebSocket {
  url: string;

  private manager$: Observable<SocketManager>;

  constructor(url: string) {
    debug("building WebSocket instance for url %s", url);
    this.url = url;

    const socket$ = new Observable<WS>(function (observer) {
      debug("creating socket with url %s", url);
      const ws = new WS(url);

      const onError = (error: Error) => {
        debug("got error event %s", error.message);
        observer.error(error);
      };
      const onClose = () => {
        debug("completed websocket");
        observer.complete();
      };
      const onOpen = () => {
        observer.next(ws);
      };

      ws.on("error", onError);
      ws.on("close", onClose);
      ws.on("open", onOpen);

      return () => {
        debug("cleaning up after websocket");
        ws.off("error", onError);
        ws.off("close", onClose);
        ws.off("open", onOpen);
        ws.close();
      };
    });

    const sharedSocket$ = socket$.pipe(
      shareReplay({ bufferSize: 1, refCount: true })
    );

    const messages$ = sharedSocket$.pipe(
      switchMap((socket) => {
        return new Observable<WS.RawData>((subscriber) => {
          const onMessage = (data: WS.RawData, isBinary: boolean) => {
            if (!isBinary) {
              subscriber.next(data);
            }
          };

          socket.on("message", onMessage);
          return () => socket.off("message", onMessage);
        }).pipe(map((data) => data.toString()));
      })
    );

    function send$(message: string) {
      return sharedSocket$.pipe(
        switchMap((socket) => {
          debug("sending message of %d characters", message.length);
          socket.send(message);

          return of(true);
        })
      );
    }

    this.manager$ = of({
      messages$,
      send$,
    }).pipe(share());
  }

  send$(message: string): Observable<boolean> {
    return this.manager$.pipe(
      switchMap((manager) => {
        return manager.send$(message);
      })
    );
  }

  get messages$(): Observable<string> {
    return this.manager$.pipe(
      switchMap((socket) => {
        return socket.messages$;
      })
    );
  }
}
