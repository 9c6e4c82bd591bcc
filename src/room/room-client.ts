/**
 * RoomClient — room API over a {@link SignalingClient}.
 *
 * Each `send*` method builds the call's named params and fires it with the
 * caller's id; replies, errors and server pushes come back through the
 * {@link RoomListener}. Nothing here blocks: connect, then wait for
 * `onRoomConnected` (or {@link RoomClient.whenConnected}) before sending,
 * since calls made while disconnected are dropped.
 *
 * @example
 * ```ts
 * const room = new RoomClient({ url: "wss://media.example.test/room", listener });
 * room.connect();
 * await room.whenConnected();
 * room.sendJoinRoom("ana", "lobby", 1);
 * ```
 */

import type { Logger } from "pino";
import { SignalingClient } from "../sdk/client.js";
import type { NotConnectedPolicy, RpcObserver, SignalingSink } from "../sdk/config.js";
import type { ConnectionState } from "../sdk/connection.js";
import type { DiagnosticSink } from "../sdk/diagnostics.js";
import { createLogger } from "../sdk/logger.js";
import { defineEntry } from "../sdk/rpc/codec.js";
import { NO_REPLY, type NamedParams } from "../sdk/rpc/types.js";
import type { Disposable, TransportFactory } from "../sdk/transport/transport.js";
import { parseRoomEvent } from "./events.js";
import {
  RoomError,
  RoomMethods,
  RoomNotification,
  RoomResponse,
  type RoomListener,
} from "./types.js";

export interface RoomClientOptions {
  /** Room server endpoint, `ws:` or `wss:`. */
  url: string;
  listener: RoomListener;
  transport?: TransportFactory;
  logger?: Logger;
  diagnostics?: DiagnosticSink;
  observer?: RpcObserver;
  notConnected?: NotConnectedPolicy;
}

export class RoomClient {
  readonly #client: SignalingClient;
  readonly #listener: RoomListener;
  readonly #log: Logger;
  readonly #stateSub: Disposable;

  constructor(opts: RoomClientOptions) {
    this.#listener = opts.listener;
    this.#log = opts.logger ?? createLogger("room");

    const listener = opts.listener;
    const sink: SignalingSink = {
      onResponse: (id, outcome) => {
        if (outcome.ok) {
          listener.onRoomResponse(new RoomResponse(id, outcome.result));
        } else {
          listener.onRoomError(new RoomError(id, outcome.error));
        }
      },
      onNotification: (method, params) => {
        listener.onRoomNotification(
          new RoomNotification(method, params, parseRoomEvent(method, params)),
        );
      },
      onConnectionClosed: (code, reason, remote) => {
        listener.onRoomDisconnected?.(code, reason, remote);
      },
      onError: (error) => {
        if (listener.onRoomFailure) {
          listener.onRoomFailure(error);
        } else {
          this.#log.warn({ err: error }, "room client error");
        }
      },
    };

    this.#client = new SignalingClient({
      url: opts.url,
      sink,
      transport: opts.transport,
      logger: this.#log,
      diagnostics: opts.diagnostics,
      observer: opts.observer,
      notConnected: opts.notConnected,
    });

    this.#stateSub = this.#client.onStateChange((state) => {
      if (state === "connected") this.#listener.onRoomConnected?.();
    });
  }

  // ── Connection ──────────────────────────────────────────────────────

  /** Open the WebSocket. Returns at once. */
  connect(): void {
    this.#client.connect();
  }

  /** Close the WebSocket. Pending calls come back as RoomErrors. */
  disconnect(): void {
    this.#client.disconnect();
  }

  isConnected(): boolean {
    return this.#client.isConnected();
  }

  get state(): ConnectionState {
    return this.#client.state;
  }

  /** Resolves once connected; rejects if the connection attempt fails. */
  whenConnected(signal?: AbortSignal): Promise<void> {
    return this.#client.whenConnected(signal);
  }

  /** Resolves once every queued call has been handed to the transport. */
  flush(): Promise<void> {
    return this.#client.idle();
  }

  // ── Room calls ──────────────────────────────────────────────────────

  /**
   * Join `room` as `user`, creating the room if needed. The reply lists the
   * participants already present and their streams.
   */
  sendJoinRoom(user: string, room: string, id: number): void {
    this.#send(RoomMethods.joinRoom, { user, room }, id);
  }

  sendLeaveRoom(id: number): void {
    this.#send(RoomMethods.leaveRoom, null, id);
  }

  /** Publish local media. The reply carries `sdpAnswer`. */
  sendPublishVideo(sdpOffer: string, doLoopback: boolean, id: number): void {
    this.#send(RoomMethods.publishVideo, { sdpOffer, doLoopback }, id);
  }

  sendUnpublishVideo(id: number): void {
    this.#send(RoomMethods.unpublishVideo, null, id);
  }

  /**
   * Subscribe to a published stream. `sender` is `<user>_<stream>`,
   * e.g. "ana_webcam". The reply carries `sdpAnswer`.
   */
  sendReceiveVideoFrom(sender: string, sdpOffer: string, id: number): void {
    this.#send(RoomMethods.receiveVideoFrom, { sender, sdpOffer }, id);
  }

  sendUnsubscribeFromVideo(userId: string, streamId: string, id: number): void {
    this.#send(RoomMethods.unsubscribeFromVideo, { sender: `${userId}_${streamId}` }, id);
  }

  /** Trickle ICE: forward a locally gathered candidate. Expects no reply. */
  sendOnIceCandidate(
    endpointName: string,
    candidate: string,
    sdpMid: string,
    sdpMLineIndex: number,
  ): void {
    this.#send(
      RoomMethods.onIceCandidate,
      { endpointName, candidate, sdpMid, sdpMLineIndex },
      NO_REPLY,
    );
  }

  /** Broadcast a chat message to the room. */
  sendMessage(room: string, user: string, message: string, id: number): void {
    this.#send(RoomMethods.sendMessage, { message, userMessage: user, roomMessage: room }, id);
  }

  /**
   * Send an application-defined request; `names[i]` pairs with `values[i]`.
   * Mismatched arrays are logged and nothing is sent.
   */
  sendCustomRequest(names: readonly string[], values: readonly string[], id: number): void {
    if (names.length !== values.length) {
      this.#log.warn(
        { names: names.length, values: values.length },
        "customRequest: names and values differ in length",
      );
      return;
    }
    const params: Record<string, string> = {};
    names.forEach((name, i) => {
      defineEntry(params, name, values[i]);
    });
    this.#send(RoomMethods.customRequest, params, id);
  }

  // ── Lifecycle ───────────────────────────────────────────────────────

  /** Disconnect and release the underlying client. */
  close(): void {
    this.#stateSub.dispose();
    this.#client.close();
  }

  [Symbol.dispose](): void {
    this.close();
  }

  #send(method: string, params: NamedParams | null, id: number): void {
    this.#client.send(method, params, id);
  }
}
