/**
 * Room protocol vocabulary: method names, notification events, and the
 * deeply frozen views the room client hands to its listener.
 */

import { RpcError, type SignalingError } from "../sdk/errors.js";
import type { JsonObject, JsonValue } from "../sdk/rpc/types.js";

// ── Methods ─────────────────────────────────────────────────────────

/** Client → server methods. */
export const RoomMethods = {
  joinRoom: "joinRoom",
  leaveRoom: "leaveRoom",
  publishVideo: "publishVideo",
  unpublishVideo: "unpublishVideo",
  receiveVideoFrom: "receiveVideoFrom",
  unsubscribeFromVideo: "unsubscribeFromVideo",
  onIceCandidate: "onIceCandidate",
  sendMessage: "sendMessage",
  customRequest: "customRequest",
} as const;

export type RoomMethod = (typeof RoomMethods)[keyof typeof RoomMethods];

// ── Notification events ─────────────────────────────────────────────

export interface ParticipantJoinedEvent {
  type: "participantJoined";
  id: string;
}

export interface ParticipantLeftEvent {
  type: "participantLeft";
  name: string;
}

export interface ParticipantEvictedEvent {
  type: "participantEvicted";
}

export interface ParticipantPublishedEvent {
  type: "participantPublished";
  id: string;
  /** Stream names, e.g. "webcam". */
  streams: string[];
}

export interface ParticipantUnpublishedEvent {
  type: "participantUnpublished";
  name: string;
}

export interface IceCandidateEvent {
  type: "iceCandidate";
  endpointName: string;
  candidate: string;
  sdpMid: string;
  sdpMLineIndex: number;
}

/** Chat message relayed by the server (`sendMessage` notification). */
export interface ChatMessageEvent {
  type: "message";
  room: string;
  user: string;
  message: string;
}

export interface RoomClosedEvent {
  type: "roomClosed";
  room: string;
}

export interface MediaErrorEvent {
  type: "mediaError";
  error: string;
}

/** Any notification not recognized above, or one whose params do not fit. */
export interface UnknownRoomEvent {
  type: "unknown";
  method: string;
  params: JsonObject;
}

export type RoomEvent =
  | ParticipantJoinedEvent
  | ParticipantLeftEvent
  | ParticipantEvictedEvent
  | ParticipantPublishedEvent
  | ParticipantUnpublishedEvent
  | IceCandidateEvent
  | ChatMessageEvent
  | RoomClosedEvent
  | MediaErrorEvent
  | UnknownRoomEvent;

// ── Views ───────────────────────────────────────────────────────────

/** Freeze `value` and every object reachable from it. */
function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    const children: unknown[] = Object.values(value);
    for (const child of children) deepFreeze(child);
  }
  return value;
}

/** Successful reply to a room call. */
export class RoomResponse {
  readonly id: number;
  readonly result: JsonValue;

  constructor(id: number, result: JsonValue) {
    this.id = id;
    this.result = deepFreeze(result);
    Object.freeze(this);
  }

  /** Member of an object result, or undefined. */
  get(key: string): JsonValue | undefined {
    const { result } = this;
    if (typeof result !== "object" || result === null || Array.isArray(result)) return undefined;
    return result[key];
  }

  /** SDP answer carried by publishVideo / receiveVideoFrom replies. */
  get sdpAnswer(): string | undefined {
    const value = this.get("sdpAnswer");
    return typeof value === "string" ? value : undefined;
  }
}

/** Failed room call: a server error, or the connection going away. */
export class RoomError {
  readonly id: number;
  /** JSON-RPC error code when the server reported the failure, else null. */
  readonly rpcCode: number | null;
  readonly message: string;
  readonly data: unknown;
  readonly cause: SignalingError;

  constructor(id: number, cause: SignalingError) {
    this.id = id;
    this.cause = cause;
    this.message = cause.message;
    if (cause instanceof RpcError) {
      this.rpcCode = cause.rpcCode;
      this.data = cause.data;
    } else {
      this.rpcCode = null;
      this.data = undefined;
    }
    Object.freeze(this);
  }

  /** True when the server answered with an error. */
  get isServerError(): boolean {
    return this.rpcCode !== null;
  }
}

/** Server push, with a typed event when the method is known. */
export class RoomNotification {
  readonly method: string;
  readonly params: JsonObject;
  readonly event: RoomEvent;

  constructor(method: string, params: JsonObject, event: RoomEvent) {
    this.method = method;
    this.params = deepFreeze(params);
    this.event = deepFreeze(event);
    Object.freeze(this);
  }
}

// ── Listener ────────────────────────────────────────────────────────

/** Application callbacks. Invoked on the client's dispatcher; keep them short. */
export interface RoomListener {
  onRoomResponse(response: RoomResponse): void;
  onRoomError(error: RoomError): void;
  onRoomNotification(notification: RoomNotification): void;
  onRoomConnected?(): void;
  onRoomDisconnected?(code: number, reason: string, remote: boolean): void;
  /** Connection failures and calls that could not be sent. */
  onRoomFailure?(error: SignalingError): void;
}
