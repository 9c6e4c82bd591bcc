/**
 * Notification params → typed {@link RoomEvent}.
 *
 * A known method whose params are missing a required field falls back to
 * an `unknown` event so nothing the server sends is lost.
 */

import type { JsonObject, JsonValue } from "../sdk/rpc/types.js";
import type { RoomEvent } from "./types.js";

/** Server → client notification methods. */
export const RoomNotifications = {
  participantJoined: "participantJoined",
  participantLeft: "participantLeft",
  participantEvicted: "participantEvicted",
  participantPublished: "participantPublished",
  participantUnpublished: "participantUnpublished",
  iceCandidate: "iceCandidate",
  sendMessage: "sendMessage",
  roomClosed: "roomClosed",
  mediaError: "mediaError",
} as const;

export function parseRoomEvent(method: string, params: JsonObject): RoomEvent {
  return parseKnown(method, params) ?? { type: "unknown", method, params };
}

function parseKnown(method: string, params: JsonObject): RoomEvent | null {
  switch (method) {
    case RoomNotifications.participantJoined: {
      const id = str(params.id);
      return id === undefined ? null : { type: "participantJoined", id };
    }
    case RoomNotifications.participantLeft: {
      const name = str(params.name);
      return name === undefined ? null : { type: "participantLeft", name };
    }
    case RoomNotifications.participantEvicted:
      return { type: "participantEvicted" };
    case RoomNotifications.participantPublished: {
      const id = str(params.id);
      if (id === undefined) return null;
      return { type: "participantPublished", id, streams: streamIds(params.streams) };
    }
    case RoomNotifications.participantUnpublished: {
      const name = str(params.name);
      return name === undefined ? null : { type: "participantUnpublished", name };
    }
    case RoomNotifications.iceCandidate: {
      const endpointName = str(params.endpointName);
      const candidate = str(params.candidate);
      const sdpMid = str(params.sdpMid);
      const sdpMLineIndex = int(params.sdpMLineIndex);
      if (
        endpointName === undefined ||
        candidate === undefined ||
        sdpMid === undefined ||
        sdpMLineIndex === undefined
      ) {
        return null;
      }
      return { type: "iceCandidate", endpointName, candidate, sdpMid, sdpMLineIndex };
    }
    case RoomNotifications.sendMessage: {
      const room = str(params.room);
      const user = str(params.user);
      const message = str(params.message);
      if (room === undefined || user === undefined || message === undefined) return null;
      return { type: "message", room, user, message };
    }
    case RoomNotifications.roomClosed: {
      const room = str(params.room);
      return room === undefined ? null : { type: "roomClosed", room };
    }
    case RoomNotifications.mediaError: {
      const error = str(params.error);
      return error === undefined ? null : { type: "mediaError", error };
    }
    default:
      return null;
  }
}

function str(value: JsonValue | undefined): string | undefined {
  return typeof value === "string" ? value : undefined;
}

/** Integers, also accepted as decimal strings as some servers send them. */
function int(value: JsonValue | undefined): number | undefined {
  if (typeof value === "number" && Number.isInteger(value)) return value;
  if (typeof value === "string" && /^\d+$/.test(value)) return Number(value);
  return undefined;
}

/** `streams: [{ id: "webcam" }, …]` → `["webcam", …]`. */
function streamIds(value: JsonValue | undefined): string[] {
  if (!Array.isArray(value)) return [];
  const ids: string[] = [];
  for (const stream of value) {
    if (typeof stream === "object" && stream !== null && !Array.isArray(stream)) {
      const id = str(stream.id);
      if (id !== undefined) ids.push(id);
    }
  }
  return ids;
}
