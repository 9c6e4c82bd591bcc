import { matchRoomEvent } from "../room/match.js";
import type { RoomEvent } from "../room/types.js";
import type { JsonValue } from "../sdk/rpc/types.js";

/** One human-readable line per room event. */
export function formatRoomEvent(event: RoomEvent): string {
  return matchRoomEvent(event, {
    participantJoined: (e) => `${e.id} joined`,
    participantLeft: (e) => `${e.name} left`,
    participantEvicted: () => "you were evicted from the room",
    participantPublished: (e) =>
      e.streams.length > 0
        ? `${e.id} published ${e.streams.join(", ")}`
        : `${e.id} published`,
    participantUnpublished: (e) => `${e.name} unpublished`,
    iceCandidate: (e) => `ICE candidate for ${e.endpointName} (${e.sdpMid}/${e.sdpMLineIndex})`,
    message: (e) => `[${e.room}] ${e.user}: ${e.message}`,
    roomClosed: (e) => `room ${e.room} closed`,
    mediaError: (e) => `media error: ${e.error}`,
    unknown: (e) => `${e.method} ${JSON.stringify(e.params)}`,
  });
}

/** Pretty-print a call result. Strings print bare. */
export function formatResult(result: JsonValue): string {
  if (typeof result === "string") return result;
  return JSON.stringify(result, null, 2);
}
