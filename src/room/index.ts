/**
 * Room API — multi-party media room coordination over the signaling client.
 *
 * @module
 */

export { RoomClient, type RoomClientOptions } from "./room-client.js";
export { parseRoomEvent, RoomNotifications } from "./events.js";
export {
  matchRoomEvent,
  matchRoomEventPartial,
  isRoomEvent,
  type RoomEventType,
  type RoomEventOfType,
  type RoomEventVisitor,
  type PartialRoomEventVisitor,
} from "./match.js";
export {
  RoomMethods,
  RoomResponse,
  RoomError,
  RoomNotification,
  type RoomMethod,
  type RoomListener,
  type RoomEvent,
  type ParticipantJoinedEvent,
  type ParticipantLeftEvent,
  type ParticipantEvictedEvent,
  type ParticipantPublishedEvent,
  type ParticipantUnpublishedEvent,
  type IceCandidateEvent,
  type ChatMessageEvent,
  type RoomClosedEvent,
  type MediaErrorEvent,
  type UnknownRoomEvent,
} from "./types.js";
