/**
 * Type-safe matching utilities for RoomEvent.
 *
 * @example Exhaustive matching
 * ```ts
 * const line = matchRoomEvent(notification.event, {
 *   participantJoined: (e) => `+ ${e.id}`,
 *   participantLeft:   (e) => `- ${e.name}`,
 *   // ... every event type must be handled, or it fails to compile
 * });
 * ```
 *
 * @example Partial matching with default
 * ```ts
 * const text = matchRoomEventPartial(event, {
 *   message: (e) => `${e.user}: ${e.message}`,
 *   _:       () => null,
 * });
 * ```
 */

import type { RoomEvent } from "./types.js";

/** Union of all event type discriminator strings. */
export type RoomEventType = RoomEvent["type"];

/** Extract a specific event interface by its type string. */
export type RoomEventOfType<T extends RoomEventType> = Extract<RoomEvent, { type: T }>;

/** A visitor requiring a handler for every event type. */
export type RoomEventVisitor<R> = {
  [T in RoomEventType]: (event: RoomEventOfType<T>) => R;
};

/** A partial visitor with a required `_` default for unhandled types. */
export type PartialRoomEventVisitor<R> = Partial<RoomEventVisitor<R>> & {
  _: (event: RoomEvent) => R;
};

/** Exhaustive matcher. Fails to compile if any event type is missing. */
export function matchRoomEvent<R>(event: RoomEvent, visitor: RoomEventVisitor<R>): R {
  const handler = (visitor as Record<string, (event: RoomEvent) => R>)[event.type];
  return handler(event);
}

/** Partial matcher: unhandled types fall through to the `_` default. */
export function matchRoomEventPartial<R>(event: RoomEvent, visitor: PartialRoomEventVisitor<R>): R {
  const handler = (visitor as Record<string, ((event: RoomEvent) => R) | undefined>)[event.type];
  return handler ? handler(event) : visitor._(event);
}

/** Type predicate that narrows a `RoomEvent` to a specific variant. */
export function isRoomEvent<T extends RoomEventType>(
  event: RoomEvent,
  type: T,
): event is RoomEventOfType<T> {
  return event.type === type;
}
