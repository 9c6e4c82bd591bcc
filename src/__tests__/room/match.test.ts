import { describe, it, expect, vi } from "vitest";
import { isRoomEvent, matchRoomEvent, matchRoomEventPartial } from "../../room/match.js";
import type { RoomEvent } from "../../room/types.js";

const joined: RoomEvent = { type: "participantJoined", id: "bob" };
const chat: RoomEvent = { type: "message", room: "lobby", user: "bob", message: "hi" };

describe("matchRoomEvent", () => {
  it("calls the handler for the event's type", () => {
    const participantJoined = vi.fn(() => "joined");
    const result = matchRoomEvent(joined, {
      participantJoined,
      participantLeft: () => "left",
      participantEvicted: () => "evicted",
      participantPublished: () => "published",
      participantUnpublished: () => "unpublished",
      iceCandidate: () => "ice",
      message: () => "message",
      roomClosed: () => "closed",
      mediaError: () => "media",
      unknown: () => "unknown",
    });
    expect(result).toBe("joined");
    expect(participantJoined).toHaveBeenCalledWith(joined);
  });
});

describe("matchRoomEventPartial", () => {
  it("uses a matching handler", () => {
    expect(matchRoomEventPartial(chat, { message: (e) => e.message, _: () => "other" })).toBe("hi");
  });

  it("falls back to _", () => {
    expect(matchRoomEventPartial(joined, { message: (e) => e.message, _: (e) => e.type })).toBe(
      "participantJoined",
    );
  });
});

describe("isRoomEvent", () => {
  it("narrows by type", () => {
    expect(isRoomEvent(chat, "message")).toBe(true);
    expect(isRoomEvent(chat, "roomClosed")).toBe(false);
    if (isRoomEvent(chat, "message")) {
      expect(chat.user).toBe("bob");
    }
  });
});
