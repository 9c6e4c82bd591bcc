import { describe, it, expect } from "vitest";
import { parseRoomEvent } from "../../room/events.js";

describe("parseRoomEvent", () => {
  it("parses participant events", () => {
    expect(parseRoomEvent("participantJoined", { id: "bob" })).toEqual({
      type: "participantJoined",
      id: "bob",
    });
    expect(parseRoomEvent("participantLeft", { name: "bob" })).toEqual({
      type: "participantLeft",
      name: "bob",
    });
    expect(parseRoomEvent("participantEvicted", {})).toEqual({ type: "participantEvicted" });
    expect(parseRoomEvent("participantUnpublished", { name: "bob" })).toEqual({
      type: "participantUnpublished",
      name: "bob",
    });
  });

  it("flattens published streams to their ids", () => {
    expect(
      parseRoomEvent("participantPublished", {
        id: "bob",
        streams: [{ id: "webcam" }, { id: "screen" }, { name: "no id" }, "junk"],
      }),
    ).toEqual({ type: "participantPublished", id: "bob", streams: ["webcam", "screen"] });
    expect(parseRoomEvent("participantPublished", { id: "bob" })).toEqual({
      type: "participantPublished",
      id: "bob",
      streams: [],
    });
  });

  it("parses an ICE candidate, accepting a numeric-string line index", () => {
    const params = {
      endpointName: "bob_webcam",
      candidate: "candidate:1 1 UDP 2122 192.0.2.1 5000 typ host",
      sdpMid: "video",
    };
    expect(parseRoomEvent("iceCandidate", { ...params, sdpMLineIndex: 1 })).toEqual({
      type: "iceCandidate",
      ...params,
      sdpMLineIndex: 1,
    });
    expect(parseRoomEvent("iceCandidate", { ...params, sdpMLineIndex: "2" })).toEqual({
      type: "iceCandidate",
      ...params,
      sdpMLineIndex: 2,
    });
  });

  it("parses chat messages, room closure and media errors", () => {
    expect(parseRoomEvent("sendMessage", { room: "lobby", user: "bob", message: "hi" })).toEqual({
      type: "message",
      room: "lobby",
      user: "bob",
      message: "hi",
    });
    expect(parseRoomEvent("roomClosed", { room: "lobby" })).toEqual({
      type: "roomClosed",
      room: "lobby",
    });
    expect(parseRoomEvent("mediaError", { error: "codec mismatch" })).toEqual({
      type: "mediaError",
      error: "codec mismatch",
    });
  });

  it("falls back to unknown for unrecognized methods", () => {
    expect(parseRoomEvent("recordingStarted", { by: "bob" })).toEqual({
      type: "unknown",
      method: "recordingStarted",
      params: { by: "bob" },
    });
  });

  it("falls back to unknown when required fields are missing or mistyped", () => {
    expect(parseRoomEvent("participantJoined", {})).toEqual({
      type: "unknown",
      method: "participantJoined",
      params: {},
    });
    expect(parseRoomEvent("iceCandidate", { endpointName: "x", candidate: "c", sdpMid: "0", sdpMLineIndex: "a" }))
      .toMatchObject({ type: "unknown", method: "iceCandidate" });
    expect(parseRoomEvent("sendMessage", { room: "lobby", user: 5, message: "hi" })).toMatchObject({
      type: "unknown",
    });
  });
});
