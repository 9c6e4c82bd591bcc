import { describe, it, expect } from "vitest";
import { coerceValue, parseParamPairs, parseTimeoutMs } from "../lib/parsers.js";

describe("parseParamPairs", () => {
  it("parses key=value pairs with coercion", () => {
    expect(parseParamPairs(["user=ana", "room=lobby", "loopback=true", "limit=4"])).toEqual({
      user: "ana",
      room: "lobby",
      loopback: true,
      limit: 4,
    });
  });

  it("splits on the first = only", () => {
    expect(parseParamPairs(["sdp=a=b"])).toEqual({ sdp: "a=b" });
  });

  it("keeps __proto__ as an ordinary key", () => {
    const params = parseParamPairs(["__proto__=x", "a=1"]);
    expect(Object.keys(params)).toEqual(["__proto__", "a"]);
    expect(JSON.stringify(params)).toBe('{"__proto__":"x","a":1}');
    expect(Object.getPrototypeOf(params)).toBe(Object.prototype);
  });

  it("accepts an empty value", () => {
    expect(parseParamPairs(["note="])).toEqual({ note: "" });
  });

  it("rejects pairs without a key", () => {
    expect(() => parseParamPairs(["=x"])).toThrow('Expected key=value, got "=x"');
    expect(() => parseParamPairs(["novalue"])).toThrow('Expected key=value, got "novalue"');
  });
});

describe("coerceValue", () => {
  it.each([
    ["true", true],
    ["false", false],
    ["null", null],
    ["42", 42],
    ["-1.5", -1.5],
    ["'42'", "42"],
    ['"true"', "true"],
    ["''", ""],
    ["ana", "ana"],
    [" ", " "],
    ["Infinity", "Infinity"],
  ])("coerces %j", (raw, expected) => {
    expect(coerceValue(raw)).toBe(expected);
  });
});

describe("parseTimeoutMs", () => {
  it("falls back when unset", () => {
    expect(parseTimeoutMs(undefined, 10_000)).toBe(10_000);
  });

  it("accepts positive values", () => {
    expect(parseTimeoutMs(250, 10_000)).toBe(250);
  });

  it.each([0, -5, Number.NaN])("rejects %s", (value) => {
    expect(() => parseTimeoutMs(value, 10_000)).toThrow(
      "Timeout must be a positive number of milliseconds",
    );
  });
});
