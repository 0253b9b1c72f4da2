import { describe, expect, test } from "vitest";
import { encodeReloadEvent, parseReloadEvent } from "./messages";

describe("reload events", () => {
  test("encodes events as JSON text frames", () => {
    expect(encodeReloadEvent({ type: "start" })).toBe('{"type":"start"}');
    expect(encodeReloadEvent({ type: "notify", message: "Built 3 file(s)", error: false })).toBe(
      '{"type":"notify","message":"Built 3 file(s)","error":false}'
    );
    expect(encodeReloadEvent({ type: "reload", href: "/about/" })).toBe('{"type":"reload","href":"/about/"}');
  });

  test("parses the three event kinds", () => {
    expect(parseReloadEvent('{"type":"start"}')).toEqual({ type: "start" });
    expect(parseReloadEvent('{"type":"notify","message":"x","error":true}')).toEqual({
      type: "notify",
      message: "x",
      error: true,
    });
    expect(parseReloadEvent('{"type":"reload"}')).toEqual({ type: "reload" });
  });

  test("rejects anything else", () => {
    expect(parseReloadEvent("reload")).toBeNull();
    expect(parseReloadEvent('{"type":"restart"}')).toBeNull();
    expect(parseReloadEvent('{"type":"notify","message":"x"}')).toBeNull();
    expect(parseReloadEvent('{"type":"start","extra":1}')).toBeNull();
  });
});
