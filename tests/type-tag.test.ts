import { describe, it, expect } from "vitest";
import { TypeTag, describeTag } from "../src/core/type-tag.js";
import { Envelope, OutputEnvelope, openEnvelope, wrapMessage, wrapOutput } from "../src/core/envelope.js";

describe("TypeTag", () => {
  it("opens only what it sealed", () => {
    const numbers = new TypeTag<number>("numbers");
    const others = new TypeTag<number>("others");
    const carrier = numbers.seal({}, 42);

    expect(numbers.open(carrier)).toEqual({ value: 42 });
    expect(others.open(carrier)).toBeUndefined();
    expect(numbers.open({})).toBeUndefined();
  });

  it("mints a distinct id for every tag, even with the same label", () => {
    const first = new TypeTag<string>("same");
    const second = new TypeTag<string>("same");

    expect(second.id).toBeGreaterThan(first.id);
    expect(describeTag(first)).toBe(`same#${first.id}`);
    expect(String(second)).toBe(`same#${second.id}`);
  });
});

describe("Envelopes", () => {
  it("round-trips a message through its own tag", () => {
    const tag = new TypeTag<{ type: "ping" }>("demo.message");
    const envelope = wrapMessage(tag, 2, { type: "ping" });

    expect(envelope).toBeInstanceOf(Envelope);
    expect(envelope.slot).toBe(2);
    expect(openEnvelope(tag, envelope)).toEqual({ value: { type: "ping" } });
  });

  it("refuses to open an envelope sealed by another tag", () => {
    const mine = new TypeTag<string>("mine.output");
    const theirs = new TypeTag<string>("theirs.output");
    const envelope = wrapOutput(theirs, 0, "hello");

    expect(envelope).toBeInstanceOf(OutputEnvelope);
    expect(openEnvelope(mine, envelope)).toBeUndefined();
  });

  it("refuses an envelope that names the tag but carries no sealed payload", () => {
    const tag = new TypeTag<string>("forged.message");
    expect(openEnvelope(tag, new Envelope(0, tag))).toBeUndefined();
  });

  it("describes itself for diagnostics", () => {
    const tag = new TypeTag<number>("x.message");
    expect(wrapMessage(tag, 3, 1).describe()).toBe(`message envelope for slot 3 (x.message#${tag.id})`);
    expect(wrapOutput(tag, 1, 1).describe()).toBe(`output envelope for slot 1 (x.message#${tag.id})`);
  });
});
