import { describe, it, expect } from "vitest";
import { UtteranceBuffer } from "./utterance-buffer.js";
import { constantSegment } from "./test-fakes.js";
import type { TranscriptFragment } from "./types.js";

function fragment(text: string): TranscriptFragment {
  return { text, segment: constantSegment(1000, 0.1), offsetSeconds: 0 };
}

describe("UtteranceBuffer", () => {
  it("keeps fragments in append order", () => {
    const buffer = new UtteranceBuffer();
    buffer.append(fragment("one"));
    buffer.append(fragment("two"));

    expect(buffer.length).toBe(2);
    expect(buffer.last?.text).toBe("two");
  });

  it("reports no last fragment while empty", () => {
    expect(new UtteranceBuffer().last).toBeNull();
  });

  it("rejects appends after it is frozen", () => {
    const buffer = new UtteranceBuffer();
    buffer.append(fragment("one"));
    buffer.freeze();

    expect(buffer.isFrozen).toBe(true);
    expect(() => buffer.append(fragment("two"))).toThrow("Cannot append to a finalized utterance buffer.");
  });

  it("hands out a frozen array exactly once", () => {
    const buffer = new UtteranceBuffer();
    buffer.append(fragment("one"));
    buffer.freeze();

    const fragments = buffer.consume();

    expect(fragments.map((f) => f.text)).toEqual(["one"]);
    expect(Object.isFrozen(fragments)).toBe(true);
    expect(() => buffer.consume()).toThrow("Utterance buffer was already consumed.");
  });

  it("cannot be consumed before it is frozen", () => {
    expect(() => new UtteranceBuffer().consume()).toThrow(
      "Utterance buffer must be finalized before it is consumed.",
    );
  });
});
