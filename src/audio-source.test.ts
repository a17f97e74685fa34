// Unit tests for PcmFrameSource

import { describe, it, expect } from "vitest";
import { PassThrough } from "node:stream";
import { PcmFrameSource } from "./audio-source.js";
import { AudioSourceUnavailableError } from "./errors.js";

// 1 kHz mono: 0.1s = 100 frames = 200 bytes
const FORMAT = { sampleRate: 1000, channels: 1 };

function bytes(count: number, fill = 1): Buffer {
  return Buffer.alloc(count, fill);
}

describe("PcmFrameSource", () => {
  it("serves reads of the requested duration once enough audio has arrived", async () => {
    const source = new PcmFrameSource({ format: FORMAT });
    const stream = await source.open();

    const pending = stream.read(0.1);
    source.push(bytes(120));
    source.push(bytes(120));
    const segment = await pending;

    expect(segment?.pcm.length).toBe(200);
    expect(segment?.durationSeconds).toBeCloseTo(0.1);
  });

  it("holds a backlog while no stream is open and hands it to the next reader", async () => {
    const source = new PcmFrameSource({ format: FORMAT });
    source.push(bytes(200, 7));

    const stream = await source.open();
    const segment = await stream.read(0.1);

    expect(segment?.pcm.equals(bytes(200, 7))).toBe(true);
  });

  it("caps the backlog, dropping the oldest audio", async () => {
    const source = new PcmFrameSource({ format: FORMAT, maxBacklogSeconds: 0.1 });
    source.push(bytes(200, 1));
    source.push(bytes(100, 2));

    const stream = await source.open();
    source.end();
    const segment = await stream.read(1);

    expect(segment?.pcm.length).toBe(200);
    expect(segment?.pcm.subarray(0, 100).equals(bytes(100, 1))).toBe(true);
    expect(segment?.pcm.subarray(100).equals(bytes(100, 2))).toBe(true);
  });

  it("fans frames out to every open stream", async () => {
    const source = new PcmFrameSource({ format: FORMAT });
    const first = await source.open();
    const second = await source.open();

    source.push(bytes(200, 3));
    const [a, b] = await Promise.all([first.read(0.1), second.read(0.1)]);

    expect(a?.pcm.equals(bytes(200, 3))).toBe(true);
    expect(b?.pcm.equals(bytes(200, 3))).toBe(true);
    expect(source.openStreamCount).toBe(2);
  });

  it("returns the remaining partial audio after end, then null", async () => {
    const source = new PcmFrameSource({ format: FORMAT });
    const stream = await source.open();
    source.push(bytes(50));
    source.end();

    expect((await stream.read(0.1))?.pcm.length).toBe(50);
    expect(await stream.read(0.1)).toBeNull();
  });

  it("resolves a pending read with null when the stream is closed", async () => {
    const source = new PcmFrameSource({ format: FORMAT });
    const stream = await source.open();

    const pending = stream.read(0.1);
    stream.close();

    expect(await pending).toBeNull();
    expect(source.openStreamCount).toBe(0);
  });

  it("rejects a second concurrent read on one stream", async () => {
    const source = new PcmFrameSource({ format: FORMAT });
    const stream = await source.open();

    const first = stream.read(0.1);
    await expect(stream.read(0.1)).rejects.toThrow("A read is already pending on this audio stream.");
    stream.close();
    expect(await first).toBeNull();
  });

  it("refuses to open once ended with nothing left", async () => {
    const source = new PcmFrameSource({ format: FORMAT });
    source.end();

    expect(source.isEnded).toBe(true);
    await expect(source.open()).rejects.toBeInstanceOf(AudioSourceUnavailableError);
  });

  it("feeds from a readable stream and ends with it", async () => {
    const source = new PcmFrameSource({ format: FORMAT });
    const input = new PassThrough();
    source.pipeFrom(input);
    const stream = await source.open();

    input.write(bytes(200, 9));
    const segment = await stream.read(0.1);
    const ended = new Promise<void>((resolve) => input.once("end", resolve));
    input.end();
    await ended;

    expect(segment?.pcm.equals(bytes(200, 9))).toBe(true);
    expect(source.isEnded).toBe(true);
  });
});
