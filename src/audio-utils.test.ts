import { describe, it, expect } from "vitest";
import { bytesForDuration, computeChunkRMS, concatSegments, createSegment, durationOf, encodeWav } from "./audio-utils.js";

function pcmOf(samples: number[]): Buffer {
  const buf = Buffer.alloc(samples.length * 2);
  samples.forEach((sample, i) => buf.writeInt16LE(sample, i * 2));
  return buf;
}

describe("computeChunkRMS", () => {
  it("returns 0 for an empty chunk", () => {
    expect(computeChunkRMS(Buffer.alloc(0))).toBe(0);
  });

  it("returns the amplitude of a constant signal", () => {
    expect(computeChunkRMS(pcmOf([-1000, 1000, -1000, 1000]))).toBe(1000);
  });

  it("ignores a trailing odd byte", () => {
    expect(computeChunkRMS(Buffer.concat([pcmOf([300, 400]), Buffer.from([7])]))).toBeCloseTo(Math.sqrt(125_000));
  });
});

describe("durations", () => {
  const stereo = { sampleRate: 16000, channels: 2 };

  it("sizes whole frames for a duration", () => {
    expect(bytesForDuration(stereo, 0.5)).toBe(32_000);
    expect(bytesForDuration({ sampleRate: 16000, channels: 1 }, 0.6)).toBe(19_200);
  });

  it("converts byte lengths back to seconds", () => {
    expect(durationOf(stereo, 64_000)).toBe(1);
  });

  it("creates a segment carrying its format and duration", () => {
    const segment = createSegment({ sampleRate: 8000, channels: 1 }, Buffer.alloc(4000));

    expect(segment.sampleRate).toBe(8000);
    expect(segment.channels).toBe(1);
    expect(segment.durationSeconds).toBe(0.25);
  });
});

describe("concatSegments", () => {
  it("returns null for no segments", () => {
    expect(concatSegments([])).toBeNull();
  });

  it("joins PCM in order and sums durations", () => {
    const format = { sampleRate: 1000, channels: 1 };
    const joined = concatSegments([createSegment(format, pcmOf([1, 2])), createSegment(format, pcmOf([3]))]);

    expect(joined?.pcm).toEqual(pcmOf([1, 2, 3]));
    expect(joined?.durationSeconds).toBeCloseTo(0.003);
  });
});

describe("encodeWav", () => {
  it("writes a 44-byte PCM header ahead of the samples", () => {
    const pcm = pcmOf([1, -1, 2, -2]);
    const wav = encodeWav(createSegment({ sampleRate: 16000, channels: 1 }, pcm));

    expect(wav.length).toBe(44 + pcm.length);
    expect(wav.toString("ascii", 0, 4)).toBe("RIFF");
    expect(wav.readUInt32LE(4)).toBe(36 + pcm.length);
    expect(wav.toString("ascii", 8, 12)).toBe("WAVE");
    expect(wav.readUInt16LE(20)).toBe(1);
    expect(wav.readUInt16LE(22)).toBe(1);
    expect(wav.readUInt32LE(24)).toBe(16000);
    expect(wav.readUInt32LE(28)).toBe(32000);
    expect(wav.readUInt16LE(34)).toBe(16);
    expect(wav.toString("ascii", 36, 40)).toBe("data");
    expect(wav.readUInt32LE(40)).toBe(pcm.length);
    expect(wav.subarray(44)).toEqual(pcm);
  });
});
