// PCM helpers: energy, concatenation and WAV wrapping.
// All audio in the core is 16-bit little-endian PCM.

import type { AudioFormat, AudioSegment } from "./types.js";

const BYTES_PER_SAMPLE = 2;

/**
 * Compute the RMS (Root Mean Square) energy of a 16-bit PCM chunk.
 * Interleaved channels are treated as one sample stream.
 */
export function computeChunkRMS(chunk: Buffer): number {
  const sampleCount = Math.floor(chunk.length / BYTES_PER_SAMPLE);
  if (sampleCount === 0) return 0;
  let sumSquares = 0;
  for (let i = 0; i < sampleCount; i++) {
    const sample = chunk.readInt16LE(i * BYTES_PER_SAMPLE);
    sumSquares += sample * sample;
  }
  return Math.sqrt(sumSquares / sampleCount);
}

/** Bytes needed for `seconds` of audio, rounded down to a whole frame. */
export function bytesForDuration(format: AudioFormat, seconds: number): number {
  const frames = Math.round(seconds * format.sampleRate);
  return Math.max(frames, 0) * format.channels * BYTES_PER_SAMPLE;
}

export function durationOf(format: AudioFormat, byteLength: number): number {
  return byteLength / (format.sampleRate * format.channels * BYTES_PER_SAMPLE);
}

export function createSegment(format: AudioFormat, pcm: Buffer): AudioSegment {
  return {
    pcm,
    sampleRate: format.sampleRate,
    channels: format.channels,
    durationSeconds: durationOf(format, pcm.length),
  };
}

/**
 * Joins segments in order into one segment. The format of the first segment
 * wins; an empty list yields null.
 */
export function concatSegments(segments: readonly AudioSegment[]): AudioSegment | null {
  if (segments.length === 0) return null;
  const [first] = segments;
  const pcm = Buffer.concat(segments.map((segment) => segment.pcm));
  return createSegment({ sampleRate: first.sampleRate, channels: first.channels }, pcm);
}

/** Prepends a 44-byte RIFF/WAVE header so the PCM can be uploaded as a file. */
export function encodeWav(segment: AudioSegment): Buffer {
  const header = Buffer.alloc(44);
  const byteRate = segment.sampleRate * segment.channels * BYTES_PER_SAMPLE;

  header.write("RIFF", 0, "ascii");
  header.writeUInt32LE(36 + segment.pcm.length, 4);
  header.write("WAVE", 8, "ascii");
  header.write("fmt ", 12, "ascii");
  header.writeUInt32LE(16, 16); // PCM fmt chunk size
  header.writeUInt16LE(1, 20); // audio format: PCM
  header.writeUInt16LE(segment.channels, 22);
  header.writeUInt32LE(segment.sampleRate, 24);
  header.writeUInt32LE(byteRate, 28);
  header.writeUInt16LE(segment.channels * BYTES_PER_SAMPLE, 32);
  header.writeUInt16LE(16, 34); // bits per sample
  header.write("data", 36, "ascii");
  header.writeUInt32LE(segment.pcm.length, 40);

  return Buffer.concat([header, segment.pcm]);
}
