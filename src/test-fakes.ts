// In-process stand-ins for the audio device and the speech-to-text service,
// shared by the capture, interrupt, front-end and gateway tests.
//
// Audio is "scripted" as one amplitude per chunk. The fake STT maps each run of
// equal samples back to a phrase, so it transcribes a single chunk and the
// assembler's combined buffer alike.

import { createSegment, bytesForDuration } from "./audio-utils.js";
import { AudioSourceUnavailableError, TranscriptionError } from "./errors.js";
import type { AudioSource, AudioStream } from "./audio-source.js";
import type { SpeechToTextClient } from "./transcription-engine.js";
import type { AudioFormat, AudioSegment } from "./types.js";

/** Small sample rate keeps scripted buffers tiny. */
export const TEST_FORMAT: AudioFormat = { sampleRate: 1000, channels: 1 };

/** 16-bit PCM where every sample has the given amplitude. */
export function constantPcm(amplitude: number, seconds: number, format: AudioFormat = TEST_FORMAT): Buffer {
  const buf = Buffer.alloc(bytesForDuration(format, seconds));
  for (let offset = 0; offset < buf.length; offset += 2) {
    buf.writeInt16LE(amplitude, offset);
  }
  return buf;
}

export function constantSegment(amplitude: number, seconds: number, format: AudioFormat = TEST_FORMAT): AudioSegment {
  return createSegment(format, constantPcm(amplitude, seconds, format));
}

export interface ScriptedAudioSourceOptions {
  /** Called before each chunk read with the index of the chunk about to be served. */
  onRead?: (index: number) => void;
  /** Makes open() fail with this error. */
  openError?: Error;
  format?: AudioFormat;
}

/**
 * Serves one scripted amplitude per read, whatever duration is asked for, then
 * null. The script cursor is shared by every stream opened on the source.
 */
export class ScriptedAudioSource implements AudioSource {
  readonly format: AudioFormat;
  readonly readDurations: number[] = [];
  openCount = 0;
  closeCount = 0;
  private cursor = 0;
  private readonly script: number[];
  private readonly options: ScriptedAudioSourceOptions;

  constructor(script: number[], options: ScriptedAudioSourceOptions = {}) {
    this.script = [...script];
    this.options = options;
    this.format = options.format ?? TEST_FORMAT;
  }

  get remaining(): number {
    return this.script.length - this.cursor;
  }

  /** Appends more chunks to the script. */
  extend(amplitudes: number[]): void {
    this.script.push(...amplitudes);
  }

  async open(): Promise<AudioStream> {
    if (this.options.openError) throw this.options.openError;
    if (this.cursor >= this.script.length) {
      throw new AudioSourceUnavailableError("Scripted audio exhausted");
    }
    this.openCount++;
    return {
      read: async (durationSeconds) => {
        if (this.cursor >= this.script.length) return null;
        const index = this.cursor++;
        this.options.onRead?.(index);
        this.readDurations.push(durationSeconds);
        return constantSegment(this.script[index], durationSeconds, this.format);
      },
      close: () => {
        this.closeCount++;
      },
    };
  }
}

export interface FakeSttCall {
  languageHint: string;
  durationSeconds: number;
}

/**
 * Transcribes by amplitude: each run of identical samples whose amplitude has a
 * phrase contributes that phrase. Nothing recognizable throws no-speech.
 */
export class AmplitudeSpeechToText implements SpeechToTextClient {
  readonly calls: FakeSttCall[] = [];
  private readonly phrases: Map<number, string>;
  /** Combined buffers longer than this fail, to exercise the per-chunk fallback. */
  failLongerThanSeconds: number | null = null;
  /** Every call fails with a service error. */
  failAll = false;

  constructor(phrases: Record<number, string>) {
    this.phrases = new Map(Object.entries(phrases).map(([amplitude, text]) => [Number(amplitude), text]));
  }

  async transcribe(audio: AudioSegment, languageHint: string): Promise<string> {
    this.calls.push({ languageHint, durationSeconds: audio.durationSeconds });
    if (this.failAll) {
      throw new TranscriptionError("service-error", "Scripted outage");
    }
    if (this.failLongerThanSeconds !== null && audio.durationSeconds > this.failLongerThanSeconds) {
      throw new TranscriptionError("service-error", "Scripted failure for long audio");
    }

    const words: string[] = [];
    let previous: number | null = null;
    for (let offset = 0; offset + 1 < audio.pcm.length; offset += 2) {
      const sample = audio.pcm.readInt16LE(offset);
      if (sample === previous) continue;
      previous = sample;
      const phrase = this.phrases.get(sample);
      if (phrase !== undefined) words.push(phrase);
    }

    if (words.length === 0) {
      throw new TranscriptionError("no-speech", "Nothing recognizable");
    }
    return words.join(" ");
  }
}
