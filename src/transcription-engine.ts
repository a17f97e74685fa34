// Voice Turn Core - Speech-to-text adapters
// The capture engine and the assembler only see SpeechToTextClient. Two cloud
// backends implement it:
//   1. OpenAI audio transcriptions (default)
//   2. Deepgram prerecorded transcription
//
// Both upload the PCM wrapped as WAV. Audio is sent in-memory only, never written to disk.
// Failures surface as TranscriptionError("no-speech" | "service-error"); the
// core treats both as an empty result.

import { TranscriptionError, describeError } from "./errors.js";
import { encodeWav } from "./audio-utils.js";
import type { AudioSegment } from "./types.js";

export interface SpeechToTextClient {
  /**
   * Transcribe one buffer of audio.
   * @param languageHint BCP-47 tag such as "en-US" or "fil-PH".
   * @throws TranscriptionError
   */
  transcribe(audio: AudioSegment, languageHint: string): Promise<string>;
  /**
   * The language the backend actually receives for a hint. Hints sharing a key
   * produce identical requests; omit when every hint is passed through as is.
   */
  languageKey?(languageHint: string): string;
}

// ─── OpenAI ─────────────────────────────────────────────────────────────────────

/**
 * Minimal interface for the OpenAI audio transcriptions API surface we use.
 * This allows injecting a mock client in tests without importing the full SDK.
 */
export interface OpenAITranscriptionClient {
  audio: {
    transcriptions: {
      create(params: {
        file: File;
        model: string;
        response_format?: string;
        language?: string;
        prompt?: string;
      }): Promise<{ text: string }>;
    };
  };
}

/** Primary subtags whose ISO-639-1 code is not the subtag itself. */
export const ISO_639_1_OVERRIDES: Readonly<Record<string, string>> = {
  fil: "tl",
};

/**
 * OpenAI's language parameter is ISO-639-1 ("en"), so regional hints collapse
 * to their language. The dialect set still matters for providers that accept it.
 */
export function toIsoLanguage(languageHint: string): string {
  const primary = languageHint.split("-")[0].toLowerCase();
  return ISO_639_1_OVERRIDES[primary] ?? primary;
}

export class OpenAISpeechToText implements SpeechToTextClient {
  private readonly client: OpenAITranscriptionClient;
  private readonly model: string;

  constructor(client: OpenAITranscriptionClient, model = "gpt-4o-transcribe") {
    this.client = client;
    this.model = model;
  }

  languageKey(languageHint: string): string {
    return toIsoLanguage(languageHint);
  }

  async transcribe(audio: AudioSegment, languageHint: string): Promise<string> {
    if (audio.pcm.length === 0) {
      throw new TranscriptionError("no-speech", "Empty audio buffer");
    }

    const audioFile = new File([Uint8Array.from(encodeWav(audio))], "utterance.wav", {
      type: "audio/wav",
    });

    let text: string;
    try {
      const response = await this.client.audio.transcriptions.create({
        file: audioFile,
        model: this.model,
        language: this.languageKey(languageHint),
        response_format: "json",
      });
      text = response.text?.trim() ?? "";
    } catch (err) {
      throw new TranscriptionError("service-error", `OpenAI transcription failed: ${describeError(err)}`, {
        cause: err,
      });
    }

    if (!text) {
      throw new TranscriptionError("no-speech", "OpenAI returned no transcript");
    }
    return text;
  }
}

// ─── Deepgram ───────────────────────────────────────────────────────────────────

/**
 * Shape of a Deepgram prerecorded response, trimmed to the fields we read.
 * Defined locally to avoid tight coupling with SDK internals.
 */
export interface DeepgramPrerecordedResult {
  results?: {
    channels?: Array<{
      alternatives?: Array<{ transcript?: string; confidence?: number }>;
    }>;
  };
}

/** The `listen.prerecorded` surface of a Deepgram client. */
export interface DeepgramPrerecordedClient {
  listen: {
    prerecorded: {
      transcribeFile(
        source: Buffer,
        options: { model: string; language: string; smart_format: boolean; punctuate: boolean },
      ): Promise<{ result: DeepgramPrerecordedResult | null; error: unknown }>;
    };
  };
}

export class DeepgramSpeechToText implements SpeechToTextClient {
  private readonly client: DeepgramPrerecordedClient;
  private readonly model: string;

  constructor(client: DeepgramPrerecordedClient, model = "nova-2") {
    this.client = client;
    this.model = model;
  }

  async transcribe(audio: AudioSegment, languageHint: string): Promise<string> {
    if (audio.pcm.length === 0) {
      throw new TranscriptionError("no-speech", "Empty audio buffer");
    }

    let response: { result: DeepgramPrerecordedResult | null; error: unknown };
    try {
      response = await this.client.listen.prerecorded.transcribeFile(encodeWav(audio), {
        model: this.model,
        language: languageHint,
        smart_format: true,
        punctuate: true,
      });
    } catch (err) {
      throw new TranscriptionError("service-error", `Deepgram request failed: ${describeError(err)}`, {
        cause: err,
      });
    }

    if (response.error) {
      throw new TranscriptionError("service-error", `Deepgram returned an error: ${describeError(response.error)}`, {
        cause: response.error,
      });
    }

    const transcript = response.result?.results?.channels?.[0]?.alternatives?.[0]?.transcript?.trim() ?? "";
    if (!transcript) {
      throw new TranscriptionError("no-speech", "Deepgram returned no transcript");
    }
    return transcript;
  }
}
