// Voice Turn Core - Utterance Assembler
// Turns the fragments retained by one capture into the final transcript.
//
// Primary pass: the retained audio is joined into one buffer and transcribed as
// a whole, which beats stitching chunk transcripts because words cut at chunk
// boundaries are heard intact. Up to `attempts` tries, each walking the mode's
// dialect hints in order (skipping hints the backend cannot tell apart); the
// first non-empty transcript wins.
//
// Fallback pass: only when the primary pass produced nothing, each segment is
// transcribed alone and the pieces are joined.
//
// Both passes end in the same cleanup: whitespace collapse, the locale's lexical
// repair table, lower-case. assemble() never throws.

import { setTimeout as sleep } from "node:timers/promises";
import { concatSegments } from "./audio-utils.js";
import { describeError } from "./errors.js";
import { collapseWhitespace } from "./utils.js";
import { silentLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import type { SpeechToTextClient } from "./transcription-engine.js";
import { ListenMode } from "./types.js";
import type { AudioSegment, ModeTable, TranscriptFragment } from "./types.js";

const DEFAULT_DIALECTS = ["en-US", "en-GB", "en-AU"] as const;
const INTL_DIALECTS = ["fil-PH", "en-US"] as const;

/** Ordered language hints per mode. */
export const DEFAULT_LANGUAGE_HINTS: ModeTable<readonly string[]> = {
  [ListenMode.NORMAL]: DEFAULT_DIALECTS,
  [ListenMode.WORD_GAME]: DEFAULT_DIALECTS,
  [ListenMode.INTL_GAME]: INTL_DIALECTS,
  [ListenMode.INTERRUPT_CHECK]: DEFAULT_DIALECTS,
};

export interface UtteranceAssemblerOptions {
  stt: SpeechToTextClient;
  /** [heard, replacement] pairs applied in order. */
  lexicalRepairs?: ReadonlyArray<readonly [string, string]>;
  languageHints?: ModeTable<readonly string[]>;
  /** Whole-buffer attempts before the per-segment fallback. Default: 3 */
  attempts?: number;
  /** Pause between whole-buffer attempts. Default: 200 */
  retryDelayMs?: number;
  logger?: Logger;
}

export class UtteranceAssembler {
  private readonly stt: SpeechToTextClient;
  private readonly lexicalRepairs: ReadonlyArray<readonly [string, string]>;
  private readonly languageHints: ModeTable<readonly string[]>;
  private readonly attempts: number;
  private readonly retryDelayMs: number;
  private readonly logger: Logger;

  constructor(options: UtteranceAssemblerOptions) {
    this.stt = options.stt;
    this.lexicalRepairs = options.lexicalRepairs ?? [];
    this.languageHints = options.languageHints ?? DEFAULT_LANGUAGE_HINTS;
    this.attempts = Math.max(1, options.attempts ?? 3);
    this.retryDelayMs = options.retryDelayMs ?? 200;
    this.logger = options.logger ?? silentLogger;
  }

  /** First language hint for a mode; used for per-chunk transcription. */
  primaryHint(mode: ListenMode): string {
    return this.languageHints[mode][0] ?? DEFAULT_DIALECTS[0];
  }

  async assemble(fragments: readonly TranscriptFragment[], mode: ListenMode = ListenMode.NORMAL): Promise<string | null> {
    const segments = fragments.map((fragment) => fragment.segment);
    if (segments.length === 0) return null;

    this.logger.info(`Assembling ${segments.length} retained chunk(s)`);

    const combined = await this.transcribeCombined(segments, mode);
    if (combined !== null) return combined;

    this.logger.warn("Combined transcription produced nothing; transcribing chunks individually");
    return this.transcribeIndividually(segments, mode);
  }

  /** Applies whitespace collapse, lexical repairs and lower-casing. */
  clean(text: string): string {
    let cleaned = collapseWhitespace(text).toLowerCase();
    for (const [heard, replacement] of this.lexicalRepairs) {
      cleaned = cleaned.split(heard.toLowerCase()).join(replacement.toLowerCase());
    }
    return collapseWhitespace(cleaned);
  }

  private async transcribeCombined(segments: readonly AudioSegment[], mode: ListenMode): Promise<string | null> {
    const combined = concatSegments(segments);
    if (combined === null) return null;
    const hints = this.distinctHints(mode);

    for (let attempt = 1; attempt <= this.attempts; attempt++) {
      for (const hint of hints) {
        const text = this.clean(await this.tryTranscribe(combined, hint));
        if (text) {
          this.logger.info(`Utterance recognized (${hint}, attempt ${attempt})`);
          return text;
        }
      }
      if (attempt < this.attempts && this.retryDelayMs > 0) {
        await sleep(this.retryDelayMs);
      }
    }
    return null;
  }

  private async transcribeIndividually(segments: readonly AudioSegment[], mode: ListenMode): Promise<string | null> {
    const hint = this.primaryHint(mode);
    const pieces: string[] = [];
    for (const segment of segments) {
      const text = await this.tryTranscribe(segment, hint);
      if (text) pieces.push(text);
    }

    if (pieces.length === 0) {
      this.logger.info("Could not understand the utterance after all attempts");
      return null;
    }
    const cleaned = this.clean(pieces.join(" "));
    return cleaned.length > 0 ? cleaned : null;
  }

  /** The mode's hints minus any the backend would send as an earlier one. */
  private distinctHints(mode: ListenMode): string[] {
    const seen = new Set<string>();
    return this.languageHints[mode].filter((hint) => {
      const key = this.stt.languageKey?.(hint) ?? hint;
      if (seen.has(key)) return false;
      seen.add(key);
      return true;
    });
  }

  /** Empty string on no-speech or any failure. */
  private async tryTranscribe(audio: AudioSegment, hint: string): Promise<string> {
    try {
      return (await this.stt.transcribe(audio, hint)).trim();
    } catch (err) {
      this.logger.debug(`Transcription (${hint}) gave nothing: ${describeError(err)}`);
      return "";
    }
  }
}
