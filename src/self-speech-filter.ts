// Voice Turn Core - Self-Speech Filter
// Decides whether a transcribed fragment is the assistant hearing itself.
//
// Rules, first match wins:
//   1. the fragment contains a fingerprint from the self-speech catalog, matched
//      on word boundaries ("great jobs" does not match "great job")
//   2. the fragment is longer than maxHumanWords (long scripted replies are the assistant)
//   3. the fragment repeats part of what playback is saying or just said
// This is a heuristic: a child repeating a catalog phrase is suppressed, and
// unfamiliar assistant phrasing under the word limit gets through.

import { containsPhrase, countWords, findPhrase, normalizeText } from "./utils.js";
import { silentLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import type { SelfSpeechCatalog } from "./types.js";

export type SelfSpeechVerdict =
  | { selfSpeech: false }
  | { selfSpeech: true; reason: "catalog"; phrase: string }
  | { selfSpeech: true; reason: "length"; wordCount: number }
  | { selfSpeech: true; reason: "echo" };

export interface SelfSpeechFilterOptions {
  catalog: SelfSpeechCatalog;
  /** Fragments with more words than this are treated as the assistant. Default: 15 */
  maxHumanWords?: number;
  /**
   * Text playback is speaking, or spoke within the echo window; null when
   * nothing recent was played.
   */
  recentPlayback?: () => string | null;
  /** Shorter fragments are never matched against playback text. Default: 3 */
  minEchoWords?: number;
  logger?: Logger;
}

const DEFAULT_MAX_HUMAN_WORDS = 15;
const DEFAULT_MIN_ECHO_WORDS = 3;

export class SelfSpeechFilter {
  private readonly phrases: readonly string[];
  private readonly maxHumanWords: number;
  private readonly minEchoWords: number;
  private readonly recentPlayback: () => string | null;
  private readonly logger: Logger;
  readonly catalogVersion: number;

  constructor(options: SelfSpeechFilterOptions) {
    this.phrases = options.catalog.phrases.map(normalizeText).filter((phrase) => phrase.length > 0);
    this.catalogVersion = options.catalog.version;
    this.maxHumanWords = options.maxHumanWords ?? DEFAULT_MAX_HUMAN_WORDS;
    this.minEchoWords = options.minEchoWords ?? DEFAULT_MIN_ECHO_WORDS;
    this.recentPlayback = options.recentPlayback ?? (() => null);
    this.logger = options.logger ?? silentLogger;
  }

  classify(text: string): SelfSpeechVerdict {
    const normalized = normalizeText(text);
    if (normalized.length === 0) return { selfSpeech: false };

    const phrase = findPhrase(normalized, this.phrases);
    if (phrase !== null) {
      this.logger.warn(`Ignored own speech "${text}" (catalog v${this.catalogVersion}: "${phrase}")`);
      return { selfSpeech: true, reason: "catalog", phrase };
    }

    const wordCount = countWords(normalized);
    if (wordCount > this.maxHumanWords) {
      this.logger.warn(`Ignored long fragment (${wordCount} words, likely own speech): "${text.slice(0, 50)}..."`);
      return { selfSpeech: true, reason: "length", wordCount };
    }

    if (wordCount >= this.minEchoWords) {
      const played = this.recentPlayback();
      if (played !== null && containsPhrase(played, normalized)) {
        this.logger.warn(`Ignored echo of playback text: "${text}"`);
        return { selfSpeech: true, reason: "echo" };
      }
    }

    return { selfSpeech: false };
  }

  isSelfSpeech(text: string): boolean {
    return this.classify(text).selfSpeech;
  }
}
