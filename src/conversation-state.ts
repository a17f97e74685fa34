// Shared conversation state: the assistant's speaking flag and the single
// conversation session.
//
// The capture loop, the interrupt watcher and the session manager all touch this
// object. Reads are plain getters (a synchronous read cannot interleave on the
// event loop); every write goes through runExclusive(), which serializes
// read-modify-write sections across await points. Callers must not await chunk
// reads or transcription inside a section.

import { Mutex } from "./utils/mutex.js";
import type { ConversationSession } from "./types.js";

export interface ConversationStateOptions {
  /** How long after playback ends its text still counts as possible echo. Default: 4000 */
  echoWindowMs?: number;
  now?: () => number;
}

/** Write access handed to a runExclusive() callback; unusable once it returns. */
export interface ConversationStateWriter {
  readonly speaking: boolean;
  readonly session: ConversationSession | null;
  setSpeaking(speaking: boolean, text?: string | null): void;
  setSession(session: ConversationSession | null): void;
}

const DEFAULT_ECHO_WINDOW_MS = 4000;

export class ConversationState {
  private speaking = false;
  private spokenText: string | null = null;
  private playbackEndedAt: number | null = null;
  private session: ConversationSession | null = null;
  private readonly mutex = new Mutex();
  private readonly echoWindowMs: number;
  private readonly now: () => number;

  constructor(options: ConversationStateOptions = {}) {
    this.echoWindowMs = options.echoWindowMs ?? DEFAULT_ECHO_WINDOW_MS;
    this.now = options.now ?? Date.now;
  }

  get isSpeaking(): boolean {
    return this.speaking;
  }

  get activeSession(): ConversationSession | null {
    return this.session;
  }

  /** Text being played, or played within the echo window; otherwise null. */
  recentPlaybackText(): string | null {
    if (this.spokenText === null) return null;
    if (this.speaking) return this.spokenText;
    if (this.playbackEndedAt !== null && this.now() - this.playbackEndedAt <= this.echoWindowMs) {
      return this.spokenText;
    }
    return null;
  }

  runExclusive<T>(fn: (writer: ConversationStateWriter) => T | Promise<T>): Promise<T> {
    return this.mutex.runExclusive(async () => {
      let open = true;
      const assertOpen = () => {
        if (!open) throw new Error("ConversationState writer used outside its exclusive section.");
      };

      const state = this;
      const writer: ConversationStateWriter = {
        get speaking() {
          return state.speaking;
        },
        get session() {
          return state.session;
        },
        setSpeaking: (speaking, text) => {
          assertOpen();
          this.applySpeaking(speaking, text);
        },
        setSession: (session) => {
          assertOpen();
          this.session = session;
        },
      };

      try {
        return await fn(writer);
      } finally {
        open = false;
      }
    });
  }

  /** Called by the playback side when audio output starts or stops. */
  setSpeaking(speaking: boolean, text?: string | null): Promise<void> {
    return this.runExclusive((writer) => writer.setSpeaking(speaking, text));
  }

  private applySpeaking(speaking: boolean, text: string | null | undefined): void {
    if (speaking) {
      if (text !== undefined) this.spokenText = text;
      this.playbackEndedAt = null;
    } else if (this.speaking) {
      this.playbackEndedAt = this.now();
    }
    this.speaking = speaking;
  }
}
