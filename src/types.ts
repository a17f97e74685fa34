// Voice Turn Core - Shared TypeScript interfaces and types
// Types only: runtime helpers live in their own modules so this barrel stays free of code.

// ─── Listen modes ───────────────────────────────────────────────────────────────

/**
 * Capture mode supplied by the caller on every listen. Used to pick the chunk
 * duration, the energy multiplier and the language hints.
 */
export enum ListenMode {
  NORMAL = "normal",
  WORD_GAME = "word-game",
  INTL_GAME = "intl-game",
  INTERRUPT_CHECK = "interrupt-check",
}

/** One value per listen mode. Keyed by the enum so a missing mode fails to compile. */
export type ModeTable<T> = Readonly<Record<ListenMode, T>>;

// ─── Environment profile ────────────────────────────────────────────────────────

export enum EnvironmentCategory {
  RASPBERRY_PI_5 = "raspberry-pi-5",
  SMALL_BOARD = "small-board",
  MACOS = "macos",
  LINUX_DESKTOP = "linux-desktop",
  OTHER = "other",
}

export interface EnvironmentProfile {
  readonly category: EnvironmentCategory;
  /** RMS energy a chunk must reach before it is sent for transcription (normal mode). */
  readonly baseEnergyThreshold: number;
  /** Seconds of ambient audio sampled before capture when calibration is on. */
  readonly calibrationSeconds: number;
  readonly chunkDurationMultiplier: number;
  readonly silenceToleranceMultiplier: number;
  readonly modeMultipliers: ModeTable<number>;
}

/** Host facts gathered once by the resolver. */
export interface HostInfo {
  platform: NodeJS.Platform;
  arch: string;
  /** Contents of the device-tree model file on single-board computers, else null. */
  deviceModel: string | null;
}

// ─── Audio ──────────────────────────────────────────────────────────────────────

/** Mono or interleaved 16-bit little-endian PCM. */
export interface AudioFormat {
  sampleRate: number;
  channels: number;
}

export interface AudioSegment extends AudioFormat {
  pcm: Buffer;
  durationSeconds: number;
}

export interface TranscriptFragment {
  text: string;
  segment: AudioSegment;
  /** Audio-time offset of the segment inside the current capture window (seconds). */
  offsetSeconds: number;
}

// ─── Capture ────────────────────────────────────────────────────────────────────

export type CaptureStatus =
  /** Speech was heard and the buffer was finalized by silence, max time or end of stream. */
  | "finalized"
  /** Nothing human was retained. */
  | "no-speech"
  /** The abort predicate fired (assistant started speaking). */
  | "aborted"
  /** The onFragment hook asked to stop early. */
  | "stopped";

export interface CaptureResult {
  status: CaptureStatus;
  fragments: readonly TranscriptFragment[];
  elapsedSeconds: number;
}

// ─── Conversation session ───────────────────────────────────────────────────────

export enum SessionState {
  IDLE = "idle",
  ACTIVE = "active",
}

export interface ConversationSession {
  readonly sessionId: string;
  readonly identity: string;
  readonly startedAt: number;
  readonly lastInteractionAt: number;
  readonly timeoutMs: number;
}

export type SessionEndReason = "timeout" | "end-phrase" | "explicit";

/** One completed turn of the listen → session pipeline. */
export interface Turn {
  text: string;
  identity: string | null;
}

// ─── Data packs ─────────────────────────────────────────────────────────────────

export interface SelfSpeechCatalog {
  version: number;
  phrases: string[];
}

export interface TriggerPhraseTable {
  version: number;
  identities: Array<{ identity: string; phrases: string[] }>;
}

export interface LocalePack {
  incompleteOpeners: string[];
  /** Applied in order; each pair is [heard, replacement]. */
  lexicalRepairs: Array<[string, string]>;
  endOfSessionPhrases: string[];
  interruptPhrases: string[];
}

// ─── WebSocket protocol ─────────────────────────────────────────────────────────

// Client → Server messages (binary frames carry PCM audio)
export type ClientMessage =
  | {
      type: "audio_format";
      channels: number;
      sampleRate: number;
      encoding: "LINEAR16";
    }
  | { type: "playback_state"; speaking: boolean; text?: string }
  | { type: "end_session" };

// Server → Client messages
export type ServerMessage =
  | { type: "ready"; connectionId: string }
  | { type: "audio_format_ack"; sampleRate: number; channels: number }
  | { type: "utterance"; text: string; identity: string | null }
  | { type: "session_change"; identity: string | null }
  | { type: "stop_playback" }
  | { type: "error"; message: string; recoverable: boolean }
  | { type: "audio_format_error"; message: string };

// ─── Misc ───────────────────────────────────────────────────────────────────────

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}
