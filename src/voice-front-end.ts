// Voice Turn Core - Voice Front End
// Public entry point: wires the capture engine, assembler, self-speech filter,
// session manager and interrupt monitor over one audio source.
//
// nextTurn() is a strict pipeline: capture finalizes, the assembler produces the
// text, and only then does the session manager see it.

import { CaptureEngine } from "./capture-engine.js";
import { ConversationState } from "./conversation-state.js";
import { InterruptMonitor } from "./interrupt-monitor.js";
import { SelfSpeechFilter } from "./self-speech-filter.js";
import { SessionManager } from "./session-manager.js";
import { UtteranceAssembler } from "./utterance-assembler.js";
import { describeError } from "./errors.js";
import { silentLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import type { AudioSource } from "./audio-source.js";
import type { DataPacks } from "./data-packs.js";
import type { PlaybackController } from "./interrupt-monitor.js";
import type { SessionChangeReason } from "./session-manager.js";
import type { SpeechToTextClient } from "./transcription-engine.js";
import { ListenMode } from "./types.js";
import type { EnvironmentProfile, Turn } from "./types.js";

export interface ListenSettings {
  timeoutSeconds: number;
  silenceThresholdSeconds: number;
  maxTotalTimeSeconds: number;
}

export const DEFAULT_LISTEN_SETTINGS: ListenSettings = {
  timeoutSeconds: 15,
  silenceThresholdSeconds: 2.5,
  maxTotalTimeSeconds: 45,
};

export interface VoiceFrontEndDeps {
  engine: CaptureEngine;
  sessions: SessionManager;
  state: ConversationState;
  /** Absent when nothing can stop playback; interrupts are then not watched. */
  interruptMonitor?: InterruptMonitor;
  listenSettings?: ListenSettings;
  onInterrupt?: () => void;
  logger?: Logger;
}

export class VoiceFrontEnd {
  private readonly engine: CaptureEngine;
  private readonly sessions: SessionManager;
  private readonly state: ConversationState;
  private readonly monitor: InterruptMonitor | null;
  private readonly settings: ListenSettings;
  private readonly onInterrupt: () => void;
  private readonly logger: Logger;
  private watchTask: Promise<void> | null = null;

  constructor(deps: VoiceFrontEndDeps) {
    this.engine = deps.engine;
    this.sessions = deps.sessions;
    this.state = deps.state;
    this.monitor = deps.interruptMonitor ?? null;
    this.settings = deps.listenSettings ?? DEFAULT_LISTEN_SETTINGS;
    this.onInterrupt = deps.onInterrupt ?? (() => {});
    this.logger = deps.logger ?? silentLogger;
  }

  get conversationState(): ConversationState {
    return this.state;
  }

  get sessionManager(): SessionManager {
    return this.sessions;
  }

  listen(
    timeoutSeconds: number,
    silenceThresholdSeconds: number,
    maxTotalTimeSeconds: number,
    mode: ListenMode = ListenMode.NORMAL,
  ): Promise<string | null> {
    return this.engine.listen(timeoutSeconds, silenceThresholdSeconds, maxTotalTimeSeconds, mode);
  }

  onUtterance(text: string): Promise<string | null> {
    return this.sessions.onUtterance(text);
  }

  /**
   * Listens with the configured settings and routes the result through the
   * session manager. Returns null when nothing was understood.
   */
  async nextTurn(mode: ListenMode = ListenMode.NORMAL): Promise<Turn | null> {
    const { timeoutSeconds, silenceThresholdSeconds, maxTotalTimeSeconds } = this.settings;
    const text = await this.listen(timeoutSeconds, silenceThresholdSeconds, maxTotalTimeSeconds, mode);
    if (text === null) return null;
    const identity = await this.onUtterance(text);
    return { text, identity };
  }

  /**
   * Called by the playback side. Starting playback also starts the interrupt
   * watch; it ends by itself when playback stops.
   */
  async setSpeaking(speaking: boolean, text?: string | null): Promise<void> {
    await this.state.setSpeaking(speaking, text);
    if (speaking) this.startInterruptWatch();
  }

  /** Stops the interrupt watch and waits for it to wind down. */
  async close(): Promise<void> {
    this.monitor?.stop();
    if (this.watchTask !== null) await this.watchTask;
  }

  private startInterruptWatch(): void {
    if (this.monitor === null || this.watchTask !== null) return;
    const monitor = this.monitor;
    this.watchTask = monitor
      .watch()
      .then((interrupted) => {
        if (interrupted) this.onInterrupt();
      })
      .catch((err: unknown) => {
        this.logger.error(`Interrupt watch failed: ${describeError(err)}`);
      })
      .finally(() => {
        this.watchTask = null;
      });
  }
}

// ─── Builder ────────────────────────────────────────────────────────────────────

export interface CreateVoiceFrontEndOptions {
  source: AudioSource;
  stt: SpeechToTextClient;
  packs: DataPacks;
  profile: EnvironmentProfile;
  playback?: PlaybackController;
  listenSettings?: ListenSettings;
  sessionTimeoutMs?: number;
  calibrateAmbientNoise?: boolean;
  onSessionChange?: (identity: string | null, reason: SessionChangeReason) => void;
  onInterrupt?: () => void;
  now?: () => number;
  logger?: Logger;
}

export function createVoiceFrontEnd(options: CreateVoiceFrontEndOptions): VoiceFrontEnd {
  const logger = options.logger ?? silentLogger;
  const { packs } = options;
  const state = new ConversationState({ now: options.now });

  const filter = new SelfSpeechFilter({
    catalog: packs.selfSpeechCatalog,
    recentPlayback: () => state.recentPlaybackText(),
    logger,
  });
  const assembler = new UtteranceAssembler({
    stt: options.stt,
    lexicalRepairs: packs.locale.lexicalRepairs,
    logger,
  });
  const engine = new CaptureEngine({
    source: options.source,
    stt: options.stt,
    filter,
    assembler,
    state,
    profile: options.profile,
    incompleteOpeners: packs.locale.incompleteOpeners,
    calibrateAmbientNoise: options.calibrateAmbientNoise,
    logger,
  });
  const sessions = new SessionManager({
    state,
    triggerPhrases: packs.triggerPhrases,
    endOfSessionPhrases: packs.locale.endOfSessionPhrases,
    timeoutMs: options.sessionTimeoutMs,
    now: options.now,
    logger,
    onSessionChange: options.onSessionChange,
  });
  const interruptMonitor =
    options.playback === undefined
      ? undefined
      : new InterruptMonitor({
          engine,
          state,
          playback: options.playback,
          interruptPhrases: packs.locale.interruptPhrases,
          logger,
        });

  return new VoiceFrontEnd({
    engine,
    sessions,
    state,
    interruptMonitor,
    listenSettings: options.listenSettings,
    onInterrupt: options.onInterrupt,
    logger,
  });
}
