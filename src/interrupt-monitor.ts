// Voice Turn Core - Interrupt Monitor
// While the assistant is speaking, listens in short windows for a cancellation
// phrase ("stop", "be quiet", ...) and cuts playback when one is heard.
//
// Runs the same capture loop as listen() in interrupt-check mode, so the self-speech
// filter keeps the assistant's own words out. Ends on its own once playback stops.

import { describeError } from "./errors.js";
import { findPhrase } from "./utils.js";
import { silentLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import type { CaptureEngine } from "./capture-engine.js";
import type { ConversationState } from "./conversation-state.js";
import { ListenMode } from "./types.js";

/** The playback side; must stop audio output immediately when asked. */
export interface PlaybackController {
  stopImmediately(): void | Promise<void>;
}

export interface InterruptMonitorOptions {
  engine: CaptureEngine;
  state: ConversationState;
  playback: PlaybackController;
  interruptPhrases: readonly string[];
  /** Length of each listening window in seconds of audio. Default: 3 */
  windowSeconds?: number;
  logger?: Logger;
}

export class InterruptMonitor {
  private readonly engine: CaptureEngine;
  private readonly state: ConversationState;
  private readonly playback: PlaybackController;
  private readonly phrases: readonly string[];
  private readonly windowSeconds: number;
  private readonly logger: Logger;
  private running: Promise<boolean> | null = null;
  private cancelled = false;

  constructor(options: InterruptMonitorOptions) {
    this.engine = options.engine;
    this.state = options.state;
    this.playback = options.playback;
    this.phrases = options.interruptPhrases;
    this.windowSeconds = options.windowSeconds ?? 3;
    this.logger = options.logger ?? silentLogger;
  }

  get isWatching(): boolean {
    return this.running !== null;
  }

  /**
   * Watches until playback ends, stop() is called, or an interrupt phrase is heard.
   * Resolves true only when playback was interrupted. A second call while a watch
   * is in progress joins it.
   */
  watch(): Promise<boolean> {
    if (this.running !== null) return this.running;
    this.cancelled = false;
    this.running = this.run().finally(() => {
      this.running = null;
    });
    return this.running;
  }

  stop(): void {
    this.cancelled = true;
  }

  private async run(): Promise<boolean> {
    while (!this.cancelled && this.state.isSpeaking) {
      const result = await this.engine.capture({
        mode: ListenMode.INTERRUPT_CHECK,
        timeoutSeconds: this.windowSeconds,
        silenceThresholdSeconds: this.windowSeconds,
        maxTotalTimeSeconds: this.windowSeconds,
        abortWhen: () => this.cancelled || !this.state.isSpeaking,
        onFragment: (fragment) => this.matchInterrupt(fragment.text) !== null,
      });

      if (result.status === "stopped") {
        const phrase = this.matchInterrupt(result.fragments.at(-1)?.text ?? "");
        this.logger.info(`Interrupt phrase "${phrase ?? "?"}" heard; stopping playback`);
        return this.interrupt();
      }

      // Nothing was read: the audio stream has ended
      if (result.status === "no-speech" && result.elapsedSeconds === 0) {
        this.logger.warn("Audio stream ended while watching for interrupts");
        return false;
      }
    }
    return false;
  }

  private matchInterrupt(text: string): string | null {
    return findPhrase(text, this.phrases);
  }

  private interrupt(): Promise<boolean> {
    return this.state.runExclusive(async (writer) => {
      // Playback may have finished on its own while the last chunk was transcribed
      if (!writer.speaking) return false;
      try {
        await this.playback.stopImmediately();
      } catch (err) {
        this.logger.error(`Failed to stop playback: ${describeError(err)}`);
        throw err;
      }
      writer.setSpeaking(false);
      return true;
    });
  }
}
