// Voice Turn Core - Segment Capture & Endpointing Engine
// Pulls fixed-duration chunks from the audio source, keeps the ones that are
// human speech and decides when the speaker has finished.
//
// Key design decisions:
// - Elapsed time and silence are audio-time (sum of chunk durations), not wall-clock.
// - Chunks below the energy gate count as silence without a transcription call.
// - Transcription failures are silence; only failing to open the source is an error.
// - When the last fragment trails off on an incomplete opener ("how far is"),
//   the silence budget is extended once for that fragment.

import { computeChunkRMS } from "./audio-utils.js";
import { AudioSourceUnavailableError, describeError } from "./errors.js";
import { chunkSeconds, effectiveThreshold, silenceTolerance } from "./environment-profile.js";
import { UtteranceBuffer } from "./utterance-buffer.js";
import { endsWithPhrase } from "./utils.js";
import { silentLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import type { AudioSource, AudioStream } from "./audio-source.js";
import type { ConversationState } from "./conversation-state.js";
import type { SelfSpeechFilter } from "./self-speech-filter.js";
import type { SpeechToTextClient } from "./transcription-engine.js";
import type { UtteranceAssembler } from "./utterance-assembler.js";
import { ListenMode } from "./types.js";
import type {
  AudioSegment,
  CaptureResult,
  CaptureStatus,
  EnvironmentProfile,
  TranscriptFragment,
} from "./types.js";

export interface CaptureRequest {
  mode: ListenMode;
  /** Give up if no human speech has been heard after this much audio (seconds). */
  timeoutSeconds: number;
  /** Silence (seconds, before the profile's tolerance multiplier) that ends an utterance. */
  silenceThresholdSeconds: number;
  maxTotalTimeSeconds: number;
  /** Checked before every chunk; returning true ends the capture as "aborted". */
  abortWhen?: () => boolean;
  /** Called for each retained fragment; returning true ends the capture as "stopped". */
  onFragment?: (fragment: TranscriptFragment) => boolean;
}

export interface CaptureEngineDeps {
  source: AudioSource;
  stt: SpeechToTextClient;
  filter: SelfSpeechFilter;
  assembler: UtteranceAssembler;
  state: ConversationState;
  profile: EnvironmentProfile;
  /** Locale openers that mark a fragment as an unfinished question. */
  incompleteOpeners?: readonly string[];
  /** Sample ambient noise before each capture to raise the energy gate. Default: true */
  calibrateAmbientNoise?: boolean;
  logger?: Logger;
}

export class CaptureEngine {
  private readonly deps: CaptureEngineDeps;
  private readonly openers: readonly string[];
  private readonly calibrate: boolean;
  private readonly logger: Logger;

  constructor(deps: CaptureEngineDeps) {
    this.deps = deps;
    this.openers = deps.incompleteOpeners ?? [];
    this.calibrate = deps.calibrateAmbientNoise ?? true;
    this.logger = deps.logger ?? silentLogger;
  }

  /**
   * Listens for one human utterance.
   *
   * Returns null when nothing human was heard, when every transcription failed,
   * or when the assistant is (or starts) speaking.
   *
   * @throws AudioSourceUnavailableError if the audio source cannot be opened.
   */
  async listen(
    timeoutSeconds: number,
    silenceThresholdSeconds: number,
    maxTotalTimeSeconds: number,
    mode: ListenMode = ListenMode.NORMAL,
  ): Promise<string | null> {
    const result = await this.capture({
      mode,
      timeoutSeconds,
      silenceThresholdSeconds,
      maxTotalTimeSeconds,
      abortWhen: () => this.deps.state.isSpeaking,
    });

    if (result.status !== "finalized") return null;
    return this.deps.assembler.assemble(result.fragments, mode);
  }

  /**
   * Runs the chunk loop and returns the retained fragments without assembling
   * them. Shared by listen() and the interrupt watcher.
   */
  async capture(request: CaptureRequest): Promise<CaptureResult> {
    const abortWhen = request.abortWhen ?? (() => false);
    if (abortWhen()) {
      this.logger.info("Assistant is speaking; not listening");
      return { status: "aborted", fragments: [], elapsedSeconds: 0 };
    }

    const stream = await this.openSource();
    try {
      return await this.runLoop(stream, request, abortWhen);
    } finally {
      stream.close();
    }
  }

  private async openSource(): Promise<AudioStream> {
    try {
      return await this.deps.source.open();
    } catch (err) {
      if (err instanceof AudioSourceUnavailableError) throw err;
      throw new AudioSourceUnavailableError(`Could not open audio source: ${describeError(err)}`, { cause: err });
    }
  }

  private async runLoop(
    stream: AudioStream,
    request: CaptureRequest,
    abortWhen: () => boolean,
  ): Promise<CaptureResult> {
    const { profile } = this.deps;
    const { mode } = request;
    const chunkDuration = chunkSeconds(profile, mode);
    const tolerance = silenceTolerance(profile, request.silenceThresholdSeconds);
    const gate = await this.energyGate(stream, mode);

    const buffer = new UtteranceBuffer();
    let elapsed = 0;
    let consecutiveSilence = 0;
    let humanSpeechDetected = false;
    // Fragment count at the time the last incomplete-sentence extension was granted
    let extendedAtLength = -1;
    let status: CaptureStatus | null = null;

    this.logger.info(
      `Listening for human speech (mode ${mode}, chunk ${chunkDuration.toFixed(2)}s, ` +
        `gate ${gate}, silence tolerance ${tolerance.toFixed(2)}s, max ${request.maxTotalTimeSeconds}s)`,
    );

    while (elapsed < request.maxTotalTimeSeconds) {
      if (abortWhen()) {
        this.logger.info("Capture aborted: assistant started speaking");
        status = "aborted";
        break;
      }

      let segment: AudioSegment | null;
      try {
        segment = await stream.read(chunkDuration);
      } catch (err) {
        this.logger.warn(`Audio read failed, finalizing capture: ${describeError(err)}`);
        break;
      }
      if (segment === null) {
        this.logger.info("Audio stream ended");
        break;
      }

      const offsetSeconds = elapsed;
      elapsed += segment.durationSeconds;

      const text = await this.transcribeChunk(segment, gate, mode);
      if (text && !this.deps.filter.isSelfSpeech(text)) {
        const fragment: TranscriptFragment = { text, segment, offsetSeconds };
        buffer.append(fragment);
        consecutiveSilence = 0;
        humanSpeechDetected = true;
        this.logger.info(`Human speech detected: "${text.slice(0, 20)}..."`);

        if (request.onFragment?.(fragment)) {
          status = "stopped";
          break;
        }
      } else {
        consecutiveSilence += segment.durationSeconds;
        if (humanSpeechDetected) {
          this.logger.debug(`Silence: ${consecutiveSilence.toFixed(1)}s of ${tolerance.toFixed(1)}s`);
        }
      }

      if (humanSpeechDetected && consecutiveSilence >= tolerance) {
        const last = buffer.last;
        if (
          last !== null &&
          extendedAtLength !== buffer.length &&
          consecutiveSilence < 2 * tolerance &&
          this.endsIncomplete(last.text)
        ) {
          this.logger.info(`Incomplete sentence "${last.text}"; waiting for the rest`);
          extendedAtLength = buffer.length;
          consecutiveSilence = 0;
          continue;
        }
        this.logger.info(`Speaker finished; ${buffer.length} chunk(s) retained`);
        break;
      }

      if (!humanSpeechDetected && elapsed >= request.timeoutSeconds) {
        this.logger.info(`No human speech within ${request.timeoutSeconds}s`);
        break;
      }
    }

    buffer.freeze();
    const fragments = buffer.consume();
    if (status === null) {
      status = fragments.length > 0 ? "finalized" : "no-speech";
    }
    if (status === "no-speech") {
      this.logger.info("No human speech detected");
    }
    return { status, fragments, elapsedSeconds: elapsed };
  }

  /** True if the fragment trails off on one of the locale's openers. */
  endsIncomplete(text: string): boolean {
    return this.openers.some((opener) => endsWithPhrase(text, opener));
  }

  /**
   * Energy a chunk must reach before it is transcribed. With calibration on,
   * the gate rises above the mode threshold in a noisy room.
   */
  private async energyGate(stream: AudioStream, mode: ListenMode): Promise<number> {
    const { profile } = this.deps;
    const base = effectiveThreshold(profile, mode);
    if (!this.calibrate) return base;

    let ambient: AudioSegment | null;
    try {
      ambient = await stream.read(profile.calibrationSeconds);
    } catch (err) {
      this.logger.warn(`Ambient calibration failed: ${describeError(err)}`);
      return base;
    }
    if (ambient === null) return base;

    const ambientRms = computeChunkRMS(ambient.pcm);
    const calibrated = Math.round(ambientRms * profile.modeMultipliers[mode]);
    return Math.max(base, calibrated);
  }

  /** Transcript of one chunk, or "" for silence and failures. */
  private async transcribeChunk(segment: AudioSegment, gate: number, mode: ListenMode): Promise<string> {
    if (computeChunkRMS(segment.pcm) < gate) return "";
    try {
      return (await this.deps.stt.transcribe(segment, this.deps.assembler.primaryHint(mode))).trim();
    } catch (err) {
      this.logger.debug(`Chunk transcription gave nothing: ${describeError(err)}`);
      return "";
    }
  }
}
