// Audio frame source: the inbound side of the capture engine.
//
// PcmFrameSource accepts raw PCM as it arrives (WebSocket frames from a remote
// device, or a Readable such as an `arecord` pipe) and serves fixed-duration
// segments to whoever has a stream open. Frames fan out to every open stream, so
// the interrupt watcher and a listen() can overlap without stealing each other's
// audio. While nothing is open, a capped backlog is held for the next reader.

import type { Readable } from "node:stream";
import { AudioSourceUnavailableError } from "./errors.js";
import { bytesForDuration, createSegment } from "./audio-utils.js";
import { createDeferred } from "./utils/deferred.js";
import { silentLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import type { AudioFormat, AudioSegment, Deferred } from "./types.js";

export interface AudioStream {
  /**
   * Resolves with the next `durationSeconds` of audio. Once the source has
   * ended, the remaining partial audio is returned, then null.
   */
  read(durationSeconds: number): Promise<AudioSegment | null>;
  close(): void;
}

export interface AudioSource {
  readonly format: AudioFormat;
  /** @throws AudioSourceUnavailableError if the device cannot be opened. */
  open(): Promise<AudioStream>;
}

export interface PcmFrameSourceOptions {
  format: AudioFormat;
  /** Audio kept while no stream is open. Default: 5 */
  maxBacklogSeconds?: number;
  logger?: Logger;
}

const DEFAULT_MAX_BACKLOG_SECONDS = 5;

interface PendingRead {
  bytes: number;
  deferred: Deferred<AudioSegment | null>;
}

class PcmStream implements AudioStream {
  private readonly format: AudioFormat;
  private readonly onClose: (stream: PcmStream) => void;
  private pending: Buffer;
  private waiting: PendingRead | null = null;
  private ended = false;
  private closed = false;

  constructor(format: AudioFormat, backlog: Buffer, onClose: (stream: PcmStream) => void) {
    this.format = format;
    this.pending = backlog;
    this.onClose = onClose;
  }

  deliver(data: Buffer): void {
    if (this.closed) return;
    this.pending = this.pending.length === 0 ? data : Buffer.concat([this.pending, data]);
    this.settle();
  }

  finish(): void {
    this.ended = true;
    this.settle();
  }

  read(durationSeconds: number): Promise<AudioSegment | null> {
    if (this.waiting) {
      return Promise.reject(new Error("A read is already pending on this audio stream."));
    }
    if (this.closed) return Promise.resolve(null);

    const bytes = Math.max(bytesForDuration(this.format, durationSeconds), 2 * this.format.channels);
    if (this.pending.length >= bytes || this.ended) {
      return Promise.resolve(this.take(bytes));
    }

    const deferred = createDeferred<AudioSegment | null>();
    this.waiting = { bytes, deferred };
    return deferred.promise;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.pending = Buffer.alloc(0);
    this.onClose(this);
    if (this.waiting) {
      const { deferred } = this.waiting;
      this.waiting = null;
      deferred.resolve(null);
    }
  }

  private settle(): void {
    if (!this.waiting) return;
    if (this.pending.length < this.waiting.bytes && !this.ended) return;

    const { bytes, deferred } = this.waiting;
    this.waiting = null;
    deferred.resolve(this.take(bytes));
  }

  private take(bytes: number): AudioSegment | null {
    if (this.pending.length === 0) return null;
    const size = Math.min(bytes, this.pending.length);
    const pcm = this.pending.subarray(0, size);
    this.pending = this.pending.subarray(size);
    return createSegment(this.format, Buffer.from(pcm));
  }
}

export class PcmFrameSource implements AudioSource {
  readonly format: AudioFormat;
  private readonly maxBacklogBytes: number;
  private readonly logger: Logger;
  private readonly streams: Set<PcmStream> = new Set();
  private backlog: Buffer = Buffer.alloc(0);
  private ended = false;

  constructor(options: PcmFrameSourceOptions) {
    this.format = options.format;
    this.maxBacklogBytes = bytesForDuration(
      options.format,
      options.maxBacklogSeconds ?? DEFAULT_MAX_BACKLOG_SECONDS,
    );
    this.logger = options.logger ?? silentLogger;
  }

  get isEnded(): boolean {
    return this.ended;
  }

  get openStreamCount(): number {
    return this.streams.size;
  }

  async open(): Promise<AudioStream> {
    if (this.ended && this.backlog.length === 0) {
      throw new AudioSourceUnavailableError("Audio source has ended; no further audio can be captured.");
    }

    const stream = new PcmStream(this.format, this.backlog, (closed) => this.streams.delete(closed));
    this.backlog = Buffer.alloc(0);
    this.streams.add(stream);
    if (this.ended) stream.finish();
    return stream;
  }

  /** Feeds raw 16-bit PCM in the source format. */
  push(data: Buffer): void {
    if (this.ended || data.length === 0) return;

    if (this.streams.size === 0) {
      this.appendBacklog(data);
      return;
    }
    for (const stream of this.streams) {
      stream.deliver(data);
    }
  }

  /** No more audio will arrive. Open streams drain what they have, then read null. */
  end(): void {
    if (this.ended) return;
    this.ended = true;
    for (const stream of this.streams) {
      stream.finish();
    }
  }

  /** Feeds the source from a byte stream until it ends or fails. */
  pipeFrom(readable: Readable): void {
    readable.on("data", (chunk: Buffer | string) => {
      this.push(typeof chunk === "string" ? Buffer.from(chunk, "binary") : chunk);
    });
    readable.on("end", () => this.end());
    readable.on("error", (err: Error) => {
      this.logger.error(`Audio input stream failed: ${err.message}`);
      this.end();
    });
  }

  private appendBacklog(data: Buffer): void {
    const combined = this.backlog.length === 0 ? data : Buffer.concat([this.backlog, data]);
    if (combined.length <= this.maxBacklogBytes) {
      this.backlog = combined;
      return;
    }
    // Drop the oldest audio, keeping whole frames
    const frameBytes = 2 * this.format.channels;
    const keep = this.maxBacklogBytes - (this.maxBacklogBytes % frameBytes);
    this.backlog = Buffer.from(combined.subarray(combined.length - keep));
  }
}
