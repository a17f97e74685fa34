// Ordered fragments retained during one capture.
// Append-only while capturing; freeze() ends capture and consume() hands the
// fragments to the assembler exactly once.

import type { TranscriptFragment } from "./types.js";

export class UtteranceBuffer {
  private readonly fragments: TranscriptFragment[] = [];
  private frozen = false;
  private consumed = false;

  get length(): number {
    return this.fragments.length;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  /** Most recent retained fragment, or null when empty. */
  get last(): TranscriptFragment | null {
    return this.fragments.length > 0 ? this.fragments[this.fragments.length - 1] : null;
  }

  append(fragment: TranscriptFragment): void {
    if (this.frozen) {
      throw new Error("Cannot append to a finalized utterance buffer.");
    }
    this.fragments.push(fragment);
  }

  freeze(): void {
    if (this.frozen) return;
    this.frozen = true;
    Object.freeze(this.fragments);
  }

  /** @throws Error if the buffer is still open or was already consumed. */
  consume(): readonly TranscriptFragment[] {
    if (!this.frozen) {
      throw new Error("Utterance buffer must be finalized before it is consumed.");
    }
    if (this.consumed) {
      throw new Error("Utterance buffer was already consumed.");
    }
    this.consumed = true;
    return this.fragments;
  }
}
