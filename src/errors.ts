// Error taxonomy.
//
// Only AudioSourceUnavailableError leaves listen(); transcription failures are
// absorbed as silence, and "no speech" is a null result rather than an error.

export class AudioSourceUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AudioSourceUnavailableError";
  }
}

export type TranscriptionErrorKind = "no-speech" | "service-error";

export class TranscriptionError extends Error {
  readonly kind: TranscriptionErrorKind;

  constructor(kind: TranscriptionErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TranscriptionError";
    this.kind = kind;
  }
}

/** Invalid environment variables or data pack contents, raised at startup. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
