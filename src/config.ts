// Voice Turn Core - Configuration
// Reads the process environment (after dotenv has loaded .env) into a typed config.

import { z } from "zod";
import { ConfigError } from "./errors.js";
import type { LogLevel } from "./logger.js";

export type SttProvider = "openai" | "deepgram";

export interface AppConfig {
  sttProvider: SttProvider;
  openaiApiKey: string | null;
  openaiTranscribeModel: string;
  deepgramApiKey: string | null;
  deepgramModel: string;
  port: number;
  audioSampleRate: number;
  audioChannels: number;
  sessionTimeoutMs: number;
  listen: {
    timeoutSeconds: number;
    silenceThresholdSeconds: number;
    maxTotalTimeSeconds: number;
  };
  calibrateAmbientNoise: boolean;
  locale: string;
  logLevel: LogLevel;
}

const booleanFlag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((value) => value === "true" || value === "1" || value === "yes");

const positiveSeconds = z.coerce.number().positive();

const EnvSchema = z.object({
  STT_PROVIDER: z.enum(["openai", "deepgram"]).default("openai"),
  OPENAI_API_KEY: z.string().min(1).optional(),
  OPENAI_TRANSCRIBE_MODEL: z.string().min(1).default("gpt-4o-transcribe"),
  DEEPGRAM_API_KEY: z.string().min(1).optional(),
  DEEPGRAM_MODEL: z.string().min(1).default("nova-2"),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  AUDIO_SAMPLE_RATE: z.coerce.number().int().min(8000).max(48000).default(16000),
  AUDIO_CHANNELS: z.coerce.number().int().min(1).max(2).default(1),
  SESSION_TIMEOUT_SECONDS: positiveSeconds.default(30),
  LISTEN_TIMEOUT_SECONDS: positiveSeconds.default(15),
  SILENCE_THRESHOLD_SECONDS: positiveSeconds.default(2.5),
  MAX_LISTEN_SECONDS: positiveSeconds.default(45),
  CALIBRATE_AMBIENT_NOISE: booleanFlag.default("true"),
  LOCALE: z
    .string()
    .regex(/^[a-z]{2,3}(-[A-Za-z]{2,4})?$/, "expected a locale such as en or en-US")
    .default("en"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

/**
 * Validates the environment. Empty strings count as unset.
 * @throws ConfigError naming every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") cleaned[key] = value.trim();
  }

  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${problems.join("; ")}`);
  }
  const vars = parsed.data;

  if (vars.STT_PROVIDER === "openai" && vars.OPENAI_API_KEY === undefined) {
    throw new ConfigError("OPENAI_API_KEY is required when STT_PROVIDER is openai");
  }
  if (vars.STT_PROVIDER === "deepgram" && vars.DEEPGRAM_API_KEY === undefined) {
    throw new ConfigError("DEEPGRAM_API_KEY is required when STT_PROVIDER is deepgram");
  }
  if (vars.MAX_LISTEN_SECONDS < vars.LISTEN_TIMEOUT_SECONDS) {
    throw new ConfigError("MAX_LISTEN_SECONDS must not be shorter than LISTEN_TIMEOUT_SECONDS");
  }

  return {
    sttProvider: vars.STT_PROVIDER,
    openaiApiKey: vars.OPENAI_API_KEY ?? null,
    openaiTranscribeModel: vars.OPENAI_TRANSCRIBE_MODEL,
    deepgramApiKey: vars.DEEPGRAM_API_KEY ?? null,
    deepgramModel: vars.DEEPGRAM_MODEL,
    port: vars.PORT,
    audioSampleRate: vars.AUDIO_SAMPLE_RATE,
    audioChannels: vars.AUDIO_CHANNELS,
    sessionTimeoutMs: Math.round(vars.SESSION_TIMEOUT_SECONDS * 1000),
    listen: {
      timeoutSeconds: vars.LISTEN_TIMEOUT_SECONDS,
      silenceThresholdSeconds: vars.SILENCE_THRESHOLD_SECONDS,
      maxTotalTimeSeconds: vars.MAX_LISTEN_SECONDS,
    },
    calibrateAmbientNoise: vars.CALIBRATE_AMBIENT_NOISE,
    locale: vars.LOCALE,
    logLevel: vars.LOG_LEVEL,
  };
}
