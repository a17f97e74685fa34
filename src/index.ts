// Voice Turn Core - Entry point
// Resolves the host profile, loads the data packs, picks the speech-to-text
// provider and starts the device gateway.

import "dotenv/config";
import { createClient as createDeepgramClient } from "@deepgram/sdk";
import OpenAI from "openai";
import { loadConfig } from "./config.js";
import type { AppConfig } from "./config.js";
import { loadDataPacks } from "./data-packs.js";
import { probe } from "./environment-profile.js";
import { describeError } from "./errors.js";
import { createLogger } from "./logger.js";
import { createAppServer } from "./server.js";
import { DeepgramSpeechToText, OpenAISpeechToText } from "./transcription-engine.js";
import type { DeepgramPrerecordedClient, OpenAITranscriptionClient, SpeechToTextClient } from "./transcription-engine.js";
import { createVoiceFrontEnd } from "./voice-front-end.js";

export const APP_NAME = "Voice Turn Core";
export const APP_VERSION = "0.1.0";

const ts = () => new Date().toISOString();
const logInit = (msg: string) => console.log(`[INIT] [${ts()}] ${msg}`);
const logFatal = (msg: string) => console.error(`[FATAL] [${ts()}] ${msg}`);

function createSpeechToText(config: AppConfig): SpeechToTextClient {
  if (config.sttProvider === "deepgram" && config.deepgramApiKey !== null) {
    logInit(`Creating Deepgram client (model ${config.deepgramModel})...`);
    const deepgramClient = createDeepgramClient(config.deepgramApiKey);
    return new DeepgramSpeechToText(deepgramClient as unknown as DeepgramPrerecordedClient, config.deepgramModel);
  }
  if (config.openaiApiKey === null) {
    throw new Error("OPENAI_API_KEY is not set. Add it to your .env file.");
  }
  logInit(`Creating OpenAI client (model ${config.openaiTranscribeModel})...`);
  const openaiClient = new OpenAI({ apiKey: config.openaiApiKey });
  return new OpenAISpeechToText(openaiClient as unknown as OpenAITranscriptionClient, config.openaiTranscribeModel);
}

async function main(): Promise<void> {
  const config = loadConfig(process.env);
  logInit("Configuration loaded");

  const profile = probe();
  logInit(
    `Environment: ${profile.category} (energy threshold ${profile.baseEnergyThreshold}, ` +
      `chunk x${profile.chunkDurationMultiplier}, silence x${profile.silenceToleranceMultiplier})`,
  );

  const packs = await loadDataPacks(config.locale);
  logInit(
    `Data packs loaded: self-speech catalog v${packs.selfSpeechCatalog.version}, ` +
      `${packs.triggerPhrases.identities.length} identities, locale ${config.locale}`,
  );

  const stt = createSpeechToText(config);

  const server = createAppServer({
    audioFormat: { sampleRate: config.audioSampleRate, channels: config.audioChannels },
    logger: createLogger("Server", config.logLevel),
    createPipeline: ({ connectionId, source, playback, onSessionChange }) =>
      createVoiceFrontEnd({
        source,
        stt,
        packs,
        profile,
        playback,
        listenSettings: config.listen,
        sessionTimeoutMs: config.sessionTimeoutMs,
        calibrateAmbientNoise: config.calibrateAmbientNoise,
        onSessionChange,
        logger: createLogger(`Pipeline ${connectionId.slice(0, 8)}`, config.logLevel),
      }),
  });

  const port = await server.listen(config.port);
  logInit(`${APP_NAME} v${APP_VERSION} running at http://localhost:${port}`);
  logInit(`Pipeline: capture → self-speech filter → ${config.sttProvider} → session manager`);
  logInit("Ready for connections");
}

main().catch((err: unknown) => {
  logFatal(describeError(err));
  process.exit(1);
});
