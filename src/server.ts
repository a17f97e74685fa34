// Voice Turn Core - WebSocket Device Gateway and Express Server
// A remote device (speaker + microphone) streams PCM over a WebSocket and gets
// back finished utterances with the identity they belong to.
//
// Audio is held in memory only for as long as a capture needs it.

import express, { type Express } from "express";
import { createServer, type Server as HttpServer } from "node:http";
import { setTimeout as sleep } from "node:timers/promises";
import { v4 as uuidv4 } from "uuid";
import { WebSocketServer, WebSocket } from "ws";
import { z } from "zod";
import { PcmFrameSource } from "./audio-source.js";
import { AudioSourceUnavailableError, describeError } from "./errors.js";
import { createLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import type { PlaybackController } from "./interrupt-monitor.js";
import type { SessionChangeReason } from "./session-manager.js";
import type { VoiceFrontEnd } from "./voice-front-end.js";
import { ListenMode } from "./types.js";
import type { AudioFormat, ClientMessage, ServerMessage, Turn } from "./types.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

const DEFAULT_AUDIO_FORMAT: AudioFormat = { sampleRate: 16000, channels: 1 };

/** Pause before listening again while the assistant is speaking */
const SPEAKING_POLL_MS = 100;

// ─── Client message validation ──────────────────────────────────────────────────

const ClientMessageSchema: z.ZodType<ClientMessage, z.ZodTypeDef, unknown> = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("audio_format"),
    channels: z.number().int(),
    sampleRate: z.number().int(),
    encoding: z.literal("LINEAR16"),
  }),
  z.object({
    type: z.literal("playback_state"),
    speaking: z.boolean(),
    text: z.string().optional(),
  }),
  z.object({ type: z.literal("end_session") }),
]);

function parseClientMessage(text: string): ClientMessage {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    throw new Error("Message is not valid JSON.");
  }
  const parsed = ClientMessageSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Unsupported message: ${parsed.error.issues.map((issue) => issue.message).join("; ")}`);
  }
  return parsed.data;
}

// ─── Per-Connection State ───────────────────────────────────────────────────────

/** What a pipeline factory gets to build one connection's front end. */
export interface PipelineContext {
  connectionId: string;
  source: PcmFrameSource;
  playback: PlaybackController;
  onSessionChange: (identity: string | null, reason: SessionChangeReason) => void;
  logger: Logger;
}

export type PipelineFactory = (context: PipelineContext) => VoiceFrontEnd;

interface ConnectionState {
  connectionId: string;
  source: PcmFrameSource;
  frontEnd: VoiceFrontEnd;
  audioFormatValidated: boolean;
  turnLoop: Promise<void> | null;
  closed: boolean;
}

// ─── Server Factory ─────────────────────────────────────────────────────────────

export interface CreateServerOptions {
  createPipeline: PipelineFactory;
  /** Format devices must announce in the handshake. Default: 16 kHz mono */
  audioFormat?: AudioFormat;
  listenMode?: ListenMode;
  logger?: Logger;
}

export interface AppServer {
  app: Express;
  httpServer: HttpServer;
  wss: WebSocketServer;
  /** Start listening on the given port. Resolves with the bound port. */
  listen(port: number): Promise<number>;
  /** Gracefully shut down the server. */
  close(): Promise<void>;
}

/**
 * Creates the Express app, HTTP server, and WebSocket server.
 * Does NOT start listening — call `listen(port)` explicitly.
 */
export function createAppServer(options: CreateServerOptions): AppServer {
  const {
    createPipeline,
    audioFormat = DEFAULT_AUDIO_FORMAT,
    listenMode = ListenMode.NORMAL,
    logger = createLogger("Server"),
  } = options;
  const connections = new Map<string, ConnectionState>();

  const app = express();
  const httpServer = createServer(app);

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.get("/status", (_req, res) => {
    res.json({
      connections: connections.size,
      sessions: [...connections.values()].map((conn) => ({
        connectionId: conn.connectionId,
        speaking: conn.frontEnd.conversationState.isSpeaking,
        identity: conn.frontEnd.sessionManager.activeIdentity(),
      })),
    });
  });

  const wss = new WebSocketServer({ server: httpServer });

  wss.on("connection", (ws: WebSocket) => {
    handleConnection(ws, { createPipeline, audioFormat, listenMode, logger, connections });
  });

  return {
    app,
    httpServer,
    wss,
    listen(port: number): Promise<number> {
      return new Promise((resolve, reject) => {
        httpServer.once("error", reject);
        httpServer.listen(port, () => {
          const address = httpServer.address();
          const bound = typeof address === "object" && address !== null ? address.port : port;
          logger.info(`Server listening on port ${bound}`);
          resolve(bound);
        });
      });
    },
    close(): Promise<void> {
      return new Promise((resolve, reject) => {
        for (const client of wss.clients) {
          client.close();
        }
        wss.close(() => {
          httpServer.close((err) => {
            if (err) reject(err);
            else resolve();
          });
        });
      });
    },
  };
}

// ─── WebSocket Connection Handler ───────────────────────────────────────────────

interface ConnectionContext {
  createPipeline: PipelineFactory;
  audioFormat: AudioFormat;
  listenMode: ListenMode;
  logger: Logger;
  connections: Map<string, ConnectionState>;
}

function handleConnection(ws: WebSocket, ctx: ConnectionContext): void {
  const { logger } = ctx;
  const connectionId = uuidv4();
  const source = new PcmFrameSource({ format: ctx.audioFormat, logger });

  const frontEnd = ctx.createPipeline({
    connectionId,
    source,
    playback: {
      stopImmediately: () => sendMessage(ws, { type: "stop_playback" }),
    },
    onSessionChange: (identity) => sendMessage(ws, { type: "session_change", identity }),
    logger,
  });

  const conn: ConnectionState = {
    connectionId,
    source,
    frontEnd,
    audioFormatValidated: false,
    turnLoop: null,
    closed: false,
  };
  ctx.connections.set(connectionId, conn);

  logger.info(`New WebSocket connection ${connectionId}`);
  sendMessage(ws, { type: "ready", connectionId });

  ws.on("message", (data: Buffer | ArrayBuffer | Buffer[], isBinary: boolean) => {
    const payload = Array.isArray(data) ? Buffer.concat(data) : data instanceof ArrayBuffer ? Buffer.from(data) : data;
    try {
      if (isBinary) {
        handleBinaryMessage(ws, payload, conn);
      } else {
        handleClientMessage(ws, parseClientMessage(payload.toString("utf-8")), conn, ctx);
      }
    } catch (err) {
      const errorMessage = describeError(err);
      logger.error(`Error handling message for connection ${connectionId}: ${errorMessage}`);
      sendMessage(ws, { type: "error", message: errorMessage, recoverable: true });
    }
  });

  ws.on("close", () => {
    logger.info(`WebSocket closed, connection ${connectionId}`);
    cleanupConnection(conn, ctx);
  });

  ws.on("error", (err) => {
    logger.error(`WebSocket error for connection ${connectionId}: ${err.message}`);
    cleanupConnection(conn, ctx);
  });
}

// ─── Binary Message Handler (PCM frames) ────────────────────────────────────────

function handleBinaryMessage(ws: WebSocket, data: Buffer, conn: ConnectionState): void {
  if (!conn.audioFormatValidated) {
    sendMessage(ws, {
      type: "audio_format_error",
      message: "Audio format handshake required before sending audio.",
    });
    return;
  }

  // 16-bit PCM: every frame is a whole number of samples per channel
  const frameBytes = 2 * conn.source.format.channels;
  if (data.length % frameBytes !== 0) {
    sendMessage(ws, {
      type: "audio_format_error",
      message: `Audio frame byte length (${data.length}) is not a multiple of ${frameBytes}. Expected 16-bit aligned PCM data.`,
    });
    return;
  }

  conn.source.push(data);
}

// ─── JSON Client Message Handler ────────────────────────────────────────────────

function handleClientMessage(
  ws: WebSocket,
  message: ClientMessage,
  conn: ConnectionState,
  ctx: ConnectionContext,
): void {
  const { logger } = ctx;
  const catchAsync = (promise: Promise<void>) => {
    promise.catch((err: unknown) => {
      const errorMessage = describeError(err);
      logger.error(`Async error for connection ${conn.connectionId}: ${errorMessage}`);
      sendMessage(ws, { type: "error", message: errorMessage, recoverable: true });
    });
  };

  switch (message.type) {
    case "audio_format":
      handleAudioFormat(ws, message, conn, ctx);
      break;

    case "playback_state":
      catchAsync(conn.frontEnd.setSpeaking(message.speaking, message.text ?? null));
      break;

    case "end_session":
      catchAsync(conn.frontEnd.sessionManager.endSession());
      break;

    default: {
      const exhaustiveCheck: never = message;
      throw new Error(`Unknown message type: ${JSON.stringify(exhaustiveCheck)}`);
    }
  }
}

// ─── Audio Format Handshake ─────────────────────────────────────────────────────

function handleAudioFormat(
  ws: WebSocket,
  message: Extract<ClientMessage, { type: "audio_format" }>,
  conn: ConnectionState,
  ctx: ConnectionContext,
): void {
  const expected = ctx.audioFormat;
  const errors: string[] = [];

  if (message.channels !== expected.channels) {
    errors.push(`Expected ${expected.channels} channel(s), got ${message.channels}`);
  }
  if (message.sampleRate !== expected.sampleRate) {
    errors.push(`Expected sample rate ${expected.sampleRate}, got ${message.sampleRate}`);
  }

  if (errors.length > 0) {
    const errorMsg = `Audio format validation failed: ${errors.join("; ")}`;
    ctx.logger.warn(`${errorMsg} (connection ${conn.connectionId})`);
    sendMessage(ws, { type: "audio_format_error", message: errorMsg });
    return;
  }

  conn.audioFormatValidated = true;
  ctx.logger.info(`Audio format validated for connection ${conn.connectionId}`);
  sendMessage(ws, { type: "audio_format_ack", sampleRate: expected.sampleRate, channels: expected.channels });

  if (conn.turnLoop === null) {
    conn.turnLoop = runTurnLoop(ws, conn, ctx).catch((err: unknown) => {
      ctx.logger.error(`Turn loop failed for connection ${conn.connectionId}: ${describeError(err)}`);
      sendMessage(ws, { type: "error", message: describeError(err), recoverable: false });
    });
  }
}

// ─── Turn Loop ──────────────────────────────────────────────────────────────────

/** Listens turn after turn until the connection closes or its audio runs out. */
async function runTurnLoop(ws: WebSocket, conn: ConnectionState, ctx: ConnectionContext): Promise<void> {
  while (!conn.closed) {
    let turn: Turn | null;
    try {
      turn = await conn.frontEnd.nextTurn(ctx.listenMode);
    } catch (err) {
      if (err instanceof AudioSourceUnavailableError && conn.source.isEnded) {
        ctx.logger.info(`Audio ended for connection ${conn.connectionId}`);
        return;
      }
      throw err;
    }

    if (turn !== null) {
      sendMessage(ws, { type: "utterance", text: turn.text, identity: turn.identity });
    } else if (conn.frontEnd.conversationState.isSpeaking) {
      await sleep(SPEAKING_POLL_MS);
    }
  }
}

// ─── Message Sending ────────────────────────────────────────────────────────────

/**
 * Sends a ServerMessage to the client as JSON text.
 * Silently ignores if the WebSocket is not in OPEN state.
 */
export function sendMessage(ws: WebSocket, message: ServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}

// ─── Connection Cleanup ─────────────────────────────────────────────────────────

function cleanupConnection(conn: ConnectionState, ctx: ConnectionContext): void {
  if (conn.closed) return;
  conn.closed = true;
  conn.source.end();
  ctx.connections.delete(conn.connectionId);
  conn.frontEnd.close().catch((err: unknown) => {
    ctx.logger.error(`Failed to close pipeline for connection ${conn.connectionId}: ${describeError(err)}`);
  });
}

export { DEFAULT_AUDIO_FORMAT, SPEAKING_POLL_MS };
export type { ConnectionState };
