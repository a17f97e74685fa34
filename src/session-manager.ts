// Voice Turn Core - Wake-Word / Session Manager
// Consumes assembled transcripts and keeps the single conversation session.
//
//   IDLE      --[trigger phrase of X]-->           ACTIVE(X)   returns X
//   IDLE      --[end-of-session phrase]-->         IDLE        returns null, trigger or not
//   ACTIVE(X) --[any text, within timeout]-->      ACTIVE(X)   returns X, refreshed
//   ACTIVE(X) --[idle longer than timeout]-->      IDLE        before the call is handled
//   ACTIVE(X) --[end-of-session phrase]-->         IDLE        returns null
//
// Collision policy: ignore. Another identity's trigger phrase heard during an
// active session is ordinary speech of the active identity.

import { v4 as uuidv4 } from "uuid";
import { SessionState } from "./types.js";
import type { ConversationSession, SessionEndReason, TriggerPhraseTable } from "./types.js";
import { findPhrase } from "./utils.js";
import { silentLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import type { ConversationState, ConversationStateWriter } from "./conversation-state.js";

export const DEFAULT_SESSION_TIMEOUT_MS = 30_000;

export type SessionChangeReason = "trigger" | SessionEndReason;

export interface SessionManagerOptions {
  state: ConversationState;
  triggerPhrases: TriggerPhraseTable;
  endOfSessionPhrases: readonly string[];
  /** Idle time after which the session lapses. Default: 30000 */
  timeoutMs?: number;
  now?: () => number;
  logger?: Logger;
  /** Invoked inside the state lock whenever a session opens or closes. */
  onSessionChange?: (identity: string | null, reason: SessionChangeReason) => void;
}

/**
 * Valid state transitions for the session state machine.
 * ACTIVE → ACTIVE is a refresh; identities never switch in place.
 */
const VALID_TRANSITIONS: ReadonlyMap<SessionState, ReadonlySet<SessionState>> = new Map([
  [SessionState.IDLE, new Set([SessionState.ACTIVE])],
  [SessionState.ACTIVE, new Set([SessionState.ACTIVE, SessionState.IDLE])],
]);

function stateOf(session: ConversationSession | null): SessionState {
  return session === null ? SessionState.IDLE : SessionState.ACTIVE;
}

export class SessionManager {
  private readonly state: ConversationState;
  private readonly triggers: TriggerPhraseTable["identities"];
  private readonly endPhrases: readonly string[];
  private readonly timeoutMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;
  private readonly onSessionChange: (identity: string | null, reason: SessionChangeReason) => void;

  constructor(options: SessionManagerOptions) {
    this.state = options.state;
    this.triggers = options.triggerPhrases.identities;
    this.endPhrases = options.endOfSessionPhrases;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_SESSION_TIMEOUT_MS;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? silentLogger;
    this.onSessionChange = options.onSessionChange ?? (() => {});
  }

  /**
   * Session entry point for one assembled utterance.
   * Returns the identity the utterance belongs to, or null when no session is active.
   */
  onUtterance(text: string): Promise<string | null> {
    return this.state.runExclusive((writer) => this.handleUtterance(writer, text));
  }

  /** Ends the active session, if any (e.g. the device was put to sleep). */
  endSession(): Promise<void> {
    return this.state.runExclusive((writer) => {
      if (writer.session !== null) this.close(writer, "explicit");
    });
  }

  /** Identity of the current session, treating a lapsed one as gone. */
  activeIdentity(): string | null {
    const session = this.state.activeSession;
    if (session === null || this.isExpired(session, this.now())) return null;
    return session.identity;
  }

  get sessionState(): SessionState {
    return this.activeIdentity() === null ? SessionState.IDLE : SessionState.ACTIVE;
  }

  /** Identity whose trigger phrase appears in the text (table order), or null. */
  matchTrigger(text: string): string | null {
    for (const entry of this.triggers) {
      if (findPhrase(text, entry.phrases) !== null) return entry.identity;
    }
    return null;
  }

  isEndOfSession(text: string): boolean {
    return findPhrase(text, this.endPhrases) !== null;
  }

  private handleUtterance(writer: ConversationStateWriter, text: string): string | null {
    const now = this.now();
    let session = writer.session;

    if (session !== null && this.isExpired(session, now)) {
      this.logger.info(`Session for ${session.identity} timed out after ${session.timeoutMs}ms of inactivity`);
      this.close(writer, "timeout");
      session = null;
    }

    const trimmed = text.trim();
    if (trimmed.length === 0) {
      return session?.identity ?? null;
    }

    if (session !== null) {
      if (this.isEndOfSession(trimmed)) {
        this.logger.info(`Session for ${session.identity} ended by "${trimmed}"`);
        this.close(writer, "end-phrase");
        return null;
      }

      const other = this.matchTrigger(trimmed);
      if (other !== null && other !== session.identity) {
        this.logger.info(`Ignoring trigger for ${other}: session for ${session.identity} is active`);
      }

      this.transition(writer, session, { ...session, lastInteractionAt: now });
      return session.identity;
    }

    // "goodbye luna" says goodbye; it never opens a session
    if (this.isEndOfSession(trimmed)) {
      this.logger.debug(`End-of-session phrase while idle: "${trimmed}"`);
      return null;
    }

    const identity = this.matchTrigger(trimmed);
    if (identity === null) {
      this.logger.debug(`No trigger phrase in "${trimmed}"`);
      return null;
    }

    const opened: ConversationSession = {
      sessionId: uuidv4(),
      identity,
      startedAt: now,
      lastInteractionAt: now,
      timeoutMs: this.timeoutMs,
    };
    this.transition(writer, null, opened);
    this.logger.info(`Session ${opened.sessionId} opened for ${identity}`);
    this.onSessionChange(identity, "trigger");
    return identity;
  }

  private close(writer: ConversationStateWriter, reason: SessionEndReason): void {
    this.transition(writer, writer.session, null);
    this.onSessionChange(null, reason);
  }

  private transition(
    writer: ConversationStateWriter,
    from: ConversationSession | null,
    to: ConversationSession | null,
  ): void {
    const fromState = stateOf(from);
    const toState = stateOf(to);
    if (!VALID_TRANSITIONS.get(fromState)?.has(toState)) {
      throw new Error(`Invalid session transition: ${fromState} → ${toState}`);
    }
    writer.setSession(to);
  }

  private isExpired(session: ConversationSession, now: number): boolean {
    return now - session.lastInteractionAt > session.timeoutMs;
  }
}
