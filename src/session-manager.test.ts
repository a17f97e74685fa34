// Unit tests for SessionManager: trigger phrases, refresh, timeout and end phrases

import { describe, it, expect, vi } from "vitest";
import { ConversationState } from "./conversation-state.js";
import { SessionManager } from "./session-manager.js";
import type { SessionChangeReason } from "./session-manager.js";
import { SessionState } from "./types.js";
import type { TriggerPhraseTable } from "./types.js";

// ─── Helpers ────────────────────────────────────────────────────────────────────

const TRIGGERS: TriggerPhraseTable = {
  version: 1,
  identities: [
    { identity: "luna", phrases: ["luna", "hey luna", "loona"] },
    { identity: "rex", phrases: ["rex", "hey rex", "wrecks"] },
  ],
};

const END_PHRASES = ["goodbye", "bye", "see you later"];

function createManager(timeoutMs = 30_000) {
  let clock = 1_000_000;
  const state = new ConversationState({ now: () => clock });
  const changes: Array<{ identity: string | null; reason: SessionChangeReason }> = [];
  const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  const manager = new SessionManager({
    state,
    triggerPhrases: TRIGGERS,
    endOfSessionPhrases: END_PHRASES,
    timeoutMs,
    now: () => clock,
    logger,
    onSessionChange: (identity, reason) => changes.push({ identity, reason }),
  });
  return {
    manager,
    state,
    changes,
    logger,
    advance: (ms: number) => {
      clock += ms;
    },
    now: () => clock,
  };
}

// ─── Tests ──────────────────────────────────────────────────────────────────────

describe("SessionManager.onUtterance", () => {
  it("returns null while idle when no trigger phrase is heard", async () => {
    const { manager, state } = createManager();

    expect(await manager.onUtterance("what time is it")).toBeNull();
    expect(state.activeSession).toBeNull();
  });

  it("opens a session for the identity whose trigger phrase is heard", async () => {
    const { manager, state, changes, now } = createManager();

    expect(await manager.onUtterance("Hey Luna, what's up?")).toBe("luna");

    const session = state.activeSession;
    expect(session?.identity).toBe("luna");
    expect(session?.startedAt).toBe(now());
    expect(session?.timeoutMs).toBe(30_000);
    expect(session?.sessionId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(changes).toEqual([{ identity: "luna", reason: "trigger" }]);
  });

  it("recognizes a misheard variant of a trigger phrase", async () => {
    const { manager } = createManager();

    expect(await manager.onUtterance("loona can you hear me")).toBe("luna");
  });

  it("matches trigger phrases on word boundaries only", async () => {
    const { manager } = createManager();

    expect(await manager.onUtterance("the lunatic fringe")).toBeNull();
  });

  it("returns the active identity for later speech within the timeout and refreshes it", async () => {
    const { manager, state, advance, now } = createManager();
    await manager.onUtterance("hey rex");

    advance(29_000);
    expect(await manager.onUtterance("tell me a joke")).toBe("rex");
    expect(state.activeSession?.lastInteractionAt).toBe(now());

    advance(29_000);
    expect(await manager.onUtterance("another one")).toBe("rex");
  });

  it("keeps the session at exactly the timeout and expires it just after", async () => {
    const { manager, advance } = createManager();
    await manager.onUtterance("hey luna");

    advance(30_000);
    expect(await manager.onUtterance("still there")).toBe("luna");

    advance(30_001);
    expect(await manager.onUtterance("still there")).toBeNull();
  });

  it("expires an idle session before handling the call", async () => {
    const { manager, state, changes, advance } = createManager();
    await manager.onUtterance("hey luna");

    advance(45_000);

    expect(await manager.onUtterance("what time is it")).toBeNull();
    expect(state.activeSession).toBeNull();
    expect(changes.at(-1)).toEqual({ identity: null, reason: "timeout" });
  });

  it("can open a new session in the same call that expires the old one", async () => {
    const { manager, changes, advance } = createManager();
    await manager.onUtterance("hey luna");
    advance(45_000);

    expect(await manager.onUtterance("hey rex")).toBe("rex");
    expect(changes.map((c) => c.reason)).toEqual(["trigger", "timeout", "trigger"]);
  });

  it("ends the session on an end-of-session phrase", async () => {
    const { manager, state, changes } = createManager();
    await manager.onUtterance("hey luna");

    expect(await manager.onUtterance("okay, bye now!")).toBeNull();
    expect(state.activeSession).toBeNull();
    expect(changes.at(-1)).toEqual({ identity: null, reason: "end-phrase" });
    expect(await manager.onUtterance("are you there")).toBeNull();
  });

  it("does not open a session for a trigger phrase said in a goodbye", async () => {
    const { manager, state, changes } = createManager();

    expect(await manager.onUtterance("goodbye luna")).toBeNull();
    expect(state.activeSession).toBeNull();
    expect(changes).toHaveLength(0);
    expect(await manager.onUtterance("hey luna")).toBe("luna");
  });

  it("does not treat a word containing an end phrase as one", async () => {
    const { manager } = createManager();
    await manager.onUtterance("hey luna");

    expect(await manager.onUtterance("maybe later")).toBe("luna");
  });

  it("ignores another identity's trigger phrase during an active session", async () => {
    const { manager, state, logger } = createManager();
    await manager.onUtterance("hey luna");
    const sessionId = state.activeSession?.sessionId;

    expect(await manager.onUtterance("hey rex come here")).toBe("luna");
    expect(state.activeSession?.sessionId).toBe(sessionId);
    expect(logger.info).toHaveBeenCalledWith("Ignoring trigger for rex: session for luna is active");
  });

  it("neither transitions nor refreshes on empty text", async () => {
    const { manager, state, changes, advance } = createManager();

    expect(await manager.onUtterance("   ")).toBeNull();
    expect(changes).toHaveLength(0);

    await manager.onUtterance("hey luna");
    const openedAt = state.activeSession?.lastInteractionAt;
    advance(20_000);
    expect(await manager.onUtterance("")).toBe("luna");
    expect(state.activeSession?.lastInteractionAt).toBe(openedAt);

    advance(15_000);
    expect(await manager.onUtterance("hello")).toBeNull();
  });

  it("serializes concurrent calls", async () => {
    const { manager } = createManager();

    const results = await Promise.all([manager.onUtterance("hey luna"), manager.onUtterance("hey rex")]);

    expect(results).toEqual(["luna", "luna"]);
  });
});

describe("SessionManager session control", () => {
  it("endSession closes the active session", async () => {
    const { manager, changes } = createManager();
    await manager.onUtterance("hey rex");

    await manager.endSession();

    expect(manager.activeIdentity()).toBeNull();
    expect(manager.sessionState).toBe(SessionState.IDLE);
    expect(changes.at(-1)).toEqual({ identity: null, reason: "explicit" });
  });

  it("endSession is a no-op while idle", async () => {
    const { manager, changes } = createManager();

    await manager.endSession();

    expect(changes).toHaveLength(0);
  });

  it("activeIdentity reports a lapsed session as gone", async () => {
    const { manager, advance } = createManager(5_000);
    await manager.onUtterance("wrecks");
    expect(manager.activeIdentity()).toBe("rex");
    expect(manager.sessionState).toBe(SessionState.ACTIVE);

    advance(5_001);

    expect(manager.activeIdentity()).toBeNull();
  });

  it("matchTrigger follows table order", () => {
    const { manager } = createManager();

    expect(manager.matchTrigger("rex and luna")).toBe("luna");
    expect(manager.matchTrigger("nobody")).toBeNull();
  });
});
