// Tests for the VoiceFrontEnd facade wired by createVoiceFrontEnd over the bundled data packs

import { describe, it, expect, vi, beforeAll } from "vitest";
import { loadDataPacks } from "./data-packs.js";
import type { DataPacks } from "./data-packs.js";
import { profileFor } from "./environment-profile.js";
import { createVoiceFrontEnd } from "./voice-front-end.js";
import type { CreateVoiceFrontEndOptions } from "./voice-front-end.js";
import { AmplitudeSpeechToText, ScriptedAudioSource } from "./test-fakes.js";
import { EnvironmentCategory, ListenMode } from "./types.js";

// ─── Helpers ────────────────────────────────────────────────────────────────────

let packs: DataPacks;

beforeAll(async () => {
  packs = await loadDataPacks("en");
});

function createFrontEnd(
  script: number[],
  phrases: Record<number, string>,
  overrides: Partial<CreateVoiceFrontEndOptions> = {},
) {
  const source = new ScriptedAudioSource(script);
  const stt = new AmplitudeSpeechToText(phrases);
  const frontEnd = createVoiceFrontEnd({
    source,
    stt,
    packs,
    profile: profileFor(EnvironmentCategory.OTHER),
    listenSettings: { timeoutSeconds: 2, silenceThresholdSeconds: 1, maxTotalTimeSeconds: 20 },
    calibrateAmbientNoise: false,
    ...overrides,
  });
  return { frontEnd, source, stt };
}

// ─── Tests ──────────────────────────────────────────────────────────────────────

describe("VoiceFrontEnd.nextTurn", () => {
  it("returns the utterance with the identity its trigger phrase opened", async () => {
    const onSessionChange = vi.fn();
    const { frontEnd } = createFrontEnd([1000, 0, 0], { 1000: "Hey Luna, what time is it?" }, { onSessionChange });

    const turn = await frontEnd.nextTurn();

    expect(turn).toEqual({ text: "hey luna, what time is it?", identity: "luna" });
    expect(onSessionChange).toHaveBeenCalledWith("luna", "trigger");
  });

  it("keeps the identity for the following turn without a trigger phrase", async () => {
    const { frontEnd } = createFrontEnd([1000, 0, 0, 2000, 0, 0], { 1000: "hey rex", 2000: "tell me a joke" });

    await frontEnd.nextTurn();
    const turn = await frontEnd.nextTurn();

    expect(turn).toEqual({ text: "tell me a joke", identity: "rex" });
  });

  it("returns a turn without identity when no session is open", async () => {
    const { frontEnd } = createFrontEnd([1000, 0, 0], { 1000: "what time is it" });

    expect(await frontEnd.nextTurn()).toEqual({ text: "what time is it", identity: null });
  });

  it("returns null and leaves the session alone when nothing is heard", async () => {
    const onSessionChange = vi.fn();
    const { frontEnd } = createFrontEnd([0, 0, 0, 0, 0], {}, { onSessionChange });

    expect(await frontEnd.nextTurn()).toBeNull();
    expect(onSessionChange).not.toHaveBeenCalled();
  });

  it("ends the session on a goodbye", async () => {
    const onSessionChange = vi.fn();
    const { frontEnd } = createFrontEnd([1000, 0, 0, 2000, 0, 0], { 1000: "hey luna", 2000: "okay goodbye" }, {
      onSessionChange,
    });

    await frontEnd.nextTurn();
    const turn = await frontEnd.nextTurn();

    expect(turn).toEqual({ text: "okay goodbye", identity: null });
    expect(onSessionChange).toHaveBeenLastCalledWith(null, "end-phrase");
  });

  it("repairs known mishearings in the word game", async () => {
    const { frontEnd, stt } = createFrontEnd([1000, 0, 0, 0, 0], { 1000: "Ready ready" });

    expect(await frontEnd.nextTurn(ListenMode.WORD_GAME)).toEqual({ text: "ready", identity: null });
    expect(stt.calls[0].durationSeconds).toBeCloseTo(0.3);
  });
});

describe("VoiceFrontEnd speaking state", () => {
  it("does not listen while the assistant is speaking", async () => {
    const { frontEnd, source, stt } = createFrontEnd([1000, 0, 0], { 1000: "hello" });
    await frontEnd.setSpeaking(true, "Once upon a time");

    expect(await frontEnd.listen(5, 1, 20)).toBeNull();
    expect(stt.calls).toHaveLength(0);
    expect(source.remaining).toBe(3);
  });

  it("stops playback when the user says stop during it", async () => {
    const stopImmediately = vi.fn();
    const onInterrupt = vi.fn();
    const { frontEnd } = createFrontEnd([0, 1000, 0], { 1000: "stop talking" }, {
      playback: { stopImmediately },
      onInterrupt,
    });

    await frontEnd.setSpeaking(true, "Once upon a time there was a dragon");

    await vi.waitFor(() => expect(onInterrupt).toHaveBeenCalledTimes(1));
    expect(stopImmediately).toHaveBeenCalledTimes(1);
    expect(frontEnd.conversationState.isSpeaking).toBe(false);
  });

  it("only tracks the flag when there is no playback controller", async () => {
    const { frontEnd, source } = createFrontEnd([1000], { 1000: "stop" });

    await frontEnd.setSpeaking(true, "hello");

    expect(frontEnd.conversationState.isSpeaking).toBe(true);
    expect(source.openCount).toBe(0);
    await frontEnd.close();
  });

  it("close() ends an interrupt watch in progress", async () => {
    const stopImmediately = vi.fn();
    const { frontEnd } = createFrontEnd(new Array<number>(50).fill(0), {}, { playback: { stopImmediately } });
    await frontEnd.setSpeaking(true, "a very long story");

    await frontEnd.close();

    expect(stopImmediately).not.toHaveBeenCalled();
    expect(frontEnd.conversationState.isSpeaking).toBe(true);
  });
});
