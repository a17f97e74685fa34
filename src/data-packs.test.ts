// Unit tests for loading and validating the data packs

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, mkdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { loadDataPacks, loadLocalePack, loadSelfSpeechCatalog, loadTriggerPhrases } from "./data-packs.js";
import { ConfigError } from "./errors.js";

describe("bundled data packs", () => {
  it("load and validate for the English locale", async () => {
    const packs = await loadDataPacks("en");

    expect(packs.selfSpeechCatalog.phrases).toContain("i'm listening");
    expect(packs.triggerPhrases.identities.map((entry) => entry.identity)).toEqual(["luna", "rex", "parent"]);
    expect(packs.locale.incompleteOpeners).toHaveLength(17);
    expect(packs.locale.incompleteOpeners).toContain("how far is");
    expect(packs.locale.interruptPhrases).toContain("stop talking");
    expect(packs.locale.lexicalRepairs[0]).toEqual(["filipina", "filipino"]);
  });

  it("keep no human request inside the self-speech catalog", async () => {
    const catalog = await loadSelfSpeechCatalog();

    expect(catalog.phrases).not.toContain("what time is it");
    expect(catalog.phrases).not.toContain("stop");
  });
});

describe("data pack validation", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "voice-packs-"));
    await mkdir(path.join(dir, "locales"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("rejects a missing file with a ConfigError", async () => {
    await expect(loadSelfSpeechCatalog(dir)).rejects.toBeInstanceOf(ConfigError);
  });

  it("rejects malformed JSON", async () => {
    await writeFile(path.join(dir, "self-speech-catalog.json"), "{ not json");

    await expect(loadSelfSpeechCatalog(dir)).rejects.toThrow(/is not valid JSON/);
  });

  it("rejects a catalog with empty phrases", async () => {
    await writeFile(path.join(dir, "self-speech-catalog.json"), JSON.stringify({ version: 1, phrases: [""] }));

    await expect(loadSelfSpeechCatalog(dir)).rejects.toBeInstanceOf(ConfigError);
  });

  it("rejects duplicate identities in the trigger table", async () => {
    await writeFile(
      path.join(dir, "trigger-phrases.json"),
      JSON.stringify({
        version: 1,
        identities: [
          { identity: "luna", phrases: ["luna"] },
          { identity: "luna", phrases: ["loona"] },
        ],
      }),
    );

    await expect(loadTriggerPhrases(dir)).rejects.toBeInstanceOf(ConfigError);
  });

  it("rejects a lexical repair that is not a pair", async () => {
    await writeFile(
      path.join(dir, "locales", "en.json"),
      JSON.stringify({
        incompleteOpeners: ["can you"],
        lexicalRepairs: [["only-one"]],
        endOfSessionPhrases: ["bye"],
        interruptPhrases: ["stop"],
      }),
    );

    await expect(loadLocalePack("en", dir)).rejects.toBeInstanceOf(ConfigError);
  });

  it("rejects a locale name that could escape the data directory", async () => {
    await expect(loadLocalePack("../secrets", dir)).rejects.toThrow('Invalid locale "../secrets"');
  });

  it("loads a valid locale pack from a custom directory", async () => {
    await writeFile(
      path.join(dir, "locales", "fil.json"),
      JSON.stringify({
        incompleteOpeners: ["ano ang"],
        lexicalRepairs: [["salamat po po", "salamat po"]],
        endOfSessionPhrases: ["paalam"],
        interruptPhrases: ["tama na"],
      }),
    );

    const pack = await loadLocalePack("fil", dir);

    expect(pack.endOfSessionPhrases).toEqual(["paalam"]);
    expect(pack.lexicalRepairs).toEqual([["salamat po po", "salamat po"]]);
  });
});
