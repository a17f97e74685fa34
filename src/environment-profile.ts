// Voice Turn Core - Environment Profile Resolver
// Classifies the host once and hands back the tuned capture thresholds for it.
// No network access; unreadable host facts fall back to the generic profile.

import { readFileSync } from "node:fs";
import { EnvironmentCategory, ListenMode } from "./types.js";
import type { EnvironmentProfile, HostInfo, ModeTable } from "./types.js";

/** Device-tree model file exposed by single-board computers. */
const DEVICE_MODEL_PATH = "/proc/device-tree/model";

type ProfileTuning = Omit<EnvironmentProfile, "category">;

function modes(normal: number, wordGame: number, intlGame: number, interruptCheck: number): ModeTable<number> {
  return {
    [ListenMode.NORMAL]: normal,
    [ListenMode.WORD_GAME]: wordGame,
    [ListenMode.INTL_GAME]: intlGame,
    [ListenMode.INTERRUPT_CHECK]: interruptCheck,
  };
}

const PROFILE_TABLE: Readonly<Record<EnvironmentCategory, ProfileTuning>> = {
  [EnvironmentCategory.RASPBERRY_PI_5]: {
    baseEnergyThreshold: 150,
    calibrationSeconds: 1.2,
    chunkDurationMultiplier: 1.2,
    silenceToleranceMultiplier: 1.3,
    modeMultipliers: modes(1.0, 0.8, 1.1, 0.6),
  },
  [EnvironmentCategory.SMALL_BOARD]: {
    baseEnergyThreshold: 120,
    calibrationSeconds: 1.0,
    chunkDurationMultiplier: 1.0,
    silenceToleranceMultiplier: 1.2,
    modeMultipliers: modes(1.0, 0.7, 1.2, 0.5),
  },
  [EnvironmentCategory.MACOS]: {
    baseEnergyThreshold: 300,
    calibrationSeconds: 0.8,
    chunkDurationMultiplier: 1.0,
    silenceToleranceMultiplier: 1.0,
    modeMultipliers: modes(1.0, 0.83, 1.0, 0.67),
  },
  [EnvironmentCategory.LINUX_DESKTOP]: {
    baseEnergyThreshold: 200,
    calibrationSeconds: 1.0,
    chunkDurationMultiplier: 1.1,
    silenceToleranceMultiplier: 1.1,
    modeMultipliers: modes(1.0, 0.75, 1.15, 0.6),
  },
  [EnvironmentCategory.OTHER]: {
    baseEnergyThreshold: 250,
    calibrationSeconds: 0.8,
    chunkDurationMultiplier: 1.0,
    silenceToleranceMultiplier: 1.0,
    modeMultipliers: modes(1.0, 0.8, 1.1, 0.65),
  },
};

/** Base chunk length per mode, before the profile's chunkDurationMultiplier. */
export const BASE_CHUNK_SECONDS: ModeTable<number> = modes(0.6, 0.3, 0.4, 0.2);

function isArm(arch: string): boolean {
  return arch === "arm" || arch === "arm64" || arch.startsWith("aarch");
}

/**
 * Pure classifier: the same HostInfo always yields the same category.
 *
 * A Raspberry Pi 5 is recognized from its device-tree model string; any other
 * ARM Linux host, or a host exposing a Raspberry Pi model, is a generic small board.
 */
export function classifyHost(host: HostInfo): EnvironmentCategory {
  const model = host.deviceModel?.toLowerCase() ?? "";

  if (host.platform === "linux") {
    if (model.includes("raspberry pi 5")) return EnvironmentCategory.RASPBERRY_PI_5;
    if (model.includes("raspberry pi") || isArm(host.arch)) return EnvironmentCategory.SMALL_BOARD;
    return EnvironmentCategory.LINUX_DESKTOP;
  }
  if (host.platform === "darwin") return EnvironmentCategory.MACOS;
  return EnvironmentCategory.OTHER;
}

export function profileFor(category: EnvironmentCategory): EnvironmentProfile {
  const tuning = PROFILE_TABLE[category];
  return Object.freeze({
    category,
    ...tuning,
    modeMultipliers: Object.freeze({ ...tuning.modeMultipliers }),
  });
}

export function resolveEnvironmentProfile(host: HostInfo): EnvironmentProfile {
  return profileFor(classifyHost(host));
}

/** Gathers host facts. Never throws: a missing model file just means "not a board". */
export function detectHost(): HostInfo {
  let deviceModel: string | null = null;
  try {
    // The device-tree string is NUL-terminated
    deviceModel = readFileSync(DEVICE_MODEL_PATH, "utf-8").replace(/\0/g, "").trim() || null;
  } catch {
    // Not a device-tree host
  }
  return { platform: process.platform, arch: process.arch, deviceModel };
}

let probedProfile: EnvironmentProfile | null = null;

/**
 * Probes the host on first call and returns the same frozen profile for the
 * rest of the process.
 */
export function probe(): EnvironmentProfile {
  if (probedProfile === null) {
    probedProfile = resolveEnvironmentProfile(detectHost());
  }
  return probedProfile;
}

/** Energy gate for a mode: round(baseEnergyThreshold × modeMultiplier). */
export function effectiveThreshold(profile: EnvironmentProfile, mode: ListenMode): number {
  return Math.round(profile.baseEnergyThreshold * profile.modeMultipliers[mode]);
}

/** Chunk duration for a mode in seconds. */
export function chunkSeconds(profile: EnvironmentProfile, mode: ListenMode): number {
  return BASE_CHUNK_SECONDS[mode] * profile.chunkDurationMultiplier;
}

/** Seconds of continuous silence that end an utterance. */
export function silenceTolerance(profile: EnvironmentProfile, silenceThresholdSeconds: number): number {
  return silenceThresholdSeconds * profile.silenceToleranceMultiplier;
}
