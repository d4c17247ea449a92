import fs from "fs";
import path from "path";
import type { FeedbackSounds } from "./app/FeedbackNotifier";
import { DEFAULT_TIMER_SETTINGS } from "./domain/timers/Timer";
import { durationFromParts, parseDurationText } from "./domain/timers/duration";

export interface DurationSetting {
  minutes?: number;
  seconds?: number;
}

export interface SoundConfig {
  workEnd?: string;
  roundComplete?: string;
}

export interface AppConfig {
  work?: DurationSetting;
  rest?: DurationSetting;
  sounds?: SoundConfig;
  tones?: {
    volume?: number;
  };
}

export interface LoadedConfig {
  config: AppConfig;
  path?: string;
}

export interface SettingOverrides {
  workTime?: string;
  restTime?: string;
}

export interface ResolvedSettings {
  workDuration: number;
  restDuration: number;
  sounds: FeedbackSounds;
  volume: number;
}

const DEFAULT_CONFIG_FILENAMES = ["interval-timer.config.json", "config.json"];
const DEFAULT_VOLUME = 0.3;

export function loadConfig(configPath?: string): LoadedConfig {
  const searchPaths = configPath
    ? [configPath]
    : DEFAULT_CONFIG_FILENAMES.map((name) => path.resolve(process.cwd(), name));

  for (const candidate of searchPaths) {
    try {
      const resolved = path.resolve(candidate);
      if (!fs.existsSync(resolved)) continue;
      const raw = fs.readFileSync(resolved, "utf8");
      const parsed: unknown = JSON.parse(raw);
      return { config: normalizeConfig(parsed, path.dirname(resolved)), path: resolved };
    } catch (err) {
      console.warn(`Failed to load config from ${candidate}:`, err);
    }
  }

  return { config: {} };
}

/** Defaults, then the config file, then env/CLI overrides. */
export function resolveSettings(config: AppConfig, overrides: SettingOverrides = {}): ResolvedSettings {
  const workDuration =
    parseDurationText(overrides.workTime) ??
    fromSetting(config.work) ??
    DEFAULT_TIMER_SETTINGS.workDuration;
  const restDuration =
    parseDurationText(overrides.restTime) ??
    fromSetting(config.rest) ??
    DEFAULT_TIMER_SETTINGS.restDuration;

  const sounds: FeedbackSounds = {};
  if (config.sounds?.workEnd) sounds["phase-end-work"] = config.sounds.workEnd;
  if (config.sounds?.roundComplete) sounds["round-complete"] = config.sounds.roundComplete;

  return {
    workDuration,
    restDuration,
    sounds,
    volume: config.tones?.volume ?? DEFAULT_VOLUME,
  };
}

function fromSetting(setting: DurationSetting | undefined): number | null {
  if (!setting) return null;
  if (setting.minutes === undefined && setting.seconds === undefined) return null;
  return durationFromParts(setting.minutes ?? 0, setting.seconds ?? 0);
}

function normalizeConfig(input: unknown, baseDir: string): AppConfig {
  if (!isRecord(input)) {
    console.warn("Config root must be a JSON object; ignoring it.");
    return {};
  }

  const config: AppConfig = {};

  const work = normalizeDuration(input.work, "work");
  if (work) config.work = work;
  const rest = normalizeDuration(input.rest, "rest");
  if (rest) config.rest = rest;

  if (isRecord(input.sounds)) {
    const sounds: SoundConfig = {};
    const workEnd = normalizeSoundPath(input.sounds.workEnd, baseDir);
    if (workEnd) sounds.workEnd = workEnd;
    const roundComplete = normalizeSoundPath(input.sounds.roundComplete, baseDir);
    if (roundComplete) sounds.roundComplete = roundComplete;
    config.sounds = sounds;
  }

  if (isRecord(input.tones) && typeof input.tones.volume === "number") {
    config.tones = { volume: Math.max(0, Math.min(1, input.tones.volume)) };
  }

  return config;
}

function normalizeDuration(value: unknown, name: string): DurationSetting | undefined {
  if (value === undefined) return undefined;
  if (!isRecord(value)) {
    console.warn(`Invalid duration for "${name}"; expected { minutes, seconds }.`);
    return undefined;
  }

  const out: DurationSetting = {};
  for (const key of ["minutes", "seconds"] as const) {
    const part = value[key];
    if (typeof part === "number") {
      out[key] = part;
    } else if (part !== undefined) {
      console.warn(`Ignoring non-numeric "${name}.${key}" in config.`);
    }
  }

  if (out.minutes === undefined && out.seconds === undefined) {
    console.warn(`Invalid duration for "${name}"; expected { minutes, seconds }.`);
    return undefined;
  }
  return out;
}

function normalizeSoundPath(value: unknown, baseDir: string): string | undefined {
  if (typeof value !== "string" || value.trim().length === 0) return undefined;
  return path.resolve(baseDir, value.trim());
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
