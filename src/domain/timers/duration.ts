export const MAX_COMPONENT = 59;
export const MAX_DURATION_SECONDS = MAX_COMPONENT * 60 + MAX_COMPONENT;

export interface DurationParts {
  minutes: number;
  seconds: number;
}

/** Whole, non-negative seconds. Anything else collapses to 0. */
export function toWholeSeconds(value: number): number {
  if (!Number.isFinite(value) || value <= 0) return 0;
  return Math.floor(value);
}

export function durationFromParts(minutes: number, seconds: number): number {
  return clampComponent(minutes) * 60 + clampComponent(seconds);
}

export function splitDuration(totalSeconds: number): DurationParts {
  const whole = toWholeSeconds(totalSeconds);
  return { minutes: Math.floor(whole / 60), seconds: whole % 60 };
}

export function formatClock(totalSeconds: number): string {
  const { minutes, seconds } = splitDuration(totalSeconds);
  return `${pad(minutes)}:${pad(seconds)}`;
}

/**
 * Parses `m:ss` or a bare number of seconds. Returns null for anything else.
 * The result is limited to 0-3599 seconds.
 */
export function parseDurationText(text: string | undefined): number | null {
  if (text === undefined) return null;
  const trimmed = text.trim();

  const clock = /^(\d+):(\d{1,2})$/.exec(trimmed);
  if (clock) {
    return durationFromParts(Number(clock[1]), Number(clock[2]));
  }

  if (/^\d+$/.test(trimmed)) {
    return Math.min(Number(trimmed), MAX_DURATION_SECONDS);
  }

  return null;
}

function clampComponent(value: number): number {
  return Math.min(toWholeSeconds(value), MAX_COMPONENT);
}

function pad(value: number): string {
  return value.toString().padStart(2, "0");
}

/** Fraction of the phase already elapsed, always within [0, 1]. */
export function progressOf(duration: number, remaining: number): number {
  if (duration <= 0) return 1;
  return Math.min(1, Math.max(0, (duration - remaining) / duration));
}
