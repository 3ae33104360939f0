export interface DurationTolerance {
  /** Fraction of the expected duration, e.g. 15 for 15%. */
  percent: number;
  /** Lower bound of the tolerance, in seconds. */
  floorSeconds: number;
}

export const DEFAULT_DURATION_TOLERANCE: DurationTolerance = {
  percent: 15,
  floorSeconds: 30,
};

/**
 * Accepts a candidate when `|actual - expected| <= max(expected * percent, floor)`.
 * Without a positive expected duration there is nothing to check against and
 * the candidate is accepted.
 */
export function durationMatches(
  expectedMs: number | null | undefined,
  actualSeconds: number,
  tolerance: DurationTolerance = DEFAULT_DURATION_TOLERANCE
): boolean {
  if (expectedMs === null || expectedMs === undefined || !Number.isFinite(expectedMs) || expectedMs <= 0) {
    return true;
  }

  const expectedSeconds = expectedMs / 1000;
  const allowed = Math.max(expectedSeconds * (tolerance.percent / 100), tolerance.floorSeconds);
  return Math.abs(actualSeconds - expectedSeconds) <= allowed;
}

/** Milliseconds as M:SS, `??:??` when unknown. */
export function formatDuration(ms: number): string {
  if (!Number.isFinite(ms) || ms <= 0) return '??:??';
  return formatSeconds(ms / 1000);
}

/** Seconds as M:SS, `??:??` when unknown. */
export function formatSeconds(seconds: number): string {
  if (!Number.isFinite(seconds) || seconds <= 0) return '??:??';
  const whole = Math.floor(seconds);
  const minutes = Math.floor(whole / 60);
  const rest = whole % 60;
  return `${minutes}:${String(rest).padStart(2, '0')}`;
}

export function parseDurationMs(raw: string | undefined): number {
  if (!raw) return 0;
  const value = Number(raw.trim());
  return Number.isFinite(value) && value > 0 ? Math.round(value) : 0;
}
