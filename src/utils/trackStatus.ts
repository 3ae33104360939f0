import { StatusTransitionError } from '../types/errors.js';
import { ResolutionStatus, type TrackRecord, type UrlOrigin } from '../types/track.js';

const REOPENABLE: readonly ResolutionStatus[] = [
  ResolutionStatus.Done,
  ResolutionStatus.NoCandidate,
  ResolutionStatus.NoLookupKey,
  ResolutionStatus.Error,
];

/** Allowed targets per current status. Nothing leaves `done`. */
export const STATUS_TRANSITIONS: Readonly<Record<ResolutionStatus, readonly ResolutionStatus[]>> = {
  [ResolutionStatus.Pending]: REOPENABLE,
  [ResolutionStatus.Error]: REOPENABLE,
  [ResolutionStatus.NoCandidate]: REOPENABLE,
  [ResolutionStatus.NoLookupKey]: REOPENABLE,
  [ResolutionStatus.Done]: [],
};

export function canTransition(from: ResolutionStatus, to: ResolutionStatus): boolean {
  return STATUS_TRANSITIONS[from].includes(to);
}

export function hasUrl(record: TrackRecord): boolean {
  return record.ytUrl.trim() !== '';
}

/** A row whose URL is trusted: status `done` with a non-empty URL. */
export function isResolved(record: TrackRecord): boolean {
  return record.status === ResolutionStatus.Done && hasUrl(record);
}

/**
 * Moves a row to a negative or retryable status. Setting `done` goes through
 * {@link resolveRecord} so a URL and origin are always recorded with it.
 */
export function markStatus(
  record: TrackRecord,
  next: Exclude<ResolutionStatus, typeof ResolutionStatus.Done | typeof ResolutionStatus.Pending>
): void {
  if (!canTransition(record.status, next)) {
    throw new StatusTransitionError(record.status, next, record.trackUri);
  }
  record.status = next;
}

export function resolveRecord(record: TrackRecord, url: string, origin: UrlOrigin): void {
  // A `done` row without a URL is an incomplete resolution and may still take one.
  if (isResolved(record)) {
    throw new StatusTransitionError(record.status, ResolutionStatus.Done, record.trackUri);
  }
  record.ytUrl = url;
  record.ytUrlOrigin = origin;
  record.status = ResolutionStatus.Done;
}

/**
 * Rows a resolution pass should query: no URL yet and a status outside the
 * excluded set. `error` and pending rows are always retried.
 */
export function needsResolution(record: TrackRecord, retrySoftTerminal: boolean): boolean {
  if (hasUrl(record)) return false;
  if (record.status === ResolutionStatus.Done) return false;
  if (record.status === ResolutionStatus.NoCandidate && !retrySoftTerminal) return false;
  return true;
}

/**
 * Swaps in a URL found during retrieval after the stored one proved unusable,
 * or stores the first URL of a row the resolution passes could not resolve.
 */
export function replaceUrl(record: TrackRecord, url: string, origin: UrlOrigin): void {
  record.ytUrl = url;
  record.ytUrlOrigin = origin;
  record.status = ResolutionStatus.Done;
}
