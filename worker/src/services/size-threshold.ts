export type Route = 'direct' | 'split';

// Files that nominally fit can still be rejected upstream after encoding
// variance, so anything at or above 98% of the limit is split.
export const DIRECT_THRESHOLD_RATIO = 0.98;

export const decideRoute = (sizeBytes: number, hardLimitBytes: number): Route =>
  sizeBytes < hardLimitBytes * DIRECT_THRESHOLD_RATIO ? 'direct' : 'split';
