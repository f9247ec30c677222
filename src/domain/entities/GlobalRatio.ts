/**
 * Process-wide aggregate used by the ratio limiter
 */
export interface GlobalRatioSnapshot {
  readonly aggregateRealDownloaded: number;
  readonly aggregateFakeUploaded: number;
  /** Epoch milliseconds; boosting is suspended while now < cooldownUntil */
  readonly cooldownUntil: number;
}

export function ratioOf(uploaded: number, downloaded: number): number {
  return downloaded > 0 ? uploaded / downloaded : 0;
}
