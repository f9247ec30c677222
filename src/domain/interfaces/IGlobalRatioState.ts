import { GlobalRatioSnapshot } from '../entities';

/**
 * Owner of the process-wide ratio aggregate and cooldown deadline.
 * All mutation goes through these accessors.
 */
export interface IGlobalRatioState {
  snapshot(): GlobalRatioSnapshot;

  addDeltas(realDownloadedDelta: number, fakeUploadedDelta: number): void;

  enterCooldown(until: number): void;

  /**
   * Clears an expired cooldown
   * @returns True exactly once per cooldown, on the first call at or after its deadline
   */
  releaseExpiredCooldown(now: number): boolean;
}
