import { IGlobalRatioState } from '../../domain/interfaces';
import { GlobalRatioSnapshot } from '../../domain/entities';

/**
 * Single owned instance of the aggregate ratio and cooldown deadline
 */
export class GlobalRatioState implements IGlobalRatioState {
  private aggregateRealDownloaded = 0;
  private aggregateFakeUploaded = 0;
  private cooldownUntil = 0;
  private cooldownPending = false;

  snapshot(): GlobalRatioSnapshot {
    return {
      aggregateRealDownloaded: this.aggregateRealDownloaded,
      aggregateFakeUploaded: this.aggregateFakeUploaded,
      cooldownUntil: this.cooldownUntil,
    };
  }

  addDeltas(realDownloadedDelta: number, fakeUploadedDelta: number): void {
    this.aggregateRealDownloaded += realDownloadedDelta;
    this.aggregateFakeUploaded += fakeUploadedDelta;
  }

  enterCooldown(until: number): void {
    this.cooldownUntil = until;
    this.cooldownPending = true;
  }

  releaseExpiredCooldown(now: number): boolean {
    if (!this.cooldownPending || now < this.cooldownUntil) {
      return false;
    }
    this.cooldownPending = false;
    return true;
  }
}
