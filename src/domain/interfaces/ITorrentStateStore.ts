/**
 * Store of per-torrent state
 * This is a port in Hexagonal Architecture
 */

import { AnnounceProgress, TorrentSnapshot } from '../entities';

export interface TorrentStoreStats {
  trackedTorrents: number;
  aggregateRealDownloaded: number;
  aggregateFakeUploaded: number;
}

export interface ITorrentStateStore {
  /**
   * Runs a task while holding the lock for one info hash.
   * Tasks for the same hash run in arrival order; different hashes never wait on each other.
   */
  runExclusive<T>(infoHash: string, task: () => T | Promise<T>): Promise<T>;

  /**
   * Folds an announce into the torrent's state, creating it on first sight
   * @returns Snapshot of the updated state
   */
  recordAndGet(infoHash: string, progress: AnnounceProgress, now: number): TorrentSnapshot;

  /**
   * Records the uploaded value sent to the tracker and pushes the deltas
   * since the previous report into the global aggregate
   */
  commit(infoHash: string, fakeUploaded: number, now: number): void;

  stats(): TorrentStoreStats;
}
