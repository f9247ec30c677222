import { LRUCache } from 'lru-cache';
import { IGlobalRatioState, ITorrentStateStore, TorrentStoreStats } from '../../domain/interfaces';
import { AnnounceProgress, TorrentSnapshot, TorrentState } from '../../domain/entities';
import { KeyedLock } from './KeyedLock';

export interface TorrentStateStoreOptions {
  /** Oldest-reported torrents are evicted past this many entries */
  maxTorrents: number;
}

/**
 * In-memory implementation of ITorrentStateStore
 * Entries live in an LRU cache refreshed by every announce, so eviction
 * follows the oldest lastReportAt. The global aggregate always equals the
 * sum of what was last reported for the torrents still tracked.
 */
export class InMemoryTorrentStateStore implements ITorrentStateStore {
  private entries: LRUCache<string, TorrentState>;
  private lock = new KeyedLock();

  constructor(
    private globalState: IGlobalRatioState,
    options: TorrentStateStoreOptions
  ) {
    this.entries = new LRUCache<string, TorrentState>({
      max: options.maxTorrents,
      // An evicted torrent starts over from zero if it returns, so its share leaves the aggregate with it
      dispose: (state, _infoHash, reason) => {
        if (reason === 'evict') {
          this.globalState.addDeltas(-state.lastReportedDownloadedBytes, -state.lastReportedUploadedBytes);
        }
      },
    });
  }

  runExclusive<T>(infoHash: string, task: () => T | Promise<T>): Promise<T> {
    return this.lock.run(infoHash, task);
  }

  recordAndGet(infoHash: string, progress: AnnounceProgress, now: number): TorrentSnapshot {
    let state = this.entries.get(infoHash);
    if (!state) {
      state = {
        infoHash,
        realDownloadedBytes: 0,
        realUploadedBytes: 0,
        firstSeenAt: now,
        completed: false,
        lastReportedUploadedBytes: 0,
        lastReportedDownloadedBytes: 0,
        lastReportAt: null,
      };
      this.entries.set(infoHash, state);
    }

    // A lower figure than already seen is a stale or duplicate announce
    state.realDownloadedBytes = Math.max(state.realDownloadedBytes, progress.downloaded);
    state.realUploadedBytes = Math.max(state.realUploadedBytes, progress.uploaded);

    const becameCompleted = !state.completed && progress.left === 0;
    if (becameCompleted) {
      state.completed = true;
    }

    return Object.freeze({ ...state, becameCompleted });
  }

  commit(infoHash: string, fakeUploaded: number, now: number): void {
    const state = this.entries.get(infoHash);
    if (!state) {
      throw new Error(`commit for unknown torrent ${infoHash}`);
    }

    this.globalState.addDeltas(
      state.realDownloadedBytes - state.lastReportedDownloadedBytes,
      fakeUploaded - state.lastReportedUploadedBytes
    );

    state.lastReportedDownloadedBytes = state.realDownloadedBytes;
    state.lastReportedUploadedBytes = fakeUploaded;
    state.lastReportAt = state.lastReportAt === null ? now : Math.max(state.lastReportAt, now);
  }

  stats(): TorrentStoreStats {
    const global = this.globalState.snapshot();
    return {
      trackedTorrents: this.entries.size,
      aggregateRealDownloaded: global.aggregateRealDownloaded,
      aggregateFakeUploaded: global.aggregateFakeUploaded,
    };
  }
}
