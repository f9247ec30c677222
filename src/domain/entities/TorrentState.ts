/**
 * Per-torrent tracking state, keyed by the hex form of the announce's info hash.
 *
 * Byte counters only grow, `completed` never reverts and `lastReportAt`
 * never moves backwards.
 */
export interface TorrentState {
  infoHash: string;
  realDownloadedBytes: number;
  realUploadedBytes: number;
  firstSeenAt: number;
  completed: boolean;
  // Values last written to the tracker, used for rate and ratio deltas
  lastReportedUploadedBytes: number;
  lastReportedDownloadedBytes: number;
  lastReportAt: number | null;
}

/**
 * Immutable copy of a TorrentState handed to the multiplier engine
 */
export interface TorrentSnapshot extends Readonly<TorrentState> {
  /** True when this announce is the one that flipped `completed` */
  readonly becameCompleted: boolean;
}

/**
 * Progress figures taken from a single announce
 */
export interface AnnounceProgress {
  downloaded: number;
  uploaded: number;
  /** Bytes remaining, or null when the client did not send `left` */
  left: number | null;
}
