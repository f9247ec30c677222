/**
 * Domain entity for a recognized tracker announce
 */
export interface AnnounceRequest {
  /** Lowercase hex of the percent-decoded info_hash */
  infoHash: string;
  downloaded: number;
  /** Client's own figure; informational only */
  uploaded: number;
  left: number | null;
}

export type Recognition =
  | { kind: 'passthrough' }
  | { kind: 'announce'; announce: AnnounceRequest };
