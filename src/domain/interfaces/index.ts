/**
 * Domain interfaces (ports) - exports all interfaces
 */

export * from './IAnnounceCodec';
export * from './IClock';
export * from './IGlobalRatioState';
export * from './ILogger';
export * from './ITorrentStateStore';
export * from './ITrackerForwarder';
