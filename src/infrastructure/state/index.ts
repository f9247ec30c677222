export { GlobalRatioState } from './GlobalRatioState';
export { InMemoryTorrentStateStore } from './InMemoryTorrentStateStore';
export type { TorrentStateStoreOptions } from './InMemoryTorrentStateStore';
export { KeyedLock } from './KeyedLock';
