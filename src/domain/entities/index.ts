export * from './Announce';
export * from './GlobalRatio';
export * from './MultiplierSettings';
export * from './TorrentState';
