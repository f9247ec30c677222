export * from './ProxyTarget';
export * from './TextSpan';
