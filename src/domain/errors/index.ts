export * from './ProxyErrors';
