/**
 * Error taxonomy for the announce proxy
 */

export type ProxyErrorKind =
  | 'MalformedAnnounce'
  | 'UpstreamUnavailable'
  | 'ConfigInvalid'
  | 'ProxyTarget';

export abstract class ProxyError extends Error {
  abstract readonly kind: ProxyErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Announce that was recognized but could not be parsed or rewritten.
 * The request is forwarded unmodified.
 */
export class MalformedAnnounceError extends ProxyError {
  readonly kind = 'MalformedAnnounce';
}

/**
 * Connect or read failure towards the tracker. Never retried.
 */
export class UpstreamUnavailableError extends ProxyError {
  readonly kind = 'UpstreamUnavailable';

  constructor(
    message: string,
    public readonly timedOut: boolean = false,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * Request target the proxy cannot route
 */
export class ProxyTargetError extends ProxyError {
  readonly kind = 'ProxyTarget';
}

export class ConfigInvalidError extends ProxyError {
  readonly kind = 'ConfigInvalid';

  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
  }
}
