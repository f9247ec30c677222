import { ProxyTargetError } from '../errors';

const ABSOLUTE_URI = /^([a-zA-Z][a-zA-Z0-9+.-]*):\/\//;
const DEFAULT_HTTP_PORT = 80;

/**
 * Upstream destination of a proxied request.
 *
 * `path` is the origin-form target (`/announce?...`) sliced from the raw
 * request target without re-encoding anything.
 */
export class ProxyTarget {
  private constructor(
    public readonly host: string,
    public readonly port: number,
    public readonly path: string,
    private readonly pathOffset: number
  ) { }

  /**
   * Parses an absolute-URI (proxy mode) or origin-form target with its Host
   * header (transparent mode)
   */
  static parse(target: string, hostHeader?: string): ProxyTarget {
    const match = ABSOLUTE_URI.exec(target);

    if (match) {
      const scheme = match[1].toLowerCase();
      if (scheme !== 'http') {
        throw new ProxyTargetError(`Unsupported scheme: ${scheme}`);
      }
      const authorityStart = match[0].length;
      const authorityEnd = findAuthorityEnd(target, authorityStart);
      const { host, port } = parseAuthority(target.slice(authorityStart, authorityEnd));
      return new ProxyTarget(host, port, toOriginForm(target.slice(authorityEnd)), authorityEnd);
    }

    if (!target.startsWith('/')) {
      throw new ProxyTargetError(`Unsupported request target: ${target.slice(0, 64)}`);
    }
    if (!hostHeader) {
      throw new ProxyTargetError('Missing Host header for origin-form request');
    }

    const { host, port } = parseAuthority(hostHeader);
    return new ProxyTarget(host, port, target, 0);
  }

  /**
   * Same destination, path taken from a rewritten copy of the original target.
   * The rewrite must not have touched anything before the path.
   */
  retarget(rewrittenTarget: string): ProxyTarget {
    return new ProxyTarget(
      this.host,
      this.port,
      toOriginForm(rewrittenTarget.slice(this.pathOffset)),
      this.pathOffset
    );
  }

  get authority(): string {
    const host = this.host.includes(':') ? `[${this.host}]` : this.host;
    return this.port === DEFAULT_HTTP_PORT ? host : `${host}:${this.port}`;
  }
}

function findAuthorityEnd(target: string, from: number): number {
  for (let i = from; i < target.length; i++) {
    const ch = target[i];
    if (ch === '/' || ch === '?' || ch === '#') {
      return i;
    }
  }
  return target.length;
}

function toOriginForm(rest: string): string {
  if (rest === '') {
    return '/';
  }
  return rest.startsWith('/') ? rest : `/${rest}`;
}

function parseAuthority(authority: string): { host: string; port: number } {
  // userinfo is never forwarded
  const hostPort = authority.slice(authority.lastIndexOf('@') + 1);

  let host: string;
  let portText: string | undefined;

  if (hostPort.startsWith('[')) {
    const close = hostPort.indexOf(']');
    if (close === -1) {
      throw new ProxyTargetError(`Invalid IPv6 authority: ${authority}`);
    }
    host = hostPort.slice(1, close);
    const rest = hostPort.slice(close + 1);
    if (rest !== '' && !rest.startsWith(':')) {
      throw new ProxyTargetError(`Invalid authority: ${authority}`);
    }
    portText = rest === '' ? undefined : rest.slice(1);
  } else {
    const colon = hostPort.lastIndexOf(':');
    host = colon === -1 ? hostPort : hostPort.slice(0, colon);
    portText = colon === -1 ? undefined : hostPort.slice(colon + 1);
  }

  if (host === '') {
    throw new ProxyTargetError(`Missing host in authority: ${authority}`);
  }

  if (portText === undefined || portText === '') {
    return { host, port: DEFAULT_HTTP_PORT };
  }
  if (!/^\d+$/.test(portText) || Number(portText) > 65535 || Number(portText) === 0) {
    throw new ProxyTargetError(`Invalid port in authority: ${authority}`);
  }
  return { host, port: Number(portText) };
}
