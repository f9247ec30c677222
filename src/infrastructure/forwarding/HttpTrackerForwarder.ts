import http, { IncomingMessage, OutgoingHttpHeaders, ServerResponse } from 'http';
import { ForwardResult, ILogger, ITrackerForwarder } from '../../domain/interfaces';
import { ProxyTarget } from '../../domain/value-objects';
import { UpstreamUnavailableError } from '../../domain/errors';

// Not relayed in either direction; each side manages its own connection
const HOP_BY_HOP_HEADERS: ReadonlySet<string> = new Set([
  'connection',
  'keep-alive',
  'proxy-connection',
  'proxy-authorization',
]);

export interface HttpTrackerForwarderOptions {
  /** Idle limit on the upstream socket, covering connect and read */
  timeoutMs: number;
}

/**
 * Forwards one request per fresh upstream connection and relays the
 * tracker's status line, headers and body unchanged
 */
export class HttpTrackerForwarder implements ITrackerForwarder {
  constructor(
    private options: HttpTrackerForwarderOptions,
    private logger: ILogger
  ) { }

  forward(req: IncomingMessage, res: ServerResponse, target: ProxyTarget): Promise<ForwardResult> {
    return new Promise<ForwardResult>((resolve, reject) => {
      let clientGone = false;
      const upstream = http.request({
        host: target.host,
        port: target.port,
        method: req.method,
        path: target.path,
        headers: toHeaderObject(req.rawHeaders, { Host: target.authority }),
        agent: false,
        timeout: this.options.timeoutMs,
      });

      upstream.on('timeout', () => {
        upstream.destroy(
          new UpstreamUnavailableError(`Tracker ${target.authority} timed out after ${this.options.timeoutMs} ms`, true)
        );
      });

      upstream.on('error', (error: Error) => {
        if (clientGone) {
          return;
        }
        if (!res.headersSent) {
          reject(
            error instanceof UpstreamUnavailableError
              ? error
              : new UpstreamUnavailableError(`Tracker ${target.authority} unreachable: ${error.message}`, false, { cause: error })
          );
          return;
        }
        this.logger.warn(`Upstream failed mid-response from ${target.authority}: ${error.message}`);
        res.destroy();
        resolve({ statusCode: res.statusCode, truncated: true });
      });

      upstream.on('response', (upstreamRes: IncomingMessage) => {
        const statusCode = upstreamRes.statusCode ?? 502;
        res.writeHead(statusCode, upstreamRes.statusMessage, toHeaderObject(upstreamRes.rawHeaders));
        upstreamRes.pipe(res);

        upstreamRes.on('end', () => resolve({ statusCode, truncated: false }));
        upstreamRes.on('error', (error: Error) => {
          if (clientGone) {
            return;
          }
          this.logger.warn(`Tracker ${target.authority} closed mid-response: ${error.message}`);
          res.destroy();
          resolve({ statusCode, truncated: true });
        });
      });

      // Client went away first: tear down the paired upstream connection
      res.on('close', () => {
        if (!res.writableFinished && !upstream.destroyed) {
          clientGone = true;
          upstream.destroy();
          resolve({ statusCode: res.statusCode, truncated: true });
        }
      });

      req.pipe(upstream);
    });
  }
}

/**
 * Rebuilds a header object from raw name/value pairs, keeping the original
 * spelling and order and folding repeated names into arrays
 */
function toHeaderObject(rawHeaders: string[], overrides: Record<string, string> = {}): OutgoingHttpHeaders {
  const headers: OutgoingHttpHeaders = {};
  const overridden = new Set(Object.keys(overrides).map((name) => name.toLowerCase()));
  const spelling = new Map<string, string>();

  for (let i = 0; i + 1 < rawHeaders.length; i += 2) {
    const name = rawHeaders[i];
    const value = rawHeaders[i + 1];
    const lower = name.toLowerCase();

    if (HOP_BY_HOP_HEADERS.has(lower)) {
      continue;
    }
    if (overridden.has(lower)) {
      spelling.set(lower, name);
      continue;
    }

    const key = spelling.get(lower) ?? name;
    spelling.set(lower, key);
    const existing = headers[key];
    if (existing === undefined) {
      headers[key] = value;
    } else if (Array.isArray(existing)) {
      existing.push(value);
    } else {
      headers[key] = [String(existing), value];
    }
  }

  for (const [name, value] of Object.entries(overrides)) {
    headers[spelling.get(name.toLowerCase()) ?? name] = value;
  }

  return headers;
}
