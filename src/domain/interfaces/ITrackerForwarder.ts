import { IncomingMessage, ServerResponse } from 'http';
import { ProxyTarget } from '../value-objects';

export interface ForwardResult {
  statusCode: number;
  /** True when the exchange ended before the upstream body was complete */
  truncated: boolean;
}

export interface ITrackerForwarder {
  /**
   * Sends the request to the tracker over a fresh connection and relays the
   * response verbatim
   * @throws UpstreamUnavailableError when no response headers could be obtained
   */
  forward(req: IncomingMessage, res: ServerResponse, target: ProxyTarget): Promise<ForwardResult>;
}
