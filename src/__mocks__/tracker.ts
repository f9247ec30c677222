/**
 * In-process stand-in for a BitTorrent tracker, for forwarding tests
 */

import http, { IncomingMessage, Server, ServerResponse } from 'http';

export interface RecordedRequest {
    method: string;
    url: string;
    rawHeaders: string[];
    body: string;
}

export interface MockTracker {
    port: number;
    requests: RecordedRequest[];
    close(): Promise<void>;
}

export type TrackerHandler = (req: IncomingMessage, res: ServerResponse) => void;

/**
 * Bencoded announce reply the default handler sends
 */
export const ANNOUNCE_REPLY = 'd8:intervali1800e5:peers0:e';

const defaultHandler: TrackerHandler = (_req, res) => {
    res.writeHead(200, 'OK', { 'Content-Type': 'text/plain', 'X-Tracker': 'mock' });
    res.end(ANNOUNCE_REPLY);
};

/**
 * Starts a tracker on an ephemeral loopback port and records every request it sees
 */
export async function startMockTracker(handler: TrackerHandler = defaultHandler): Promise<MockTracker> {
    const requests: RecordedRequest[] = [];

    const server = http.createServer((req, res) => {
        const chunks: Buffer[] = [];
        req.on('data', (chunk: Buffer) => chunks.push(chunk));
        req.on('end', () => {
            requests.push({
                method: req.method ?? '',
                url: req.url ?? '',
                rawHeaders: req.rawHeaders,
                body: Buffer.concat(chunks).toString('utf8')
            });
            handler(req, res);
        });
    });

    const port = await listen(server);

    return {
        port,
        requests,
        close: () => closeServer(server)
    };
}

export function listen(server: Server): Promise<number> {
    return new Promise((resolve, reject) => {
        server.once('error', reject);
        server.listen(0, '127.0.0.1', () => {
            const address = server.address();
            if (address === null || typeof address === 'string') {
                reject(new Error('Server is not listening on a TCP port'));
                return;
            }
            resolve(address.port);
        });
    });
}

export function closeServer(server: Server): Promise<void> {
    server.closeAllConnections();
    return new Promise((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
    });
}

/**
 * A port nothing listens on: bound once, then released
 */
export async function unusedPort(): Promise<number> {
    const server = http.createServer();
    const port = await listen(server);
    await closeServer(server);
    return port;
}

export interface ClientResponse {
    statusCode: number;
    statusMessage: string;
    headers: http.IncomingHttpHeaders;
    body: string;
}

/**
 * Sends a request through a proxy listening on proxyPort, using the target verbatim as the request line
 */
export function requestThroughProxy(
    proxyPort: number,
    target: string,
    options: { method?: string; headers?: Record<string, string>; body?: string } = {}
): Promise<ClientResponse> {
    return new Promise((resolve, reject) => {
        const req = http.request(
            {
                host: '127.0.0.1',
                port: proxyPort,
                method: options.method ?? 'GET',
                path: target,
                headers: options.headers,
                agent: false
            },
            (res) => {
                const chunks: Buffer[] = [];
                res.on('data', (chunk: Buffer) => chunks.push(chunk));
                res.on('end', () =>
                    resolve({
                        statusCode: res.statusCode ?? 0,
                        statusMessage: res.statusMessage ?? '',
                        headers: res.headers,
                        body: Buffer.concat(chunks).toString('utf8')
                    })
                );
                res.on('error', reject);
            }
        );
        req.on('error', reject);
        req.end(options.body);
    });
}
