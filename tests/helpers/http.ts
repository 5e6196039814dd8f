/**
 * Gatehouse - HTTP Test Helpers
 * Raw node:http client (so the Host header can be chosen) and an echo
 * upstream on an ephemeral local port.
 */

import http from 'http';

// =============================================================================
// Client
// =============================================================================

export interface TestResponse {
  status: number;
  headers: http.IncomingHttpHeaders;
  text: string;
}

export interface TestRequest {
  port: number;
  path: string;
  method?: string;
  headers?: Record<string, string>;
  body?: string;
}

export function sendRequest(request: TestRequest): Promise<TestResponse> {
  return new Promise((resolve, reject) => {
    const req = http.request(
      {
        host: '127.0.0.1',
        port: request.port,
        path: request.path,
        method: request.method ?? 'GET',
        headers: request.headers,
        agent: false,
      },
      (res) => {
        const chunks: Buffer[] = [];
        res.on('data', (chunk: Buffer) => chunks.push(chunk));
        res.on('end', () => {
          resolve({
            status: res.statusCode ?? 0,
            headers: res.headers,
            text: Buffer.concat(chunks).toString('utf8'),
          });
        });
        res.on('error', reject);
      }
    );

    req.on('error', reject);
    if (request.body !== undefined) {
      req.write(request.body);
    }
    req.end();
  });
}

// =============================================================================
// Echo Upstream
// =============================================================================

export interface EchoedRequest {
  method: string;
  url: string;
  headers: http.IncomingHttpHeaders;
}

export interface EchoServer {
  url: string;
  port: number;
  received: EchoedRequest[];
  close: () => Promise<void>;
}

/**
 * Answers every request with 200 and a JSON echo of method, url and headers
 */
export function startEchoServer(): Promise<EchoServer> {
  const received: EchoedRequest[] = [];

  const server = http.createServer((req, res) => {
    const echoed: EchoedRequest = {
      method: req.method ?? 'GET',
      url: req.url ?? '/',
      headers: req.headers,
    };
    received.push(echoed);

    req.resume();
    req.on('end', () => {
      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({ service: 'echo', request: echoed }));
    });
  });

  return new Promise((resolve, reject) => {
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('Echo server has no TCP address'));
        return;
      }
      const { port } = address;
      resolve({
        url: `http://127.0.0.1:${port}`,
        port,
        received,
        close: () =>
          new Promise<void>((done) => {
            server.close(() => done());
            server.closeAllConnections();
          }),
      });
    });
  });
}
