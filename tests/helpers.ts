import { createServer } from 'node:http';
import type { IncomingHttpHeaders, ServerResponse } from 'node:http';
import type { AddressInfo } from 'node:net';
import { vi } from 'vitest';
import pino from 'pino';
import type { Logger } from 'pino';
import type { RelayConfig } from '../src/config.js';
import type { DeliveryOutcome, Endpoint } from '../src/domain/index.js';

/** Minimal fake logger whose calls can be asserted. */
export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } as unknown as Logger;
}

/** Real pino logger that writes nothing; for code handed to Fastify. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

export function makeEndpoint(overrides: Partial<Endpoint> = {}): Endpoint {
  return {
    id: overrides.id ?? 'ep-1',
    name: overrides.name ?? 'Alpha',
    url: overrides.url ?? 'https://alpha.test/hook',
    is_active: overrides.is_active ?? true,
  };
}

export function makeOutcome(endpointId: string, success: boolean, overrides: Partial<DeliveryOutcome> = {}): DeliveryOutcome {
  return {
    endpointId,
    endpointName: overrides.endpointName ?? endpointId,
    url: overrides.url ?? `https://${endpointId}.test/hook`,
    success,
    latencyMs: overrides.latencyMs ?? 10,
    ...(success ? { httpStatus: 200 } : { error: 'connection_error' as const }),
    ...overrides,
  };
}

export function testConfig(
  overrides: { dispatch?: Partial<RelayConfig['dispatch']>; corsOrigin?: RelayConfig['corsOrigin'] } = {},
): RelayConfig {
  return {
    host: '127.0.0.1',
    port: 0,
    logLevel: 'silent',
    registry: { backend: 'memory', endpointsFile: 'endpoints.json' },
    dispatch: {
      timeoutMs: 2_000,
      mode: 'sync',
      forwardHeaders: true,
      includeOutcomes: true,
      ...overrides.dispatch,
    },
    historySize: 10,
    bodyLimitBytes: 1024 * 1024,
    corsOrigin: overrides.corsOrigin ?? '*',
  };
}

export interface ReceivedRequest {
  method: string;
  url: string;
  headers: IncomingHttpHeaders;
  body: string;
}

export interface Downstream {
  url: string;
  received: ReceivedRequest[];
  close(): Promise<void>;
}

type Responder = (request: ReceivedRequest, res: ServerResponse) => void;

const respondOk: Responder = (_request, res) => {
  res.writeHead(200, { 'Content-Type': 'text/plain' }).end('ok');
};

/**
 * In-process HTTP server standing in for a webhook destination.
 * Records every request; `respond` decides what (and whether) to answer.
 */
export async function startDownstream(respond: Responder = respondOk): Promise<Downstream> {
  const received: ReceivedRequest[] = [];

  const server = createServer((req, res) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => {
      const request: ReceivedRequest = {
        method: req.method ?? '',
        url: req.url ?? '',
        headers: req.headers,
        body: Buffer.concat(chunks).toString('utf-8'),
      };
      received.push(request);
      respond(request, res);
    });
  });

  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const { port } = server.address() as AddressInfo;

  return {
    url: `http://127.0.0.1:${port}/hook`,
    received,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}

/** A URL on a port that was just released, so connecting is refused. */
export async function unreachableUrl(): Promise<string> {
  const downstream = await startDownstream();
  const url = downstream.url;
  await downstream.close();
  return url;
}

/** Delays a response; for simulating slow destinations. */
export function respondAfter(ms: number, status = 200): Responder {
  return (_request, res) => {
    setTimeout(() => {
      res.writeHead(status, { 'Content-Type': 'text/plain' }).end('ok');
    }, ms);
  };
}
