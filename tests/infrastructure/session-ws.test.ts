import { describe, it, expect, vi, afterEach } from 'vitest';
import type { AddressInfo } from 'node:net';
import type { IncomingHttpHeaders } from 'node:http';
import WebSocket, { WebSocketServer } from 'ws';
import type { VerifyClientCallbackAsync } from 'ws';
import pino from 'pino';
import { ConnectionManager } from '../../src/infrastructure/vault/connection-manager.js';
import type { ConnectorHandle } from '../../src/infrastructure/vault/connection-manager.js';
import { AuthorizationError } from '../../src/application/errors.js';
import type { EventEnvelope } from '../../src/domain/index.js';

/**
 * End-to-end over a real socket: an in-process `ws` server plays the
 * event endpoint on 127.0.0.1.
 */

interface Handshake {
  url: string | undefined;
  headers: IncomingHttpHeaders;
}

interface TestServer {
  wss: WebSocketServer;
  addr: string;
  handshakes: Handshake[];
  clients: WebSocket[];
}

function startServer(verifyClient?: VerifyClientCallbackAsync): Promise<TestServer> {
  return new Promise((resolve, reject) => {
    const wss = new WebSocketServer({ host: '127.0.0.1', port: 0, verifyClient });
    const handshakes: Handshake[] = [];
    const clients: WebSocket[] = [];

    wss.on('connection', (socket, request) => {
      handshakes.push({ url: request.url, headers: request.headers });
      clients.push(socket);
    });
    wss.once('error', reject);
    wss.once('listening', () => {
      const { port } = wss.address() as AddressInfo;
      resolve({ wss, addr: `http://127.0.0.1:${port}`, handshakes, clients });
    });
  });
}

function closeServer(server: TestServer): Promise<void> {
  for (const client of server.wss.clients) client.terminate();
  return new Promise((resolve) => server.wss.close(() => resolve()));
}

describe('ConnectionManager over a real WebSocket', () => {
  const log = pino({ level: 'silent' });
  let server: TestServer | undefined;
  let manager: ConnectionManager | undefined;
  let handle: ConnectorHandle | undefined;

  afterEach(async () => {
    if (manager && handle) await manager.stop(handle);
    if (server) await closeServer(server);
    server = undefined;
    manager = undefined;
    handle = undefined;
  });

  it('subscribes with the token header and filter, then streams events', async () => {
    const srv = await startServer();
    server = srv;
    const received: EventEnvelope[] = [];
    const mgr = new ConnectionManager({ sink: { put: (e) => void received.push(e) }, log });
    manager = mgr;

    handle = mgr.start({
      vaultAddr: srv.addr,
      vaultToken: 'test-token',
      namespace: 'team-a',
      eventPaths: ['kv-v2/*'],
      filterExpression: 'data_path == "secret/data/app"',
    });

    await vi.waitFor(() => expect(srv.clients).toHaveLength(1));

    expect(srv.handshakes[0]?.url).toBe(
      '/v1/sys/events/subscribe/kv-v2/*?json=true&filter=data_path%20%3D%3D%20%22secret%2Fdata%2Fapp%22',
    );
    expect(srv.handshakes[0]?.headers['x-vault-token']).toBe('test-token');
    expect(srv.handshakes[0]?.headers['x-vault-namespace']).toBe('team-a');

    const client = srv.clients[0];
    client?.send(
      JSON.stringify({
        id: 'evt-1',
        type: '*',
        time: '2026-03-01T12:00:00Z',
        data: { event_type: 'kv-v2/data-write', event: { metadata: { path: 'secret/data/app' } } },
      }),
    );
    client?.send('not json');
    client?.send(JSON.stringify({ id: 'evt-2', event_type: 'kv-v2/delete', data: { path: 'x' } }));

    await vi.waitFor(() => expect(received).toHaveLength(2));

    expect(received.map((e) => [e.event_id, e.event_type])).toEqual([
      ['evt-1', 'kv-v2/data-write'],
      ['evt-2', 'kv-v2/delete'],
    ]);
    expect(received[0]?.timestamp).toBe('2026-03-01T12:00:00.000Z');
    expect(received[1]?.payload).toEqual({ path: 'x' });
    expect(handle.sessions()[0]?.stats.normalizationErrors).toBe(1);
  });

  it('reconnects after the server drops the connection', async () => {
    const srv = await startServer();
    server = srv;
    const mgr = new ConnectionManager({ sink: { put: () => undefined }, log });
    manager = mgr;

    handle = mgr.start({
      vaultAddr: srv.addr,
      vaultToken: 'test-token',
      eventPaths: ['kv-v2/*'],
      backoffInitialSeconds: 0.01,
      backoffMaxSeconds: 0.05,
    });

    await vi.waitFor(() => expect(srv.clients).toHaveLength(1));
    srv.clients[0]?.terminate();

    await vi.waitFor(() => expect(srv.clients).toHaveLength(2));
    expect(srv.handshakes[1]?.url).toBe(srv.handshakes[0]?.url);

    const report = await mgr.stop(handle);
    expect(report.stopped).toEqual(['conn-1']);
  });

  it('reports a 403 handshake as an authorization failure', async () => {
    const forbid: VerifyClientCallbackAsync = (_info, callback) => callback(false, 403, 'Forbidden');
    const srv = await startServer(forbid);
    server = srv;
    const mgr = new ConnectionManager({ sink: { put: () => undefined }, log });
    manager = mgr;

    handle = mgr.start({
      vaultAddr: srv.addr,
      vaultToken: 'test-token',
      eventPaths: ['kv-v2/*'],
      maxAuthFailures: 1,
    });

    await expect(handle.done).rejects.toBeInstanceOf(AuthorizationError);
    expect(handle.sessions()[0]?.lastFailure).toMatchObject({ class: 'authorization', status: 403 });
  });
});
