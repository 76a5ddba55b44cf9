import { Redis } from 'ioredis';
import pino from 'pino';
import type { FastifyInstance } from 'fastify';
import { loadConnectorConfig } from './application/config.js';
import { ConfigurationError } from './application/errors.js';
import { ConnectionManager } from './infrastructure/vault/index.js';
import type { ConnectorHandle } from './infrastructure/vault/index.js';
import { RedisStreamSink, createLogSink } from './infrastructure/delivery/index.js';
import type { EventSink } from './infrastructure/delivery/index.js';
import { buildStatusServer } from './interfaces/http/index.js';

/**
 * Connector process.
 *
 * Order:
 * 1) Load + validate config (fatal on error, before any connection)
 * 2) Sink: Redis stream when REDIS_URL is set, log lines otherwise
 * 3) Start one session per event path
 * 4) Optional status server on STATUS_PORT
 * 5) SIGINT / SIGTERM → graceful stop
 */
const log = pino({ level: process.env['LOG_LEVEL'] ?? 'info' });

let redis: Redis | null = null;
let server: FastifyInstance | null = null;
let manager: ConnectionManager | null = null;
let handle: ConnectorHandle | null = null;
let shuttingDown = false;

async function main(): Promise<void> {
  const config = loadConnectorConfig(process.env);

  let sink: EventSink;
  const redisUrl = process.env['REDIS_URL'];
  if (redisUrl) {
    redis = new Redis(redisUrl, {
      maxRetriesPerRequest: null,
      enableReadyCheck: true,
      lazyConnect: true,
    });
    await redis.connect();
    sink = new RedisStreamSink(redis, { streamKey: process.env['EVENT_STREAM_KEY'] });
    log.info('Redis connected, events go to stream');
  } else {
    sink = createLogSink(log.child({ sink: 'log' }));
    log.info('REDIS_URL not set, events are written to the log');
  }

  manager = new ConnectionManager({ sink, log });
  handle = manager.start(config);

  const statusPort = process.env['STATUS_PORT'];
  if (statusPort) {
    server = await buildStatusServer(handle, log);
    await server.listen({
      host: process.env['HOST'] ?? '0.0.0.0',
      port: Number(statusPort),
    });
  }

  await handle.done;
}

async function shutdown(signal: string, exitCode: number): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  log.info({ signal }, 'Shutting down connector...');

  if (manager && handle) {
    await manager.stop(handle);
  }
  if (server) {
    await server.close().catch((err: unknown) => log.warn({ err }, 'Status server close failed'));
  }
  if (redis) {
    await redis.quit().catch((err: unknown) => log.warn({ err }, 'Redis quit failed'));
  }

  process.exit(exitCode);
}

process.on('SIGINT', () => void shutdown('SIGINT', 0));
process.on('SIGTERM', () => void shutdown('SIGTERM', 0));

main().catch((err: unknown) => {
  if (err instanceof ConfigurationError) {
    log.fatal({ err, issues: err.issues }, 'Invalid configuration');
  } else {
    log.fatal({ err }, 'Connector crashed');
  }
  void shutdown('fatal', 1);
});
