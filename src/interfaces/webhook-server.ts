/**
 * Webhook HTTP server
 *
 * Plain Node.js http server in front of WebhookEndpoint. Every path is
 * accepted; GitHub is pointed at whatever URL the reverse proxy exposes.
 */

import http from 'http';
import { ConfigStore } from '../core/config.js';
import { IrcFrameworkTransport } from '../core/irc/transport.js';
import { IrcNotifier } from '../core/irc/notifier.js';
import { HttpStatus, WebhookEndpoint } from '../core/webhook/endpoint.js';
import { pickPlaceholder } from '../core/webhook/placeholders.js';
import { createLogger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';
import { VERSION } from '../version.js';

const logger = createLogger('WebhookServer');

const CONFIG_TIMEOUT_MS = 5000;

/** GitHub caps webhook payloads at 25 MB */
export const MAX_BODY_BYTES = 25 * 1024 * 1024;

export interface WebhookServerOptions {
  maxBodyBytes?: number;
}

export class BodyTooLargeError extends Error {
  readonly limit: number;

  constructor(limit: number) {
    super(`Request body exceeds ${limit} bytes`);
    this.name = 'BodyTooLargeError';
    this.limit = limit;
  }
}

/**
 * Collect the raw request body. The signature covers these exact bytes, so
 * nothing is decoded here. Past the limit the rest is drained and dropped.
 */
export function readBody(req: http.IncomingMessage, maxBytes = MAX_BODY_BYTES): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let tooLarge = false;

    req.on('data', (chunk: Buffer) => {
      if (tooLarge) return;
      size += chunk.length;
      if (size > maxBytes) {
        tooLarge = true;
        chunks.length = 0;
        reject(new BodyTooLargeError(maxBytes));
        return;
      }
      chunks.push(chunk);
    });
    req.on('end', () => {
      if (!tooLarge) resolve(Buffer.concat(chunks));
    });
    req.on('error', reject);
  });
}

async function handleRequest(
  endpoint: WebhookEndpoint,
  maxBodyBytes: number,
  req: http.IncomingMessage,
  res: http.ServerResponse
): Promise<void> {
  const method = req.method || 'GET';
  const remote = req.socket.remoteAddress;
  logger.debug(`${method} ${req.url ?? '/'} from ${remote ?? 'unknown'}`);

  let body: Buffer;
  try {
    body = await readBody(req, maxBodyBytes);
  } catch (error) {
    if (!(error instanceof BodyTooLargeError)) throw error;
    logger.error(`${error.message} from ${remote ?? 'unknown'}`);
    res.writeHead(HttpStatus.BAD_REQUEST, { 'Content-Type': 'text/plain; charset=utf-8' });
    res.end(pickPlaceholder());
    return;
  }

  const response = await endpoint.handle({ method, headers: req.headers, body, remote });

  res.writeHead(response.status, { 'Content-Type': 'text/plain; charset=utf-8' });
  res.end(response.body);
}

export function createWebhookServer(endpoint: WebhookEndpoint, options: WebhookServerOptions = {}): http.Server {
  const maxBodyBytes = options.maxBodyBytes ?? MAX_BODY_BYTES;
  return http.createServer((req, res) => {
    handleRequest(endpoint, maxBodyBytes, req, res).catch((error) => {
      logger.error('Request error:', error);
      if (!res.headersSent) {
        res.writeHead(500, { 'Content-Type': 'text/plain; charset=utf-8' });
      }
      res.end();
    });
  });
}

export function listen(server: http.Server, host: string, port: number): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (error: Error) => reject(error);
    server.once('error', onError);
    server.listen(port, host, () => {
      server.off('error', onError);
      resolve();
    });
  });
}

export function closeServer(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

/**
 * Start the bridge: load configuration, open the IRC connection in the
 * background and accept webhooks until SIGINT/SIGTERM.
 */
export async function serve(): Promise<void> {
  logger.info(`Starting webhook-irc bridge v${VERSION}...`);

  const configStore = new ConfigStore();
  const config = await withTimeout(configStore.get(), CONFIG_TIMEOUT_MS, 'Loading configuration');

  const notifier = new IrcNotifier(new IrcFrameworkTransport(), config.irc);
  const endpoint = new WebhookEndpoint({ config: configStore, sink: notifier });
  const server = createWebhookServer(endpoint);

  server.on('error', (error) => {
    logger.error(`Server error: ${error.message}`);
  });

  await listen(server, config.webhook.host, config.webhook.port);
  logger.info(`Webhook server listening on ${config.webhook.host}:${config.webhook.port}`);

  if (!config.webhook.secret) {
    logger.warn('GITHUB_SECRET is not set, webhook signatures will not be verified');
  }

  // Background connect; the notifier retries failures itself
  notifier.ensureConnected().catch((error) => {
    logger.error('Initial IRC connection failed:', error instanceof Error ? error.message : error);
  });

  let shuttingDown = false;
  const shutdown = () => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('Shutting down...');

    Promise.all([closeServer(server), notifier.stop()])
      .then(() => process.exit(0))
      .catch((error) => {
        logger.error('Shutdown error:', error);
        process.exit(1);
      });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}
