import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import type { AddressInfo } from 'net';
import type http from 'http';
import { parseSettings } from '../src/core/config.js';
import type { NotificationResult, NotificationSink } from '../src/core/notification/types.js';
import { WebhookEndpoint } from '../src/core/webhook/endpoint.js';
import { PLACEHOLDERS } from '../src/core/webhook/placeholders.js';
import { computeSignature } from '../src/core/webhook/signature.js';
import { closeServer, createWebhookServer, listen } from '../src/interfaces/webhook-server.js';

const SECRET = 'test-secret';

class RecordingSink implements NotificationSink {
  delivered: string[][] = [];

  ensureConnected(): Promise<void> {
    return Promise.resolve();
  }

  send(lines: string[]): Promise<NotificationResult[]> {
    this.delivered.push(lines);
    return Promise.resolve([{ channel: '#ops', success: true }]);
  }
}

describe('webhook server', () => {
  const sink = new RecordingSink();
  const config = parseSettings({ GITHUB_SECRET: SECRET, IRC_CHANNELS: '#ops' });
  let server: http.Server;
  let baseUrl: string;

  beforeAll(async () => {
    const endpoint = new WebhookEndpoint({
      config: { get: () => Promise.resolve(config), reset: () => undefined },
      sink,
      placeholder: () => 'PC LOAD LETTER',
    });
    server = createWebhookServer(endpoint, { maxBodyBytes: 1024 });
    await listen(server, '127.0.0.1', 0);
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Expected a TCP address');
    }
    const { port }: AddressInfo = address;
    baseUrl = `http://127.0.0.1:${port}`;
  });

  afterAll(async () => {
    await closeServer(server);
  });

  it('should pass the exact body bytes through to signature checking', async () => {
    // Non-canonical JSON: re-serializing it would change the signature
    const body = '{ "repository" : { "full_name" : "acme/widgets" } }';
    const response = await fetch(`${baseUrl}/webhook`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'X-GitHub-Event': 'ping',
        'X-Hub-Signature': computeSignature(SECRET, body),
      },
      body,
    });

    expect(response.status).toBe(202);
    expect(await response.text()).toBe('');
    expect(sink.delivered).toEqual([['\x02GitHub\x02 has pinged acme/widgets']]);
  });

  it('should answer failures with a plain text placeholder', async () => {
    const response = await fetch(`${baseUrl}/`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', 'X-GitHub-Event': 'ping' },
      body: '{}',
    });

    expect(response.status).toBe(403);
    expect(response.headers.get('content-type')).toBe('text/plain; charset=utf-8');
    expect(await response.text()).toBe('PC LOAD LETTER');
  });

  it('should answer 400 to bodies over the size limit without delivering', async () => {
    const delivered = sink.delivered.length;
    const body = JSON.stringify({ repository: { full_name: 'acme/widgets' }, padding: 'x'.repeat(2000) });
    const response = await fetch(`${baseUrl}/`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'X-GitHub-Event': 'ping',
        'X-Hub-Signature': computeSignature(SECRET, body),
      },
      body,
    });

    expect(response.status).toBe(400);
    expect(PLACEHOLDERS).toContain(await response.text());
    expect(sink.delivered).toHaveLength(delivered);
  });

  it('should reject other methods', async () => {
    const response = await fetch(baseUrl);
    expect(response.status).toBe(405);
  });
});
