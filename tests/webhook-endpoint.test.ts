import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  WebhookEndpoint,
  type AppConfig,
  type NotificationResult,
  type NotificationSink,
  type WebhookRequest,
} from '../src/core/index.js';
import { parseSettings } from '../src/core/config.js';
import { computeSignature } from '../src/core/webhook/signature.js';
import { PLACEHOLDERS } from '../src/core/webhook/placeholders.js';

const SECRET = 'test-secret';
const PLACEHOLDER = 'Reticulating splines...';

class FakeSink implements NotificationSink {
  delivered: string[][] = [];
  connectCalls = 0;
  connect: () => Promise<void> = () => Promise.resolve();
  deliver: (lines: string[]) => Promise<NotificationResult[]> = () =>
    Promise.resolve([{ channel: '#ops', success: true }]);

  ensureConnected(): Promise<void> {
    this.connectCalls++;
    return this.connect();
  }

  send(lines: string[]): Promise<NotificationResult[]> {
    this.delivered.push(lines);
    return this.deliver(lines);
  }
}

interface RequestOptions {
  event?: string;
  method?: string;
  contentType?: string;
  /** Secret to sign with; null sends no signature */
  signWith?: string | null;
  rawBody?: string;
}

function buildRequest(payload: unknown, options: RequestOptions = {}): WebhookRequest {
  const body = Buffer.from(options.rawBody ?? JSON.stringify(payload));
  const headers: Record<string, string> = {
    'content-type': options.contentType ?? 'application/json',
  };
  if (options.event !== undefined) {
    headers['x-github-event'] = options.event;
  }
  const signWith = options.signWith === undefined ? SECRET : options.signWith;
  if (signWith !== null) {
    headers['x-hub-signature'] = computeSignature(signWith, body);
  }
  return { method: options.method ?? 'POST', headers, body, remote: '127.0.0.1' };
}

function configWith(secret: string): AppConfig {
  return parseSettings({ GITHUB_SECRET: secret, IRC_CHANNELS: '#ops' });
}

describe('WebhookEndpoint', () => {
  let sink: FakeSink;
  let reset: ReturnType<typeof vi.fn>;
  let config: AppConfig;
  let endpoint: WebhookEndpoint;

  function createEndpoint(): WebhookEndpoint {
    return new WebhookEndpoint({
      config: { get: () => Promise.resolve(config), reset },
      sink,
      placeholder: () => PLACEHOLDER,
    });
  }

  beforeEach(() => {
    sink = new FakeSink();
    reset = vi.fn();
    config = configWith(SECRET);
    endpoint = createEndpoint();
  });

  describe('end-to-end', () => {
    it('should relay a signed ping', async () => {
      const response = await endpoint.handle(
        buildRequest({ repository: { full_name: 'acme/widgets' } }, { event: 'ping' })
      );

      expect(response).toEqual({ status: 202, body: '' });
      expect(sink.delivered).toEqual([['\x02GitHub\x02 has pinged acme/widgets']]);
    });

    it('should relay an empty branch push as one summary line', async () => {
      const payload = {
        ref: 'refs/heads/main',
        forced: false,
        deleted: false,
        commits: [],
        sender: { login: 'octocat' },
        repository: { full_name: 'acme/widgets', html_url: 'https://github.com/acme/widgets' },
      };

      const response = await endpoint.handle(buildRequest(payload, { event: 'push' }));

      expect(response.status).toBe(202);
      expect(sink.delivered).toEqual([['\x02octocat\x02 has pushed to acme/widgets/main']]);
    });

    it('should reject an unsigned request when a secret is configured', async () => {
      const response = await endpoint.handle(
        buildRequest({ repository: { full_name: 'acme/widgets' } }, { event: 'ping', signWith: null })
      );

      expect(response).toEqual({ status: 403, body: PLACEHOLDER });
      expect(sink.connectCalls).toBe(0);
    });

    it('should answer 501 for events without a renderer', async () => {
      const response = await endpoint.handle(buildRequest({ deployment: {} }, { event: 'deployment' }));

      expect(response).toEqual({ status: 501, body: PLACEHOLDER });
      expect(sink.delivered).toEqual([]);
    });
  });

  describe('request validation', () => {
    it('should only accept POST', async () => {
      const response = await endpoint.handle(buildRequest({}, { event: 'ping', method: 'GET' }));
      expect(response).toEqual({ status: 405, body: PLACEHOLDER });
    });

    it('should require the event header', async () => {
      const response = await endpoint.handle(buildRequest({}));
      expect(response.status).toBe(400);
    });

    it('should require a JSON content type', async () => {
      const response = await endpoint.handle(buildRequest({}, { event: 'ping', contentType: 'text/plain' }));
      expect(response.status).toBe(400);
    });

    it('should accept a content type with parameters', async () => {
      const response = await endpoint.handle(
        buildRequest({}, { event: 'ping', contentType: 'application/json; charset=utf-8' })
      );
      expect(response.status).toBe(202);
    });

    it('should reject a body that is not JSON', async () => {
      const response = await endpoint.handle(buildRequest(null, { event: 'ping', rawBody: '{"zen": ' }));
      expect(response.status).toBe(400);
    });

    it('should read headers in any case', async () => {
      const body = Buffer.from(JSON.stringify({ repository: { full_name: 'acme/widgets' } }));
      const response = await endpoint.handle({
        method: 'post',
        headers: {
          'Content-Type': 'application/json',
          'X-GitHub-Event': 'ping',
          'X-Hub-Signature': computeSignature(SECRET, body),
        },
        body,
      });
      expect(response.status).toBe(202);
    });
  });

  describe('signatures', () => {
    it('should reject a signature made with another secret', async () => {
      const response = await endpoint.handle(buildRequest({}, { event: 'ping', signWith: 'other-secret' }));
      expect(response.status).toBe(403);
    });

    it('should treat a signature without a configured secret as a server error', async () => {
      config = configWith('');
      endpoint = createEndpoint();

      const response = await endpoint.handle(buildRequest({}, { event: 'ping' }));
      expect(response).toEqual({ status: 500, body: PLACEHOLDER });
    });

    it('should accept unsigned requests when no secret is configured', async () => {
      config = configWith('');
      endpoint = createEndpoint();

      const response = await endpoint.handle(buildRequest({}, { event: 'ping', signWith: null }));
      expect(response.status).toBe(202);
      expect(sink.delivered).toEqual([['\x02GitHub\x02 has pinged ?UNKNOWN?']]);
    });
  });

  describe('rendering outcomes', () => {
    it('should accept skipped events without delivering', async () => {
      const payload = {
        action: 'labeled',
        issue: { number: 1, title: 'Bug', html_url: 'https://github.com/acme/widgets/issues/1' },
        sender: { login: 'octocat' },
        repository: { full_name: 'acme/widgets' },
      };

      const response = await endpoint.handle(buildRequest(payload, { event: 'issues' }));
      expect(response).toEqual({ status: 202, body: '' });
      expect(sink.connectCalls).toBe(0);
    });

    it('should accept malformed payloads of known events without delivering', async () => {
      const response = await endpoint.handle(buildRequest({ ref: 42 }, { event: 'push' }));
      expect(response.status).toBe(202);
      expect(sink.delivered).toEqual([]);
    });
  });

  describe('delivery', () => {
    it('should answer 202 when some channels fail', async () => {
      sink.deliver = () => Promise.resolve([
        { channel: '#ops', success: true },
        { channel: '#dev', success: false, error: 'Not joined to #dev' },
      ]);

      const response = await endpoint.handle(
        buildRequest({ repository: { full_name: 'acme/widgets' } }, { event: 'ping' })
      );
      expect(response.status).toBe(202);
    });

    it('should answer 500 when delivery throws', async () => {
      sink.deliver = () => Promise.reject(new Error('socket closed'));

      const response = await endpoint.handle(
        buildRequest({ repository: { full_name: 'acme/widgets' } }, { event: 'ping' })
      );
      expect(response).toEqual({ status: 500, body: PLACEHOLDER });
    });

    it('should answer 504 when connecting takes too long', async () => {
      sink.connect = () => new Promise<void>(() => undefined);
      endpoint = new WebhookEndpoint({
        config: { get: () => Promise.resolve(config), reset },
        sink,
        timeouts: { connectMs: 10 },
        placeholder: () => PLACEHOLDER,
      });

      const response = await endpoint.handle(
        buildRequest({ repository: { full_name: 'acme/widgets' } }, { event: 'ping' })
      );
      expect(response).toEqual({ status: 504, body: PLACEHOLDER });
      expect(sink.delivered).toEqual([]);
    });
  });

  describe('configuration', () => {
    it('should answer 504 and drop the cached config when loading hangs', async () => {
      endpoint = new WebhookEndpoint({
        config: { get: () => new Promise<AppConfig>(() => undefined), reset },
        sink,
        timeouts: { configMs: 10 },
        placeholder: () => PLACEHOLDER,
      });

      const response = await endpoint.handle(buildRequest({}, { event: 'ping' }));
      expect(response.status).toBe(504);
      expect(reset).toHaveBeenCalledTimes(1);
    });

    it('should answer 500 when the configuration is invalid', async () => {
      endpoint = new WebhookEndpoint({
        config: { get: () => Promise.reject(new Error('Invalid configuration: IRC_PORT: bad')), reset },
        sink,
        placeholder: () => PLACEHOLDER,
      });

      const response = await endpoint.handle(buildRequest({}, { event: 'ping' }));
      expect(response.status).toBe(500);
      expect(reset).not.toHaveBeenCalled();
    });
  });

  it('should use a stock placeholder body by default', async () => {
    endpoint = new WebhookEndpoint({ config: { get: () => Promise.resolve(config), reset }, sink });

    const response = await endpoint.handle(buildRequest({}, { event: 'ping', method: 'PUT' }));
    expect(response.status).toBe(405);
    expect(PLACEHOLDERS).toContain(response.body);
  });
});
