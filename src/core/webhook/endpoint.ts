/**
 * Webhook endpoint
 *
 * Turns one raw HTTP request into a status code:
 *   method -> event header -> JSON body -> signature -> render -> deliver
 *
 * Callers never see internal detail: every non-2xx response carries a
 * placeholder body, and the real reason goes to the log.
 */

import type { AppConfig } from '../config.js';
import type { NotificationSink } from '../notification/types.js';
import { createLogger } from '../../utils/logger.js';
import { TimeoutError, withTimeout } from '../../utils/timeout.js';
import { dispatch, toWebhookEvent } from './dispatcher.js';
import { pickPlaceholder } from './placeholders.js';
import { verifySignature } from './signature.js';

const logger = createLogger('Webhook');

export const EVENT_HEADER = 'x-github-event';
export const SIGNATURE_HEADER = 'x-hub-signature';
export const DELIVERY_HEADER = 'x-github-delivery';

export const HttpStatus = {
  ACCEPTED: 202,
  BAD_REQUEST: 400,
  FORBIDDEN: 403,
  METHOD_NOT_ALLOWED: 405,
  INTERNAL_SERVER_ERROR: 500,
  NOT_IMPLEMENTED: 501,
  GATEWAY_TIMEOUT: 504,
} as const;

export type WebhookHeaders = Record<string, string | string[] | undefined>;

export interface WebhookRequest {
  method: string;
  headers: WebhookHeaders;
  body: Buffer;
  /** Peer address, for logs only */
  remote?: string;
}

export interface WebhookResponse {
  status: number;
  body: string;
}

export interface ConfigSource {
  get(): Promise<AppConfig>;
  reset(): void;
}

export interface WebhookTimeouts {
  configMs: number;
  connectMs: number;
  handleMs: number;
}

export interface WebhookEndpointOptions {
  config: ConfigSource;
  sink: NotificationSink;
  timeouts?: Partial<WebhookTimeouts>;
  placeholder?: () => string;
}

const DEFAULT_TIMEOUTS: WebhookTimeouts = {
  configMs: 5000,
  connectMs: 10000,
  handleMs: 5000,
};

/**
 * Header lookup that tolerates any casing and repeated headers.
 */
export function getHeader(headers: WebhookHeaders, name: string): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() !== wanted) continue;
    return Array.isArray(value) ? value[0] : value;
  }
  return undefined;
}

function isJsonContentType(contentType: string | undefined): boolean {
  if (!contentType) return false;
  const mediaType = contentType.split(';')[0].trim().toLowerCase();
  return mediaType === 'application/json';
}

export class WebhookEndpoint {
  private config: ConfigSource;
  private sink: NotificationSink;
  private timeouts: WebhookTimeouts;
  private placeholder: () => string;

  constructor(options: WebhookEndpointOptions) {
    this.config = options.config;
    this.sink = options.sink;
    this.timeouts = { ...DEFAULT_TIMEOUTS, ...options.timeouts };
    this.placeholder = options.placeholder ?? pickPlaceholder;
  }

  async handle(request: WebhookRequest): Promise<WebhookResponse> {
    try {
      const status = await this.process(request);
      const success = status >= 200 && status < 300;
      return { status, body: success ? '' : this.placeholder() };
    } catch (error) {
      if (error instanceof TimeoutError) {
        logger.warn(`${error.message} (from ${request.remote ?? 'unknown'})`);
        return { status: HttpStatus.GATEWAY_TIMEOUT, body: this.placeholder() };
      }
      logger.error(`Unhandled error handling webhook from ${request.remote ?? 'unknown'}:`, error);
      return { status: HttpStatus.INTERNAL_SERVER_ERROR, body: this.placeholder() };
    }
  }

  private async process(request: WebhookRequest): Promise<number> {
    const remote = request.remote ?? 'unknown';

    if (request.method.toUpperCase() !== 'POST') {
      logger.warn(`Invalid request method '${request.method}' from ${remote}`);
      return HttpStatus.METHOD_NOT_ALLOWED;
    }

    const eventName = getHeader(request.headers, EVENT_HEADER);
    if (!eventName) {
      logger.error(`Missing X-GitHub-Event from ${remote}`);
      return HttpStatus.BAD_REQUEST;
    }

    const contentType = getHeader(request.headers, 'content-type');
    if (!isJsonContentType(contentType)) {
      logger.error(`Invalid Content-Type '${contentType ?? ''}' from ${remote}`);
      return HttpStatus.BAD_REQUEST;
    }

    let payload: unknown;
    try {
      payload = JSON.parse(request.body.toString('utf-8'));
    } catch (error) {
      logger.error(`Unable to parse event JSON from ${remote}: ${error instanceof Error ? error.message : error}`);
      return HttpStatus.BAD_REQUEST;
    }

    const config = await this.loadConfig();

    const verification = verifySignature(
      request.body,
      getHeader(request.headers, SIGNATURE_HEADER),
      config.webhook.secret
    );
    if (verification.kind === 'rejected') {
      logger.error(`${verification.message} (from ${remote})`);
      return verification.reason === 'forbidden'
        ? HttpStatus.FORBIDDEN
        : HttpStatus.INTERNAL_SERVER_ERROR;
    }
    if (!verification.verified) {
      logger.warn(`Handling ${eventName} from ${remote} without signature verification`);
    }

    const delivery = getHeader(request.headers, DELIVERY_HEADER);
    logger.debug(`Event ${eventName} (delivery ${delivery ?? 'n/a'}) from ${remote}`);

    const result = dispatch(toWebhookEvent(eventName, payload), {
      maxCommitsPerEvent: config.maxCommitsPerEvent,
      announceRuntime: config.announceRuntime,
    });

    switch (result.kind) {
      case 'unsupported':
        logger.warn(`Unhandled event '${eventName}' from ${remote}: ${result.reason}`);
        return HttpStatus.NOT_IMPLEMENTED;
      case 'skipped':
        logger.info(`Skipped ${eventName}: ${result.reason}`);
        return HttpStatus.ACCEPTED;
      case 'lines':
        await this.deliver(eventName, result.lines);
        return HttpStatus.ACCEPTED;
    }
  }

  private async loadConfig(): Promise<AppConfig> {
    try {
      return await withTimeout(this.config.get(), this.timeouts.configMs, 'Loading configuration');
    } catch (error) {
      if (error instanceof TimeoutError) {
        this.config.reset();
      }
      throw error;
    }
  }

  /**
   * Per-channel failures are logged, not returned. The request still succeeds.
   */
  private async deliver(eventName: string, lines: string[]): Promise<void> {
    await withTimeout(this.sink.ensureConnected(), this.timeouts.connectMs, 'Connecting to IRC');
    const results = await withTimeout(this.sink.send(lines), this.timeouts.handleMs, `Delivering ${eventName}`);

    const failed = results.filter((result) => !result.success);
    if (failed.length > 0) {
      logger.error(
        `Partial delivery of ${eventName}: ` +
        failed.map((result) => `${result.channel} (${result.error ?? 'unknown error'})`).join(', ')
      );
      return;
    }
    logger.info(`Delivered ${lines.length} line(s) of ${eventName} to ${results.length} channel(s)`);
  }
}
