import { renderIssues, renderPing, renderPullRequest, renderPush } from './renderers.js';
import { WEBHOOK_EVENT_NAMES, type RenderContext, type RenderResult, type WebhookEvent, type WebhookEventName } from './types.js';

export function isWebhookEventName(name: string): name is WebhookEventName {
  return WEBHOOK_EVENT_NAMES.some((known) => known === name);
}

/**
 * Classify an `X-GitHub-Event` header value.
 */
export function toWebhookEvent(name: string, payload: unknown): WebhookEvent {
  if (isWebhookEventName(name)) {
    return { kind: name, payload };
  }
  return { kind: 'unknown', name };
}

function assertNever(value: never): never {
  throw new Error(`Unhandled webhook event: ${JSON.stringify(value)}`);
}

/**
 * Route an event to its renderer. Unknown events are reported as unsupported,
 * never thrown.
 */
export function dispatch(event: WebhookEvent, context: RenderContext): RenderResult {
  switch (event.kind) {
    case 'issues':
      return renderIssues(event.payload);
    case 'ping':
      return renderPing(event.payload, context);
    case 'pull_request':
      return renderPullRequest(event.payload);
    case 'push':
      return renderPush(event.payload, context);
    case 'unknown':
      return { kind: 'unsupported', reason: `no renderer for event "${event.name}"` };
    default:
      return assertNever(event);
  }
}
