import { describe, it, expect } from 'vitest';
import { dispatch, isWebhookEventName, toWebhookEvent } from '../src/core/webhook/dispatcher.js';

const CONTEXT = { maxCommitsPerEvent: 3, announceRuntime: false };

describe('toWebhookEvent', () => {
  it('should recognize supported events', () => {
    expect(toWebhookEvent('push', { ref: 'x' })).toEqual({ kind: 'push', payload: { ref: 'x' } });
    expect(toWebhookEvent('pull_request', null)).toEqual({ kind: 'pull_request', payload: null });
  });

  it('should classify anything else as unknown', () => {
    expect(toWebhookEvent('deployment', {})).toEqual({ kind: 'unknown', name: 'deployment' });
  });

  it('should match names exactly', () => {
    expect(isWebhookEventName('ping')).toBe(true);
    expect(isWebhookEventName('Ping')).toBe(false);
    expect(isWebhookEventName('')).toBe(false);
  });
});

describe('dispatch', () => {
  it('should route to the matching renderer', () => {
    const result = dispatch(toWebhookEvent('ping', { repository: { full_name: 'acme/widgets' } }), CONTEXT);
    expect(result).toEqual({ kind: 'lines', lines: ['\x02GitHub\x02 has pinged acme/widgets'] });
  });

  it('should report unknown events as unsupported', () => {
    expect(dispatch(toWebhookEvent('deployment', {}), CONTEXT)).toEqual({
      kind: 'unsupported',
      reason: 'no renderer for event "deployment"',
    });
  });

  it('should not throw on payloads of the wrong type', () => {
    expect(dispatch(toWebhookEvent('issues', 'not an object'), CONTEXT)).toEqual({
      kind: 'skipped',
      reason: 'malformed issues payload',
    });
  });
});
