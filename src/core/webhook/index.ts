export { WebhookEndpoint, HttpStatus, getHeader, type WebhookRequest, type WebhookResponse, type ConfigSource } from './endpoint.js';
export { dispatch, toWebhookEvent, isWebhookEventName } from './dispatcher.js';
export { verifySignature, computeSignature, type VerifyOutcome } from './signature.js';
export { renderIssues, renderPing, renderPullRequest, renderPush, parseRef } from './renderers.js';
export type { RenderContext, RenderResult, WebhookEvent, WebhookEventName } from './types.js';
