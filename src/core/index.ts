export { ConfigStore, loadConfig, dumpDefaultSettings, type AppConfig } from './config.js';
export { IrcNotifier, IrcFrameworkTransport, NickLadder, type ChatTransport, type ConnectionState } from './irc/index.js';
export { WebhookEndpoint, dispatch, verifySignature, type WebhookRequest, type WebhookResponse } from './webhook/index.js';
export type { NotificationResult, NotificationSink } from './notification/index.js';
