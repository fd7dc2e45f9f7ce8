export type { NotificationResult, NotificationSink } from './types.js';
