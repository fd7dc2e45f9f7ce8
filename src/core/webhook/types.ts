export const WEBHOOK_EVENT_NAMES = ['issues', 'ping', 'pull_request', 'push'] as const;

export type WebhookEventName = (typeof WEBHOOK_EVENT_NAMES)[number];

/**
 * An inbound webhook after its `X-GitHub-Event` header has been classified.
 * The payload stays unknown until the matching renderer validates it.
 */
export type WebhookEvent =
  | { kind: 'issues'; payload: unknown }
  | { kind: 'ping'; payload: unknown }
  | { kind: 'pull_request'; payload: unknown }
  | { kind: 'push'; payload: unknown }
  | { kind: 'unknown'; name: string };

export type RenderResult =
  /** One or more chat lines, summary first */
  | { kind: 'lines'; lines: string[] }
  /** Recognized event, but nothing worth announcing */
  | { kind: 'skipped'; reason: string }
  /** No renderer for this event or this shape of it */
  | { kind: 'unsupported'; reason: string };

export interface RenderContext {
  /** Pushes with more commits than this get a summary line only */
  maxCommitsPerEvent: number;
  /** Append a runtime description to ping announcements */
  announceRuntime: boolean;
}
