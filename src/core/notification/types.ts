/**
 * Outcome of delivering one notification to one channel.
 */
export interface NotificationResult {
  channel: string;
  success: boolean;
  error?: string;
}

/**
 * Where rendered webhook lines go. The HTTP side only sees this interface,
 * never the connection behind it.
 */
export interface NotificationSink {
  /** Resolves once the sink can accept deliveries */
  ensureConnected(): Promise<void>;
  /** Deliver the lines, in order, to every configured channel */
  send(lines: string[]): Promise<NotificationResult[]>;
}
