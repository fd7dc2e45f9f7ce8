/**
 * IRC notification sink
 *
 * Owns the single IRC connection and everything that mutates its state:
 * nickname negotiation, channel joins, liveness probing, reconnects and the
 * delivery queue. Callers only ever go through ensureConnected(), send() and
 * stop().
 *
 *   disconnected -> connecting -> connected -> joining -> ready
 *        ^______________________________________________|  (disconnect)
 */

import type { MessageType } from '../config.js';
import type { NotificationResult, NotificationSink } from '../notification/types.js';
import { createLogger } from '../../utils/logger.js';
import { TimeoutError } from '../../utils/timeout.js';
import { NAME, VERSION, describeRuntime } from '../../version.js';
import { NickLadder, ircFold } from './nick-ladder.js';
import type { ChatTransport } from './transport.js';

const logger = createLogger('IrcNotifier');

export type ConnectionState = 'disconnected' | 'connecting' | 'connected' | 'joining' | 'ready';

export interface ChatIdentity {
  primary: string;
  current: string | null;
  /** Position of `current` on the fallback ladder, -1 if the server picked it */
  ladderIndex: number;
  ladder: readonly string[];
}

export interface IrcNotifierOptions {
  host: string;
  port: number;
  nickname: string;
  channels: string[];
  messageType?: MessageType;
  connectTimeoutMs?: number;
  joinTimeoutMs?: number;
  pingTimeoutMs?: number;
  reconnectDelayMs?: number;
  quitTimeoutMs?: number;
  maxQueueSize?: number;
}

type StateCallback = (state: ConnectionState, previous: ConnectionState) => void;

const DEFAULT_CONNECT_TIMEOUT_MS = 10000;
const DEFAULT_JOIN_TIMEOUT_MS = 5000;
const DEFAULT_PING_TIMEOUT_MS = 5000;
// Fixed delay, no backoff
const DEFAULT_RECONNECT_DELAY_MS = 1000;
const DEFAULT_QUIT_TIMEOUT_MS = 2000;
const DEFAULT_MAX_QUEUE_SIZE = 50;
const QUIT_MESSAGE = 'Shutting down';

interface PendingConnect {
  resolve: () => void;
  reject: (error: Error) => void;
  timer: ReturnType<typeof setTimeout>;
  joinTimer: ReturnType<typeof setTimeout> | null;
  attemptIndex: number;
}

interface PendingProbe {
  resolve: (alive: boolean) => void;
  timer: ReturnType<typeof setTimeout>;
}

interface PendingQuit {
  resolve: () => void;
  timer: ReturnType<typeof setTimeout>;
}

interface DeliveryJob {
  lines: string[];
  resolve: (results: NotificationResult[]) => void;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class IrcNotifier implements NotificationSink {
  private transport: ChatTransport;
  private host: string;
  private port: number;
  private channels: string[];
  private messageType: MessageType;
  private ladder: NickLadder;

  private connectTimeoutMs: number;
  private joinTimeoutMs: number;
  private pingTimeoutMs: number;
  private reconnectDelayMs: number;
  private quitTimeoutMs: number;
  private maxQueueSize: number;

  private state: ConnectionState;
  private currentNick: string | null = null;
  private joinedChannels = new Set<string>();
  // Set by stop(); a stopped notifier never connects again
  private stopped = false;

  // Single-flight guard for ensureConnected()
  private connectAttempt: Promise<void> | null = null;
  private pendingConnect: PendingConnect | null = null;
  private pendingProbe: PendingProbe | null = null;
  private pendingQuit: PendingQuit | null = null;
  private probeCounter = 0;

  private reconnectAttempts = 0;
  private reconnectTimeout: ReturnType<typeof setTimeout> | null = null;

  private queue: DeliveryJob[] = [];
  private draining = false;

  private stateCallbacks: StateCallback[] = [];

  constructor(transport: ChatTransport, options: IrcNotifierOptions) {
    this.transport = transport;
    this.host = options.host;
    this.port = options.port;
    this.channels = [...options.channels];
    this.messageType = options.messageType ?? 'notice';
    this.ladder = new NickLadder(options.nickname);

    this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
    this.joinTimeoutMs = options.joinTimeoutMs ?? DEFAULT_JOIN_TIMEOUT_MS;
    this.pingTimeoutMs = options.pingTimeoutMs ?? DEFAULT_PING_TIMEOUT_MS;
    this.reconnectDelayMs = options.reconnectDelayMs ?? DEFAULT_RECONNECT_DELAY_MS;
    this.quitTimeoutMs = options.quitTimeoutMs ?? DEFAULT_QUIT_TIMEOUT_MS;
    this.maxQueueSize = options.maxQueueSize ?? DEFAULT_MAX_QUEUE_SIZE;

    // A transport handed over already connected (e.g. a reused worker) is
    // trusted only until the next ensureConnected() probes it.
    if (transport.isConnected()) {
      this.state = 'ready';
      this.currentNick = transport.nickname();
      for (const channel of this.channels) {
        this.joinedChannels.add(ircFold(channel));
      }
      logger.info(`Adopting existing connection as ${this.currentNick ?? 'unknown nick'}`);
    } else {
      this.state = 'disconnected';
    }

    this.attachTransport();
  }

  private attachTransport(): void {
    this.transport.on('registered', (nick) => this.handleRegistered(nick));
    this.transport.on('nick-in-use', (nick) => this.handleNickInUse(nick));
    this.transport.on('nick-changed', (oldNick, newNick) => {
      logger.info(`Nick changed ${oldNick} -> ${newNick}`);
      this.currentNick = newNick;
    });
    this.transport.on('joined', (channel) => this.handleJoined(channel));
    this.transport.on('kicked', (channel, by, reason) => this.handleKicked(channel, by, reason));
    this.transport.on('pong', () => this.settleProbe(true));
    this.transport.on('disconnected', (reason) => this.handleDisconnected(reason));
  }

  getState(): ConnectionState {
    return this.state;
  }

  getIdentity(): ChatIdentity {
    return {
      primary: this.ladder.primary,
      current: this.currentNick,
      ladderIndex: this.currentNick === null ? -1 : this.ladder.indexOf(this.currentNick),
      ladder: this.ladder.nicks,
    };
  }

  onStateChange(callback: StateCallback): void {
    this.stateCallbacks.push(callback);
  }

  private setState(next: ConnectionState): void {
    const previous = this.state;
    if (previous === next) return;
    this.state = next;
    logger.debug(`State ${previous} -> ${next}`);
    for (const cb of this.stateCallbacks) {
      try {
        cb(next, previous);
      } catch (error) {
        logger.error('State callback error:', error);
      }
    }
  }

  // --- Connection ---

  /**
   * Make sure the connection is usable. Concurrent callers share the same
   * attempt instead of opening a second connection.
   */
  ensureConnected(): Promise<void> {
    if (this.stopped) {
      return Promise.reject(new Error('Notifier is stopped'));
    }
    this.cancelReconnect();

    if (!this.connectAttempt) {
      const attempt: Promise<void> = this.establish()
        .catch((error: unknown) => {
          if (!this.stopped) {
            this.scheduleReconnect();
          }
          throw error;
        })
        .finally(() => {
          if (this.connectAttempt === attempt) {
            this.connectAttempt = null;
          }
        });
      this.connectAttempt = attempt;
    }
    return this.connectAttempt;
  }

  private async establish(): Promise<void> {
    if (this.transport.isConnected() && this.state !== 'disconnected') {
      const alive = await this.probe();
      if (alive) {
        this.reclaimPrimaryNick();
        return;
      }

      logger.warn(`No PONG within ${this.pingTimeoutMs}ms, treating connection as dead`);
      this.transport.destroy();
      this.joinedChannels.clear();
      this.setState('disconnected');
    }

    await this.connect();
  }

  private connect(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.failConnect(new TimeoutError('IRC connect', this.connectTimeoutMs));
      }, this.connectTimeoutMs);

      this.pendingConnect = { resolve, reject, timer, joinTimer: null, attemptIndex: 0 };
      this.joinedChannels.clear();
      this.setState('connecting');

      const nick = this.ladder.primary;
      logger.info(`Connecting to ${this.host}:${this.port} as ${nick}...`);
      try {
        this.transport.connect({
          host: this.host,
          port: this.port,
          nick,
          username: nick,
          gecos: `${NAME} ${VERSION}`,
          version: `${NAME} ${VERSION} - ${describeRuntime()}`,
        });
      } catch (error) {
        this.failConnect(error instanceof Error ? error : new Error(String(error)));
      }
    });
  }

  private clearPendingConnect(): PendingConnect | null {
    const pending = this.pendingConnect;
    if (!pending) return null;
    clearTimeout(pending.timer);
    if (pending.joinTimer) clearTimeout(pending.joinTimer);
    this.pendingConnect = null;
    return pending;
  }

  private failConnect(error: Error): void {
    const pending = this.clearPendingConnect();
    if (!pending) return;

    logger.error(`Connect failed: ${error.message}`);
    this.transport.destroy();
    this.joinedChannels.clear();
    this.setState('disconnected');
    pending.reject(error);
  }

  private completeConnect(): void {
    const pending = this.clearPendingConnect();
    this.setState('ready');
    this.reconnectAttempts = 0;

    const missing = this.channels.filter((channel) => !this.joinedChannels.has(ircFold(channel)));
    if (missing.length > 0) {
      logger.warn(`Ready without joining ${missing.join(', ')}`);
    } else {
      logger.info(`Ready in ${this.channels.join(', ')} as ${this.currentNick}`);
    }
    pending?.resolve();
  }

  private handleRegistered(nick: string): void {
    this.currentNick = nick;
    this.setState('connected');

    if (this.ladder.isPrimary(nick)) {
      logger.info(`Registered as ${nick}`);
    } else {
      logger.warn(`Registered as ${nick}, ${this.ladder.primary} is taken`);
    }

    this.joinChannels();
  }

  private handleNickInUse(nick: string): void {
    const pending = this.pendingConnect;
    if (!pending || this.state !== 'connecting') {
      // Reclaim attempt on a live connection; keep the nick we have
      logger.debug(`Nickname ${nick} is still in use`);
      return;
    }

    pending.attemptIndex++;
    const next = this.ladder.at(pending.attemptIndex);
    if (next === undefined) {
      this.failConnect(new Error(`All ${this.ladder.nicks.length} nicknames are in use`));
      return;
    }

    logger.info(`Nickname ${nick} is in use, trying ${next}`);
    this.transport.changeNick(next);
  }

  private joinChannels(): void {
    this.setState('joining');
    for (const channel of this.channels) {
      this.transport.join(channel);
    }

    const pending = this.pendingConnect;
    if (pending) {
      pending.joinTimer = setTimeout(() => {
        logger.warn(`Channel joins not acknowledged within ${this.joinTimeoutMs}ms`);
        this.completeConnect();
      }, this.joinTimeoutMs);
    }
  }

  private allChannelsJoined(): boolean {
    return this.channels.every((channel) => this.joinedChannels.has(ircFold(channel)));
  }

  private handleJoined(channel: string): void {
    this.joinedChannels.add(ircFold(channel));
    logger.info(`Joined ${channel}`);

    if (this.state === 'joining' && this.allChannelsJoined()) {
      if (this.pendingConnect) {
        this.completeConnect();
      } else {
        this.setState('ready');
      }
    }
  }

  private handleKicked(channel: string, by: string, reason: string): void {
    this.joinedChannels.delete(ircFold(channel));
    logger.error(`Kicked from ${channel} by ${by} (${reason || 'no reason'}), rejoining`);

    if (this.state === 'ready') {
      this.setState('joining');
    }
    try {
      this.transport.join(channel);
    } catch (error) {
      logger.error(`Rejoin of ${channel} failed: ${errorMessage(error)}`);
    }
  }

  private handleDisconnected(reason: string): void {
    this.joinedChannels.clear();
    this.settleProbe(false);

    const quit = this.pendingQuit;
    if (quit) {
      clearTimeout(quit.timer);
      this.pendingQuit = null;
      this.setState('disconnected');
      logger.info('Disconnected');
      quit.resolve();
      return;
    }

    if (this.pendingConnect) {
      this.failConnect(new Error(`Connection closed while connecting (${reason})`));
      return;
    }

    this.setState('disconnected');
    if (this.stopped) return;

    logger.warn(`Connection closed unexpectedly (${reason})`);
    this.scheduleReconnect();
  }

  // --- Liveness & identity ---

  private probe(): Promise<boolean> {
    this.settleProbe(false);

    return new Promise<boolean>((resolve) => {
      const timer = setTimeout(() => this.settleProbe(false), this.pingTimeoutMs);
      this.pendingProbe = { resolve, timer };

      const token = `${NAME}-${++this.probeCounter}`;
      logger.debug(`Probing connection with PING ${token}`);
      try {
        this.transport.ping(token);
      } catch (error) {
        logger.warn(`PING failed: ${errorMessage(error)}`);
        this.settleProbe(false);
      }
    });
  }

  private settleProbe(alive: boolean): void {
    const probe = this.pendingProbe;
    if (!probe) return;
    clearTimeout(probe.timer);
    this.pendingProbe = null;
    probe.resolve(alive);
  }

  /**
   * Ask for the primary nick again. The server stays silent when it is
   * still taken, so this never waits for an answer.
   */
  private reclaimPrimaryNick(): void {
    if (this.currentNick === null || this.ladder.isPrimary(this.currentNick)) return;

    logger.debug(`Nick is ${this.currentNick}, trying to reclaim ${this.ladder.primary}`);
    try {
      this.transport.changeNick(this.ladder.primary);
    } catch (error) {
      logger.warn(`Nick reclaim failed: ${errorMessage(error)}`);
    }
  }

  // --- Reconnection ---

  private scheduleReconnect(): void {
    if (this.reconnectTimeout || this.stopped) return;

    this.reconnectAttempts++;
    logger.info(`Reconnecting in ${this.reconnectDelayMs}ms (attempt ${this.reconnectAttempts})...`);

    this.reconnectTimeout = setTimeout(() => {
      this.reconnectTimeout = null;
      this.ensureConnected().then(
        () => logger.info('Reconnected'),
        (error: unknown) => logger.error(`Reconnect failed: ${errorMessage(error)}`)
      );
    }, this.reconnectDelayMs);
  }

  private cancelReconnect(): void {
    if (this.reconnectTimeout) {
      clearTimeout(this.reconnectTimeout);
      this.reconnectTimeout = null;
    }
  }

  // --- Delivery ---

  /**
   * Queue lines for delivery. Deliveries run one at a time in arrival order;
   * within one delivery the channels are served concurrently.
   */
  send(lines: string[]): Promise<NotificationResult[]> {
    return new Promise<NotificationResult[]>((resolve) => {
      if (this.queue.length >= this.maxQueueSize) {
        logger.warn(`Delivery queue full (${this.maxQueueSize}), dropping oldest notification`);
        const dropped = this.queue.shift();
        dropped?.resolve(this.failAll('Dropped from full delivery queue'));
      }

      this.queue.push({ lines, resolve });
      this.drainQueue();
    });
  }

  private drainQueue(): void {
    if (this.draining) return;
    const job = this.queue.shift();
    if (!job) return;

    this.draining = true;
    this.deliver(job.lines)
      .then(job.resolve, (error: unknown) => job.resolve(this.failAll(errorMessage(error))))
      .finally(() => {
        this.draining = false;
        this.drainQueue();
      });
  }

  private failAll(error: string): NotificationResult[] {
    return this.channels.map((channel) => ({ channel, success: false, error }));
  }

  private async deliver(lines: string[]): Promise<NotificationResult[]> {
    for (const line of lines) {
      logger.info(`Dispatching notification to ${this.channels.join(', ')}: ${line}`);
    }

    const settled = await Promise.allSettled(
      this.channels.map((channel) => this.deliverToChannel(channel, lines))
    );

    return settled.map((result, index): NotificationResult => {
      const channel = this.channels[index];
      if (result.status === 'fulfilled') {
        return { channel, success: true };
      }
      const error = errorMessage(result.reason);
      logger.error(`Failed to deliver to ${channel}: ${error}`);
      return { channel, success: false, error };
    });
  }

  private async deliverToChannel(channel: string, lines: string[]): Promise<void> {
    if (!this.transport.isConnected()) {
      throw new Error('Not connected');
    }
    if (!this.joinedChannels.has(ircFold(channel))) {
      throw new Error(`Not joined to ${channel}`);
    }

    for (const line of lines) {
      if (this.messageType === 'notice') {
        this.transport.notice(channel, line);
      } else {
        this.transport.say(channel, line);
      }
    }
  }

  // --- Shutdown ---

  /**
   * QUIT and wait for the server to close the connection, or close it
   * locally once the grace period is over.
   */
  async stop(message = QUIT_MESSAGE): Promise<void> {
    this.stopped = true;
    this.cancelReconnect();
    this.settleProbe(false);

    if (this.pendingConnect) {
      this.failConnect(new Error('Notifier stopped'));
    }

    if (!this.transport.isConnected()) {
      this.setState('disconnected');
      return;
    }

    logger.info('Disconnecting from IRC...');
    await new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        logger.warn(`QUIT not acknowledged within ${this.quitTimeoutMs}ms, closing locally`);
        this.pendingQuit = null;
        this.transport.destroy();
        this.joinedChannels.clear();
        this.setState('disconnected');
        resolve();
      }, this.quitTimeoutMs);

      this.pendingQuit = { resolve, timer };
      this.transport.quit(message);
    });
  }
}
