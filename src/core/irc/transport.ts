import { Client, type JoinEvent, type KickEvent, type NickEvent, type NickInUseEvent, type PongEvent, type RegisteredEvent } from 'irc-framework';
import { createLogger } from '../../utils/logger.js';
import { ircFold } from './nick-ladder.js';

const logger = createLogger('IrcTransport');

export interface ChatConnectOptions {
  host: string;
  port: number;
  nick: string;
  username: string;
  gecos: string;
  /** CTCP VERSION reply */
  version: string;
}

/**
 * Transport events. Only events about our own nick are reported.
 */
export interface ChatTransportEvents {
  registered: [nick: string];
  'nick-in-use': [nick: string];
  'nick-changed': [oldNick: string, newNick: string];
  joined: [channel: string];
  kicked: [channel: string, by: string, reason: string];
  pong: [token: string];
  disconnected: [reason: string];
}

export type ChatTransportEvent = keyof ChatTransportEvents;
export type ChatTransportListener<K extends ChatTransportEvent> = (...args: ChatTransportEvents[K]) => void;

/**
 * The chat protocol as the notifier consumes it. Framing, server replies and
 * CTCP stay behind this interface.
 */
export interface ChatTransport {
  connect(options: ChatConnectOptions): void;
  join(channel: string): void;
  say(target: string, text: string): void;
  notice(target: string, text: string): void;
  changeNick(nick: string): void;
  ping(token: string): void;
  /** Polite disconnect; completion is reported through `disconnected` */
  quit(message: string): void;
  /** Drop the connection locally without waiting for the server */
  destroy(): void;
  isConnected(): boolean;
  nickname(): string | null;
  on<K extends ChatTransportEvent>(event: K, listener: ChatTransportListener<K>): void;
}

type ListenerTable = { [K in ChatTransportEvent]: Array<ChatTransportListener<K>> };

/**
 * Listener bookkeeping shared by transport implementations.
 */
export abstract class BaseChatTransport {
  private listeners: ListenerTable = {
    registered: [],
    'nick-in-use': [],
    'nick-changed': [],
    joined: [],
    kicked: [],
    pong: [],
    disconnected: [],
  };

  on<K extends ChatTransportEvent>(event: K, listener: ChatTransportListener<K>): void {
    this.listeners[event].push(listener);
  }

  protected emit<K extends ChatTransportEvent>(event: K, ...args: ChatTransportEvents[K]): void {
    for (const listener of this.listeners[event]) {
      try {
        listener(...args);
      } catch (error) {
        logger.error(`Listener for ${event} failed:`, error);
      }
    }
  }
}

/**
 * ChatTransport over an irc-framework client. A fresh client is created per
 * connect so that events from an abandoned connection can never leak into
 * the current one.
 */
export class IrcFrameworkTransport extends BaseChatTransport implements ChatTransport {
  private client: Client | null = null;
  private registered = false;
  private currentNick: string | null = null;
  private createClient: () => Client;

  constructor(createClient: () => Client = () => new Client()) {
    super();
    this.createClient = createClient;
  }

  connect(options: ChatConnectOptions): void {
    this.destroy();

    const client = this.createClient();
    this.client = client;
    this.currentNick = options.nick;
    this.attach(client);

    logger.debug(`Opening connection to ${options.host}:${options.port}`);
    client.connect({
      host: options.host,
      port: options.port,
      nick: options.nick,
      username: options.username,
      gecos: options.gecos,
      version: options.version,
      // Reconnects are driven by IrcNotifier
      auto_reconnect: false,
    });
  }

  private attach(client: Client): void {
    const isCurrent = () => this.client === client;
    const isMe = (nick: string) => this.currentNick !== null && ircFold(nick) === ircFold(this.currentNick);

    client.on('registered', (event: RegisteredEvent) => {
      if (!isCurrent()) return;
      this.registered = true;
      this.currentNick = event.nick;
      this.emit('registered', event.nick);
    });

    client.on('nick in use', (event: NickInUseEvent) => {
      if (!isCurrent()) return;
      this.emit('nick-in-use', event.nick);
    });

    client.on('nick', (event: NickEvent) => {
      if (!isCurrent() || !isMe(event.nick)) return;
      const oldNick = event.nick;
      this.currentNick = event.new_nick;
      this.emit('nick-changed', oldNick, event.new_nick);
    });

    client.on('join', (event: JoinEvent) => {
      if (!isCurrent() || !isMe(event.nick)) return;
      this.emit('joined', event.channel);
    });

    client.on('kick', (event: KickEvent) => {
      if (!isCurrent() || !isMe(event.kicked)) return;
      this.emit('kicked', event.channel, event.nick, event.message);
    });

    client.on('pong', (event: PongEvent) => {
      if (!isCurrent()) return;
      this.emit('pong', event.message);
    });

    client.on('socket error', (error: Error) => {
      if (!isCurrent()) return;
      logger.warn('Socket error:', error.message);
    });

    client.on('close', () => {
      if (!isCurrent()) return;
      this.client = null;
      this.registered = false;
      this.emit('disconnected', 'connection closed');
    });
  }

  private requireClient(): Client {
    if (!this.client || !this.registered) {
      throw new Error('Not connected to IRC');
    }
    return this.client;
  }

  join(channel: string): void {
    this.requireClient().join(channel);
  }

  say(target: string, text: string): void {
    this.requireClient().say(target, text);
  }

  notice(target: string, text: string): void {
    this.requireClient().notice(target, text);
  }

  changeNick(nick: string): void {
    if (!this.client) {
      throw new Error('Not connected to IRC');
    }
    this.client.changeNick(nick);
  }

  ping(token: string): void {
    this.requireClient().ping(token);
  }

  quit(message: string): void {
    if (!this.client) return;
    this.client.quit(message);
  }

  destroy(): void {
    const client = this.client;
    if (!client) return;

    this.client = null;
    this.registered = false;
    client.removeAllListeners();
    client.on('socket error', (error: Error) => {
      logger.debug('Socket error on abandoned connection:', error.message);
    });
    try {
      client.connection?.end(undefined, true);
    } catch (error) {
      logger.debug('Error while closing abandoned connection:', error instanceof Error ? error.message : error);
    }
  }

  isConnected(): boolean {
    return this.client !== null && this.registered;
  }

  nickname(): string | null {
    return this.currentNick;
  }
}
