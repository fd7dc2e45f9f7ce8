// irc-framework ships no type declarations; this covers the client surface used here.
declare module 'irc-framework' {
  import { EventEmitter } from 'events';

  export interface ClientOptions {
    host?: string;
    port?: number;
    nick?: string;
    username?: string;
    gecos?: string;
    version?: string;
    auto_reconnect?: boolean;
    ping_interval?: number;
    ping_timeout?: number;
  }

  export interface RegisteredEvent {
    nick: string;
  }

  export interface NickInUseEvent {
    nick: string;
    reason: string;
  }

  export interface NickEvent {
    nick: string;
    new_nick: string;
  }

  export interface JoinEvent {
    nick: string;
    channel: string;
  }

  export interface KickEvent {
    kicked: string;
    nick: string;
    channel: string;
    message: string;
  }

  export interface PongEvent {
    message: string;
  }

  export interface Connection {
    /** hadError skips the QUIT handshake and destroys the socket */
    end(data?: string, hadError?: boolean): void;
  }

  export class Client extends EventEmitter {
    connection?: Connection | null;
    constructor(options?: ClientOptions);
    connect(options?: ClientOptions): void;
    join(channel: string, key?: string): void;
    say(target: string, message: string): void;
    notice(target: string, message: string): void;
    changeNick(nick: string): void;
    ping(message?: string): void;
    quit(message?: string): void;
  }
}
