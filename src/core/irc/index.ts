export { IrcNotifier, type ChatIdentity, type ConnectionState, type IrcNotifierOptions } from './notifier.js';
export { IrcFrameworkTransport, BaseChatTransport, type ChatTransport, type ChatConnectOptions, type ChatTransportEvents } from './transport.js';
export { NickLadder, buildNickLadder, ircFold } from './nick-ladder.js';
