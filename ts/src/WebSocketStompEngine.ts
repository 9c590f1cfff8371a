import WebSocket from 'ws';
import { STOMP_HEARTBEAT_EOL, type StompFrame, StompFrameUtils } from './StompFrame.js';
import type {
  StompEngine,
  StompEngineConnectOptions,
  StompEngineDelegate,
} from './StompEngine.js';
import { logger } from './utils/logger.js';

export const STOMP_SUBPROTOCOLS = ['v12.stomp', 'v11.stomp'] as const;

// Socket callbacks the engine listens to
export interface StompWebSocketListeners {
  onOpen(): void;
  onMessage(data: string): void;
  onClose(code: number, reason: string): void;
  onError(error: Error): void;
}

// The part of a websocket the engine writes to
export interface StompWebSocket {
  send(data: string): void;
  close(): void;
  terminate(): void;
}

export type StompWebSocketFactory = (
  url: string,
  headers: Record<string, string>,
  listeners: StompWebSocketListeners
) => StompWebSocket;

export interface WebSocketStompEngineConfig {
  url: string;
  headers: Record<string, string>;
  /** Delay before an automatic reconnect, in milliseconds. */
  reconnectDelay: number;
  /** How long a graceful disconnect waits for the DISCONNECT receipt, in milliseconds. */
  disconnectTimeout: number;
  createWebSocket: StompWebSocketFactory;
}

type EngineStatus = 'disconnected' | 'connecting' | 'socketConnected' | 'fullyConnected';

function rawDataToBuffer(data: WebSocket.RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

export const createWebSocket: StompWebSocketFactory = (url, headers, listeners) => {
  const ws = new WebSocket(url, [...STOMP_SUBPROTOCOLS], { headers });
  ws.on('open', () => listeners.onOpen());
  ws.on('message', (data: WebSocket.RawData) => listeners.onMessage(rawDataToBuffer(data).toString('utf8')));
  ws.on('close', (code: number, reason: Buffer) => listeners.onClose(code, reason.toString('utf8')));
  ws.on('error', (error: Error) => listeners.onError(error));
  return ws;
};

const DEFAULT_CONFIG: Omit<WebSocketStompEngineConfig, 'url'> = {
  headers: {},
  reconnectDelay: 3000,
  disconnectTimeout: 2000,
  createWebSocket,
};

interface EncodedBody {
  body: string;
  contentType: string;
}

// STOMP over websocket engine
export class WebSocketStompEngine implements StompEngine {
  delegate: StompEngineDelegate | undefined;
  autoReconnect = false;

  private readonly config: WebSocketStompEngineConfig;

  private socket?: StompWebSocket;
  private status: EngineStatus = 'disconnected';
  private buffer = '';
  private connectTimeout = 0;
  private disconnectRequested = false;
  private stompDisconnectReported = false;
  private sessionId?: string;

  private connectTimer?: ReturnType<typeof setTimeout>;
  private reconnectTimer?: ReturnType<typeof setTimeout>;
  private disconnectTimer?: ReturnType<typeof setTimeout>;
  private pingTimer?: ReturnType<typeof setInterval>;

  // Destination -> subscription id, kept across reconnects
  private readonly subscriptions = new Map<string, string>();
  private subscriptionCounter = 0;
  private receiptCounter = 0;
  private pendingDisconnectReceipt?: string;

  constructor(config: Partial<WebSocketStompEngineConfig> & Pick<WebSocketStompEngineConfig, 'url'>) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  // Connection management
  connect(options: StompEngineConnectOptions): void {
    if (this.status !== 'disconnected') {
      logger.debug('Connect joins the running connection', { status: this.status });
      this.autoReconnect = options.autoReconnect;
      this.disconnectRequested = false;
      this.replayConnectedState();
      return;
    }

    this.autoReconnect = options.autoReconnect;
    this.connectTimeout = options.timeout;
    this.disconnectRequested = false;
    this.clearTimer('reconnect');
    this.openSocket();
  }

  disconnect(force: boolean): void {
    this.disconnectRequested = true;
    this.clearTimer('reconnect');

    const socket = this.socket;
    if (!socket) return;

    if (force) {
      // Detach first: the late close event of this socket is ignored
      logger.info('Force disconnecting from STOMP server', { url: this.config.url });
      this.clearTimers();
      this.socket = undefined;
      this.status = 'disconnected';
      this.buffer = '';
      this.pendingDisconnectReceipt = undefined;
      socket.terminate();
      return;
    }

    if (this.status !== 'fullyConnected') {
      socket.close();
      return;
    }

    const receipt = `disconnect-${++this.receiptCounter}`;
    this.pendingDisconnectReceipt = receipt;
    this.sendFrame(StompFrameUtils.disconnect(receipt));
    this.disconnectTimer = setTimeout(() => {
      logger.warn('No DISCONNECT receipt received, closing socket', { receipt });
      this.closeAfterDisconnect();
    }, this.config.disconnectTimeout);
  }

  // Subscription management
  subscribe(destination: string): void {
    if (this.subscriptions.has(destination)) {
      logger.debug('Already subscribed', { destination });
      return;
    }

    const subscriptionId = `sub-${++this.subscriptionCounter}`;
    this.subscriptions.set(destination, subscriptionId);

    if (this.status === 'fullyConnected') {
      this.sendFrame(StompFrameUtils.subscribe(destination, subscriptionId));
    }
    logger.info('Subscribed', { destination, subscriptionId });
  }

  unsubscribe(destination: string): void {
    const subscriptionId = this.subscriptions.get(destination);
    if (!subscriptionId) return;

    this.subscriptions.delete(destination);
    if (this.status === 'fullyConnected') {
      this.sendFrame(StompFrameUtils.unsubscribe(subscriptionId));
    }
    logger.info('Unsubscribed', { destination, subscriptionId });
  }

  // Message sending
  send(body: unknown, destination: string): void {
    let encoded: EncodedBody;
    try {
      encoded = this.encodeBody(body);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error('Failed to encode message body', { destination, error: message });
      setTimeout(() => {
        this.delegate?.onError(this, 'Failed to encode message body', message, undefined, 'serialization');
      }, 0);
      return;
    }

    this.sendFrame(StompFrameUtils.send(destination, encoded.body, encoded.contentType));
    logger.debug('Sent message', { destination, contentType: encoded.contentType });
  }

  enableAutoPing(interval: number): void {
    this.clearTimer('ping');
    this.pingTimer = setInterval(() => {
      this.socket?.send(STOMP_HEARTBEAT_EOL);
    }, interval);
  }

  // Status methods
  isConnected(): boolean {
    return this.status === 'fullyConnected';
  }

  getSessionId(): string | undefined {
    return this.sessionId;
  }

  getActiveSubscriptions(): Set<string> {
    return new Set(this.subscriptions.keys());
  }

  private encodeBody(body: unknown): EncodedBody {
    if (typeof body === 'string') {
      return { body, contentType: 'text/plain' };
    }
    if (body instanceof Uint8Array) {
      return { body: Buffer.from(body).toString('utf8'), contentType: 'application/octet-stream' };
    }
    const json: unknown = JSON.stringify(body);
    if (typeof json !== 'string') {
      throw new Error(`Value of type ${typeof body} has no JSON representation`);
    }
    return { body: json, contentType: 'application/json' };
  }

  private openSocket(): void {
    this.status = 'connecting';
    this.buffer = '';
    this.stompDisconnectReported = false;
    logger.info('Connecting to STOMP server', { url: this.config.url });

    let socket: StompWebSocket | undefined;
    const isCurrent = (): boolean => socket !== undefined && socket === this.socket;

    try {
      socket = this.config.createWebSocket(this.config.url, this.config.headers, {
        onOpen: () => {
          if (isCurrent()) this.handleOpen();
        },
        onMessage: (data) => {
          if (isCurrent()) this.handleData(data);
        },
        onClose: (code, reason) => {
          if (isCurrent()) this.handleClose(code, reason);
        },
        onError: (error) => {
          if (isCurrent()) this.handleSocketError(error);
        },
      });
    } catch (error) {
      this.handleOpenFailure(error);
      return;
    }
    this.socket = socket;

    this.connectTimer = setTimeout(() => {
      if (!isCurrent() || this.status === 'fullyConnected') return;
      logger.error('Connection timeout - no CONNECTED frame received', { url: this.config.url });
      this.delegate?.onError(
        this,
        'Connection timeout',
        `No CONNECTED frame received within ${this.connectTimeout}ms`,
        undefined,
        'socket'
      );
      this.socket?.terminate();
    }, this.connectTimeout);
  }

  // A delegate attached to an already connected engine still hears about the session
  private replayConnectedState(): void {
    if (this.status !== 'fullyConnected') return;

    const socket = this.socket;
    setTimeout(() => {
      if (socket === undefined || socket !== this.socket || this.status !== 'fullyConnected') return;
      this.delegate?.onConnect(this, 'stomp');
    }, 0);
  }

  // The socket could not even be created (bad URL, bad headers)
  private handleOpenFailure(error: unknown): void {
    const message = error instanceof Error ? error.message : String(error);
    this.status = 'disconnected';
    logger.error('Failed to open socket', { url: this.config.url, error: message });

    // Callbacks never run inside the command that caused them
    setTimeout(() => {
      this.delegate?.onError(this, `Failed to connect to STOMP server: ${message}`, undefined, undefined, 'socket');
      this.delegate?.onDisconnect(this, 'socket');
    }, 0);
  }

  private handleOpen(): void {
    this.status = 'socketConnected';
    logger.info('Socket connected', { url: this.config.url });
    this.delegate?.onConnect(this, 'socket');

    const host = new URL(this.config.url).hostname;
    this.sendFrame(StompFrameUtils.connect(host, this.config.headers));
  }

  private handleData(data: string): void {
    const { frames, rest } = StompFrameUtils.split(this.buffer + data);
    this.buffer = rest;

    for (const frameData of frames) {
      const frame = StompFrameUtils.parse(frameData);
      if (frame) {
        this.handleIncomingFrame(frame);
      }
    }
  }

  private handleIncomingFrame(frame: StompFrame): void {
    logger.debug('Received frame', { command: frame.command });
    switch (frame.command) {
      case 'CONNECTED':
        this.handleConnected(frame);
        break;
      case 'MESSAGE':
        this.handleMessage(frame);
        break;
      case 'RECEIPT':
        this.handleReceipt(frame);
        break;
      case 'ERROR':
        this.handleError(frame);
        break;
      default:
        logger.warn('Received unknown frame', { command: frame.command });
    }
  }

  private handleConnected(frame: StompFrame): void {
    this.clearTimer('connect');
    this.status = 'fullyConnected';
    this.sessionId = frame.headers['session'];

    logger.info('Connected to STOMP server', { session: this.sessionId });
    this.delegate?.onConnect(this, 'stomp');

    for (const [destination, subscriptionId] of this.subscriptions) {
      this.sendFrame(StompFrameUtils.subscribe(destination, subscriptionId));
    }
  }

  private handleMessage(frame: StompFrame): void {
    const destination = frame.headers['destination'];
    if (destination === undefined) {
      logger.warn('MESSAGE frame without destination', { headers: frame.headers });
      return;
    }

    const messageId = frame.headers['message-id'] ?? '';
    this.delegate?.onMessageReceived(this, frame.body, messageId, destination, frame.headers);
  }

  private handleReceipt(frame: StompFrame): void {
    const receiptId = frame.headers['receipt-id'];
    if (receiptId === undefined) return;

    this.delegate?.onReceipt(this, receiptId);

    if (receiptId === this.pendingDisconnectReceipt) {
      this.closeAfterDisconnect();
    }
  }

  private handleError(frame: StompFrame): void {
    const message = frame.headers['message'] ?? 'Unknown error';
    logger.error('STOMP error', { message, details: frame.body });

    this.delegate?.onError(
      this,
      message,
      frame.body.length > 0 ? frame.body : undefined,
      frame.headers['receipt-id'],
      'stomp'
    );
  }

  private closeAfterDisconnect(): void {
    this.clearTimer('disconnect');
    this.pendingDisconnectReceipt = undefined;
    this.reportStompDisconnect();
    this.socket?.close();
  }

  private reportStompDisconnect(): void {
    if (this.status !== 'fullyConnected' || this.stompDisconnectReported) return;
    this.stompDisconnectReported = true;
    this.status = 'socketConnected';
    this.delegate?.onDisconnect(this, 'stomp');
  }

  private handleClose(code: number, reason: string): void {
    this.clearTimers();
    this.reportStompDisconnect();

    this.socket = undefined;
    this.status = 'disconnected';
    this.buffer = '';
    this.pendingDisconnectReceipt = undefined;

    logger.info('Socket closed', { code, reason });
    this.delegate?.onSocketEvent('close', `${code} ${reason}`.trim());
    this.delegate?.onDisconnect(this, 'socket');

    // A delegate released on the socket disconnect means nobody is listening anymore
    if (this.autoReconnect && !this.disconnectRequested && this.delegate) {
      logger.info('Reconnecting', { delay: this.config.reconnectDelay });
      this.reconnectTimer = setTimeout(() => {
        this.reconnectTimer = undefined;
        if (this.status === 'disconnected' && this.delegate) {
          this.openSocket();
        }
      }, this.config.reconnectDelay);
    }
  }

  private handleSocketError(error: Error): void {
    this.delegate?.onSocketEvent('error', error.message);
    // Closing a socket mid-handshake errors too; that close was asked for
    if (this.disconnectRequested) {
      logger.debug('Socket error after disconnect request', { error: error.message });
      return;
    }
    logger.error('Socket error', { error: error.message });
    this.delegate?.onError(this, error.message, undefined, undefined, 'socket');
  }

  // Frame processing
  private sendFrame(frame: StompFrame): void {
    if (!this.socket) return;
    this.socket.send(StompFrameUtils.serialize(frame));
  }

  private clearTimer(timer: 'connect' | 'reconnect' | 'disconnect' | 'ping'): void {
    switch (timer) {
      case 'connect':
        clearTimeout(this.connectTimer);
        this.connectTimer = undefined;
        break;
      case 'reconnect':
        clearTimeout(this.reconnectTimer);
        this.reconnectTimer = undefined;
        break;
      case 'disconnect':
        clearTimeout(this.disconnectTimer);
        this.disconnectTimer = undefined;
        break;
      case 'ping':
        clearInterval(this.pingTimer);
        this.pingTimer = undefined;
        break;
    }
  }

  private clearTimers(): void {
    this.clearTimer('connect');
    this.clearTimer('disconnect');
    this.clearTimer('ping');
  }
}
