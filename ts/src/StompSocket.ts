import { type PayloadDecoder, type PayloadType, decodePayload, jsonDecoder } from './PayloadType.js';
import type {
  StompConnectType,
  StompDisconnectType,
  StompEngine,
  StompEngineDelegate,
  StompErrorType,
} from './StompEngine.js';
import { AlreadyConnectedError, NotConnectedError } from './StompSocketError.js';
import type { StompSocketEvent } from './StompSocketEvent.js';
import { WebSocketStompEngine } from './WebSocketStompEngine.js';
import { logger } from './utils/logger.js';

export type StompConnectionState = 'disconnected' | 'connecting' | 'socketConnected' | 'fullyConnected';

export type StompSocketEventHandler<TPayload> = (
  socket: StompSocket<TPayload>,
  event: StompSocketEvent<TPayload>
) => void;

export interface StompSocketOptions<TPayload = unknown> {
  /** Endpoint that accepts a websocket connection. */
  url: string;
  /** Additional connection headers. */
  headers?: Record<string, string>;
  /** Connection timeout in milliseconds. */
  connectionTimeout?: number;
  /** Auto-ping interval in milliseconds, started once STOMP is connected. */
  autoPingInterval?: number;
  /** Types tried, in order, when decoding a received message. */
  payloadTypes?: readonly PayloadType<TPayload>[];
  decoder?: PayloadDecoder;
  eventHandler?: StompSocketEventHandler<TPayload>;
  /** Defaults to a WebSocketStompEngine for `url` and `headers`. */
  engine?: StompEngine;
}

export const DEFAULT_CONNECTION_TIMEOUT = 10_000;
export const DEFAULT_AUTO_PING_INTERVAL = 10_000;

/**
 * STOMP session façade over a websocket.
 *
 * Only admits operations that are valid for the current connection state and
 * turns engine callbacks into {@link StompSocketEvent}s. The engine keeps a strong
 * reference to this object as its delegate until the socket is disconnected.
 */
export class StompSocket<TPayload = unknown> implements StompEngineDelegate {
  private readonly engine: StompEngine;
  private readonly connectionTimeout: number;
  private readonly autoPingInterval: number;
  private readonly payloadTypes: readonly PayloadType<TPayload>[];
  private readonly decoder: PayloadDecoder;

  private eventHandler: StompSocketEventHandler<TPayload>;
  private state: StompConnectionState = 'disconnected';

  constructor(options: StompSocketOptions<TPayload>) {
    this.engine = options.engine ?? new WebSocketStompEngine({ url: options.url, headers: options.headers ?? {} });
    this.connectionTimeout = options.connectionTimeout ?? DEFAULT_CONNECTION_TIMEOUT;
    this.autoPingInterval = options.autoPingInterval ?? DEFAULT_AUTO_PING_INTERVAL;
    this.payloadTypes = Object.freeze([...(options.payloadTypes ?? [])]);
    this.decoder = options.decoder ?? jsonDecoder;
    this.eventHandler = options.eventHandler ?? (() => undefined);
  }

  /** True iff both the socket and the STOMP session are connected. */
  get isConnectedViaSTOMP(): boolean {
    return this.state === 'fullyConnected';
  }

  get isConnecting(): boolean {
    return this.state === 'connecting';
  }

  get connectionState(): StompConnectionState {
    return this.state;
  }

  /** Replaces the current event handler. */
  setEventHandler(handler: StompSocketEventHandler<TPayload>): void {
    this.eventHandler = handler;
  }

  /**
   * Starts connecting with auto-reconnect enabled. Does nothing while a
   * connection attempt is already running.
   * @throws AlreadyConnectedError when STOMP is already connected
   */
  connect(): void {
    if (this.isConnecting) {
      return;
    }
    if (this.isConnectedViaSTOMP) {
      throw new AlreadyConnectedError();
    }
    this.engine.delegate = this;
    this.engine.connect({ timeout: this.connectionTimeout, autoReconnect: true });
    this.state = 'connecting';
    this.emit({ type: 'connecting' });
  }

  /**
   * Disconnects without reconnecting. A forced disconnect drops the socket
   * without notifying the server and reports `disconnected` immediately;
   * otherwise `disconnected` follows once the socket has closed.
   */
  disconnect(force = false): void {
    this.engine.autoReconnect = false;
    this.engine.disconnect(force);
    if (force) {
      this.engine.delegate = undefined;
      this.state = 'disconnected';
      this.emit({ type: 'disconnected' });
    }
  }

  /** @throws NotConnectedError unless STOMP is connected */
  subscribe(destination: string): void {
    this.ensureConnected('subscribe');
    this.engine.subscribe(destination);
  }

  /** @throws NotConnectedError unless STOMP is connected */
  unsubscribe(destination: string): void {
    this.ensureConnected('unsubscribe');
    this.engine.unsubscribe(destination);
  }

  /** @throws NotConnectedError unless STOMP is connected */
  send(payload: unknown, destination: string): void {
    this.ensureConnected('send');
    this.engine.send(payload, destination);
  }

  private ensureConnected(operation: string): void {
    if (!this.isConnectedViaSTOMP) {
      logger.warn('Rejected operation, not connected via STOMP', { operation, state: this.state });
      throw new NotConnectedError(operation);
    }
  }

  private emit(event: StompSocketEvent<TPayload>): void {
    try {
      this.eventHandler(this, event);
    } catch (error) {
      logger.error('Error in event handler', {
        event: event.type,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  // Engine callbacks

  onConnect(_engine: StompEngine, connectType: StompConnectType): void {
    switch (connectType) {
      case 'socket':
        this.state = 'socketConnected';
        break;
      case 'stomp':
        // Pings only make sense once STOMP is up
        this.engine.enableAutoPing(this.autoPingInterval);
        this.state = 'fullyConnected';
        this.emit({ type: 'connected' });
        break;
    }
  }

  onDisconnect(_engine: StompEngine, disconnectType: StompDisconnectType): void {
    switch (disconnectType) {
      case 'socket':
        this.emit({ type: 'disconnected' });
        this.engine.delegate = undefined;
        this.state = 'disconnected';
        break;
      case 'stomp':
        // The socket is still open; with auto-reconnect the engine brings STOMP back itself.
        if (this.state === 'fullyConnected') {
          this.state = 'socketConnected';
        }
        logger.debug('STOMP session dropped, socket still open');
        break;
    }
  }

  onMessageReceived(
    _engine: StompEngine,
    message: unknown,
    _messageId: string,
    destination: string,
    _headers: Record<string, string>
  ): void {
    const bytes = toBytes(message);
    if (!bytes) {
      return;
    }
    const decoded = decodePayload(bytes, this.payloadTypes, this.decoder);
    if (!decoded) {
      logger.debug('Dropped message matching no payload type', { destination });
      return;
    }
    this.emit({
      type: 'payloadReceived',
      payload: decoded.value,
      payloadType: decoded.type,
      destination,
    });
  }

  onError(
    _engine: StompEngine,
    briefDescription: string,
    _fullDescription: string | undefined,
    _receiptId: string | undefined,
    _type: StompErrorType
  ): void {
    this.emit({ type: 'errorReceived', description: briefDescription });
  }

  onReceipt(_engine: StompEngine, receiptId: string): void {
    logger.debug('Receipt received', { receiptId });
  }

  onSocketEvent(eventName: string, description: string): void {
    logger.debug('Socket event', { eventName, description });
  }
}

const textEncoder = new TextEncoder();

function toBytes(message: unknown): Uint8Array | undefined {
  if (typeof message === 'string') {
    return textEncoder.encode(message);
  }
  if (message instanceof Uint8Array) {
    return message;
  }
  if (message instanceof ArrayBuffer) {
    return new Uint8Array(message);
  }
  return undefined;
}
