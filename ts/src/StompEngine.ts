// Which layer a connect/disconnect callback refers to
export type StompConnectType = 'socket' | 'stomp';
export type StompDisconnectType = 'socket' | 'stomp';

export type StompErrorType = 'socket' | 'stomp' | 'serialization';

export interface StompEngineConnectOptions {
  /** Milliseconds to wait for the CONNECTED frame. */
  timeout: number;
  autoReconnect: boolean;
}

/**
 * Callback target of a StompEngine. The engine keeps a strong reference to it
 * until `delegate` is set back to undefined.
 */
export interface StompEngineDelegate {
  onConnect(engine: StompEngine, connectType: StompConnectType): void;
  onDisconnect(engine: StompEngine, disconnectType: StompDisconnectType): void;
  onMessageReceived(
    engine: StompEngine,
    message: unknown,
    messageId: string,
    destination: string,
    headers: Record<string, string>
  ): void;
  onError(
    engine: StompEngine,
    briefDescription: string,
    fullDescription: string | undefined,
    receiptId: string | undefined,
    type: StompErrorType
  ): void;
  onReceipt(engine: StompEngine, receiptId: string): void;
  onSocketEvent(eventName: string, description: string): void;
}

// STOMP framing, transport and reconnection; commands are fire-and-forget
export interface StompEngine {
  delegate: StompEngineDelegate | undefined;
  autoReconnect: boolean;

  connect(options: StompEngineConnectOptions): void;
  disconnect(force: boolean): void;
  subscribe(destination: string): void;
  unsubscribe(destination: string): void;
  send(body: unknown, destination: string): void;
  enableAutoPing(interval: number): void;
}
