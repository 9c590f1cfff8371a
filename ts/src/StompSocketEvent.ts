/**
 * Events emitted by a StompSocket to its event handler, in emission order.
 */
export type StompSocketEvent<TPayload = unknown> =
  /** Connection request has just been sent to the server. */
  | { readonly type: 'connecting' }
  /** Both the socket and the STOMP session are up and ready to send. */
  | { readonly type: 'connected' }
  /** The socket is closed and will not reconnect until connect() is called again. */
  | { readonly type: 'disconnected' }
  /** A message body decoded as one of the configured payload types. */
  | {
      readonly type: 'payloadReceived';
      readonly payload: TPayload;
      readonly payloadType: string;
      readonly destination: string;
    }
  /** Transport or protocol error reported by the engine. */
  | { readonly type: 'errorReceived'; readonly description: string };

export type StompSocketEventType = StompSocketEvent['type'];
