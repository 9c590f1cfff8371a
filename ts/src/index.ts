// Main exports for the stomp-socket library
export {
  StompSocket,
  DEFAULT_CONNECTION_TIMEOUT,
  DEFAULT_AUTO_PING_INTERVAL,
  type StompConnectionState,
  type StompSocketEventHandler,
  type StompSocketOptions,
} from './StompSocket.js';
export type { StompSocketEvent, StompSocketEventType } from './StompSocketEvent.js';
export {
  StompSocketError,
  AlreadyConnectedError,
  NotConnectedError,
  type StompSocketErrorCode,
} from './StompSocketError.js';
export {
  payloadType,
  guardPayloadType,
  decodePayload,
  createJsonDecoder,
  jsonDecoder,
  textDecoder,
  type PayloadType,
  type PayloadDecoder,
  type DecodedPayload,
  type JsonDecoderOptions,
} from './PayloadType.js';
export type {
  StompEngine,
  StompEngineDelegate,
  StompEngineConnectOptions,
  StompConnectType,
  StompDisconnectType,
  StompErrorType,
} from './StompEngine.js';
export {
  WebSocketStompEngine,
  createWebSocket,
  STOMP_SUBPROTOCOLS,
  type StompWebSocket,
  type StompWebSocketFactory,
  type StompWebSocketListeners,
  type WebSocketStompEngineConfig,
} from './WebSocketStompEngine.js';
export { type StompFrame, type SplitFrames, StompFrameUtils } from './StompFrame.js';
export { logger, LOG_LEVEL_ENV } from './utils/logger.js';
