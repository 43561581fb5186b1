/**
 * voice-session-gateway
 *
 * Streaming voice conversations over WebSocket. Clients stream 16kHz mono
 * PCM; the gateway detects utterances, runs them through a speech/LLM
 * backend and streams the spoken reply back, cutting it off when the user
 * talks over it.
 *
 * Embed it with your own backend:
 *
 *   const config = resolveConfig();
 *   const manager = new SessionManager({ config, backend: myBridge });
 *   const server = new VoiceGatewayServer({ config: config.server, manager });
 *   await server.listen();
 */

export { resolveConfig, hasBackendCredentials } from "./src/config.js";
export type { RawConfig } from "./src/config.js";
export { createLogger, setLogLevel, silentLogger } from "./src/logger.js";
export type { Logger } from "./src/logger.js";

export {
  GatewayError,
  ProtocolError,
  SequenceError,
  AudioFormatError,
  BufferOverflowError,
  BackendTimeoutError,
  BackendUnavailableError,
  SessionNotFoundError,
  StateTransitionError,
  ConfigError,
} from "./src/errors.js";
export type { GatewayErrorKind } from "./src/errors.js";

export { VoiceActivityDetector, EndOfUtteranceDetector, calculateRms } from "./src/audio/vad.js";
export { AudioChunkPipeline, pcmToSamples, samplesToPcm, resample } from "./src/audio/audio-pipeline.js";
export { FrameBuffer } from "./src/audio/frame-buffer.js";

export {
  parseClientMessage,
  decodeAudioChunk,
  serializeServerMessage,
  encodeHex,
  decodeHex,
} from "./src/protocol/messages.js";
export type { ClientMessage, ServerMessage, AudioChunkMessage } from "./src/protocol/messages.js";

export { ConversationContext } from "./src/session/conversation-context.js";
export { VoiceSession, ResponseHandle, canTransition } from "./src/session/voice-session.js";
export type { SessionSnapshot } from "./src/session/voice-session.js";
export { InterruptionController } from "./src/session/interruption-controller.js";
export { SessionManager } from "./src/session/session-manager.js";
export type { SessionManagerOptions, SessionManagerStats } from "./src/session/session-manager.js";

export { createBackendBridge, callWithDeadline, iterateWithDeadline } from "./src/backend/backend-bridge.js";
export type {
  BackendBridge,
  BackendCallOptions,
  BackendResponse,
  SynthesizedAudio,
} from "./src/backend/backend-bridge.js";

export { VoiceGatewayServer } from "./src/server/gateway-server.js";
export type { VoiceGatewayServerOptions } from "./src/server/gateway-server.js";

export type * from "./src/types.js";
