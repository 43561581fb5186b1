// ── Session ───────────────────────────────────────────────────────────────────

export type SessionState =
  | "init"
  | "listening"
  | "processing"
  | "speaking"
  | "interrupted"
  | "closed";

export type EndReason =
  | "client_closed"
  | "idle_timeout"
  | "connection_error"
  | "protocol_error"
  | "sequence_error"
  | "internal_error"
  | "server_shutdown";

/**
 * Transport seen by a session. The WebSocket server adapts each socket to
 * this; tests use an in-memory recorder.
 */
export interface SessionConnection {
  readonly remoteAddress: string;
  send(data: string): void;
  close(code?: number, reason?: string): void;
}

// ── Audio ─────────────────────────────────────────────────────────────────────

export interface AudioFrame {
  sequenceNumber: number;
  /** Exactly one frame's worth of 16-bit mono samples */
  samples: Int16Array;
  hasVoice: boolean;
  /** Capture time, epoch ms */
  timestamp: number;
}

// ── Conversation ──────────────────────────────────────────────────────────────

export interface ConversationTurn {
  role: "user" | "assistant";
  text: string;
  audioRef?: string | undefined;
  timestamp: number;
  /** Set on assistant turns cut short by barge-in */
  interrupted?: boolean | undefined;
}

/** Read-only view of a session's conversation, handed to the backend with each reply request */
export interface ConversationSnapshot {
  history: readonly ConversationTurn[];
  topic?: string | undefined;
  preferences: Readonly<Record<string, string>>;
}

/** Context changes a backend returns with its reply */
export interface ConversationUpdate {
  topic?: string | undefined;
  preferences?: Readonly<Record<string, string>> | undefined;
}

// ── Config ────────────────────────────────────────────────────────────────────

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";
export type BackendProviderName = "openai";

export interface ResolvedServerConfig {
  host: string;
  port: number;
  path: string;
  maxPayloadBytes: number;
}

export interface ResolvedAudioConfig {
  frameSamples: number;
}

export interface ResolvedVadConfig {
  threshold: number;
  activationSamples: number;
  hangoverSamples: number;
  endOfUtteranceFrames: number;
}

export interface ResolvedSessionConfig {
  idleTimeoutMs: number;
  sweepIntervalMs: number;
  bufferCapacityFrames: number;
  maxConversationTurns: number;
  backendTimeoutMs: number;
  cancelTimeoutMs: number;
}

export interface ResolvedOpenAiBackendConfig {
  apiKey: string;
  baseUrl: string;
  sttModel: string;
  chatModel: string;
  ttsModel: string;
  voice: string;
  instructions?: string | undefined;
  language?: string | undefined;
}

export interface ResolvedBackendConfig {
  provider: BackendProviderName;
  openai: ResolvedOpenAiBackendConfig;
}

export interface ResolvedConfig {
  server: ResolvedServerConfig;
  audio: ResolvedAudioConfig;
  vad: ResolvedVadConfig;
  session: ResolvedSessionConfig;
  backend: ResolvedBackendConfig;
  logLevel: LogLevel;
}
