import { z } from "zod";
import type { ResolvedConfig } from "./types.js";
import { ConfigError } from "./errors.js";
import {
  DEFAULT_BACKEND_TIMEOUT_MS,
  DEFAULT_BUFFER_CAPACITY_FRAMES,
  DEFAULT_CANCEL_TIMEOUT_MS,
  DEFAULT_END_OF_UTTERANCE_FRAMES,
  DEFAULT_FRAME_SAMPLES,
  DEFAULT_HOST,
  DEFAULT_IDLE_TIMEOUT_MS,
  DEFAULT_MAX_CONVERSATION_TURNS,
  DEFAULT_MAX_PAYLOAD_BYTES,
  DEFAULT_PATH,
  DEFAULT_PORT,
  DEFAULT_SWEEP_INTERVAL_MS,
  DEFAULT_VAD_ACTIVATION_SAMPLES,
  DEFAULT_VAD_HANGOVER_SAMPLES,
  DEFAULT_VAD_THRESHOLD,
} from "./constants.js";

// ── Raw input type ────────────────────────────────────────────────────────────

export interface RawConfig {
  server?: {
    host?: string;
    port?: number;
    path?: string;
    maxPayloadBytes?: number;
  };
  audio?: {
    frameSamples?: number;
  };
  vad?: {
    threshold?: number;
    activationSamples?: number;
    hangoverSamples?: number;
    endOfUtteranceFrames?: number;
  };
  session?: {
    idleTimeoutMs?: number;
    sweepIntervalMs?: number;
    bufferCapacityFrames?: number;
    maxConversationTurns?: number;
    backendTimeoutMs?: number;
    cancelTimeoutMs?: number;
  };
  backend?: {
    provider?: string;
    openai?: {
      apiKey?: string;
      baseUrl?: string;
      sttModel?: string;
      chatModel?: string;
      ttsModel?: string;
      voice?: string;
      instructions?: string;
      language?: string;
    };
  };
  logLevel?: string;
}

// ── Validation ────────────────────────────────────────────────────────────────

const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();

const configSchema = z.object({
  server: z.object({
    host: z.string().min(1),
    port: z.number().int().min(0).max(65_535),
    path: z.string().startsWith("/", "must start with /"),
    maxPayloadBytes: positiveInt,
  }),
  audio: z.object({
    frameSamples: positiveInt,
  }),
  vad: z.object({
    threshold: z.number().gt(0).max(1),
    activationSamples: nonNegativeInt,
    hangoverSamples: nonNegativeInt,
    endOfUtteranceFrames: positiveInt,
  }),
  session: z.object({
    idleTimeoutMs: positiveInt,
    sweepIntervalMs: positiveInt,
    bufferCapacityFrames: positiveInt,
    maxConversationTurns: positiveInt,
    backendTimeoutMs: positiveInt,
    cancelTimeoutMs: positiveInt,
  }),
  backend: z.object({
    provider: z.literal("openai"),
    openai: z.object({
      apiKey: z.string(),
      baseUrl: z.string().url(),
      sttModel: z.string().min(1),
      chatModel: z.string().min(1),
      ttsModel: z.string().min(1),
      voice: z.string().min(1),
      instructions: z.string().optional(),
      language: z.string().optional(),
    }),
  }),
  logLevel: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]),
});

// ── Helpers ───────────────────────────────────────────────────────────────────

function env(key: string): string | undefined {
  const value = process.env[key];
  return value === undefined || value === "" ? undefined : value;
}

/** Numeric env var; a non-numeric value yields NaN so validation reports it. */
function envNumber(key: string): number | undefined {
  const value = env(key);
  return value === undefined ? undefined : Number(value);
}

// ── Main resolver ─────────────────────────────────────────────────────────────

/**
 * Resolve config from `raw`, then environment variables, then defaults.
 * @throws ConfigError listing every invalid field
 */
export function resolveConfig(raw: RawConfig = {}): ResolvedConfig {
  const candidate = {
    server: resolveServer(raw.server),
    audio: { frameSamples: raw.audio?.frameSamples ?? DEFAULT_FRAME_SAMPLES },
    vad: resolveVad(raw.vad),
    session: resolveSession(raw.session),
    backend: resolveBackend(raw.backend),
    logLevel: raw.logLevel ?? env("LOG_LEVEL") ?? "info",
  };

  const result = configSchema.safeParse(candidate);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }
  return result.data;
}

function resolveServer(raw?: RawConfig["server"]) {
  return {
    host: raw?.host ?? env("VOICE_GATEWAY_HOST") ?? DEFAULT_HOST,
    port: raw?.port ?? envNumber("VOICE_GATEWAY_PORT") ?? DEFAULT_PORT,
    path: raw?.path ?? env("VOICE_GATEWAY_PATH") ?? DEFAULT_PATH,
    maxPayloadBytes: raw?.maxPayloadBytes ?? DEFAULT_MAX_PAYLOAD_BYTES,
  };
}

function resolveVad(raw?: RawConfig["vad"]) {
  return {
    threshold: raw?.threshold ?? envNumber("VAD_THRESHOLD") ?? DEFAULT_VAD_THRESHOLD,
    activationSamples: raw?.activationSamples ?? DEFAULT_VAD_ACTIVATION_SAMPLES,
    hangoverSamples: raw?.hangoverSamples ?? DEFAULT_VAD_HANGOVER_SAMPLES,
    endOfUtteranceFrames: raw?.endOfUtteranceFrames ?? DEFAULT_END_OF_UTTERANCE_FRAMES,
  };
}

function resolveSession(raw?: RawConfig["session"]) {
  return {
    idleTimeoutMs: raw?.idleTimeoutMs ?? envNumber("SESSION_IDLE_TIMEOUT_MS") ?? DEFAULT_IDLE_TIMEOUT_MS,
    sweepIntervalMs: raw?.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS,
    bufferCapacityFrames: raw?.bufferCapacityFrames ?? DEFAULT_BUFFER_CAPACITY_FRAMES,
    maxConversationTurns: raw?.maxConversationTurns ?? DEFAULT_MAX_CONVERSATION_TURNS,
    backendTimeoutMs: raw?.backendTimeoutMs ?? DEFAULT_BACKEND_TIMEOUT_MS,
    cancelTimeoutMs: raw?.cancelTimeoutMs ?? DEFAULT_CANCEL_TIMEOUT_MS,
  };
}

function resolveBackend(raw?: RawConfig["backend"]) {
  return {
    provider: raw?.provider ?? "openai",
    openai: {
      apiKey: raw?.openai?.apiKey ?? env("OPENAI_API_KEY") ?? "",
      baseUrl: raw?.openai?.baseUrl ?? env("OPENAI_BASE_URL") ?? "https://api.openai.com/v1",
      sttModel: raw?.openai?.sttModel ?? "whisper-1",
      chatModel: raw?.openai?.chatModel ?? "gpt-4o-mini",
      ttsModel: raw?.openai?.ttsModel ?? "tts-1",
      voice: raw?.openai?.voice ?? "alloy",
      instructions: raw?.openai?.instructions,
      language: raw?.openai?.language,
    },
  };
}

// ── Credential checks ─────────────────────────────────────────────────────────

export function hasBackendCredentials(config: ResolvedConfig): boolean {
  return config.backend.openai.apiKey.length > 0;
}
