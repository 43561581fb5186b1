// ── Audio format ──────────────────────────────────────────────────────────────

/** Wire and processing sample rate. Fixed for every session. */
export const SAMPLE_RATE = 16_000;

/** Mono only */
export const CHANNELS = 1;

/** Bytes per sample for 16-bit PCM */
export const BYTES_PER_SAMPLE = 2;

/** Samples per frame (≈64 ms at 16kHz) */
export const DEFAULT_FRAME_SAMPLES = 1_024;

/** Largest positive 16-bit sample, used to normalize PCM to [-1, 1] */
export const INT16_SCALE = 32_768;

// ── VAD ───────────────────────────────────────────────────────────────────────

/** RMS threshold on normalized samples */
export const DEFAULT_VAD_THRESHOLD = 0.01;

/** Above-threshold run needed before voice is reported (10 ms at 16kHz) */
export const DEFAULT_VAD_ACTIVATION_SAMPLES = 160;

/** Extra run the counter may bank past activation; sets how long voice outlasts energy */
export const DEFAULT_VAD_HANGOVER_SAMPLES = 1_024;

/** Silent frames after voice that close an utterance (≈512 ms) */
export const DEFAULT_END_OF_UTTERANCE_FRAMES = 8;

/** Silent frames kept ahead of voice onset (≈192 ms); older silence is dropped */
export const PRE_ROLL_FRAMES = 3;

// ── Session timing ────────────────────────────────────────────────────────────

/** Sessions idle longer than this are closed by the sweeper */
export const DEFAULT_IDLE_TIMEOUT_MS = 30 * 60_000;

/** How often the idle sweeper runs */
export const DEFAULT_SWEEP_INTERVAL_MS = 60_000;

/** Deadline for each backend call (transcribe, respond, synthesis start) */
export const DEFAULT_BACKEND_TIMEOUT_MS = 15_000;

/** Longest an interruption waits for the synthesis stream to acknowledge cancellation */
export const DEFAULT_CANCEL_TIMEOUT_MS = 250;

// ── Buffers ───────────────────────────────────────────────────────────────────

/** Inbound frames held per session (≈33 s of audio) */
export const DEFAULT_BUFFER_CAPACITY_FRAMES = 512;

/** Conversation turns kept in the sliding window */
export const DEFAULT_MAX_CONVERSATION_TURNS = 50;

// ── Server ────────────────────────────────────────────────────────────────────

export const DEFAULT_HOST = "0.0.0.0";
export const DEFAULT_PORT = 8_765;
export const DEFAULT_PATH = "/voice";

/** Largest WebSocket message accepted from a client */
export const DEFAULT_MAX_PAYLOAD_BYTES = 1024 * 1024;

// ── Backend ───────────────────────────────────────────────────────────────────

/** Maximum characters sent to TTS in one request (safety cap) */
export const TTS_MAX_CHARS = 4_000;

/** OpenAI TTS returns 24kHz mono PCM */
export const OPENAI_TTS_SAMPLE_RATE = 24_000;
