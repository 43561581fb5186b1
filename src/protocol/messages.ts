import { z } from "zod";
import type { EndReason } from "../types.js";
import { AudioFormatError, ProtocolError, type GatewayErrorKind } from "../errors.js";
import { BYTES_PER_SAMPLE, CHANNELS, SAMPLE_RATE } from "../constants.js";
import { pcmToSamples } from "../audio/audio-pipeline.js";

// ── Client → server ───────────────────────────────────────────────────────────

const HEX_RE = /^(?:[0-9a-fA-F]{2})*$/;

const sessionIdField = z.string().min(1).optional();

/** Epoch ms, or an ISO-8601 string with offset, normalized to epoch ms */
const timestampField = z
  .union([
    z.number().finite().nonnegative(),
    z.string().datetime({ offset: true }).transform((iso) => Date.parse(iso)),
  ])
  .optional();

const audioChunkSchema = z.object({
  type: z.literal("audio_chunk"),
  session_id: sessionIdField,
  audio_data: z.string().regex(HEX_RE, "audio_data must be hex-encoded bytes"),
  sequence_number: z.number().int().nonnegative(),
  timestamp: timestampField,
  sample_rate: z.number().int().positive().optional(),
  channels: z.number().int().positive().optional(),
});

const controlSchema = <T extends string>(type: T) =>
  z.object({
    type: z.literal(type),
    session_id: sessionIdField,
  });

export const clientMessageSchema = z.discriminatedUnion("type", [
  audioChunkSchema,
  controlSchema("start_listening"),
  controlSchema("stop_listening"),
  controlSchema("interrupt"),
  controlSchema("end_session"),
]);

export type ClientMessage = z.infer<typeof clientMessageSchema>;
export type AudioChunkMessage = z.infer<typeof audioChunkSchema>;
export type ClientMessageType = ClientMessage["type"];

const CLIENT_MESSAGE_TYPES: ReadonlySet<string> = new Set<ClientMessageType>([
  "audio_chunk",
  "start_listening",
  "stop_listening",
  "interrupt",
  "end_session",
]);

/**
 * Parse one text frame from the client.
 * @throws ProtocolError on bad JSON, unknown type or invalid fields
 */
export function parseClientMessage(raw: string): ClientMessage {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new ProtocolError("Message is not valid JSON", { cause: err });
  }

  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    throw new ProtocolError("Message must be a JSON object");
  }

  const type = "type" in data ? data.type : undefined;
  if (typeof type !== "string") {
    throw new ProtocolError('Message is missing a string "type" field');
  }
  if (!CLIENT_MESSAGE_TYPES.has(type)) {
    throw new ProtocolError(`Unknown message type "${type}"`);
  }

  const parsed = clientMessageSchema.safeParse(data);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ProtocolError(`Invalid ${type} message: ${detail}`);
  }
  return parsed.data;
}

/**
 * Decode and check the PCM carried by an audio_chunk.
 * @throws AudioFormatError when the chunk is not exactly one 16kHz mono 16-bit frame
 */
export function decodeAudioChunk(message: AudioChunkMessage, frameSamples: number): Int16Array {
  if (message.sample_rate !== undefined && message.sample_rate !== SAMPLE_RATE) {
    throw new AudioFormatError(`Unsupported sample rate ${message.sample_rate}; expected ${SAMPLE_RATE}`);
  }
  if (message.channels !== undefined && message.channels !== CHANNELS) {
    throw new AudioFormatError(`Unsupported channel count ${message.channels}; expected ${CHANNELS}`);
  }

  const pcm = decodeHex(message.audio_data);
  const expectedBytes = frameSamples * BYTES_PER_SAMPLE;
  if (pcm.length !== expectedBytes) {
    throw new AudioFormatError(
      `Frame ${message.sequence_number} has ${pcm.length} bytes; expected ${expectedBytes} (${frameSamples} samples)`
    );
  }
  return pcmToSamples(pcm);
}

// ── Server → client ───────────────────────────────────────────────────────────

export type ErrorMessageKind = GatewayErrorKind | "InternalError";

export type ServerMessage =
  | { type: "session_started" }
  | { type: "audio_chunk_ack"; sequence_number: number }
  | { type: "transcription"; text: string }
  | {
      type: "response";
      text: string;
      audio_data?: string;
      sequence_number?: number;
      sample_rate?: number;
    }
  | { type: "listening_started" }
  | { type: "listening_stopped" }
  | { type: "interruption" }
  | { type: "error"; message: string; kind: ErrorMessageKind }
  | { type: "session_ended"; reason: EndReason };

export type ServerMessageType = ServerMessage["type"];

/** Wire form: the message plus `session_id` and an ISO `timestamp`. */
export function serializeServerMessage(sessionId: string, message: ServerMessage, now: number): string {
  return JSON.stringify({
    ...message,
    session_id: sessionId,
    timestamp: new Date(now).toISOString(),
  });
}

// ── Hex codec ─────────────────────────────────────────────────────────────────

export function encodeHex(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("hex");
}

export function decodeHex(hex: string): Buffer {
  return Buffer.from(hex, "hex");
}
