import { z } from "zod";
import type { AudioFrame, ConversationSnapshot, ResolvedOpenAiBackendConfig } from "../types.js";
import type {
  BackendBridge,
  BackendCallOptions,
  BackendResponse,
  SynthesizedAudio,
} from "../backend/backend-bridge.js";
import { framesToPcm } from "../audio/audio-pipeline.js";
import {
  BYTES_PER_SAMPLE,
  CHANNELS,
  OPENAI_TTS_SAMPLE_RATE,
  SAMPLE_RATE,
  TTS_MAX_CHARS,
} from "../constants.js";

const transcriptionSchema = z.object({ text: z.string() });

const chatCompletionSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable() }) }))
    .min(1),
});

const DEFAULT_INSTRUCTIONS =
  "You are a helpful voice assistant. Answer in short, natural spoken sentences.";

/**
 * BackendBridge over the OpenAI REST API:
 *   transcribe → Whisper (batch, WAV upload)
 *   respond    → Chat Completions
 *   synthesize → streaming TTS (24kHz mono PCM)
 *
 * Stateless between calls, so one instance serves every session.
 */
export class OpenAiBackend implements BackendBridge {
  readonly id = "openai";

  private config: ResolvedOpenAiBackendConfig;

  constructor(config: ResolvedOpenAiBackendConfig) {
    this.config = config;
  }

  async transcribe(frames: readonly AudioFrame[], options: BackendCallOptions): Promise<string> {
    const wav = pcmToWav(framesToPcm(frames), SAMPLE_RATE);

    const formData = new FormData();
    formData.append("file", new Blob([new Uint8Array(wav)], { type: "audio/wav" }), "audio.wav");
    formData.append("model", this.config.sttModel);
    if (this.config.language) {
      formData.append("language", this.config.language);
    }
    formData.append("response_format", "json");

    const response = await fetch(`${this.config.baseUrl}/audio/transcriptions`, {
      method: "POST",
      headers: { Authorization: `Bearer ${this.config.apiKey}` },
      body: formData,
      signal: options.signal,
    });

    if (!response.ok) {
      const text = await response.text().catch(() => "unknown error");
      throw new Error(`Whisper API error ${response.status}: ${text.slice(0, 200)}`);
    }

    const data = transcriptionSchema.parse(await response.json());
    return data.text.trim();
  }

  async respond(
    transcript: string,
    context: ConversationSnapshot,
    options: BackendCallOptions
  ): Promise<BackendResponse> {
    const messages = [
      { role: "system", content: this.systemPrompt(context) },
      ...context.history.map((turn) => ({ role: turn.role, content: turn.text })),
      { role: "user", content: transcript },
    ];

    const response = await fetch(`${this.config.baseUrl}/chat/completions`, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${this.config.apiKey}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify({ model: this.config.chatModel, messages }),
      signal: options.signal,
    });

    if (!response.ok) {
      const text = await response.text().catch(() => "unknown error");
      throw new Error(`Chat API error ${response.status}: ${text.slice(0, 200)}`);
    }

    const data = chatCompletionSchema.parse(await response.json());
    const [choice] = data.choices;
    return { text: (choice?.message.content ?? "").trim() };
  }

  /** Instructions, then the session's topic and preferences when set */
  private systemPrompt(context: ConversationSnapshot): string {
    const lines = [this.config.instructions ?? DEFAULT_INSTRUCTIONS];
    if (context.topic) {
      lines.push(`Current topic: ${context.topic}`);
    }
    const preferences = Object.entries(context.preferences);
    if (preferences.length > 0) {
      lines.push(`User preferences: ${preferences.map(([key, value]) => `${key}=${value}`).join(", ")}`);
    }
    return lines.join("\n");
  }

  async *synthesize(text: string, options: BackendCallOptions): AsyncGenerator<SynthesizedAudio> {
    const response = await fetch(`${this.config.baseUrl}/audio/speech`, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${this.config.apiKey}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: this.config.ttsModel,
        voice: this.config.voice,
        input: text.slice(0, TTS_MAX_CHARS),
        response_format: "pcm",
      }),
      signal: options.signal,
    });

    if (!response.ok) {
      const err = await response.text().catch(() => "unknown");
      throw new Error(`OpenAI TTS error ${response.status}: ${err.slice(0, 200)}`);
    }

    if (!response.body) throw new Error("OpenAI TTS: empty response body");

    const reader = response.body.getReader();
    let carry: Buffer | null = null;
    try {
      while (!options.signal.aborted) {
        const { done, value } = await reader.read();
        if (done) break;
        if (!value) continue;

        // Network chunks can split a sample; hold the odd byte back
        let chunk: Buffer = carry ? Buffer.concat([carry, value]) : Buffer.from(value);
        carry = null;
        if (chunk.length % 2 === 1) {
          carry = chunk.subarray(chunk.length - 1);
          chunk = chunk.subarray(0, chunk.length - 1);
        }
        if (chunk.length > 0) {
          yield { audio: chunk, sampleRate: OPENAI_TTS_SAMPLE_RATE };
        }
      }
    } finally {
      reader.releaseLock();
    }
  }

  async dispose(): Promise<void> {}
}

// ── WAV encoding ──────────────────────────────────────────────────────────────

const WAV_HEADER_BYTES = 44;

/** Wrap 16-bit mono PCM in a canonical 44-byte RIFF/WAVE header. */
export function pcmToWav(pcm: Buffer, sampleRate: number): Buffer {
  const wav = Buffer.alloc(WAV_HEADER_BYTES + pcm.length);

  wav.write("RIFF", 0, "ascii");
  wav.writeUInt32LE(wav.length - 8, 4);
  wav.write("WAVE", 8, "ascii");

  wav.write("fmt ", 12, "ascii");
  wav.writeUInt32LE(16, 16);
  wav.writeUInt16LE(1, 20); // linear PCM
  wav.writeUInt16LE(CHANNELS, 22);
  wav.writeUInt32LE(sampleRate, 24);
  wav.writeUInt32LE(sampleRate * CHANNELS * BYTES_PER_SAMPLE, 28);
  wav.writeUInt16LE(CHANNELS * BYTES_PER_SAMPLE, 32);
  wav.writeUInt16LE(BYTES_PER_SAMPLE * 8, 34);

  wav.write("data", 36, "ascii");
  wav.writeUInt32LE(pcm.length, 40);
  pcm.copy(wav, WAV_HEADER_BYTES);
  return wav;
}
