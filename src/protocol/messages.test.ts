import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  decodeAudioChunk,
  decodeHex,
  encodeHex,
  parseClientMessage,
  serializeServerMessage,
  type AudioChunkMessage,
} from "./messages.js";
import { AudioFormatError, ProtocolError } from "../errors.js";

function protocolError(message: string | RegExp) {
  return (err: unknown) => {
    assert.ok(err instanceof ProtocolError);
    if (typeof message === "string") assert.equal(err.message, message);
    else assert.match(err.message, message);
    return true;
  };
}

describe("parseClientMessage", () => {
  it("parses an audio_chunk and normalizes an ISO timestamp", () => {
    const message = parseClientMessage(
      JSON.stringify({
        type: "audio_chunk",
        audio_data: "0100ffff",
        sequence_number: 3,
        timestamp: "2024-01-01T00:00:00.000Z",
      })
    );
    assert.equal(message.type, "audio_chunk");
    if (message.type !== "audio_chunk") return;
    assert.equal(message.sequence_number, 3);
    assert.equal(message.timestamp, Date.UTC(2024, 0, 1));
  });

  it("keeps a numeric timestamp as is", () => {
    const message = parseClientMessage(
      JSON.stringify({ type: "audio_chunk", audio_data: "", sequence_number: 0, timestamp: 1234 })
    );
    assert.ok(message.type === "audio_chunk");
    assert.equal(message.timestamp, 1234);
  });

  it("parses control messages with an optional session id", () => {
    assert.deepEqual(parseClientMessage('{"type":"interrupt"}'), { type: "interrupt" });
    assert.deepEqual(parseClientMessage('{"type":"end_session","session_id":"abc"}'), {
      type: "end_session",
      session_id: "abc",
    });
  });

  it("rejects invalid JSON", () => {
    assert.throws(() => parseClientMessage("{nope"), protocolError("Message is not valid JSON"));
  });

  it("rejects non-object messages", () => {
    assert.throws(() => parseClientMessage("[1,2]"), protocolError("Message must be a JSON object"));
    assert.throws(() => parseClientMessage("null"), protocolError("Message must be a JSON object"));
  });

  it("rejects a missing or unknown type", () => {
    assert.throws(
      () => parseClientMessage('{"kind":"audio_chunk"}'),
      protocolError('Message is missing a string "type" field')
    );
    assert.throws(
      () => parseClientMessage('{"type":"bogus"}'),
      protocolError('Unknown message type "bogus"')
    );
  });

  it("rejects invalid fields with their path", () => {
    assert.throws(
      () => parseClientMessage('{"type":"audio_chunk","audio_data":"00","sequence_number":-1}'),
      protocolError(/^Invalid audio_chunk message: sequence_number: /)
    );
    assert.throws(
      () => parseClientMessage('{"type":"audio_chunk","audio_data":"zz","sequence_number":0}'),
      protocolError("Invalid audio_chunk message: audio_data: audio_data must be hex-encoded bytes")
    );
  });
});

describe("decodeAudioChunk", () => {
  const base: AudioChunkMessage = { type: "audio_chunk", audio_data: "0100ffff0200feff", sequence_number: 4 };

  it("decodes exactly one frame of samples", () => {
    assert.deepEqual(Array.from(decodeAudioChunk(base, 4)), [1, -1, 2, -2]);
  });

  it("rejects the wrong frame length", () => {
    assert.throws(
      () => decodeAudioChunk({ ...base, audio_data: "0100ffff" }, 4),
      (err: unknown) =>
        err instanceof AudioFormatError &&
        err.message === "Frame 4 has 4 bytes; expected 8 (4 samples)"
    );
  });

  it("rejects another sample rate or channel count", () => {
    assert.throws(
      () => decodeAudioChunk({ ...base, sample_rate: 8000 }, 4),
      (err: unknown) =>
        err instanceof AudioFormatError && err.message === "Unsupported sample rate 8000; expected 16000"
    );
    assert.throws(
      () => decodeAudioChunk({ ...base, channels: 2 }, 4),
      (err: unknown) =>
        err instanceof AudioFormatError && err.message === "Unsupported channel count 2; expected 1"
    );
  });

  it("accepts the declared wire format", () => {
    assert.equal(decodeAudioChunk({ ...base, sample_rate: 16000, channels: 1 }, 4).length, 4);
  });
});

describe("serializeServerMessage", () => {
  it("adds the session id and an ISO timestamp", () => {
    assert.equal(
      serializeServerMessage("s1", { type: "transcription", text: "hi" }, 0),
      '{"type":"transcription","text":"hi","session_id":"s1","timestamp":"1970-01-01T00:00:00.000Z"}'
    );
  });
});

describe("hex codec", () => {
  it("encodes and decodes bytes", () => {
    assert.equal(encodeHex(Uint8Array.from([0, 15, 255])), "000fff");
    assert.deepEqual([...decodeHex("000fff")], [0, 15, 255]);
  });

  it("encodes only the viewed slice of a larger buffer", () => {
    const view = Buffer.from([1, 2, 3, 4]).subarray(1, 3);
    assert.equal(encodeHex(view), "0203");
  });
});
