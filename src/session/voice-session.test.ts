import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { ResponseHandle, VoiceSession, canTransition } from "./voice-session.js";
import { SequenceError, StateTransitionError } from "../errors.js";
import { silentLogger } from "../logger.js";
import { RecordingConnection, frame, testConfig } from "../testing/fakes.js";

function createSession(clock: () => number = () => 1_000) {
  const connection = new RecordingConnection();
  const session = new VoiceSession({
    connection,
    config: testConfig(),
    logger: silentLogger(),
    clock,
    sessionId: "session-1",
  });
  return { session, connection };
}

describe("canTransition", () => {
  it("allows the conversational cycle", () => {
    assert.equal(canTransition("init", "listening"), true);
    assert.equal(canTransition("listening", "processing"), true);
    assert.equal(canTransition("processing", "speaking"), true);
    assert.equal(canTransition("speaking", "interrupted"), true);
    assert.equal(canTransition("interrupted", "listening"), true);
  });

  it("refuses shortcuts and anything out of closed", () => {
    assert.equal(canTransition("init", "speaking"), false);
    assert.equal(canTransition("listening", "interrupted"), false);
    assert.equal(canTransition("processing", "interrupted"), false);
    assert.equal(canTransition("closed", "listening"), false);
  });

  it("allows closing from every live state", () => {
    for (const from of ["init", "listening", "processing", "speaking", "interrupted"] as const) {
      assert.equal(canTransition(from, "closed"), true, from);
    }
  });
});

describe("VoiceSession", () => {
  it("starts in init with zeroed counters", () => {
    const { session } = createSession();
    assert.equal(session.state, "init");
    assert.equal(session.inboundSequence, 0);
    assert.equal(session.outboundSequence, 0);
    assert.equal(session.pendingResponse, null);
  });

  it("throws on an illegal transition and keeps its state", () => {
    const { session } = createSession();
    session.transition("listening");
    assert.throws(() => session.transition("interrupted"), StateTransitionError);
    assert.throws(() => session.beginSpeaking(new ResponseHandle("hi")), {
      name: "StateTransitionError",
      message: "Illegal session transition listening → speaking",
    });
    assert.equal(session.state, "listening");
  });

  it("holds the response handle only while speaking", () => {
    const { session } = createSession();
    const handle = new ResponseHandle("hello");
    session.transition("listening");
    session.transition("processing");
    session.beginSpeaking(handle);

    assert.equal(session.pendingResponse, handle);
    assert.equal(session.isCurrentResponse(handle), true);

    session.transition("listening");
    assert.equal(session.pendingResponse, null);
    assert.equal(session.isCurrentResponse(handle), false);
    assert.equal(handle.cancelled, false);
  });

  it("cancels the response when closed while speaking", () => {
    const { session } = createSession();
    const handle = new ResponseHandle("hello");
    session.transition("listening");
    session.transition("processing");
    session.beginSpeaking(handle);
    session.transition("closed");

    assert.equal(handle.cancelled, true);
    assert.equal(session.pendingResponse, null);
  });

  it("accepts only the next inbound sequence number", () => {
    const { session } = createSession();
    session.acceptSequence(0);
    session.acceptSequence(1);

    assert.throws(
      () => session.acceptSequence(3),
      (err: unknown) => err instanceof SequenceError && err.expected === 2 && err.received === 3
    );
    assert.throws(() => session.acceptSequence(1), SequenceError);
    assert.equal(session.inboundSequence, 2);
  });

  it("counts outbound sequence numbers from zero", () => {
    const { session } = createSession();
    assert.equal(session.nextOutboundSequence(), 0);
    assert.equal(session.nextOutboundSequence(), 1);
    assert.equal(session.outboundSequence, 2);
  });

  it("tracks activity from inbound frames and outbound messages", () => {
    let now = 1_000;
    const { session } = createSession(() => now);
    now = 2_000;
    session.acceptSequence(0);
    assert.equal(session.lastActivity, 2_000);
    now = 3_000;
    session.send({ type: "listening_started" });
    assert.equal(session.lastActivity, 3_000);
  });

  it("drops messages once closed, except the final one", () => {
    const { session, connection } = createSession();
    session.transition("closed");

    assert.equal(session.send({ type: "listening_started" }), false);
    assert.equal(session.sendFinal({ type: "session_ended", reason: "client_closed" }), true);
    assert.deepEqual(connection.types, ["session_ended"]);
  });

  it("survives a connection that throws on send", () => {
    const { session } = createSession();
    session.connection.send = () => {
      throw new Error("socket gone");
    };
    assert.equal(session.send({ type: "listening_started" }), false);
  });

  it("release cancels the response and clears per-session state", () => {
    const { session } = createSession();
    const handle = new ResponseHandle("hello");
    session.transition("listening");
    session.buffer.push(frame(0, true));
    session.context.addTurn({ role: "user", text: "hi", timestamp: 0 });
    session.transition("processing");
    session.beginSpeaking(handle);
    const turn = session.beginTurn();

    session.transition("closed");
    session.release();

    assert.equal(handle.cancelled, true);
    assert.equal(turn.aborted, true);
    assert.equal(session.buffer.length, 0);
    assert.equal(session.context.length, 0);
  });

  it("beginTurn aborts the previous turn", () => {
    const { session } = createSession();
    const first = session.beginTurn();
    const second = session.beginTurn();
    assert.equal(first.aborted, true);
    assert.equal(second.aborted, false);
  });

  it("snapshots its state", () => {
    const { session } = createSession();
    session.transition("listening");
    assert.deepEqual(session.toJSON(), {
      sessionId: "session-1",
      state: "listening",
      inboundSequence: 0,
      outboundSequence: 0,
      bufferedFrames: 0,
      conversationTurns: 0,
      lastActivity: "1970-01-01T00:00:01.000Z",
      remoteAddress: "127.0.0.1",
    });
  });
});

describe("ResponseHandle", () => {
  it("settles when finished", async () => {
    const handle = new ResponseHandle("hi");
    assert.equal(handle.finished, false);
    handle.finish();
    await handle.settled;
    assert.equal(handle.finished, true);
  });

  it("aborts its signal with the given reason", () => {
    const handle = new ResponseHandle("hi");
    handle.cancel("stop");
    handle.cancel("again");
    assert.equal(handle.signal.aborted, true);
    assert.ok(handle.signal.reason instanceof Error);
    assert.equal(handle.signal.reason.message, "stop");
  });
});
