import type { ConversationSnapshot, ConversationTurn, ConversationUpdate } from "../types.js";
import { DEFAULT_MAX_CONVERSATION_TURNS } from "../constants.js";

/**
 * Conversation state owned by one session.
 * Keeps a sliding window of turns plus the optional topic and session-scoped
 * preferences. Opaque to the engine; handed to the backend as-is.
 */
export class ConversationContext {
  topic: string | undefined;
  readonly preferences = new Map<string, string>();

  private turns: ConversationTurn[] = [];
  private readonly maxTurns: number;

  constructor(options: { maxTurns?: number } = {}) {
    this.maxTurns = options.maxTurns ?? DEFAULT_MAX_CONVERSATION_TURNS;
  }

  addTurn(turn: ConversationTurn): void {
    this.turns.push(turn);
    this.prune();
  }

  /** Flag the latest assistant turn as cut short by barge-in. */
  markLastAssistantInterrupted(): void {
    for (let i = this.turns.length - 1; i >= 0; i--) {
      const turn = this.turns[i];
      if (turn.role === "assistant") {
        turn.interrupted = true;
        return;
      }
    }
  }

  getHistory(): readonly ConversationTurn[] {
    return this.turns;
  }

  /** Copy of the current state; later turns do not show up in it. */
  snapshot(): ConversationSnapshot {
    return {
      history: [...this.turns],
      topic: this.topic,
      preferences: Object.fromEntries(this.preferences),
    };
  }

  apply(update: ConversationUpdate): void {
    if (update.topic !== undefined) {
      this.topic = update.topic || undefined;
    }
    for (const [key, value] of Object.entries(update.preferences ?? {})) {
      this.preferences.set(key, value);
    }
  }

  /** Plain-text transcript, one "Speaker: text" line per turn. */
  formatTranscript(): string {
    return this.turns
      .map((t) => {
        const speaker = t.role === "user" ? "User" : "Assistant";
        const suffix = t.interrupted ? " [interrupted]" : "";
        return `${speaker}: ${t.text}${suffix}`;
      })
      .join("\n");
  }

  clear(): void {
    this.turns = [];
    this.topic = undefined;
    this.preferences.clear();
  }

  get length(): number {
    return this.turns.length;
  }

  private prune(): void {
    while (this.turns.length > this.maxTurns) {
      this.turns.shift();
    }
  }
}
