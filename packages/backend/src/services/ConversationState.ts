import { randomUUID } from "node:crypto";
import type {
  ConversationSnapshot,
  ConversationTurn,
  DialoguePhase,
  DisambiguationOption,
  QueryResponse,
  UserPreferences
} from "@taxograph/shared";

/**
 * Per-session dialogue state: an append-only turn log plus the current phase. Callers
 * serialize turns for one instance; nothing here locks.
 */
export class ConversationState {
  readonly sessionId: string;
  readonly createdAt: Date;
  userPreferences: UserPreferences = { expertiseLevel: "novice" };

  private readonly turns: ConversationTurn[] = [];
  private currentPhase: DialoguePhase = { kind: "idle" };
  private lastUpdatedAt: Date;

  constructor(sessionId: string = randomUUID()) {
    this.sessionId = sessionId;
    this.createdAt = new Date();
    this.lastUpdatedAt = this.createdAt;
  }

  get phase(): DialoguePhase {
    return this.currentPhase;
  }

  get updatedAt(): Date {
    return this.lastUpdatedAt;
  }

  /** Options offered by the last disambiguation prompt, or null when idle. */
  pendingOptions(): DisambiguationOption[] | null {
    return this.currentPhase.kind === "awaiting_selection" ? this.currentPhase.options : null;
  }

  /** Records one processed turn and moves to `next` in a single step. */
  commitTurn(query: string, response: QueryResponse, next: DialoguePhase): void {
    const now = new Date();
    this.turns.push({ query, response, createdAt: now });
    this.currentPhase = next;
    this.lastUpdatedAt = now;
  }

  getTurns(): ConversationTurn[] {
    return [...this.turns];
  }

  turnCount(): number {
    return this.turns.length;
  }

  getHistoryText(): string {
    return this.turns
      .map((turn) => `User: ${turn.query}\nSystem: ${turn.response.summary || "No summary."}\n`)
      .join("");
  }

  snapshot(): ConversationSnapshot {
    return {
      sessionId: this.sessionId,
      phase: this.currentPhase.kind,
      turns: this.getTurns(),
      userPreferences: { ...this.userPreferences },
      createdAt: this.createdAt,
      updatedAt: this.lastUpdatedAt
    };
  }
}
