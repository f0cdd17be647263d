import { ConversationNotFoundError } from "../utils/errors.js";
import { ConversationState } from "./ConversationState.js";

export interface ConversationStoreLike {
  createSession(id?: string): ConversationState;
  getSession(id: string): ConversationState | null;
  listSessions(limit?: number): ConversationState[];
  deleteSession(id: string): boolean;
  runExclusive<T>(sessionId: string, task: (state: ConversationState) => Promise<T>): Promise<T>;
}

/**
 * Process-local session registry. `runExclusive` chains work per session so at most
 * one turn touches a given `ConversationState` at a time.
 */
export class InMemoryConversationStore implements ConversationStoreLike {
  private readonly sessions = new Map<string, ConversationState>();
  private readonly tails = new Map<string, Promise<unknown>>();

  createSession(id?: string): ConversationState {
    const state = new ConversationState(id);
    this.sessions.set(state.sessionId, state);
    return state;
  }

  getSession(id: string): ConversationState | null {
    return this.sessions.get(id) ?? null;
  }

  listSessions(limit = 100): ConversationState[] {
    const safeLimit = Math.max(1, limit);
    return [...this.sessions.values()]
      .sort((a, b) => b.updatedAt.getTime() - a.updatedAt.getTime())
      .slice(0, safeLimit);
  }

  deleteSession(id: string): boolean {
    this.tails.delete(id);
    return this.sessions.delete(id);
  }

  runExclusive<T>(sessionId: string, task: (state: ConversationState) => Promise<T>): Promise<T> {
    const previous = this.tails.get(sessionId) ?? Promise.resolve();
    const run = previous.then(() => {
      const state = this.sessions.get(sessionId);
      if (!state) {
        throw new ConversationNotFoundError(sessionId);
      }
      return task(state);
    });

    // The caller observes failures through `run`; the chain only needs completion.
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(sessionId, tail);
    void tail.then(() => {
      if (this.tails.get(sessionId) === tail) {
        this.tails.delete(sessionId);
      }
    });

    return run;
  }

  close(): void {
    this.sessions.clear();
    this.tails.clear();
  }
}
