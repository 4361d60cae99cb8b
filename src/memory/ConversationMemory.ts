import type { ContextOptions, ConversationMemoryOptions, ConversationTurn, MemoryStats } from './types.js';
import { DEFAULT_SESSION_ID } from './types.js';
import { rankByRelevance } from './relevance.js';

// The appending caller already received the rejection; the chain only needs
// to know the slot is free.
function settled(promise: Promise<void>): Promise<void> {
  return promise.then(
    () => undefined,
    () => undefined
  );
}

/**
 * Session-scoped conversation history. Appends within one session are
 * applied strictly in call order; different sessions do not wait on each
 * other.
 */
export abstract class ConversationMemory {
  readonly mode: ConversationMemoryOptions['mode'];
  readonly contextLimit: number;

  private appendChains: Map<string, Promise<void>> = new Map();

  constructor(options: ConversationMemoryOptions) {
    this.mode = options.mode;
    this.contextLimit = options.contextLimit;
  }

  protected abstract persist(turn: ConversationTurn, sessionId: string): Promise<void>;

  /** All turns of a session, oldest first. */
  protected abstract loadTurns(sessionId: string): Promise<ConversationTurn[]>;

  abstract getStats(): Promise<MemoryStats>;

  abstract clear(sessionId?: string): Promise<void>;

  close(): void {}

  append(turn: ConversationTurn, sessionId: string = DEFAULT_SESSION_ID): Promise<void> {
    const snapshot: ConversationTurn = Object.freeze({
      ...turn,
      timestamp: new Date(turn.timestamp.getTime()),
      toolsUsed: [...turn.toolsUsed],
    });

    const previous = this.appendChains.get(sessionId) ?? Promise.resolve();
    const next = settled(previous).then(() => this.persist(snapshot, sessionId));
    this.appendChains.set(sessionId, next);

    const release = () => {
      if (this.appendChains.get(sessionId) === next) {
        this.appendChains.delete(sessionId);
      }
    };
    void next.then(release, release);

    return next;
  }

  async getRelevantContext(query: string, options: ContextOptions = {}): Promise<ConversationTurn[]> {
    const sessionId = options.sessionId ?? DEFAULT_SESSION_ID;
    const limit = options.limit ?? this.contextLimit;
    if (limit <= 0) return [];

    const pending = this.appendChains.get(sessionId);
    if (pending) {
      await settled(pending);
    }

    const turns = await this.loadTurns(sessionId);
    if (this.mode === 'semantic') {
      return rankByRelevance(query, turns)
        .slice(0, limit)
        .map((entry) => entry.turn);
    }
    return turns.slice(-limit).reverse();
  }

  async getHistory(sessionId: string = DEFAULT_SESSION_ID): Promise<ConversationTurn[]> {
    return this.loadTurns(sessionId);
  }
}
