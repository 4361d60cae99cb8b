import { ConversationMemory } from '../ConversationMemory.js';
import type { ConversationTurn, MemoryStats } from '../types.js';

export class InMemoryConversationStore extends ConversationMemory {
  private sessions: Map<string, ConversationTurn[]> = new Map();

  protected async persist(turn: ConversationTurn, sessionId: string): Promise<void> {
    const turns = this.sessions.get(sessionId);
    if (turns) {
      turns.push(turn);
    } else {
      this.sessions.set(sessionId, [turn]);
    }
  }

  protected async loadTurns(sessionId: string): Promise<ConversationTurn[]> {
    return [...(this.sessions.get(sessionId) ?? [])];
  }

  async getStats(): Promise<MemoryStats> {
    let totalTurns = 0;
    for (const turns of this.sessions.values()) {
      totalTurns += turns.length;
    }
    return { sessions: this.sessions.size, totalTurns };
  }

  async clear(sessionId?: string): Promise<void> {
    if (sessionId) {
      this.sessions.delete(sessionId);
    } else {
      this.sessions.clear();
    }
  }
}
