import type { MemoryConfig } from '../config/types.js';
import { ConversationMemory } from './ConversationMemory.js';
import { InMemoryConversationStore } from './stores/InMemoryConversationStore.js';
import { SqliteConversationStore } from './stores/SqliteConversationStore.js';

export function createConversationMemory(config: MemoryConfig): ConversationMemory {
  const options = { mode: config.mode, contextLimit: config.contextLimit };
  if (config.store === 'sqlite') {
    return new SqliteConversationStore({ ...options, databasePath: config.databasePath });
  }
  return new InMemoryConversationStore(options);
}

export { ConversationMemory, InMemoryConversationStore, SqliteConversationStore };
export type { SqliteConversationStoreOptions } from './stores/SqliteConversationStore.js';
export { rankByRelevance, scoreTurn, formatTurns } from './relevance.js';
export type { ScoredTurn } from './relevance.js';
export { DEFAULT_SESSION_ID } from './types.js';
export type { ContextOptions, ConversationMemoryOptions, ConversationTurn, MemoryStats } from './types.js';
