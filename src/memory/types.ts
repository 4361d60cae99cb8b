import type { MemoryMode } from '../config/types.js';

export interface ConversationTurn {
  query: string;
  response: string;
  timestamp: Date;
  toolsUsed: string[];
}

export interface ContextOptions {
  limit?: number;
  sessionId?: string;
}

export interface ConversationMemoryOptions {
  mode: MemoryMode;
  contextLimit: number;
}

export interface MemoryStats {
  sessions: number;
  totalTurns: number;
}

export const DEFAULT_SESSION_ID = 'default';
