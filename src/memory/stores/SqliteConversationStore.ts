import Database from 'better-sqlite3';
import path from 'node:path';
import { z } from 'zod';
import { ConversationMemory } from '../ConversationMemory.js';
import type { ConversationMemoryOptions, ConversationTurn, MemoryStats } from '../types.js';
import { conversationMigrations, runMigrations } from '../schemas/migrations.js';
import { ensureDirectorySync } from '../../utils/fs.js';

interface TurnRow {
  query: string;
  response: string;
  tools_used: string;
  created_at: string;
}

const ToolsUsedSchema = z.array(z.string());

export interface SqliteConversationStoreOptions extends ConversationMemoryOptions {
  /** File path, or ':memory:' for a throwaway database. */
  databasePath: string;
}

export class SqliteConversationStore extends ConversationMemory {
  private db: Database.Database;

  constructor(options: SqliteConversationStoreOptions) {
    super(options);

    if (options.databasePath !== ':memory:') {
      ensureDirectorySync(path.dirname(options.databasePath));
    }

    this.db = new Database(options.databasePath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');

    runMigrations(this.db, conversationMigrations);
  }

  protected async persist(turn: ConversationTurn, sessionId: string): Promise<void> {
    this.db
      .prepare(
        `INSERT INTO conversation_turns (session_id, query, response, tools_used, created_at)
         VALUES (?, ?, ?, ?, ?)`
      )
      .run(sessionId, turn.query, turn.response, JSON.stringify(turn.toolsUsed), turn.timestamp.toISOString());
  }

  protected async loadTurns(sessionId: string): Promise<ConversationTurn[]> {
    const rows = this.db
      .prepare<[string], TurnRow>(
        `SELECT query, response, tools_used, created_at FROM conversation_turns
         WHERE session_id = ?
         ORDER BY id ASC`
      )
      .all(sessionId);

    return rows.map((row) => ({
      query: row.query,
      response: row.response,
      timestamp: new Date(row.created_at),
      toolsUsed: this.parseToolsUsed(row.tools_used),
    }));
  }

  async getStats(): Promise<MemoryStats> {
    const row = this.db
      .prepare<[], { sessions: number; total: number }>(
        'SELECT COUNT(DISTINCT session_id) as sessions, COUNT(*) as total FROM conversation_turns'
      )
      .get();
    return { sessions: row?.sessions ?? 0, totalTurns: row?.total ?? 0 };
  }

  async clear(sessionId?: string): Promise<void> {
    if (sessionId) {
      this.db.prepare('DELETE FROM conversation_turns WHERE session_id = ?').run(sessionId);
    } else {
      this.db.prepare('DELETE FROM conversation_turns').run();
    }
  }

  close(): void {
    this.db.close();
  }

  private parseToolsUsed(value: string): string[] {
    try {
      const parsed = ToolsUsedSchema.safeParse(JSON.parse(value));
      return parsed.success ? parsed.data : [];
    } catch {
      return [];
    }
  }
}
