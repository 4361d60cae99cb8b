import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { InMemoryConversationStore } from '../../../src/memory/stores/InMemoryConversationStore.js';
import { SqliteConversationStore } from '../../../src/memory/stores/SqliteConversationStore.js';
import { createConversationMemory } from '../../../src/memory/index.js';
import { rankByRelevance, formatTurns } from '../../../src/memory/relevance.js';
import type { ConversationTurn } from '../../../src/memory/types.js';

function turn(query: string, response: string, toolsUsed: string[] = []): ConversationTurn {
  return { query, response, timestamp: new Date('2024-03-01T10:00:00.000Z'), toolsUsed };
}

class FlakyStore extends InMemoryConversationStore {
  protected async persist(entry: ConversationTurn, sessionId: string): Promise<void> {
    if (entry.query === 'fail') {
      throw new Error('disk full');
    }
    await new Promise((resolve) => setTimeout(resolve, 5));
    return super.persist(entry, sessionId);
  }
}

describe('InMemoryConversationStore', () => {
  let memory: InMemoryConversationStore;

  beforeEach(() => {
    memory = new InMemoryConversationStore({ mode: 'recency', contextLimit: 3 });
  });

  describe('getRelevantContext', () => {
    it('should return the most recent turns, newest first', async () => {
      await memory.append(turn('first', 'a'));
      await memory.append(turn('second', 'b'));
      await memory.append(turn('third', 'c'));

      const context = await memory.getRelevantContext('anything', { limit: 2 });

      expect(context.map((t) => t.query)).toEqual(['third', 'second']);
    });

    it('should default to the configured limit', async () => {
      for (const query of ['one', 'two', 'three', 'four']) {
        await memory.append(turn(query, 'ok'));
      }

      const context = await memory.getRelevantContext('anything');

      expect(context.map((t) => t.query)).toEqual(['four', 'three', 'two']);
    });

    it('should return nothing for a zero limit', async () => {
      await memory.append(turn('first', 'a'));

      await expect(memory.getRelevantContext('first', { limit: 0 })).resolves.toEqual([]);
    });

    it('should keep sessions apart', async () => {
      await memory.append(turn('alice question', 'a'), 'alice');
      await memory.append(turn('bob question', 'b'), 'bob');

      const context = await memory.getRelevantContext('question', { sessionId: 'alice' });

      expect(context.map((t) => t.query)).toEqual(['alice question']);
    });

    it('should rank by token overlap in semantic mode', async () => {
      const semantic = new InMemoryConversationStore({ mode: 'semantic', contextLimit: 5 });
      await semantic.append(turn('weather in Paris', 'sunny'));
      await semantic.append(turn('math 2+2', '4'));
      await semantic.append(turn('Paris time', 'noon'));

      const context = await semantic.getRelevantContext('Paris weather');

      expect(context.map((t) => t.query)).toEqual(['weather in Paris', 'Paris time']);
    });
  });

  describe('append', () => {
    it('should store a snapshot of the turn', async () => {
      const original = turn('query', 'response', ['calculator']);
      await memory.append(original);
      original.toolsUsed.push('weather');

      const [stored] = await memory.getHistory();

      expect(stored?.toolsUsed).toEqual(['calculator']);
      expect(Object.isFrozen(stored)).toBe(true);
    });

    it('should apply concurrent appends in call order', async () => {
      const flaky = new FlakyStore({ mode: 'recency', contextLimit: 10 });

      void flaky.append(turn('one', 'a'));
      void flaky.append(turn('two', 'b'));
      void flaky.append(turn('three', 'c'));

      const history = await flaky.getRelevantContext('x');

      expect(history.map((t) => t.query)).toEqual(['three', 'two', 'one']);
    });

    it('should reject a failed append without blocking later ones', async () => {
      const flaky = new FlakyStore({ mode: 'recency', contextLimit: 10 });

      const failed = flaky.append(turn('fail', 'x'));
      const next = flaky.append(turn('after', 'y'));

      await expect(failed).rejects.toThrow('disk full');
      await next;
      expect((await flaky.getHistory()).map((t) => t.query)).toEqual(['after']);
    });
  });

  describe('getStats and clear', () => {
    it('should count sessions and turns', async () => {
      await memory.append(turn('a', '1'), 's1');
      await memory.append(turn('b', '2'), 's1');
      await memory.append(turn('c', '3'), 's2');

      await expect(memory.getStats()).resolves.toEqual({ sessions: 2, totalTurns: 3 });
    });

    it('should clear one session or all', async () => {
      await memory.append(turn('a', '1'), 's1');
      await memory.append(turn('c', '3'), 's2');

      await memory.clear('s1');
      await expect(memory.getStats()).resolves.toEqual({ sessions: 1, totalTurns: 1 });

      await memory.clear();
      await expect(memory.getStats()).resolves.toEqual({ sessions: 0, totalTurns: 0 });
    });
  });
});

describe('SqliteConversationStore', () => {
  let memory: SqliteConversationStore;

  beforeEach(() => {
    memory = new SqliteConversationStore({ mode: 'recency', contextLimit: 3, databasePath: ':memory:' });
  });

  afterEach(() => {
    memory.close();
  });

  it('should round-trip turns', async () => {
    await memory.append(turn('55+55', '110', ['calculator']));

    const history = await memory.getHistory();

    expect(history).toEqual([
      {
        query: '55+55',
        response: '110',
        timestamp: new Date('2024-03-01T10:00:00.000Z'),
        toolsUsed: ['calculator'],
      },
    ]);
  });

  it('should return recent turns newest first', async () => {
    await memory.append(turn('first', 'a'));
    await memory.append(turn('second', 'b'));

    const context = await memory.getRelevantContext('x');

    expect(context.map((t) => t.query)).toEqual(['second', 'first']);
  });

  it('should count and clear sessions', async () => {
    await memory.append(turn('a', '1'), 's1');
    await memory.append(turn('b', '2'), 's2');

    await expect(memory.getStats()).resolves.toEqual({ sessions: 2, totalTurns: 2 });

    await memory.clear('s2');
    expect(await memory.getHistory('s2')).toEqual([]);
    expect((await memory.getHistory('s1')).length).toBe(1);
  });
});

describe('createConversationMemory', () => {
  it('should build the configured store', () => {
    const inMemory = createConversationMemory({
      mode: 'semantic',
      contextLimit: 2,
      store: 'memory',
      databasePath: ':memory:',
    });

    expect(inMemory).toBeInstanceOf(InMemoryConversationStore);
    expect(inMemory.mode).toBe('semantic');
    expect(inMemory.contextLimit).toBe(2);
  });
});

describe('relevance', () => {
  it('should break ties newest first and drop unrelated turns', () => {
    const turns = [turn('paris trip', 'a'), turn('unrelated', 'b'), turn('paris food', 'c')];

    expect(rankByRelevance('paris', turns).map((entry) => entry.turn.query)).toEqual(['paris food', 'paris trip']);
  });

  it('should format turns as a transcript', () => {
    expect(formatTurns([turn('hi', 'hello'), turn('bye', 'later')])).toBe(
      'User: hi\nAssistant: hello\n\nUser: bye\nAssistant: later'
    );
  });
});
