import { describe, it, expect, vi } from 'vitest';
import { createWorkflow } from '../../../src/workflow/Workflow.js';
import { Config } from '../../../src/config/Config.js';
import { getDefaultConfig } from '../../../src/config/defaults.js';
import { MemoryTracingSink } from '../../../src/tracing/sinks.js';
import { SimulatedSearchProvider } from '../../../src/providers/search/SimulatedSearchProvider.js';
import { InMemoryConversationStore } from '../../../src/memory/stores/InMemoryConversationStore.js';
import { ValidationError } from '../../../src/utils/errors.js';
import type { TrainingDataSink } from '../../../src/training/types.js';
import { logger } from '../../../src/cli/ui/logger.js';

const FIXED_NOW = new Date('2024-01-15T12:30:00.000Z');
const ARITHMETIC_ANSWER =
  '[General Assistant] Query analysis: 55+55. Keyword scan suggests: calculator.\n- calculator: 55+55 = 110';

class FailingStore extends InMemoryConversationStore {
  protected async persist(): Promise<void> {
    throw new Error('read-only');
  }
}

function createOfflineWorkflow(overrides: { trainingSink?: TrainingDataSink; memory?: InMemoryConversationStore } = {}) {
  const tracingSink = new MemoryTracingSink();
  const workflow = createWorkflow(Config.fromObject(getDefaultConfig()), {
    provider: null,
    searchProvider: new SimulatedSearchProvider(),
    tracingSink,
    trainingSink: overrides.trainingSink ?? null,
    memory: overrides.memory,
    now: () => FIXED_NOW,
  });
  return { workflow, tracingSink };
}

describe('Workflow', () => {
  describe('process', () => {
    it('should answer offline and remember the turn', async () => {
      const { workflow } = createOfflineWorkflow();

      const { result, evaluation } = await workflow.process('55+55');

      expect(workflow.offline).toBe(true);
      expect(result.finalResponse).toBe(ARITHMETIC_ANSWER);
      expect(evaluation).toBeUndefined();
      const history = await workflow.memory.getHistory('default');
      expect(history.map((turn) => [turn.query, turn.response, turn.toolsUsed])).toEqual([
        ['55+55', ARITHMETIC_ANSWER, ['calculator']],
      ]);
    });

    it('should trim the query before routing', async () => {
      const { workflow } = createOfflineWorkflow();

      const { result } = await workflow.process('  55+55  ');

      expect(result.query).toBe('55+55');
    });

    it('should reject an empty query', async () => {
      const { workflow } = createOfflineWorkflow();

      await expect(workflow.process('   ')).rejects.toBeInstanceOf(ValidationError);
    });

    it('should feed earlier turns of the same session back in', async () => {
      const { workflow } = createOfflineWorkflow();

      await workflow.process('55+55', { sessionId: 'alice' });
      const same = await workflow.process('hello', { sessionId: 'alice' });
      const other = await workflow.process('hello', { sessionId: 'bob' });

      expect(same.result.finalResponse).toBe(
        '[General Assistant] Query analysis: hello. No tool keywords detected. 1 related earlier turn(s).'
      );
      expect(other.result.finalResponse).toBe(
        '[General Assistant] Query analysis: hello. No tool keywords detected.'
      );
    });

    it('should not remember cancelled runs', async () => {
      const { workflow } = createOfflineWorkflow();
      const controller = new AbortController();
      controller.abort();

      const { result } = await workflow.process('55+55', { signal: controller.signal });

      expect(result.cancelled).toBe(true);
      expect(await workflow.memory.getHistory()).toEqual([]);
    });

    it('should not record training examples for cancelled runs', async () => {
      const record = vi.fn(async () => undefined);
      const { workflow } = createOfflineWorkflow({ trainingSink: { record } });
      const controller = new AbortController();
      controller.abort();

      await workflow.process('55+55', { signal: controller.signal });

      expect(record).not.toHaveBeenCalled();
    });

    it('should still answer when memory cannot store the turn', async () => {
      const { workflow } = createOfflineWorkflow({
        memory: new FailingStore({ mode: 'recency', contextLimit: 3 }),
      });

      const { result } = await workflow.process('55+55');

      expect(result.finalResponse).toBe(ARITHMETIC_ANSWER);
    });

    it('should evaluate on request', async () => {
      const { workflow } = createOfflineWorkflow();

      const { evaluation } = await workflow.process('55+55', { evaluate: true });

      expect(evaluation?.toolUsageScore).toBe(100);
      expect(workflow.evaluator.getHistory()).toHaveLength(1);
    });

    it('should record training examples', async () => {
      const record = vi.fn(async () => undefined);
      const { workflow } = createOfflineWorkflow({ trainingSink: { record } });

      await workflow.process('55+55');

      expect(record).toHaveBeenCalledWith(
        expect.objectContaining({ query: '55+55', response: ARITHMETIC_ANSWER, toolsUsed: ['calculator'] })
      );
    });

    it('should log and carry on when the training sink fails', async () => {
      const warn = vi.spyOn(logger, 'warn').mockImplementation(() => undefined);
      const record = vi.fn(async () => {
        throw new Error('disk full');
      });
      const { workflow } = createOfflineWorkflow({ trainingSink: { record } });

      const { result } = await workflow.process('55+55');

      expect(result.finalResponse).toBe(ARITHMETIC_ANSWER);
      expect(warn).toHaveBeenCalledWith('Could not record training example: disk full');
      warn.mockRestore();
    });

    it('should trace each run', async () => {
      const { workflow, tracingSink } = createOfflineWorkflow();

      await workflow.process('55+55');

      expect(tracingSink.find('coordinator.coordinate')).toHaveLength(1);
      expect(tracingSink.find('tool.calculator')).toHaveLength(1);
    });

    it('should process independent queries concurrently', async () => {
      const { workflow } = createOfflineWorkflow();

      const outcomes = await Promise.all([
        workflow.process('55+55', { sessionId: 'a' }),
        workflow.process('search for AI news', { sessionId: 'b' }),
      ]);

      expect(outcomes.map((o) => o.result.agentsUsed)).toEqual([['general'], ['research']]);
    });
  });

  describe('plan', () => {
    it('should describe a run without executing it', () => {
      const { workflow } = createOfflineWorkflow();

      const plan = workflow.plan('search for AI news');

      expect(plan.analysis.specialistsNeeded).toEqual(['research']);
      expect(plan.tools).toEqual(['web_search']);
      expect(workflow.getToolStats().web_search?.usageCount).toBe(0);
    });
  });

  describe('getSessionStats', () => {
    it('should aggregate processed queries', async () => {
      const { workflow } = createOfflineWorkflow();

      await workflow.process('55+55');
      await workflow.process('1/0 please');

      const stats = workflow.getSessionStats();
      expect(stats.totalQueries).toBe(2);
      expect(stats.errorCount).toBe(1);
      expect(stats.specialistUsage).toEqual({ general: 2 });
      expect(stats.toolUsage).toEqual({ calculator: 2 });
      expect(workflow.getToolStats().calculator).toMatchObject({ usageCount: 2, successCount: 1, errorCount: 1 });
    });
  });

  describe('listTools', () => {
    it('should list the built-in tools', () => {
      const { workflow } = createOfflineWorkflow();

      expect(workflow.listTools().map((tool) => tool.name)).toEqual(['calculator', 'weather', 'web_search', 'time']);
    });
  });
});
