import { Command } from 'commander';
import { logger } from '../ui/index.js';
import { loadCliConfig, type CommonOptions } from './shared.js';
import { createWorkflow } from '../../workflow/Workflow.js';
import { formatError } from '../../utils/errors.js';

export const analyzeCommand = new Command('analyze')
  .description('Show which specialists and tools a query would use, without running it')
  .argument('<query>', 'The question or task')
  .option('-j, --json', 'Output as JSON')
  .action(async (query: string, options: Pick<CommonOptions, 'json'>) => {
    try {
      const { config, json } = await loadCliConfig({ ...options, offline: true });
      const workflow = createWorkflow(config, { provider: null });

      try {
        const plan = workflow.plan(query);

        if (json) {
          console.log(JSON.stringify(plan, null, 2));
          return;
        }

        logger.info(`Specialists: ${plan.analysis.specialistsNeeded.join(' → ') || 'none'}`);
        logger.info(`Reason: ${plan.analysis.reasoning}`);
        logger.info(`Complexity: ${plan.analysis.complexity}`);
        logger.info(`Tools: ${plan.tools.join(', ') || 'none'}`);
      } finally {
        workflow.close();
      }
    } catch (error) {
      logger.error(formatError(error));
      process.exit(1);
    }
  });
