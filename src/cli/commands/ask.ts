import { Command } from 'commander';
import chalk from 'chalk';
import { logger, Spinner, specialistLabel } from '../ui/index.js';
import { loadCliConfig, type CommonOptions } from './shared.js';
import { createWorkflow } from '../../workflow/Workflow.js';
import type { OrchestrationResult } from '../../agents/coordinator/Coordinator.js';
import type { Evaluation } from '../../evaluation/Evaluator.js';
import { formatError } from '../../utils/errors.js';

interface AskOptions extends CommonOptions {
  session?: string;
  evaluate?: boolean;
}

export const askCommand = new Command('ask')
  .description('Route a query through the specialists and print the answer')
  .argument('<query>', 'The question or task')
  .option('-s, --session <id>', 'Conversation session id', 'default')
  .option('-j, --json', 'Output the full result as JSON')
  .option('-v, --verbose', 'Enable verbose output')
  .option('--offline', 'Do not call the language model; use deterministic fallbacks')
  .option('--trace', 'Log a span for every step')
  .option('-e, --evaluate', 'Score the answer after the run')
  .action(async (query: string, options: AskOptions) => {
    const controller = new AbortController();
    const onInterrupt = () => controller.abort();
    process.once('SIGINT', onInterrupt);

    try {
      const { config, json } = await loadCliConfig(options);
      const workflow = createWorkflow(config);
      const spinner = new Spinner(config.cli.spinners && !json);

      if (workflow.offline && !json) {
        logger.info('Running in offline mode');
      }

      workflow.coordinator.on('specialistStarted', (_runId, role) => {
        spinner.update(specialistLabel(role, 'working...'));
      });
      workflow.coordinator.on('specialistFailed', (_runId, role, error) => {
        logger.debug(`${role} failed: [${error.code}] ${error.message}`);
      });

      try {
        spinner.start('Analyzing query...');
        const { result, evaluation } = await workflow.process(query, {
          sessionId: options.session,
          signal: controller.signal,
          evaluate: options.evaluate,
        });

        if (result.errors.length > 0) {
          spinner.warn(`Finished with ${result.errors.length} error(s)`);
        } else {
          spinner.succeed('Done');
        }

        if (json) {
          console.log(JSON.stringify({ result, evaluation }, null, 2));
        } else {
          printResult(result, evaluation, options.verbose ?? false);
        }
      } catch (error) {
        spinner.fail('Run failed');
        throw error;
      } finally {
        workflow.close();
      }
    } catch (error) {
      logger.error(formatError(error));
      process.exit(1);
    } finally {
      process.off('SIGINT', onInterrupt);
    }
  });

function printResult(result: OrchestrationResult, evaluation: Evaluation | undefined, verbose: boolean): void {
  logger.divider();
  console.log(result.finalResponse);
  logger.divider();

  logger.info(`Specialists: ${result.agentsUsed.join(' → ') || 'none'}`);
  logger.info(`Tools: ${result.toolsUsed.join(', ') || 'none'}`);
  logger.info(`Time: ${result.processingTimeMs}ms`);

  if (result.cancelled) {
    logger.warn('Run was cancelled');
  }
  for (const error of result.errors) {
    const origin = error.tool ?? error.specialist ?? error.stage;
    logger.warn(`${chalk.bold(origin)}: [${error.code}] ${error.message}`);
  }

  if (verbose) {
    for (const specialist of result.specialistResults) {
      logger.debug(`${specialist.specialist} reasoning (${specialist.reasoning.source}): ${specialist.reasoning.text}`);
    }
  }

  if (evaluation) {
    logger.blank();
    logger.info(
      `Evaluation: ${chalk.bold(evaluation.grade)} (${evaluation.overallScore.toFixed(1)}) ` +
        `quality ${evaluation.qualityScore.toFixed(1)}, tools ${evaluation.toolUsageScore.toFixed(1)}, ` +
        `performance ${evaluation.performanceScore.toFixed(1)}`
    );
  }
}
