import { Command } from 'commander';
import chalk from 'chalk';
import { logger } from '../ui/index.js';
import { loadCliConfig } from './shared.js';
import { createWorkflow } from '../../workflow/Workflow.js';
import { DEFAULT_TOOL_RULES } from '../../tools/ToolSelector.js';
import { formatError } from '../../utils/errors.js';

export const toolsCommand = new Command('tools')
  .description('List the registered tools and when they are selected')
  .option('-j, --json', 'Output as JSON')
  .action(async (options: { json?: boolean }) => {
    try {
      const { config, json } = await loadCliConfig({ ...options, offline: true });
      const workflow = createWorkflow(config, { provider: null });

      try {
        const tools = workflow.listTools().map((tool) => ({
          ...tool,
          selectedWhen: DEFAULT_TOOL_RULES.find((rule) => rule.tool === tool.name)?.describe ?? null,
        }));

        if (json) {
          console.log(JSON.stringify(tools, null, 2));
          return;
        }

        logger.info('Registered tools:');
        logger.blank();
        for (const tool of tools) {
          console.log(`  ${chalk.bold(tool.name)}(${tool.parameters.join(', ')})`);
          console.log(`    ${tool.description}`);
          if (tool.selectedWhen) {
            console.log(chalk.gray(`    selected when: ${tool.selectedWhen}`));
          }
        }
      } finally {
        workflow.close();
      }
    } catch (error) {
      logger.error(formatError(error));
      process.exit(1);
    }
  });
