import { Command } from 'commander';
import { askCommand } from './commands/ask.js';
import { analyzeCommand } from './commands/analyze.js';
import { toolsCommand } from './commands/tools.js';

export function createCli(): Command {
  const program = new Command();

  program
    .name('switchboard')
    .description('Multi-agent query routing - specialists, tools and one synthesized answer')
    .version('0.1.0');

  program.addCommand(askCommand);
  program.addCommand(analyzeCommand);
  program.addCommand(toolsCommand);

  return program;
}

export async function runCli(args: string[] = process.argv): Promise<void> {
  const program = createCli();
  await program.parseAsync(args);
}
