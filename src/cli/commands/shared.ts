import { Config } from '../../config/Config.js';
import type { CliConfig, DeepPartial, SwitchboardConfig } from '../../config/types.js';
import { logger } from '../ui/index.js';

export interface CommonOptions {
  json?: boolean;
  verbose?: boolean;
  offline?: boolean;
  trace?: boolean;
}

export interface CliContext {
  config: Config;
  json: boolean;
}

/** `--json` wins; otherwise the configured `cli.outputFormat` decides. */
export function wantsJson(options: Pick<CommonOptions, 'json'>, cli: Pick<CliConfig, 'outputFormat'>): boolean {
  return options.json ?? cli.outputFormat === 'json';
}

export async function loadCliConfig(options: CommonOptions): Promise<CliContext> {
  const overrides: DeepPartial<SwitchboardConfig> = {};
  if (options.offline) {
    overrides.llm = { provider: 'none' };
  }
  if (options.trace) {
    overrides.tracing = { enabled: true, sink: 'logger' };
  }

  const config = await Config.load(overrides);
  const json = wantsJson(options, config.cli);

  logger.setColors(config.cli.colors);
  logger.setIncludeTimestamp(config.logging.includeTimestamp);
  if (options.verbose || options.trace) {
    logger.setLevel('debug');
  } else if (json) {
    logger.setLevel('warn');
  } else {
    logger.setLevel(config.logging.level);
  }

  return { config, json };
}
