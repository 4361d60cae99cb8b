import type { ToolsConfig } from '../../config/types.js';
import type { SearchProvider } from './types.js';
import { SerperSearchProvider } from './SerperSearchProvider.js';
import { SimulatedSearchProvider } from './SimulatedSearchProvider.js';
import { logger } from '../../cli/ui/logger.js';

export function createSearchProvider(config: ToolsConfig['search']): SearchProvider {
  if (config.provider === 'serper' && config.apiKey) {
    return new SerperSearchProvider(config.apiKey);
  }
  if (config.provider === 'serper') {
    logger.debug('SERPER_API_KEY not set, using simulated search results');
  }
  return new SimulatedSearchProvider();
}

export { SerperSearchProvider } from './SerperSearchProvider.js';
export { SimulatedSearchProvider } from './SimulatedSearchProvider.js';
export type { SearchHit, SearchOptions, SearchProvider } from './types.js';
