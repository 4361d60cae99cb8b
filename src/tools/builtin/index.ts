import type { ToolRegistry } from '../ToolRegistry.js';
import type { SearchProvider } from '../../providers/search/types.js';
import type { WeatherProvider } from '../../providers/weather/types.js';
import { createCalculatorTool } from './calculator.js';
import { createTimeTool } from './clock.js';
import { createWeatherTool } from './weather.js';
import { createWebSearchTool } from './webSearch.js';

export interface BuiltinToolProviders {
  search: SearchProvider;
  weather: WeatherProvider;
  maxSearchResults?: number;
  now?: () => Date;
}

/**
 * Registers calculator, weather, web_search and time, in that order.
 */
export function registerBuiltinTools(registry: ToolRegistry, providers: BuiltinToolProviders): void {
  registry.register(createCalculatorTool());
  registry.register(createWeatherTool(providers.weather));
  registry.register(createWebSearchTool(providers.search, providers.maxSearchResults ?? 5));
  registry.register(createTimeTool(providers.now));
}

export { calculate, extractArithmeticExpression, createCalculatorTool } from './calculator.js';
export { currentTime, createTimeTool } from './clock.js';
export { extractLocation, createWeatherTool, DEFAULT_LOCATION } from './weather.js';
export { createWebSearchTool, SIMULATED_SEARCH_NOTE } from './webSearch.js';
export type { CalculatorArgs, CalculatorOutput } from './calculator.js';
export type { TimeArgs, TimeOutput } from './clock.js';
export type { WeatherArgs } from './weather.js';
export type { WebSearchArgs, WebSearchOutput } from './webSearch.js';
