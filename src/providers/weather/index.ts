export { SimulatedWeatherProvider } from './SimulatedWeatherProvider.js';
export type { WeatherCondition, WeatherProvider, WeatherReport } from './types.js';
