import type { WeatherCondition, WeatherProvider, WeatherReport } from './types.js';

const CONDITIONS: WeatherCondition[] = ['sunny', 'cloudy', 'rainy', 'snowy'];

// FNV-1a, 32 bit
function hashLocation(location: string): number {
  let hash = 0x811c9dc5;
  for (const char of location.toLowerCase()) {
    hash ^= char.charCodeAt(0);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash;
}

/**
 * Stable readings derived from the location name, so the same place always
 * reports the same weather.
 */
export class SimulatedWeatherProvider implements WeatherProvider {
  readonly name = 'simulated';

  async lookup(location: string): Promise<WeatherReport> {
    const hash = hashLocation(location);
    return {
      location,
      temperature: -10 + (hash % 46),
      condition: CONDITIONS[(hash >>> 8) % CONDITIONS.length] ?? 'sunny',
      humidity: 30 + ((hash >>> 16) % 61),
    };
  }
}
