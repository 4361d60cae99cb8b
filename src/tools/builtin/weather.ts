import { z } from 'zod';
import type { ToolDescriptor } from '../types.js';
import type { WeatherProvider, WeatherReport } from '../../providers/weather/types.js';

const WeatherArgsSchema = z.object({
  location: z.string().min(1),
});
export type WeatherArgs = z.infer<typeof WeatherArgsSchema>;

export const DEFAULT_LOCATION = 'your area';

const PREPOSITIONS = new Set(['in', 'for', 'at']);

function stripPunctuation(word: string): string {
  return word.replace(/^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu, '');
}

/**
 * Location named after the first "in", "for" or "at": the run of
 * capitalised words that follows, or failing that the next word.
 */
export function extractLocation(query: string): string | null {
  const words = query.split(/\s+/).filter((word) => word.length > 0);

  for (let i = 0; i < words.length - 1; i++) {
    if (!PREPOSITIONS.has(words[i]!.toLowerCase())) continue;

    const run: string[] = [];
    for (let j = i + 1; j < words.length; j++) {
      const raw = words[j]!;
      const word = stripPunctuation(raw);
      if (!/^\p{Lu}/u.test(word)) break;
      run.push(word);
      if (word !== raw && /[.,!?;:]$/.test(raw)) break;
    }
    if (run.length > 0) return run.join(' ');

    const next = stripPunctuation(words[i + 1]!);
    if (next) return next;
  }

  return null;
}

export function createWeatherTool(provider: WeatherProvider): ToolDescriptor<WeatherArgs, WeatherReport> {
  return {
    name: 'weather',
    description: 'Get current weather conditions for a location',
    parameters: WeatherArgsSchema,
    handler: ({ location }, { signal }) => provider.lookup(location, signal),
    fromQuery: (query) => ({ location: extractLocation(query) ?? DEFAULT_LOCATION }),
    formatOutput: (report) =>
      `${report.location}: ${report.condition}, ${report.temperature}°C, ${report.humidity}% humidity`,
  };
}
