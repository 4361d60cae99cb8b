import { z } from 'zod';
import type { ToolDescriptor } from '../types.js';

const TimeArgsSchema = z.object({
  timezone: z.string().min(1).default('UTC'),
});
export type TimeArgs = z.infer<typeof TimeArgsSchema>;

export interface TimeOutput {
  timestamp: string;
  epochSeconds: number;
  formatted: string;
  timezone: string;
}

const TIMEZONE_PATTERN = /\b([A-Z][A-Za-z_]+\/[A-Za-z_]+(?:\/[A-Za-z_]+)?)\b/;

/**
 * Throws a RangeError for a zone Intl does not know.
 */
export function currentTime(timezone: string, now: Date): TimeOutput {
  const formatted = new Intl.DateTimeFormat('en-US', {
    timeZone: timezone,
    dateStyle: 'full',
    timeStyle: 'long',
  }).format(now);

  return {
    timestamp: now.toISOString(),
    epochSeconds: Math.floor(now.getTime() / 1000),
    formatted,
    timezone,
  };
}

export function createTimeTool(now: () => Date = () => new Date()): ToolDescriptor<TimeArgs, TimeOutput> {
  return {
    name: 'time',
    description: 'Get the current date and time, optionally in an IANA timezone',
    parameters: TimeArgsSchema,
    handler: ({ timezone }) => currentTime(timezone, now()),
    fromQuery: (query) => {
      const zone = query.match(TIMEZONE_PATTERN)?.[1];
      return zone ? { timezone: zone } : {};
    },
    formatOutput: (output) => `${output.formatted} (${output.timezone})`,
  };
}
