import type { TracingConfig } from '../config/types.js';
import { Tracer } from './Tracer.js';
import { LoggerTracingSink, MemoryTracingSink } from './sinks.js';

export function createTracer(config: TracingConfig): Tracer {
  if (!config.enabled) return Tracer.disabled();
  return Tracer.create(config.sink === 'memory' ? new MemoryTracingSink() : new LoggerTracingSink());
}

export { Tracer, LoggerTracingSink, MemoryTracingSink };
export type { Span, TracingSink } from './types.js';
