import type { Span, TracingSink } from './types.js';
import { logger } from '../cli/ui/logger.js';

export class LoggerTracingSink implements TracingSink {
  record(span: Span): void {
    const status = span.error ? `failed: ${span.error}` : 'ok';
    logger.debug(`[trace] ${span.name} ${status} (${span.durationMs}ms)`);
  }
}

export class MemoryTracingSink implements TracingSink {
  private spans: Span[] = [];

  record(span: Span): void {
    this.spans.push(span);
  }

  getSpans(): Span[] {
    return [...this.spans];
  }

  find(name: string): Span[] {
    return this.spans.filter((span) => span.name === name);
  }

  clear(): void {
    this.spans = [];
  }
}
