import { nanoid } from 'nanoid';
import type { Span, TracingSink } from './types.js';
import { formatError } from '../utils/errors.js';
import { logger } from '../cli/ui/logger.js';

/**
 * Records nested spans around units of work. A span is emitted when its
 * function settles; children are created through the scope passed to it.
 * Sink failures are logged and never reach the traced code.
 */
export class Tracer {
  private constructor(
    private sink: TracingSink | null,
    private parentId: string | null
  ) {}

  static create(sink: TracingSink | null): Tracer {
    return new Tracer(sink, null);
  }

  static disabled(): Tracer {
    return new Tracer(null, null);
  }

  get enabled(): boolean {
    return this.sink !== null;
  }

  async trace<T>(
    name: string,
    inputs: Record<string, unknown>,
    fn: (scope: Tracer) => Promise<T>,
    summarize?: (result: T) => unknown
  ): Promise<T> {
    if (!this.sink) {
      return fn(this);
    }

    const id = nanoid();
    const startedAt = new Date();
    const scope = new Tracer(this.sink, id);

    try {
      const result = await fn(scope);
      this.emit({
        id,
        parentId: this.parentId,
        name,
        inputs,
        outputs: summarize ? summarize(result) : result,
        startedAt,
        durationMs: Date.now() - startedAt.getTime(),
      });
      return result;
    } catch (error) {
      this.emit({
        id,
        parentId: this.parentId,
        name,
        inputs,
        error: formatError(error),
        startedAt,
        durationMs: Date.now() - startedAt.getTime(),
      });
      throw error;
    }
  }

  private emit(span: Span): void {
    if (!this.sink) return;
    try {
      const pending = this.sink.record(span);
      if (pending instanceof Promise) {
        pending.catch((error: unknown) => logger.warn(`Tracing sink failed: ${formatError(error)}`));
      }
    } catch (error) {
      logger.warn(`Tracing sink failed: ${formatError(error)}`);
    }
  }
}
