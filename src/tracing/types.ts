export interface Span {
  id: string;
  parentId: string | null;
  name: string;
  inputs: Record<string, unknown>;
  outputs?: unknown;
  error?: string;
  startedAt: Date;
  durationMs: number;
}

export interface TracingSink {
  record(span: Span): void | Promise<void>;
}
