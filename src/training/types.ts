export interface TrainingExample {
  query: string;
  response: string;
  toolsUsed: string[];
  processingTimeMs: number;
  timestamp: string;
}

export interface TrainingDataSink {
  /** Never rejects; failures are logged. */
  record(example: TrainingExample): Promise<void>;
}
