import type { TrainingDataSink, TrainingExample } from './types.js';
import { appendLine } from '../utils/fs.js';
import { formatError } from '../utils/errors.js';
import { logger } from '../cli/ui/logger.js';

export class JsonlTrainingDataSink implements TrainingDataSink {
  constructor(readonly filePath: string) {}

  async record(example: TrainingExample): Promise<void> {
    try {
      await appendLine(this.filePath, JSON.stringify(example));
    } catch (error) {
      logger.warn(`Could not record training example to ${this.filePath}: ${formatError(error)}`);
    }
  }
}
