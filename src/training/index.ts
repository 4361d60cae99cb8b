export { JsonlTrainingDataSink } from './JsonlTrainingDataSink.js';
export type { TrainingDataSink, TrainingExample } from './types.js';
