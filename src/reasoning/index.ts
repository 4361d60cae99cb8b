export { Reasoner, parseToolHints } from './Reasoner.js';
export type { ReasonerDependencies, AnalyzeOptions } from './Reasoner.js';
export type { ReasoningAnalysis, ReasoningSource } from './types.js';
