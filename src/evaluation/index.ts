export { Evaluator, toGrade, GradeSchema, SCORE_WEIGHTS } from './Evaluator.js';
export type { Evaluation, EvaluationSummary, EvaluatedRun, Grade } from './Evaluator.js';
export { classifyComplexity, QueryComplexitySchema } from './complexity.js';
export type { QueryComplexity } from './complexity.js';
export {
  scoreQuality,
  scoreToolUsage,
  scorePerformance,
  expectedTools,
  COMPLEXITY_THRESHOLDS_MS,
} from './scoring.js';
export type { QualityBreakdown, ToolUsageBreakdown, PerformanceBreakdown } from './scoring.js';
