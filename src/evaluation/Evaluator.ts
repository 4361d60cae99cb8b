import { z } from 'zod';
import type { OrchestrationResult } from '../agents/coordinator/Coordinator.js';
import { classifyComplexity } from './complexity.js';
import {
  scorePerformance,
  scoreQuality,
  scoreToolUsage,
  type PerformanceBreakdown,
  type QualityBreakdown,
  type ToolUsageBreakdown,
} from './scoring.js';

export const GradeSchema = z.enum(['A', 'B', 'C', 'D', 'F']);
export type Grade = z.infer<typeof GradeSchema>;

export const SCORE_WEIGHTS = {
  quality: 0.5,
  toolUsage: 0.3,
  performance: 0.2,
} as const;

export interface Evaluation {
  qualityScore: number;
  toolUsageScore: number;
  performanceScore: number;
  overallScore: number;
  grade: Grade;
  details: {
    quality: QualityBreakdown;
    toolUsage: ToolUsageBreakdown;
    performance: PerformanceBreakdown;
  };
  evaluatedAt: Date;
}

export interface EvaluationSummary {
  totalEvaluations: number;
  averageScore: number;
  bestScore: number;
  worstScore: number;
  gradeDistribution: Record<Grade, number>;
}

export type EvaluatedRun = Pick<OrchestrationResult, 'finalResponse' | 'toolsUsed' | 'processingTimeMs'>;

export function toGrade(score: number): Grade {
  if (score >= 90) return 'A';
  if (score >= 80) return 'B';
  if (score >= 70) return 'C';
  if (score >= 60) return 'D';
  return 'F';
}

export class Evaluator {
  private history: Evaluation[] = [];

  evaluate(result: EvaluatedRun, query: string): Evaluation {
    const quality = scoreQuality(query, result.finalResponse);
    const toolUsage = scoreToolUsage(query, result.toolsUsed);
    const performance = scorePerformance(result.processingTimeMs, classifyComplexity(query));

    const overallScore =
      quality.score * SCORE_WEIGHTS.quality +
      toolUsage.score * SCORE_WEIGHTS.toolUsage +
      performance.score * SCORE_WEIGHTS.performance;

    const evaluation: Evaluation = {
      qualityScore: quality.score,
      toolUsageScore: toolUsage.score,
      performanceScore: performance.score,
      overallScore,
      grade: toGrade(overallScore),
      details: { quality, toolUsage, performance },
      evaluatedAt: new Date(),
    };

    this.history.push(evaluation);
    return evaluation;
  }

  getHistory(): Evaluation[] {
    return [...this.history];
  }

  getSummary(): EvaluationSummary {
    const gradeDistribution: Record<Grade, number> = { A: 0, B: 0, C: 0, D: 0, F: 0 };
    if (this.history.length === 0) {
      return { totalEvaluations: 0, averageScore: 0, bestScore: 0, worstScore: 0, gradeDistribution };
    }

    const scores = this.history.map((evaluation) => evaluation.overallScore);
    for (const evaluation of this.history) {
      gradeDistribution[evaluation.grade]++;
    }

    return {
      totalEvaluations: scores.length,
      averageScore: scores.reduce((sum, score) => sum + score, 0) / scores.length,
      bestScore: Math.max(...scores),
      worstScore: Math.min(...scores),
      gradeDistribution,
    };
  }

  clear(): void {
    this.history = [];
  }
}
