import type { QueryComplexity } from './complexity.js';

export interface QualityBreakdown {
  score: number;
  lengthScore: number;
  relevanceScore: number;
  coherenceScore: number;
  completenessScore: number;
  responseWords: number;
  wordOverlap: number;
}

export interface ToolUsageBreakdown {
  score: number;
  appropriateness: number;
  efficiency: number;
  expectedTools: string[];
  usedTools: string[];
}

export interface PerformanceBreakdown {
  score: number;
  processingTimeMs: number;
  thresholdMs: number;
  complexity: QueryComplexity;
}

const COMPLETENESS_INDICATORS = ['result', 'conclusion', 'summary', 'answer'];

export const COMPLEXITY_THRESHOLDS_MS: Record<QueryComplexity, number> = {
  simple: 2000,
  medium: 5000,
  complex: 10000,
};

function words(text: string): string[] {
  return text
    .toLowerCase()
    .split(/\s+/)
    .filter((word) => word.length > 0);
}

export function scoreQuality(query: string, response: string): QualityBreakdown {
  const responseWords = words(response);
  const count = responseWords.length;

  let lengthScore: number;
  if (count >= 10 && count <= 200) {
    lengthScore = 20;
  } else if (count < 10) {
    lengthScore = Math.max(0, 20 - (10 - count) * 2);
  } else {
    lengthScore = Math.max(0, 20 - (count - 200) * 0.1);
  }

  const queryWords = new Set(words(query));
  const responseSet = new Set(responseWords);
  const wordOverlap = [...queryWords].filter((word) => responseSet.has(word)).length;
  const relevanceScore = Math.min(30, (wordOverlap / Math.max(queryWords.size, 1)) * 30);

  const coherenceScore = Math.min(25, response.split('.').length * 5);

  const lower = response.toLowerCase();
  const completenessScore =
    COMPLETENESS_INDICATORS.filter((indicator) => lower.includes(indicator)).length * 6.25;

  return {
    score: lengthScore + relevanceScore + coherenceScore + completenessScore,
    lengthScore,
    relevanceScore,
    coherenceScore,
    completenessScore,
    responseWords: count,
    wordOverlap,
  };
}

export function expectedTools(query: string): string[] {
  const lower = query.toLowerCase();
  const expected: string[] = [];
  if (['+', '-', '*', '/', 'calculate'].some((marker) => lower.includes(marker))) {
    expected.push('calculator');
  }
  if (lower.includes('weather')) expected.push('weather');
  if (lower.includes('time')) expected.push('time');
  if (['research', 'find', 'search'].some((marker) => lower.includes(marker))) {
    expected.push('web_search');
  }
  return expected;
}

export function scoreToolUsage(query: string, toolsUsed: readonly string[]): ToolUsageBreakdown {
  const expected = expectedTools(query);

  let appropriateness: number;
  if (expected.length > 0) {
    const correct = expected.filter((tool) => toolsUsed.includes(tool)).length;
    appropriateness = (correct / expected.length) * 60;
  } else {
    appropriateness = toolsUsed.length === 0 ? 60 : 30;
  }

  const efficiency = Math.min(40, Math.max(0, 40 - (toolsUsed.length - expected.length) * 10));

  return {
    score: appropriateness + efficiency,
    appropriateness,
    efficiency,
    expectedTools: expected,
    usedTools: [...toolsUsed],
  };
}

export function scorePerformance(processingTimeMs: number, complexity: QueryComplexity): PerformanceBreakdown {
  const thresholdMs = COMPLEXITY_THRESHOLDS_MS[complexity];
  const seconds = processingTimeMs / 1000;
  const threshold = thresholdMs / 1000;

  let score: number;
  if (seconds <= threshold) {
    score = 100;
  } else if (seconds <= threshold * 2) {
    score = 100 - ((seconds - threshold) / threshold) * 50;
  } else {
    score = Math.max(0, 50 - (seconds - threshold * 2) * 5);
  }

  return { score, processingTimeMs, thresholdMs, complexity };
}
