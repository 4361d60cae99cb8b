import { z } from 'zod';
import { tokenize } from '../utils/validation.js';

export const QueryComplexitySchema = z.enum(['simple', 'medium', 'complex']);
export type QueryComplexity = z.infer<typeof QueryComplexitySchema>;

const COMPLEX_WORDS = ['analyze', 'analyse', 'compare', 'research', 'evaluate'];
const MEDIUM_WORDS = ['summarize', 'summarise', 'describe', 'explain', 'how', 'why', 'search', 'find'];

/**
 * Rough size of the work a query asks for, used to pick response-time
 * expectations.
 */
export function classifyComplexity(query: string): QueryComplexity {
  const words = query.split(/\s+/).filter((word) => word.length > 0).length;
  const tokens = new Set(tokenize(query));

  if (words > 25 || COMPLEX_WORDS.some((word) => tokens.has(word))) {
    return 'complex';
  }
  if (words > 10 || MEDIUM_WORDS.some((word) => tokens.has(word))) {
    return 'medium';
  }
  return 'simple';
}
