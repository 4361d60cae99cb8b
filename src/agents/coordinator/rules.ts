import type { SpecialistRole } from '../base/types.js';
import { tokenize } from '../../utils/validation.js';

export interface SpecialistRule {
  role: SpecialistRole;
  describe: string;
  matches: (query: string) => boolean;
}

function hasAnyToken(query: string, words: string[]): boolean {
  const tokens = new Set(tokenize(query));
  return words.some((word) => tokens.has(word));
}

// Evaluated in order; the order of matches is the order specialists run in.
export const DEFAULT_SPECIALIST_RULES: SpecialistRule[] = [
  {
    role: 'research',
    describe: 'research, information, data, search, find or "look up"',
    matches: (query) =>
      hasAnyToken(query, ['research', 'information', 'data', 'search', 'find']) ||
      query.toLowerCase().includes('look up'),
  },
  {
    role: 'analysis',
    describe: 'analyze, analysis, trend or insight',
    matches: (query) =>
      hasAnyToken(query, ['analyze', 'analyse', 'analysis', 'trend', 'trends', 'insight', 'insights']),
  },
  {
    role: 'writing',
    describe: 'write, summary, summarize, document or report',
    matches: (query) =>
      hasAnyToken(query, ['write', 'writing', 'summary', 'summarize', 'summarise', 'document', 'report']),
  },
  {
    role: 'technical',
    describe: 'implement, code or technical',
    matches: (query) => hasAnyToken(query, ['implement', 'implementation', 'code', 'technical']),
  },
];
