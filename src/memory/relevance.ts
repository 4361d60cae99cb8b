import type { ConversationTurn } from './types.js';
import { tokenize } from '../utils/validation.js';

export interface ScoredTurn {
  turn: ConversationTurn;
  score: number;
}

/**
 * Share of the query's tokens that also occur in the turn.
 */
export function scoreTurn(queryTokens: string[], turn: ConversationTurn): number {
  if (queryTokens.length === 0) return 0;
  const turnTokens = new Set(tokenize(`${turn.query} ${turn.response}`));
  const overlap = queryTokens.filter((token) => turnTokens.has(token)).length;
  return overlap / queryTokens.length;
}

/**
 * Turns in chronological order in; best match first out, ties newest first,
 * zero scores dropped.
 */
export function rankByRelevance(query: string, turns: ConversationTurn[]): ScoredTurn[] {
  const queryTokens = tokenize(query);
  return turns
    .map((turn, index) => ({ turn, index, score: scoreTurn(queryTokens, turn) }))
    .filter((entry) => entry.score > 0)
    .sort((a, b) => b.score - a.score || b.index - a.index)
    .map(({ turn, score }) => ({ turn, score }));
}

export function formatTurns(turns: ConversationTurn[]): string {
  return turns.map((turn) => `User: ${turn.query}\nAssistant: ${turn.response}`).join('\n\n');
}
