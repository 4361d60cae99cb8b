export type ReasoningSource = 'model' | 'fallback';

export interface ReasoningAnalysis {
  text: string;
  /** Tool names the analysis suggests, deduplicated. */
  toolHints: string[];
  source: ReasoningSource;
}
