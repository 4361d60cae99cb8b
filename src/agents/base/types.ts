import { z } from 'zod';
import type { ToolInvocationResult } from '../../tools/types.js';
import type { ReasoningAnalysis } from '../../reasoning/types.js';

export const SpecialistRoleSchema = z.enum(['research', 'analysis', 'writing', 'technical', 'general']);
export type SpecialistRole = z.infer<typeof SpecialistRoleSchema>;

export const SpecialistCapabilitySchema = z.enum([
  'information_gathering',
  'fact_checking',
  'source_verification',
  'data_analysis',
  'pattern_recognition',
  'insight_generation',
  'content_creation',
  'summarization',
  'documentation',
  'implementation',
  'problem_solving',
  'code_review',
  'general_assistance',
]);
export type SpecialistCapability = z.infer<typeof SpecialistCapabilitySchema>;

export const SpecialistStateSchema = z.enum([
  'RECEIVE_QUERY',
  'RETRIEVE_CONTEXT',
  'REASON',
  'SELECT_TOOLS',
  'EXECUTE_TOOLS',
  'SYNTHESIZE_RESPONSE',
  'DONE',
  'FAILED',
]);
export type SpecialistState = z.infer<typeof SpecialistStateSchema>;

export interface SpecialistConfig {
  role: SpecialistRole;
  name: string;
  directive: string;
  capabilities: SpecialistCapability[];
  /** Tools this specialist may call; 'all' means every registered tool. */
  allowedTools: string[] | 'all';
}

export interface StateTransition {
  specialist: SpecialistRole;
  from: SpecialistState;
  to: SpecialistState;
  at: Date;
}

export interface SpecialistRunOptions {
  sessionId: string;
  /** Response of the most recent completed specialist in this run. */
  context: string | null;
  signal?: AbortSignal;
  onTransition?: (transition: StateTransition) => void;
}

export interface SpecialistResult {
  specialist: SpecialistRole;
  response: string;
  toolResults: Record<string, ToolInvocationResult>;
  toolsUsed: string[];
  processingTimeMs: number;
  context: string | null;
  reasoning: ReasoningAnalysis;
}
