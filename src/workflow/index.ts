export { Workflow, createWorkflow } from './Workflow.js';
export type {
  DryRunPlan,
  ProcessOptions,
  SessionStats,
  WorkflowOutcome,
  WorkflowOverrides,
} from './Workflow.js';
