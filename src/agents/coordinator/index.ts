export { Coordinator, synthesizeDeterministic } from './Coordinator.js';
export type {
  CoordinateOptions,
  CoordinatorDependencies,
  CoordinatorEvents,
  OrchestrationResult,
  TaskAnalysis,
} from './Coordinator.js';
export { DEFAULT_SPECIALIST_RULES } from './rules.js';
export type { SpecialistRule } from './rules.js';
export { APOLOGY_RESPONSE } from './prompts.js';
