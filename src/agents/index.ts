// Base
export { Specialist, SpecialistRegistry } from './base/index.js';
export type {
  SpecialistRole,
  SpecialistCapability,
  SpecialistConfig,
  SpecialistDependencies,
  SpecialistResult,
  SpecialistRunOptions,
  SpecialistState,
  StateTransition,
} from './base/index.js';
export { SpecialistRoleSchema, SpecialistStateSchema } from './base/index.js';

// Role variants
export { Researcher, createResearcher } from './research/Researcher.js';
export { Analyst, createAnalyst } from './analysis/Analyst.js';
export { Writer, createWriter } from './writing/Writer.js';
export { Engineer, createEngineer } from './technical/Engineer.js';
export { Generalist, createGeneralist } from './general/Generalist.js';
export { registerDefaultSpecialists } from './registerDefaults.js';

// Coordinator
export {
  Coordinator,
  synthesizeDeterministic,
  DEFAULT_SPECIALIST_RULES,
  APOLOGY_RESPONSE,
  type CoordinateOptions,
  type CoordinatorDependencies,
  type CoordinatorEvents,
  type OrchestrationResult,
  type TaskAnalysis,
  type SpecialistRule,
} from './coordinator/index.js';
