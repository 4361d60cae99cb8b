export { Specialist } from './Specialist.js';
export type { SpecialistDependencies } from './Specialist.js';
export { SpecialistRegistry } from './SpecialistRegistry.js';
export * from './types.js';
