import type { SpecialistDependencies } from './base/Specialist.js';
import type { SpecialistRegistry } from './base/SpecialistRegistry.js';
import { createResearcher } from './research/Researcher.js';
import { createAnalyst } from './analysis/Analyst.js';
import { createWriter } from './writing/Writer.js';
import { createEngineer } from './technical/Engineer.js';
import { createGeneralist } from './general/Generalist.js';

export function registerDefaultSpecialists(
  registry: SpecialistRegistry,
  dependencies: SpecialistDependencies
): void {
  registry.register(createResearcher(dependencies));
  registry.register(createAnalyst(dependencies));
  registry.register(createWriter(dependencies));
  registry.register(createEngineer(dependencies));
  registry.register(createGeneralist(dependencies));
}
