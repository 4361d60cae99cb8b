import { Specialist, type SpecialistDependencies } from '../base/Specialist.js';
import type { SpecialistConfig } from '../base/types.js';
import { RESEARCH_DIRECTIVE } from './prompts.js';

export class Researcher extends Specialist {
  constructor(dependencies: SpecialistDependencies, configOverrides?: Partial<SpecialistConfig>) {
    super(
      {
        role: 'research',
        name: configOverrides?.name ?? 'Research Specialist',
        directive: configOverrides?.directive ?? RESEARCH_DIRECTIVE,
        capabilities: ['information_gathering', 'fact_checking', 'source_verification'],
        allowedTools: configOverrides?.allowedTools ?? 'all',
      },
      dependencies
    );
  }
}

export function createResearcher(dependencies: SpecialistDependencies): Researcher {
  return new Researcher(dependencies);
}
