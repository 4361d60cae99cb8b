import { Specialist, type SpecialistDependencies } from '../base/Specialist.js';
import type { SpecialistConfig } from '../base/types.js';
import { ANALYSIS_DIRECTIVE } from './prompts.js';

export class Analyst extends Specialist {
  constructor(dependencies: SpecialistDependencies, configOverrides?: Partial<SpecialistConfig>) {
    super(
      {
        role: 'analysis',
        name: configOverrides?.name ?? 'Analysis Specialist',
        directive: configOverrides?.directive ?? ANALYSIS_DIRECTIVE,
        capabilities: ['data_analysis', 'pattern_recognition', 'insight_generation'],
        allowedTools: configOverrides?.allowedTools ?? 'all',
      },
      dependencies
    );
  }
}

export function createAnalyst(dependencies: SpecialistDependencies): Analyst {
  return new Analyst(dependencies);
}
