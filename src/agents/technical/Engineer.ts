import { Specialist, type SpecialistDependencies } from '../base/Specialist.js';
import type { SpecialistConfig } from '../base/types.js';
import { TECHNICAL_DIRECTIVE } from './prompts.js';

export class Engineer extends Specialist {
  constructor(dependencies: SpecialistDependencies, configOverrides?: Partial<SpecialistConfig>) {
    super(
      {
        role: 'technical',
        name: configOverrides?.name ?? 'Technical Specialist',
        directive: configOverrides?.directive ?? TECHNICAL_DIRECTIVE,
        capabilities: ['implementation', 'problem_solving', 'code_review'],
        allowedTools: configOverrides?.allowedTools ?? 'all',
      },
      dependencies
    );
  }
}

export function createEngineer(dependencies: SpecialistDependencies): Engineer {
  return new Engineer(dependencies);
}
