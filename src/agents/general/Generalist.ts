import { Specialist, type SpecialistDependencies } from '../base/Specialist.js';
import type { SpecialistConfig } from '../base/types.js';
import { GENERAL_DIRECTIVE } from './prompts.js';

export class Generalist extends Specialist {
  constructor(dependencies: SpecialistDependencies, configOverrides?: Partial<SpecialistConfig>) {
    super(
      {
        role: 'general',
        name: configOverrides?.name ?? 'General Assistant',
        directive: configOverrides?.directive ?? GENERAL_DIRECTIVE,
        capabilities: ['general_assistance', 'problem_solving'],
        allowedTools: configOverrides?.allowedTools ?? 'all',
      },
      dependencies
    );
  }
}

export function createGeneralist(dependencies: SpecialistDependencies): Generalist {
  return new Generalist(dependencies);
}
