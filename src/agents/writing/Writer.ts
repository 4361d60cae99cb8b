import { Specialist, type SpecialistDependencies } from '../base/Specialist.js';
import type { SpecialistConfig } from '../base/types.js';
import { WRITING_DIRECTIVE, WRITING_TOOLS } from './prompts.js';

export class Writer extends Specialist {
  constructor(dependencies: SpecialistDependencies, configOverrides?: Partial<SpecialistConfig>) {
    super(
      {
        role: 'writing',
        name: configOverrides?.name ?? 'Writing Specialist',
        directive: configOverrides?.directive ?? WRITING_DIRECTIVE,
        capabilities: ['content_creation', 'summarization', 'documentation'],
        allowedTools: configOverrides?.allowedTools ?? WRITING_TOOLS,
      },
      dependencies
    );
  }
}

export function createWriter(dependencies: SpecialistDependencies): Writer {
  return new Writer(dependencies);
}
