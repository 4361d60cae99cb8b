import type { Specialist } from './Specialist.js';
import type { SpecialistRole } from './types.js';
import { ConfigurationError } from '../../utils/errors.js';

export class SpecialistRegistry {
  private specialists: Map<SpecialistRole, Specialist> = new Map();

  register(specialist: Specialist): void {
    if (this.specialists.has(specialist.role)) {
      throw new ConfigurationError(`A ${specialist.role} specialist is already registered`, {
        role: specialist.role,
      });
    }
    this.specialists.set(specialist.role, specialist);
  }

  get(role: SpecialistRole): Specialist | undefined {
    return this.specialists.get(role);
  }

  has(role: SpecialistRole): boolean {
    return this.specialists.has(role);
  }
}
