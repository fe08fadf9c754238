import type { PersonaAssignment } from '../../domain/entities/Persona.js';
import type { SignalBundle, TimeWindow } from '../../domain/entities/Signal.js';
import { classifyPersonaBatch, toPersonaAssignment } from '../../domain/services/personas/PersonaClassifier.js';
import type { StoragePort } from '../ports/StoragePort.js';
import { systemClock, type Clock } from './Clock.js';

export class PersonaService {
  constructor(
    private readonly storage: StoragePort,
    private readonly clock: Clock = systemClock,
  ) {}

  async assignAndStore(bundles: Map<string, SignalBundle>, timeWindow: TimeWindow): Promise<PersonaAssignment[]> {
    const entries = [...bundles];
    const classifications = classifyPersonaBatch(entries.map(([, bundle]) => bundle));
    const assignedAt = this.clock().toISOString();

    const assignments = entries.map(([userId], index) => {
      const classification = classifications[index];
      if (!classification) {
        throw new Error(`Missing persona classification for ${userId}`);
      }
      return toPersonaAssignment(userId, timeWindow, classification, assignedAt);
    });

    await this.storage.upsertPersonaAssignments(assignments);
    console.log(`🧭 Personas assigned for ${assignments.length} users (${timeWindow})`);

    return assignments;
  }

  async current(userId: string, timeWindow: TimeWindow): Promise<PersonaAssignment | null> {
    return this.storage.loadPersonaAssignment(userId, timeWindow);
  }
}
