import type { Account } from '../../domain/entities/Account.js';
import type { OperatorAction } from '../../domain/entities/OperatorAction.js';
import type { GuardrailIncident } from '../../domain/entities/GuardrailIncident.js';
import type { PersonaAssignment } from '../../domain/entities/Persona.js';
import type { Recommendation, RecommendationOverride } from '../../domain/entities/Recommendation.js';
import type { SignalRecord, TimeWindow } from '../../domain/entities/Signal.js';
import type { Transaction } from '../../domain/entities/Transaction.js';

export interface Ledger {
  accounts: Account[];
  transactions: Transaction[];
}

export interface StoragePort {
  /** Every user's ledger, or only the listed users'. */
  loadLedger(userIds?: string[]): Promise<Ledger>;
  seedLedger(ledger: Ledger): Promise<void>;
  /** Replaces the current row per (userId, timeWindow, signalType). */
  upsertSignals(records: SignalRecord[]): Promise<void>;
  loadSignals(userId: string, timeWindow: TimeWindow): Promise<SignalRecord[]>;
  /** Replaces the current row per (userId, timeWindow). */
  upsertPersonaAssignments(assignments: PersonaAssignment[]): Promise<void>;
  loadPersonaAssignment(userId: string, timeWindow: TimeWindow): Promise<PersonaAssignment | null>;
  appendRecommendations(recommendations: Recommendation[]): Promise<void>;
  listRecommendations(userId: string): Promise<Recommendation[]>;
  findRecommendation(recommendationId: string): Promise<Recommendation | null>;
  applyOverride(recommendationId: string, override: RecommendationOverride, overriddenAt: string): Promise<Recommendation | null>;
  saveGuardrailIncidents(incidents: GuardrailIncident[]): Promise<void>;
  listGuardrailIncidents(): Promise<GuardrailIncident[]>;
  appendOperatorActions(actions: OperatorAction[]): Promise<void>;
  /** Oldest first; every user's actions, or only the given user's. */
  listOperatorActions(userId?: string): Promise<OperatorAction[]>;
}
