import type { Account } from '../../../domain/entities/Account.js';
import type { OperatorAction } from '../../../domain/entities/OperatorAction.js';
import type { GuardrailIncident } from '../../../domain/entities/GuardrailIncident.js';
import { personaKey, type PersonaAssignment } from '../../../domain/entities/Persona.js';
import type { Recommendation, RecommendationOverride } from '../../../domain/entities/Recommendation.js';
import { SIGNAL_TYPES, signalKey, type SignalRecord, type TimeWindow } from '../../../domain/entities/Signal.js';
import type { Transaction } from '../../../domain/entities/Transaction.js';
import type { Ledger, StoragePort } from '../../../application/ports/StoragePort.js';

/**
 * Map-backed store. Every write replaces whole rows under a single key, and
 * reads hand out copies so callers cannot mutate stored history.
 */
export class InMemoryStorageAdapter implements StoragePort {
  private readonly accounts = new Map<string, Account>();
  private readonly transactions = new Map<string, Transaction>();
  private readonly signals = new Map<string, SignalRecord>();
  private readonly personas = new Map<string, PersonaAssignment>();
  private readonly recommendations = new Map<string, Recommendation>();
  private readonly incidents: GuardrailIncident[] = [];
  private readonly operatorActions: OperatorAction[] = [];

  async seedLedger(ledger: Ledger): Promise<void> {
    for (const account of ledger.accounts) {
      this.accounts.set(account.accountId, structuredClone(account));
    }
    for (const txn of ledger.transactions) {
      this.transactions.set(txn.transactionId, structuredClone(txn));
    }
  }

  async loadLedger(userIds?: string[]): Promise<Ledger> {
    const wanted = userIds ? new Set(userIds) : null;
    const belongs = (userId: string): boolean => wanted === null || wanted.has(userId);

    return {
      accounts: [...this.accounts.values()].filter((account) => belongs(account.userId)).map((a) => structuredClone(a)),
      transactions: [...this.transactions.values()].filter((txn) => belongs(txn.userId)).map((t) => structuredClone(t)),
    };
  }

  async upsertSignals(records: SignalRecord[]): Promise<void> {
    for (const record of records) {
      this.signals.set(signalKey(record), structuredClone(record));
    }
  }

  async loadSignals(userId: string, timeWindow: TimeWindow): Promise<SignalRecord[]> {
    return SIGNAL_TYPES.flatMap((signalType) => {
      const record = this.signals.get(signalKey({ userId, timeWindow, signalType }));
      return record ? [structuredClone(record)] : [];
    });
  }

  async upsertPersonaAssignments(assignments: PersonaAssignment[]): Promise<void> {
    for (const assignment of assignments) {
      this.personas.set(personaKey(assignment), structuredClone(assignment));
    }
  }

  async loadPersonaAssignment(userId: string, timeWindow: TimeWindow): Promise<PersonaAssignment | null> {
    const assignment = this.personas.get(personaKey({ userId, timeWindow }));
    return assignment ? structuredClone(assignment) : null;
  }

  async appendRecommendations(recommendations: Recommendation[]): Promise<void> {
    for (const recommendation of recommendations) {
      if (this.recommendations.has(recommendation.recommendationId)) {
        throw new Error(`Recommendation ${recommendation.recommendationId} already exists`);
      }
      this.recommendations.set(recommendation.recommendationId, structuredClone(recommendation));
    }
  }

  async listRecommendations(userId: string): Promise<Recommendation[]> {
    return [...this.recommendations.values()]
      .filter((recommendation) => recommendation.userId === userId)
      .map((recommendation) => structuredClone(recommendation));
  }

  async findRecommendation(recommendationId: string): Promise<Recommendation | null> {
    const recommendation = this.recommendations.get(recommendationId);
    return recommendation ? structuredClone(recommendation) : null;
  }

  async applyOverride(
    recommendationId: string,
    override: RecommendationOverride,
    overriddenAt: string,
  ): Promise<Recommendation | null> {
    const existing = this.recommendations.get(recommendationId);
    if (!existing) {
      return null;
    }

    const updated: Recommendation = {
      ...existing,
      overridden: true,
      overrideReason: override.reason,
      overriddenBy: override.operatorId,
      overriddenAt,
    };
    this.recommendations.set(recommendationId, updated);
    return structuredClone(updated);
  }

  async saveGuardrailIncidents(incidents: GuardrailIncident[]): Promise<void> {
    this.incidents.push(...incidents.map((incident) => structuredClone(incident)));
  }

  async listGuardrailIncidents(): Promise<GuardrailIncident[]> {
    return this.incidents.map((incident) => structuredClone(incident));
  }

  async appendOperatorActions(actions: OperatorAction[]): Promise<void> {
    this.operatorActions.push(...actions.map((action) => structuredClone(action)));
  }

  async listOperatorActions(userId?: string): Promise<OperatorAction[]> {
    return this.operatorActions
      .filter((action) => userId === undefined || action.userId === userId)
      .map((action) => structuredClone(action));
  }
}
