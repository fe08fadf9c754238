import type { DecisionTrace } from '../../domain/entities/DecisionTrace.js';
import type { OperatorActionType } from '../../domain/entities/OperatorAction.js';
import type { PersonaId } from '../../domain/entities/Persona.js';
import type { RecommendationType } from '../../domain/entities/Recommendation.js';
import { TIME_WINDOWS, type SignalType, type TimeWindow } from '../../domain/entities/Signal.js';
import { RecommendationNotFoundError } from '../../domain/errors/RecommendationErrors.js';
import { detectedBehaviors } from '../../domain/services/evaluation/EvaluationMetrics.js';
import type { StoragePort } from '../ports/StoragePort.js';
import type { SignalService } from './SignalService.js';

export interface RecommendationTrace {
  recommendationId: string;
  userId: string;
  timeWindow: TimeWindow;
  contentId: string;
  title: string;
  rationale: string;
  overridden: boolean;
  decisionTrace: DecisionTrace;
}

export type TimelineEvent =
  | { kind: 'signals'; timestamp: string; timeWindow: TimeWindow; detectedBehaviors: SignalType[] }
  | { kind: 'persona'; timestamp: string; timeWindow: TimeWindow; persona: PersonaId; criteriaMet: string[] }
  | {
      kind: 'recommendation';
      timestamp: string;
      timeWindow: TimeWindow;
      recommendationId: string;
      type: RecommendationType;
      contentId: string;
      overridden: boolean;
    }
  | {
      kind: 'guardrail_incident';
      timestamp: string;
      timeWindow: TimeWindow;
      incidentId: string;
      contentId: string;
      violations: string[];
    }
  | {
      kind: 'operator_action';
      timestamp: string;
      actionId: string;
      actionType: OperatorActionType;
      operatorId: string;
      recommendationId: string | null;
      reason: string | null;
    };

export class TraceService {
  constructor(
    private readonly storage: StoragePort,
    private readonly signals: SignalService,
  ) {}

  async traceFor(recommendationId: string): Promise<RecommendationTrace> {
    const recommendation = await this.storage.findRecommendation(recommendationId);
    if (!recommendation) {
      throw new RecommendationNotFoundError(recommendationId);
    }

    return {
      recommendationId: recommendation.recommendationId,
      userId: recommendation.userId,
      timeWindow: recommendation.timeWindow,
      contentId: recommendation.contentId,
      title: recommendation.title,
      rationale: recommendation.rationale,
      overridden: recommendation.overridden,
      decisionTrace: recommendation.decisionTrace,
    };
  }

  /** Everything recorded about a user, most recent first. Events sharing a timestamp keep pipeline order. */
  async timeline(userId: string): Promise<TimelineEvent[]> {
    const events: TimelineEvent[] = [];

    for (const timeWindow of TIME_WINDOWS) {
      const stored = await this.signals.loadBundle(userId, timeWindow);
      if (stored) {
        events.push({
          kind: 'signals',
          timestamp: stored.computedAt,
          timeWindow,
          detectedBehaviors: detectedBehaviors(stored.signals),
        });
      }

      const assignment = await this.storage.loadPersonaAssignment(userId, timeWindow);
      if (assignment) {
        events.push({
          kind: 'persona',
          timestamp: assignment.assignedAt,
          timeWindow,
          persona: assignment.primaryPersona,
          criteriaMet: assignment.criteriaMet,
        });
      }
    }

    for (const recommendation of await this.storage.listRecommendations(userId)) {
      events.push({
        kind: 'recommendation',
        timestamp: recommendation.shownAt,
        timeWindow: recommendation.timeWindow,
        recommendationId: recommendation.recommendationId,
        type: recommendation.type,
        contentId: recommendation.contentId,
        overridden: recommendation.overridden,
      });
    }

    for (const incident of await this.storage.listGuardrailIncidents()) {
      if (incident.userId === userId) {
        events.push({
          kind: 'guardrail_incident',
          timestamp: incident.detectedAt,
          timeWindow: incident.timeWindow,
          incidentId: incident.incidentId,
          contentId: incident.contentId,
          violations: incident.violations,
        });
      }
    }

    for (const action of await this.storage.listOperatorActions(userId)) {
      events.push({
        kind: 'operator_action',
        timestamp: action.createdAt,
        actionId: action.actionId,
        actionType: action.actionType,
        operatorId: action.operatorId,
        recommendationId: action.recommendationId,
        reason: action.reason,
      });
    }

    // ISO timestamps in one zone order lexically; sort is stable
    return events.sort((a, b) => (a.timestamp < b.timestamp ? 1 : a.timestamp > b.timestamp ? -1 : 0));
  }
}
