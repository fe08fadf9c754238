import type { PersonaId } from '../../domain/entities/Persona.js';
import type { TimeWindow } from '../../domain/entities/Signal.js';
import {
  detectedBehaviors,
  MIN_BEHAVIORS,
  percentage,
  personaDistribution,
  type PersonaShare,
} from '../../domain/services/evaluation/EvaluationMetrics.js';
import { compareCodePoints } from '../../domain/services/IntervalMath.js';
import { DecisionTraceSchema } from '../dto/DecisionTraceDTO.js';
import type { StoragePort } from '../ports/StoragePort.js';
import { systemClock, type Clock } from './Clock.js';
import type { SignalService } from './SignalService.js';

export interface EvaluationReport {
  timeWindow: TimeWindow;
  coverage: {
    totalUsers: number;
    usersWithPersonas: number;
    usersWithMinBehaviors: number;
    personaCoverage: number;
    behaviorCoverage: number;
  };
  explainability: {
    totalRecommendations: number;
    withRationale: number;
    percentage: number;
  };
  auditability: {
    totalRecommendations: number;
    withValidTrace: number;
    percentage: number;
  };
  personaDistribution: Record<PersonaId, PersonaShare>;
  generatedAt: string;
}

/**
 * Coverage, explainability, auditability and persona mix for one window,
 * measured over every user in the ledger against what the last runs stored.
 */
export class EvaluationService {
  constructor(
    private readonly storage: StoragePort,
    private readonly signals: SignalService,
    private readonly clock: Clock = systemClock,
  ) {}

  async evaluate(timeWindow: TimeWindow): Promise<EvaluationReport> {
    const { accounts, transactions } = await this.storage.loadLedger();
    const userIds = [...new Set([...accounts, ...transactions].map((row) => row.userId))].sort(compareCodePoints);

    const personas: PersonaId[] = [];
    let usersWithMinBehaviors = 0;
    let totalRecommendations = 0;
    let withRationale = 0;
    let withValidTrace = 0;

    for (const userId of userIds) {
      const assignment = await this.storage.loadPersonaAssignment(userId, timeWindow);
      if (assignment) {
        personas.push(assignment.primaryPersona);
      }

      const stored = await this.signals.loadBundle(userId, timeWindow);
      if (stored && detectedBehaviors(stored.signals).length >= MIN_BEHAVIORS) {
        usersWithMinBehaviors += 1;
      }

      const recommendations = (await this.storage.listRecommendations(userId)).filter(
        (recommendation) => recommendation.timeWindow === timeWindow,
      );
      totalRecommendations += recommendations.length;
      withRationale += recommendations.filter((recommendation) => recommendation.rationale.trim() !== '').length;
      withValidTrace += recommendations.filter(
        (recommendation) => DecisionTraceSchema.safeParse(recommendation.decisionTrace).success,
      ).length;
    }

    const report: EvaluationReport = {
      timeWindow,
      coverage: {
        totalUsers: userIds.length,
        usersWithPersonas: personas.length,
        usersWithMinBehaviors,
        personaCoverage: percentage(personas.length, userIds.length),
        behaviorCoverage: percentage(usersWithMinBehaviors, userIds.length),
      },
      explainability: {
        totalRecommendations,
        withRationale,
        percentage: percentage(withRationale, totalRecommendations),
      },
      auditability: {
        totalRecommendations,
        withValidTrace,
        percentage: percentage(withValidTrace, totalRecommendations),
      },
      personaDistribution: personaDistribution(personas),
      generatedAt: this.clock().toISOString(),
    };

    console.log(
      `📏 Evaluation ${timeWindow}: ${report.coverage.personaCoverage}% persona coverage, ` +
        `${report.explainability.percentage}% explainable, ${report.auditability.percentage}% auditable`,
    );
    return report;
  }
}
