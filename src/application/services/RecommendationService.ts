import type { TriggerSignal } from '../../domain/entities/CatalogItem.js';
import type { EligibilityCheck, MatchReason } from '../../domain/entities/DecisionTrace.js';
import type { GuardrailIncident } from '../../domain/entities/GuardrailIncident.js';
import type { PersonaId } from '../../domain/entities/Persona.js';
import type { Recommendation, RecommendationType } from '../../domain/entities/Recommendation.js';
import type { SignalBundle, TimeWindow } from '../../domain/entities/Signal.js';
import {
  ContentNotFoundError,
  GuardrailViolationError,
  type RecommendationErrorCode,
} from '../../domain/errors/RecommendationErrors.js';
import { ruleFor } from '../../domain/services/personas/PersonaRules.js';
import { buildDecisionTrace } from '../../domain/services/recommendations/DecisionTraceBuilder.js';
import { generateRationale } from '../../domain/services/recommendations/RationaleGenerator.js';
import {
  DEFAULT_MATCH_BOUNDS,
  matchEducation,
  matchOffers,
  type MatchBounds,
} from '../../domain/services/recommendations/RecommendationMatcher.js';
import { checkTone } from '../../domain/services/recommendations/ToneGuardrail.js';
import type { CatalogPort } from '../ports/CatalogPort.js';
import type { StoragePort } from '../ports/StoragePort.js';
import { systemClock, type Clock } from './Clock.js';
import { prefixedId } from './Ids.js';

export interface GenerateRecommendationsInput {
  userId: string;
  timeWindow: TimeWindow;
  persona: PersonaId;
  signals: SignalBundle;
}

export interface SkippedRecommendation {
  userId: string;
  timeWindow: TimeWindow;
  contentId: string;
  code: RecommendationErrorCode;
  message: string;
}

export interface FlaggedRecommendation {
  userId: string;
  timeWindow: TimeWindow;
  contentId: string;
  violations: string[];
}

export interface GenerationResult {
  recommendations: Recommendation[];
  skipped: SkippedRecommendation[];
  flagged: FlaggedRecommendation[];
}

interface Candidate {
  contentId: string;
  contentType: RecommendationType;
  matchReason: MatchReason;
  triggersMatched: TriggerSignal[];
  signalFields: string[];
  eligibilityChecks: EligibilityCheck[];
}

export class RecommendationService {
  constructor(
    private readonly storage: StoragePort,
    private readonly catalog: CatalogPort,
    private readonly bounds: MatchBounds = DEFAULT_MATCH_BOUNDS,
    private readonly clock: Clock = systemClock,
  ) {}

  /**
   * Matches, renders and stores recommendations for one user and window. A
   * missing catalog entry or a blocked rationale drops only that item; both
   * are reported in the result.
   */
  async generate(input: GenerateRecommendationsInput): Promise<GenerationResult> {
    const shownAt = this.clock().toISOString();
    const result: GenerationResult = { recommendations: [], skipped: [], flagged: [] };
    const incidents: GuardrailIncident[] = [];

    for (const candidate of this.candidates(input)) {
      try {
        result.recommendations.push(this.build(input, candidate, shownAt));
      } catch (error) {
        if (error instanceof GuardrailViolationError) {
          console.warn(`🚫 Rationale for ${error.contentId} blocked for ${input.userId}: ${error.violations.join(', ')}`);
          result.flagged.push({
            userId: input.userId,
            timeWindow: input.timeWindow,
            contentId: error.contentId,
            violations: error.violations,
          });
          incidents.push({
            incidentId: prefixedId('inc'),
            userId: input.userId,
            timeWindow: input.timeWindow,
            contentId: error.contentId,
            violations: error.violations,
            rationale: error.rationale,
            detectedAt: shownAt,
          });
        } else if (error instanceof ContentNotFoundError) {
          console.warn(`⚠️ Skipping ${error.contentId} for ${input.userId}: ${error.message}`);
          result.skipped.push({
            userId: input.userId,
            timeWindow: input.timeWindow,
            contentId: error.contentId,
            code: error.code,
            message: error.message,
          });
        } else {
          throw error;
        }
      }
    }

    if (result.recommendations.length > 0) {
      await this.storage.appendRecommendations(result.recommendations);
    }
    if (incidents.length > 0) {
      await this.storage.saveGuardrailIncidents(incidents);
    }

    return result;
  }

  private candidates(input: GenerateRecommendationsInput): Candidate[] {
    const education = matchEducation(input.persona, input.signals, this.catalog.listEducation(), this.bounds).map(
      (match): Candidate => ({
        contentId: match.item.contentId,
        contentType: 'education',
        matchReason: match.matchReason,
        triggersMatched: match.triggersMatched,
        signalFields: match.signalFields,
        eligibilityChecks: [],
      }),
    );

    const offers = matchOffers(input.signals, this.catalog.listOffers(), this.bounds).map(
      (match): Candidate => ({
        contentId: match.item.offerId,
        contentType: 'partner_offer',
        matchReason: match.matchReason,
        triggersMatched: [],
        signalFields: match.signalFields,
        eligibilityChecks: match.eligibilityChecks,
      }),
    );

    return [...education, ...offers];
  }

  private build(input: GenerateRecommendationsInput, candidate: Candidate, shownAt: string): Recommendation {
    const item = this.catalog.findById(candidate.contentId);
    if (!item || item.type !== candidate.contentType) {
      throw new ContentNotFoundError(candidate.contentId);
    }

    const rationale = generateRationale(item.rationaleTemplate, input.signals);
    const tone = checkTone(rationale.text);
    if (!tone.passed) {
      throw new GuardrailViolationError(candidate.contentId, tone.violations, rationale.text);
    }

    const decisionTrace = buildDecisionTrace({
      persona: input.persona,
      personaSignalFields: ruleFor(input.persona).signalFields,
      timeWindow: input.timeWindow,
      contentId: candidate.contentId,
      contentType: candidate.contentType,
      matchReason: candidate.matchReason,
      triggersMatched: candidate.triggersMatched,
      matchSignalFields: candidate.signalFields,
      rationaleSignalFields: rationale.signalFields,
      eligibilityChecks: candidate.eligibilityChecks,
      tone,
      timestamp: shownAt,
    });

    return {
      recommendationId: prefixedId('rec'),
      userId: input.userId,
      timeWindow: input.timeWindow,
      type: candidate.contentType,
      contentId: candidate.contentId,
      title: item.title,
      rationale: rationale.text,
      decisionTrace,
      shownAt,
      overridden: false,
      overrideReason: null,
      overriddenBy: null,
      overriddenAt: null,
    };
  }
}
