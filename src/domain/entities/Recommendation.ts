import type { DecisionTrace } from './DecisionTrace.js';
import type { TimeWindow } from './Signal.js';

export type RecommendationType = 'education' | 'partner_offer';

export interface Recommendation {
  recommendationId: string;
  userId: string;
  timeWindow: TimeWindow;
  type: RecommendationType;
  contentId: string;
  title: string;
  rationale: string;
  decisionTrace: DecisionTrace;
  shownAt: string; // ISO timestamp
  overridden: boolean;
  overrideReason: string | null;
  overriddenBy: string | null;
  overriddenAt: string | null; // ISO timestamp
}

export interface RecommendationOverride {
  reason: string;
  operatorId: string;
}
