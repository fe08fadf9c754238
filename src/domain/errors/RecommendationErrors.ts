export type RecommendationErrorCode =
  | 'CONTENT_NOT_FOUND'
  | 'GUARDRAIL_VIOLATION'
  | 'RECOMMENDATION_NOT_FOUND'
  | 'USER_NOT_FOUND';

export class RecommendationError extends Error {
  constructor(
    message: string,
    readonly code: RecommendationErrorCode,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ContentNotFoundError extends RecommendationError {
  constructor(readonly contentId: string) {
    super(`Content not found in catalog: ${contentId}`, 'CONTENT_NOT_FOUND');
  }
}

export class GuardrailViolationError extends RecommendationError {
  constructor(
    readonly contentId: string,
    readonly violations: string[],
    readonly rationale: string,
  ) {
    super(`Rationale for ${contentId} contains prohibited phrases: ${violations.join(', ')}`, 'GUARDRAIL_VIOLATION');
  }
}

export class RecommendationNotFoundError extends RecommendationError {
  constructor(readonly recommendationId: string) {
    super(`Recommendation not found: ${recommendationId}`, 'RECOMMENDATION_NOT_FOUND');
  }
}

export class UserNotFoundError extends RecommendationError {
  constructor(readonly userId: string) {
    super(`User not found: ${userId}`, 'USER_NOT_FOUND');
  }
}
