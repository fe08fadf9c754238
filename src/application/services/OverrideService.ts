import type { OperatorAction } from '../../domain/entities/OperatorAction.js';
import type { Recommendation, RecommendationOverride } from '../../domain/entities/Recommendation.js';
import { RecommendationNotFoundError, UserNotFoundError } from '../../domain/errors/RecommendationErrors.js';
import type { StoragePort } from '../ports/StoragePort.js';
import { systemClock, type Clock } from './Clock.js';
import { prefixedId } from './Ids.js';

export class OverrideService {
  constructor(
    private readonly storage: StoragePort,
    private readonly clock: Clock = systemClock,
  ) {}

  /**
   * Sets the override fields and logs an `override` action; nothing else on a
   * recommendation ever changes.
   */
  async override(recommendationId: string, override: RecommendationOverride): Promise<Recommendation> {
    const at = this.clock().toISOString();
    const updated = await this.storage.applyOverride(recommendationId, override, at);
    if (!updated) {
      throw new RecommendationNotFoundError(recommendationId);
    }

    await this.storage.appendOperatorActions([
      {
        actionId: prefixedId('act'),
        operatorId: override.operatorId,
        userId: updated.userId,
        actionType: 'override',
        recommendationId,
        reason: override.reason,
        createdAt: at,
      },
    ]);

    console.log(`✋ Recommendation ${recommendationId} overridden by ${override.operatorId}`);
    return updated;
  }

  /** Marks a user for review. Only the audit log changes. */
  async flagUser(userId: string, flag: RecommendationOverride): Promise<OperatorAction> {
    const { accounts, transactions } = await this.storage.loadLedger([userId]);
    if (accounts.length === 0 && transactions.length === 0) {
      throw new UserNotFoundError(userId);
    }

    const action: OperatorAction = {
      actionId: prefixedId('act'),
      operatorId: flag.operatorId,
      userId,
      actionType: 'flag',
      recommendationId: null,
      reason: flag.reason,
      createdAt: this.clock().toISOString(),
    };
    await this.storage.appendOperatorActions([action]);

    console.log(`🚩 User ${userId} flagged by ${flag.operatorId}`);
    return action;
  }

  async actions(userId?: string): Promise<OperatorAction[]> {
    return this.storage.listOperatorActions(userId);
  }
}
