export type OperatorActionType = 'override' | 'flag';

/** Append-only audit row for anything an operator does to a user's recommendations. */
export interface OperatorAction {
  actionId: string;
  operatorId: string;
  userId: string;
  actionType: OperatorActionType;
  recommendationId: string | null; // null for user flags
  reason: string | null;
  createdAt: string; // ISO timestamp
}
