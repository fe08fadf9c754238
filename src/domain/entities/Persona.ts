import type { TimeWindow } from './Signal.js';

export const PERSONA_IDS = [
  'high_utilization',
  'variable_income',
  'subscription_heavy',
  'savings_builder',
  'general_wellness',
] as const;

export type PersonaId = (typeof PERSONA_IDS)[number];

export type PersonaMatches = Record<PersonaId, number>;

export interface PersonaAssignment {
  userId: string;
  timeWindow: TimeWindow;
  persona: PersonaId;
  primaryPersona: PersonaId;
  matchHighUtilization: number;
  matchVariableIncome: number;
  matchSubscriptionHeavy: number;
  matchSavingsBuilder: number;
  matchGeneralWellness: number;
  criteriaMet: string[];
  assignedAt: string; // ISO timestamp
}

export const personaKey = (assignment: Pick<PersonaAssignment, 'userId' | 'timeWindow'>): string =>
  `${assignment.userId}|${assignment.timeWindow}`;

export const matchesOf = (assignment: PersonaAssignment): PersonaMatches => ({
  high_utilization: assignment.matchHighUtilization,
  variable_income: assignment.matchVariableIncome,
  subscription_heavy: assignment.matchSubscriptionHeavy,
  savings_builder: assignment.matchSavingsBuilder,
  general_wellness: assignment.matchGeneralWellness,
});
