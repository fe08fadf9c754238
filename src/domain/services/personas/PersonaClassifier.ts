import { PERSONA_IDS, type PersonaAssignment, type PersonaId, type PersonaMatches } from '../../entities/Persona.js';
import type { SignalBundle, TimeWindow } from '../../entities/Signal.js';
import { extractFeatures, PERSONA_RULES, type PersonaFeatures, type PersonaRule } from './PersonaRules.js';

export interface PersonaClassification {
  primaryPersona: PersonaId;
  matches: PersonaMatches;
  criteriaMet: string[];
}

const criteriaFor = (rule: PersonaRule): string[] => (rule.id === 'general_wellness' ? [] : [rule.criteria]);

const emptyMatches = (): PersonaMatches => ({
  high_utilization: 0,
  variable_income: 0,
  subscription_heavy: 0,
  savings_builder: 0,
  general_wellness: 0,
});

/** Row-by-row cascade: the first rule whose predicate holds wins. */
export const classifyPersona = (bundle: SignalBundle): PersonaClassification => {
  const features = extractFeatures(bundle);
  const matches = emptyMatches();
  let primary: PersonaRule | undefined;

  for (const rule of PERSONA_RULES) {
    matches[rule.id] = rule.score(features);
    if (!primary && rule.matches(features)) {
      primary = rule;
    }
  }

  // general_wellness always matches, so primary is set unless the table is empty
  const winner = primary ?? PERSONA_RULES[PERSONA_RULES.length - 1];
  if (!winner) {
    throw new Error('Persona rule table is empty');
  }

  return { primaryPersona: winner.id, matches, criteriaMet: criteriaFor(winner) };
};

interface FeatureColumns {
  size: number;
  totalUtilization: Float64Array;
  peakUtilization: Float64Array;
  interestCharged: Float64Array;
  minimumPaymentOnly: Uint8Array;
  isOverdue: Uint8Array;
  medianPayGap: Float64Array;
  irregularFrequency: Uint8Array;
  cashFlowBuffer: Float64Array;
  subscriptionCount: Float64Array;
  monthlyRecurring: Float64Array;
  subscriptionShare: Float64Array;
  growthRate: Float64Array;
  netInflow: Float64Array;
}

const toColumns = (bundles: SignalBundle[]): FeatureColumns => {
  const size = bundles.length;
  const columns: FeatureColumns = {
    size,
    totalUtilization: new Float64Array(size),
    peakUtilization: new Float64Array(size),
    interestCharged: new Float64Array(size),
    minimumPaymentOnly: new Uint8Array(size),
    isOverdue: new Uint8Array(size),
    medianPayGap: new Float64Array(size),
    irregularFrequency: new Uint8Array(size),
    cashFlowBuffer: new Float64Array(size),
    subscriptionCount: new Float64Array(size),
    monthlyRecurring: new Float64Array(size),
    subscriptionShare: new Float64Array(size),
    growthRate: new Float64Array(size),
    netInflow: new Float64Array(size),
  };

  bundles.forEach((bundle, row) => {
    const f = extractFeatures(bundle);
    columns.totalUtilization[row] = f.totalUtilization;
    columns.peakUtilization[row] = f.peakUtilization;
    columns.interestCharged[row] = f.interestCharged;
    columns.minimumPaymentOnly[row] = f.minimumPaymentOnly ? 1 : 0;
    columns.isOverdue[row] = f.isOverdue ? 1 : 0;
    columns.medianPayGap[row] = f.medianPayGap;
    columns.irregularFrequency[row] = f.irregularFrequency ? 1 : 0;
    columns.cashFlowBuffer[row] = f.cashFlowBuffer;
    columns.subscriptionCount[row] = f.subscriptionCount;
    columns.monthlyRecurring[row] = f.monthlyRecurring;
    columns.subscriptionShare[row] = f.subscriptionShare;
    columns.growthRate[row] = f.growthRate;
    columns.netInflow[row] = f.netInflow;
  });

  return columns;
};

/** A movable read cursor that presents one column row as PersonaFeatures. */
class ColumnCursor implements PersonaFeatures {
  row = 0;

  constructor(private readonly columns: FeatureColumns) {}

  private at(column: Float64Array | Uint8Array): number {
    return column[this.row] ?? 0;
  }

  get totalUtilization(): number {
    return this.at(this.columns.totalUtilization);
  }
  get peakUtilization(): number {
    return this.at(this.columns.peakUtilization);
  }
  get interestCharged(): number {
    return this.at(this.columns.interestCharged);
  }
  get minimumPaymentOnly(): boolean {
    return this.at(this.columns.minimumPaymentOnly) === 1;
  }
  get isOverdue(): boolean {
    return this.at(this.columns.isOverdue) === 1;
  }
  get medianPayGap(): number {
    return this.at(this.columns.medianPayGap);
  }
  get irregularFrequency(): boolean {
    return this.at(this.columns.irregularFrequency) === 1;
  }
  get cashFlowBuffer(): number {
    return this.at(this.columns.cashFlowBuffer);
  }
  get subscriptionCount(): number {
    return this.at(this.columns.subscriptionCount);
  }
  get monthlyRecurring(): number {
    return this.at(this.columns.monthlyRecurring);
  }
  get subscriptionShare(): number {
    return this.at(this.columns.subscriptionShare);
  }
  get growthRate(): number {
    return this.at(this.columns.growthRate);
  }
  get netInflow(): number {
    return this.at(this.columns.netInflow);
  }
}

const NO_PERSONA = -1;

/**
 * Column-at-a-time classification. Each rule is evaluated over the whole batch
 * into a mask and a score column; primaries are then picked by a first-true
 * select across the masks in rule order. Output order matches input order.
 */
export const classifyPersonaBatch = (bundles: SignalBundle[]): PersonaClassification[] => {
  const columns = toColumns(bundles);
  const cursor = new ColumnCursor(columns);

  const masks = PERSONA_RULES.map(() => new Uint8Array(columns.size));
  const scores = PERSONA_RULES.map(() => new Float64Array(columns.size));

  PERSONA_RULES.forEach((rule, ruleIndex) => {
    const mask = masks[ruleIndex];
    const score = scores[ruleIndex];
    if (!mask || !score) {
      return;
    }
    for (let row = 0; row < columns.size; row += 1) {
      cursor.row = row;
      mask[row] = rule.matches(cursor) ? 1 : 0;
      score[row] = rule.score(cursor);
    }
  });

  const primaryIndex = new Int8Array(columns.size).fill(NO_PERSONA);
  masks.forEach((mask, ruleIndex) => {
    for (let row = 0; row < columns.size; row += 1) {
      if (primaryIndex[row] === NO_PERSONA && mask[row] === 1) {
        primaryIndex[row] = ruleIndex;
      }
    }
  });

  const fallback = PERSONA_RULES.length - 1;
  return Array.from({ length: columns.size }, (_, row) => {
    const ruleIndex = primaryIndex[row] ?? NO_PERSONA;
    const winner = PERSONA_RULES[ruleIndex === NO_PERSONA ? fallback : ruleIndex];
    if (!winner) {
      throw new Error('Persona rule table is empty');
    }
    const matches = emptyMatches();
    PERSONA_RULES.forEach((rule, index) => {
      matches[rule.id] = scores[index]?.[row] ?? 0;
    });
    return { primaryPersona: winner.id, matches, criteriaMet: criteriaFor(winner) };
  });
};

export const toPersonaAssignment = (
  userId: string,
  timeWindow: TimeWindow,
  classification: PersonaClassification,
  assignedAt: string,
): PersonaAssignment => ({
  userId,
  timeWindow,
  persona: classification.primaryPersona,
  primaryPersona: classification.primaryPersona,
  matchHighUtilization: classification.matches.high_utilization,
  matchVariableIncome: classification.matches.variable_income,
  matchSubscriptionHeavy: classification.matches.subscription_heavy,
  matchSavingsBuilder: classification.matches.savings_builder,
  matchGeneralWellness: classification.matches.general_wellness,
  criteriaMet: [...classification.criteriaMet],
  assignedAt,
});

/** The persona ids ranked by match percentage, highest first; ties keep priority order. */
export const rankByMatch = (matches: PersonaMatches): PersonaId[] =>
  [...PERSONA_IDS].sort((a, b) => matches[b] - matches[a]);
