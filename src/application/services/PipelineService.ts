import dayjs from 'dayjs';
import type { PersonaId } from '../../domain/entities/Persona.js';
import { SIGNAL_TYPES, type TimeWindow } from '../../domain/entities/Signal.js';
import type { PipelineRunRequestDTO } from '../dto/PipelineRunDTO.js';
import type { StoragePort } from '../ports/StoragePort.js';
import { systemClock, type Clock } from './Clock.js';
import type { PersonaService } from './PersonaService.js';
import type { FlaggedRecommendation, RecommendationService, SkippedRecommendation } from './RecommendationService.js';
import type { SignalService } from './SignalService.js';

export interface PipelineDefaults {
  timeWindows: TimeWindow[];
  asOf?: string;
}

export interface WindowRunSummary {
  timeWindow: TimeWindow;
  usersProcessed: number;
  signalsStored: number;
  personaCounts: Record<PersonaId, number>;
  recommendationsCreated: number;
  skipped: SkippedRecommendation[];
  flagged: FlaggedRecommendation[];
}

export interface PipelineRunSummary {
  asOf: string;
  windows: WindowRunSummary[];
}

const emptyPersonaCounts = (): Record<PersonaId, number> => ({
  high_utilization: 0,
  variable_income: 0,
  subscription_heavy: 0,
  savings_builder: 0,
  general_wellness: 0,
});

/**
 * One batch pass: the ledger is read once, then each window runs signals,
 * personas and recommendations for every user in turn.
 */
export class PipelineService {
  constructor(
    private readonly storage: StoragePort,
    private readonly signals: SignalService,
    private readonly personas: PersonaService,
    private readonly recommendations: RecommendationService,
    private readonly defaults: PipelineDefaults,
    private readonly clock: Clock = systemClock,
  ) {}

  async run(request: PipelineRunRequestDTO = {}): Promise<PipelineRunSummary> {
    const asOf = request.asOf ?? this.defaults.asOf ?? dayjs(this.clock()).format('YYYY-MM-DD');
    const timeWindows = [...new Set(request.timeWindows ?? this.defaults.timeWindows)];

    const ledger = await this.storage.loadLedger(request.userIds);
    console.log(
      `📥 Ledger loaded: ${ledger.accounts.length} accounts, ${ledger.transactions.length} transactions (as of ${asOf})`,
    );

    const windows: WindowRunSummary[] = [];
    for (const timeWindow of timeWindows) {
      const bundles = await this.signals.computeAndStore(ledger, { timeWindow, asOf });
      const assignments = await this.personas.assignAndStore(bundles, timeWindow);

      const summary: WindowRunSummary = {
        timeWindow,
        usersProcessed: bundles.size,
        signalsStored: bundles.size * SIGNAL_TYPES.length,
        personaCounts: emptyPersonaCounts(),
        recommendationsCreated: 0,
        skipped: [],
        flagged: [],
      };

      for (const assignment of assignments) {
        summary.personaCounts[assignment.primaryPersona] += 1;
        const bundle = bundles.get(assignment.userId);
        if (!bundle) {
          continue;
        }

        const result = await this.recommendations.generate({
          userId: assignment.userId,
          timeWindow,
          persona: assignment.primaryPersona,
          signals: bundle,
        });
        summary.recommendationsCreated += result.recommendations.length;
        summary.skipped.push(...result.skipped);
        summary.flagged.push(...result.flagged);
      }

      console.log(
        `💡 ${timeWindow}: ${summary.recommendationsCreated} recommendations for ${summary.usersProcessed} users ` +
          `(${summary.skipped.length} skipped, ${summary.flagged.length} flagged)`,
      );
      windows.push(summary);
    }

    return { asOf, windows };
  }
}
