import type { CatalogPort } from '../../application/ports/CatalogPort.js';
import type { StoragePort } from '../../application/ports/StoragePort.js';
import { systemClock, type Clock } from '../../application/services/Clock.js';
import { EvaluationService } from '../../application/services/EvaluationService.js';
import { OverrideService } from '../../application/services/OverrideService.js';
import { PersonaService } from '../../application/services/PersonaService.js';
import { PipelineService } from '../../application/services/PipelineService.js';
import { RecommendationService } from '../../application/services/RecommendationService.js';
import { SignalService } from '../../application/services/SignalService.js';
import { TraceService } from '../../application/services/TraceService.js';
import { JsonCatalogAdapter } from '../adapters/catalog/JsonCatalogAdapter.js';
import { seedLedgerFromFile } from '../adapters/ledger/JsonLedgerSeeder.js';
import { InMemoryStorageAdapter } from '../adapters/storage/InMemoryStorageAdapter.js';
import { loadConfig, type AppConfig } from '../config/Config.js';

export interface AppContainerOverrides {
  config?: AppConfig;
  storage?: StoragePort;
  catalog?: CatalogPort;
  clock?: Clock;
  /** Skip loading the demo ledger even when a seed path is configured. */
  skipSeed?: boolean;
}

export class AppContainer {
  readonly config: AppConfig;
  readonly storage: StoragePort;
  readonly catalog: CatalogPort;
  readonly signalService: SignalService;
  readonly personaService: PersonaService;
  readonly recommendationService: RecommendationService;
  readonly pipelineService: PipelineService;
  readonly overrideService: OverrideService;
  readonly evaluationService: EvaluationService;
  readonly traceService: TraceService;

  private constructor(config: AppConfig, storage: StoragePort, catalog: CatalogPort, clock: Clock) {
    this.config = config;
    this.storage = storage;
    this.catalog = catalog;

    this.signalService = new SignalService(storage, clock);
    this.personaService = new PersonaService(storage, clock);
    this.recommendationService = new RecommendationService(storage, catalog, config.matching, clock);
    this.pipelineService = new PipelineService(
      storage,
      this.signalService,
      this.personaService,
      this.recommendationService,
      config.pipeline,
      clock,
    );
    this.overrideService = new OverrideService(storage, clock);
    this.evaluationService = new EvaluationService(storage, this.signalService, clock);
    this.traceService = new TraceService(storage, this.signalService);
  }

  static async create(overrides: AppContainerOverrides = {}): Promise<AppContainer> {
    const config = overrides.config ?? loadConfig();
    const storage = overrides.storage ?? new InMemoryStorageAdapter();
    const catalog = overrides.catalog ?? (await JsonCatalogAdapter.fromDirectory(config.data.catalogDir));

    if (!overrides.skipSeed && config.data.ledgerSeedPath) {
      await seedLedgerFromFile(storage, config.data.ledgerSeedPath);
    }

    return new AppContainer(config, storage, catalog, overrides.clock ?? systemClock);
  }
}
