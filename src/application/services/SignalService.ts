import { fromSignalRecords, toSignalRecords, type SignalBundle, type TimeWindow, type WindowSpec } from '../../domain/entities/Signal.js';
import { detectSignalsForBatch } from '../../domain/services/signals/SignalDetector.js';
import type { Ledger, StoragePort } from '../ports/StoragePort.js';
import { systemClock, type Clock } from './Clock.js';

export interface StoredSignals {
  signals: SignalBundle;
  computedAt: string;
}

export class SignalService {
  constructor(
    private readonly storage: StoragePort,
    private readonly clock: Clock = systemClock,
  ) {}

  /** Computes every user's bundle for the window and upserts four records per user. */
  async computeAndStore(ledger: Ledger, window: WindowSpec): Promise<Map<string, SignalBundle>> {
    const bundles = detectSignalsForBatch(ledger.transactions, ledger.accounts, window);
    const computedAt = this.clock().toISOString();

    const records = [...bundles].flatMap(([userId, bundle]) =>
      toSignalRecords(userId, window.timeWindow, bundle, computedAt),
    );
    await this.storage.upsertSignals(records);

    console.log(`📈 Signals stored for ${bundles.size} users (${window.timeWindow}, as of ${window.asOf}): ${records.length} records`);
    return bundles;
  }

  /** The stored bundle with its latest computation time, or null unless all four records exist. */
  async loadBundle(userId: string, timeWindow: TimeWindow): Promise<StoredSignals | null> {
    const records = await this.storage.loadSignals(userId, timeWindow);
    const signals = fromSignalRecords(records);
    if (!signals) {
      return null;
    }

    const computedAt = records.map((record) => record.computedAt).reduce((latest, at) => (at > latest ? at : latest));
    return { signals, computedAt };
  }
}
