import { readFile } from 'node:fs/promises';
import { LedgerSchema } from '../../../application/dto/LedgerDTO.js';
import type { Ledger, StoragePort } from '../../../application/ports/StoragePort.js';

export const readLedgerFile = async (filePath: string): Promise<Ledger> => {
  const raw: unknown = JSON.parse(await readFile(filePath, 'utf8'));
  return LedgerSchema.parse(raw);
};

/** Loads a ledger file into storage, replacing rows with the same ids. */
export const seedLedgerFromFile = async (storage: StoragePort, filePath: string): Promise<Ledger> => {
  const ledger = await readLedgerFile(filePath);
  await storage.seedLedger(ledger);

  const users = new Set([...ledger.accounts, ...ledger.transactions].map((row) => row.userId));
  console.log(
    `🌱 Seeded ${users.size} users: ${ledger.accounts.length} accounts, ${ledger.transactions.length} transactions`,
  );
  return ledger;
};
