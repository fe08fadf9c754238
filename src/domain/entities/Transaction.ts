export type PaymentChannel = 'online' | 'in store' | 'other';

export interface TransactionLocation {
  address?: string;
  city?: string;
  region?: string;
  postalCode?: string;
  country?: string;
}

export interface Transaction {
  transactionId: string;
  accountId: string;
  userId: string;
  date: string; // ISO date
  authorizedDate?: string | null; // ISO date
  amount: number; // negative = spend
  merchantName?: string | null;
  category: string[];
  pending: boolean;
  paymentChannel?: PaymentChannel | string | null;
  location?: TransactionLocation;
}

/**
 * The date a transaction is bucketed and measured by: the authorization date
 * when the aggregator supplied one, otherwise the posted date.
 */
export const effectiveDate = (txn: Pick<Transaction, 'date' | 'authorizedDate'>): string =>
  txn.authorizedDate ?? txn.date;
