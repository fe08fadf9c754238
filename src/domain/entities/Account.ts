export type AccountType = 'depository' | 'credit' | 'loan';

export interface Account {
  accountId: string;
  userId: string;
  type: AccountType;
  subtype: string;
  balance: number;
  limit?: number | null;
  mask?: string | null;
  isOverdue?: boolean;
}

const SAVINGS_SUBTYPES = new Set(['savings', 'money market', 'money_market', 'hsa']);

export const isSavingsAccount = (account: Account): boolean => {
  if (account.type !== 'depository') {
    return false;
  }

  const subtype = account.subtype.toLowerCase();
  return SAVINGS_SUBTYPES.has(subtype) || subtype.includes('savings');
};

export const isCheckingAccount = (account: Account): boolean =>
  account.type === 'depository' && account.subtype.toLowerCase() === 'checking';

export const hasCreditLimit = (account: Account): account is Account & { limit: number } =>
  account.type === 'credit' && typeof account.limit === 'number' && account.limit > 0;
