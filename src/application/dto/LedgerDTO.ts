import { z } from 'zod';
import { normalizeCategory } from '../../domain/services/CategoryNormalizer.js';

export const IsoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a YYYY-MM-DD date');

export const TransactionSchema = z.object({
  transactionId: z.string().min(1),
  accountId: z.string().min(1),
  userId: z.string().min(1),
  date: IsoDateSchema,
  authorizedDate: IsoDateSchema.nullish(),
  amount: z.number().finite(),
  merchantName: z.string().nullish(),
  category: z.unknown().transform(normalizeCategory),
  pending: z.boolean().default(false),
  paymentChannel: z.string().nullish(),
  location: z
    .object({
      address: z.string().optional(),
      city: z.string().optional(),
      region: z.string().optional(),
      postalCode: z.string().optional(),
      country: z.string().optional(),
    })
    .optional(),
});

export const AccountSchema = z.object({
  accountId: z.string().min(1),
  userId: z.string().min(1),
  type: z.enum(['depository', 'credit', 'loan']),
  subtype: z.string(),
  balance: z.number().finite(),
  limit: z.number().nonnegative().nullish(),
  mask: z.string().nullish(),
  isOverdue: z.boolean().optional(),
});

export const LedgerSchema = z.object({
  accounts: z.array(AccountSchema),
  transactions: z.array(TransactionSchema),
});
