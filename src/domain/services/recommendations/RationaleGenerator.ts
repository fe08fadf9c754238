import type { CreditAccountUtilization, SignalBundle } from '../../entities/Signal.js';

const currencyFormatter = new Intl.NumberFormat('en-US', { style: 'currency', currency: 'USD' });

export const formatCurrency = (value: number): string => currencyFormatter.format(value);

export const formatPercentage = (value: number): string => `${value.toFixed(1)}%`;

const titleCase = (value: string): string =>
  value
    .split(/\s+/)
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ');

/** "Credit Card ending in 4523", or "Visa Card" when the account has no mask. */
export const cardName = (account: Pick<CreditAccountUtilization, 'subtype' | 'mask'>): string => {
  const label = titleCase(account.subtype) || 'Credit';
  const base = /card$/i.test(label) ? label : `${label} Card`;
  return account.mask ? `${base} ending in ${account.mask}` : base;
};

interface PlaceholderDefinition {
  signalFields: string[];
  resolve: (signals: SignalBundle, card: CreditAccountUtilization | undefined) => string | null;
}

const PLACEHOLDERS = new Map<string, PlaceholderDefinition>([
  [
    'card_name',
    {
      signalFields: ['creditUtilization.accounts.subtype', 'creditUtilization.accounts.mask'],
      resolve: (_, card) => (card ? cardName(card) : null),
    },
  ],
  [
    'utilization',
    {
      signalFields: ['creditUtilization.accounts.utilization', 'creditUtilization.totalUtilization'],
      resolve: (s, card) => formatPercentage(card ? card.utilization : s.creditUtilization.totalUtilization),
    },
  ],
  [
    'balance',
    {
      signalFields: ['creditUtilization.accounts.balance'],
      resolve: (_, card) => (card ? formatCurrency(card.balance) : null),
    },
  ],
  [
    'limit',
    {
      signalFields: ['creditUtilization.accounts.limit'],
      resolve: (_, card) => (card ? formatCurrency(card.limit) : null),
    },
  ],
  [
    'interest_charged',
    {
      signalFields: ['creditUtilization.interestCharged'],
      resolve: (s) => formatCurrency(s.creditUtilization.interestCharged),
    },
  ],
  [
    'subscription_count',
    {
      signalFields: ['subscriptions.recurringMerchants'],
      resolve: (s) => String(s.subscriptions.recurringMerchants.length),
    },
  ],
  [
    'monthly_recurring',
    {
      signalFields: ['subscriptions.monthlyRecurring'],
      resolve: (s) => formatCurrency(s.subscriptions.monthlyRecurring),
    },
  ],
  [
    'total_balance',
    {
      signalFields: ['creditUtilization.accounts.balance'],
      resolve: (s) => formatCurrency(s.creditUtilization.accounts.reduce((total, account) => total + account.balance, 0)),
    },
  ],
  [
    'total_savings',
    {
      signalFields: ['savingsBehavior.totalSavings'],
      resolve: (s) => formatCurrency(s.savingsBehavior.totalSavings),
    },
  ],
  [
    'growth_rate',
    {
      signalFields: ['savingsBehavior.growthRate'],
      resolve: (s) => formatPercentage(s.savingsBehavior.growthRate),
    },
  ],
  [
    'cash_flow_buffer',
    {
      signalFields: ['incomeStability.cashFlowBuffer'],
      resolve: (s) => s.incomeStability.cashFlowBuffer.toFixed(1),
    },
  ],
  [
    'median_pay_gap',
    {
      signalFields: ['incomeStability.medianPayGap'],
      resolve: (s) => String(Math.trunc(s.incomeStability.medianPayGap)),
    },
  ],
]);

export interface GeneratedRationale {
  text: string;
  signalFields: string[];
  strippedPlaceholders: string[];
}

const PLACEHOLDER_TOKEN = /\{([^{}]*)\}/g;

const tidy = (text: string): string =>
  text
    .replace(PLACEHOLDER_TOKEN, '')
    .replace(/[ \t]{2,}/g, ' ')
    .replace(/[ \t]+([.,;:!?])/g, '$1')
    .trim();

/**
 * Fills `{name}` placeholders from the signal bundle. Card-level placeholders
 * read the first eligible credit account. Anything that cannot be resolved is
 * removed so no template syntax reaches the user.
 */
export const generateRationale = (template: string, signals: SignalBundle): GeneratedRationale => {
  const card = signals.creditUtilization.accounts[0];
  const signalFields = new Set<string>();
  const stripped: string[] = [];

  const substituted = template.replace(PLACEHOLDER_TOKEN, (token: string, name: string) => {
    const definition = PLACEHOLDERS.get(name.trim());
    const value = definition ? definition.resolve(signals, card) : null;
    if (!definition || value === null) {
      stripped.push(token);
      return '';
    }
    definition.signalFields.forEach((field) => signalFields.add(field));
    return value;
  });

  return { text: tidy(substituted), signalFields: [...signalFields], strippedPlaceholders: stripped };
};
