import crypto from 'node:crypto';

/** `<prefix>_` followed by 12 hex characters. */
export const prefixedId = (prefix: 'rec' | 'inc' | 'act'): string =>
  `${prefix}_${crypto.randomUUID().replace(/-/g, '').slice(0, 12)}`;
