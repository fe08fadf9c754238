const UNCATEGORIZED = 'Uncategorized';

/**
 * Coerces a transaction category into taxonomy-array form.
 *
 * Accepts the current array encoding, a JSON-encoded array string, or a legacy
 * single string. Anything that fails to parse as an array becomes a
 * single-element category rather than an error.
 */
export const normalizeCategory = (input: unknown): string[] => {
  if (Array.isArray(input)) {
    const members = input.filter((value): value is string => typeof value === 'string' && value.trim() !== '');
    return members.length > 0 ? members : [UNCATEGORIZED];
  }

  if (typeof input !== 'string' || input.trim() === '') {
    return [UNCATEGORIZED];
  }

  const trimmed = input.trim();
  if (trimmed.startsWith('[')) {
    try {
      const parsed: unknown = JSON.parse(trimmed);
      if (Array.isArray(parsed)) {
        return normalizeCategory(parsed);
      }
    } catch {
      return [trimmed];
    }
  }

  return [trimmed];
};

export const categoryContains = (category: string[], keyword: string): boolean => {
  const needle = keyword.toLowerCase();
  return category.some((entry) => entry.toLowerCase().includes(needle));
};
