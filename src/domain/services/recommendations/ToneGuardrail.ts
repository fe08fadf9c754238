export const PROHIBITED_PHRASES = [
  'overspending',
  'bad habits',
  'bad habit',
  'poor choices',
  'poor choice',
  'irresponsible',
  'wasteful',
  "you're overspending",
  'careless',
  'reckless spending',
] as const;

export interface ToneCheckResult {
  passed: boolean;
  violations: string[];
}

/** Case-insensitive substring match against the prohibited-phrase list. */
export const checkTone = (text: string, phrases: readonly string[] = PROHIBITED_PHRASES): ToneCheckResult => {
  const haystack = text.toLowerCase().replace(/[‘’]/g, "'");
  const violations = [...new Set(phrases.filter((phrase) => haystack.includes(phrase.toLowerCase())))];
  return { passed: violations.length === 0, violations };
};
