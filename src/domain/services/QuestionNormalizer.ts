const repeatingWhitespace = /\s+/g;
const punctuation = /[^\w\s]/g;

export const normalizeQuestion = (input: string): string => {
  return input
    .normalize('NFKD')
    .replace(punctuation, ' ')
    .replace(repeatingWhitespace, ' ')
    .trim()
    .toLowerCase();
};

/** Whole-word phrase lookup against an already normalized question. */
export const containsPhrase = (normalized: string, phrase: string): boolean => {
  return ` ${normalized} `.includes(` ${phrase} `);
};

export const containsAnyPhrase = (normalized: string, phrases: readonly string[]): boolean => {
  return phrases.some((phrase) => containsPhrase(normalized, phrase));
};
