import type { ExtractedParameters } from '../entities/FinancialQuery.js';

/*
 * Keyword and pattern based extraction. This is a lossy heuristic, not a
 * grammar: it recognises percentages, durations, debt references and currency
 * amounts, then assigns amounts to principal or monthly payment by proximity
 * to keywords. Ambiguity handling lives only in the disambiguation stage.
 */

export interface Token {
  index: number;
  start: number;
  end: number;
  word: string;
}

export interface Candidate {
  value: number;
  tokenIndex: number;
  start: number;
}

/** `marked` amounts carry a currency sign, a `k`/`thousand` multiplier or a spelled-out currency. */
export interface AmountCandidate extends Candidate {
  marked: boolean;
}

export interface ExtractionCandidates {
  tokens: Token[];
  rates: Candidate[];
  terms: Candidate[];
  amounts: AmountCandidate[];
  debtIds: string[];
  claimedTermSpans: Array<[number, number]>;
}

const percentPattern = /(?<![\w.])(\d+(?:\.\d+)?)\s*(?:%|percent\b|per\s+cent\b)/gi;
const termPattern = /(?<![\w.])(\d+(?:\.\d+)?)[\s-]*(months?|years?|yrs?)\b/gi;
const debtReferencePattern = /\bdebt\s*(?:#\s*|id\s*|number\s*|no\.\s*)(\d+)\b|(?<!\w)#(\d+)\b/gi;
const amountPattern = /(?<![\w.$])(\$\s*)?(\d{1,3}(?:,\d{3})+|\d+)(\.\d+)?(?:\s*(k|thousand)\b)?/gi;
const spelledCurrencyPattern = /^\s*(?:dollars?|usd|bucks)\b/i;
const yearPattern = /^(?:19|20)\d{2}$/;

const RATE_KEYWORDS = ['interest', 'rate', 'apr'];
const TERM_KEYWORDS = ['in', 'over', 'within', 'for'];
const YEAR_PREPOSITIONS = ['in', 'since', 'by', 'from', 'until', 'before', 'after', 'during'];
const PRINCIPAL_KEYWORDS = ['loan', 'debt', 'owe', 'owed', 'owing', 'balance', 'borrowed', 'principal', 'mortgage'];
const PAYMENT_KEYWORDS = ['pay', 'paying', 'payment', 'payments', 'monthly', 'month', 'mo', 'installment'];
const PAYOFF_VERBS = ['pay', 'paying', 'paid', 'pays'];

const AFFINITY_WINDOW = 8;

export const tokenize = (text: string): Token[] => {
  const tokens: Token[] = [];
  for (const match of text.matchAll(/\S+/g)) {
    const start = match.index ?? 0;
    tokens.push({
      index: tokens.length,
      start,
      end: start + match[0].length,
      word: match[0].toLowerCase().replace(/[^a-z]/g, ''),
    });
  }
  return tokens;
};

const tokenAt = (tokens: Token[], offset: number): number => {
  const token = tokens.find((candidate) => offset >= candidate.start && offset < candidate.end);
  return token?.index ?? tokens.length;
};

const overlaps = (spans: Array<[number, number]>, start: number, end: number): boolean =>
  spans.some(([spanStart, spanEnd]) => start < spanEnd && end > spanStart);

const parseNumeral = (raw: string): number => Number(raw.replace(/,/g, ''));

export const extractCandidates = (text: string): ExtractionCandidates => {
  const tokens = tokenize(text);
  const claimed: Array<[number, number]> = [];
  const claimedTermSpans: Array<[number, number]> = [];

  const rates: Candidate[] = [];
  for (const match of text.matchAll(percentPattern)) {
    const start = match.index ?? 0;
    rates.push({ value: Number(match[1]), tokenIndex: tokenAt(tokens, start), start });
    claimed.push([start, start + match[0].length]);
  }

  const terms: Candidate[] = [];
  for (const match of text.matchAll(termPattern)) {
    const start = match.index ?? 0;
    const end = start + match[0].length;
    if (overlaps(claimed, start, end)) {
      continue;
    }

    const quantity = Number(match[1]);
    const unit = match[2].toLowerCase();
    const months = unit.startsWith('month') ? Math.round(quantity) : Math.round(quantity * 12);
    claimed.push([start, end]);
    claimedTermSpans.push([start, end]);

    if (months > 0) {
      terms.push({ value: months, tokenIndex: tokenAt(tokens, start), start });
    }
  }

  const debtIds: string[] = [];
  for (const match of text.matchAll(debtReferencePattern)) {
    const start = match.index ?? 0;
    const end = start + match[0].length;
    if (overlaps(claimed, start, end)) {
      continue;
    }
    const id = match[1] ?? match[2];
    if (id) {
      debtIds.push(String(Number(id)));
      claimed.push([start, end]);
    }
  }

  const amounts: AmountCandidate[] = [];
  for (const match of text.matchAll(amountPattern)) {
    const start = match.index ?? 0;
    const end = start + match[0].length;
    if (overlaps(claimed, start, end)) {
      continue;
    }

    const tokenIndex = tokenAt(tokens, start);
    const marked = Boolean(match[1]) || Boolean(match[4]) || spelledCurrencyPattern.test(text.slice(end));
    const previousWord = tokens[tokenIndex - 1]?.word ?? '';

    // "in 2024" is a calendar year, not an amount.
    if (!marked && !match[3] && yearPattern.test(match[2]) && YEAR_PREPOSITIONS.includes(previousWord)) {
      continue;
    }

    const base = parseNumeral(`${match[2]}${match[3] ?? ''}`);
    const value = match[4] ? base * 1000 : base;
    amounts.push({ value, tokenIndex, start, marked });
  }

  return { tokens, rates, terms, amounts, debtIds, claimedTermSpans };
};

const keywordPositions = (
  candidates: ExtractionCandidates,
  keywords: readonly string[],
  options: { skipPayoffVerbs?: boolean } = {},
): number[] => {
  const { tokens, claimedTermSpans } = candidates;

  return tokens
    .filter((token) => keywords.includes(token.word))
    .filter((token) => !overlaps(claimedTermSpans, token.start, token.end))
    .filter((token) => {
      if (!options.skipPayoffVerbs || !PAYOFF_VERBS.includes(token.word)) {
        return true;
      }
      return tokens[token.index + 1]?.word !== 'off';
    })
    .map((token) => token.index);
};

// In "pay off $12k" the amount after "off" is the balance being cleared.
const payoffObjectPositions = ({ tokens }: ExtractionCandidates): number[] =>
  tokens
    .filter((token) => token.word === 'off' && token.index > 0 && PAYOFF_VERBS.includes(tokens[token.index - 1].word))
    .map((token) => token.index);

const distanceTo = (candidate: Candidate, positions: number[]): number =>
  positions.reduce((best, position) => Math.min(best, Math.abs(position - candidate.tokenIndex)), Infinity);

/** Closest candidate to any keyword; equal distances keep reading order. */
export const pickClosest = (candidates: Candidate[], positions: number[]): Candidate | undefined => {
  let best: Candidate | undefined;
  let bestDistance = Infinity;

  for (const candidate of candidates) {
    const distance = distanceTo(candidate, positions);
    if (best === undefined || distance < bestDistance) {
      best = candidate;
      bestDistance = distance;
    }
  }

  return best;
};

const assignAmounts = (
  candidates: ExtractionCandidates,
): { principal?: number; monthlyPayment?: number } => {
  const principalPositions = [
    ...keywordPositions(candidates, PRINCIPAL_KEYWORDS),
    ...payoffObjectPositions(candidates),
  ];
  const paymentPositions = keywordPositions(candidates, PAYMENT_KEYWORDS, { skipPayoffVerbs: true });

  const principalLeaning: AmountCandidate[] = [];
  const paymentLeaning: AmountCandidate[] = [];

  for (const amount of candidates.amounts) {
    const toPrincipal = distanceTo(amount, principalPositions);
    const toPayment = distanceTo(amount, paymentPositions);

    if (Math.min(toPrincipal, toPayment) > AFFINITY_WINDOW) {
      continue;
    }

    if (toPrincipal <= toPayment) {
      principalLeaning.push(amount);
    } else {
      paymentLeaning.push(amount);
    }
  }

  let principal = pickClosest(principalLeaning, principalPositions);
  const monthlyPayment = pickClosest(paymentLeaning, paymentPositions);

  if (!principal) {
    // A bare number far from every keyword is not promoted to a balance.
    const unassigned = candidates.amounts.filter(
      (amount) => amount !== monthlyPayment && (amount.marked || paymentLeaning.includes(amount)),
    );
    principal = unassigned.reduce<Candidate | undefined>(
      (largest, amount) => (largest === undefined || amount.value > largest.value ? amount : largest),
      undefined,
    );
  }

  return { principal: principal?.value, monthlyPayment: monthlyPayment?.value };
};

export const disambiguate = (candidates: ExtractionCandidates): ExtractedParameters => {
  const rate = pickClosest(candidates.rates, keywordPositions(candidates, RATE_KEYWORDS));
  const term = pickClosest(candidates.terms, keywordPositions(candidates, TERM_KEYWORDS));
  const { principal, monthlyPayment } = assignAmounts(candidates);

  const params: ExtractedParameters = {
    ...(principal !== undefined ? { principal } : {}),
    ...(rate !== undefined ? { annualInterestRatePercent: rate.value } : {}),
    ...(monthlyPayment !== undefined ? { monthlyPayment } : {}),
    ...(term !== undefined ? { termMonths: term.value } : {}),
    ...(candidates.debtIds.length > 0 ? { debtId: candidates.debtIds[0] } : {}),
  };

  return Object.freeze(params);
};

export const extractParameters = (text: string): ExtractedParameters => disambiguate(extractCandidates(text));
