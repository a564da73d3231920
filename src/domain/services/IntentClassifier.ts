import {
  type ExtractedParameters,
  type FinancialIntent,
  PARAMETER_LABELS,
  type ParameterField,
  type QueryIntent,
} from '../entities/FinancialQuery.js';
import { containsAnyPhrase, normalizeQuestion } from './QuestionNormalizer.js';

export const STORED_DEBT_PHRASES = ['my debt', 'my saved debt', 'my stored debt'];
export const PAYOFF_PHRASES = ['how long', 'when will i', 'pay off', 'paid off', 'payoff', 'pay it off'];
export const PAYMENT_AMOUNT_PHRASES = ['how much', 'monthly payment', 'what payment'];

export interface ClassificationInput {
  normalized: string;
  params: ExtractedParameters;
}

export interface IntentRule {
  intent: FinancialIntent;
  /** Fields the intent computes from; a rule only fires when all are known. */
  requires: ParameterField[];
  /** Whether the wording asks for this intent, independent of the numbers. */
  asks: (input: ClassificationInput) => boolean;
}

const referencesStoredDebt = ({ normalized, params }: ClassificationInput): boolean =>
  params.debtId !== undefined || containsAnyPhrase(normalized, STORED_DEBT_PHRASES);

const isKnown = (params: ExtractedParameters, field: ParameterField): boolean => params[field] !== undefined;

/** Evaluated top to bottom; the first rule whose wording and fields match wins. */
export const INTENT_RULES: readonly IntentRule[] = [
  {
    intent: 'REPAYMENT_PLAN_FOR_STORED_DEBT',
    requires: ['monthlyPayment'],
    asks: referencesStoredDebt,
  },
  {
    intent: 'PAYOFF_TIME',
    requires: ['principal', 'annualInterestRatePercent', 'monthlyPayment'],
    asks: ({ normalized }) => containsAnyPhrase(normalized, PAYOFF_PHRASES),
  },
  {
    intent: 'MONTHLY_PAYMENT_REQUIRED',
    requires: ['principal', 'annualInterestRatePercent', 'termMonths'],
    asks: ({ normalized }) => containsAnyPhrase(normalized, PAYMENT_AMOUNT_PHRASES),
  },
];

export const classifyIntent = (text: string, params: ExtractedParameters): QueryIntent => {
  const input = { normalized: normalizeQuestion(text), params };
  const rule = INTENT_RULES.find(
    (candidate) => candidate.asks(input) && candidate.requires.every((field) => isKnown(params, field)),
  );
  return rule?.intent ?? 'GENERAL_KNOWLEDGE';
};

export interface MissingParametersReport {
  intent: FinancialIntent;
  missing: string[];
}

/**
 * For a question classified as general knowledge, detects wording that asks
 * for a calculation while some of the numbers could not be read. Requires at
 * least one of the rule's numeric fields (or a stored-debt reference) so that
 * plain questions such as "how long do student loans last?" stay general.
 */
export const findMissingParameters = (text: string, params: ExtractedParameters): MissingParametersReport | null => {
  const input = { normalized: normalizeQuestion(text), params };

  for (const rule of INTENT_RULES) {
    if (!rule.asks(input)) {
      continue;
    }

    const missing = rule.requires.filter((field) => !isKnown(params, field));
    const partiallyStated =
      missing.length < rule.requires.length ||
      (rule.intent === 'REPAYMENT_PLAN_FOR_STORED_DEBT' && containsAnyPhrase(input.normalized, PAYOFF_PHRASES));

    if (missing.length > 0 && partiallyStated) {
      return { intent: rule.intent, missing: missing.map((field) => PARAMETER_LABELS[field]) };
    }
  }

  return null;
};
