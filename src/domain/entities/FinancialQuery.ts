export type QueryIntent =
  | 'PAYOFF_TIME'
  | 'MONTHLY_PAYMENT_REQUIRED'
  | 'REPAYMENT_PLAN_FOR_STORED_DEBT'
  | 'GENERAL_KNOWLEDGE';

export type FinancialIntent = Exclude<QueryIntent, 'GENERAL_KNOWLEDGE'>;

export interface FinancialQuery {
  readonly question: string;
  readonly userId?: string;
}

/**
 * Fields recognised in a question. A field that is absent from the text stays
 * `undefined`; zero is a legitimate value and never stands in for "unknown".
 */
export interface ExtractedParameters {
  readonly principal?: number;
  readonly annualInterestRatePercent?: number;
  readonly monthlyPayment?: number;
  readonly termMonths?: number;
  readonly debtId?: string;
}

export type ParameterField = 'principal' | 'annualInterestRatePercent' | 'monthlyPayment' | 'termMonths' | 'debtId';

export const PARAMETER_LABELS: Record<ParameterField, string> = {
  principal: 'principal',
  annualInterestRatePercent: 'interest rate',
  monthlyPayment: 'monthly payment',
  termMonths: 'loan term',
  debtId: 'debt id',
};

export interface AmortizationResult {
  status: 'PAYS_OFF';
  monthsToPayoff: number;
  totalPaid: number;
  totalInterest: number;
}

export interface NeverPaysOff {
  status: 'NEVER_PAYS_OFF';
  monthlyInterest: number;
  minimumPayment: number;
}

export type PayoffOutcome = AmortizationResult | NeverPaysOff;
