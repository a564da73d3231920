import type { Debt } from '../../domain/entities/Debt.js';
import {
  type ExtractedParameters,
  type FinancialIntent,
  type FinancialQuery,
  PARAMETER_LABELS,
  type ParameterField,
  type QueryIntent,
} from '../../domain/entities/FinancialQuery.js';
import { InvalidInputError } from '../../domain/errors/FinancialQueryErrors.js';
import { monthsToPayoff, requiredMonthlyPayment } from '../../domain/services/AmortizationCalculator.js';
import { classifyIntent, findMissingParameters } from '../../domain/services/IntentClassifier.js';
import { extractParameters } from '../../domain/services/ParameterExtractor.js';
import type { DebtStorePort } from '../ports/DebtStorePort.js';
import type { CalculationOutcome, ResponseComposer } from './ResponseComposer.js';

export interface ResolvedQuery {
  answer: string;
  intent: QueryIntent;
  parameters: ExtractedParameters;
}

type DebtLookup =
  | { kind: 'FOUND'; debt: Debt }
  | Extract<CalculationOutcome, { kind: 'MISSING_PARAMETERS' | 'DEBT_NOT_FOUND' | 'DEBT_STORE_UNAVAILABLE' }>;

const missingOutcome = (params: ExtractedParameters, fields: ParameterField[]): CalculationOutcome => ({
  kind: 'MISSING_PARAMETERS',
  missing: fields.filter((field) => params[field] === undefined).map((field) => PARAMETER_LABELS[field]),
});

export const payoffOutcome = (
  principal: number,
  annualInterestRatePercent: number,
  monthlyPayment: number,
  debtName?: string,
): Extract<CalculationOutcome, { kind: 'PAYOFF' | 'NEVER_AMORTIZES' }> => {
  const result = monthsToPayoff(principal, annualInterestRatePercent, monthlyPayment);

  if (result.status === 'NEVER_PAYS_OFF') {
    return {
      kind: 'NEVER_AMORTIZES',
      monthlyPayment,
      monthlyInterest: result.monthlyInterest,
      minimumPayment: result.minimumPayment,
    };
  }

  return { kind: 'PAYOFF', principal, annualInterestRatePercent, monthlyPayment, result, debtName };
};

export class QueryResolutionService {
  constructor(
    private readonly debtStore: DebtStorePort,
    private readonly composer: ResponseComposer,
  ) {}

  async resolve(query: FinancialQuery): Promise<ResolvedQuery> {
    const parameters = extractParameters(query.question);
    const intent = classifyIntent(query.question, parameters);

    console.log(`🧭 Classified question as ${intent}`, parameters);

    if (intent === 'GENERAL_KNOWLEDGE') {
      const report = findMissingParameters(query.question, parameters);

      if (report) {
        const answer = await this.composer.compose({
          question: query.question,
          intent: report.intent,
          outcome: { kind: 'MISSING_PARAMETERS', missing: report.missing },
        });
        return { answer, intent: report.intent, parameters };
      }

      return { answer: await this.composer.composeGeneral(query.question), intent, parameters };
    }

    const outcome = await this.calculate(intent, parameters, query);
    const answer = await this.composer.compose({ question: query.question, intent, outcome });

    return { answer, intent, parameters };
  }

  private async calculate(intent: FinancialIntent, params: ExtractedParameters, query: FinancialQuery): Promise<CalculationOutcome> {
    try {
      switch (intent) {
        case 'PAYOFF_TIME': {
          const { principal, annualInterestRatePercent, monthlyPayment } = params;
          if (principal === undefined || annualInterestRatePercent === undefined || monthlyPayment === undefined) {
            return missingOutcome(params, ['principal', 'annualInterestRatePercent', 'monthlyPayment']);
          }
          return payoffOutcome(principal, annualInterestRatePercent, monthlyPayment);
        }
        case 'MONTHLY_PAYMENT_REQUIRED': {
          const { principal, annualInterestRatePercent, termMonths } = params;
          if (principal === undefined || annualInterestRatePercent === undefined || termMonths === undefined) {
            return missingOutcome(params, ['principal', 'annualInterestRatePercent', 'termMonths']);
          }
          return {
            kind: 'REQUIRED_PAYMENT',
            principal,
            annualInterestRatePercent,
            termMonths,
            monthlyPayment: requiredMonthlyPayment(principal, annualInterestRatePercent, termMonths),
          };
        }
        case 'REPAYMENT_PLAN_FOR_STORED_DEBT': {
          if (params.monthlyPayment === undefined) {
            return missingOutcome(params, ['monthlyPayment']);
          }
          const lookup = await this.findStoredDebt(params, query.userId);
          if (lookup.kind !== 'FOUND') {
            return lookup;
          }
          return payoffOutcome(lookup.debt.principal, lookup.debt.interestRate, params.monthlyPayment, lookup.debt.name);
        }
      }
    } catch (error) {
      if (error instanceof InvalidInputError) {
        return { kind: 'INVALID_INPUT', message: error.message };
      }
      throw error;
    }
  }

  private async findStoredDebt(params: ExtractedParameters, userId?: string): Promise<DebtLookup> {
    try {
      if (params.debtId !== undefined) {
        const debt = await this.debtStore.getDebt(params.debtId);
        // Another user's debt is reported the same way as a missing one.
        if (!debt || (userId !== undefined && debt.userId !== userId)) {
          return { kind: 'DEBT_NOT_FOUND', debtId: params.debtId };
        }
        return { kind: 'FOUND', debt };
      }

      const debts = userId ? await this.debtStore.listDebts(userId) : [];
      if (debts.length === 1) {
        return { kind: 'FOUND', debt: debts[0] };
      }

      // Without an id, "my debt" is only unambiguous for a user with a single saved debt.
      return { kind: 'MISSING_PARAMETERS', missing: [PARAMETER_LABELS.debtId] };
    } catch (error) {
      console.error('❌ Debt lookup failed:', error);
      return { kind: 'DEBT_STORE_UNAVAILABLE' };
    }
  }
}
