import dayjs from 'dayjs';
import type { AmortizationResult } from '../../domain/entities/FinancialQuery.js';
import { DebtNotFoundError, NeverAmortizesError } from '../../domain/errors/FinancialQueryErrors.js';
import { monthsToPayoff, requiredMonthlyPayment, splitMonths } from '../../domain/services/AmortizationCalculator.js';
import type { MonthlyPaymentRequestDTO, PayoffPlanDTO, PayoffTimeRequestDTO, RepaymentPlanRequestDTO } from '../dto/CalculationDTO.js';
import type { DebtStorePort } from '../ports/DebtStorePort.js';
import type { ResponseComposer } from './ResponseComposer.js';
import { payoffOutcome } from './QueryResolutionService.js';

export interface PayoffTimeAnswer {
  answer: string;
  plan?: PayoffPlanDTO;
}

export interface MonthlyPaymentAnswer {
  answer: string;
  monthlyPayment?: number;
}

/**
 * Structured calculator operations. Answers are built by the same composer
 * templates the ask flow uses so both surfaces report identical figures.
 */
export class CalculatorService {
  constructor(
    private readonly debtStore: DebtStorePort,
    private readonly composer: ResponseComposer,
    private readonly clock: () => dayjs.Dayjs = () => dayjs(),
  ) {}

  payoffTime(request: PayoffTimeRequestDTO): PayoffTimeAnswer {
    const outcome = payoffOutcome(request.debtAmount, request.interestRate, request.monthlyPayment);

    if (outcome.kind === 'PAYOFF') {
      return { answer: this.composer.buildSummary(outcome), plan: this.toPlan(outcome.result) };
    }

    return { answer: this.composer.describeProblem(outcome) };
  }

  monthlyPayment(request: MonthlyPaymentRequestDTO): MonthlyPaymentAnswer {
    if (request.months <= 0) {
      return { answer: 'The number of months must be greater than zero.' };
    }

    const monthlyPayment = requiredMonthlyPayment(request.debtAmount, request.interestRate, request.months);

    return {
      answer: this.composer.buildSummary({
        kind: 'REQUIRED_PAYMENT',
        principal: request.debtAmount,
        annualInterestRatePercent: request.interestRate,
        termMonths: request.months,
        monthlyPayment,
      }),
      monthlyPayment,
    };
  }

  async repaymentPlan(request: RepaymentPlanRequestDTO): Promise<PayoffPlanDTO> {
    const debt = await this.debtStore.getDebt(request.debtId);

    if (!debt) {
      throw new DebtNotFoundError(request.debtId);
    }

    const result = monthsToPayoff(debt.principal, debt.interestRate, request.monthlyPayment);

    if (result.status === 'NEVER_PAYS_OFF') {
      throw new NeverAmortizesError(result.monthlyInterest, result.minimumPayment);
    }

    return this.toPlan(result);
  }

  private toPlan(result: AmortizationResult): PayoffPlanDTO {
    const { years, months } = splitMonths(result.monthsToPayoff);
    const payoff = this.clock().add(result.monthsToPayoff, 'month');

    return {
      years,
      months,
      totalMonths: result.monthsToPayoff,
      totalPaid: result.totalPaid,
      totalInterest: result.totalInterest,
      payoffDate: payoff.isValid() ? payoff.format('YYYY-MM') : null,
    };
  }
}
